import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import runManifestSchema from "../../schemas/run-manifest.schema.json";
import { RunManifest } from "../types/runManifest";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let manifestValidator: ValidateFunction<RunManifest> | null = null;

export function getRunManifestValidator(): ValidateFunction<RunManifest> {
  if (!manifestValidator) {
    manifestValidator = ajv.compile<RunManifest>(runManifestSchema);
  }
  return manifestValidator;
}

export function schemaErrors<T>(validator: ValidateFunction<T>, label: string): string[] {
  return (validator.errors ?? []).map(
    (error) => `${label} failed schema validation: ${error.instancePath || "<root>"} ${error.message ?? ""}`.trim()
  );
}
