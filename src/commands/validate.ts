import path from "path";
import { archivePathFor, runManifestPath } from "../io/paths";
import { pathExists, readJson } from "../utils/fs";
import { minSizeFor, validateArtifact } from "../validation/artifact";
import { getRunManifestValidator, schemaErrors } from "../validation/jsonSchema";

export interface ValidateOptions {
  runDir: string;
}

export interface ValidateReport {
  checked: number;
  problems: string[];
}

/** Maps a path recorded under the manifest's log root onto wherever the run directory lives now. */
function relocate(recorded: string, recordedRoot: string, runDir: string): string {
  const relative = path.relative(recordedRoot, recorded);
  if (relative.startsWith("..") || path.isAbsolute(relative)) return recorded;
  return path.join(runDir, relative);
}

export async function runValidate(options: ValidateOptions): Promise<ValidateReport> {
  const runDir = path.resolve(options.runDir);
  const manifestPath = runManifestPath(runDir);
  if (!(await pathExists(manifestPath))) {
    return { checked: 0, problems: [`Run manifest not found: ${manifestPath}`] };
  }

  const manifest = await readJson<unknown>(manifestPath);
  const validator = getRunManifestValidator();
  if (!validator(manifest)) {
    return { checked: 0, problems: schemaErrors(validator, "run_manifest.json") };
  }

  const problems: string[] = [];
  let checked = 0;
  for (const step of manifest.steps) {
    if (step.kind === "Archive" || step.status !== "Success" || !step.output_path) continue;
    const artifactPath = relocate(step.output_path, manifest.log_root, runDir);
    const artifact = await validateArtifact(artifactPath, minSizeFor(step.kind));
    checked += 1;
    if (!artifact.exists || !artifact.sizeOK) {
      problems.push(`${step.name}: file='${artifactPath}'; exists=${artifact.exists}; sizeOK=${artifact.sizeOK}`);
    }
  }

  if (manifest.archive_path) {
    const archivePath = archivePathFor(runDir);
    const artifact = await validateArtifact(archivePath, minSizeFor("Archive"));
    checked += 1;
    if (!artifact.exists || !artifact.sizeOK) {
      problems.push(`ZIP archive: file='${archivePath}'; exists=${artifact.exists}; sizeOK=${artifact.sizeOK}`);
    }
  }

  return { checked, problems };
}
