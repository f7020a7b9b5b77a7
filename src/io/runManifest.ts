import { runManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { CollectionRun } from "../types/collectionRun";
import { RunManifest, RunManifestStep } from "../types/runManifest";
import { StepOutcome } from "../types/stepOutcome";

function toManifestStep(outcome: StepOutcome): RunManifestStep {
  const base = {
    name: outcome.name,
    kind: outcome.kind,
    status: outcome.status,
    output_path: outcome.outputPath ?? null
  };

  switch (outcome.status) {
    case "Success":
      return {
        ...base,
        channel: outcome.channel ?? null,
        reason: null,
        error: null,
        exit_code: null,
        count: outcome.count ?? null,
        attempted: []
      };
    case "Skipped":
      return {
        ...base,
        channel: outcome.channel ?? null,
        reason: outcome.reason,
        error: null,
        exit_code: null,
        count: null,
        attempted: []
      };
    case "Failed":
      return {
        ...base,
        channel: null,
        reason: outcome.reason,
        error: outcome.error ?? null,
        exit_code: outcome.exitCode ?? null,
        count: null,
        attempted: outcome.attempted ?? []
      };
  }
}

export function buildRunManifest(run: CollectionRun, endedAt: Date, archivePath: string | null): RunManifest {
  return {
    schema_version: "1.0",
    family: run.family,
    log_root: run.logRoot,
    started_at: run.startedAt.toISOString(),
    ended_at: endedAt.toISOString(),
    archive_path: archivePath,
    steps: run.steps.map(toManifestStep)
  };
}

export async function writeRunManifest(manifest: RunManifest): Promise<string> {
  const filePath = runManifestPath(manifest.log_root);
  await writeJson(filePath, manifest);
  return filePath;
}
