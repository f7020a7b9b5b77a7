import { finalizeStep } from "./stepRunner";
import { EXPORT_MIN_BYTES, validateArtifact } from "../validation/artifact";
import { errorMessage } from "../utils/text";
import { CollectionRun } from "../types/collectionRun";
import { StepOutcome } from "../types/stepOutcome";

export interface ChannelExportResult {
  exitCode: number | null;
}

export interface ChannelFallbackStep {
  name: string;
  candidates: string[];
  outputPath: string;
  probe: (candidate: string) => Promise<boolean>;
  exportFn: (candidate: string, outputPath: string) => Promise<ChannelExportResult>;
}

async function isReachable(step: ChannelFallbackStep, candidate: string): Promise<boolean> {
  try {
    return await step.probe(candidate);
  } catch {
    return false;
  }
}

async function tryCandidate(
  run: CollectionRun,
  step: ChannelFallbackStep,
  candidate: string
): Promise<boolean> {
  try {
    const result = await step.exportFn(candidate, step.outputPath);
    const artifact = await validateArtifact(step.outputPath, EXPORT_MIN_BYTES);
    if (result.exitCode === 0 && artifact.exists && artifact.sizeOK) return true;
    const exit = result.exitCode === null ? "n/a" : String(result.exitCode);
    run.log.warn(
      `Channel '${candidate}' did not produce a valid export (exit=${exit}; exists=${artifact.exists}; sizeOK=${artifact.sizeOK}); trying next candidate`
    );
  } catch (error) {
    run.log.warn(`Channel '${candidate}' export raised '${errorMessage(error)}'; trying next candidate`);
  }
  return false;
}

async function resolve(run: CollectionRun, step: ChannelFallbackStep): Promise<StepOutcome> {
  for (const candidate of step.candidates) {
    if (!(await isReachable(step, candidate))) {
      run.log.warn(`Channel '${candidate}' not found; trying next candidate`);
      continue;
    }
    if (await tryCandidate(run, step, candidate)) {
      return {
        status: "Success",
        name: step.name,
        kind: "ChannelExport",
        outputPath: step.outputPath,
        channel: candidate
      };
    }
  }

  return {
    status: "Failed",
    name: step.name,
    kind: "ChannelExport",
    outputPath: step.outputPath,
    reason: "no channel succeeded",
    attempted: [...step.candidates]
  };
}

/** Exports from the first candidate channel that yields a valid artifact; later ones are never tried. */
export async function resolveAndExport(run: CollectionRun, step: ChannelFallbackStep): Promise<StepOutcome> {
  let outcome: StepOutcome;
  try {
    outcome = await resolve(run, step);
  } catch (error) {
    outcome = {
      status: "Failed",
      name: step.name,
      kind: "ChannelExport",
      outputPath: step.outputPath,
      reason: "exception",
      error: errorMessage(error)
    };
  }
  return finalizeStep(run, outcome);
}
