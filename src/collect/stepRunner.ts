import { stepMarker } from "./markers";
import { minSizeFor, validateArtifact } from "../validation/artifact";
import { errorMessage } from "../utils/text";
import { CollectionRun } from "../types/collectionRun";
import { StepKind, StepOutcome } from "../types/stepOutcome";

export interface StepActionResult {
  outputPath?: string;
  exitCode?: number | null;
  channel?: string;
  skipped?: boolean;
}

export interface StepDefinition {
  name: string;
  kind: StepKind;
  outputPath?: string;
  channel?: string;
  action: () => Promise<StepActionResult>;
}

/** Freezes the outcome, records it on the run and writes its STEP line. */
export function finalizeStep(run: CollectionRun, outcome: StepOutcome): StepOutcome {
  const finalized = Object.freeze(outcome);
  run.steps.push(finalized);
  const marker = stepMarker(finalized);
  run.log.append(marker.level, marker.line);
  return finalized;
}

function exitedCleanly(exitCode: number | null | undefined): boolean {
  return exitCode === undefined || exitCode === 0;
}

async function evaluate(step: StepDefinition, result: StepActionResult): Promise<StepOutcome> {
  const outputPath = result.outputPath ?? step.outputPath;
  const channel = result.channel ?? step.channel;

  if (result.skipped) {
    return { status: "Skipped", name: step.name, kind: step.kind, outputPath, channel, reason: "source not found" };
  }

  if (!outputPath) {
    return {
      status: "Failed",
      name: step.name,
      kind: step.kind,
      reason: exitedCleanly(result.exitCode) ? "empty or missing file" : "export failed",
      exitCode: result.exitCode,
      exists: false,
      sizeOK: false
    };
  }

  const artifact = await validateArtifact(outputPath, minSizeFor(step.kind));
  if (exitedCleanly(result.exitCode) && artifact.exists && artifact.sizeOK) {
    return { status: "Success", name: step.name, kind: step.kind, outputPath, channel: channel ?? step.name };
  }

  return {
    status: "Failed",
    name: step.name,
    kind: step.kind,
    outputPath,
    reason: exitedCleanly(result.exitCode) ? "empty or missing file" : "export failed",
    exitCode: result.exitCode,
    exists: artifact.exists,
    sizeOK: artifact.sizeOK
  };
}

/**
 * Runs one collection action behind an error boundary. Whatever the action throws becomes a
 * `Failed` outcome with reason `exception`; the caller always gets an outcome back.
 */
export async function runStep(run: CollectionRun, step: StepDefinition): Promise<StepOutcome> {
  let outcome: StepOutcome;
  try {
    const result = await step.action();
    outcome = await evaluate(step, result);
  } catch (error) {
    outcome = {
      status: "Failed",
      name: step.name,
      kind: step.kind,
      outputPath: step.outputPath,
      reason: "exception",
      error: errorMessage(error)
    };
  }
  return finalizeStep(run, outcome);
}
