import { promises as fs } from "fs";
import path from "path";
import { ActivityLog } from "./activityLog";
import { runArchiveStep } from "./archiveStep";
import { OutputRootError } from "./errors";
import { executeFamilyStep } from "./familySteps";
import { runMdmExtraction } from "./mdmExtraction";
import { activityLogPath, outputDirName } from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { ensureDir } from "../utils/fs";
import { errorMessage } from "../utils/text";
import { ArtifactFamily } from "../families/types";
import { CollectionTools } from "../tools/types";
import { CollectionRun } from "../types/collectionRun";
import { StepOutcome } from "../types/stepOutcome";

const MAX_DIR_SUFFIX = 1000;

export interface CreateRunOptions {
  family: ArtifactFamily;
  basePath: string;
  now?: Date;
  mirrorToConsole?: boolean;
}

export interface ExecuteOptions {
  archive: boolean;
  mdm: boolean;
}

export interface CollectionSummary {
  logRoot: string;
  archivePath: string | null;
  manifestPath: string | null;
  succeeded: number;
  failed: number;
  skipped: number;
  steps: readonly StepOutcome[];
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Creates `<base>/<name>`, or `<name>-2`, `<name>-3`, ... when an earlier run in the same minute
 * already took the name. `mkdir` without `recursive` fails on an existing directory, so two
 * invocations never share a root.
 */
async function createUniqueDir(basePath: string, name: string): Promise<string> {
  for (let suffix = 1; suffix <= MAX_DIR_SUFFIX; suffix += 1) {
    const candidate = path.join(basePath, suffix === 1 ? name : `${name}-${suffix}`);
    try {
      await fs.mkdir(candidate);
      return candidate;
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) throw error;
    }
  }
  throw new Error(`No free directory name for ${name} under ${basePath}`);
}

export async function createCollectionRun(options: CreateRunOptions): Promise<CollectionRun> {
  const startedAt = options.now ?? new Date();
  const basePath = path.resolve(options.basePath);

  let logRoot: string;
  let log: ActivityLog;
  try {
    await ensureDir(basePath);
    logRoot = await createUniqueDir(basePath, outputDirName(options.family.displayName, startedAt));
    log = new ActivityLog(activityLogPath(logRoot), { mirrorToConsole: options.mirrorToConsole });
    log.info(`Collection started; family='${options.family.displayName}'; output='${logRoot}'`);
  } catch (error) {
    throw new OutputRootError(basePath, errorMessage(error));
  }

  return {
    family: options.family.displayName,
    logRoot,
    startedAt,
    log,
    phase: "Initializing",
    steps: []
  };
}

function summarize(run: CollectionRun): Pick<CollectionSummary, "succeeded" | "failed" | "skipped"> {
  return {
    succeeded: run.steps.filter((step) => step.status === "Success").length,
    failed: run.steps.filter((step) => step.status === "Failed").length,
    skipped: run.steps.filter((step) => step.status === "Skipped").length
  };
}

/**
 * Runs every family step in declared order, then the optional MDM extraction and archive. Step
 * failures are recorded on the run and never end it early.
 */
export async function executeCollection(
  run: CollectionRun,
  family: ArtifactFamily,
  tools: CollectionTools,
  options: ExecuteOptions
): Promise<CollectionSummary> {
  if (options.mdm && !family.mdm) {
    throw new Error(`${family.displayName} collection has no MDM policy area`);
  }

  run.phase = "Running";
  for (const step of family.steps) {
    await executeFamilyStep(run, step, tools);
  }
  if (options.mdm && family.mdm) {
    await runMdmExtraction(run, family.mdm, tools.report);
  }

  run.phase = "ArchivalOptional";
  let archivePath: string | null = null;
  if (options.archive) {
    const outcome = await runArchiveStep(run, tools.archive);
    archivePath = outcome.status === "Success" ? outcome.outputPath : null;
  }

  run.phase = "Completed";
  let manifestPath: string | null = null;
  try {
    manifestPath = await writeRunManifest(buildRunManifest(run, new Date(), archivePath));
  } catch (error) {
    run.log.error(`Run manifest could not be written: ${errorMessage(error)}`);
  }

  const counts = summarize(run);
  run.log.info(
    `Collection completed; output='${run.logRoot}'; succeeded=${counts.succeeded}; failed=${counts.failed}; skipped=${counts.skipped}`
  );

  return { logRoot: run.logRoot, archivePath, manifestPath, ...counts, steps: run.steps };
}
