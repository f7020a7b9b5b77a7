import { promises as fs } from "fs";
import { finalizeStep } from "./stepRunner";
import { archivePathFor } from "../io/paths";
import { removeIfExists } from "../utils/fs";
import { errorMessage } from "../utils/text";
import { minSizeFor, validateArtifact } from "../validation/artifact";
import { ArchiveCompressor } from "../tools/types";
import { CollectionRun } from "../types/collectionRun";
import { StepOutcome } from "../types/stepOutcome";

const STEP_NAME = "ZIP archive";

/**
 * Zips the output directory to `<logRoot>.zip`. Any previous archive is removed first; the new one
 * is written to a `.partial` file and renamed into place only once compression finished.
 */
export async function runArchiveStep(run: CollectionRun, compressor: ArchiveCompressor): Promise<StepOutcome> {
  const destPath = archivePathFor(run.logRoot);
  const partialPath = `${destPath}.partial`;
  let outcome: StepOutcome;

  try {
    await removeIfExists(destPath);
    await removeIfExists(partialPath);
    await compressor.compress(run.logRoot, partialPath);
    await fs.rename(partialPath, destPath);

    const artifact = await validateArtifact(destPath, minSizeFor("Archive"));
    outcome =
      artifact.exists && artifact.sizeOK
        ? { status: "Success", name: STEP_NAME, kind: "Archive", outputPath: destPath }
        : {
            status: "Failed",
            name: STEP_NAME,
            kind: "Archive",
            outputPath: destPath,
            reason: "empty or missing file",
            exists: artifact.exists,
            sizeOK: artifact.sizeOK
          };
  } catch (error) {
    await removeIfExists(partialPath).catch(() => undefined);
    outcome = {
      status: "Failed",
      name: STEP_NAME,
      kind: "Archive",
      outputPath: destPath,
      reason: "exception",
      error: errorMessage(error)
    };
  }

  return finalizeStep(run, outcome);
}
