import path from "path";
import { runDirStamp } from "../utils/time";
import { ACTIVITY_LOG_FILENAME } from "../collect/activityLog";

export const RUN_MANIFEST_FILENAME = "run_manifest.json";

export function outputDirName(displayName: string, startedAt: Date): string {
  return `${displayName}Logs-${runDirStamp(startedAt)}`;
}

export function activityLogPath(logRoot: string): string {
  return path.join(logRoot, ACTIVITY_LOG_FILENAME);
}

export function runManifestPath(logRoot: string): string {
  return path.join(logRoot, RUN_MANIFEST_FILENAME);
}

/** The archive sits beside the output directory, never inside it. */
export function archivePathFor(logRoot: string): string {
  return `${path.resolve(logRoot)}.zip`;
}

export function mdmReportDir(logRoot: string): string {
  return path.join(logRoot, "MDMDiag");
}

export function mdmPolicyPath(logRoot: string, area: string): string {
  return path.join(logRoot, `MDM_${area}_Policies.xml`);
}

export function stepOutputPath(logRoot: string, fileName: string): string {
  return path.join(logRoot, fileName);
}
