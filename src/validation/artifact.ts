import { fileSize } from "../utils/fs";
import { Artifact, StepKind } from "../types/stepOutcome";

export const EXPORT_MIN_BYTES = 1024;
export const TEXT_MIN_BYTES = 1;

const MIN_SIZE_BY_KIND: Record<StepKind, number> = {
  ChannelExport: EXPORT_MIN_BYTES,
  Archive: EXPORT_MIN_BYTES,
  FileQuery: TEXT_MIN_BYTES,
  RegistryExport: TEXT_MIN_BYTES,
  ReportExtraction: TEXT_MIN_BYTES
};

export function minSizeFor(kind: StepKind): number {
  return MIN_SIZE_BY_KIND[kind];
}

/** Stats the file fresh on every call; a missing path is a normal `exists: false` result. */
export async function validateArtifact(filePath: string, minSizeBytes: number): Promise<Artifact> {
  const size = await fileSize(filePath);
  if (size === null) {
    return { path: filePath, exists: false, sizeBytes: 0, sizeOK: false };
  }
  return { path: filePath, exists: true, sizeBytes: size, sizeOK: size >= minSizeBytes };
}
