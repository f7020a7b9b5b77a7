export type StepKind = "FileQuery" | "ChannelExport" | "RegistryExport" | "ReportExtraction" | "Archive";

export type StepStatus = "Success" | "Failed" | "Skipped";

export type StepFailureReason =
  | "source not found"
  | "export failed"
  | "empty or missing file"
  | "exception"
  | "no channel succeeded"
  | "no matching nodes"
  | "source document not found"
  | "parse exception";

interface StepOutcomeBase {
  name: string;
  kind: StepKind;
}

export interface StepSucceeded extends StepOutcomeBase {
  status: "Success";
  outputPath: string;
  channel?: string;
  count?: number;
}

export interface StepFailed extends StepOutcomeBase {
  status: "Failed";
  outputPath?: string;
  reason: StepFailureReason;
  error?: string;
  exitCode?: number | null;
  exists?: boolean;
  sizeOK?: boolean;
  attempted?: string[];
}

export interface StepSkipped extends StepOutcomeBase {
  status: "Skipped";
  outputPath?: string;
  channel?: string;
  reason: StepFailureReason;
}

export type StepOutcome = StepSucceeded | StepFailed | StepSkipped;

export interface Artifact {
  path: string;
  exists: boolean;
  sizeBytes: number;
  sizeOK: boolean;
}
