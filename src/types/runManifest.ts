import { StepFailureReason, StepKind, StepStatus } from "./stepOutcome";

export interface RunManifestStep {
  name: string;
  kind: StepKind;
  status: StepStatus;
  output_path: string | null;
  channel: string | null;
  reason: StepFailureReason | null;
  error: string | null;
  exit_code: number | null;
  count: number | null;
  attempted: string[];
}

export interface RunManifest {
  schema_version: "1.0";
  family: string;
  log_root: string;
  started_at: string;
  ended_at: string;
  archive_path: string | null;
  steps: RunManifestStep[];
}
