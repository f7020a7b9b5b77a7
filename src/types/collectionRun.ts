import type { ActivityLog } from "../collect/activityLog";
import { StepOutcome } from "./stepOutcome";

export type RunPhase = "Initializing" | "Running" | "ArchivalOptional" | "Completed";

export interface CollectionRun {
  readonly family: string;
  readonly logRoot: string;
  readonly startedAt: Date;
  readonly log: ActivityLog;
  phase: RunPhase;
  readonly steps: StepOutcome[];
}
