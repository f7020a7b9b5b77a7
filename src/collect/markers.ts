import { LogLevel } from "./activityLog";
import { StepOutcome } from "../types/stepOutcome";

export const STEP_MARKER = "STEP:";

/** Single quotes inside a value are doubled so every field still ends at the first lone `'`. */
export function quoted(value: string | undefined): string {
  return `'${(value ?? "").replace(/'/g, "''")}'`;
}

function exitField(exitCode: number | null | undefined): string {
  return typeof exitCode === "number" ? String(exitCode) : "n/a";
}

export function exportSucceeded(operation: string, channel: string, output: string): string {
  return `${STEP_MARKER} ${operation} export succeeded; channel=${quoted(channel)}; output=${quoted(output)}`;
}

export interface ExportFailureFields {
  reason: string;
  exitCode?: number | null;
  exists: boolean;
  sizeOK: boolean;
  file?: string;
}

export function exportFailed(operation: string, fields: ExportFailureFields): string {
  return [
    `${STEP_MARKER} ${operation} export failed`,
    `reason=${quoted(fields.reason)}`,
    `exit=${exitField(fields.exitCode)}`,
    `exists=${fields.exists}`,
    `sizeOK=${fields.sizeOK}`,
    `file=${quoted(fields.file)}`
  ].join("; ");
}

export function exportException(operation: string, file: string | undefined, error: string): string {
  return `${STEP_MARKER} ${operation} export failed; reason='exception'; file=${quoted(file)}; error=${quoted(error)}`;
}

export function exportExhausted(operation: string, attempted: string[], file: string | undefined): string {
  return `${STEP_MARKER} ${operation} export failed; reason='no channel succeeded'; attempted=${quoted(
    attempted.join(", ")
  )}; file=${quoted(file)}`;
}

export function exportSkipped(
  operation: string,
  reason: string,
  channel: string | undefined,
  file: string | undefined
): string {
  return `${STEP_MARKER} ${operation} export skipped; reason=${quoted(reason)}; channel=${quoted(
    channel
  )}; file=${quoted(file)}`;
}

export function archiveSucceeded(output: string): string {
  return `${STEP_MARKER} ZIP archive succeeded; output=${quoted(output)}`;
}

export function archiveFailed(reason: string, file: string | undefined, error?: string): string {
  const line = `${STEP_MARKER} ZIP archive failed; reason=${quoted(reason)}; file=${quoted(file)}`;
  return error ? `${line}; error=${quoted(error)}` : line;
}

export function mdmSucceeded(output: string, count: number): string {
  return `${STEP_MARKER} MDM XML parsing succeeded; output=${quoted(output)}; count=${count}`;
}

export function mdmFailed(reason: string, file: string | undefined, error?: string): string {
  const line = `${STEP_MARKER} MDM XML parsing failed; reason=${quoted(reason)}; file=${quoted(file)}`;
  return error ? `${line}; error=${quoted(error)}` : line;
}

function levelFor(outcome: StepOutcome): LogLevel {
  if (outcome.status === "Success") return "INFO";
  if (outcome.status === "Skipped") return "WARN";
  return "ERROR";
}

/** Renders a finalized outcome as its single STEP line. */
export function stepMarker(outcome: StepOutcome): { level: LogLevel; line: string } {
  const level = levelFor(outcome);

  if (outcome.kind === "Archive") {
    const line =
      outcome.status === "Success"
        ? archiveSucceeded(outcome.outputPath)
        : archiveFailed(outcome.reason, outcome.outputPath, outcome.status === "Failed" ? outcome.error : undefined);
    return { level, line };
  }

  if (outcome.kind === "ReportExtraction") {
    const line =
      outcome.status === "Success"
        ? mdmSucceeded(outcome.outputPath, outcome.count ?? 0)
        : mdmFailed(outcome.reason, outcome.outputPath, outcome.status === "Failed" ? outcome.error : undefined);
    return { level, line };
  }

  switch (outcome.status) {
    case "Success":
      return { level, line: exportSucceeded(outcome.name, outcome.channel ?? outcome.name, outcome.outputPath) };
    case "Skipped":
      return { level, line: exportSkipped(outcome.name, outcome.reason, outcome.channel, outcome.outputPath) };
    case "Failed":
      if (outcome.reason === "exception") {
        return { level, line: exportException(outcome.name, outcome.outputPath, outcome.error ?? "") };
      }
      if (outcome.reason === "no channel succeeded") {
        return { level, line: exportExhausted(outcome.name, outcome.attempted ?? [], outcome.outputPath) };
      }
      return {
        level,
        line: exportFailed(outcome.name, {
          reason: outcome.reason,
          exitCode: outcome.exitCode,
          exists: outcome.exists ?? false,
          sizeOK: outcome.sizeOK ?? false,
          file: outcome.outputPath
        })
      };
  }
}
