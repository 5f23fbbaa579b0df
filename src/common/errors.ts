import type { ReportField } from "../types.js";

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/** Raised by the parser; `analyze` rewraps it as {@link MalformedOutputError}. */
export class ReportParseError extends Error {
  readonly field: ReportField;
  readonly detail?: string;

  constructor(field: ReportField, message: string, detail?: string) {
    super(message);
    this.name = "ReportParseError";
    this.field = field;
    this.detail = detail;
  }
}

export class ProcessFailedError extends Error {
  readonly kind = "process_failed";
  readonly exitCode: number;
  /** Full captured output of the failed run. */
  readonly output: string;

  constructor(exitCode: number, output: string) {
    super(`Analyzer exited with code ${exitCode}`);
    this.name = "ProcessFailedError";
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class MalformedOutputError extends Error {
  readonly kind = "malformed_output";
  readonly field: ReportField;
  readonly reason: string;
  readonly detail?: string;

  constructor(field: ReportField, reason: string, detail?: string) {
    super(`Analyzer report is malformed at ${field}: ${reason}`);
    this.name = "MalformedOutputError";
    this.field = field;
    this.reason = reason;
    this.detail = detail;
  }
}

export type AnalysisError = ProcessFailedError | MalformedOutputError;

export function isAnalysisError(value: unknown): value is AnalysisError {
  return value instanceof ProcessFailedError || value instanceof MalformedOutputError;
}
