export type MeterErrorCode =
  | "AlreadyRunning"
  | "NotRunning"
  | "NegativeDuration"
  | "InvalidDuration"
  | "EntryNotFound"
  | "InvalidConfig";

export class MeterError extends Error {
  readonly code: MeterErrorCode;

  constructor(code: MeterErrorCode, message: string) {
    super(message);
    this.name = "MeterError";
    this.code = code;
  }
}

export function isMeterError(error: unknown, code?: MeterErrorCode): error is MeterError {
  return error instanceof MeterError && (code === undefined || error.code === code);
}
