export type ErrorKind = "transient" | "insufficient-data" | "persistence" | "fatal";

export abstract class MonitorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or upstream failure that may succeed on a later attempt. */
export class TransientError extends MonitorError {
  readonly kind = "transient" as const;
}

/** The call did not settle in time. It may still complete on the remote side. */
export class TimeoutError extends TransientError {}

/** Missing or partial data: the affected window or instrument is skipped. */
export class InsufficientDataError extends MonitorError {
  readonly kind = "insufficient-data" as const;
}

export class PersistenceError extends MonitorError {
  readonly kind = "persistence" as const;
}

/** Bad or missing configuration. The process does not start. */
export class ConfigError extends MonitorError {
  readonly kind = "fatal" as const;
}

export type Result<T, E = MonitorError> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Unknown errors raised by I/O collaborators are treated as transient. */
export function classifyError(error: unknown): MonitorError {
  if (error instanceof MonitorError) return error;
  return new TransientError(errorMessage(error), { cause: error });
}

/** Store failures keep their own kind; anything raw from the driver is a persistence error. */
export function toPersistenceError(error: unknown): MonitorError {
  if (error instanceof MonitorError) return error;
  return new PersistenceError(errorMessage(error), { cause: error });
}
