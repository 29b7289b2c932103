/**
 * Startup failures. Each one is reported once and ends the process with
 * `exitCode` before any message is submitted.
 */
export class FatalError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends FatalError {}

export class InputFileError extends FatalError {}

export class UsageError extends FatalError {}

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | number | undefined {
  if (error instanceof Error && "code" in error) {
    const { code } = error;
    if (typeof code === "string" || typeof code === "number") {
      return code;
    }
  }
  return undefined;
}
