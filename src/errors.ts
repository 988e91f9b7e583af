import { inspect } from "node:util";

export type CompressorErrorCode =
  | "ERR_INVALID_OPTIONS"
  | "ERR_INVALID_PRESERVE_PATTERN"
  | "ERR_COMPRESSOR_UNAVAILABLE"
  | "ERR_COMPRESSOR_FAILED";

export interface CompressorErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  originalError?: CompressorErrorDetails;
}

/**
 * Error raised for invalid configuration and for sub-compressor failures.
 */
export class CompressorError extends Error {
  /** What went wrong, e.g. ERR_INVALID_PRESERVE_PATTERN. */
  public readonly code: CompressorErrorCode;
  /** The underlying error, if any. */
  public readonly originalError?: Error;

  /**
   * @param message The error message.
   * @param code The error code.
   * @param originalError Optional underlying error.
   */
  constructor(message: string, code: CompressorErrorCode, originalError?: Error) {
    super(message);
    this.name = "CompressorError";
    this.code = code;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CompressorError);
    }
  }

  /**
   * Returns a plain object with the error's metadata, without the stack.
   */
  toObject(): CompressorErrorDetails {
    const descriptor: CompressorErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    const original = describeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): CompressorErrorDetails {
    return this.toObject();
  }

  /**
   * Makes `console.error(err)` print the descriptor instead of the stack.
   */
  [inspect.custom](): CompressorErrorDetails {
    return this.toObject();
  }
}

/**
 * Formats a caught value as a message for log lines.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeUnknownError(error: unknown): CompressorErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof CompressorError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    const descriptor: CompressorErrorDetails = {
      name: error.name || "Error",
      message: error.message,
    };

    const code: unknown = Reflect.get(error, "code");
    if (typeof code === "string" || typeof code === "number") {
      descriptor.code = code;
    }

    const nested = describeUnknownError(error.cause);
    if (nested) {
      descriptor.originalError = nested;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: String(error),
  };
}
