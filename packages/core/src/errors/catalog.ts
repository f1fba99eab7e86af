/**
 * Typed error catalog for the idevsutil adapter.
 *
 * Every failure the adapter raises is an AdapterError subclass so that a
 * caller (the backup pipeline, the CLI) can branch on `errorCode` and decide
 * on retry without parsing messages.
 */

export class AdapterError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Fatal before any transfer happens

export class ConfigError extends AdapterError {
  constructor(
    public readonly setting: string,
    details?: Record<string, unknown>,
    message = `Required setting ${setting} is not set`,
    errorCode = "CONFIG_MISSING",
  ) {
    super(errorCode, message, {
      setting,
      ...details,
    });
  }

  /** A setting that is present but malformed. */
  static invalid(setting: string, reason: string): ConfigError {
    return new ConfigError(
      setting,
      { reason },
      `Setting ${setting} is invalid: ${reason}`,
      "CONFIG_INVALID",
    );
  }
}

export class AuthError extends AdapterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("AUTH_REJECTED", message, details);
  }
}

export class ProtocolError extends AdapterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PROTOCOL_ERROR", message, details);
  }
}

// Raised by data operations

/** Captured output of the invocation that failed. */
export interface FailedOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface TransferErrorOptions {
  /** Saga step number, 1-based. Single-shot operations use 1. */
  step: number;
  stepName: string;
  output?: FailedOutput;
  /** Names of the steps that completed before this one failed. */
  completed?: string[];
  cause?: unknown;
}

export class TransferError extends AdapterError {
  public readonly step: number;
  public readonly stepName: string;
  public readonly output?: FailedOutput;
  public readonly completed: string[];

  constructor(message: string, options: TransferErrorOptions) {
    super("TRANSFER_FAILED", message, {
      step: options.step,
      stepName: options.stepName,
      completed: options.completed ?? [],
      ...(options.output !== undefined && { output: options.output }),
    });
    this.step = options.step;
    this.stepName = options.stepName;
    this.output = options.output;
    this.completed = options.completed ?? [];
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends AdapterError {
  constructor(
    public readonly path: string,
    details?: Record<string, unknown>,
  ) {
    super("NOT_FOUND", `Expected file is absent: ${path}`, {
      path,
      ...details,
    });
  }
}
