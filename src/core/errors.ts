// Domain-specific error types for probe-preflight

/**
 * Base error class for all preflight errors
 */
export abstract class PreflightError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for malformed input (version strings and the like)
 */
export class ValidationError extends PreflightError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Configuration file exists but cannot be read, parsed or validated
 */
export class ConfigError extends PreflightError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly configPath: string, context?: Record<string, unknown>) {
    super(message, { ...context, configPath });
  }
}

/**
 * The probe compilation/loading runtime cannot be resolved on this host
 */
export class ProbeRuntimeError extends PreflightError {
  readonly code = 'PROBE_RUNTIME_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly remediation?: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

/**
 * Compiling or inspecting the probe failed
 */
export class ProbeCompileError extends PreflightError {
  readonly code = 'PROBE_COMPILE_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly stderr?: string) {
    super(message, { stderr });
  }
}

/**
 * Describe any thrown value as a single message string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * First non-empty line of an error's description, for single-line report text.
 * Tool failures carry their full output after the first line.
 */
export function summarizeError(error: unknown): string {
  const description = describeError(error);
  return description.split('\n').map(line => line.trim()).find(line => line.length > 0) ?? description;
}
