/**
 * Errors raised before any pass runs. Findings describe defects in the
 * agent; these describe why the agent or the configuration could not be read.
 */

export type AnalysisErrorCode = 'LOAD_ERROR' | 'CONFIG_ERROR';

export abstract class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCode,
    public readonly context?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    };
  }
}

/**
 * The agent directory or one of its documents cannot be read or parsed.
 * Fatal: no partial graph is ever analyzed.
 */
export class LoadError extends AnalysisError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, 'LOAD_ERROR', { ...context, filePath }, options);
  }
}

export class ConfigurationError extends AnalysisError {
  constructor(
    message: string,
    public readonly configPath?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configPath });
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
