export type CompletionErrorKind = 'rate_limited' | 'timeout' | 'provider_error' | 'invalid_response';

export type ErrorKind =
  | CompletionErrorKind
  | 'extraction_error'
  | 'configuration_error'
  | 'unknown_tool'
  | 'cancelled';

export interface AnalysisErrorInfo {
  message?: string;
  statusCode?: number;
  attempts?: number;
  retryable?: boolean;
  cause?: unknown;
}

export class AnalysisError extends Error {
  readonly kind: ErrorKind;
  info: AnalysisErrorInfo;

  constructor(kind: ErrorKind, message: string, info: AnalysisErrorInfo = {}) {
    super(message);
    this.name = 'AnalysisError';
    this.kind = kind;
    this.info = info;
  }
}

/** The source document could not be turned into analysable text. */
export class ExtractionError extends AnalysisError {
  constructor(message: string, info: AnalysisErrorInfo = {}) {
    super('extraction_error', message, info);
    this.name = 'ExtractionError';
  }
}

/** A missing template, registry entry or setting. Fixable only by changing code or configuration. */
export class ConfigurationError extends AnalysisError {
  constructor(message: string, info: AnalysisErrorInfo = {}) {
    super('configuration_error', message, info);
    this.name = 'ConfigurationError';
  }
}

export class CompletionError extends AnalysisError {
  declare readonly kind: CompletionErrorKind;

  constructor(kind: CompletionErrorKind, message: string, info: AnalysisErrorInfo = {}) {
    super(kind, message, info);
    this.name = 'CompletionError';
  }
}

export class UnknownToolError extends AnalysisError {
  readonly toolName: string;

  constructor(toolName: string, available: string[]) {
    super('unknown_tool', `Unknown tool "${toolName}". Available tools: ${available.join(', ')}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class CancelledError extends AnalysisError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
