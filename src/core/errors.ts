// src/core/errors.ts
export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  RATE_LIMITED = 'rate_limited',
  EMPTY_PAGE = 'empty_page',
  SESSION_FAILED = 'session_failed',
  SESSION_NOT_OPEN = 'session_not_open',
  ITEM_UNAVAILABLE = 'item_unavailable',
  MEDIA_UNAVAILABLE = 'media_unavailable',
  EXPORT_FAILED = 'export_failed',
  INVALID_CONFIG = 'invalid_config',
  BROWSER_NOT_FOUND = 'browser_not_found',
}

export class HarvestError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarvestError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof HarvestError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
