/**
 * API Error Model
 */

export type ApiErrorInit = {
  status?: number;
  code?: string;
  userMessage: string;
  details?: unknown;
  body?: unknown;
  retriable: boolean;
};

export class ApiError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly userMessage: string;
  readonly details?: unknown;
  readonly body?: unknown;
  readonly retriable: boolean;

  constructor(message: string, init: ApiErrorInit) {
    super(message);
    this.name = 'ApiError';
    this.status = init.status;
    this.code = init.code;
    this.userMessage = init.userMessage;
    this.details = init.details;
    this.body = init.body;
    this.retriable = init.retriable;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
