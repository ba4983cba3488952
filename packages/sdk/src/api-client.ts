/**
 * Shared API Client
 * HTTP client with retry logic, timeout handling, and error mapping
 */

import { ApiError } from './models/error';
import type {
  CaregiverDashboardResponse,
  ConfirmDoseRequest,
  ConfirmDoseResponse,
  DiagnosticsResponse,
  HealthResponse,
  RootResponse,
  TodayStatusResponse,
} from './models';

const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_GET_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 250;
const RETRYABLE_STATUS_CODES = new Set([408, 425, 500, 502, 503, 504]);
const IDEMPOTENT_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);
const NETWORK_ERROR_MESSAGE =
  "We couldn't reach the medication service right now. Please check your connection and try again.";
const SERVER_ERROR_MESSAGE =
  'We ran into an issue on our end. Please try again in a moment.';

export interface ApiClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** Retries for GET requests; writes are never retried */
  retry?: number;
  retryDelayMs?: number;
  enableLogging?: boolean;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string>;
  body?: unknown;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown> | null, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' ? value : undefined;
}

function isRetriableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status) || (status >= 500 && status < 600);
}

function mapUserMessage(status: number, fallbackMessage: string): string {
  if (status === 404) return "We couldn't find that scheduled dose.";
  if (status === 429) {
    return "You're doing that a little too quickly. Please wait a moment and try again.";
  }
  if (status >= 500) return SERVER_ERROR_MESSAGE;
  return fallbackMessage;
}

async function buildApiError(response: Response): Promise<ApiError> {
  let rawBody: string | null = null;
  let parsedBody: unknown = null;
  try {
    rawBody = await response.text();
    if (rawBody) {
      parsedBody = JSON.parse(rawBody);
    }
  } catch {
    parsedBody = null;
  }

  const body = isRecord(parsedBody) ? parsedBody : null;
  const message = readString(body, 'message') ?? (response.statusText || 'Request failed');

  return new ApiError(message, {
    status: response.status,
    code: readString(body, 'code'),
    details: body?.details,
    body: parsedBody ?? rawBody,
    userMessage: mapUserMessage(response.status, message),
    retriable: isRetriableStatus(response.status),
  });
}

function buildNetworkError(original: unknown): ApiError {
  if (original instanceof Error && original.name === 'AbortError') {
    return new ApiError('Request timed out', {
      code: 'timeout',
      userMessage: NETWORK_ERROR_MESSAGE,
      retriable: true,
    });
  }

  return new ApiError(original instanceof Error ? original.message : 'Network request failed', {
    code: 'network_error',
    userMessage: NETWORK_ERROR_MESSAGE,
    retriable: true,
  });
}

function buildParseError(original: unknown): ApiError {
  return new ApiError('Failed to process the server response. Please try again.', {
    code: 'parse_error',
    userMessage: 'We received an unexpected response from the server. Please try again.',
    details: original,
    retriable: true,
  });
}

async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createApiClient(config: ApiClientConfig) {
  const {
    baseUrl,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    retry = DEFAULT_GET_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    enableLogging = false,
  } = config;
  const root = baseUrl.replace(/\/+$/, '');

  async function apiRequest<T>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const search = options.query ? `?${new URLSearchParams(options.query).toString()}` : '';
    const url = `${root}${endpoint}${search}`;
    const maxRetries = IDEMPOTENT_METHODS.has(method) ? retry : 0;

    let attempt = 0;
    for (;;) {
      try {
        if (enableLogging) {
          console.log(`[API] ${method} ${url} (attempt ${attempt + 1})`);
        }

        const response = await fetchWithTimeout(
          url,
          {
            method,
            headers,
            body: options.body === undefined ? undefined : JSON.stringify(options.body),
          },
          timeoutMs,
        );

        if (!response.ok) {
          const error = await buildApiError(response);
          if (enableLogging) {
            console.error('[API] HTTP Error', {
              status: error.status,
              code: error.code,
              message: error.message,
            });
          }
          throw error;
        }

        const rawBody = await response.text();
        try {
          const parsed: T = JSON.parse(rawBody);
          return parsed;
        } catch (parseError) {
          throw buildParseError(parseError);
        }
      } catch (err) {
        const error = err instanceof ApiError ? err : buildNetworkError(err);

        if (attempt < maxRetries && error.retriable) {
          attempt += 1;
          await sleep(retryDelayMs * attempt);
          continue;
        }

        throw error;
      }
    }
  }

  return {
    root: () => apiRequest<RootResponse>('/'),

    health: () => apiRequest<HealthResponse>('/health'),

    getDiagnostics: () => apiRequest<DiagnosticsResponse>('/test'),

    getTodayStatus: (userId: string) =>
      apiRequest<TodayStatusResponse>('/api/senior/today', {
        query: { user_id: userId },
      }),

    confirmDose: (request: ConfirmDoseRequest) =>
      apiRequest<ConfirmDoseResponse>('/api/senior/confirm', {
        method: 'POST',
        body: request,
      }),

    getCaregiverDashboard: (patientId: string) =>
      apiRequest<CaregiverDashboardResponse>('/api/caregiver/dashboard', {
        query: { patient_id: patientId },
      }),
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;
