/**
 * Runtime configuration
 * Reads from environment variables (process.env)
 *
 * Store connection (both required for the store to be available):
 * - DATABASE_URL: Firestore endpoint, e.g. "http://localhost:8080" for the emulator
 *   or "https://firestore.googleapis.com"
 * - DATABASE_NAME: Firestore database id, e.g. "(default)"
 *
 * Optional:
 * - FIREBASE_PROJECT_ID: Project used when initializing the Admin SDK
 * - PORT: Listen port for the standalone server (default 8000)
 * - SENTRY_DSN: Enables Sentry error tracking
 * - RATE_LIMIT_MAX: Requests per IP per 15 minutes (default 100, 0 disables)
 */

const DEFAULT_PORT = 8000;
const DEFAULT_RATE_LIMIT_MAX = 100;

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
}

function readOptional(name: string): string | null {
  const value = process.env[name];
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export type DatabaseConfig = {
  url: string | null;
  name: string | null;
  projectId: string | null;
};

export type ServerConfig = {
  port: number;
  host: string;
};

export type RateLimitConfig = {
  windowMs: number;
  max: number;
};

export function loadDatabaseConfig(): DatabaseConfig {
  return {
    url: readOptional('DATABASE_URL'),
    name: readOptional('DATABASE_NAME'),
    projectId: readOptional('FIREBASE_PROJECT_ID'),
  };
}

export function loadServerConfig(): ServerConfig {
  return {
    port: parseNonNegativeInt(process.env.PORT, DEFAULT_PORT),
    host: '0.0.0.0',
  };
}

export function loadRateLimitConfig(): RateLimitConfig {
  return {
    windowMs: 15 * 60 * 1000,
    max: parseNonNegativeInt(process.env.RATE_LIMIT_MAX, DEFAULT_RATE_LIMIT_MAX),
  };
}

export function isProductionEnvironment(): boolean {
  return process.env.NODE_ENV === 'production';
}
