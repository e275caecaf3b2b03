/**
 * Configuration for the API
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - STORE_DRIVER: "firestore" (default) or "memory" for a process-local store
 * - BLANK_REFERENCE_POLICY: "reject" (default) or "ignore" for `"owner": ""` in updates
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 * - RATE_LIMIT_WINDOW_MS / RATE_LIMIT_MAX: global rate limit per IP
 * - PORT: listen port when running outside Cloud Functions
 * - SENTRY_DSN: enables error reporting
 */

import type { BlankReferencePolicy } from './services/domain/resources/partialUpdate';

type Env = NodeJS.ProcessEnv;

export type StoreDriver = 'firestore' | 'memory';

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadStoreConfig(env: Env = process.env) {
  const driver: StoreDriver = env.STORE_DRIVER?.trim().toLowerCase() === 'memory' ? 'memory' : 'firestore';
  return { driver };
}

export function loadUpdatePolicyConfig(env: Env = process.env) {
  const blankReferencePolicy: BlankReferencePolicy =
    env.BLANK_REFERENCE_POLICY?.trim().toLowerCase() === 'ignore' ? 'ignore' : 'reject';
  return { blankReferencePolicy };
}

export function loadCorsConfig(env: Env = process.env) {
  return {
    // Example: "https://sitters.example.com,https://admin.example.com"
    allowedOrigins: (env.ALLOWED_ORIGINS || '')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    isDevelopment: env.NODE_ENV !== 'production',
  };
}

export function loadRateLimitConfig(env: Env = process.env) {
  return {
    windowMs: parsePositiveInt(env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000),
    max: parsePositiveInt(env.RATE_LIMIT_MAX, 300),
  };
}

export function loadServerConfig(env: Env = process.env) {
  return {
    port: parsePositiveInt(env.PORT, 8080),
  };
}

export const storeConfig = loadStoreConfig();
export const updatePolicyConfig = loadUpdatePolicyConfig();
export const corsConfig = loadCorsConfig();
export const rateLimitConfig = loadRateLimitConfig();
export const serverConfig = loadServerConfig();
