/**
 * BirdDog client configuration
 *
 * Explicit options are validated with zod at client construction. The
 * environment loaders read BIRDDOG_* variables (populated from .env by the
 * client's FromEnv initializer).
 */

import { z } from 'zod';
import { BirdDogConfigError } from './errors.js';
import { Secret } from './Secret.js';
import type { BirdDogConfig, BirdDogCredentials, ResolvedBirdDogConfig } from './types.js';

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_BASE_URL = 'https://api.birddoghr.com';
export const DEFAULT_API_VERSION = 'v2';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_MIN_TLS_VERSION = 'TLSv1.2';

// =============================================================================
// SCHEMAS
// =============================================================================

const apiVersionSchema = z.enum(['v1', 'v2']);

const configSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  apiVersion: apiVersionSchema.default(DEFAULT_API_VERSION),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  minTlsVersion: z.enum(['TLSv1.2', 'TLSv1.3']).default(DEFAULT_MIN_TLS_VERSION),
});

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  BIRDDOG_API_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  BIRDDOG_API_VERSION: z.preprocess(blankToUndefined, apiVersionSchema.optional()),
  BIRDDOG_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().optional()
  ),
});

// =============================================================================
// RESOLUTION
// =============================================================================

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * Validate a per-call base URL override the same way the client option is
 * validated.
 */
export function resolveBaseUrlOverride(baseUrl: string): string {
  const parsed = configSchema.shape.baseUrl.safeParse(baseUrl);
  if (!parsed.success) {
    throw new BirdDogConfigError('Invalid BirdDog base URL override', {
      baseUrl,
      issues: parsed.error.issues,
    });
  }
  return normalizeBaseUrl(parsed.data);
}

/**
 * Apply defaults and validate. Function-valued options (fetch, logger, now)
 * are taken by the client directly.
 */
export function resolveBirdDogConfig(config: BirdDogConfig = {}): ResolvedBirdDogConfig {
  const parsed = configSchema.safeParse({
    baseUrl: config.baseUrl,
    apiVersion: config.apiVersion,
    timeoutMs: config.timeoutMs,
    minTlsVersion: config.minTlsVersion,
  });

  if (!parsed.success) {
    throw new BirdDogConfigError('Invalid BirdDog client configuration', {
      issues: parsed.error.issues,
    });
  }

  return { ...parsed.data, baseUrl: normalizeBaseUrl(parsed.data.baseUrl) };
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export function loadBirdDogConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BirdDogConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new BirdDogConfigError('Invalid BIRDDOG_* environment variables', {
      issues: parsed.error.issues,
    });
  }

  const config: BirdDogConfig = {};
  if (parsed.data.BIRDDOG_API_URL) config.baseUrl = parsed.data.BIRDDOG_API_URL;
  if (parsed.data.BIRDDOG_API_VERSION) config.apiVersion = parsed.data.BIRDDOG_API_VERSION;
  if (parsed.data.BIRDDOG_TIMEOUT_MS) config.timeoutMs = parsed.data.BIRDDOG_TIMEOUT_MS;
  return config;
}

/**
 * Credentials from BIRDDOG_API_KEY, BIRDDOG_USERNAME and BIRDDOG_PASSWORD,
 * or null when any of them is missing.
 */
export function loadBirdDogCredentialsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): BirdDogCredentials | null {
  const apiKey = env.BIRDDOG_API_KEY;
  const userName = env.BIRDDOG_USERNAME;
  const password = env.BIRDDOG_PASSWORD;

  if (!apiKey || !userName || !password) {
    return null;
  }

  return { apiKey, userName, password: Secret.from(password) };
}

/**
 * Check if BirdDog credentials are configured
 */
export function isBirdDogConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!(env.BIRDDOG_API_KEY && env.BIRDDOG_USERNAME && env.BIRDDOG_PASSWORD);
}
