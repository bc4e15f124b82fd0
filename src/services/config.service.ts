/**
 * Configuration Service
 *
 * Resolves library settings from environment variables.
 * Values are validated with zod; an invalid value falls back to its default
 * and is reported once per load.
 */

import { z } from 'zod';
import { logWarn } from './logger.service.js';

// =============================================================================
// Type Definitions
// =============================================================================

export interface ComicInfoConfig {
  /** Timeout in milliseconds for HTTP retrieval of ComicInfo documents */
  fetchTimeoutMs: number;
  /** User-Agent header sent with HTTP retrieval */
  userAgent: string;
  /** Whether serialized XML is indented */
  prettyXml: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: Readonly<ComicInfoConfig> = Object.freeze({
  fetchTimeoutMs: 30_000,
  userAgent: 'comicinfo-metadata/2.0.0',
  prettyXml: true,
});

/**
 * Environment variable names for each setting.
 */
export const ENV_VAR_MAP: Record<keyof ComicInfoConfig, string> = {
  fetchTimeoutMs: 'COMICINFO_FETCH_TIMEOUT_MS',
  userAgent: 'COMICINFO_USER_AGENT',
  prettyXml: 'COMICINFO_PRETTY_XML',
};

const FetchTimeoutSchema = z.coerce.number().int().positive();
const UserAgentSchema = z.string().trim().min(1);
const PrettyXmlSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// =============================================================================
// Core Functions
// =============================================================================

let cachedConfig: ComicInfoConfig | null = null;

function readSetting<T>(
  key: keyof ComicInfoConfig,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const envVar = ENV_VAR_MAP[key];
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const result = schema.safeParse(raw.trim());
  if (!result.success) {
    logWarn('config', `Ignoring invalid ${envVar}, using default`, {
      value: raw,
      issues: result.error.issues.map((issue) => issue.message),
    });
    return fallback;
  }
  return result.data;
}

/**
 * Load configuration from the environment.
 * Returns cached config if available.
 */
export function loadConfig(): ComicInfoConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    fetchTimeoutMs: readSetting('fetchTimeoutMs', FetchTimeoutSchema, DEFAULT_CONFIG.fetchTimeoutMs),
    userAgent: readSetting('userAgent', UserAgentSchema, DEFAULT_CONFIG.userAgent),
    prettyXml: readSetting('prettyXml', PrettyXmlSchema, DEFAULT_CONFIG.prettyXml),
  };
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
