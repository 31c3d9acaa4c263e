/**
 * Environment-driven configuration
 * Parsed once with zod, then validated so bad values fail at startup
 */

import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';

export const DEFAULT_API_BASE = 'https://discord.com/api/v10';
export const DEFAULT_CDN_BASE = 'https://cdn.discordapp.com';

export interface HookcacheConfig {
  /** Bot token for routes that need bot authorization (list/create/get without token) */
  botToken?: string;
  apiBase: string;
  cdnBase: string;
  requestTimeoutMs: number;
  /** Name used when a channel has no usable webhook and one must be created */
  defaultWebhookName: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const EnvSchema = z.object({
  HOOKCACHE_BOT_TOKEN: z.string().trim().optional().transform((v) => v || undefined),
  HOOKCACHE_API_BASE: z.string().trim().default(DEFAULT_API_BASE),
  HOOKCACHE_CDN_BASE: z.string().trim().default(DEFAULT_CDN_BASE),
  HOOKCACHE_REQUEST_TIMEOUT_MS: z.coerce.number().default(15_000),
  HOOKCACHE_DEFAULT_WEBHOOK_NAME: z.string().trim().default('hookcache'),
});

/**
 * Validate a config object.
 * Returns errors (fatal) and warnings (informational).
 */
export function validateConfig(config: HookcacheConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [key, value] of [['apiBase', config.apiBase], ['cdnBase', config.cdnBase]] as const) {
    try {
      const url = new URL(value);
      if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        errors.push(`${key} must be an http(s) URL, got "${value}"`);
      }
    } catch {
      errors.push(`${key}: invalid URL "${value}"`);
    }
  }

  if (!Number.isInteger(config.requestTimeoutMs) || config.requestTimeoutMs < 1) {
    errors.push('requestTimeoutMs must be a positive integer');
  }

  // Platform limit on webhook names
  if (config.defaultWebhookName.length < 1 || config.defaultWebhookName.length > 80) {
    errors.push('defaultWebhookName must be 1-80 characters');
  }

  if (!config.botToken) {
    warnings.push('HOOKCACHE_BOT_TOKEN not set; only tokenised webhook routes will work');
  }

  return { valid: errors.length === 0, errors, warnings };
}

export interface LoadConfigOptions {
  /** .env file read underneath `env`; variables already in `env` win */
  envFile?: string;
}

/**
 * Build config from environment variables.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, opts: LoadConfigOptions = {}): HookcacheConfig {
  const vars = opts.envFile
    ? { ...dotenv.parse(readFileSync(opts.envFile)), ...env }
    : env;

  const parsed = EnvSchema.safeParse(vars);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  const config: HookcacheConfig = {
    botToken: data.HOOKCACHE_BOT_TOKEN,
    apiBase: stripTrailingSlash(data.HOOKCACHE_API_BASE),
    cdnBase: stripTrailingSlash(data.HOOKCACHE_CDN_BASE),
    requestTimeoutMs: data.HOOKCACHE_REQUEST_TIMEOUT_MS,
    defaultWebhookName: data.HOOKCACHE_DEFAULT_WEBHOOK_NAME,
  };

  const result = validateConfig(config);
  if (!result.valid) throw new ConfigError(result.errors);
  return config;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
