/**
 * Environment
 *
 * Loads `.env` / `.env.local` and turns the BNP variables into a typed config.
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { isParsePolicy, type ParsePolicy } from '../../banks/bnp/types/index.js';

export interface BnpEnvConfig {
  username: string;
  password: string;
  baseUrl?: string;
  timeout?: number;
  parsePolicy?: ParsePolicy;
}

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: '.env.local' });
}

/**
 * Read the variables named in `keys`. Throws if any is missing or blank.
 */
export function requireEnv<K extends string>(
  keys: readonly K[],
  env: NodeJS.ProcessEnv = process.env
): Record<K, string> {
  const missing: string[] = [];
  const entries: Array<[K, string]> = [];

  for (const key of keys) {
    const value = env[key];
    if (!value || value.trim() === '') {
      missing.push(key);
    } else {
      entries.push([key, value]);
    }
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required env vars: ${missing.join(', ')}`);
  }

  return Object.fromEntries(entries) as Record<K, string>;
}

/**
 * Build the client configuration from BNP_* variables.
 *
 * - BNP_USERNAME, BNP_PASSWORD (required)
 * - BNP_BASE_URL: portal origin override
 * - BNP_TIMEOUT_MS: per-request timeout
 * - BNP_PARSE_POLICY: "fail-fast" or "skip-and-continue"
 */
export function readBnpEnv(env: NodeJS.ProcessEnv = process.env): BnpEnvConfig {
  const { BNP_USERNAME, BNP_PASSWORD } = requireEnv(['BNP_USERNAME', 'BNP_PASSWORD'], env);
  const config: BnpEnvConfig = { username: BNP_USERNAME, password: BNP_PASSWORD };

  if (env.BNP_BASE_URL) {
    config.baseUrl = env.BNP_BASE_URL;
  }

  if (env.BNP_TIMEOUT_MS) {
    const timeout = Number(env.BNP_TIMEOUT_MS);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigurationError(`BNP_TIMEOUT_MS must be a positive integer, got "${env.BNP_TIMEOUT_MS}"`);
    }
    config.timeout = timeout;
  }

  if (env.BNP_PARSE_POLICY) {
    if (!isParsePolicy(env.BNP_PARSE_POLICY)) {
      throw new ConfigurationError(
        `BNP_PARSE_POLICY must be "fail-fast" or "skip-and-continue", got "${env.BNP_PARSE_POLICY}"`
      );
    }
    config.parsePolicy = env.BNP_PARSE_POLICY;
  }

  return config;
}
