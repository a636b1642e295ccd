import dotenv from 'dotenv';
import type { NamecheapConfig } from './namecheap/client';

// Load environment variables
dotenv.config();

/**
 * Centralized application configuration
 */

// Server config
export const PORT = parseInt(process.env.PORT || '3000', 10);
export const NODE_ENV = process.env.NODE_ENV || 'development';

// Namecheap transport
export const NAMECHEAP_TIMEOUT_MS = parseInt(process.env.NAMECHEAP_TIMEOUT_MS || '10000', 10);

const CREDENTIAL_VARS = [
  ['apiUser', 'NAMECHEAP_API_USER'],
  ['apiKey', 'NAMECHEAP_API_KEY'],
  ['username', 'NAMECHEAP_USERNAME'],
  ['clientIp', 'NAMECHEAP_CLIENT_IP'],
] as const;

/**
 * Missing or invalid configuration
 */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration errors:\n${problems.join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * "true", "yes" and "1" (any case) enable the sandbox; unset means sandbox
 */
export function parseSandboxFlag(value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') {
    return true;
  }
  return ['true', 'yes', '1'].includes(value.trim().toLowerCase());
}

/**
 * Read Namecheap credentials from the environment.
 * Every missing variable is reported at once.
 */
export function loadNamecheapConfig(env: NodeJS.ProcessEnv = process.env): NamecheapConfig {
  const problems = CREDENTIAL_VARS
    .filter(([, name]) => !env[name]?.trim())
    .map(([key, name]) => `${name} is required (${key})`);

  const timeoutMs = parseInt(env.NAMECHEAP_TIMEOUT_MS || String(NAMECHEAP_TIMEOUT_MS), 10);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    problems.push('NAMECHEAP_TIMEOUT_MS must be a positive integer');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    apiUser: (env.NAMECHEAP_API_USER ?? '').trim(),
    apiKey: (env.NAMECHEAP_API_KEY ?? '').trim(),
    username: (env.NAMECHEAP_USERNAME ?? '').trim(),
    clientIp: (env.NAMECHEAP_CLIENT_IP ?? '').trim(),
    sandbox: parseSandboxFlag(env.NAMECHEAP_USE_SANDBOX),
    baseUrl: env.NAMECHEAP_BASE_URL || undefined,
    timeoutMs,
  };
}

/**
 * Validate configuration on startup
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): void {
  const errors: string[] = [];

  try {
    loadNamecheapConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    errors.push(...error.problems);
  }

  const port = parseInt(env.PORT || '3000', 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    errors.push('PORT must be an integer between 1 and 65535');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}
