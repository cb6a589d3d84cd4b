/**
 * Startup configuration, read once from the environment.
 *
 * A `.env` file in the working directory (or the file named by
 * SELENIUM_MCP_ENV_FILE) is loaded first; variables already set in the
 * environment win.
 */

import { resolve } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './log.js';

export interface ServerConfig {
  logLevel: LogLevel;
  unbuffered: boolean;
  defaultTimeoutMs: number;
  pageLoadTimeoutMs: number;
  screenshotMaxDimension: number;
  /** Selenium Grid endpoint; local drivers are started when unset. */
  remoteUrl?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off', ''].includes(v), {
    message: 'expected a boolean flag (1/0, true/false, yes/no, on/off)',
  })
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const millis = z.coerce.number().int().positive();

const EnvSchema = z.object({
  SELENIUM_MCP_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  SELENIUM_MCP_UNBUFFERED: flag.default('false'),
  SELENIUM_MCP_DEFAULT_TIMEOUT_MS: millis.default(10_000),
  SELENIUM_MCP_PAGE_LOAD_TIMEOUT_MS: millis.default(10_000),
  SELENIUM_MCP_SCREENSHOT_MAX_DIMENSION: z.coerce.number().int().min(16).default(2000),
  SELENIUM_REMOTE_URL: z.string().url().optional(),
});

export const DEFAULT_CONFIG: ServerConfig = {
  logLevel: 'info',
  unbuffered: false,
  defaultTimeoutMs: 10_000,
  pageLoadTimeoutMs: 10_000,
  screenshotMaxDimension: 2000,
};

/**
 * Load `.env` into process.env. Missing files are not an error.
 */
export function loadEnvFile(): void {
  const path = process.env.SELENIUM_MCP_ENV_FILE ?? resolve(process.cwd(), '.env');
  dotenv.config({ path });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty strings mean "unset" for every variable.
  const present = Object.fromEntries(
    Object.keys(EnvSchema.shape).flatMap((key): Array<[string, string]> => {
      const value = env[key];
      return value === undefined || value === '' ? [] : [[key, value]];
    }),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.SELENIUM_MCP_LOG_LEVEL,
    unbuffered: values.SELENIUM_MCP_UNBUFFERED,
    defaultTimeoutMs: values.SELENIUM_MCP_DEFAULT_TIMEOUT_MS,
    pageLoadTimeoutMs: values.SELENIUM_MCP_PAGE_LOAD_TIMEOUT_MS,
    screenshotMaxDimension: values.SELENIUM_MCP_SCREENSHOT_MAX_DIMENSION,
    ...(values.SELENIUM_REMOTE_URL ? { remoteUrl: values.SELENIUM_REMOTE_URL } : {}),
  };
}
