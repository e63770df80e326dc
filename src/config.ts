/**
 * Centralized Configuration Module
 *
 * This module provides a validated configuration object for the Golf
 * Practice Log. Values come from environment variables, with a `.env` file
 * in the working directory loaded first when present.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.database.path);
 *
 *   // Stricter checks before serving in production (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/** Default cap on uploaded CSV size: 5 MiB */
const DEFAULT_MAX_IMPORT_BYTES = 5 * 1024 * 1024;

/**
 * Zod schema for validating environment configuration.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // SQLite database file (':memory:' for a throwaway database)
  database: z.object({
    path: z.string().min(1).default('golf-practice.db'),
  }),

  // CSV/JSON transfer limits
  transfer: z.object({
    maxImportBytes: z.number().int().positive().default(DEFAULT_MAX_IMPORT_BYTES),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/** Blank variables count as unset so that `PORT=` falls back to the default. */
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema.optional()
  );

/**
 * The environment variables read at startup, before they are folded into
 * the nested {@link Config}.
 */
const envSchema = z.object({
  PORT: optionalEnv(z.coerce.number()),
  HOST: optionalEnv(z.string()),
  NODE_ENV: optionalEnv(z.string()),
  DATABASE_PATH: optionalEnv(z.string()),
  MAX_IMPORT_BYTES: optionalEnv(z.coerce.number()),
  ALLOWED_ORIGINS: optionalEnv(
    z.string().transform((list) =>
      list
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    )
  ),
});

export type ConfigResult =
  | { success: true; data: Config }
  | { success: false; error: z.ZodError };

/**
 * Builds the configuration from a set of environment variables.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ PORT: '8080', DATABASE_PATH: ':memory:' });
 * if (result.success) {
 *   result.data.server.port; // 8080
 * }
 * ```
 */
export function loadConfig(env: Record<string, string | undefined>): ConfigResult {
  const vars = envSchema.safeParse(env);
  if (!vars.success) {
    return vars;
  }

  return configSchema.safeParse({
    server: { port: vars.data.PORT, host: vars.data.HOST, nodeEnv: vars.data.NODE_ENV },
    database: { path: vars.data.DATABASE_PATH },
    transfer: { maxImportBytes: vars.data.MAX_IMPORT_BYTES },
    cors: { allowedOrigins: vars.data.ALLOWED_ORIGINS },
  });
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates the configuration for the environment it runs in.
 *
 * In production the database must be a file: an in-memory database would
 * lose every logged session on restart.
 *
 * @param target - Configuration to check (defaults to the loaded config)
 * @throws {ConfigValidationError} If the configuration is unusable
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error(error.message);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(target: Config = config): void {
  const invalidVars: { name: string; reason: string }[] = [];

  if (target.server.nodeEnv === 'production') {
    if (target.database.path === ':memory:') {
      invalidVars.push({
        name: 'DATABASE_PATH',
        reason: 'An in-memory database cannot be used in production',
      });
    }

    if (target.cors.allowedOrigins.length === 0) {
      invalidVars.push({
        name: 'ALLOWED_ORIGINS',
        reason: 'At least one allowed origin is required in production',
      });
    }
  }

  if (invalidVars.length > 0) {
    const descriptions = invalidVars.map((v) => `  ${v.name}: ${v.reason}`).join('\n');
    throw new ConfigValidationError(`Invalid configuration:\n${descriptions}`, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

// Parsed once, when this module is first imported.
const parseResult = loadConfig(process.env);

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

export const config: Config = parseResult.data;

/**
 * Path of the SQLite database file.
 */
export function getDatabasePath(): string {
  return config.database.path;
}

/** True when NODE_ENV is production. */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export default config;
