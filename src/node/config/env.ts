/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read
 * by the Node entry points, validates them, and exports typed results.
 */

import { z } from 'zod';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from '../../shared/engine/reversi/types';
import { isJestRuntime, parseFlag } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels used by this project).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Reversi evaluation mode schema.
 */
export const ReversiScoringSchema = z.enum(['mobility', 'mobility_outcome']);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of an additional JSON log file */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // SEARCH
  // ===================================================================

  /** Default search depth in plies */
  SEARCH_DEFAULT_PLY: z.coerce.number().int().min(0).default(2),

  /** Attach the logging observer to engines built from configuration */
  SEARCH_TRACE: z.string().optional().transform(parseFlag),

  // ===================================================================
  // REVERSI
  // ===================================================================

  /** Board edge length */
  REVERSI_BOARD_SIZE: z.coerce
    .number()
    .int()
    .min(MIN_BOARD_SIZE)
    .max(MAX_BOARD_SIZE)
    .refine((size) => size % 2 === 0, { message: 'Board size must be even' })
    .default(8),

  /** Position evaluation mode */
  REVERSI_SCORING: ReversiScoringSchema.default('mobility'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationIssue {
  path: string;
  message: string;
}

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: EnvValidationIssue[] };

/**
 * Validate a raw environment map against EnvSchema.
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Get the effective NODE_ENV. Under Jest this is always 'test', whatever
 * a .env file says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
