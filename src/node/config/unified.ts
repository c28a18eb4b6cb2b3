/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all Node-side code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import type { ReversiScoring } from '../../shared/engine/reversi/types';
import { isTestEnvironment } from '../../shared/utils/envFlags';
import {
  getEffectiveNodeEnv,
  parseEnv,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
  type RawEnv,
} from './env';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  search: {
    defaultPly: number;
    trace: boolean;
  };
  reversi: {
    boardSize: number;
    scoring: ReversiScoring;
  };
}

/**
 * Assemble the application config from an already validated environment.
 */
export function buildConfig(env: RawEnv): Readonly<AppConfig> {
  const nodeEnv = getEffectiveNodeEnv(env);

  return Object.freeze({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logging: Object.freeze({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    }),
    search: Object.freeze({
      defaultPly: env.SEARCH_DEFAULT_PLY,
      trace: env.SEARCH_TRACE,
    }),
    reversi: Object.freeze({
      boardSize: env.REVERSI_BOARD_SIZE,
      scoring: env.REVERSI_SCORING,
    }),
  });
}

/**
 * Validate `env` and build the config, throwing an Error that lists
 * every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const envResult = parseEnv(env);
  if (!envResult.success) {
    const details = envResult.errors
      .map((error) => `  - ${error.path || 'root'}: ${error.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }
  return buildConfig(envResult.data);
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so a local .env cannot override test settings.
if (!isTestEnvironment()) {
  dotenv.config();
}

export const config = loadConfig();
