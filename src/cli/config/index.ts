/**
 * Unified CLI Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that the rest of the host reads.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `index.ts` (this file) assembles the typed config
 */

import dotenv from 'dotenv';
import { RawEnv, getEffectiveNodeEnv, parseEnv } from './env';

// Skip in test mode so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export interface CliConfig {
  nodeEnv: RawEnv['NODE_ENV'];
  isTest: boolean;
  logging: {
    level: RawEnv['LOG_LEVEL'];
    format: RawEnv['LOG_FORMAT'];
    file?: string;
  };
  saves: {
    directory: string;
  };
  puzzle: {
    defaultVariant: string;
    solverMaxStates: number;
  };
}

/**
 * Build the config from an already-validated environment.
 */
export function buildConfig(env: RawEnv): CliConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  return Object.freeze({
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: Object.freeze({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    }),
    saves: Object.freeze({ directory: env.KLOTSKI_SAVE_DIR }),
    puzzle: Object.freeze({
      defaultVariant: env.KLOTSKI_DEFAULT_VARIANT,
      solverMaxStates: env.KLOTSKI_SOLVER_MAX_STATES,
    }),
  });
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

export const config: CliConfig = buildConfig(envResult.data);

export * from './env';
