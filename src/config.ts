/**
 * Runtime configuration, validated from environment variables.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const EngineConfigSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DEPOT_STORAGE_DIR: z.string().min(1).default('data/depots'),
});

export interface EngineConfig {
  readonly logLevel: LogLevel;
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly depotStorageDir: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read the engine configuration from an environment map.
 * Unknown variables are ignored; invalid known ones throw ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    NODE_ENV: env.NODE_ENV || undefined,
    DEPOT_STORAGE_DIR: env.DEPOT_STORAGE_DIR || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid engine configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    nodeEnv: parsed.data.NODE_ENV,
    depotStorageDir: parsed.data.DEPOT_STORAGE_DIR,
  };
}
