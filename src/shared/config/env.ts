import os from 'node:os';

import { z } from 'zod';

const DEFAULT_MAX_TEMP_BYTES = 2 * 1024 * 1024 * 1024;

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: logLevelSchema.optional(),
  SPRITEBAKE_TMP_DIR: z.string().min(1).optional(),
  SPRITEBAKE_MAX_TEMP_BYTES: z.coerce.number().int().positive().optional(),
  SPRITEBAKE_WEBP_QUALITY: z.coerce.number().int().min(0).max(100).optional(),
});

export interface SpritebakeConfig {
  readonly logLevel: LogLevel;
  readonly tempDir: string;
  readonly maxTempBytes: number;
  readonly webpQuality: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SpritebakeConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid spritebake environment configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'test' ? 'silent' : 'info'),
    tempDir: values.SPRITEBAKE_TMP_DIR ?? os.tmpdir(),
    maxTempBytes: values.SPRITEBAKE_MAX_TEMP_BYTES ?? DEFAULT_MAX_TEMP_BYTES,
    webpQuality: values.SPRITEBAKE_WEBP_QUALITY ?? 100,
  };
}
