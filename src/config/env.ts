import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  EXIFTOOL_TASK_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1000)
        .max(600000)
        .describe('EXIFTOOL_TASK_TIMEOUT_MS must be within 1000-600000ms')
    ),
  EXIFTOOL_MAX_PROCS: z
    .string()
    .default('1')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(16).describe('EXIFTOOL_MAX_PROCS must be within 1-16')),
  // Rule file used by `export` when --exif is not passed
  PHOTO_TOOLS_EXIF_RULES: z
    .string()
    .min(1)
    .optional()
    .describe('Path to the default EXIF override rules file')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development'
};
