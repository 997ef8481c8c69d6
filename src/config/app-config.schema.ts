import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_MATTERMOST_TIMEOUT_MS = 8000;
const DEFAULT_MAX_CHANNEL_MEMBERS = 1000;
const DEFAULT_COMMAND_TRIGGER = 'whentochat';
const COMMAND_TRIGGER_PATTERN = /^[a-z0-9_-]+$/;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  MATTERMOST_ENABLED: booleanSchema.default(false),
  MATTERMOST_URL: z.url().optional(),
  MATTERMOST_BOT_TOKEN: optionalNonEmptyStringSchema,
  MATTERMOST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MATTERMOST_TIMEOUT_MS),
  MATTERMOST_COMMAND_TOKEN: optionalNonEmptyStringSchema,
  MATTERMOST_TEAM_ID: optionalNonEmptyStringSchema,
  COMMAND_TRIGGER: z
    .string()
    .trim()
    .toLowerCase()
    .regex(COMMAND_TRIGGER_PATTERN)
    .default(DEFAULT_COMMAND_TRIGGER),
  COMMAND_REGISTRATION_ENABLED: booleanSchema.default(false),
  COMMAND_CALLBACK_URL: z.url().optional(),
  MAX_CHANNEL_MEMBERS: z.coerce.number().int().positive().default(DEFAULT_MAX_CHANNEL_MEMBERS),
  METRICS_ENABLED: booleanSchema.default(true),
});

export type ParsedEnv = z.infer<typeof envSchema>;
