import { z } from 'zod';
import { ErrorCode } from '../types/enums.js';
import { ConfigError } from '../types/error.js';
import {
  FindOptionsSchema,
  LoggingConfigSchema,
  type FindOptions,
  type LoggingConfig
} from './schema.js';

export const ENV_REPOSITORY = 'SNAPFIND_REPOSITORY';
export const ENV_LOG_LEVEL = 'SNAPFIND_LOG_LEVEL';
export const ENV_LOG_PRETTY = 'SNAPFIND_LOG_PRETTY';

function toConfigError(what: string, err: z.ZodError): ConfigError {
  const issues = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new ConfigError(ErrorCode.INVALID_OPTIONS, `invalid ${what}: ${issues.join('; ')}`, { issues });
}

// Splits comma-separated tag lists and drops blanks, so `--tag a,b --tag c` means a, b and c.
export function splitTags(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function loadFindOptions(raw: unknown): FindOptions {
  const parsed = FindOptionsSchema.safeParse(raw);
  if (!parsed.success) throw toConfigError('find options', parsed.error);
  return { ...parsed.data, tags: splitTags(parsed.data.tags) };
}

const EnvFlagSchema = z
  .enum(['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes' || value === 'on');

// Explicit settings win over the environment.
export function loadLoggingConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const base = typeof raw === 'object' && raw !== null ? raw : {};
  const fromEnv: Record<string, unknown> = {};
  if (env[ENV_LOG_LEVEL]) fromEnv.level = env[ENV_LOG_LEVEL];
  const pretty = env[ENV_LOG_PRETTY];
  if (pretty) {
    const flag = EnvFlagSchema.safeParse(pretty.toLowerCase());
    if (!flag.success) {
      throw new ConfigError(ErrorCode.INVALID_OPTIONS, `invalid ${ENV_LOG_PRETTY}: ${JSON.stringify(pretty)}`, {
        value: pretty
      });
    }
    fromEnv.pretty = flag.data;
  }
  const parsed = LoggingConfigSchema.safeParse({ ...fromEnv, ...base });
  if (!parsed.success) throw toConfigError('logging config', parsed.error);
  return parsed.data;
}
