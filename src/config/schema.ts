import { z } from 'zod';

export const DEFAULTS = {
  logging: {
    level: 'warn' as const,
    pretty: false
  },
  treeCacheSize: 1024
};

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default(DEFAULTS.logging.level),
  pretty: z.boolean().default(DEFAULTS.logging.pretty)
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

const StringListSchema = z.array(z.string()).default([]);

export const FindOptionsSchema = z.object({
  args: StringListSchema,
  oldest: z.string().min(1).optional(),
  newest: z.string().min(1).optional(),
  snapshotIds: StringListSchema,
  host: z.string().optional(),
  tags: StringListSchema,
  paths: StringListSchema,
  ignoreCase: z.boolean().default(false),
  long: z.boolean().default(false),
  json: z.boolean().default(false),
  quiet: z.boolean().default(false),
  noLock: z.boolean().default(false),
  treeCacheSize: z.number().int().nonnegative().default(DEFAULTS.treeCacheSize)
});

export type FindOptions = z.infer<typeof FindOptionsSchema>;
export type FindOptionsInput = z.input<typeof FindOptionsSchema>;
