import path from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = 'json' | 'pretty';
export type StoreDriver = 'mongo' | 'memory';

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
  readonly store: {
    readonly driver: StoreDriver;
    /** Memory driver only; unset keeps state in process memory alone. */
    readonly snapshotPath?: string;
    readonly snapshotFlushMs: number;
  };
  readonly mongo: {
    readonly uri: string;
    readonly dbName: string;
    readonly timeoutMs: number;
  };
  readonly enrichment: {
    readonly enabled: boolean;
    readonly collection: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

const trimmed = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : fallback));

const positiveInt = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v, ctx) => {
      if (!v) return fallback;
      const n = Number(v);
      if (!Number.isInteger(n) || n <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be a positive integer (got: ${v})` });
        return z.NEVER;
      }
      return n;
    });

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v, ctx) => {
      if (!v) return fallback;
      if (['1', 'true', 'yes', 'on'].includes(v)) return true;
      if (['0', 'false', 'no', 'off'].includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be a boolean (got: ${v})` });
      return z.NEVER;
    });

const envSchema = z.object({
  PORT: positiveInt(8002).refine((p) => p <= 65535, 'must be a port between 1 and 65535'),
  HOST: trimmed('0.0.0.0'),
  CORS_ORIGINS: trimmed('http://localhost:5173').transform((v) =>
    v
      .split(',')
      .map((o) => o.trim())
      .filter((o) => o.length > 0)
  ),
  TRACKING_STORE: trimmed('mongo').transform((v) => v.toLowerCase()).pipe(z.enum(['mongo', 'memory'])),
  TRACKING_SNAPSHOT_PATH: z.string().trim().optional(),
  TRACKING_SNAPSHOT_FLUSH_MS: positiveInt(2_000),
  MONGODB_URI: trimmed('mongodb://localhost:27017/'),
  MONGODB_NAME: trimmed('edu-connect'),
  MONGODB_TIMEOUT_MS: positiveInt(5_000),
  ENRICHMENT_ENABLED: flag(true),
  LESSON_COLLECTION: trimmed('lessons'),
  LOG_LEVEL: trimmed('info').transform((v) => v.toLowerCase()).pipe(z.enum(LOG_LEVELS)),
  LOG_FORMAT: trimmed('json').transform((v) => v.toLowerCase()).pipe(z.enum(['json', 'pretty']))
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigins: e.CORS_ORIGINS,
    store: {
      driver: e.TRACKING_STORE,
      snapshotPath: e.TRACKING_SNAPSHOT_PATH ? path.resolve(process.cwd(), e.TRACKING_SNAPSHOT_PATH) : undefined,
      snapshotFlushMs: e.TRACKING_SNAPSHOT_FLUSH_MS
    },
    mongo: {
      uri: e.MONGODB_URI,
      dbName: e.MONGODB_NAME,
      timeoutMs: e.MONGODB_TIMEOUT_MS
    },
    enrichment: {
      enabled: e.ENRICHMENT_ENABLED,
      collection: e.LESSON_COLLECTION
    },
    logging: {
      level: e.LOG_LEVEL,
      format: e.LOG_FORMAT
    }
  };
}
