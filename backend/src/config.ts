import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_DATASET_DIR = 'dataset/csv';

const logEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

const envSchema = logEnvSchema.extend({
  PGHOST: z.string().trim().min(1).default('localhost'),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: z.string().trim().min(1).default('pcbuilder'),
  PGUSER: z.string().trim().min(1).default('postgres'),
  PGPASSWORD: z.string().default(''),
});

export type DatabaseEnv = z.infer<typeof envSchema>;

export type ImportConfig = {
  connectionString: string;
  datasetDir: string;
  strict: boolean;
  logLevel: LogLevel;
};

export type ImportArgs = {
  dsn?: string;
  datasetDir?: string;
  strict?: boolean;
};

// Blank variables count as unset so the defaults apply.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function parseDatabaseEnv(env: NodeJS.ProcessEnv): DatabaseEnv {
  return envSchema.parse(withoutBlanks(env));
}

export function buildConnectionString(env: DatabaseEnv): string {
  const user = encodeURIComponent(env.PGUSER);
  const password = encodeURIComponent(env.PGPASSWORD);
  return `postgresql://${user}:${password}@${env.PGHOST}:${env.PGPORT}/${env.PGDATABASE}`;
}

// The PG* variables are only read when no explicit dsn is given.
export function resolveImportConfig(args: ImportArgs, env: NodeJS.ProcessEnv): ImportConfig {
  const dsn = args.dsn?.trim();
  const { LOG_LEVEL } = logEnvSchema.parse(withoutBlanks(env));
  return {
    connectionString: dsn ? dsn : buildConnectionString(parseDatabaseEnv(env)),
    datasetDir: path.resolve(args.datasetDir ?? DEFAULT_DATASET_DIR),
    strict: args.strict ?? false,
    logLevel: LOG_LEVEL,
  };
}
