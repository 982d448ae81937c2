import fs from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import type { SourceConfig } from './dialects/source';
import { DEFAULT_BATCH_SIZE, type TargetConfig } from './dialects/target';
import { ConfigInvalidError } from './engine/errors';
import { parseLoadMode } from './engine/sink';
import { isIdentifier } from './query/criteria';

export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

const RawConfigSchema = z.object({
  source: z.object({
    file_path: z.string().min(1),
    delimiter: z.string().length(1, 'must be a single character'),
    header: z.boolean(),
  }),
  target: z.object({
    type: z.enum(['sqlite', 'postgresql']),
    database: z.string().min(1),
    table: z.string().refine(isIdentifier, 'must be a plain SQL identifier'),
    mode: z.string(),
    batch_size: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65_535).optional(),
    ssl: z.boolean().default(false),
  }),
});

type RawConfig = z.infer<typeof RawConfigSchema>;

export type AppConfig = Readonly<{
  source: Readonly<SourceConfig>;
  target: Readonly<TargetConfig>;
}>;

export type Environment = Record<string, string | undefined>;

const requireEnv = (env: Environment, name: string): string => {
  const value = env[name];
  if (value === undefined || value === '') {
    throw new ConfigInvalidError(name, 'environment variable is required for postgresql targets');
  }
  return value;
};

const buildTargetConfig = (raw: RawConfig['target'], env: Environment): TargetConfig => {
  const common = {
    table: raw.table,
    mode: parseLoadMode(raw.mode, 'load-config'),
    batchSize: raw.batch_size,
  };

  if (raw.type === 'sqlite') {
    return { type: 'sqlite', database: raw.database, ...common };
  }

  if (raw.host === undefined) {
    throw new ConfigInvalidError('target.host', 'required for postgresql targets');
  }
  if (raw.port === undefined) {
    throw new ConfigInvalidError('target.port', 'required for postgresql targets');
  }

  // Credentials never come from the config file
  return {
    type: 'postgresql',
    host: raw.host,
    port: raw.port,
    user: requireEnv(env, 'DB_USER'),
    password: requireEnv(env, 'DB_PASSWORD'),
    database: raw.database,
    ssl: raw.ssl,
    ...common,
  };
};

/**
 * Validate an already-parsed config document into immutable source/target configs.
 */
export const parseConfig = (document: unknown, env: Environment = process.env): AppConfig => {
  const result = RawConfigSchema.safeParse(document);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigInvalidError(issue.path.join('.') || '(root)', issue.message);
  }

  const raw = result.data;
  const source: SourceConfig = {
    type: 'delimited-file',
    filePath: raw.source.file_path,
    delimiter: raw.source.delimiter,
    header: raw.source.header,
  };

  return Object.freeze({
    source: Object.freeze(source),
    target: Object.freeze(buildTargetConfig(raw.target, env)),
  });
};

/**
 * Read and validate a YAML config file.
 */
export const loadConfig = (configPath: string = DEFAULT_CONFIG_PATH, env: Environment = process.env): AppConfig => {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigInvalidError(configPath, `cannot read config file: ${detail}`);
  }

  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigInvalidError(configPath, `malformed YAML: ${detail}`);
  }

  return parseConfig(document, env);
};
