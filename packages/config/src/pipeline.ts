/**
 * Typed pipeline and store configuration read from the environment
 */

import { z } from 'zod';

export const DEFAULT_UPLOAD_CHUNK_SIZE = 50_000;

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}

// Empty strings in .env mean "unset"
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const PipelineEnvSchema = z.object({
  DATASET_BASE_DIR: optionalString.transform((value) => value ?? 'data/raw'),
  UPLOAD_CHUNK_SIZE: optionalString.pipe(
    z.coerce.number().int().positive().default(DEFAULT_UPLOAD_CHUNK_SIZE)
  ),
  KNOWN_ISSUES_FILE: optionalString,
  MEASUREMENTS_TABLE: optionalString.transform((value) => value ?? 'fact_physiological_measurements'),
  SESSIONS_TABLE: optionalString.transform((value) => value ?? 'dim_sessions'),
  SIGNAL_TYPES_TABLE: optionalString.transform((value) => value ?? 'dim_signal_types'),
});

const StoreEnvSchema = z.object({
  SUPABASE_URL: z.string().trim().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().trim().min(1),
});

export interface TableNames {
  measurements: string;
  sessions: string;
  signalTypes: string;
}

export interface PipelineConfig {
  datasetBaseDir: string;
  chunkSize: number;
  knownIssuesFile?: string;
  tables: TableNames;
}

export interface StoreConfig {
  url: string;
  serviceRoleKey: string;
}

function toConfigError(label: string, error: z.ZodError): ConfigError {
  const keys = [...new Set(error.issues.map((issue) => String(issue.path[0] ?? '(root)')))];
  const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  return new ConfigError(`Invalid ${label} configuration: ${details}`, keys);
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const result = PipelineEnvSchema.safeParse(env);
  if (!result.success) {
    throw toConfigError('pipeline', result.error);
  }

  const parsed = result.data;
  return {
    datasetBaseDir: parsed.DATASET_BASE_DIR,
    chunkSize: parsed.UPLOAD_CHUNK_SIZE,
    knownIssuesFile: parsed.KNOWN_ISSUES_FILE,
    tables: {
      measurements: parsed.MEASUREMENTS_TABLE,
      sessions: parsed.SESSIONS_TABLE,
      signalTypes: parsed.SIGNAL_TYPES_TABLE,
    },
  };
}

export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const result = StoreEnvSchema.safeParse(env);
  if (!result.success) {
    throw toConfigError('store', result.error);
  }
  return {
    url: result.data.SUPABASE_URL,
    serviceRoleKey: result.data.SUPABASE_SERVICE_ROLE_KEY,
  };
}
