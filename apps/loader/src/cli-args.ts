/**
 * Command-line flags for the loader
 */

import { z } from 'zod';
import { SESSION_TYPES, type SessionType } from '@wearable/core';

export const USAGE = `Usage: loader --session-type <${SESSION_TYPES.join('|')}> (--subject <id> | --load-all) [options]

Options:
  --include-problematic  Load soft-excluded sessions (recorded with a quality note)
  --dry-run              Decode and chunk without writing to the store
  --data-dir <path>      Dataset base directory (overrides DATASET_BASE_DIR)
  --chunk-size <n>       Rows per upload batch (overrides UPLOAD_CHUNK_SIZE)
  --help                 Show this message`;

export interface LoaderOptions {
  sessionType: SessionType;
  target: { kind: 'subject'; subjectId: string } | { kind: 'all' };
  includeProblematic: boolean;
  dryRun: boolean;
  dataDir?: string;
  chunkSize?: number;
}

export type ParsedArgs =
  | { ok: true; options: LoaderOptions }
  | { ok: false; help: boolean; error?: string };

const BOOLEAN_FLAGS = new Set(['load-all', 'include-problematic', 'dry-run', 'help']);
const VALUE_FLAGS = new Set(['session-type', 'subject', 'data-dir', 'chunk-size']);

const FlagsSchema = z
  .object({
    'session-type': z.enum(SESSION_TYPES, {
      errorMap: () => ({ message: `--session-type must be one of ${SESSION_TYPES.join(', ')}` }),
    }),
    subject: z.string().trim().min(1, '--subject must not be empty').optional(),
    'load-all': z.boolean().default(false),
    'include-problematic': z.boolean().default(false),
    'dry-run': z.boolean().default(false),
    'data-dir': z.string().trim().min(1, '--data-dir must not be empty').optional(),
    'chunk-size': z.coerce
      .number({ invalid_type_error: '--chunk-size must be a number' })
      .int('--chunk-size must be an integer')
      .positive('--chunk-size must be positive')
      .optional(),
  })
  .refine((flags) => Boolean(flags.subject) !== flags['load-all'], {
    message: 'Specify exactly one of --subject or --load-all',
  });

export function parseLoaderArgs(argv: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      return { ok: false, help: false, error: `Unexpected argument: ${arg}` };
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);
    if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = true;
    } else if (VALUE_FLAGS.has(name)) {
      const value = inline ?? argv[i + 1];
      if (value === undefined || (inline === undefined && value.startsWith('--'))) {
        return { ok: false, help: false, error: `Missing value for --${name}` };
      }
      if (inline === undefined) i++;
      flags[name] = value;
    } else {
      return { ok: false, help: false, error: `Unknown option: --${name}` };
    }
  }

  if (flags.help === true) {
    return { ok: false, help: true };
  }

  const result = FlagsSchema.safeParse(flags);
  if (!result.success) {
    const issue = result.error.issues[0];
    const error =
      issue.path[0] === 'session-type' && flags['session-type'] === undefined
        ? '--session-type is required'
        : issue.message;
    return { ok: false, help: false, error };
  }

  const parsed = result.data;
  return {
    ok: true,
    options: {
      sessionType: parsed['session-type'],
      target: parsed.subject ? { kind: 'subject', subjectId: parsed.subject } : { kind: 'all' },
      includeProblematic: parsed['include-problematic'],
      dryRun: parsed['dry-run'],
      dataDir: parsed['data-dir'],
      chunkSize: parsed['chunk-size'],
    },
  };
}
