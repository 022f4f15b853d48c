/**
 * Loader command: wires configuration, dataset, classifier and store, then runs
 * one subject or a whole session type.
 */

import { readFileSync } from 'fs';
import {
  createLogger,
  loadPipelineConfig,
  loadStoreConfig,
  type Logger,
  type PipelineConfig,
} from '@wearable/config';
import {
  createQualityClassifier,
  listSubjects,
  locateDatasetRoot,
  parseKnownIssueTable,
  type QualityClassifier,
} from '@wearable/core';
import { createMemoryStore, createSupabaseClient, createSupabaseStore, type AnalyticsStore } from '@wearable/db';
import { loadSubjectSession, runSessionBatch, type BatchReport, type IngestDeps } from '@wearable/ingest';
import { parseLoaderArgs, USAGE, type LoaderOptions } from './cli-args.js';

export interface LoaderDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Terminal output (usage text and the run summary) */
  print?: (line: string) => void;
  /** Store for non-dry runs; defaults to Supabase from SUPABASE_* settings */
  createStore?: (config: PipelineConfig, env: NodeJS.ProcessEnv, logger: Logger) => AnalyticsStore;
}

function defaultStore(config: PipelineConfig, env: NodeJS.ProcessEnv, logger: Logger): AnalyticsStore {
  return createSupabaseStore(createSupabaseClient(loadStoreConfig(env)), config.tables, logger);
}

function loadClassifier(config: PipelineConfig): QualityClassifier {
  if (!config.knownIssuesFile) {
    return createQualityClassifier();
  }
  const raw: unknown = JSON.parse(readFileSync(config.knownIssuesFile, 'utf-8'));
  return createQualityClassifier(parseKnownIssueTable(raw));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatSummary(report: BatchReport): string[] {
  const lines = [
    '='.repeat(60),
    `Summary for ${report.sessionType}`,
    `  Loaded:  ${report.loaded}`,
    `  Skipped: ${report.skipped}`,
    `  Failed:  ${report.failed}`,
  ];
  for (const outcome of report.outcomes) {
    if (outcome.status === 'failed') {
      lines.push(`    ✗ ${outcome.subjectId}: ${outcome.error}`);
    }
  }
  lines.push('='.repeat(60));
  return lines;
}

interface Prepared {
  ingest: IngestDeps;
  subjects: string[];
}

function prepare(options: LoaderOptions, deps: Required<LoaderDeps>): Prepared {
  const { env, logger } = deps;
  const config = loadPipelineConfig(env);
  const datasetRoot = locateDatasetRoot(options.dataDir ?? config.datasetBaseDir);
  logger.info({ event: 'loader.dataset', datasetRoot }, `📁 Dataset: ${datasetRoot}`);

  const store = options.dryRun ? createMemoryStore() : deps.createStore(config, env, logger);
  const ingest: IngestDeps = {
    datasetRoot,
    classifier: loadClassifier(config),
    store,
    chunkSize: options.chunkSize ?? config.chunkSize,
    includeProblematic: options.includeProblematic,
    logger,
  };

  const subjects =
    options.target.kind === 'subject' ? [options.target.subjectId] : listSubjects(datasetRoot, options.sessionType);
  return { ingest, subjects };
}

/**
 * Run the loader for the given arguments and return the process exit code
 */
export async function runLoader(argv: readonly string[], deps: LoaderDeps = {}): Promise<number> {
  const resolved: Required<LoaderDeps> = {
    env: deps.env ?? process.env,
    logger: deps.logger ?? createLogger('loader'),
    print: deps.print ?? ((line) => console.log(line)),
    createStore: deps.createStore ?? defaultStore,
  };
  const { logger, print } = resolved;

  const parsed = parseLoaderArgs(argv);
  if (!parsed.ok) {
    if (parsed.error) print(`❌ ${parsed.error}`);
    print(USAGE);
    return parsed.help ? 0 : 1;
  }
  const { options } = parsed;

  let prepared: Prepared;
  try {
    prepared = prepare(options, resolved);
  } catch (error) {
    logger.error({ event: 'loader.setup.failed', error: errorMessage(error) }, `❌ ${errorMessage(error)}`);
    return 1;
  }
  const { ingest, subjects } = prepared;

  if (options.dryRun) {
    logger.info({ event: 'loader.dry_run' }, '🧪 Dry run: rows are kept in memory only');
  }

  if (options.target.kind === 'subject') {
    try {
      const outcome = await loadSubjectSession(options.target.subjectId, options.sessionType, ingest);
      print(
        outcome.status === 'loaded'
          ? `✅ ${outcome.sessionId}: ${outcome.recordCount} measurements in ${outcome.chunkCount} batch(es)`
          : `⏭️  ${outcome.sessionId}: skipped (${outcome.reason})`
      );
      return 0;
    } catch (error) {
      logger.error(
        { event: 'ingest.session.failed', subjectId: options.target.subjectId, error: errorMessage(error) },
        `❌ ${errorMessage(error)}`
      );
      return 1;
    }
  }

  const report = await runSessionBatch(subjects, options.sessionType, ingest);
  for (const line of formatSummary(report)) {
    print(line);
  }
  return report.failed > 0 ? 1 : 0;
}
