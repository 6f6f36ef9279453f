/**
 * Alumni Stats ETL Orchestrator
 * =============================
 * EXTRACT → TRANSFORM → LOAD, once per invocation.
 *
 * States: CONFIGURED → EXTRACTED → TRANSFORMED → LOADING → DONE
 * ABORTED is reachable only from CONFIGURED, when extraction fails. Load failures are
 * recorded per table and never abort the run.
 */

import { aggregateAll } from '../transforms/aggregate-alumni';
import { AGGREGATE_TABLE_NAMES, type AggregateTableName, type RawRecord } from '../transforms/alumni-schema';
import { loadConfig, printConfig, type AppConfig } from './config-loader';
import {
  ConnectionError,
  ExtractionError,
  describeCause,
  formatError,
  isPipelineError,
} from './error-handler';
import type { ProgressReporter } from './progress-reporter';
import type { SourceClient } from './source-client';
import { loadAll, type TableLoadFailure, type WarehouseLoader } from './warehouse-loader';

export type PipelineState = 'CONFIGURED' | 'EXTRACTED' | 'TRANSFORMED' | 'LOADING' | 'DONE' | 'ABORTED';

export type PipelineResult =
  | { status: 'aborted'; error: ExtractionError }
  | { status: 'partial'; loaded: AggregateTableName[]; failures: TableLoadFailure[] }
  | { status: 'succeeded'; loaded: AggregateTableName[]; dryRun: boolean };

export interface PipelineDependencies {
  source: SourceClient;
  loader: WarehouseLoader;
  reporter: ProgressReporter;
  dryRun?: boolean;
  onStateChange?: (state: PipelineState) => void;
}

export interface ClientFactories {
  createSource(config: AppConfig['source']): SourceClient;
  createLoader(config: AppConfig['warehouse']): WarehouseLoader;
}

export const EXIT_CODES = {
  succeeded: 0,
  aborted: 1,
  partial: 2,
  preflight: 1,
} as const;

const TOTAL_PHASES = 3;
const PREVIEW_ROWS = 5;

export function exitCodeFor(result: PipelineResult): number {
  return EXIT_CODES[result.status];
}

/**
 * Run one full pipeline attempt with already-constructed clients
 */
export async function runPipeline(deps: PipelineDependencies): Promise<PipelineResult> {
  const { source, loader, reporter, dryRun = false } = deps;
  const enter = (state: PipelineState): void => {
    reporter.logDebug(`State → ${state}`);
    deps.onStateChange?.(state);
  };

  reporter.logRunStart('alumni-stats', dryRun);
  enter('CONFIGURED');

  // -----------------------------------------------------------------
  // EXTRACT
  // -----------------------------------------------------------------
  reporter.logPhase('EXTRACT', 1, TOTAL_PHASES);
  reporter.logInfo('Fetching all records from the source table...');

  let phaseStart = reporter.elapsedSeconds();
  let records: RawRecord[];
  try {
    records = await source.fetchAll();
  } catch (error) {
    const extractionError = error instanceof ExtractionError
      ? error
      : new ExtractionError(`Failed to extract records: ${describeCause(error)}`, {}, { cause: error });
    reporter.logStepFailure('Extraction', extractionError,
      extractionError.cause === undefined ? undefined : describeCause(extractionError.cause));
    enter('ABORTED');
    reporter.logRunAborted(extractionError);
    return { status: 'aborted', error: extractionError };
  }
  reporter.logStepComplete('Extracted raw records', records.length);
  reporter.logPhaseComplete('EXTRACT', reporter.elapsedSeconds() - phaseStart);
  enter('EXTRACTED');

  // -----------------------------------------------------------------
  // TRANSFORM
  // -----------------------------------------------------------------
  reporter.logPhase('TRANSFORM', 2, TOTAL_PHASES);
  reporter.logInfo('Anonymizing and aggregating data...');

  phaseStart = reporter.elapsedSeconds();
  const tables = aggregateAll(records);
  for (const tableName of AGGREGATE_TABLE_NAMES) {
    reporter.logStepComplete(`Processed ${tableName} aggregates`, tables[tableName].length);
  }
  reporter.logPhaseComplete('TRANSFORM', reporter.elapsedSeconds() - phaseStart);
  enter('TRANSFORMED');

  // -----------------------------------------------------------------
  // LOAD
  // -----------------------------------------------------------------
  reporter.logPhase('LOAD', 3, TOTAL_PHASES);
  enter('LOADING');

  if (dryRun) {
    reporter.logWarning('Dry run: skipping warehouse writes');
    for (const tableName of AGGREGATE_TABLE_NAMES) {
      const rows = tables[tableName];
      reporter.logInfo(`${tableName}: ${rows.length} rows`);
      for (const row of rows.slice(0, PREVIEW_ROWS)) {
        reporter.logInfo(`  ${JSON.stringify(row)}`);
      }
    }
    enter('DONE');
    reporter.logRunComplete(0, 0);
    return { status: 'succeeded', loaded: [], dryRun: true };
  }

  phaseStart = reporter.elapsedSeconds();
  const { loaded, failures } = await loadAll(loader, tables, reporter);
  reporter.logPhaseComplete('LOAD', reporter.elapsedSeconds() - phaseStart);
  enter('DONE');
  reporter.logRunComplete(loaded.length, failures.length);

  if (failures.length > 0) {
    return { status: 'partial', loaded, failures };
  }
  return { status: 'succeeded', loaded, dryRun: false };
}

/**
 * Build both clients once. Any construction failure is a ConnectionError.
 */
export function connectClients(
  config: AppConfig,
  factories: ClientFactories,
  reporter: ProgressReporter
): { source: SourceClient; loader: WarehouseLoader } {
  try {
    reporter.logInfo('Connecting to the source...');
    const source = factories.createSource(config.source);
    reporter.logInfo('Connecting to the warehouse...');
    const loader = factories.createLoader(config.warehouse);
    reporter.logInfo('Connections initialized.');
    return { source, loader };
  } catch (error) {
    if (error instanceof ConnectionError) {
      throw error;
    }
    throw new ConnectionError(`Failed to initialize clients: ${describeCause(error)}`, {}, { cause: error });
  }
}

export interface RunOptions {
  factories: ClientFactories;
  reporter: ProgressReporter;
  dryRun?: boolean;
  printConfig?: boolean;
  writeError?: (text: string) => void;
}

/**
 * Pre-flight (config, clients) plus one pipeline run. Resolves to the process exit code.
 * Missing configuration returns before any client is constructed.
 */
export async function runFromEnvironment(env: NodeJS.ProcessEnv, options: RunOptions): Promise<number> {
  const { factories, reporter } = options;
  const writeError = options.writeError ?? ((text: string) => console.error(text));

  let clients: { source: SourceClient; loader: WarehouseLoader };
  try {
    const config = loadConfig(env);
    reporter.setDebugMode(config.debugMode);
    if (options.printConfig) {
      printConfig(config);
    }
    clients = connectClients(config, factories, reporter);
  } catch (error) {
    if (!isPipelineError(error)) {
      throw error;
    }
    writeError(formatError(error));
    return EXIT_CODES.preflight;
  }

  const result = await runPipeline({
    ...clients,
    reporter,
    dryRun: options.dryRun,
  });

  if (result.status === 'aborted') {
    writeError(formatError(result.error));
  }

  return exitCodeFor(result);
}
