/**
 * BigQuery warehouse loader
 *
 * Every load replaces the destination table (WRITE_TRUNCATE) and creates it when absent.
 * Rows are streamed as newline-delimited JSON into a load job; `load` resolves once the
 * job has completed.
 */

import { BigQuery, type BigQueryOptions } from '@google-cloud/bigquery';
import type { Writable } from 'stream';
import {
  AGGREGATE_TABLE_NAMES,
  TABLE_SCHEMAS,
  type AggregateRow,
  type AggregateTableName,
  type AggregateTables,
} from '../transforms/alumni-schema';
import type { WarehouseConfig } from './config-loader';
import {
  ConnectionError,
  DatasetNotFoundError,
  LoadError,
  describeCause,
  errorCode,
  type TableLoadError,
} from './error-handler';
import type { ProgressReporter } from './progress-reporter';

export interface WarehouseLoader {
  load(rows: readonly AggregateRow[], tableName: AggregateTableName): Promise<void>;
}

export interface LoadStreamMetadata {
  sourceFormat: 'NEWLINE_DELIMITED_JSON';
  writeDisposition: 'WRITE_TRUNCATE';
  createDisposition: 'CREATE_IF_NEEDED';
  schema: {
    fields: Array<{ name: string; type: string; mode: string }>;
  };
}

/**
 * The slice of a BigQuery dataset the loader needs
 */
export interface WarehouseDatasetHandle {
  table(tableName: string): {
    createWriteStream(metadata: LoadStreamMetadata): Writable;
  };
}

export interface TableLoadFailure {
  table: AggregateTableName;
  error: TableLoadError;
}

export interface LoadSummary {
  loaded: AggregateTableName[];
  failures: TableLoadFailure[];
}

export function toNewlineDelimitedJson(rows: readonly AggregateRow[]): string {
  return rows.map(row => JSON.stringify(row)).join('\n');
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === 404 || /not found: dataset/i.test(describeCause(error));
}

export class BigQueryWarehouseLoader implements WarehouseLoader {
  constructor(
    private readonly dataset: WarehouseDatasetHandle,
    private readonly config: WarehouseConfig
  ) {}

  /**
   * Full BigQuery path: PROJECT_ID.DATASET_ID.table_name
   */
  tableId(tableName: AggregateTableName): string {
    return `${this.config.projectId}.${this.config.datasetId}.${tableName}`;
  }

  async load(rows: readonly AggregateRow[], tableName: AggregateTableName): Promise<void> {
    const metadata: LoadStreamMetadata = {
      sourceFormat: 'NEWLINE_DELIMITED_JSON',
      writeDisposition: 'WRITE_TRUNCATE',
      createDisposition: 'CREATE_IF_NEEDED',
      schema: { fields: TABLE_SCHEMAS[tableName].map(column => ({ ...column })) },
    };

    try {
      await this.runLoadJob(tableName, metadata, toNewlineDelimitedJson(rows));
    } catch (error) {
      const context = { table: this.tableId(tableName), dataset: this.config.datasetId };
      if (isNotFound(error)) {
        throw new DatasetNotFoundError(
          `${context.table} failed to load. The dataset '${this.config.datasetId}' might not exist.`,
          context,
          { cause: error }
        );
      }
      throw new LoadError(`${context.table} failed to load.`, context, { cause: error });
    }
  }

  private runLoadJob(tableName: AggregateTableName, metadata: LoadStreamMetadata, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const stream = this.dataset.table(tableName).createWriteStream(metadata);
      stream.once('error', reject);
      // 'complete' fires after the load job finishes, not when the upload ends
      stream.once('complete', () => resolve());
      stream.end(payload);
    });
  }
}

/**
 * Build the BigQuery loader. Credentials come from the key file when configured,
 * otherwise from Application Default Credentials. A configured location is set on the
 * dataset handle, which is where load jobs take their job location from.
 */
export function createWarehouseLoader(config: WarehouseConfig): BigQueryWarehouseLoader {
  const options: BigQueryOptions = {
    projectId: config.projectId,
  };

  if (config.keyFilename) {
    options.keyFilename = config.keyFilename;
  }

  try {
    const client = new BigQuery(options);
    const dataset = client.dataset(config.datasetId, config.location ? { location: config.location } : undefined);
    return new BigQueryWarehouseLoader(dataset, config);
  } catch (error) {
    throw new ConnectionError(
      `Failed to initialize BigQuery client: ${describeCause(error)}`,
      { project: config.projectId, dataset: config.datasetId },
      { cause: error }
    );
  }
}

function asTableLoadError(error: unknown, tableName: AggregateTableName): TableLoadError {
  if (error instanceof LoadError || error instanceof DatasetNotFoundError) {
    return error;
  }
  return new LoadError(`${tableName} failed to load.`, { table: tableName }, { cause: error });
}

/**
 * Load every summary table in order. A failed table is logged and recorded;
 * the remaining tables are still attempted.
 */
export async function loadAll(
  loader: WarehouseLoader,
  tables: AggregateTables,
  reporter: ProgressReporter
): Promise<LoadSummary> {
  const summary: LoadSummary = { loaded: [], failures: [] };

  for (const [index, tableName] of AGGREGATE_TABLE_NAMES.entries()) {
    const rows = tables[tableName];
    reporter.logStep(`Loading ${rows.length} rows into ${tableName}...`, index + 1, AGGREGATE_TABLE_NAMES.length);

    try {
      await loader.load(rows, tableName);
      summary.loaded.push(tableName);
      reporter.logStepComplete(`SUCCESS: Load complete for ${tableName}`, rows.length);
    } catch (error) {
      const failure = asTableLoadError(error, tableName);
      summary.failures.push({ table: tableName, error: failure });
      reporter.logStepFailure(tableName, failure, failure.cause === undefined ? undefined : describeCause(failure.cause));
    }
  }

  return summary;
}
