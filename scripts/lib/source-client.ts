/**
 * Airtable source client
 *
 * Fetches every record of the survey table and keeps only the safe columns.
 * Pagination is handled by `select().all()`.
 */

import Airtable from 'airtable';
import type { RawRecord } from '../transforms/alumni-schema';
import type { SourceConfig } from './config-loader';
import { ConnectionError, ExtractionError, describeCause } from './error-handler';

export interface SourceClient {
  fetchAll(): Promise<RawRecord[]>;
}

type FieldValues = Readonly<Record<string, unknown>>;

/**
 * The slice of an Airtable table the client needs
 */
export interface AirtableTableHandle {
  select(): {
    all(): Promise<ReadonlyArray<{ readonly fields: FieldValues }>>;
  };
}

/**
 * Airtable cells can be strings, numbers, booleans, attachments or linked records.
 * Scalars become strings; anything else is treated as missing.
 */
export function toCellValue(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Project a record's fields onto the safe columns, dropping everything else
 */
export function toRawRecord(fields: FieldValues): RawRecord {
  return {
    'Current Company': toCellValue(fields['Current Company']),
    'Current Title': toCellValue(fields['Current Title']),
    'Location': toCellValue(fields['Location']),
    'Major': toCellValue(fields['Major']),
    'Graduation Year': toCellValue(fields['Graduation Year']),
  };
}

export class AirtableSourceClient implements SourceClient {
  constructor(
    private readonly table: AirtableTableHandle,
    private readonly config: SourceConfig
  ) {}

  async fetchAll(): Promise<RawRecord[]> {
    try {
      const records = await this.table.select().all();
      return records.map(record => toRawRecord(record.fields));
    } catch (error) {
      throw new ExtractionError(
        `Failed to extract from Airtable: ${describeCause(error)}`,
        { baseId: this.config.baseId, table: this.config.tableName },
        { cause: error }
      );
    }
  }
}

/**
 * Build the Airtable client for the configured base and table
 */
export function createSourceClient(config: SourceConfig): AirtableSourceClient {
  try {
    const base = new Airtable({ apiKey: config.apiKey }).base(config.baseId);
    return new AirtableSourceClient(base(config.tableName), config);
  } catch (error) {
    throw new ConnectionError(
      `Failed to initialize Airtable client: ${describeCause(error)}`,
      { baseId: config.baseId, table: config.tableName },
      { cause: error }
    );
  }
}
