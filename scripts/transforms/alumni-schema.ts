/**
 * Record and summary-table shapes shared by extraction, transforms and load.
 *
 * Source field names are an exact, case-sensitive contract with the survey table.
 * A renamed column in the source shows up here as an always-null field.
 */

export const SAFE_COLUMNS = [
  'Current Company',
  'Current Title',
  'Location',
  'Major',
  'Graduation Year',
] as const;

export type SafeColumn = typeof SAFE_COLUMNS[number];

/** One surveyed alumnus, reduced to the anonymous columns. */
export type RawRecord = Readonly<Record<SafeColumn, string | null>>;

export interface CompanyRow {
  company_name: string;
  alumni_count: number;
}

export interface JobTitleRow {
  job_title: string;
  job_count: number;
}

export interface MajorRow {
  major: string;
  major_count: number;
}

export interface LocationRow {
  country: string;
  state: string | null;
  city: string;
  alumni_count: number;
}

export interface AggregateTables {
  stats_company: CompanyRow[];
  stats_job_title: JobTitleRow[];
  stats_major: MajorRow[];
  stats_location: LocationRow[];
}

export type AggregateTableName = keyof AggregateTables;

export type AggregateRow = CompanyRow | JobTitleRow | MajorRow | LocationRow;

// Load order
export const AGGREGATE_TABLE_NAMES: readonly AggregateTableName[] = [
  'stats_company',
  'stats_job_title',
  'stats_major',
  'stats_location',
];

export interface ColumnSchema {
  name: string;
  type: 'STRING' | 'INTEGER';
  mode: 'REQUIRED' | 'NULLABLE';
}

export const TABLE_SCHEMAS: Readonly<Record<AggregateTableName, readonly ColumnSchema[]>> = {
  stats_company: [
    { name: 'company_name', type: 'STRING', mode: 'REQUIRED' },
    { name: 'alumni_count', type: 'INTEGER', mode: 'REQUIRED' },
  ],
  stats_job_title: [
    { name: 'job_title', type: 'STRING', mode: 'REQUIRED' },
    { name: 'job_count', type: 'INTEGER', mode: 'REQUIRED' },
  ],
  stats_major: [
    { name: 'major', type: 'STRING', mode: 'REQUIRED' },
    { name: 'major_count', type: 'INTEGER', mode: 'REQUIRED' },
  ],
  stats_location: [
    { name: 'country', type: 'STRING', mode: 'REQUIRED' },
    { name: 'state', type: 'STRING', mode: 'NULLABLE' },
    { name: 'city', type: 'STRING', mode: 'REQUIRED' },
    { name: 'alumni_count', type: 'INTEGER', mode: 'REQUIRED' },
  ],
};
