/**
 * Alumni Aggregation
 *
 * Turns anonymized survey records into the four summary tables. Each pass drops only the
 * records missing its own field, so a record without a title still counts toward companies.
 * Pure: no I/O, no thrown domain errors.
 */

import { countBy, groupBy, sortBy } from 'lodash';
import {
  SAFE_COLUMNS,
  type AggregateTables,
  type CompanyRow,
  type JobTitleRow,
  type LocationRow,
  type MajorRow,
  type RawRecord,
  type SafeColumn,
} from './alumni-schema';
import { DEFAULT_COUNTRY, parseLocation } from './normalize-location';

export interface ValueCount {
  value: string;
  count: number;
}

export interface FieldCoverage {
  column: SafeColumn;
  present: number;
  missing: number;
}

function presentValues(records: readonly RawRecord[], field: SafeColumn): string[] {
  const values: string[] = [];
  for (const record of records) {
    const value = record[field];
    if (value !== null && value !== undefined) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Group records by the exact value of one field and count each group.
 * Values are compared as-is: no trimming, no case folding.
 */
export function countByField(records: readonly RawRecord[], field: SafeColumn): ValueCount[] {
  const counts = countBy(presentValues(records, field));
  const rows = Object.entries(counts).map(([value, count]) => ({ value, count }));
  return sortBy(rows, row => row.value);
}

export function aggregateCompanies(records: readonly RawRecord[]): CompanyRow[] {
  return countByField(records, 'Current Company').map(({ value, count }) => ({
    company_name: value,
    alumni_count: count,
  }));
}

export function aggregateJobTitles(records: readonly RawRecord[]): JobTitleRow[] {
  return countByField(records, 'Current Title').map(({ value, count }) => ({
    job_title: value,
    job_count: count,
  }));
}

export function aggregateMajors(records: readonly RawRecord[]): MajorRow[] {
  return countByField(records, 'Major').map(({ value, count }) => ({
    major: value,
    major_count: count,
  }));
}

/**
 * Group by (country, state, city). Locations without a comma keep a null state.
 */
export function aggregateLocations(records: readonly RawRecord[]): LocationRow[] {
  const parsed = presentValues(records, 'Location').map(location => ({
    country: DEFAULT_COUNTRY,
    ...parseLocation(location),
  }));

  const groups = groupBy(parsed, place => JSON.stringify([place.country, place.state, place.city]));

  const rows = Object.values(groups).map(group => ({
    country: group[0].country,
    state: group[0].state,
    city: group[0].city,
    alumni_count: group.length,
  }));

  // null state sorts ahead of every string, including ''
  return sortBy(rows, [
    row => row.country,
    row => (row.state === null ? 0 : 1),
    row => row.state ?? '',
    row => row.city,
  ]);
}

/**
 * Run the four passes independently over the same record set
 */
export function aggregateAll(records: readonly RawRecord[]): AggregateTables {
  return {
    stats_company: aggregateCompanies(records),
    stats_job_title: aggregateJobTitles(records),
    stats_major: aggregateMajors(records),
    stats_location: aggregateLocations(records),
  };
}

/**
 * Per-column count of records with and without a value.
 * `present` is exactly what the matching summary table's counts sum to.
 */
export function summarizeFieldCoverage(records: readonly RawRecord[]): FieldCoverage[] {
  return SAFE_COLUMNS.map(column => {
    const present = presentValues(records, column).length;
    return { column, present, missing: records.length - present };
  });
}
