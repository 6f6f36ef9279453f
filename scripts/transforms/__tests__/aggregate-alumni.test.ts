/**
 * Unit tests for the alumni aggregation passes
 */

import { describe, it, expect } from 'vitest';
import {
  aggregateAll,
  aggregateCompanies,
  aggregateJobTitles,
  aggregateLocations,
  aggregateMajors,
  countByField,
  summarizeFieldCoverage,
} from '../aggregate-alumni';
import type { RawRecord, SafeColumn } from '../alumni-schema';

function record(fields: Partial<Record<SafeColumn, string>>): RawRecord {
  return {
    'Current Company': null,
    'Current Title': null,
    'Location': null,
    'Major': null,
    'Graduation Year': null,
    ...fields,
  };
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

describe('Alumni Aggregation', () => {
  describe('countByField', () => {
    it('should group by exact value without trimming or case folding', () => {
      const records = [
        record({ 'Current Company': 'Acme' }),
        record({ 'Current Company': 'acme' }),
        record({ 'Current Company': 'Acme ' }),
        record({ 'Current Company': 'Acme' }),
      ];

      expect(countByField(records, 'Current Company')).toEqual([
        { value: 'Acme', count: 2 },
        { value: 'Acme ', count: 1 },
        { value: 'acme', count: 1 },
      ]);
    });

    it('should drop records whose field is null', () => {
      const records = [
        record({ 'Major': 'History' }),
        record({}),
        record({ 'Major': 'History' }),
      ];

      expect(countByField(records, 'Major')).toEqual([{ value: 'History', count: 2 }]);
    });

    it('should keep an empty string as its own group', () => {
      const records = [record({ 'Current Title': '' }), record({ 'Current Title': 'Engineer' })];

      expect(countByField(records, 'Current Title')).toEqual([
        { value: '', count: 1 },
        { value: 'Engineer', count: 1 },
      ]);
    });
  });

  describe('per-field tables', () => {
    const records = [
      record({ 'Current Company': 'Globex', 'Current Title': 'Analyst', 'Major': 'Economics' }),
      record({ 'Current Company': 'Acme', 'Current Title': 'Engineer', 'Major': 'Physics' }),
      record({ 'Current Company': 'Acme', 'Major': 'Physics' }),
      record({ 'Current Title': 'Engineer' }),
    ];

    it('should build stats_company rows', () => {
      expect(aggregateCompanies(records)).toEqual([
        { company_name: 'Acme', alumni_count: 2 },
        { company_name: 'Globex', alumni_count: 1 },
      ]);
    });

    it('should build stats_job_title rows', () => {
      expect(aggregateJobTitles(records)).toEqual([
        { job_title: 'Analyst', job_count: 1 },
        { job_title: 'Engineer', job_count: 2 },
      ]);
    });

    it('should build stats_major rows', () => {
      expect(aggregateMajors(records)).toEqual([
        { major: 'Economics', major_count: 1 },
        { major: 'Physics', major_count: 2 },
      ]);
    });

    it('should count a record without a title toward companies only', () => {
      const isolated = [record({ 'Current Company': 'Initech' })];

      expect(aggregateCompanies(isolated)).toEqual([{ company_name: 'Initech', alumni_count: 1 }]);
      expect(aggregateJobTitles(isolated)).toEqual([]);
    });
  });

  describe('aggregateLocations', () => {
    it('should split city and state and fix the country', () => {
      const records = [
        record({ 'Current Company': 'Acme', 'Location': 'Austin, TX' }),
        record({ 'Current Company': 'Acme', 'Location': 'Dallas, TX' }),
        record({ 'Location': 'Austin, TX' }),
      ];

      const tables = aggregateAll(records);

      expect(tables.stats_company).toEqual([{ company_name: 'Acme', alumni_count: 2 }]);
      expect(tables.stats_location).toEqual([
        { country: 'United States', state: 'TX', city: 'Austin', alumni_count: 2 },
        { country: 'United States', state: 'TX', city: 'Dallas', alumni_count: 1 },
      ]);
    });

    it('should keep locations without a comma with a null state', () => {
      const records = [
        record({ 'Location': 'Remote ' }),
        record({ 'Location': ' Boston , MA, USA' }),
        record({ 'Location': 'Remote' }),
      ];

      expect(aggregateLocations(records)).toEqual([
        { country: 'United States', state: null, city: 'Remote', alumni_count: 2 },
        { country: 'United States', state: 'MA, USA', city: 'Boston', alumni_count: 1 },
      ]);
    });

    it('should group locations after trimming whitespace', () => {
      const records = [
        record({ 'Location': 'Austin,TX' }),
        record({ 'Location': '  Austin ,  TX ' }),
      ];

      expect(aggregateLocations(records)).toEqual([
        { country: 'United States', state: 'TX', city: 'Austin', alumni_count: 2 },
      ]);
    });

    it('should treat a trailing comma as an empty state, distinct from no state', () => {
      const records = [record({ 'Location': 'Austin,' }), record({ 'Location': 'Austin' })];

      const rows = aggregateLocations(records);

      expect(rows).toHaveLength(2);
      expect(rows).toContainEqual({ country: 'United States', state: '', city: 'Austin', alumni_count: 1 });
      expect(rows).toContainEqual({ country: 'United States', state: null, city: 'Austin', alumni_count: 1 });
    });

    it('should order a null state before an empty state whatever the record order', () => {
      const expected = [
        { country: 'United States', state: null, city: 'Austin', alumni_count: 1 },
        { country: 'United States', state: '', city: 'Austin', alumni_count: 1 },
      ];

      expect(aggregateLocations([record({ 'Location': 'Austin,' }), record({ 'Location': 'Austin' })])).toEqual(expected);
      expect(aggregateLocations([record({ 'Location': 'Austin' }), record({ 'Location': 'Austin,' })])).toEqual(expected);
    });
  });

  describe('aggregateAll', () => {
    it('should return four empty tables for no records', () => {
      expect(aggregateAll([])).toEqual({
        stats_company: [],
        stats_job_title: [],
        stats_major: [],
        stats_location: [],
      });
    });

    it('should make every table sum to the records carrying its field', () => {
      const companies = ['Acme', 'Globex', null, 'Acme', 'Initech', null, 'Globex'];
      const titles = [null, 'Engineer', 'Engineer', 'Manager', null, 'Analyst', null];
      const majors = ['Physics', 'Physics', 'History', null, 'Art', 'Art', 'Art'];
      const locations = ['Austin, TX', null, 'Remote', 'Reno, NV', 'Austin, TX', 'Boise, ID', null];

      const records: RawRecord[] = companies.map((company, i) => ({
        'Current Company': company,
        'Current Title': titles[i],
        'Location': locations[i],
        'Major': majors[i],
        'Graduation Year': '2020',
      }));

      const tables = aggregateAll(records);

      expect(sum(tables.stats_company.map(row => row.alumni_count))).toBe(5);
      expect(sum(tables.stats_job_title.map(row => row.job_count))).toBe(4);
      expect(sum(tables.stats_major.map(row => row.major_count))).toBe(6);
      expect(sum(tables.stats_location.map(row => row.alumni_count))).toBe(5);
    });

    it('should produce identical tables for identical input', () => {
      const records = [
        record({ 'Current Company': 'Globex', 'Location': 'Reno, NV' }),
        record({ 'Current Company': 'Acme', 'Location': 'Austin, TX' }),
      ];

      expect(aggregateAll(records)).toEqual(aggregateAll([...records]));
    });
  });

  describe('summarizeFieldCoverage', () => {
    it('should count present and missing values per safe column', () => {
      const records = [
        record({ 'Current Company': 'Acme', 'Graduation Year': '2019' }),
        record({ 'Current Company': 'Globex', 'Location': 'Austin, TX' }),
        record({}),
      ];

      expect(summarizeFieldCoverage(records)).toEqual([
        { column: 'Current Company', present: 2, missing: 1 },
        { column: 'Current Title', present: 0, missing: 3 },
        { column: 'Location', present: 1, missing: 2 },
        { column: 'Major', present: 0, missing: 3 },
        { column: 'Graduation Year', present: 1, missing: 2 },
      ]);
    });
  });
});
