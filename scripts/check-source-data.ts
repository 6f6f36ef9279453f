/**
 * Source Data Coverage
 * Fetches the survey table and shows how many records carry each safe column.
 * The "present" column is what each summary table's counts should add up to.
 *
 * Usage:
 *   npx tsx scripts/check-source-data.ts
 */

import { loadConfig, loadEnvFile } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { createSourceClient } from './lib/source-client';
import { summarizeFieldCoverage } from './transforms/aggregate-alumni';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const source = createSourceClient(config.source);

  const records = await source.fetchAll();
  const coverage = summarizeFieldCoverage(records);

  console.log('\n════════════════════════════════════════════════');
  console.log('  Source Data Coverage');
  console.log('════════════════════════════════════════════════\n');
  console.log(`  Table:   ${config.source.tableName}`);
  console.log(`  Records: ${records.length.toLocaleString()}\n`);

  for (const { column, present, missing } of coverage) {
    const marker = present === 0 ? '❌' : '✅';
    console.log(`  ${marker} ${column.padEnd(18)} present: ${present.toLocaleString().padStart(6)}  missing: ${missing.toLocaleString().padStart(6)}`);
  }

  if (coverage.some(({ present }) => present === 0)) {
    console.log('\n  ⚠️  Columns with no values may have been renamed in the source table.');
  }

  console.log('\n════════════════════════════════════════════════\n');
}

main().catch((err: unknown) => {
  console.error(formatError(err));
  process.exitCode = 1;
});
