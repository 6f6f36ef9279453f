#!/usr/bin/env node
/**
 * Alumni Stats ETL Pipeline
 * =========================
 * Pulls alumni survey records from Airtable, aggregates them into four summary tables
 * and overwrites the matching BigQuery tables.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [options]
 *
 * Options:
 *   --dry-run        Extract and transform, print the tables, write nothing
 *   --print-config   Print the resolved configuration (API key masked)
 *
 * Required environment (or .env):
 *   SOURCE_BASE_ID, SOURCE_TABLE_NAME, SOURCE_API_KEY, WAREHOUSE_PROJECT_ID, WAREHOUSE_DATASET_ID
 *
 * Exit codes:
 *   0  all tables loaded (or dry run finished)
 *   1  configuration, connection or extraction failure, nothing loaded
 *   2  run completed but at least one table failed to load
 */

import { loadEnvFile } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { runFromEnvironment } from './lib/pipeline-runner';
import { ProgressReporter } from './lib/progress-reporter';
import { createSourceClient } from './lib/source-client';
import { createWarehouseLoader } from './lib/warehouse-loader';

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const reporter = new ProgressReporter();

  console.log('Loading environment variables...');
  if (!loadEnvFile()) {
    reporter.logInfo('No .env file found, using the process environment');
  }

  return runFromEnvironment(process.env, {
    factories: {
      createSource: createSourceClient,
      createLoader: createWarehouseLoader,
    },
    reporter,
    dryRun: args.includes('--dry-run'),
    printConfig: args.includes('--print-config'),
  });
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  });
