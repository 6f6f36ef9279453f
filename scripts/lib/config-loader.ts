import * as dotenv from 'dotenv';
import { ConfigurationError } from './error-handler';

export interface SourceConfig {
  baseId: string;
  tableName: string;
  apiKey: string;
}

export interface WarehouseConfig {
  projectId: string;
  datasetId: string;
  keyFilename?: string;  // falls back to GOOGLE_APPLICATION_CREDENTIALS
  location?: string;
}

export interface AppConfig {
  source: SourceConfig;
  warehouse: WarehouseConfig;
  debugMode: boolean;
}

export const REQUIRED_ENV_VARS = [
  'SOURCE_BASE_ID',
  'SOURCE_TABLE_NAME',
  'SOURCE_API_KEY',
  'WAREHOUSE_PROJECT_ID',
  'WAREHOUSE_DATASET_ID',
] as const;

export type RequiredEnvVar = typeof REQUIRED_ENV_VARS[number];

/**
 * Load a .env file into process.env. Existing variables win over the file.
 *
 * @returns false when no .env file could be read
 */
export function loadEnvFile(filePath?: string): boolean {
  const result = dotenv.config(filePath ? { path: filePath } : undefined);
  return result.error === undefined;
}

/**
 * Validate that every required variable is present and non-empty
 */
export function validateEnv(env: NodeJS.ProcessEnv): { valid: boolean; missing: RequiredEnvVar[] } {
  const missing = REQUIRED_ENV_VARS.filter(name => !env[name]);

  return {
    valid: missing.length === 0,
    missing
  };
}

/**
 * Load configuration from environment variables
 *
 * Throws a ConfigurationError naming all five required variables when any of them is absent.
 * Nothing here touches the network.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { valid, missing } = validateEnv(env);

  if (!valid) {
    throw new ConfigurationError(
      `One or more environment variables are missing. Please check all ${REQUIRED_ENV_VARS.length} variables (${REQUIRED_ENV_VARS.join(', ')}).`,
      { missing: missing.join(', ') }
    );
  }

  // every required name was checked above
  const read = (name: RequiredEnvVar): string => env[name] ?? '';

  const warehouse: WarehouseConfig = {
    projectId: read('WAREHOUSE_PROJECT_ID'),
    datasetId: read('WAREHOUSE_DATASET_ID'),
  };

  if (env.WAREHOUSE_KEY_FILENAME) {
    warehouse.keyFilename = env.WAREHOUSE_KEY_FILENAME;
  }
  if (env.WAREHOUSE_LOCATION) {
    warehouse.location = env.WAREHOUSE_LOCATION;
  }

  return {
    source: {
      baseId: read('SOURCE_BASE_ID'),
      tableName: read('SOURCE_TABLE_NAME'),
      apiKey: read('SOURCE_API_KEY'),
    },
    warehouse,
    debugMode: env.DEBUG_MODE === 'true',
  };
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: AppConfig, write: (line: string) => void = console.log): void {
  const maskedConfig: AppConfig = {
    ...config,
    source: { ...config.source, apiKey: '***' },
  };

  write('\n📋 ETL Configuration:');
  write('════════════════════════════════════════════════════════════════');
  write(JSON.stringify(maskedConfig, null, 2));
  write('════════════════════════════════════════════════════════════════\n');
}
