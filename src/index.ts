/**
 * Clinical message converter
 *
 * Parses HL7v2 and XML clinical payloads into normalized patient and drug
 * facts and records each conversion in MySQL.
 */

import 'dotenv/config';
import { ConversionManager } from './controllers/ConversionManager.js';
import { MySqlConversionRepository } from './db/ConversionDao.js';
import type { DatabaseConfig } from './db/config.js';
import { initPool } from './db/pool.js';
import { ensureConversionTables } from './db/SchemaManager.js';

export * from './datatypes/index.js';
export * from './model/Value.js';
export * from './model/ClinicalData.js';
export * from './model/Conversion.js';
export { ConversionProcessor, type ConversionProcessorOptions } from './controllers/ConversionProcessor.js';
export { ConversionManager } from './controllers/ConversionManager.js';
export {
  type ConversionRepository,
  type StoredPatient,
  type StoredDrugRecord,
  changedPatientFields,
} from './db/ConversionRepository.js';
export { MySqlConversionRepository } from './db/ConversionDao.js';
export { type DatabaseConfig, getDatabaseConfig, resetDatabaseConfig } from './db/config.js';
export { initPool, closePool, healthCheck } from './db/pool.js';
export { ensureConversionTables, verifyConversionSchema } from './db/SchemaManager.js';
export { DataValidator } from './util/DataValidator.js';
export * from './logging/index.js';

/**
 * Open the pool, create missing tables and return a manager backed by MySQL.
 */
export async function createConversionManager(config?: DatabaseConfig): Promise<ConversionManager> {
  initPool(config);
  await ensureConversionTables();
  return new ConversionManager(new MySqlConversionRepository());
}
