/**
 * Schema Manager
 *
 * Creates and verifies the conversion tables. Every statement is
 * idempotent, so it is safe to run on each startup.
 */

import type { RowDataPacket } from 'mysql2/promise';
import { query, transaction } from './pool.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('database', 'Database pool and queries');
const logger = getLogger('database');

export const CONVERSION_TABLES = ['data_conversions', 'patients', 'drug_records'] as const;

export interface SchemaVerificationResult {
  compatible: boolean;
  errors: string[];
}

interface TableExistsRow extends RowDataPacket {
  TABLE_NAME: string;
}

/**
 * Check that every conversion table exists
 */
export async function verifyConversionSchema(): Promise<SchemaVerificationResult> {
  const errors: string[] = [];

  try {
    const params: Record<string, string> = {};
    const placeholders = CONVERSION_TABLES.map((table, i) => {
      params[`table${i}`] = table;
      return `:table${i}`;
    });

    const existingTables = await query<TableExistsRow>(
      `SELECT TABLE_NAME FROM information_schema.TABLES
       WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME IN (${placeholders.join(', ')})`,
      params
    );

    const existingTableNames = new Set(existingTables.map((row) => row.TABLE_NAME));
    for (const table of CONVERSION_TABLES) {
      if (!existingTableNames.has(table)) {
        errors.push(`Missing table: ${table}`);
      }
    }
  } catch (err) {
    errors.push(`Database error: ${err instanceof Error ? err.message : String(err)}`);
  }

  return {
    compatible: errors.length === 0,
    errors,
  };
}

/**
 * Create the conversion tables if they don't exist
 */
export async function ensureConversionTables(): Promise<void> {
  logger.info('Ensuring conversion tables exist...');

  await transaction(async (connection) => {
    await connection.query(`
      CREATE TABLE IF NOT EXISTS data_conversions (
        id INTEGER NOT NULL AUTO_INCREMENT PRIMARY KEY,
        conversion_id VARCHAR(100) NOT NULL UNIQUE,
        conversion_type VARCHAR(10) NOT NULL,
        source_data LONGTEXT NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'PENDING',
        converted_data LONGTEXT,
        error_message TEXT,
        created_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        updated_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3) ON UPDATE CURRENT_TIMESTAMP(3),
        INDEX idx_data_conversions_created (created_at)
      ) ENGINE=InnoDB
    `);

    await connection.query(`
      CREATE TABLE IF NOT EXISTS patients (
        id INTEGER NOT NULL AUTO_INCREMENT PRIMARY KEY,
        patient_id VARCHAR(100) NOT NULL UNIQUE,
        first_name VARCHAR(100),
        last_name VARCHAR(100),
        full_name VARCHAR(200),
        age INTEGER,
        gender VARCHAR(20),
        date_of_birth DATE,
        address TEXT,
        phone_number VARCHAR(40),
        metadata LONGTEXT,
        created_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        updated_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3) ON UPDATE CURRENT_TIMESTAMP(3)
      ) ENGINE=InnoDB
    `);

    await connection.query(`
      CREATE TABLE IF NOT EXISTS drug_records (
        id INTEGER NOT NULL AUTO_INCREMENT PRIMARY KEY,
        conversion_id INTEGER NOT NULL,
        patient_id INTEGER,
        drug_name VARCHAR(255) NOT NULL,
        dosage VARCHAR(100),
        strength VARCHAR(100),
        quantity INTEGER,
        original_patient_id VARCHAR(100),
        prescription_id VARCHAR(100),
        metadata LONGTEXT,
        created_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        CONSTRAINT fk_drug_records_conversion FOREIGN KEY (conversion_id)
          REFERENCES data_conversions(id) ON DELETE CASCADE,
        CONSTRAINT fk_drug_records_patient FOREIGN KEY (patient_id)
          REFERENCES patients(id) ON DELETE CASCADE
      ) ENGINE=InnoDB
    `);
  });

  logger.info('Conversion tables ready');
}
