/**
 * MySQL conversion repository
 *
 * Tables:
 * - data_conversions: one row per submitted payload
 * - patients: one row per patient id, merged across conversions
 * - drug_records: drug facts, linked to a conversion and optionally a patient
 *
 * JSON columns (converted_data, metadata) are stored as LONGTEXT.
 */

import type { PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { execute, query, transaction, withRetry } from './pool.js';
import type { SqlParams } from './pool.js';
import {
  type ConversionRepository,
  type StoredDrugRecord,
  type StoredPatient,
  changedPatientFields,
} from './ConversionRepository.js';
import { ConversionNotFoundError, PersistenceError, errorMessageOf } from '../datatypes/errors.js';
import type { ExtractionResult, NormalizedPatient } from '../model/ClinicalData.js';
import {
  type ConversionRecord,
  type ConversionType,
  ConversionStatus,
  isConversionType,
  parseConversionStatus,
} from '../model/Conversion.js';
import type { JsonObject } from '../model/Value.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('database', 'Database pool and queries');
const logger = getLogger('database');

// ============================================================================
// Database Row Interfaces
// ============================================================================

interface ConversionRow extends RowDataPacket {
  conversion_id: string;
  conversion_type: string;
  source_data: string;
  status: string;
  converted_data: string | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
  drug_records_count: number | string;
}

interface ConversionIdRow extends RowDataPacket {
  id: number;
}

interface PatientRow extends RowDataPacket {
  id: number;
  patient_id: string;
  first_name: string | null;
  last_name: string | null;
  full_name: string | null;
  age: number | null;
  gender: string | null;
  date_of_birth: string | null;
  address: string | null;
  phone_number: string | null;
  metadata: string | null;
}

interface DrugRecordRow extends RowDataPacket {
  id: number;
  conversion_id: string;
  patient_id: number | null;
  drug_name: string;
  dosage: string | null;
  strength: string | null;
  quantity: number | null;
  original_patient_id: string | null;
  prescription_id: string | null;
  metadata: string | null;
}

/**
 * query/execute over either the pool or a transaction's connection
 */
interface SqlExecutor {
  query<T extends RowDataPacket>(sql: string, params?: SqlParams): Promise<T[]>;
  execute(sql: string, params?: SqlParams): Promise<ResultSetHeader>;
}

const poolExecutor: SqlExecutor = { query, execute };

function connectionExecutor(connection: PoolConnection): SqlExecutor {
  return {
    async query<T extends RowDataPacket>(sql: string, params?: SqlParams) {
      const [rows] = await connection.query<T[]>(sql, params);
      return rows;
    },
    async execute(sql: string, params?: SqlParams) {
      const [result] = await connection.execute<ResultSetHeader>(sql, params);
      return result;
    },
  };
}

const PATIENT_COLUMNS: Record<keyof Omit<NormalizedPatient, 'patientId' | 'metadata'>, string> = {
  firstName: 'first_name',
  lastName: 'last_name',
  fullName: 'full_name',
  age: 'age',
  gender: 'gender',
  dateOfBirth: 'date_of_birth',
  address: 'address',
  phoneNumber: 'phone_number',
};

const PATIENT_SELECT = `SELECT id, patient_id, first_name, last_name, full_name, age, gender,
  DATE_FORMAT(date_of_birth, '%Y-%m-%d') AS date_of_birth, address, phone_number, metadata
  FROM patients`;

// ============================================================================
// Row Mapping
// ============================================================================

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a stored JSON column. Anything other than an object reads as {}.
 */
export function parseJsonColumn(text: string | null): JsonObject {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : {};
  } catch (error) {
    logger.warn('Stored JSON column could not be parsed', { error: errorMessageOf(error) });
    return {};
  }
}

function toConversionType(value: string): ConversionType {
  const upper = value.toUpperCase();
  if (!isConversionType(upper)) {
    throw new PersistenceError(`Unknown conversion type in storage: ${value}`);
  }
  return upper;
}

function toConversionRecord(row: ConversionRow): ConversionRecord {
  return {
    conversionId: row.conversion_id,
    conversionType: toConversionType(row.conversion_type),
    sourceData: row.source_data,
    status: parseConversionStatus(row.status),
    convertedData: parseJsonColumn(row.converted_data),
    errorMessage: row.error_message ?? '',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    drugRecordsCount: Number(row.drug_records_count),
  };
}

function toStoredPatient(row: PatientRow): StoredPatient {
  return {
    id: row.id,
    patientId: row.patient_id,
    firstName: row.first_name ?? '',
    lastName: row.last_name ?? '',
    fullName: row.full_name ?? '',
    age: row.age,
    gender: row.gender ?? '',
    dateOfBirth: row.date_of_birth ?? '',
    address: row.address ?? '',
    phoneNumber: row.phone_number ?? '',
    metadata: parseJsonColumn(row.metadata),
  };
}

function toStoredDrugRecord(row: DrugRecordRow): StoredDrugRecord {
  return {
    id: row.id,
    conversionId: row.conversion_id,
    patientRecordId: row.patient_id,
    drugName: row.drug_name,
    dosage: row.dosage ?? '',
    strength: row.strength ?? '',
    quantity: row.quantity,
    originalPatientId: row.original_patient_id ?? '',
    prescriptionId: row.prescription_id ?? '',
    metadata: parseJsonColumn(row.metadata),
  };
}

function columnValue<K extends keyof typeof PATIENT_COLUMNS>(
  patient: Partial<NormalizedPatient>,
  key: K
): string | number | null {
  const value = patient[key];
  if (value === undefined || value === '') return null;
  return value;
}

// ============================================================================
// Repository
// ============================================================================

export class MySqlConversionRepository implements ConversionRepository {
  async createConversion(
    conversionId: string,
    conversionType: ConversionType,
    sourceData: string
  ): Promise<ConversionRecord> {
    await this.run('create conversion', () =>
      execute(
        `INSERT INTO data_conversions (conversion_id, conversion_type, source_data, status, converted_data, error_message)
         VALUES (:conversionId, :conversionType, :sourceData, :status, '{}', '')`,
        { conversionId, conversionType, sourceData, status: ConversionStatus.PENDING }
      )
    );

    const created = await this.getConversion(conversionId);
    if (!created) {
      throw new ConversionNotFoundError(conversionId);
    }
    return created;
  }

  async updateConversionStatus(
    conversionId: string,
    status: ConversionStatus,
    convertedData?: JsonObject,
    errorMessage?: string
  ): Promise<void> {
    const hasData = convertedData !== undefined && Object.keys(convertedData).length > 0;

    const result = await this.run('update conversion status', () =>
      execute(
        `UPDATE data_conversions
         SET status = :status,
             converted_data = COALESCE(:convertedData, converted_data),
             error_message = COALESCE(:errorMessage, error_message)
         WHERE conversion_id = :conversionId`,
        {
          conversionId,
          status,
          convertedData: hasData ? JSON.stringify(convertedData) : null,
          errorMessage: errorMessage ? errorMessage : null,
        }
      )
    );

    if (result.affectedRows === 0) {
      throw new ConversionNotFoundError(conversionId);
    }
  }

  async getConversion(conversionId: string): Promise<ConversionRecord | null> {
    const rows = await this.run('load conversion', () =>
      query<ConversionRow>(
        `SELECT c.conversion_id, c.conversion_type, c.source_data, c.status, c.converted_data,
                c.error_message, c.created_at, c.updated_at,
                (SELECT COUNT(*) FROM drug_records d WHERE d.conversion_id = c.id) AS drug_records_count
         FROM data_conversions c
         WHERE c.conversion_id = :conversionId`,
        { conversionId }
      )
    );

    const row = rows[0];
    return row ? toConversionRecord(row) : null;
  }

  async createDrugRecords(conversionId: string, result: ExtractionResult): Promise<StoredDrugRecord[]> {
    const stored = await this.run('create drug records', () =>
      withRetry(() =>
        transaction(async (connection) => {
          const executor = connectionExecutor(connection);

          const conversionRows = await executor.query<ConversionIdRow>(
            'SELECT id FROM data_conversions WHERE conversion_id = :conversionId',
            { conversionId }
          );
          const conversionRow = conversionRows[0];
          if (!conversionRow) {
            throw new ConversionNotFoundError(conversionId);
          }

          const patients = new Map<string, StoredPatient>();
          for (const patient of result.patients) {
            const storedPatient = await this.upsertPatient(executor, patient);
            if (storedPatient) {
              patients.set(storedPatient.patientId, storedPatient);
            }
          }

          const records: StoredDrugRecord[] = [];
          for (const drug of result.drugRecords) {
            const patientRecordId = patients.get(drug.patientId)?.id ?? null;
            const insert = await executor.execute(
              `INSERT INTO drug_records (conversion_id, patient_id, drug_name, dosage, strength, quantity,
                 original_patient_id, prescription_id, metadata)
               VALUES (:conversionRowId, :patientRecordId, :drugName, :dosage, :strength, :quantity,
                 :originalPatientId, :prescriptionId, :metadata)`,
              {
                conversionRowId: conversionRow.id,
                patientRecordId,
                drugName: drug.drugName,
                dosage: drug.dosage,
                strength: drug.strength,
                quantity: drug.quantity,
                originalPatientId: drug.patientId,
                prescriptionId: drug.prescriptionId,
                metadata: JSON.stringify(drug.metadata),
              }
            );

            records.push({
              id: insert.insertId,
              conversionId,
              patientRecordId,
              drugName: drug.drugName,
              dosage: drug.dosage,
              strength: drug.strength,
              quantity: drug.quantity,
              originalPatientId: drug.patientId,
              prescriptionId: drug.prescriptionId,
              metadata: drug.metadata,
            });
          }

          return records;
        })
      )
    );

    logger.debug(`Stored ${stored.length} drug records for conversion ${conversionId}`);
    return stored;
  }

  async getOrCreatePatient(patient: NormalizedPatient): Promise<StoredPatient | null> {
    return this.run('store patient', () => this.upsertPatient(poolExecutor, patient));
  }

  async getDrugRecordsByConversion(conversionId: string): Promise<StoredDrugRecord[]> {
    const rows = await this.run('load drug records', () =>
      query<DrugRecordRow>(
        `SELECT d.id, c.conversion_id, d.patient_id, d.drug_name, d.dosage, d.strength, d.quantity,
                d.original_patient_id, d.prescription_id, d.metadata
         FROM drug_records d
         JOIN data_conversions c ON c.id = d.conversion_id
         WHERE c.conversion_id = :conversionId
         ORDER BY d.id`,
        { conversionId }
      )
    );
    return rows.map(toStoredDrugRecord);
  }

  private async upsertPatient(
    executor: SqlExecutor,
    patient: NormalizedPatient
  ): Promise<StoredPatient | null> {
    if (!patient.patientId) {
      return null;
    }

    const rows = await executor.query<PatientRow>(`${PATIENT_SELECT} WHERE patient_id = :patientId`, {
      patientId: patient.patientId,
    });
    const existingRow = rows[0];

    if (existingRow) {
      const existing = toStoredPatient(existingRow);
      const changes = changedPatientFields(existing, patient);
      const keys = Object.keys(PATIENT_COLUMNS).filter(
        (key): key is keyof typeof PATIENT_COLUMNS => key in changes
      );

      if (keys.length === 0) {
        return existing;
      }

      const params: SqlParams = { id: existing.id };
      const assignments = keys.map((key) => {
        params[key] = columnValue(changes, key);
        return `${PATIENT_COLUMNS[key]} = :${key}`;
      });

      await executor.execute(`UPDATE patients SET ${assignments.join(', ')} WHERE id = :id`, params);
      logger.debug(`Updated patient ${patient.patientId}: ${keys.join(', ')}`);
      return { ...existing, ...changes };
    }

    const created: NormalizedPatient = {
      ...patient,
      fullName:
        patient.fullName ||
        (patient.firstName && patient.lastName ? `${patient.firstName} ${patient.lastName}` : ''),
    };

    const insert = await executor.execute(
      `INSERT INTO patients (patient_id, first_name, last_name, full_name, age, gender, date_of_birth,
         address, phone_number, metadata)
       VALUES (:patientId, :firstName, :lastName, :fullName, :age, :gender, :dateOfBirth,
         :address, :phoneNumber, :metadata)`,
      {
        patientId: created.patientId,
        firstName: created.firstName,
        lastName: created.lastName,
        fullName: created.fullName,
        age: created.age,
        gender: created.gender,
        dateOfBirth: created.dateOfBirth || null,
        address: created.address,
        phoneNumber: created.phoneNumber,
        metadata: JSON.stringify(created.metadata),
      }
    );

    logger.debug(`Created patient ${created.patientId}`);
    return { ...created, id: insert.insertId };
  }

  /**
   * Wrap driver failures in PersistenceError; domain errors pass through.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ConversionNotFoundError || error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`Failed to ${operation}: ${errorMessageOf(error)}`, error);
    }
  }
}
