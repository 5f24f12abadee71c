/**
 * Persistence collaborator for the conversion pipeline.
 *
 * The parsers never touch storage; only the processor and manager go
 * through this interface.
 */

import type { ExtractionResult, NormalizedPatient } from '../model/ClinicalData.js';
import type { ConversionRecord, ConversionStatus, ConversionType } from '../model/Conversion.js';
import type { JsonObject } from '../model/Value.js';

export interface StoredPatient extends NormalizedPatient {
  /** Row id */
  id: number;
}

export interface StoredDrugRecord {
  /** Row id */
  id: number;
  conversionId: string;
  /** Row id of the linked patient, when the fact's patient was stored */
  patientRecordId: number | null;
  drugName: string;
  dosage: string;
  strength: string;
  quantity: number | null;
  /** Patient id as it appeared in the source */
  originalPatientId: string;
  prescriptionId: string;
  metadata: JsonObject;
}

export interface ConversionRepository {
  /**
   * Store a new PENDING conversion
   */
  createConversion(
    conversionId: string,
    conversionType: ConversionType,
    sourceData: string
  ): Promise<ConversionRecord>;

  /**
   * Set the status. Converted data and the error message are only replaced
   * when given and non-empty.
   * @throws ConversionNotFoundError
   */
  updateConversionStatus(
    conversionId: string,
    status: ConversionStatus,
    convertedData?: JsonObject,
    errorMessage?: string
  ): Promise<void>;

  getConversion(conversionId: string): Promise<ConversionRecord | null>;

  /**
   * Store the patients of an extraction result, then its drug facts linked
   * to them by patient id, as one unit.
   * @throws ConversionNotFoundError
   */
  createDrugRecords(conversionId: string, result: ExtractionResult): Promise<StoredDrugRecord[]>;

  /**
   * Find a patient by patient id and merge in the non-empty fields that
   * changed, or create it. Patients without an id are not stored.
   */
  getOrCreatePatient(patient: NormalizedPatient): Promise<StoredPatient | null>;

  getDrugRecordsByConversion(conversionId: string): Promise<StoredDrugRecord[]>;
}

/**
 * Fields of an existing patient to overwrite with an incoming one. Empty
 * strings and a null age never overwrite.
 */
export function changedPatientFields(
  existing: NormalizedPatient,
  incoming: NormalizedPatient
): Partial<NormalizedPatient> {
  const changes: Partial<NormalizedPatient> = {};
  const textFields = [
    'firstName',
    'lastName',
    'fullName',
    'gender',
    'dateOfBirth',
    'address',
    'phoneNumber',
  ] as const;

  for (const key of textFields) {
    if (incoming[key] && incoming[key] !== existing[key]) {
      changes[key] = incoming[key];
    }
  }

  if (incoming.age !== null && incoming.age !== existing.age) {
    changes.age = incoming.age;
  }

  return changes;
}
