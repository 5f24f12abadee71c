/**
 * Normalized clinical facts produced by both the HL7v2 and XML extractors.
 */

import type { JsonObject } from './Value.js';

export interface NormalizedPatient {
  /** Empty when no patient could be resolved; such patients are never emitted */
  patientId: string;
  firstName: string;
  lastName: string;
  fullName: string;
  /** ISO date (YYYY-MM-DD) or empty */
  dateOfBirth: string;
  gender: string;
  address: string;
  phoneNumber: string;
  /** Only XML sources carry an explicit age */
  age: number | null;
  metadata: JsonObject;
}

export interface NormalizedDrugFact {
  drugName: string;
  dosage: string;
  strength: string;
  /** Non-negative integer, or null when absent or unparseable */
  quantity: number | null;
  patientId: string;
  prescriptionId: string;
  metadata: JsonObject;
}

export interface ExtractionResult {
  patients: NormalizedPatient[];
  drugRecords: NormalizedDrugFact[];
}

export function emptyPatient(metadata: JsonObject = {}): NormalizedPatient {
  return {
    patientId: '',
    firstName: '',
    lastName: '',
    fullName: '',
    dateOfBirth: '',
    gender: '',
    address: '',
    phoneNumber: '',
    age: null,
    metadata,
  };
}

/**
 * Parse a non-negative integer. Surrounding whitespace and a leading plus
 * sign are accepted; anything else (decimals, units, negatives) yields null.
 */
export function parseQuantity(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\+?\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}

/**
 * Patient fields without metadata, for embedding in drug fact metadata
 */
export function patientSummary(patient: NormalizedPatient): JsonObject {
  return {
    patientId: patient.patientId,
    firstName: patient.firstName,
    lastName: patient.lastName,
    fullName: patient.fullName,
    dateOfBirth: patient.dateOfBirth,
    gender: patient.gender,
    address: patient.address,
    phoneNumber: patient.phoneNumber,
    age: patient.age,
  };
}
