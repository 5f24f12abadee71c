/**
 * Conversion lifecycle model
 *
 * A conversion is one submitted payload (HL7v2 or XML) moving through
 * PENDING -> PROCESSING -> COMPLETED | FAILED.
 */

import type { JsonObject, JsonValue } from './Value.js';

export type ConversionType = 'XML' | 'HL7';

export enum ConversionStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

/**
 * Status descriptions for display purposes
 */
export const CONVERSION_STATUS_DESCRIPTIONS: Record<ConversionStatus, string> = {
  [ConversionStatus.PENDING]: 'Pending',
  [ConversionStatus.PROCESSING]: 'Processing',
  [ConversionStatus.COMPLETED]: 'Completed',
  [ConversionStatus.FAILED]: 'Failed',
};

export function isConversionType(value: string): value is ConversionType {
  return value === 'XML' || value === 'HL7';
}

/**
 * Parse a status string from the database
 */
export function parseConversionStatus(value: string): ConversionStatus {
  switch (value) {
    case 'PROCESSING':
      return ConversionStatus.PROCESSING;
    case 'COMPLETED':
      return ConversionStatus.COMPLETED;
    case 'FAILED':
      return ConversionStatus.FAILED;
    default:
      return ConversionStatus.PENDING;
  }
}

export interface ConversionRecord {
  conversionId: string;
  conversionType: ConversionType;
  sourceData: string;
  status: ConversionStatus;
  convertedData: JsonObject;
  errorMessage: string;
  createdAt: Date;
  updatedAt: Date;
  drugRecordsCount: number;
}

/**
 * Payload stored on a completed conversion
 */
export interface ConvertedPayload extends JsonObject {
  parsedData: JsonValue;
  drugRecordsCount: number;
  patientsCount: number;
  processingTime: number;
}

export type ConversionErrorCode =
  | 'VALIDATION_ERROR'
  | 'PARSING_ERROR'
  | 'DATABASE_ERROR'
  | 'GENERAL_ERROR';

export interface CompletedConversion {
  conversionId: string;
  status: ConversionStatus.COMPLETED;
  drugRecordsCount: number;
  patientsCount: number;
  /** Seconds */
  processingTime: number;
  parsedData: JsonValue;
}

export interface FailedConversion {
  conversionId: string;
  status: ConversionStatus.FAILED;
  error: string;
  errorCode: ConversionErrorCode;
  /** Seconds */
  processingTime: number;
}

export type ConversionOutcome = CompletedConversion | FailedConversion;

export interface ConversionStatusSummary {
  conversionId: string;
  status: ConversionStatus;
  conversionType: ConversionType;
  createdAt: string;
  updatedAt: string;
  drugRecordsCount: number;
  errorMessage: string | null;
}
