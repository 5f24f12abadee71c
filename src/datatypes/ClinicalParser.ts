/**
 * Contract shared by the HL7v2 and XML clinical parsers.
 *
 * The caller picks the parser from an explicit conversion type; parsers never
 * sniff the format of their input.
 */

import type { ExtractionResult } from '../model/ClinicalData.js';
import type { ConversionType } from '../model/Conversion.js';
import type { JsonValue } from '../model/Value.js';

export interface ClinicalParser<TParsed = unknown> {
  readonly conversionType: ConversionType;

  /**
   * Structural format check. Never throws.
   */
  validate(data: string): boolean;

  /**
   * @throws ValidationError naming the format and what was expected
   */
  assertValid(data: string): void;

  /**
   * Parse into the format's intermediate representation.
   * @throws ValidationError when validate() would return false
   * @throws ParseError when the structure cannot be decomposed
   */
  parse(data: string): TParsed;

  /**
   * Locate patient and drug facts in a parsed document
   */
  extractClinicalData(parsed: TParsed): ExtractionResult;

  /**
   * Plain JSON form of a parsed document, for storage
   */
  toJSON(parsed: TParsed): JsonValue;
}
