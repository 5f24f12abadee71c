/**
 * Data Types Module
 *
 * Parsers for the clinical source formats and their shared error types.
 */

export type { ClinicalParser } from './ClinicalParser.js';
export { getParser } from './ParserFactory.js';
export * from './errors.js';

// HL7v2 DataType
export * from './hl7v2/index.js';

// XML DataType
export * from './xml/index.js';
