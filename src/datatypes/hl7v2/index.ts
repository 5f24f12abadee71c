/**
 * HL7v2 DataType Module
 *
 * Tokenizing, decomposition, message building and clinical extraction for
 * pipe-delimited HL7v2 messages.
 */

// Properties and configuration
export {
  HL7V2_DEFAULTS,
  type HL7v2ParserProperties,
  getDefaultParserProperties,
  segmentMarkerPattern,
} from './HL7v2Properties.js';

// Tokenizer
export { tokenize, repairEmbeddedSegments } from './HL7v2Tokenizer.js';

// Decomposer and message builder
export {
  type ParsedSegment,
  type ParsedMessage,
  type MessageType,
  decomposeSegment,
  decomposeField,
  extractMessageType,
  buildMessage,
  field,
  segmentsNamed,
  firstSegment,
  segmentToJSON,
  messageToJSON,
} from './HL7v2Parser.js';

// Dates
export { parseHl7Date } from './HL7v2Date.js';

// Clinical extraction
export {
  HL7v2Extractor,
  extractHL7ClinicalData,
  PV1_PATIENT_ID,
  PV1_PATIENT_NAME,
  PV1_DATE_OF_BIRTH,
} from './HL7v2Extractor.js';

export { HL7v2DataType } from './HL7v2DataType.js';
