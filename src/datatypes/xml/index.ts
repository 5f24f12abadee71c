/**
 * XML DataType Module
 *
 * Well-formedness validation, tree normalization and clinical extraction
 * for XML documents.
 */

export {
  XMLDataType,
  type XMLParserProperties,
  getDefaultXMLParserProperties,
} from './XMLDataType.js';

export {
  ATTRIBUTES_KEY,
  type XMLNormalizeOptions,
  normalizeXML,
  xmlDiagnostic,
} from './XMLNormalizer.js';

export { XMLExtractor, extractXMLClinicalData, fieldText } from './XMLExtractor.js';
