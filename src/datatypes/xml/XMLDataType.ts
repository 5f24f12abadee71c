/**
 * XML DataType - validate, normalize and extract clinical XML documents
 */

import type { ClinicalParser } from '../ClinicalParser.js';
import { ParseError, ValidationError, errorMessageOf } from '../errors.js';
import type { ExtractionResult } from '../../model/ClinicalData.js';
import { type JsonValue, type MappingValue, valueToJSON } from '../../model/Value.js';
import { XMLExtractor } from './XMLExtractor.js';
import { normalizeXML, xmlDiagnostic } from './XMLNormalizer.js';

/**
 * XML parser properties
 */
export interface XMLParserProperties {
  /** Strip namespace prefixes from element and attribute names */
  stripNamespaces: boolean;
}

export function getDefaultXMLParserProperties(): XMLParserProperties {
  return {
    stripNamespaces: false,
  };
}

export class XMLDataType implements ClinicalParser<MappingValue> {
  readonly conversionType = 'XML' as const;
  private properties: XMLParserProperties;
  private extractor = new XMLExtractor();

  constructor(properties?: Partial<XMLParserProperties>) {
    this.properties = {
      ...getDefaultXMLParserProperties(),
      ...properties,
    };
  }

  /**
   * Well-formedness only; no schema validation
   */
  validate(data: string): boolean {
    return xmlDiagnostic(data) === undefined;
  }

  assertValid(data: string): void {
    const diagnostic = xmlDiagnostic(data);
    if (diagnostic !== undefined) {
      throw new ValidationError(`Invalid XML data: ${diagnostic}`, { format: 'XML' });
    }
  }

  parse(data: string): MappingValue {
    this.assertValid(data);

    try {
      return normalizeXML(data, { stripNamespaces: this.properties.stripNamespaces });
    } catch (error) {
      throw new ParseError(`XML parsing error: ${errorMessageOf(error)}`, error);
    }
  }

  extractClinicalData(parsed: MappingValue): ExtractionResult {
    return this.extractor.extract(parsed);
  }

  toJSON(parsed: MappingValue): JsonValue {
    return valueToJSON(parsed);
  }
}
