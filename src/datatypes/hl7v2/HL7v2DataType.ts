/**
 * HL7v2 DataType - validate, parse and extract pipe-delimited HL7v2 messages
 */

import type { ClinicalParser } from '../ClinicalParser.js';
import { ParseError, ValidationError, errorMessageOf } from '../errors.js';
import type { ExtractionResult } from '../../model/ClinicalData.js';
import type { JsonValue } from '../../model/Value.js';
import { HL7v2Extractor } from './HL7v2Extractor.js';
import { type ParsedMessage, buildMessage, messageToJSON } from './HL7v2Parser.js';
import { type HL7v2ParserProperties, getDefaultParserProperties } from './HL7v2Properties.js';
import { tokenize } from './HL7v2Tokenizer.js';

export class HL7v2DataType implements ClinicalParser<ParsedMessage> {
  readonly conversionType = 'HL7' as const;
  private properties: HL7v2ParserProperties;
  private extractor: HL7v2Extractor;

  constructor(properties?: Partial<HL7v2ParserProperties>) {
    this.properties = {
      ...getDefaultParserProperties(),
      ...properties,
    };
    this.extractor = new HL7v2Extractor(this.properties);
  }

  /**
   * Valid when the input is non-blank and its first segment starts with MSH
   */
  validate(data: string): boolean {
    const segments = tokenize(data, this.properties);
    return segments[0]?.startsWith('MSH') ?? false;
  }

  assertValid(data: string): void {
    if (!this.validate(data)) {
      throw new ValidationError('Invalid HL7 data: message must start with MSH segment', {
        format: 'HL7',
        expectedSegment: 'MSH',
      });
    }
  }

  parse(data: string): ParsedMessage {
    this.assertValid(data);

    try {
      return buildMessage(tokenize(data, this.properties), this.properties);
    } catch (error) {
      throw new ParseError(`HL7 parsing error: ${errorMessageOf(error)}`, error);
    }
  }

  extractClinicalData(parsed: ParsedMessage): ExtractionResult {
    return this.extractor.extract(parsed);
  }

  toJSON(parsed: ParsedMessage): JsonValue {
    return messageToJSON(parsed);
  }
}
