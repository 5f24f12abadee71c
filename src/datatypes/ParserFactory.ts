/**
 * Parser lookup by conversion type
 */

import type { ConversionType } from '../model/Conversion.js';
import type { ClinicalParser } from './ClinicalParser.js';
import { HL7v2DataType } from './hl7v2/HL7v2DataType.js';
import { XMLDataType } from './xml/XMLDataType.js';

export function getParser(conversionType: ConversionType): ClinicalParser {
  switch (conversionType) {
    case 'HL7':
      return new HL7v2DataType();
    case 'XML':
      return new XMLDataType();
  }
}
