/**
 * Pre-submission checks for conversion payloads and extracted drug facts.
 *
 * Each check returns a list of human-readable problems; an empty list means
 * the input is acceptable.
 */

import type { NormalizedDrugFact } from '../model/ClinicalData.js';
import { xmlDiagnostic } from '../datatypes/xml/XMLNormalizer.js';
import { tokenize } from '../datatypes/hl7v2/HL7v2Tokenizer.js';

function isBlank(str: string | null | undefined): boolean {
  return str == null || str.trim().length === 0;
}

export class DataValidator {
  static validateXMLData(data: string): string[] {
    if (isBlank(data)) {
      return ['XML data cannot be empty'];
    }

    const diagnostic = xmlDiagnostic(data);
    return diagnostic === undefined ? [] : [`Invalid XML format: ${diagnostic}`];
  }

  static validateHL7Data(data: string): string[] {
    if (isBlank(data)) {
      return ['HL7 data cannot be empty'];
    }

    const segments = tokenize(data);
    if (segments.length === 0) {
      return ['HL7 data must contain at least one segment'];
    }

    const errors: string[] = [];
    if (!segments[0]?.startsWith('MSH')) {
      errors.push('HL7 message must start with MSH segment');
    }

    segments.forEach((segment, index) => {
      if (!segment.includes('|')) {
        errors.push(`Segment ${index + 1} must contain field separators (|)`);
      }
    });

    return errors;
  }

  /**
   * Dispatch on the conversion type; the type is matched case-insensitively.
   */
  static validateConversionData(conversionType: string, data: string): string[] {
    switch (conversionType.toUpperCase()) {
      case 'XML':
        return DataValidator.validateXMLData(data);
      case 'HL7':
        return DataValidator.validateHL7Data(data);
      default:
        return [`Unsupported conversion type: ${conversionType}`];
    }
  }

  static validateDrugRecord(drug: NormalizedDrugFact): string[] {
    const errors: string[] = [];

    if (!drug.drugName) {
      errors.push('Drug name is required');
    }

    if (drug.quantity !== null) {
      if (!Number.isInteger(drug.quantity)) {
        errors.push('Quantity must be a valid integer');
      } else if (drug.quantity < 0) {
        errors.push('Quantity must be non-negative');
      }
    }

    return errors;
  }
}
