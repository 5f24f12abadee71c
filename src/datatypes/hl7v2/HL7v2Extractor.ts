/**
 * HL7v2 clinical extractor
 *
 * Walks a ParsedMessage and produces normalized patient and drug facts.
 *
 * Patient resolution, first non-empty patient ID wins:
 *   1. PID segment (first occurrence)
 *   2. PID text embedded in the first raw segment (no PID segment at all)
 *   3. PV1 segment, with sentinel name and date of birth
 *
 * Drug facts come from RXA segments, or from RXE segments when there is no
 * RXA. The i-th drug segment pairs with the i-th ORC, and the i-th RXR pairs
 * with the i-th emitted drug fact.
 */

import {
  type ExtractionResult,
  type NormalizedDrugFact,
  type NormalizedPatient,
  emptyPatient,
  parseQuantity,
  patientSummary,
} from '../../model/ClinicalData.js';
import { type JsonObject, type Value, component, leadingText } from '../../model/Value.js';
import { parseHl7Date } from './HL7v2Date.js';
import {
  type ParsedMessage,
  type ParsedSegment,
  decomposeField,
  field,
  firstSegment,
  segmentToJSON,
  segmentsNamed,
} from './HL7v2Parser.js';
import {
  type HL7v2ParserProperties,
  escapeRegExp,
  getDefaultParserProperties,
} from './HL7v2Properties.js';

/** Patient ID assigned when PV1 yields no identifier */
export const PV1_PATIENT_ID = 'PV1_PATIENT';
export const PV1_PATIENT_NAME = 'Patient from PV1';
/** Date of birth marking a PV1-derived patient whose birth date is unknown */
export const PV1_DATE_OF_BIRTH = '1900-01-01';

interface PrescriptionInfo {
  prescriptionId: string;
  info: JsonObject;
}

interface PersonName {
  firstName: string;
  lastName: string;
  fullName: string;
}

export class HL7v2Extractor {
  private properties: HL7v2ParserProperties;

  constructor(properties?: Partial<HL7v2ParserProperties>) {
    this.properties = {
      ...getDefaultParserProperties(),
      ...properties,
    };
  }

  /**
   * Extract patients and drug facts from a parsed message
   */
  extract(
    message: ParsedMessage,
    rawSegments: readonly string[] = message.rawSegments
  ): ExtractionResult {
    const result: ExtractionResult = { patients: [], drugRecords: [] };

    const prescriptions = this.extractPrescriptionInfo(message);
    const patient = this.resolvePatient(message, rawSegments);
    if (patient.patientId) {
      result.patients.push(patient);
    }

    const rxaSegments = segmentsNamed(message, 'RXA');
    const drugSegments = rxaSegments.length > 0 ? rxaSegments : segmentsNamed(message, 'RXE');
    const buildDrug =
      rxaSegments.length > 0
        ? (segment: ParsedSegment) => this.drugFromRxa(segment)
        : (segment: ParsedSegment) => this.drugFromRxe(segment);

    drugSegments.forEach((segment, i) => {
      const drug = buildDrug(segment);
      if (!drug.drugName) {
        return;
      }

      drug.patientId = patient.patientId;
      if (patient.patientId) {
        drug.metadata['patientInfo'] = patientSummary(patient);
      }

      const prescription = prescriptions[i];
      if (prescription) {
        drug.prescriptionId = prescription.prescriptionId;
        drug.metadata['prescriptionInfo'] = prescription.info;
      }

      result.drugRecords.push(drug);
    });

    segmentsNamed(message, 'RXR').forEach((rxr, i) => {
      const drug = result.drugRecords[i];
      if (drug) {
        drug.metadata['routeInfo'] = {
          administrationRoute: this.text(field(rxr, 1)),
          administrationSite: this.text(field(rxr, 2)),
        };
      }
    });

    return result;
  }

  // -- patient resolution --

  private resolvePatient(message: ParsedMessage, rawSegments: readonly string[]): NormalizedPatient {
    let patient = emptyPatient();

    const pid = firstSegment(message, 'PID');
    const leadSegment = rawSegments[0];
    if (pid) {
      patient = this.patientFromPid(pid);
    } else if (leadSegment !== undefined) {
      patient = this.patientFromEmbeddedPid(leadSegment) ?? patient;
    }

    if (!patient.patientId) {
      const pv1 = firstSegment(message, 'PV1');
      if (pv1) {
        patient = this.patientFromPv1(pv1);
      }
    }

    return patient;
  }

  private patientFromPid(pid: ParsedSegment): NormalizedPatient {
    const name = this.parseName(field(pid, 5));

    return {
      patientId: leadingText(field(pid, 3)) || leadingText(field(pid, 2)),
      ...name,
      dateOfBirth: parseHl7Date(this.text(field(pid, 7))) ?? '',
      gender: this.text(field(pid, 8)),
      address: this.parseAddress(field(pid, 11)),
      phoneNumber: this.parsePhone(field(pid, 13)) || this.parsePhone(field(pid, 14)),
      age: null,
      metadata: {
        sourceFormat: 'HL7',
        sourceSegment: 'PID',
        rawData: segmentToJSON(pid),
      },
    };
  }

  /**
   * Read PID fields straight from raw text when the PID never became a
   * segment of its own, e.g. `MSH|...|PID|1||12345||DOE^JANE||19800101|F`.
   */
  private patientFromEmbeddedPid(rawSegment: string): NormalizedPatient | undefined {
    const sep = escapeRegExp(this.properties.fieldSeparator);
    if (!rawSegment.includes(`${this.properties.fieldSeparator}PID${this.properties.fieldSeparator}`)) {
      return undefined;
    }

    const match = new RegExp(`${sep}PID${sep}(.+?)(?=${sep}[A-Z]{3}${sep}|$)`).exec(rawSegment);
    const pidData = match?.[1];
    if (pidData === undefined) {
      return undefined;
    }

    const pidFields = pidData.split(this.properties.fieldSeparator);
    if (pidFields.length < 8) {
      return undefined;
    }

    const nameField = pidFields[4] ?? '';
    const name = this.parseName(nameField ? decomposeField(nameField, this.properties) : undefined);

    return {
      ...emptyPatient(),
      patientId: pidFields[2] ?? '',
      ...name,
      dateOfBirth: parseHl7Date(pidFields[6]) ?? '',
      gender: pidFields[7] ?? '',
      metadata: {
        sourceFormat: 'HL7',
        sourceSegment: 'PID_EMBEDDED',
        rawData: { pidData },
      },
    };
  }

  private patientFromPv1(pv1: ParsedSegment): NormalizedPatient {
    let patientId = leadingText(field(pv1, 19));

    const financialClass = field(pv1, 20);
    if (financialClass?.kind === 'composite') {
      patientId = leadingText(component(financialClass, 0)) || patientId;
    }

    return {
      ...emptyPatient(),
      patientId: patientId || PV1_PATIENT_ID,
      fullName: PV1_PATIENT_NAME,
      dateOfBirth: PV1_DATE_OF_BIRTH,
      metadata: {
        sourceFormat: 'HL7',
        sourceSegment: 'PV1',
        rawData: segmentToJSON(pv1),
      },
    };
  }

  /**
   * XPN: family name in component 0, given name in component 1
   */
  private parseName(value: Value | undefined): PersonName {
    if (!value) {
      return { firstName: '', lastName: '', fullName: '' };
    }

    if (value.kind === 'composite') {
      const lastName = leadingText(component(value, 0));
      const firstName = leadingText(component(value, 1));
      return { firstName, lastName, fullName: `${firstName} ${lastName}`.trim() };
    }

    return { firstName: '', lastName: '', fullName: this.text(value) };
  }

  /**
   * XAD: street, other designation, city, state; empty parts are skipped
   */
  private parseAddress(value: Value | undefined): string {
    if (!value) return '';
    if (value.kind !== 'composite') return this.text(value);

    return value.components
      .slice(0, 4)
      .map((part) => leadingText(part))
      .filter((part) => part.length > 0)
      .join(', ');
  }

  /**
   * XTN: formatted number (XTN.1), else area code + local number (XTN.6, XTN.7)
   */
  private parsePhone(value: Value | undefined): string {
    if (!value) return '';
    if (value.kind !== 'composite') return this.text(value);

    const formatted = leadingText(component(value, 0));
    if (formatted) return formatted;

    return leadingText(component(value, 5)) + leadingText(component(value, 6));
  }

  // -- orders and drugs --

  private extractPrescriptionInfo(message: ParsedMessage): PrescriptionInfo[] {
    return segmentsNamed(message, 'ORC').map((orc) => {
      const prescriptionId = leadingText(field(orc, 2));
      return {
        prescriptionId,
        info: {
          prescriptionId,
          orderControl: this.text(field(orc, 1)),
          fillerOrderNumber: this.text(field(orc, 3)),
          orderStatus: this.text(field(orc, 5)),
          quantityTiming: this.text(field(orc, 7)),
          orcSegment: segmentToJSON(orc),
        },
      };
    });
  }

  /**
   * RXA-5 looks like `141^influenza, SEASONAL 36^CVX^90658^Influenza Split^CPT`:
   * the text in component 1 is preferred over the code in component 0 and
   * the alternate text in component 4.
   */
  private drugFromRxa(rxa: ParsedSegment): NormalizedDrugFact {
    const administeredCode = field(rxa, 5);
    let drugName = '';
    if (administeredCode?.kind === 'composite') {
      drugName =
        [1, 0, 4]
          .map((index) => leadingText(component(administeredCode, index)))
          .find((text) => text.length > 0) ?? '';
    } else {
      drugName = this.text(administeredCode);
    }

    const rawAdministrationDate = this.text(field(rxa, 3));
    const dosage = this.text(field(rxa, 6));

    return {
      drugName,
      dosage,
      strength: '',
      quantity: parseQuantity(dosage),
      patientId: '',
      prescriptionId: '',
      metadata: {
        sourceFormat: 'HL7',
        segmentType: 'RXA',
        administrationDate: parseHl7Date(rawAdministrationDate) ?? '',
        rawAdministrationDate,
        completionStatus: this.text(field(rxa, 21)),
        administrationInfo: this.text(field(rxa, 9)),
        rawData: segmentToJSON(rxa),
      },
    };
  }

  /**
   * RXE-1 looks like `^Aspirin^81MG^TAB`; the drug name is component 1
   */
  private drugFromRxe(rxe: ParsedSegment): NormalizedDrugFact {
    const giveCode = field(rxe, 1);
    const drugName =
      giveCode?.kind === 'composite' ? leadingText(component(giveCode, 1)) : this.text(giveCode);

    return {
      drugName,
      dosage: this.text(field(rxe, 4)),
      strength: this.text(field(rxe, 2)),
      quantity: parseQuantity(this.text(field(rxe, 5))),
      patientId: '',
      prescriptionId: '',
      metadata: {
        sourceFormat: 'HL7',
        segmentType: 'RXE',
        rawData: segmentToJSON(rxe),
      },
    };
  }

  /**
   * Original delimited text of a field value
   */
  private text(value: Value | undefined): string {
    if (!value) return '';
    switch (value.kind) {
      case 'primitive':
        return value.value;
      case 'composite':
        return value.components
          .map((part) =>
            part.kind === 'composite'
              ? part.components.map((sub) => this.text(sub)).join(this.properties.subcomponentSeparator)
              : this.text(part)
          )
          .join(this.properties.componentSeparator);
      case 'mapping':
        return '';
    }
  }
}

/**
 * Extract clinical data from a parsed HL7v2 message (convenience function)
 */
export function extractHL7ClinicalData(
  message: ParsedMessage,
  rawSegments: readonly string[] = message.rawSegments,
  properties?: Partial<HL7v2ParserProperties>
): ExtractionResult {
  return new HL7v2Extractor(properties).extract(message, rawSegments);
}
