/**
 * Clinical fact extraction from a normalized XML tree.
 *
 * Two passes run over the same tree and their results are concatenated:
 * a keyword heuristic over arbitrary nesting, and a walk over the
 * prescription/patient/medication layout.
 */

import {
  type ExtractionResult,
  type NormalizedDrugFact,
  type NormalizedPatient,
  emptyPatient,
  parseQuantity,
} from '../../model/ClinicalData.js';
import {
  type JsonObject,
  type MappingValue,
  first,
  toList,
  valueToJSON,
} from '../../model/Value.js';
import { parseHl7Date } from '../hl7v2/HL7v2Date.js';
import { ATTRIBUTES_KEY } from './XMLNormalizer.js';

const DRUG_FIELDS = ['name', 'dosage', 'strength', 'quantity'];
const DRUG_KEYWORDS = ['drug', 'medication', 'medicine'];

const DRUG_NAME_FIELDS = ['name', 'drug_name', 'medication_name'];
const DOSAGE_FIELDS = ['dosage', 'dose'];
const STRENGTH_FIELDS = ['strength', 'potency'];
const DRUG_PRESCRIPTION_ID_FIELDS = ['prescription_id', 'id'];

const PATIENT_ID_FIELDS = ['id', 'patient_id'];
const DATE_OF_BIRTH_FIELDS = ['date_of_birth', 'dob'];
const PHONE_FIELDS = ['phone', 'phone_number'];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function childMapping(map: MappingValue, key: string): MappingValue | undefined {
  const value = first(map.entries.get(key));
  return value?.kind === 'mapping' ? value : undefined;
}

function childMappings(map: MappingValue | undefined, key: string): MappingValue[] {
  if (!map) return [];
  return toList(map.entries.get(key)).filter(
    (value): value is MappingValue => value.kind === 'mapping'
  );
}

/**
 * Text of a child element, falling back to an attribute of the same name.
 */
export function fieldText(map: MappingValue, key: string): string {
  const value = first(map.entries.get(key));
  if (value?.kind === 'primitive') {
    return value.value.trim();
  }

  const attributes = childMapping(map, ATTRIBUTES_KEY);
  const attribute = attributes ? first(attributes.entries.get(key)) : undefined;
  return attribute?.kind === 'primitive' ? attribute.value.trim() : '';
}

function firstText(map: MappingValue, keys: readonly string[]): string {
  for (const key of keys) {
    const text = fieldText(map, key);
    if (text) return text;
  }
  return '';
}

function toJsonObject(map: MappingValue): JsonObject {
  const json = valueToJSON(map);
  return typeof json === 'object' && json !== null && !Array.isArray(json) ? json : {};
}

/**
 * ISO dates pass through; HL7 compact dates are converted.
 */
function normalizeDate(value: string): string {
  if (!value) return '';
  if (ISO_DATE.test(value)) return value;
  return parseHl7Date(value) ?? '';
}

export class XMLExtractor {
  extract(tree: MappingValue): ExtractionResult {
    const genericDrugs: NormalizedDrugFact[] = [];
    this.scan(tree, genericDrugs);

    const schema = this.walkPrescriptions(tree);

    return {
      patients: schema.patients,
      drugRecords: [...genericDrugs, ...schema.drugRecords].filter((drug) => drug.drugName !== ''),
    };
  }

  /**
   * Keyword heuristic: a mapping is a drug record when it has a drug field,
   * mentions a drug keyword anywhere in its content and is not a patient
   * wrapper. Items of repeated entries are recursed into without being
   * classified themselves.
   */
  private scan(map: MappingValue, out: NormalizedDrugFact[]): void {
    for (const entry of map.entries.values()) {
      if (entry.kind === 'one') {
        const value = entry.value;
        if (value.kind !== 'mapping') continue;

        if (this.isDrugRecord(value)) {
          out.push(this.normalizeDrug(value));
        } else {
          this.scan(value, out);
        }
      } else {
        for (const item of entry.values) {
          if (item.kind === 'mapping') {
            this.scan(item, out);
          }
        }
      }
    }
  }

  private isDrugRecord(map: MappingValue): boolean {
    if (!DRUG_FIELDS.some((field) => map.entries.has(field))) {
      return false;
    }
    if (map.entries.has('patient_id')) {
      return false;
    }
    const serialized = JSON.stringify(valueToJSON(map)).toLowerCase();
    return DRUG_KEYWORDS.some((keyword) => serialized.includes(keyword));
  }

  private walkPrescriptions(tree: MappingValue): ExtractionResult {
    const patients: NormalizedPatient[] = [];
    const drugRecords: NormalizedDrugFact[] = [];

    const container = childMapping(tree, 'prescriptions');
    const prescriptions = container
      ? childMappings(container, 'prescription')
      : childMappings(tree, 'prescription');

    for (const prescription of prescriptions) {
      const patientData = childMapping(prescription, 'patient');
      const patient = patientData ? this.normalizePatient(patientData) : undefined;

      if (patient && patient.patientId) {
        patients.push(patient);
      }

      const medications = [
        ...childMappings(prescription, 'medication'),
        ...childMappings(childMapping(prescription, 'medications'), 'medication'),
      ];

      for (const medication of medications) {
        drugRecords.push(this.normalizeDrug(medication, patient, prescription));
      }
    }

    return { patients, drugRecords };
  }

  private normalizeDrug(
    data: MappingValue,
    patient?: NormalizedPatient,
    prescription?: MappingValue
  ): NormalizedDrugFact {
    const metadata: JsonObject = {
      sourceFormat: 'XML',
      rawData: toJsonObject(data),
    };

    const embeddedPatient = childMapping(data, 'patient');
    if (patient) {
      metadata.patientInfo = patient.metadata.rawData ?? {};
    } else if (embeddedPatient) {
      metadata.patientInfo = toJsonObject(embeddedPatient);
    }

    if (prescription) {
      metadata.prescriptionInfo = toJsonObject(prescription);
    }

    return {
      drugName: firstText(data, DRUG_NAME_FIELDS),
      dosage: firstText(data, DOSAGE_FIELDS),
      strength: firstText(data, STRENGTH_FIELDS),
      quantity: parseQuantity(fieldText(data, 'quantity') || undefined),
      patientId:
        fieldText(data, 'patient_id') ||
        patient?.patientId ||
        (embeddedPatient ? firstText(embeddedPatient, PATIENT_ID_FIELDS) : ''),
      prescriptionId:
        firstText(data, DRUG_PRESCRIPTION_ID_FIELDS) ||
        (prescription ? fieldText(prescription, 'id') : ''),
      metadata,
    };
  }

  private normalizePatient(data: MappingValue): NormalizedPatient {
    const patient = emptyPatient({
      sourceFormat: 'XML',
      rawData: toJsonObject(data),
    });

    patient.patientId = firstText(data, PATIENT_ID_FIELDS);

    const fullName = fieldText(data, 'name');
    patient.fullName = fullName;
    // a single-word name stays in fullName only
    const space = fullName.indexOf(' ');
    if (space !== -1) {
      patient.firstName = fullName.slice(0, space);
      patient.lastName = fullName.slice(space + 1).trim();
    }
    patient.firstName = fieldText(data, 'first_name') || patient.firstName;
    patient.lastName = fieldText(data, 'last_name') || patient.lastName;

    patient.dateOfBirth = normalizeDate(firstText(data, DATE_OF_BIRTH_FIELDS));
    patient.gender = fieldText(data, 'gender');
    patient.address = fieldText(data, 'address');
    patient.phoneNumber = firstText(data, PHONE_FIELDS);
    patient.age = parseQuantity(fieldText(data, 'age') || undefined);

    return patient;
  }
}

/**
 * Convenience function for one-off extraction
 */
export function extractXMLClinicalData(tree: MappingValue): ExtractionResult {
  return new XMLExtractor().extract(tree);
}
