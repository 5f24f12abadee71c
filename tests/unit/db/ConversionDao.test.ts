import { jest, describe, it, expect, beforeEach } from '@jest/globals';

const mockQuery = jest.fn<(sql: string, params?: Record<string, unknown>) => Promise<object[]>>();
const mockExecute =
  jest.fn<(sql: string, params?: Record<string, unknown>) => Promise<{ affectedRows: number; insertId: number }>>();
const mockTransaction = jest.fn<() => void>();

// Transaction connections route through the same fakes as the pool
jest.mock('../../../src/db/pool.js', () => ({
  query: (sql: string, params?: Record<string, unknown>) => mockQuery(sql, params),
  execute: (sql: string, params?: Record<string, unknown>) => mockExecute(sql, params),
  transaction: (callback: (connection: unknown) => Promise<unknown>) => {
    mockTransaction();
    return callback({
      query: async (sql: string, params?: Record<string, unknown>) => [await mockQuery(sql, params)],
      execute: async (sql: string, params?: Record<string, unknown>) => [await mockExecute(sql, params)],
    });
  },
  withRetry: <T>(fn: () => Promise<T>) => fn(),
}));

import { MySqlConversionRepository, parseJsonColumn } from '../../../src/db/ConversionDao.js';
import {
  ConversionNotFoundError,
  PersistenceError,
} from '../../../src/datatypes/errors.js';
import { emptyPatient } from '../../../src/model/ClinicalData.js';
import type { NormalizedDrugFact, NormalizedPatient } from '../../../src/model/ClinicalData.js';
import { ConversionStatus } from '../../../src/model/Conversion.js';

const CREATED_AT = new Date('2024-01-15T10:30:00.000Z');

function conversionRow(overrides: Record<string, unknown> = {}): object {
  return {
    conversion_id: 'conv-1',
    conversion_type: 'HL7',
    source_data: 'MSH|^~\\&|APP',
    status: 'PENDING',
    converted_data: '{}',
    error_message: '',
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    drug_records_count: '0',
    ...overrides,
  };
}

function patient(overrides: Partial<NormalizedPatient> = {}): NormalizedPatient {
  return { ...emptyPatient({ sourceFormat: 'XML' }), patientId: 'P1', ...overrides };
}

function drug(overrides: Partial<NormalizedDrugFact> = {}): NormalizedDrugFact {
  return {
    drugName: 'Aspirin',
    dosage: '81mg',
    strength: '',
    quantity: 30,
    patientId: 'P1',
    prescriptionId: 'RX1',
    metadata: { sourceFormat: 'XML' },
    ...overrides,
  };
}

describe('MySqlConversionRepository', () => {
  let repository: MySqlConversionRepository;

  beforeEach(() => {
    jest.clearAllMocks();
    mockQuery.mockReset();
    mockExecute.mockReset();
    repository = new MySqlConversionRepository();
  });

  describe('createConversion', () => {
    it('should insert a PENDING row and return it', async () => {
      mockExecute.mockResolvedValueOnce({ affectedRows: 1, insertId: 7 });
      mockQuery.mockResolvedValueOnce([conversionRow()]);

      const record = await repository.createConversion('conv-1', 'HL7', 'MSH|^~\\&|APP');

      expect(mockExecute).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO data_conversions'), {
        conversionId: 'conv-1',
        conversionType: 'HL7',
        sourceData: 'MSH|^~\\&|APP',
        status: ConversionStatus.PENDING,
      });
      expect(record).toEqual({
        conversionId: 'conv-1',
        conversionType: 'HL7',
        sourceData: 'MSH|^~\\&|APP',
        status: ConversionStatus.PENDING,
        convertedData: {},
        errorMessage: '',
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        drugRecordsCount: 0,
      });
    });

    it('should wrap driver failures', async () => {
      mockExecute.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      const attempt = repository.createConversion('conv-1', 'HL7', 'MSH|^~\\&|APP');

      await expect(attempt).rejects.toThrow(PersistenceError);
      await expect(attempt).rejects.toThrow('Failed to create conversion: connect ECONNREFUSED');
    });
  });

  describe('updateConversionStatus', () => {
    it('should store converted data as JSON', async () => {
      mockExecute.mockResolvedValueOnce({ affectedRows: 1, insertId: 0 });

      await repository.updateConversionStatus('conv-1', ConversionStatus.COMPLETED, { drugRecordsCount: 2 });

      expect(mockExecute).toHaveBeenCalledWith(expect.stringContaining('COALESCE(:convertedData, converted_data)'), {
        conversionId: 'conv-1',
        status: ConversionStatus.COMPLETED,
        convertedData: '{"drugRecordsCount":2}',
        errorMessage: null,
      });
    });

    it('should keep existing data when none or empty is given', async () => {
      mockExecute.mockResolvedValueOnce({ affectedRows: 1, insertId: 0 });

      await repository.updateConversionStatus('conv-1', ConversionStatus.FAILED, {}, '');

      expect(mockExecute.mock.calls[0]?.[1]).toEqual({
        conversionId: 'conv-1',
        status: ConversionStatus.FAILED,
        convertedData: null,
        errorMessage: null,
      });
    });

    it('should throw when no conversion matches', async () => {
      mockExecute.mockResolvedValueOnce({ affectedRows: 0, insertId: 0 });

      await expect(
        repository.updateConversionStatus('missing', ConversionStatus.PROCESSING)
      ).rejects.toThrow(ConversionNotFoundError);
    });
  });

  describe('getConversion', () => {
    it('should return null when missing', async () => {
      mockQuery.mockResolvedValueOnce([]);
      expect(await repository.getConversion('missing')).toBeNull();
    });

    it('should map stored values', async () => {
      mockQuery.mockResolvedValueOnce([
        conversionRow({
          conversion_type: 'xml',
          status: 'FAILED',
          converted_data: 'not json',
          error_message: null,
          drug_records_count: 3,
        }),
      ]);

      const record = await repository.getConversion('conv-1');

      expect(record).toMatchObject({
        conversionType: 'XML',
        status: ConversionStatus.FAILED,
        convertedData: {},
        errorMessage: '',
        drugRecordsCount: 3,
      });
    });

    it('should reject unknown stored types', async () => {
      mockQuery.mockResolvedValueOnce([conversionRow({ conversion_type: 'JSON' })]);

      await expect(repository.getConversion('conv-1')).rejects.toThrow(
        'Unknown conversion type in storage: JSON'
      );
    });
  });

  describe('createDrugRecords', () => {
    it('should store patients then drugs linked by patient id in one transaction', async () => {
      mockQuery.mockResolvedValueOnce([{ id: 42 }]).mockResolvedValueOnce([]);
      mockExecute
        .mockResolvedValueOnce({ affectedRows: 1, insertId: 5 })
        .mockResolvedValueOnce({ affectedRows: 1, insertId: 100 })
        .mockResolvedValueOnce({ affectedRows: 1, insertId: 101 });

      const stored = await repository.createDrugRecords('conv-1', {
        patients: [patient({ firstName: 'Ann', lastName: 'Lee' })],
        drugRecords: [drug(), drug({ drugName: 'Ibuprofen', patientId: 'OTHER', quantity: null })],
      });

      expect(mockTransaction).toHaveBeenCalledTimes(1);
      expect(mockExecute.mock.calls[0]?.[1]).toMatchObject({
        patientId: 'P1',
        fullName: 'Ann Lee',
        dateOfBirth: null,
        age: null,
        metadata: '{"sourceFormat":"XML"}',
      });
      expect(mockExecute.mock.calls[1]?.[1]).toEqual({
        conversionRowId: 42,
        patientRecordId: 5,
        drugName: 'Aspirin',
        dosage: '81mg',
        strength: '',
        quantity: 30,
        originalPatientId: 'P1',
        prescriptionId: 'RX1',
        metadata: '{"sourceFormat":"XML"}',
      });
      expect(stored.map((r) => [r.id, r.drugName, r.patientRecordId, r.originalPatientId])).toEqual([
        [100, 'Aspirin', 5, 'P1'],
        [101, 'Ibuprofen', null, 'OTHER'],
      ]);
      expect(stored[0]?.conversionId).toBe('conv-1');
    });

    it('should throw when the conversion does not exist', async () => {
      mockQuery.mockResolvedValueOnce([]);

      await expect(
        repository.createDrugRecords('missing', { patients: [], drugRecords: [drug()] })
      ).rejects.toThrow(ConversionNotFoundError);
      expect(mockExecute).not.toHaveBeenCalled();
    });

    it('should wrap insert failures', async () => {
      mockQuery.mockResolvedValueOnce([{ id: 42 }]);
      mockExecute.mockRejectedValueOnce(new Error("Data too long for column 'drug_name'"));

      await expect(
        repository.createDrugRecords('conv-1', { patients: [], drugRecords: [drug()] })
      ).rejects.toThrow("Failed to create drug records: Data too long for column 'drug_name'");
    });
  });

  describe('getOrCreatePatient', () => {
    const existingRow = {
      id: 3,
      patient_id: 'P1',
      first_name: 'Ann',
      last_name: 'Lee',
      full_name: 'Ann Lee',
      age: null,
      gender: 'F',
      date_of_birth: '1982-03-04',
      address: null,
      phone_number: null,
      metadata: '{}',
    };

    it('should not store patients without an id', async () => {
      expect(await repository.getOrCreatePatient(patient({ patientId: '' }))).toBeNull();
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it('should update only the changed non-empty fields', async () => {
      mockQuery.mockResolvedValueOnce([existingRow]);
      mockExecute.mockResolvedValueOnce({ affectedRows: 1, insertId: 0 });

      const stored = await repository.getOrCreatePatient(
        patient({ firstName: 'Ann', lastName: 'Lee', fullName: 'Ann Lee', phoneNumber: '555-0101', age: 42 })
      );

      expect(mockExecute).toHaveBeenCalledWith(
        'UPDATE patients SET age = :age, phone_number = :phoneNumber WHERE id = :id',
        { id: 3, age: 42, phoneNumber: '555-0101' }
      );
      expect(stored).toMatchObject({
        id: 3,
        patientId: 'P1',
        gender: 'F',
        dateOfBirth: '1982-03-04',
        phoneNumber: '555-0101',
        age: 42,
      });
    });

    it('should leave an unchanged patient alone', async () => {
      mockQuery.mockResolvedValueOnce([existingRow]);

      const stored = await repository.getOrCreatePatient(patient({ firstName: 'Ann', gender: 'F' }));

      expect(mockExecute).not.toHaveBeenCalled();
      expect(stored?.id).toBe(3);
      expect(stored?.address).toBe('');
    });
  });

  describe('getDrugRecordsByConversion', () => {
    it('should map rows', async () => {
      mockQuery.mockResolvedValueOnce([
        {
          id: 100,
          conversion_id: 'conv-1',
          patient_id: null,
          drug_name: 'Aspirin',
          dosage: null,
          strength: '81',
          quantity: 30,
          original_patient_id: null,
          prescription_id: 'RX1',
          metadata: '{"segmentType":"RXE"}',
        },
      ]);

      expect(await repository.getDrugRecordsByConversion('conv-1')).toEqual([
        {
          id: 100,
          conversionId: 'conv-1',
          patientRecordId: null,
          drugName: 'Aspirin',
          dosage: '',
          strength: '81',
          quantity: 30,
          originalPatientId: '',
          prescriptionId: 'RX1',
          metadata: { segmentType: 'RXE' },
        },
      ]);
    });
  });
});

describe('parseJsonColumn', () => {
  it('should parse stored objects', () => {
    expect(parseJsonColumn('{"a":"b"}')).toEqual({ a: 'b' });
  });

  it('should read anything else as an empty object', () => {
    expect(parseJsonColumn(null)).toEqual({});
    expect(parseJsonColumn('')).toEqual({});
    expect(parseJsonColumn('[1,2]')).toEqual({});
    expect(parseJsonColumn('{broken')).toEqual({});
  });
});
