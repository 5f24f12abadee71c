import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConversionManager } from '../../../src/controllers/ConversionManager.js';
import { ConversionProcessor } from '../../../src/controllers/ConversionProcessor.js';
import { ConversionNotFoundError, ValidationError } from '../../../src/datatypes/errors.js';
import { ConversionStatus } from '../../../src/model/Conversion.js';
import { InMemoryConversionRepository } from '../../helpers/InMemoryConversionRepository.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const PRESCRIPTION_XML = `<prescription id="RX001">
  <patient><id>PAT001</id><name>John Doe</name></patient>
  <medications>
    <medication><name>Aspirin</name><dosage>81mg</dosage><quantity>30</quantity></medication>
    <medication><name>Lisinopril</name><dosage>10mg</dosage><quantity>60</quantity></medication>
  </medications>
</prescription>`;

describe('ConversionManager', () => {
  let repository: InMemoryConversionRepository;
  let manager: ConversionManager;

  beforeEach(() => {
    repository = new InMemoryConversionRepository();
    manager = new ConversionManager(repository, new ConversionProcessor(repository, { now: () => 0 }));
  });

  describe('createConversion', () => {
    it('should store a PENDING conversion under a new id', async () => {
      const id = await manager.createConversion('XML', PRESCRIPTION_XML);

      expect(id).toMatch(UUID_PATTERN);
      const stored = await repository.getConversion(id);
      expect(stored?.status).toBe(ConversionStatus.PENDING);
      expect(stored?.conversionType).toBe('XML');
      expect(stored?.sourceData).toBe(PRESCRIPTION_XML);
    });

    it('should accept a lowercase conversion type', async () => {
      const id = await manager.createConversion('hl7', 'MSH|^~\\&|APP');
      expect((await repository.getConversion(id))?.conversionType).toBe('HL7');
    });

    it('should reject unsupported types', async () => {
      await expect(manager.createConversion('JSON', '{}')).rejects.toThrow(
        'Validation failed: Unsupported conversion type: JSON'
      );
      expect(repository.conversions.size).toBe(0);
    });

    it('should list every validation problem', async () => {
      try {
        await manager.createConversion('HL7', 'hello\nworld');
        throw new Error('expected createConversion to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.format).toBe('HL7');
          expect(error.errors).toEqual([
            'HL7 message must start with MSH segment',
            'Segment 1 must contain field separators (|)',
            'Segment 2 must contain field separators (|)',
          ]);
          expect(error.message).toBe(`Validation failed: ${error.errors.join('; ')}`);
        }
      }
    });

    it('should reject malformed XML before storing it', async () => {
      await expect(manager.createConversion('XML', '<invalid>xml')).rejects.toThrow(
        /^Validation failed: Invalid XML format: /
      );
      expect(repository.conversions.size).toBe(0);
    });
  });

  describe('processConversion', () => {
    it('should throw for an unknown conversion', async () => {
      await expect(manager.processConversion('missing')).rejects.toThrow(ConversionNotFoundError);
    });

    it('should use the parser for the stored type', async () => {
      const id = await manager.createConversion('XML', PRESCRIPTION_XML);
      const outcome = await manager.processConversion(id);

      expect(outcome.status).toBe(ConversionStatus.COMPLETED);
      if (outcome.status === ConversionStatus.COMPLETED) {
        expect(outcome.drugRecordsCount).toBe(2);
        expect(outcome.patientsCount).toBe(1);
      }
    });
  });

  describe('convert', () => {
    it('should create and process in one call', async () => {
      const outcome = await manager.convert('XML', PRESCRIPTION_XML);

      expect(outcome).toMatchObject({
        status: ConversionStatus.COMPLETED,
        drugRecordsCount: 2,
        patientsCount: 1,
        processingTime: 0,
      });
      const drugs = await repository.getDrugRecordsByConversion(outcome.conversionId);
      expect(drugs.map((d) => [d.drugName, d.originalPatientId, d.prescriptionId])).toEqual([
        ['Aspirin', 'PAT001', 'RX001'],
        ['Lisinopril', 'PAT001', 'RX001'],
      ]);
    });

    it('should merge a returning patient instead of duplicating it', async () => {
      await manager.convert('XML', PRESCRIPTION_XML);
      await manager.convert(
        'XML',
        '<prescription><patient><id>PAT001</id><name>John Doe</name><phone>555-0100</phone></patient></prescription>'
      );

      expect(repository.patients.size).toBe(1);
      expect(repository.patients.get('PAT001')).toMatchObject({
        id: 1,
        fullName: 'John Doe',
        phoneNumber: '555-0100',
      });
    });

    it('should end in FAILED when parsing fails', async () => {
      const outcome = await manager.convert('HL7', 'MSHX|^~\\&|APP');

      expect(outcome.status).toBe(ConversionStatus.FAILED);
      const status = await manager.getConversionStatus(outcome.conversionId);
      expect(status?.errorMessage).toBe("HL7 parsing error: First segment must be MSH, found 'MSHX'");
    });
  });

  describe('getConversionStatus', () => {
    it('should return null for an unknown conversion', async () => {
      expect(await manager.getConversionStatus('missing')).toBeNull();
    });

    it('should summarize a completed conversion', async () => {
      const outcome = await manager.convert('XML', PRESCRIPTION_XML);

      expect(await manager.getConversionStatus(outcome.conversionId)).toEqual({
        conversionId: outcome.conversionId,
        status: ConversionStatus.COMPLETED,
        conversionType: 'XML',
        createdAt: '2024-01-15T10:30:00.000Z',
        updatedAt: '2024-01-15T10:30:00.000Z',
        drugRecordsCount: 2,
        errorMessage: null,
      });
    });

    it('should report a pending conversion', async () => {
      const id = await manager.createConversion('HL7', 'MSH|^~\\&|APP');
      expect((await manager.getConversionStatus(id))?.status).toBe(ConversionStatus.PENDING);
    });
  });
});
