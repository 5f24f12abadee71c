import { jest, describe, it, expect, beforeEach } from '@jest/globals';

const mockInitPool = jest.fn<(config?: object) => void>();
const mockEnsureConversionTables = jest.fn<() => Promise<void>>();

jest.mock('../../src/db/pool.js', () => ({
  initPool: (config?: object) => mockInitPool(config),
  closePool: jest.fn(),
  healthCheck: jest.fn(),
  query: jest.fn(),
  execute: jest.fn(),
  transaction: jest.fn(),
  withRetry: jest.fn(),
}));

jest.mock('../../src/db/SchemaManager.js', () => ({
  ensureConversionTables: () => mockEnsureConversionTables(),
  verifyConversionSchema: jest.fn(),
}));

import {
  ConversionManager,
  createConversionManager,
  getParser,
  HL7v2DataType,
  XMLDataType,
} from '../../src/index.js';

describe('createConversionManager', () => {
  beforeEach(() => {
    mockInitPool.mockReset();
    mockEnsureConversionTables.mockReset();
    mockEnsureConversionTables.mockResolvedValue(undefined);
  });

  it('should open the pool and create tables before returning a manager', async () => {
    const config = {
      host: 'localhost',
      port: 3306,
      database: 'clinical_converter',
      user: 'root',
      password: 'test-secret',
    };

    const manager = await createConversionManager(config);

    expect(manager).toBeInstanceOf(ConversionManager);
    expect(mockInitPool).toHaveBeenCalledWith(config);
    expect(mockEnsureConversionTables).toHaveBeenCalledTimes(1);
  });

  it('should fail when the tables cannot be created', async () => {
    mockEnsureConversionTables.mockRejectedValueOnce(new Error('Access denied'));

    await expect(createConversionManager()).rejects.toThrow('Access denied');
  });
});

describe('package exports', () => {
  it('should expose both parsers', () => {
    expect(getParser('HL7')).toBeInstanceOf(HL7v2DataType);
    expect(getParser('XML')).toBeInstanceOf(XMLDataType);
  });
});
