/**
 * Conversion Manager
 *
 * Entry point for callers: create a conversion, process it with the parser
 * for its stored type, and report its status.
 */

import { v4 as uuidv4 } from 'uuid';
import { getParser } from '../datatypes/ParserFactory.js';
import { ConversionNotFoundError, ValidationError } from '../datatypes/errors.js';
import type { ConversionRepository } from '../db/ConversionRepository.js';
import { getLogger, registerComponent } from '../logging/index.js';
import {
  type ConversionOutcome,
  type ConversionStatusSummary,
  type ConversionType,
  ConversionStatus,
  isConversionType,
} from '../model/Conversion.js';
import { DataValidator } from '../util/DataValidator.js';
import { ConversionProcessor } from './ConversionProcessor.js';

registerComponent('conversion', 'Conversion pipeline');
const logger = getLogger('conversion');

export class ConversionManager {
  private readonly processor: ConversionProcessor;

  constructor(
    private readonly repository: ConversionRepository,
    processor?: ConversionProcessor
  ) {
    this.processor = processor ?? new ConversionProcessor(repository);
  }

  /**
   * Validate and store a PENDING conversion.
   * @returns the new conversion id
   * @throws ValidationError listing every problem found
   */
  async createConversion(conversionType: string, sourceData: string): Promise<string> {
    const errors = DataValidator.validateConversionData(conversionType, sourceData);
    const type = conversionType.toUpperCase();

    if (errors.length > 0 || !isConversionType(type)) {
      for (const error of errors) {
        logger.warn(`Validation error for new ${conversionType} conversion: ${error}`);
      }
      throw new ValidationError(`Validation failed: ${errors.join('; ')}`, {
        format: isConversionType(type) ? type : undefined,
        errors,
      });
    }

    const conversionId = uuidv4();
    await this.repository.createConversion(conversionId, type, sourceData);
    logger.debug(`Conversion created: ${conversionId} (${type})`);
    return conversionId;
  }

  /**
   * @throws ConversionNotFoundError
   */
  async processConversion(conversionId: string): Promise<ConversionOutcome> {
    const conversion = await this.repository.getConversion(conversionId);
    if (!conversion) {
      throw new ConversionNotFoundError(conversionId);
    }

    return this.processor.process(
      conversionId,
      conversion.sourceData,
      getParser(conversion.conversionType)
    );
  }

  /**
   * Create and process in one call
   */
  async convert(conversionType: ConversionType, sourceData: string): Promise<ConversionOutcome> {
    const conversionId = await this.createConversion(conversionType, sourceData);
    return this.processConversion(conversionId);
  }

  async getConversionStatus(conversionId: string): Promise<ConversionStatusSummary | null> {
    const conversion = await this.repository.getConversion(conversionId);
    if (!conversion) {
      return null;
    }

    return {
      conversionId: conversion.conversionId,
      status: conversion.status,
      conversionType: conversion.conversionType,
      createdAt: conversion.createdAt.toISOString(),
      updatedAt: conversion.updatedAt.toISOString(),
      drugRecordsCount: conversion.drugRecordsCount,
      errorMessage: conversion.status === ConversionStatus.FAILED ? conversion.errorMessage : null,
    };
  }
}
