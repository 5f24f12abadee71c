/**
 * Conversion Processor
 *
 * Drives one conversion through validate -> parse -> extract -> persist ->
 * status update. Failures end the conversion in FAILED and are reported in
 * the returned outcome; nothing is retried.
 */

import type { ClinicalParser } from '../datatypes/ClinicalParser.js';
import { errorCodeOf, errorMessageOf } from '../datatypes/errors.js';
import type { ConversionRepository } from '../db/ConversionRepository.js';
import { getLogger, registerComponent } from '../logging/index.js';
import {
  type ConversionOutcome,
  type ConvertedPayload,
  ConversionStatus,
} from '../model/Conversion.js';
import { DataValidator } from '../util/DataValidator.js';

registerComponent('conversion', 'Conversion pipeline');
const logger = getLogger('conversion');

export interface ConversionProcessorOptions {
  /** Millisecond clock; Date.now by default */
  now?: () => number;
}

export class ConversionProcessor {
  private readonly now: () => number;

  constructor(
    private readonly repository: ConversionRepository,
    options: ConversionProcessorOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async process<TParsed>(
    conversionId: string,
    sourceData: string,
    parser: ClinicalParser<TParsed>
  ): Promise<ConversionOutcome> {
    const startTime = this.now();
    const elapsedSeconds = (): number => (this.now() - startTime) / 1000;

    try {
      logger.info(`Conversion started: ${conversionId} (${parser.conversionType})`);
      await this.repository.updateConversionStatus(conversionId, ConversionStatus.PROCESSING);

      parser.assertValid(sourceData);

      const parsed = parser.parse(sourceData);
      logger.debug(`Data processing: ${conversionId} - parsing_completed`, {
        dataSize: sourceData.length,
      });

      const extraction = parser.extractClinicalData(parsed);
      logger.debug(`Data processing: ${conversionId} - drug_extraction_completed`, {
        drugRecordsCount: extraction.drugRecords.length,
        patientsCount: extraction.patients.length,
      });

      extraction.drugRecords.forEach((drug, index) => {
        for (const problem of DataValidator.validateDrugRecord(drug)) {
          logger.warn(`Validation error for ${conversionId}: drug record ${index + 1}: ${problem}`);
        }
      });

      const saved = await this.repository.createDrugRecords(conversionId, extraction);
      const parsedData = parser.toJSON(parsed);

      const payload: ConvertedPayload = {
        parsedData,
        drugRecordsCount: saved.length,
        patientsCount: extraction.patients.length,
        processingTime: elapsedSeconds(),
      };
      await this.repository.updateConversionStatus(conversionId, ConversionStatus.COMPLETED, payload);

      const duration = elapsedSeconds();
      logger.info(
        `Conversion completed: ${conversionId} (${ConversionStatus.COMPLETED}) - Duration: ${duration.toFixed(2)}s`
      );

      return {
        conversionId,
        status: ConversionStatus.COMPLETED,
        drugRecordsCount: saved.length,
        patientsCount: extraction.patients.length,
        processingTime: duration,
        parsedData,
      };
    } catch (error) {
      return this.fail(conversionId, error, elapsedSeconds);
    }
  }

  private async fail(
    conversionId: string,
    error: unknown,
    elapsedSeconds: () => number
  ): Promise<ConversionOutcome> {
    const message = errorMessageOf(error);

    try {
      await this.repository.updateConversionStatus(
        conversionId,
        ConversionStatus.FAILED,
        undefined,
        message
      );
    } catch (statusError) {
      logger.error(
        `Could not record failure for ${conversionId}: ${errorMessageOf(statusError)}`,
        statusError instanceof Error ? statusError : undefined
      );
    }

    const duration = elapsedSeconds();
    logger.error(
      `Conversion error: ${conversionId} - ${message}`,
      error instanceof Error ? error : undefined
    );
    logger.info(
      `Conversion completed: ${conversionId} (${ConversionStatus.FAILED}) - Duration: ${duration.toFixed(2)}s`
    );

    return {
      conversionId,
      status: ConversionStatus.FAILED,
      error: message,
      errorCode: errorCodeOf(error),
      processingTime: duration,
    };
  }
}
