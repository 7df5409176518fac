import path from 'path';
import { ProcessingOutcome } from '../../types/download.js';
import { ClassificationResult, PlacementMetadata } from '../../types/media.js';
import { ClassificationError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { MetadataClassifier } from './MetadataClassifier.js';
import { ConfidenceGate } from './confidenceGate.js';
import { parseFilename } from './filenameParser.js';
import { OrganizeService } from '../organize/OrganizeService.js';
import { LowConfidenceLog } from '../files/lowConfidenceLog.js';
import { ErrorLogService } from '../records/ErrorLogService.js';

/**
 * Anything that can turn a finished download into a placement
 */
export interface MediaProcessor {
  process(filePath: string, userId: number): Promise<ProcessingOutcome>;
}

/**
 * Classify, gate and place one downloaded file.
 *
 * A provider or file system failure leaves the file where it is and is
 * written to the error log.
 */
export class MediaProcessingService implements MediaProcessor {
  constructor(
    private readonly classifier: MetadataClassifier,
    private readonly gate: ConfidenceGate,
    private readonly organizer: OrganizeService,
    private readonly auditLog: LowConfidenceLog,
    private readonly errorLog: ErrorLogService
  ) {}

  async process(filePath: string, userId: number): Promise<ProcessingOutcome> {
    const filename = path.basename(filePath);
    const parsed = parseFilename(filename);

    try {
      let result: ClassificationResult;
      try {
        result = await this.classifier.classifyParsed(parsed);
      } catch (error) {
        if (error instanceof ClassificationError) {
          logger.info('[MediaProcessingService] No title in filename, moving to fallback', {
            service: 'MediaProcessingService',
            operation: 'process',
            filename,
          });
          const fallbackPath = await this.organizer.moveToFallback(filePath);
          return { kind: 'fallback', path: fallbackPath, reason: 'no_title' };
        }
        throw error;
      }

      const verdict =
        result.category === 'unknown'
          ? this.gate.decide(0)
          : this.gate.evaluate(parsed.title, result.title);

      logger.info('[MediaProcessingService] Classified file', {
        service: 'MediaProcessingService',
        operation: 'process',
        filename,
        category: result.category,
        providerTitle: result.title,
        score: verdict.score,
        decision: verdict.decision,
      });

      if (verdict.decision === 'reject' || result.category === 'unknown') {
        const providerTitle = result.category === 'unknown' ? '' : result.title;
        const fallbackPath = await this.organizer.moveToFallback(filePath);
        // the file has already moved; an audit failure must not report the old path
        try {
          await this.auditLog.append(filename, parsed.title, providerTitle, verdict.score);
        } catch (error) {
          logger.error('[MediaProcessingService] Could not write low-confidence audit line', {
            service: 'MediaProcessingService',
            operation: 'process',
            filename,
            error: getErrorMessage(error),
          });
        }
        return { kind: 'fallback', path: fallbackPath, reason: 'low_confidence', score: verdict.score };
      }

      const metadata: PlacementMetadata = {
        category: result.category,
        title: result.title,
        ...(result.year !== undefined && { year: result.year }),
        ...(result.season !== undefined && { season: result.season }),
        ...(result.episode !== undefined && { episode: result.episode }),
        ...(parsed.resolution !== undefined && { resolution: parsed.resolution }),
      };

      const placement = await this.organizer.place({
        sourcePath: filePath,
        metadata,
        userId,
        method: 'auto',
        rename: verdict.decision === 'accept',
      });

      return {
        kind: 'placed',
        path: placement.path,
        recordId: placement.record.id,
        title: result.title,
        renamed: placement.renamed,
        warned: verdict.decision === 'warn',
      };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('[MediaProcessingService] Processing failed', {
        service: 'MediaProcessingService',
        operation: 'process',
        filePath,
        error: message,
      });
      await this.errorLog.record({
        stage: 'processing',
        file: filePath,
        error: message,
        context: { userId, parsedTitle: parsed.title },
      });
      return { kind: 'error', message };
    }
  }
}
