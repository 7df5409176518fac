import path from 'path';
import { PathsConfig } from '../../config/types.js';
import { OrganizedRecord, PlacementMetadata, PlacementMethod } from '../../types/media.js';
import { FileOperations } from '../files/fileOperations.js';
import { OrganizedRecordService } from '../records/OrganizedRecordService.js';
import { buildLibraryName, resolveTarget, uniqueDestination } from '../media/placementResolver.js';
import { logger } from '../../middleware/logging.js';
import { ErrorCode, FileNotFoundError, FileSystemError, ResourceNotFoundError } from '../../errors/index.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';

export interface PlaceRequest {
  sourcePath: string;
  metadata: PlacementMetadata;
  userId: number;
  method: PlacementMethod;
  /** false keeps the original file name */
  rename: boolean;
  /** overrides the directory derived from the metadata */
  directory?: string;
}

export interface PlacementResult {
  path: string;
  renamed: boolean;
  record: OrganizedRecord;
}

/**
 * The rename, move and record sequence shared by automatic placement,
 * the organize dialog, bulk propagation and re-organize.
 */
export class OrganizeService {
  constructor(
    private readonly paths: PathsConfig,
    private readonly files: FileOperations,
    private readonly records: OrganizedRecordService
  ) {}

  async place(request: PlaceRequest): Promise<PlacementResult> {
    const { sourcePath, metadata } = request;
    const originalName = path.basename(sourcePath);
    const targetDir = request.directory ?? resolveTarget(metadata, this.paths);
    await this.files.ensureDir(targetDir);

    let currentPath = sourcePath;
    let renamed = false;
    if (request.rename) {
      const libraryName = buildLibraryName(metadata, path.extname(sourcePath));
      if (libraryName !== originalName) {
        currentPath = await uniqueDestination(path.dirname(sourcePath), libraryName);
        await this.files.rename(sourcePath, currentPath);
        renamed = true;
      }
    }

    // Already in its target folder (re-organize of a placed file): nothing to move
    let destination = currentPath;
    if (path.resolve(path.dirname(currentPath)) !== path.resolve(targetDir)) {
      destination = await uniqueDestination(targetDir, path.basename(currentPath));
      try {
        await this.files.move(currentPath, destination);
      } catch (error) {
        if (renamed) {
          await this.restoreName(currentPath, sourcePath, error);
        }
        throw error;
      }
    }

    const record = await this.records.insert({
      path: destination,
      fileName: path.basename(destination),
      originalName,
      title: metadata.title,
      category: metadata.category,
      ...(metadata.year !== undefined && { year: metadata.year }),
      ...(metadata.season !== undefined && { season: metadata.season }),
      ...(metadata.episode !== undefined && { episode: metadata.episode }),
      ...(metadata.resolution !== undefined && { resolution: metadata.resolution }),
      userId: request.userId,
      method: request.method,
    });

    logger.info('[OrganizeService] Placed file', {
      service: 'OrganizeService',
      operation: 'place',
      source: sourcePath,
      destination,
      method: request.method,
      renamed,
      recordId: record.id,
    });

    return { path: destination, renamed, record };
  }

  /**
   * Undo the rename after a failed move. When that fails too, the error
   * names the path the file was left at.
   */
  private async restoreName(currentPath: string, sourcePath: string, moveError: unknown): Promise<void> {
    try {
      await this.files.rename(currentPath, sourcePath);
      logger.warn('[OrganizeService] Move failed, original name restored', {
        service: 'OrganizeService',
        operation: 'place',
        source: sourcePath,
        error: getErrorMessage(moveError),
      });
    } catch (error) {
      logger.error('[OrganizeService] Move failed and the original name could not be restored', {
        service: 'OrganizeService',
        operation: 'place',
        source: sourcePath,
        current: currentPath,
        error: getErrorMessage(error),
      });
      throw new FileSystemError(
        `${getErrorMessage(moveError)} (file left at ${currentPath})`,
        ErrorCode.FS_WRITE_FAILED,
        currentPath,
        false,
        { service: 'OrganizeService', operation: 'place', metadata: { source: sourcePath } },
        toError(moveError)
      );
    }
  }

  /**
   * Run the placement sequence again for a stored record, from wherever
   * its file is now. The old record is left as it is.
   */
  async reorganize(recordId: number, userId: number): Promise<PlacementResult> {
    const record = await this.records.get(recordId);
    if (!record) {
      throw new ResourceNotFoundError('organized record', recordId);
    }
    if (!(await this.files.exists(record.path))) {
      throw new FileNotFoundError(record.path, `File for record ${recordId} is no longer at ${record.path}`);
    }

    return this.place({
      sourcePath: record.path,
      metadata: {
        category: record.category,
        title: record.title,
        ...(record.year !== undefined && { year: record.year }),
        ...(record.season !== undefined && { season: record.season }),
        ...(record.episode !== undefined && { episode: record.episode }),
        ...(record.resolution !== undefined && { resolution: record.resolution }),
      },
      userId,
      method: 'manual',
      rename: true,
    });
  }

  /**
   * Move a file unmodified into the fallback directory
   */
  async moveToFallback(sourcePath: string): Promise<string> {
    const destination = await uniqueDestination(this.paths.other, path.basename(sourcePath));
    await this.files.move(sourcePath, destination);

    logger.info('[OrganizeService] Moved file to fallback directory', {
      service: 'OrganizeService',
      operation: 'moveToFallback',
      source: sourcePath,
      destination,
    });
    return destination;
  }
}
