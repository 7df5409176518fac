/**
 * File moves into the library.
 *
 * Renames and moves are idempotent, so they run under the filesystem retry
 * policy. Node errors are translated into the FileSystemError family.
 */

import path from 'path';
import { statfs } from 'fs/promises';
import fs from 'fs-extra';
import { logger } from '../../middleware/logging.js';
import {
  ErrorCode,
  FileNotFoundError,
  FileSystemError,
  FILESYSTEM_RETRY_POLICY,
  PermissionError,
  RetryPolicy,
  RetryStrategy,
  StorageError,
  TRANSIENT_FS_CODES,
} from '../../errors/index.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';

export class FileOperations {
  private readonly retryStrategy: RetryStrategy;

  constructor(policy: Partial<RetryPolicy> = {}) {
    this.retryStrategy = new RetryStrategy({ ...FILESYSTEM_RETRY_POLICY, ...policy });
  }

  async ensureDir(directory: string): Promise<void> {
    try {
      await fs.ensureDir(directory);
    } catch (error) {
      throw convertFsError(error, directory, 'ensureDir');
    }
  }

  /**
   * Rename within a directory. Fails if the destination exists.
   */
  async rename(source: string, destination: string): Promise<void> {
    await this.retryStrategy.execute(async () => {
      if (await fs.pathExists(destination)) {
        throw new FileSystemError(
          `Destination already exists: ${destination}`,
          ErrorCode.FS_WRITE_FAILED,
          destination,
          false,
          { service: 'FileOperations', operation: 'rename' }
        );
      }
      try {
        await fs.rename(source, destination);
      } catch (error) {
        throw convertFsError(error, source, 'rename');
      }
    }, `rename ${path.basename(source)}`);
  }

  /**
   * Move across directories or devices, creating the destination
   * directory first. Never overwrites.
   */
  async move(source: string, destination: string): Promise<void> {
    await this.ensureDir(path.dirname(destination));
    await this.retryStrategy.execute(async () => {
      try {
        await fs.move(source, destination, { overwrite: false });
      } catch (error) {
        throw convertFsError(error, source, 'move');
      }
    }, `move ${path.basename(source)}`);

    logger.debug('[FileOperations] Moved file', {
      service: 'FileOperations',
      operation: 'move',
      source,
      destination,
    });
  }

  /**
   * Delete a partial download. Missing files are fine; other failures are
   * logged and reported as false.
   */
  async removePartial(filePath: string): Promise<boolean> {
    try {
      await fs.remove(filePath);
      return true;
    } catch (error) {
      logger.warn('[FileOperations] Could not remove partial file', {
        service: 'FileOperations',
        operation: 'removePartial',
        filePath,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  async exists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  /**
   * True for an existing directory this process can read and write
   */
  async isWritableDirectory(directory: string): Promise<boolean> {
    try {
      const stats = await fs.stat(directory);
      if (!stats.isDirectory()) {
        return false;
      }
      await fs.access(directory, fs.constants.R_OK | fs.constants.W_OK);
      return true;
    } catch (error) {
      logger.debug('[FileOperations] Directory not accessible', {
        service: 'FileOperations',
        operation: 'isWritableDirectory',
        directory,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  async freeSpace(directory: string): Promise<number> {
    await this.ensureDir(directory);
    try {
      const stats = await statfs(directory);
      return stats.bavail * stats.bsize;
    } catch (error) {
      throw convertFsError(error, directory, 'freeSpace');
    }
  }

  /**
   * Throws StorageError when `directory` cannot hold `requiredBytes`
   */
  async assertFreeSpace(directory: string, requiredBytes: number): Promise<void> {
    const available = await this.freeSpace(directory);
    if (available < requiredBytes) {
      throw new StorageError(directory, requiredBytes, available, {
        service: 'FileOperations',
        operation: 'assertFreeSpace',
      });
    }
  }

  /**
   * Media files directly inside `directory`, by name
   */
  async listMediaFiles(directory: string, extensions: readonly string[]): Promise<string[]> {
    if (!(await fs.pathExists(directory))) {
      return [];
    }
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase()))
      .map(entry => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }
}

export function convertFsError(error: unknown, filePath: string, operation: string): Error {
  const code = getErrorCode(error);
  const context = { service: 'FileOperations', operation, metadata: { code } };

  switch (code) {
    case 'ENOENT':
      return new FileNotFoundError(filePath, undefined, context);
    case 'EACCES':
    case 'EPERM':
      return new PermissionError(filePath, operation, undefined, context);
    case 'ENOSPC':
      return new FileSystemError(`No space left while writing ${filePath}`, ErrorCode.FS_STORAGE_FULL, filePath, false, context, toError(error));
    default:
      return new FileSystemError(
        `${operation} failed for ${filePath}: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        filePath,
        code !== undefined && TRANSIENT_FS_CODES.has(code),
        context,
        toError(error)
      );
  }
}
