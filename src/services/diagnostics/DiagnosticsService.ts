import { PathsConfig } from '../../config/types.js';
import { FileOperations } from '../files/fileOperations.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export type LibraryDirectory = 'downloads' | 'movies' | 'tv' | 'anime' | 'music' | 'other';

export const CHECKED_DIRECTORIES: readonly LibraryDirectory[] = ['downloads', 'movies', 'tv', 'anime', 'music', 'other'];

export interface DirectoryCheck {
  name: LibraryDirectory;
  path: string;
  accessible: boolean;
  /** bytes; only for accessible directories */
  freeBytes?: number;
}

export interface DiagnosticsReport {
  directories: DirectoryCheck[];
  metadataLookups: boolean;
}

/**
 * Read-only health check behind /test. Never creates a missing directory.
 */
export class DiagnosticsService {
  constructor(
    private readonly paths: PathsConfig,
    private readonly files: FileOperations,
    private readonly metadataLookups: boolean
  ) {}

  async run(): Promise<DiagnosticsReport> {
    const directories: DirectoryCheck[] = [];
    for (const name of CHECKED_DIRECTORIES) {
      directories.push(await this.checkDirectory(name, this.paths[name]));
    }
    return { directories, metadataLookups: this.metadataLookups };
  }

  private async checkDirectory(name: LibraryDirectory, directory: string): Promise<DirectoryCheck> {
    if (!(await this.files.isWritableDirectory(directory))) {
      return { name, path: directory, accessible: false };
    }
    try {
      return { name, path: directory, accessible: true, freeBytes: await this.files.freeSpace(directory) };
    } catch (error) {
      logger.warn('[DiagnosticsService] Free space unavailable', {
        service: 'DiagnosticsService',
        operation: 'checkDirectory',
        directory,
        error: getErrorMessage(error),
      });
      return { name, path: directory, accessible: false };
    }
  }
}
