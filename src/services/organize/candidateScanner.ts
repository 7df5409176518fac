import path from 'path';
import { OrganizeCandidate } from '../../types/session.js';
import { FileOperations } from '../files/fileOperations.js';
import { OrganizedRecordService } from '../records/OrganizedRecordService.js';

export interface CandidateScanOptions {
  directories: readonly string[];
  extensions: readonly string[];
  /** absolute paths that must not be offered, e.g. files still downloading */
  exclude?: ReadonlySet<string>;
}

/**
 * Media files in the given directories that no placement record covers yet.
 * Keys are stable only within one scan.
 */
export async function scanCandidates(
  files: FileOperations,
  records: OrganizedRecordService,
  options: CandidateScanOptions
): Promise<OrganizeCandidate[]> {
  const organized = await records.organizedNames();
  const excluded = new Set([...(options.exclude ?? [])].map(p => path.resolve(p)));
  const candidates: OrganizeCandidate[] = [];

  for (const directory of options.directories) {
    for (const name of await files.listMediaFiles(directory, options.extensions)) {
      const fullPath = path.join(directory, name);
      if (organized.has(name) || excluded.has(path.resolve(fullPath))) {
        continue;
      }
      candidates.push({ key: String(candidates.length), path: fullPath, name });
    }
  }

  return candidates;
}
