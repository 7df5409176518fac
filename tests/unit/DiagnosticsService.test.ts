import fs from 'fs-extra';
import { DiagnosticsService } from '../../src/services/diagnostics/DiagnosticsService.js';
import { FileOperations } from '../../src/services/files/fileOperations.js';
import { diagnosticsText } from '../../src/controllers/messages.js';
import { PathsConfig } from '../../src/config/types.js';
import { makeTempDir, makeTestConfig, removeTempDir } from '../utils/fakes.js';

class FixedSpaceOperations extends FileOperations {
  async freeSpace(): Promise<number> {
    return 1536;
  }
}

describe('DiagnosticsService', () => {
  let baseDir: string;
  let paths: PathsConfig;

  beforeEach(async () => {
    baseDir = await makeTempDir();
    paths = makeTestConfig(baseDir).paths;
    for (const directory of [paths.downloads, paths.movies, paths.tv, paths.anime]) {
      await fs.ensureDir(directory);
    }
    await fs.outputFile(paths.other, 'not a directory');
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  it('should report free space for usable folders and flag the rest', async () => {
    const report = await new DiagnosticsService(paths, new FixedSpaceOperations(), false).run();

    expect(diagnosticsText(report)).toBe(
      [
        'System check',
        'Downloads: OK (1.5 KB free)',
        'Movies: OK (1.5 KB free)',
        'TV: OK (1.5 KB free)',
        'Anime: OK (1.5 KB free)',
        'Music: NOT ACCESSIBLE',
        'Other: NOT ACCESSIBLE',
        'Metadata lookups: not configured',
      ].join('\n')
    );
  });

  it('should not create a missing folder', async () => {
    const report = await new DiagnosticsService(paths, new FileOperations({ maxAttempts: 1 }), true).run();

    expect(report.directories.find(check => check.name === 'music')).toEqual({
      name: 'music',
      path: paths.music,
      accessible: false,
    });
    expect(await fs.pathExists(paths.music)).toBe(false);
    expect(report.metadataLookups).toBe(true);
  });
});
