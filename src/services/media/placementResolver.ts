import path from 'path';
import fs from 'fs-extra';
import { PathsConfig } from '../../config/types.js';
import { LIBRARY_LAYOUT } from '../../config/constants.js';
import { ClassificationResult, PlacementMetadata } from '../../types/media.js';

/**
 * Make one path component safe on every common file system
 */
export function sanitizePathComponent(name: string): string {
  const cleaned = name
    .replace(/\//g, '_')
    .replace(/:/g, ' -')
    .replace(/[<>"|?*\\]/g, '_')
    .replace(/[\x00-\x1f\x7f]/g, '')
    .replace(/^[.\s]+|[.\s]+$/g, '');
  return cleaned || LIBRARY_LAYOUT.UNNAMED;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function titleWithYear(title: string, year?: number): string {
  return year !== undefined ? `${title} (${year})` : title;
}

function seasonFolder(season: number | undefined): string {
  return `${LIBRARY_LAYOUT.SEASON_PREFIX} ${pad(season ?? 1)}`;
}

/**
 * Library-style file name:
 * movie `Title (Year)`, tv `Title - SNNENN`, anime episode `Title - Episode N`,
 * followed by ` [resolution]` when known
 */
export function buildLibraryName(metadata: PlacementMetadata, extension: string): string {
  let base: string;
  if (metadata.category === 'anime' && metadata.episode !== undefined) {
    base = `${metadata.title} - Episode ${metadata.episode}`;
  } else if (metadata.category === 'tv') {
    base = `${metadata.title} - S${pad(metadata.season ?? 1)}E${pad(metadata.episode ?? 1)}`;
  } else {
    base = titleWithYear(metadata.title, metadata.year);
  }
  if (metadata.resolution) {
    base = `${base} [${metadata.resolution}]`;
  }
  return `${sanitizePathComponent(base)}${extension.toLowerCase()}`;
}

/**
 * Directory a classified file belongs in. Unknown results go to the
 * catch-all directory.
 */
export function resolveTarget(
  result: Pick<ClassificationResult, 'category' | 'title' | 'year' | 'season' | 'episode'>,
  paths: Pick<PathsConfig, 'movies' | 'tv' | 'anime' | 'other'>
): string {
  switch (result.category) {
    case 'anime':
      if (result.episode !== undefined) {
        return path.join(paths.anime, sanitizePathComponent(result.title), seasonFolder(result.season));
      }
      return path.join(paths.anime, sanitizePathComponent(titleWithYear(result.title, result.year)));
    case 'tv':
      return path.join(paths.tv, sanitizePathComponent(result.title), seasonFolder(result.season));
    case 'movie':
      return path.join(paths.movies, sanitizePathComponent(titleWithYear(result.title, result.year)));
    case 'unknown':
      return paths.other;
  }
}

/**
 * `directory/filename`, or `stem_<unix seconds>ext` when that is taken.
 * Never returns a path that already exists.
 */
export async function uniqueDestination(
  directory: string,
  filename: string,
  now: Date = new Date()
): Promise<string> {
  const candidate = path.join(directory, filename);
  if (!(await fs.pathExists(candidate))) {
    return candidate;
  }

  const extension = path.extname(filename);
  const stem = filename.slice(0, filename.length - extension.length);
  const stamp = Math.floor(now.getTime() / 1000);

  let suffixed = path.join(directory, `${stem}_${stamp}${extension}`);
  for (let counter = 1; await fs.pathExists(suffixed); counter++) {
    suffixed = path.join(directory, `${stem}_${stamp}_${counter}${extension}`);
  }
  return suffixed;
}
