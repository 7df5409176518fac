import path from 'path';
import { ParsedFilename } from '../../types/media.js';
import { RELEASE_TAGS } from '../../config/constants.js';

// SxxEyy, optionally separated: S01E05, s1 e5
const SEASON_EPISODE_PATTERN = /\bS(\d{1,2})\s?E(\d{1,3})\b/i;
// 2x03
const CROSS_PATTERN = /\b(\d{1,2})x(\d{2,3})\b/i;
// Fansub style: "Title - 05", "Title - 05v2"
const ABSOLUTE_EPISODE_PATTERN = /\s-\s(\d{1,3})(?:v\d+)?(?=$|[\s[(])/;
const YEAR_PATTERN = /(^|[\s([])((?:19|20)\d{2})(?=$|[\s)\]])/g;
const RESOLUTION_PATTERN = /\b(2160p|1080p|720p|576p|480p|4k)\b/i;
const LEADING_GROUP_PATTERN = /^\s*\[[^\]]*\]\s*/;

const releaseTagPattern = new RegExp(
  `(?:^|[\\s[(])(${RELEASE_TAGS.map(tag => tag.replace(/[-]/g, '\\-')).join('|')})(?=$|[\\s)\\]])`,
  'i'
);

interface EpisodeMarker {
  index: number;
  season?: number;
  episode: number;
}

function findEpisodeMarker(text: string): EpisodeMarker | undefined {
  const seasonEpisode = SEASON_EPISODE_PATTERN.exec(text);
  if (seasonEpisode?.[1] && seasonEpisode[2]) {
    return {
      index: seasonEpisode.index,
      season: parseInt(seasonEpisode[1], 10),
      episode: parseInt(seasonEpisode[2], 10),
    };
  }

  const cross = CROSS_PATTERN.exec(text);
  if (cross?.[1] && cross[2]) {
    return {
      index: cross.index,
      season: parseInt(cross[1], 10),
      episode: parseInt(cross[2], 10),
    };
  }

  const absolute = ABSOLUTE_EPISODE_PATTERN.exec(text);
  if (absolute?.[1]) {
    return { index: absolute.index, episode: parseInt(absolute[1], 10) };
  }

  return undefined;
}

/**
 * First year that does not open the name, so titles such as "1917" survive
 */
function findYear(text: string): { index: number; year: number } | undefined {
  for (const match of text.matchAll(YEAR_PATTERN)) {
    const prefix = match[1] ?? '';
    const digits = match[2];
    const index = match.index ?? 0;
    if (!digits || index + prefix.length === 0) {
      continue;
    }
    return { index, year: parseInt(digits, 10) };
  }
  return undefined;
}

function normalizeResolution(raw: string): string {
  const lower = raw.toLowerCase();
  return lower === '4k' ? '2160p' : lower;
}

/**
 * Extract title, year, season, episode and resolution hints from a file name.
 * The title is everything before the first marker; an empty title means
 * nothing usable could be extracted.
 */
export function parseFilename(filename: string): ParsedFilename {
  const extension = path.extname(filename).toLowerCase();
  const stem = extension ? filename.slice(0, -extension.length) : filename;

  const text = stem
    .replace(/[._]/g, ' ')
    .replace(LEADING_GROUP_PATTERN, '')
    .replace(/\s+/g, ' ')
    .trim();

  const marker = findEpisodeMarker(text);
  const year = findYear(text);
  const resolution = RESOLUTION_PATTERN.exec(text);
  const tag = releaseTagPattern.exec(text);
  const bracket = text.indexOf('[');

  const cuts = [
    marker?.index,
    year?.index,
    resolution?.index,
    tag && tag.index > 0 ? tag.index : undefined,
    bracket > 0 ? bracket : undefined,
  ].filter((index): index is number => index !== undefined);
  const cut = cuts.length > 0 ? Math.min(...cuts) : text.length;

  const title = text
    .slice(0, cut)
    .replace(/[\s\-([{]+$/, '')
    .trim();

  const parsed: ParsedFilename = {
    original: filename,
    title,
    extension,
    kind: marker ? 'episode' : 'movie',
  };
  if (year) {
    parsed.year = year.year;
  }
  if (marker?.season !== undefined) {
    parsed.season = marker.season;
  }
  if (marker) {
    parsed.episode = marker.episode;
  }
  if (resolution?.[1]) {
    parsed.resolution = normalizeResolution(resolution[1]);
  }
  return parsed;
}

/**
 * Resolution tag found anywhere in a name, for manual placements
 */
export function detectResolution(filename: string): string | undefined {
  const match = RESOLUTION_PATTERN.exec(filename.replace(/[._]/g, ' '));
  return match?.[1] ? normalizeResolution(match[1]) : undefined;
}
