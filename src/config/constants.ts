/**
 * Shared constants for filename parsing and library layout.
 */

import { PlaceableCategory } from '../types/media.js';

export const MIB = 1024 * 1024;

/** Video container extensions accepted for download and organize scans */
export const DEFAULT_MEDIA_EXTENSIONS = [
  '.mkv',
  '.mp4',
  '.m4v',
  '.avi',
  '.mov',
  '.wmv',
  '.flv',
  '.webm',
  '.mpg',
  '.mpeg',
  '.ts',
  '.m2ts',
  '.3gp',
  '.ogv',
];

/**
 * Release tags that end the title portion of a filename.
 * Matched case-insensitively on word boundaries.
 */
export const RELEASE_TAGS = [
  'bluray',
  'blu-ray',
  'bdrip',
  'brrip',
  'remux',
  'web-dl',
  'webdl',
  'webrip',
  'hdtv',
  'dvdrip',
  'hdrip',
  'x264',
  'x265',
  'h264',
  'h265',
  'hevc',
  'avc',
  'aac',
  'ac3',
  'dts',
  'proper',
  'repack',
  'multi',
  'vostfr',
  'hdr',
];

export const LIBRARY_LAYOUT = {
  SEASON_PREFIX: 'Season',
  UNNAMED: 'unnamed',
} as const;

export const ORGANIZED_PAGE_SIZE = 10;
export const HISTORY_PAGE_SIZE = 5;

export const CATEGORY_LABELS: Record<PlaceableCategory, string> = {
  movie: 'Movie',
  tv: 'TV',
  anime: 'Anime',
};
