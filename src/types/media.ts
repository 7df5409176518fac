/**
 * Library category a file is placed under. `unknown` routes to the
 * fallback directory.
 */
export type MediaCategory = 'movie' | 'tv' | 'anime' | 'unknown';

/**
 * Category a user may pick in the organize dialog
 */
export type PlaceableCategory = Exclude<MediaCategory, 'unknown'>;

export type PlacementMethod = 'auto' | 'manual';

/**
 * Hints pulled out of a raw filename before any provider lookup
 */
export interface ParsedFilename {
  original: string;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  resolution?: string;
  extension: string;
  kind: 'movie' | 'episode';
}

export interface ClassificationResult {
  category: MediaCategory;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  isAnime: boolean;
  providerId?: number;
}

/**
 * Metadata needed to name and place a file, whether it came from the
 * provider or from the user
 */
export interface PlacementMetadata {
  category: PlaceableCategory;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  resolution?: string;
}

export type ConfidenceDecision = 'reject' | 'warn' | 'accept';

export interface ConfidenceVerdict {
  score: number;
  decision: ConfidenceDecision;
}

export interface OrganizedRecord {
  id: number;
  path: string;
  fileName: string;
  /** name the file had before it was renamed */
  originalName: string;
  title: string;
  category: PlaceableCategory;
  year?: number;
  season?: number;
  episode?: number;
  resolution?: string;
  userId: number;
  method: PlacementMethod;
  createdAt: Date;
}

export type NewOrganizedRecord = Omit<OrganizedRecord, 'id' | 'createdAt'>;
