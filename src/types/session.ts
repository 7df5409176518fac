import { PlaceableCategory, PlacementMetadata } from './media.js';

/**
 * Per-user dialog state. Present only while `expiresAt` is in the future.
 */
export interface Session<D extends { kind: string }> {
  ownerId: number;
  kind: D['kind'];
  data: D;
  createdAt: number;
  expiresAt: number;
}

/**
 * A file offered for manual organizing
 */
export interface OrganizeCandidate {
  key: string;
  path: string;
  name: string;
}

export type OrganizeStep =
  | 'select_file'
  | 'choose_category'
  | 'ask_title'
  | 'ask_year'
  | 'ask_season'
  | 'ask_episode';

export interface OrganizeDialog {
  kind: 'organize';
  step: OrganizeStep;
  candidates: OrganizeCandidate[];
  file?: OrganizeCandidate;
  category?: PlaceableCategory;
  title?: string;
  year?: number;
  season?: number;
}

export interface BulkCandidate {
  path: string;
  name: string;
  destination: string;
  metadata: PlacementMetadata;
}

export type BulkAnswer = 'yes' | 'no';

export interface BulkDialog {
  kind: 'bulk';
  items: BulkCandidate[];
  index: number;
  placed: number;
  skipped: number;
}

export type DialogState = OrganizeDialog | BulkDialog;

export type DialogSession = Session<DialogState>;
