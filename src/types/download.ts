export enum DownloadState {
  Queued = 'queued',
  Downloading = 'downloading',
  TimedOut = 'timed_out',
  Cancelled = 'cancelled',
  Failed = 'failed',
  Completed = 'completed',
  Processing = 'processing',
  Placed = 'placed',
  FallbackManual = 'fallback_manual',
  ProcessingError = 'processing_error',
}

export const TERMINAL_DOWNLOAD_STATES: ReadonlySet<DownloadState> = new Set([
  DownloadState.TimedOut,
  DownloadState.Cancelled,
  DownloadState.Failed,
  DownloadState.Placed,
  DownloadState.FallbackManual,
  DownloadState.ProcessingError,
]);

export type SizeClass = 'large' | 'regular';

export interface DownloadProgress {
  receivedBytes: number;
  percent: number;
  /** bytes per second since the previous update */
  rate: number;
}

export interface DownloadSnapshot {
  id: number;
  chatId: number;
  filename: string;
  size: number;
  sizeClass: SizeClass;
  state: DownloadState;
  requesterId: number;
  progress: DownloadProgress;
  destinationPath?: string;
  startedAt?: Date;
  endedAt?: Date;
}

export type CancelReason = 'user' | 'timeout' | 'shutdown';

export type AdmissionResult =
  | { status: 'admitted'; position: 0 }
  | { status: 'queued'; position: number }
  | { status: 'rejected' };

export interface SchedulerStatus {
  active: DownloadSnapshot[];
  queued: DownloadSnapshot[];
}

/**
 * Outcome of the post-download pipeline for one file
 */
export type ProcessingOutcome =
  | { kind: 'placed'; path: string; recordId: number; title: string; renamed: boolean; warned: boolean }
  | { kind: 'fallback'; path: string; reason: 'no_title' | 'low_confidence'; score?: number }
  | { kind: 'error'; message: string };
