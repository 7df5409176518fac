import path from 'path';
import { DownloadSnapshot, DownloadState } from '../../types/download.js';
import { formatBytes, formatDuration } from '../../utils/format.js';
import { DownloadFinish } from './DownloadTask.js';

export function startedText(snapshot: DownloadSnapshot): string {
  return `Downloading ${snapshot.filename} (${formatBytes(snapshot.size)})`;
}

export function progressText(snapshot: DownloadSnapshot): string {
  const { percent, receivedBytes, rate } = snapshot.progress;
  return [
    `Downloading ${snapshot.filename}`,
    `${percent.toFixed(1)}% (${formatBytes(receivedBytes)} of ${formatBytes(snapshot.size)})`,
    `${formatBytes(rate)}/s`,
  ].join('\n');
}

export function queuedText(filename: string, position: number): string {
  return `${filename} is queued at position ${position}. It starts when a slot frees up.`;
}

export function finishedText(snapshot: DownloadSnapshot, detail: DownloadFinish): string {
  const name = snapshot.filename;
  const outcome = detail.outcome;

  if (outcome) {
    switch (outcome.kind) {
      case 'placed': {
        const placed = `Placed ${name} as ${path.basename(outcome.path)}`;
        return outcome.warned ? `${placed}\nLow-confidence match for "${outcome.title}"; the name was kept.` : placed;
      }
      case 'fallback':
        return outcome.reason === 'no_title'
          ? `Could not read a title from ${name}. It was moved to the unsorted folder; use /organize to place it.`
          : `Could not identify ${name} confidently. It was moved to the unsorted folder; use /organize to place it.`;
      case 'error':
        return `Downloaded ${name} but processing failed: ${outcome.message}\nThe file was left in the download folder.`;
    }
  }

  switch (snapshot.state) {
    case DownloadState.TimedOut:
      return `Download of ${name} timed out${elapsed(snapshot)} and was removed.`;
    case DownloadState.Cancelled:
      return `Download of ${name} cancelled.`;
    case DownloadState.Failed:
      return `Download of ${name} failed: ${detail.error ?? 'unknown error'}`;
    default:
      return `Download of ${name} finished (${snapshot.state}).`;
  }
}

function elapsed(snapshot: DownloadSnapshot): string {
  if (!snapshot.startedAt || !snapshot.endedAt) {
    return '';
  }
  return ` after ${formatDuration((snapshot.endedAt.getTime() - snapshot.startedAt.getTime()) / 1000)}`;
}
