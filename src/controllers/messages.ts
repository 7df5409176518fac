import { DownloadSnapshot, SchedulerStatus } from '../types/download.js';
import { OrganizedRecord } from '../types/media.js';
import { ButtonLayout, Reply } from '../types/transport.js';
import { StatSummary } from '../services/stats/DownloadStatsService.js';
import { DiagnosticsReport, LibraryDirectory } from '../services/diagnostics/DiagnosticsService.js';
import { formatBytes, formatDuration } from '../utils/format.js';

export const HELP_TEXT = [
  'Send a video file and it will be downloaded, identified and filed into the library.',
  '',
  '/queue [page] - downloads in progress and waiting',
  '/stats - your download statistics',
  '/test - check library folders and free space',
  '/cancel - close the open dialog',
].join('\n');

export const ADMIN_HELP_TEXT = [
  '/organize - place an unidentified file by hand',
  '/propagate - place the episodes following the last manual placement',
  '/organized - manual placements',
  '/history - every placement, with details',
  '/users - number of known users',
  '/shutdown - finish running downloads and stop',
].join('\n');

function describeDownload(snapshot: DownloadSnapshot): string {
  return `#${snapshot.id} ${snapshot.filename} (${formatBytes(snapshot.size)})`;
}

export const QUEUE_PAGE_SIZE = 10;

function shortName(name: string, max: number): string {
  return name.length <= max ? name : `${name.slice(0, max - 3)}...`;
}

/**
 * Active downloads plus one page of the waiting list, with a cancel
 * button for each download shown
 */
export function queueReply(status: SchedulerStatus, page: number): Reply {
  if (status.active.length === 0 && status.queued.length === 0) {
    return { text: 'No downloads in progress.' };
  }

  const start = (page - 1) * QUEUE_PAGE_SIZE;
  const pageItems = status.queued.slice(start, start + QUEUE_PAGE_SIZE);
  const totalPages = Math.ceil(status.queued.length / QUEUE_PAGE_SIZE);

  const lines = [`Active (${status.active.length}):`];
  for (const snapshot of status.active) {
    lines.push(`${describeDownload(snapshot)} ${snapshot.progress.percent.toFixed(1)}%`);
  }
  if (pageItems.length > 0) {
    const pageNote = totalPages > 1 ? `, page ${page} of ${totalPages}` : '';
    lines.push('', `Queued (${status.queued.length})${pageNote}:`);
    pageItems.forEach((snapshot, index) => {
      lines.push(`${start + index + 1}. ${describeDownload(snapshot)}`);
    });
  } else if (status.queued.length > 0) {
    lines.push('', 'No more items in queue.');
  }

  const buttons: ButtonLayout = [...status.active, ...pageItems].map(snapshot => [
    { label: `Cancel: ${shortName(snapshot.filename, 20)}`, data: `cancel:${snapshot.id}` },
  ]);
  if (status.queued.length > start + QUEUE_PAGE_SIZE) {
    buttons.push([{ label: `More (page ${page + 1})`, data: `queue:${page + 1}` }]);
  }
  return { text: lines.join('\n'), buttons };
}

const DIRECTORY_LABELS: Record<LibraryDirectory, string> = {
  downloads: 'Downloads',
  movies: 'Movies',
  tv: 'TV',
  anime: 'Anime',
  music: 'Music',
  other: 'Other',
};

export function diagnosticsText(report: DiagnosticsReport): string {
  const lines = ['System check'];
  for (const check of report.directories) {
    const label = DIRECTORY_LABELS[check.name];
    lines.push(
      check.accessible ? `${label}: OK (${formatBytes(check.freeBytes ?? 0)} free)` : `${label}: NOT ACCESSIBLE`
    );
  }
  lines.push(`Metadata lookups: ${report.metadataLookups ? 'configured' : 'not configured'}`);
  return lines.join('\n');
}

function summaryLines(stats: StatSummary): string[] {
  return [
    `Files: ${stats.filesHandled} (${stats.successfulDownloads} ok, ${stats.failedDownloads} failed)`,
    `Downloaded: ${formatBytes(stats.totalBytes)}`,
    `Average speed: ${formatBytes(stats.averageSpeed)}/s`,
    `Average time: ${formatDuration(stats.averageSeconds)}`,
  ];
}

export function statsText(user: StatSummary, global: StatSummary, uptimeSeconds: number): string {
  return [
    'Your downloads',
    ...summaryLines(user),
    '',
    'All downloads',
    ...summaryLines(global),
    `Peak concurrent downloads: ${global.peakConcurrent}`,
    `Uptime: ${formatDuration(uptimeSeconds)}`,
  ].join('\n');
}

export function recordLabel(record: OrganizedRecord): string {
  if (record.season !== undefined && record.episode !== undefined) {
    return `${record.title} S${String(record.season).padStart(2, '0')}E${String(record.episode).padStart(2, '0')}`;
  }
  return record.year !== undefined ? `${record.title} (${record.year})` : record.title;
}
