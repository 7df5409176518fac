import { ButtonLayout, InlineButton, Reply } from '../types/transport.js';
import { OrganizedRecordService } from '../services/records/OrganizedRecordService.js';
import { ErrorLogService } from '../services/records/ErrorLogService.js';
import { UserService } from '../services/records/UserService.js';
import { OrganizeService } from '../services/organize/OrganizeService.js';
import { CATEGORY_LABELS, HISTORY_PAGE_SIZE, ORGANIZED_PAGE_SIZE } from '../config/constants.js';
import { OrganizedRecord } from '../types/media.js';
import { formatDuration } from '../utils/format.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { recordLabel } from './messages.js';

/**
 * Admin Controller
 *
 * Placement history, user count and shutdown.
 */
export class AdminController {
  constructor(
    private readonly records: OrganizedRecordService,
    private readonly organizer: OrganizeService,
    private readonly userService: UserService,
    private readonly errorLog: ErrorLogService,
    private readonly requestShutdown: () => void,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Manual placements, newest first
   */
  organized = async (offset: number): Promise<Reply> => {
    const start = Math.max(0, offset);
    const page = await this.records.list({ method: 'manual', limit: ORGANIZED_PAGE_SIZE, offset: start });
    if (page.records.length === 0) {
      return { text: 'No organized entries found.' };
    }

    const buttons: ButtonLayout = page.records.map(record => [
      { label: `Re-organize ${recordLabel(record)}`, data: `reorg:${record.id}` },
      { label: 'Delete', data: `delorg:${record.id}` },
    ]);

    const nav: InlineButton[] = [];
    if (start > 0) {
      nav.push({ label: 'Prev', data: `org_page:${Math.max(0, start - ORGANIZED_PAGE_SIZE)}` });
    }
    if (start + ORGANIZED_PAGE_SIZE < page.total) {
      nav.push({ label: 'Next', data: `org_page:${start + ORGANIZED_PAGE_SIZE}` });
    }
    if (nav.length > 0) {
      buttons.push(nav);
    }

    return {
      text: `Organized files (${start + 1}-${start + page.records.length} of ${page.total}):`,
      buttons,
    };
  };

  /**
   * Every placement, automatic and manual, five to a page
   */
  history = async (offset: number): Promise<Reply> => {
    let start = Math.max(0, offset);
    let page = await this.records.list({ limit: HISTORY_PAGE_SIZE, offset: start });
    if (page.total === 0) {
      return { text: 'No history available.' };
    }
    if (page.records.length === 0) {
      // past the end after deletions: show the last page instead
      start = Math.floor((page.total - 1) / HISTORY_PAGE_SIZE) * HISTORY_PAGE_SIZE;
      page = await this.records.list({ limit: HISTORY_PAGE_SIZE, offset: start });
    }

    const totalPages = Math.ceil(page.total / HISTORY_PAGE_SIZE);
    const lines = [`History - Page ${pageNumber(start)} of ${totalPages} (${page.total} total entries)`, ''];
    const buttons: ButtonLayout = [];
    page.records.forEach((record, index) => {
      const position = start + index + 1;
      lines.push(
        `${position}. ${shortTitle(record.title)}`,
        `   ${this.ago(record.createdAt)} [${capitalize(record.method)}]`
      );
      buttons.push([{ label: `Details for #${position}`, data: `hist_detail:${record.id}:${start}` }]);
    });

    const nav: InlineButton[] = [];
    if (start > 0) {
      nav.push({ label: 'Prev', data: `hist_page:${Math.max(0, start - HISTORY_PAGE_SIZE)}` });
    }
    if (start + HISTORY_PAGE_SIZE < page.total) {
      nav.push({ label: 'Next', data: `hist_page:${start + HISTORY_PAGE_SIZE}` });
    }
    if (nav.length > 0) {
      buttons.push(nav);
    }

    return { text: lines.join('\n'), buttons };
  };

  historyDetail = async (recordId: number, offset: number): Promise<Reply> => {
    const record = await this.records.get(recordId);
    if (!record) {
      const list = await this.history(offset);
      return { ...list, text: `Entry not found.\n\n${list.text}` };
    }

    const lines = [
      'History item',
      '',
      `Title: ${historyTitle(record)}`,
      `Original file: ${record.originalName}`,
      `Method: ${capitalize(record.method)}`,
      `Category: ${CATEGORY_LABELS[record.category]}`,
    ];
    if (record.resolution) {
      lines.push(`Resolution: ${record.resolution}`);
    }
    lines.push(`Time: ${this.ago(record.createdAt)}`);

    return {
      text: lines.join('\n'),
      buttons: [
        [
          { label: 'Re-organize', data: `reorg:${record.id}` },
          { label: 'Delete entry', data: `delorg:${record.id}` },
        ],
        [{ label: `Back to History (Page ${pageNumber(offset)})`, data: `hist_page:${offset}` }],
      ],
    };
  };

  deleteRecord = async (recordId: number): Promise<Reply> => {
    const removed = await this.records.remove(recordId);
    logger.info('[AdminController] Record delete requested', {
      service: 'AdminController',
      operation: 'deleteRecord',
      recordId,
      removed,
    });
    return { text: removed ? 'Record deleted. The file was not touched.' : 'Record not found.' };
  };

  reorganize = async (userId: number, recordId: number): Promise<Reply> => {
    try {
      const result = await this.organizer.reorganize(recordId, userId);
      return { text: `Re-organized to ${result.path}` };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('[AdminController] Re-organize failed', {
        service: 'AdminController',
        operation: 'reorganize',
        recordId,
        userId,
        error: message,
      });
      await this.errorLog.record({ stage: 'reorganize', error: message, context: { recordId, userId } });
      return { text: `Could not re-organize: ${message}` };
    }
  };

  users = async (): Promise<Reply> => {
    const total = await this.userService.count();
    return { text: `Known users: ${total}` };
  };

  private ago(date: Date): string {
    return `${formatDuration((this.now() - date.getTime()) / 1000)} ago`;
  }

  shutdown = (): Reply => {
    this.requestShutdown();
    return { text: 'Shutting down: running downloads get a chance to finish first.' };
  };
}

function pageNumber(offset: number): number {
  return Math.floor(offset / HISTORY_PAGE_SIZE) + 1;
}

function shortTitle(title: string): string {
  return title.length < 35 ? title : `${title.slice(0, 32)}...`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function historyTitle(record: OrganizedRecord): string {
  if (record.category === 'movie') {
    return record.year !== undefined ? `${record.title} (${record.year})` : record.title;
  }
  if (record.season !== undefined && record.episode !== undefined) {
    return `${record.title} - S${String(record.season).padStart(2, '0')}E${String(record.episode).padStart(2, '0')}`;
  }
  return record.title;
}
