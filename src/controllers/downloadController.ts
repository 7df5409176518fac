import path from 'path';
import { InboundFileEvent, Reply } from '../types/transport.js';
import { DownloadScheduler } from '../services/downloads/DownloadScheduler.js';
import { DownloadRequest, DownloadTask } from '../services/downloads/DownloadTask.js';
import { queuedText } from '../services/downloads/downloadMessages.js';
import { DownloadStatsService } from '../services/stats/DownloadStatsService.js';
import { UserService } from '../services/records/UserService.js';
import { AdminGuard } from '../middleware/security.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DiagnosticsService } from '../services/diagnostics/DiagnosticsService.js';
import { ADMIN_HELP_TEXT, HELP_TEXT, diagnosticsText, queueReply, statsText } from './messages.js';

export interface DownloadControllerDeps {
  scheduler: DownloadScheduler<DownloadTask>;
  createTask: (request: DownloadRequest) => DownloadTask;
  users: UserService;
  stats: DownloadStatsService;
  guard: AdminGuard;
  diagnostics: DiagnosticsService;
  extensions: readonly string[];
}

/**
 * Download Controller
 *
 * Inbound files and the commands any user may run:
 * help, queue, stats, diagnostics and cancelling their own downloads.
 */
export class DownloadController {
  constructor(private readonly deps: DownloadControllerDeps) {}

  /**
   * Admitted files answer through the task's own status message,
   * so only queued or refused files get a reply here
   */
  handleFile = async (event: InboundFileEvent): Promise<Reply | null> => {
    const extension = path.extname(event.filename).toLowerCase();
    if (!this.deps.extensions.includes(extension)) {
      logger.info('[DownloadController] Ignoring non-media file', {
        service: 'DownloadController',
        operation: 'handleFile',
        transferId: event.transferId,
        filename: event.filename,
      });
      return { text: `${event.filename} is not a supported media file and was ignored.` };
    }

    try {
      await this.deps.users.remember(event.requesterId);
    } catch (error) {
      logger.warn('[DownloadController] Could not record user', {
        service: 'DownloadController',
        operation: 'handleFile',
        userId: event.requesterId,
        error: getErrorMessage(error),
      });
    }

    const task = this.deps.createTask({
      transferId: event.transferId,
      chatId: event.chatId,
      requesterId: event.requesterId,
      filename: event.filename,
      size: event.size,
    });
    const admission = this.deps.scheduler.submit(task);

    switch (admission.status) {
      case 'admitted':
        return null;
      case 'queued':
        return { text: queuedText(event.filename, admission.position) };
      case 'rejected':
        return this.deps.scheduler.isDraining
          ? { text: 'Shutting down; new downloads are not accepted.' }
          : { text: `${event.filename} is already being downloaded.` };
    }
  };

  help = (userId: number): Reply => {
    return {
      text: this.deps.guard.isAdmin(userId) ? `${HELP_TEXT}\n\n${ADMIN_HELP_TEXT}` : HELP_TEXT,
    };
  };

  queue = (page: number = 1): Reply => {
    return queueReply(this.deps.scheduler.status(), Math.max(1, page));
  };

  stats = (userId: number): Reply => {
    const { stats } = this.deps;
    return { text: statsText(stats.getUser(userId), stats.getGlobal(), stats.getUptimeSeconds()) };
  };

  test = async (): Promise<Reply> => {
    return { text: diagnosticsText(await this.deps.diagnostics.run()) };
  };

  /**
   * Users may cancel their own downloads; admins may cancel any
   */
  cancelDownload = (userId: number, transferId: number): Reply => {
    const task = this.deps.scheduler.find(transferId);
    if (!task) {
      return { text: 'That download is no longer running.' };
    }
    if (task.requesterId !== userId && !this.deps.guard.isAdmin(userId)) {
      return { text: 'You can only cancel your own downloads.' };
    }

    if (!this.deps.scheduler.cancel(transferId, 'user')) {
      return { text: `${task.filename} has finished downloading and is being processed; it can no longer be cancelled.` };
    }
    return { text: `Cancelling ${task.filename}.` };
  };
}
