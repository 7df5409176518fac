import { DownloadSnapshot } from '../../types/download.js';
import { ChatTransport, SendOptions } from '../../types/transport.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { DownloadFinish, DownloadObserver } from './DownloadTask.js';
import { finishedText, progressText, startedText } from './downloadMessages.js';

/**
 * Keeps one status message per transfer up to date in the requester's chat.
 * Transport failures are logged and never reach the download.
 */
export class DownloadNotifier implements DownloadObserver {
  private readonly messages = new Map<number, number>();

  constructor(private readonly transport: ChatTransport) {}

  async started(snapshot: DownloadSnapshot): Promise<void> {
    const options: SendOptions = {
      buttons: [[{ label: 'Cancel', data: `cancel:${snapshot.id}` }]],
    };
    try {
      const sent = await this.transport.sendMessage(snapshot.chatId, startedText(snapshot), options);
      this.messages.set(snapshot.id, sent.id);
    } catch (error) {
      this.logFailure('started', snapshot.id, error);
    }
  }

  async progress(snapshot: DownloadSnapshot): Promise<void> {
    await this.show(snapshot, progressText(snapshot), {
      buttons: [[{ label: 'Cancel', data: `cancel:${snapshot.id}` }]],
    });
  }

  async finished(snapshot: DownloadSnapshot, detail: DownloadFinish): Promise<void> {
    await this.show(snapshot, finishedText(snapshot, detail), {});
    this.messages.delete(snapshot.id);
  }

  /**
   * Edit the tracked message; when that fails, post a fresh one and
   * delete the stale one.
   */
  private async show(snapshot: DownloadSnapshot, text: string, options: SendOptions): Promise<void> {
    const current = this.messages.get(snapshot.id);

    if (current !== undefined) {
      try {
        await this.transport.editMessage(snapshot.chatId, current, text, options);
        return;
      } catch (error) {
        logger.debug('[DownloadNotifier] Edit failed, sending a new message', {
          service: 'DownloadNotifier',
          transferId: snapshot.id,
          error: getErrorMessage(error),
        });
      }
    }

    try {
      const sent = await this.transport.sendMessage(snapshot.chatId, text, options);
      this.messages.set(snapshot.id, sent.id);
    } catch (error) {
      this.logFailure('send', snapshot.id, error);
      return;
    }

    if (current !== undefined) {
      try {
        await this.transport.deleteMessage(snapshot.chatId, current);
      } catch (error) {
        this.logFailure('delete', snapshot.id, error);
      }
    }
  }

  private logFailure(operation: string, transferId: number, error: unknown): void {
    logger.warn('[DownloadNotifier] Notification failed', {
      service: 'DownloadNotifier',
      operation,
      transferId,
      error: getErrorMessage(error),
    });
  }
}
