import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  ChatTransport,
  DownloadOptions,
  SendOptions,
  SentMessage,
} from '../../src/types/transport.js';
import { MetadataProvider, ProviderMatch, ProviderMediaType } from '../../src/types/providers/metadata.js';
import { buildDefaultConfig } from '../../src/config/defaults.js';
import { AppConfig } from '../../src/config/types.js';

export interface SentRecord {
  chatId: number;
  id: number;
  text: string;
  options?: SendOptions;
}

export interface EditRecord {
  chatId: number;
  messageId: number;
  text: string;
  options?: SendOptions;
}

export interface PendingTransfer {
  destinationPath: string;
  options: DownloadOptions;
  /** writes `content` at the destination, then resolves the download */
  complete(content?: string): Promise<void>;
  fail(error: Error): void;
}

/**
 * In-process chat transport. Downloads either complete at once or wait
 * for the test to drive them through `waitForTransfer`.
 */
export class FakeTransport implements ChatTransport {
  readonly sent: SentRecord[] = [];
  readonly edits: EditRecord[] = [];
  readonly deleted: Array<{ chatId: number; messageId: number }> = [];
  readonly transfers = new Map<number, PendingTransfer>();
  autoComplete = false;
  failEdits = false;
  private nextMessageId = 1;

  async download(transferId: number, destinationPath: string, options: DownloadOptions): Promise<void> {
    if (this.autoComplete) {
      await fs.outputFile(destinationPath, 'media-bytes');
      return;
    }
    return new Promise<void>((resolve, reject) => {
      this.transfers.set(transferId, {
        destinationPath,
        options,
        complete: async (content = 'media-bytes') => {
          await fs.outputFile(destinationPath, content);
          resolve();
        },
        fail: error => reject(error),
      });
    });
  }

  async sendMessage(chatId: number, text: string, options?: SendOptions): Promise<SentMessage> {
    const id = this.nextMessageId++;
    this.sent.push({ chatId, id, text, ...(options && { options }) });
    return { id };
  }

  async editMessage(chatId: number, messageId: number, text: string, options?: SendOptions): Promise<void> {
    if (this.failEdits) {
      throw new Error('message to edit not found');
    }
    this.edits.push({ chatId, messageId, text, ...(options && { options }) });
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    this.deleted.push({ chatId, messageId });
  }

  async waitForTransfer(transferId: number): Promise<PendingTransfer> {
    for (let attempt = 0; attempt < 400; attempt++) {
      const transfer = this.transfers.get(transferId);
      if (transfer) {
        return transfer;
      }
      await new Promise(resolve => setTimeout(resolve, 5));
    }
    throw new Error(`Transfer ${transferId} never started`);
  }

  /** every text the chat saw, sent or edited, in order of arrival per kind */
  texts(): string[] {
    return [...this.sent.map(message => message.text), ...this.edits.map(edit => edit.text)];
  }
}

/**
 * Metadata provider answering from fixed tables keyed by lower-cased title
 */
export class FakeMetadataProvider implements MetadataProvider {
  readonly movies = new Map<string, ProviderMatch>();
  readonly shows = new Map<string, ProviderMatch>();
  readonly keywords = new Map<number, string[]>();
  readonly calls: string[] = [];
  failWith: Error | null = null;

  async searchMovie(title: string, year?: number): Promise<ProviderMatch | null> {
    this.calls.push(`movie:${title}:${year ?? ''}`);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.movies.get(title.toLowerCase()) ?? null;
  }

  async searchTv(title: string): Promise<ProviderMatch | null> {
    this.calls.push(`tv:${title}`);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.shows.get(title.toLowerCase()) ?? null;
  }

  async getKeywords(id: number, mediaType: ProviderMediaType): Promise<string[]> {
    this.calls.push(`keywords:${mediaType}:${id}`);
    return this.keywords.get(id) ?? [];
  }
}

export async function makeTempDir(prefix = 'mediashelf-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.remove(dir);
}

/**
 * Default config rooted in `baseDir`, with short retry delays
 */
export function makeTestConfig(baseDir: string): AppConfig {
  const config = buildDefaultConfig(baseDir);
  config.files = { retryAttempts: 2, retryInitialDelayMs: 1, retryMaxDelayMs: 2 };
  config.logging.file.enabled = false;
  config.logging.console.enabled = false;
  config.sessions.sweepIntervalSeconds = 0;
  return config;
}

export async function writeFile(dir: string, name: string, content = 'media-bytes'): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.outputFile(filePath, content);
  return filePath;
}
