import path from 'path';
import { BulkAnswer, BulkCandidate, BulkDialog, DialogState } from '../../types/session.js';
import { ButtonLayout, Reply } from '../../types/transport.js';
import { OrganizedRecord } from '../../types/media.js';
import { SessionStore } from '../session/SessionStore.js';
import { FileOperations } from '../files/fileOperations.js';
import { OrganizedRecordService } from '../records/OrganizedRecordService.js';
import { ErrorLogService } from '../records/ErrorLogService.js';
import { parseFilename } from '../media/filenameParser.js';
import { titleSimilarity } from '../media/titleSimilarity.js';
import { buildLibraryName } from '../media/placementResolver.js';
import { OrganizeService } from './OrganizeService.js';
import { scanCandidates } from './candidateScanner.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface BulkPropagationOptions {
  downloadDir: string;
  extensions: readonly string[];
  /** minimum title similarity to the reference record */
  similarityThreshold: number;
  inFlight: () => Iterable<string>;
}

const ANSWER_BUTTONS: ButtonLayout = [
  [
    { label: 'Yes', data: 'bulk:yes' },
    { label: 'No', data: 'bulk:no' },
  ],
];

/**
 * Offers the episodes that follow the latest manual placement, one at a
 * time, and places each one the user confirms next to it.
 */
export class BulkPropagationService {
  private readonly answering = new Set<number>();

  constructor(
    private readonly sessions: SessionStore<DialogState>,
    private readonly organizer: OrganizeService,
    private readonly records: OrganizedRecordService,
    private readonly files: FileOperations,
    private readonly errorLog: ErrorLogService,
    private readonly options: BulkPropagationOptions
  ) {}

  /**
   * Files in the download directory that continue `reference`, sorted by episode
   */
  async findCandidates(reference: OrganizedRecord): Promise<BulkCandidate[]> {
    if (reference.season === undefined || reference.episode === undefined) {
      return [];
    }
    const { season, episode: lastEpisode } = reference;
    const folder = path.dirname(reference.path);

    const scanned = await scanCandidates(this.files, this.records, {
      directories: [this.options.downloadDir],
      extensions: this.options.extensions,
      exclude: new Set(this.options.inFlight()),
    });

    const items: BulkCandidate[] = [];
    for (const file of scanned) {
      const parsed = parseFilename(file.name);
      if (parsed.episode === undefined || parsed.episode <= lastEpisode) {
        continue;
      }
      if ((parsed.season ?? 1) !== season) {
        continue;
      }
      if (titleSimilarity(parsed.title, reference.title) < this.options.similarityThreshold) {
        continue;
      }

      const metadata = {
        category: reference.category,
        title: reference.title,
        season,
        episode: parsed.episode,
        ...(parsed.resolution !== undefined && { resolution: parsed.resolution }),
      };
      items.push({
        path: file.path,
        name: file.name,
        destination: path.join(folder, buildLibraryName(metadata, parsed.extension)),
        metadata,
      });
    }

    return items.sort((a, b) => (a.metadata.episode ?? 0) - (b.metadata.episode ?? 0));
  }

  async start(userId: number): Promise<Reply> {
    const reference = await this.records.latestManual();
    if (!reference) {
      return { text: 'No manual placements to propagate from.' };
    }
    if (reference.category === 'movie' || reference.season === undefined || reference.episode === undefined) {
      return { text: `The latest manual placement (${reference.title}) is not an episode.` };
    }

    const items = await this.findCandidates(reference);
    if (items.length === 0) {
      return { text: `No further episodes of ${reference.title} found.` };
    }

    const dialog: BulkDialog = { kind: 'bulk', items, index: 0, placed: 0, skipped: 0 };
    this.sessions.create(userId, dialog);
    logger.info('[BulkPropagation] Started', {
      service: 'BulkPropagationService',
      operation: 'start',
      userId,
      recordId: reference.id,
      candidates: items.length,
    });
    return this.prompt(dialog);
  }

  async answer(userId: number, answer: BulkAnswer): Promise<Reply> {
    if (this.answering.has(userId)) {
      return { text: 'Still placing the previous file, please wait.' };
    }
    const data = this.sessions.get(userId)?.data;
    if (data?.kind !== 'bulk') {
      return { text: 'No propagation in progress.' };
    }
    const current = data.items[data.index];
    if (!current) {
      this.sessions.clear(userId);
      return { text: 'No propagation in progress.' };
    }

    // claimed before the first await so a repeated tap cannot act on the same item
    this.answering.add(userId);
    try {
      let note: string;
      let placed = data.placed;
      let skipped = data.skipped;
      if (answer === 'yes') {
        const result = await this.placeCandidate(userId, current);
        note = result.note;
        if (result.ok) {
          placed++;
        } else {
          skipped++;
        }
      } else {
        note = `Skipped ${current.name}.`;
        skipped++;
      }

      if (this.sessions.get(userId)?.data !== data) {
        // cleared or replaced while the file was moving
        return { text: note };
      }

      const next: BulkDialog = { ...data, index: data.index + 1, placed, skipped };
      if (next.index >= next.items.length) {
        this.sessions.clear(userId);
        return { text: `${note}\nPropagation complete: ${placed} placed, ${skipped} skipped.` };
      }

      this.sessions.update(userId, next);
      const prompt = this.prompt(next);
      return { ...prompt, text: `${note}\n${prompt.text}` };
    } finally {
      this.answering.delete(userId);
    }
  }

  private async placeCandidate(userId: number, item: BulkCandidate): Promise<{ ok: boolean; note: string }> {
    try {
      const result = await this.organizer.place({
        sourcePath: item.path,
        metadata: item.metadata,
        userId,
        method: 'auto',
        rename: true,
        directory: path.dirname(item.destination),
      });
      return { ok: true, note: `Moved to ${result.path}` };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('[BulkPropagation] Placement failed', {
        service: 'BulkPropagationService',
        operation: 'answer',
        userId,
        file: item.path,
        error: message,
      });
      await this.errorLog.record({
        stage: 'bulk',
        file: item.path,
        error: message,
        context: { userId, destination: item.destination },
      });
      return { ok: false, note: `Could not move ${item.name}: ${message}` };
    }
  }

  private prompt(dialog: BulkDialog): Reply {
    const item = dialog.items[dialog.index];
    if (!item) {
      return { text: 'Propagation complete.' };
    }
    return {
      text: `Propagate ${dialog.index + 1}/${dialog.items.length}:\n${item.name}\n-> ${path.basename(item.destination)}`,
      buttons: ANSWER_BUTTONS,
    };
  }
}
