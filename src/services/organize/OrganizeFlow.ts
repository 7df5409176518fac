import { ButtonLayout, Reply } from '../../types/transport.js';
import { DialogState, OrganizeCandidate, OrganizeDialog } from '../../types/session.js';
import { PlaceableCategory, PlacementMetadata } from '../../types/media.js';
import { SessionStore } from '../session/SessionStore.js';
import { FileOperations } from '../files/fileOperations.js';
import { OrganizedRecordService } from '../records/OrganizedRecordService.js';
import { ErrorLogService } from '../records/ErrorLogService.js';
import { detectResolution } from '../media/filenameParser.js';
import { OrganizeService } from './OrganizeService.js';
import { scanCandidates } from './candidateScanner.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { CATEGORY_LABELS } from '../../config/constants.js';

export interface OrganizeFlowOptions {
  /** scanned for candidates, in order */
  directories: readonly string[];
  extensions: readonly string[];
  /** destinations of downloads still in progress */
  inFlight: () => Iterable<string>;
}

const CATEGORY_BUTTONS: ButtonLayout = [
  [
    { label: CATEGORY_LABELS.movie, data: 'org_cat:movie' },
    { label: CATEGORY_LABELS.tv, data: 'org_cat:tv' },
  ],
  [
    { label: CATEGORY_LABELS.anime, data: 'org_cat:anime' },
    { label: 'Skip', data: 'org_cat:skip' },
  ],
];

const NO_DIALOG: Reply = { text: 'No organize dialog is open. Use /organize to start one.' };

function isPlaceableCategory(value: string): value is PlaceableCategory {
  return value === 'movie' || value === 'tv' || value === 'anime';
}

function parseWholeNumber(text: string, maxDigits: number): number | undefined {
  return new RegExp(`^\\d{1,${maxDigits}}$`).test(text) ? Number(text) : undefined;
}

/**
 * Manual organize dialog:
 * select file, choose category, title, then year (movie) or
 * season and episode (tv, anime), then finalize.
 *
 * One step per inbound event; state lives in the session store keyed by user.
 */
export class OrganizeFlow {
  constructor(
    private readonly sessions: SessionStore<DialogState>,
    private readonly organizer: OrganizeService,
    private readonly records: OrganizedRecordService,
    private readonly files: FileOperations,
    private readonly errorLog: ErrorLogService,
    private readonly options: OrganizeFlowOptions
  ) {}

  async start(userId: number): Promise<Reply> {
    this.sessions.clear(userId);

    const candidates = await scanCandidates(this.files, this.records, {
      directories: this.options.directories,
      extensions: this.options.extensions,
      exclude: new Set(this.options.inFlight()),
    });
    if (candidates.length === 0) {
      return { text: 'No files need organizing.' };
    }

    this.sessions.create(userId, { kind: 'organize', step: 'select_file', candidates });
    logger.info('[OrganizeFlow] Dialog started', {
      service: 'OrganizeFlow',
      operation: 'start',
      userId,
      candidates: candidates.length,
    });

    return {
      text: 'Choose a file to organize:',
      buttons: candidates.map(candidate => [{ label: candidate.name, data: `org_file:${candidate.key}` }]),
    };
  }

  async selectFile(userId: number, key: string): Promise<Reply> {
    const dialog = this.dialog(userId);
    if (!dialog || dialog.step !== 'select_file') {
      return NO_DIALOG;
    }

    const file = dialog.candidates.find(candidate => candidate.key === key);
    if (!file) {
      return { text: 'That file is no longer offered. Use /organize to scan again.' };
    }
    if (!(await this.files.exists(file.path))) {
      this.sessions.clear(userId);
      return { text: `${file.name} is gone. Use /organize to scan again.` };
    }

    this.sessions.update(userId, { ...dialog, step: 'choose_category', file });
    const resolution = detectResolution(file.name);
    return {
      text: `File: ${file.name}${resolution ? `\nDetected resolution: ${resolution}` : ''}\nSelect a category:`,
      buttons: CATEGORY_BUTTONS,
    };
  }

  chooseCategory(userId: number, choice: string): Reply {
    const dialog = this.dialog(userId);
    if (!dialog || dialog.step !== 'choose_category' || !dialog.file) {
      return NO_DIALOG;
    }

    if (choice === 'skip') {
      this.sessions.clear(userId);
      return { text: `Skipped ${dialog.file.name}.` };
    }
    if (!isPlaceableCategory(choice)) {
      return { text: 'Pick one of the offered categories.', buttons: CATEGORY_BUTTONS };
    }

    this.sessions.update(userId, { ...dialog, step: 'ask_title', category: choice });
    return { text: `Category: ${CATEGORY_LABELS[choice]}\nReply with the title.` };
  }

  /**
   * Free text for the current step; null when the user has no dialog
   * waiting for text
   */
  async handleText(userId: number, rawText: string): Promise<Reply | null> {
    const dialog = this.dialog(userId);
    if (!dialog || !dialog.file || !dialog.category) {
      return null;
    }
    const text = rawText.trim();

    switch (dialog.step) {
      case 'ask_title': {
        if (text.length === 0) {
          return { text: 'The title cannot be empty. Reply with the title.' };
        }
        if (dialog.category === 'movie') {
          this.sessions.update(userId, { ...dialog, step: 'ask_year', title: text });
          return { text: 'Reply with the year (e.g. 2023).' };
        }
        this.sessions.update(userId, { ...dialog, step: 'ask_season', title: text });
        return { text: 'Reply with the season number (e.g. 1).' };
      }

      case 'ask_year': {
        const year = parseWholeNumber(text, 4);
        if (year === undefined || text.length !== 4) {
          return { text: 'The year must be four digits. Reply with the year.' };
        }
        return this.finalize(userId, dialog.file, {
          category: dialog.category,
          title: dialog.title ?? '',
          year,
        });
      }

      case 'ask_season': {
        const season = parseWholeNumber(text, 3);
        if (season === undefined) {
          return { text: 'The season must be a whole number. Reply with the season number.' };
        }
        this.sessions.update(userId, { ...dialog, step: 'ask_episode', season });
        return { text: 'Reply with the episode number (e.g. 3).' };
      }

      case 'ask_episode': {
        const episode = parseWholeNumber(text, 4);
        if (episode === undefined || episode < 1) {
          return { text: 'The episode must be a number from 1. Reply with the episode number.' };
        }
        return this.finalize(userId, dialog.file, {
          category: dialog.category,
          title: dialog.title ?? '',
          season: dialog.season ?? 1,
          episode,
        });
      }

      default:
        return null;
    }
  }

  /**
   * Drops any open dialog, organize or bulk
   */
  cancel(userId: number): Reply {
    return this.sessions.clear(userId)
      ? { text: 'Cancelled.' }
      : { text: 'Nothing to cancel.' };
  }

  private dialog(userId: number): OrganizeDialog | undefined {
    const data = this.sessions.get(userId)?.data;
    return data?.kind === 'organize' ? data : undefined;
  }

  private async finalize(
    userId: number,
    file: OrganizeCandidate,
    metadata: PlacementMetadata
  ): Promise<Reply> {
    this.sessions.clear(userId);
    const resolution = detectResolution(file.name);

    try {
      const placed = await this.organizer.place({
        sourcePath: file.path,
        metadata: { ...metadata, ...(resolution !== undefined && { resolution }) },
        userId,
        method: 'manual',
        rename: true,
      });
      return {
        text: `Moved to ${placed.path}\nSend /organize for another file, or /propagate to place the following episodes.`,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('[OrganizeFlow] Finalize failed', {
        service: 'OrganizeFlow',
        operation: 'finalize',
        userId,
        file: file.path,
        error: message,
      });
      await this.errorLog.record({
        stage: 'organize',
        file: file.path,
        error: message,
        context: { userId, metadata },
      });
      return { text: `Could not move ${file.name}: ${message}\nThe file was left where it was.` };
    }
  }
}
