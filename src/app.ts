import { AppConfig } from './config/types.js';
import { SqliteConnection } from './database/connections/SqliteConnection.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { DatabaseConnection } from './types/database.js';
import { DialogState } from './types/session.js';
import { MetadataProvider } from './types/providers/metadata.js';
import {
  ChatTransport,
  InboundCallbackEvent,
  InboundFileEvent,
  InboundTextEvent,
  Reply,
} from './types/transport.js';
import { AdminGuard, CommandRateGuard } from './middleware/security.js';
import { initializeLogger, logger } from './middleware/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';
import { TMDBClient } from './services/providers/tmdb/TMDBClient.js';
import { TMDBMetadataProvider } from './services/providers/tmdb/TMDBMetadataProvider.js';
import { MetadataClassifier } from './services/media/MetadataClassifier.js';
import { ConfidenceGate } from './services/media/confidenceGate.js';
import { MediaProcessingService } from './services/media/MediaProcessingService.js';
import { FileOperations } from './services/files/fileOperations.js';
import { LowConfidenceLog } from './services/files/lowConfidenceLog.js';
import { SessionStore } from './services/session/SessionStore.js';
import { OrganizeService } from './services/organize/OrganizeService.js';
import { OrganizeFlow } from './services/organize/OrganizeFlow.js';
import { BulkPropagationService } from './services/organize/BulkPropagationService.js';
import { OrganizedRecordService } from './services/records/OrganizedRecordService.js';
import { ErrorLogService } from './services/records/ErrorLogService.js';
import { UserService } from './services/records/UserService.js';
import { DownloadStatsService } from './services/stats/DownloadStatsService.js';
import { DownloadScheduler } from './services/downloads/DownloadScheduler.js';
import { DownloadRequest, DownloadTask } from './services/downloads/DownloadTask.js';
import { DownloadNotifier } from './services/downloads/DownloadNotifier.js';
import { DiagnosticsService } from './services/diagnostics/DiagnosticsService.js';
import { DownloadController } from './controllers/downloadController.js';
import { OrganizeController } from './controllers/organizeController.js';
import { AdminController } from './controllers/adminController.js';
import { ChatRouter, createChatRouter } from './routes/chatRoutes.js';

export interface AppDependencies {
  transport: ChatTransport;
  /** null disables lookups; omitted builds the TMDB provider from config */
  metadataProvider?: MetadataProvider | null;
  database?: DatabaseConnection;
  /** called after a /shutdown-triggered stop completes */
  onStopped?: () => void;
  now?: () => number;
}

/**
 * Composition root. Every collaborator is built once here and handed
 * down explicitly; the chat transport adapter calls the three handle* methods.
 */
export class App {
  readonly scheduler: DownloadScheduler<DownloadTask>;
  readonly sessions: SessionStore<DialogState>;
  readonly stats: DownloadStatsService;
  readonly records: OrganizedRecordService;

  private readonly db: DatabaseConnection;
  private readonly transport: ChatTransport;
  private readonly router: ChatRouter;
  private readonly downloads: DownloadController;
  private readonly rateGuard: CommandRateGuard;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly deps: AppDependencies
  ) {
    this.transport = deps.transport;
    this.db = deps.database ?? new SqliteConnection(config.database.filename);
    const now = deps.now ?? Date.now;

    const files = new FileOperations({
      maxAttempts: config.files.retryAttempts,
      initialDelayMs: config.files.retryInitialDelayMs,
      maxDelayMs: config.files.retryMaxDelayMs,
    });
    this.records = new OrganizedRecordService(this.db);
    const errorLog = new ErrorLogService(this.db);
    const users = new UserService(this.db);
    this.stats = new DownloadStatsService(this.db);
    this.sessions = new SessionStore<DialogState>(config.sessions.ttlMinutes * 60_000, now);

    const organizer = new OrganizeService(config.paths, files, this.records);
    const metadataProvider = this.buildMetadataProvider();
    const processor = new MediaProcessingService(
      new MetadataClassifier(metadataProvider),
      new ConfidenceGate(config.confidence),
      organizer,
      new LowConfidenceLog(config.paths.lowConfidenceLog),
      errorLog
    );
    const notifier = new DownloadNotifier(this.transport);

    this.scheduler = new DownloadScheduler<DownloadTask>(config.downloads.maxConcurrent, {
      onStarted: (_task, activeCount) => this.stats.updatePeakConcurrent(activeCount),
    });

    const createTask = (request: DownloadRequest): DownloadTask =>
      new DownloadTask(request, {
        transport: this.transport,
        processor,
        files,
        stats: this.stats,
        observer: notifier,
        downloadDir: config.paths.downloads,
        maxDurationMs: config.downloads.maxDurationSeconds * 1000,
        largeFileThresholdBytes: config.downloads.largeFileThresholdBytes,
        progressIntervalRegularMs: config.downloads.progressIntervalRegularSeconds * 1000,
        progressIntervalLargeMs: config.downloads.progressIntervalLargeSeconds * 1000,
        now,
      });

    const inFlight = (): string[] =>
      this.scheduler.inProgress().flatMap(snapshot => (snapshot.destinationPath ? [snapshot.destinationPath] : []));

    const flow = new OrganizeFlow(this.sessions, organizer, this.records, files, errorLog, {
      directories: [config.paths.downloads, config.paths.other],
      extensions: config.downloads.mediaExtensions,
      inFlight,
    });
    const bulk = new BulkPropagationService(this.sessions, organizer, this.records, files, errorLog, {
      downloadDir: config.paths.downloads,
      extensions: config.downloads.mediaExtensions,
      similarityThreshold: config.confidence.bulkSimilarity,
      inFlight,
    });

    const guard = new AdminGuard(config.adminIds);
    this.rateGuard = new CommandRateGuard(config.commandRate.maxCommands, config.commandRate.windowSeconds, now);
    this.downloads = new DownloadController({
      scheduler: this.scheduler,
      createTask,
      users,
      stats: this.stats,
      guard,
      diagnostics: new DiagnosticsService(config.paths, files, metadataProvider !== null),
      extensions: config.downloads.mediaExtensions,
    });
    this.router = createChatRouter(
      { admin: guard, rate: this.rateGuard },
      {
        downloads: this.downloads,
        organize: new OrganizeController(flow, bulk),
        admin: new AdminController(this.records, organizer, users, errorLog, () => this.requestShutdown(), now),
      }
    );
  }

  async start(): Promise<void> {
    initializeLogger(this.config.logging);

    if (this.db.connect) {
      await this.db.connect();
    }
    await new MigrationRunner(this.db).migrate();
    await this.stats.load();
    this.sessions.startSweep(this.config.sessions.sweepIntervalSeconds * 1000);
    this.rateGuard.startSweep();

    logger.info('[App] Started', {
      service: 'App',
      operation: 'start',
      maxConcurrent: this.config.downloads.maxConcurrent,
      downloads: this.config.paths.downloads,
      metadataLookups: this.config.providers.tmdb.apiKey !== undefined,
    });
  }

  /**
   * Drain downloads, then release resources. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  handleFile = async (event: InboundFileEvent): Promise<void> => {
    const reply = await this.guarded('handleFile', event.requesterId, () => this.downloads.handleFile(event));
    if (reply) {
      await this.send(event.chatId, reply);
    }
  };

  handleText = async (event: InboundTextEvent): Promise<void> => {
    const reply = await this.guarded('handleText', event.userId, () => this.router.handleText(event));
    if (reply) {
      await this.send(event.chatId, reply);
    }
  };

  /**
   * Callback answers replace the message that carried the button
   */
  handleCallback = async (event: InboundCallbackEvent): Promise<void> => {
    const reply = await this.guarded('handleCallback', event.userId, () => this.router.handleCallback(event));
    if (!reply) {
      return;
    }
    try {
      await this.transport.editMessage(event.chatId, event.messageId, reply.text, {
        ...(reply.buttons && { buttons: reply.buttons }),
      });
    } catch (error) {
      logger.debug('[App] Edit failed, sending reply instead', {
        service: 'App',
        operation: 'handleCallback',
        error: getErrorMessage(error),
      });
      await this.send(event.chatId, reply);
    }
  };

  private async shutdown(): Promise<void> {
    logger.info('[App] Stopping', { service: 'App', operation: 'stop' });

    const drained = await this.scheduler.drain(this.config.shutdownTimeoutSeconds * 1000);
    logger.info('[App] Downloads drained', { service: 'App', operation: 'stop', ...drained });

    this.sessions.stop();
    this.rateGuard.stop();
    try {
      await this.stats.save();
    } catch (error) {
      logger.error('[App] Failed to save stats on shutdown', {
        service: 'App',
        operation: 'stop',
        error: getErrorMessage(error),
      });
    }
    await this.db.close();
    logger.info('[App] Stopped', { service: 'App', operation: 'stop' });
  }

  private requestShutdown(): void {
    this.stop().then(
      () => this.deps.onStopped?.(),
      (error: unknown) => {
        logger.error('[App] Shutdown failed', {
          service: 'App',
          operation: 'requestShutdown',
          error: getErrorMessage(error),
        });
      }
    );
  }

  private buildMetadataProvider(): MetadataProvider | null {
    if (this.deps.metadataProvider !== undefined) {
      return this.deps.metadataProvider;
    }
    const tmdb = this.config.providers.tmdb;
    if (!tmdb.apiKey) {
      logger.warn('[App] TMDB_API_KEY is not set; every file will be classified as unknown', {
        service: 'App',
      });
      return null;
    }
    return new TMDBMetadataProvider(
      new TMDBClient({
        apiKey: tmdb.apiKey,
        baseUrl: tmdb.baseUrl,
        language: tmdb.language,
        timeoutMs: tmdb.timeoutMs,
        rateLimit: tmdb.rateLimit,
        rateLimitWindow: tmdb.rateLimitWindow,
      })
    );
  }

  private async guarded<T>(operation: string, userId: number, work: () => Promise<T>): Promise<T | null> {
    try {
      return await work();
    } catch (error) {
      logger.error('[App] Event handling failed', {
        service: 'App',
        operation,
        userId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private async send(chatId: number, reply: Reply): Promise<void> {
    try {
      await this.transport.sendMessage(chatId, reply.text, {
        ...(reply.buttons && { buttons: reply.buttons }),
      });
    } catch (error) {
      logger.warn('[App] Failed to send reply', {
        service: 'App',
        operation: 'send',
        chatId,
        error: getErrorMessage(error),
      });
    }
  }
}
