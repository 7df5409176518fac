import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { logger } from './middleware/logging.js';
import { ChatTransport } from './types/transport.js';

export { App } from './app.js';
export type { AppDependencies } from './app.js';
export { ConfigManager } from './config/ConfigManager.js';
export { buildDefaultConfig } from './config/defaults.js';
export * from './config/types.js';
export * from './errors/index.js';
export * from './types/transport.js';
export * from './types/download.js';
export * from './types/media.js';
export * from './types/providers/metadata.js';
export { DownloadScheduler } from './services/downloads/DownloadScheduler.js';
export type { SchedulableTask } from './services/downloads/DownloadScheduler.js';
export { DownloadTask } from './services/downloads/DownloadTask.js';
export type { DownloadObserver } from './services/downloads/DownloadTask.js';
export { SessionStore } from './services/session/SessionStore.js';
export { parseFilename } from './services/media/filenameParser.js';
export { titleSimilarity } from './services/media/titleSimilarity.js';
export { logger } from './middleware/logging.js';

/**
 * Start the service on top of a transport adapter and stop it cleanly on
 * process signals or /shutdown.
 */
export async function runMediashelf(transport: ChatTransport): Promise<App> {
  const config = ConfigManager.getInstance().getConfig();
  const app = new App(config, {
    transport,
    onStopped: () => process.exit(0),
  });

  const stopAndExit = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to shut down gracefully', { error });
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => stopAndExit('SIGTERM'));
  process.on('SIGINT', () => stopAndExit('SIGINT'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected', {
      reason: reason instanceof Error ? { name: reason.name, message: reason.message, stack: reason.stack } : reason,
    });
    app
      .stop()
      .catch((shutdownError: unknown) => {
        logger.error('Failed to shut down after unhandled rejection', { shutdownError });
      })
      .finally(() => process.exit(1));
  });

  await app.start();
  return app;
}
