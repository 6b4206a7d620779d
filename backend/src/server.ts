import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { ChatService } from './services/ChatService';
import { LoggerService } from './services/LoggerService';
import { JsonFileSettingsStore } from './services/SettingsStore';
import { HlsStreamStatus } from './services/StreamStatusService';
import { emoteTransform } from './services/TextTransform';

const logger = new LoggerService('Server');

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await JsonFileSettingsStore.open(config.streamersFile);

  const status = new HlsStreamStatus({
    hlsDir: config.hlsDir,
    playlistLength: config.hlsPlaylistLength,
    quality: config.videoQualities[0]
  });

  const app = createApp({
    store,
    status,
    transform: emoteTransform,
    corsOrigin: config.corsOrigin,
    viewerCount: (streamer) => chatService.viewerCount(streamer),
    sessionCount: () => chatService.sessionCount()
  });

  const server = http.createServer(app);
  const chatService = new ChatService(server, {
    store,
    corsOrigin: config.corsOrigin,
    presenceWindowSeconds: config.presenceWindowSeconds,
    transform: emoteTransform
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully`);

    // Closing socket.io also closes the HTTP server it is attached to.
    chatService
      .close()
      .then(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
  });
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start server', error);
  process.exit(1);
});
