import express from 'express';
import cors from 'cors';
import { createHealthRouter } from './routes/healthRoutes';
import { createPublishRouter } from './routes/publishRoutes';
import { createStreamRouter } from './routes/streamRoutes';
import { SettingsStore } from './services/SettingsStore';
import { StreamStatus } from './services/StreamStatusService';
import { TextTransform } from './services/TextTransform';

export interface AppDeps {
  store: SettingsStore;
  status: StreamStatus;
  transform: TextTransform;
  corsOrigin: string | string[];
  viewerCount: (streamer: string) => number;
  sessionCount: () => number;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use('/health', createHealthRouter(deps.sessionCount));
  app.use('/api/streams', createStreamRouter(deps));
  app.use('/auth', createPublishRouter(deps.store));

  return app;
}
