import express from 'express';
import { keysMatch } from '../services/IdentityValidator';
import { LoggerService } from '../services/LoggerService';
import { SettingsStore } from '../services/SettingsStore';
import { StreamStatus } from '../services/StreamStatusService';
import { TextTransform } from '../services/TextTransform';
import { StreamerSummary } from '../models/Streamer';
import { loadStreamer, requireStreamPassword } from '../middleware/streamAccessMiddleware';

export interface StreamRouteDeps {
  store: SettingsStore;
  status: StreamStatus;
  transform: TextTransform;
  viewerCount: (streamer: string) => number;
}

const logger = new LoggerService('StreamRoutes');

export function createStreamRouter({ store, status, transform, viewerCount }: StreamRouteDeps): express.Router {
  const router = express.Router();

  /**
   * Every registered streamer with live state and viewer count
   * GET /api/streams
   */
  router.get('/', async (_req, res) => {
    try {
      const streamers = await store.listStreamers();
      const summaries: StreamerSummary[] = await Promise.all(
        streamers.map(async (streamer) => ({
          username: streamer.username,
          live: await status.isLive(streamer.key),
          count: viewerCount(streamer.username),
          description: streamer.description ? transform(streamer.description) : '',
          locked: streamer.password !== null
        }))
      );
      res.json({ status: 'success', data: summaries });
    } catch (error) {
      logger.error('Failed to list streams', error);
      res.status(500).json({ status: 'error', message: 'Failed to list streams' });
    }
  });

  /**
   * Live state, viewer count and description of one stream
   * GET /api/streams/:streamer/info
   */
  router.get('/:streamer/info', loadStreamer(store), requireStreamPassword, async (req, res) => {
    const streamer = req.streamer;
    if (!streamer) {
      res.status(404).json({ status: 'error', message: 'Streamer not found' });
      return;
    }

    try {
      const live = await status.isLive(streamer.key);
      res.json({
        live,
        count: live ? viewerCount(streamer.username) : 0,
        description: streamer.description ? transform(streamer.description) : ''
      });
    } catch (error) {
      logger.error('Failed to read stream info', error, { streamer: streamer.username });
      res.status(500).json({ status: 'error', message: 'Failed to read stream info' });
    }
  });

  /**
   * Checks a viewer-supplied stream password
   * POST /api/streams/:streamer/password
   */
  router.post('/:streamer/password', loadStreamer(store), (req, res) => {
    const streamer = req.streamer;
    if (!streamer) {
      res.status(404).json({ status: 'error', message: 'Streamer not found' });
      return;
    }

    const body: unknown = req.body;
    const supplied = typeof body === 'object' && body !== null && 'password' in body ? body.password : undefined;

    if (streamer.password === null) {
      res.json({ status: 'success' });
      return;
    }
    if (typeof supplied !== 'string' || !keysMatch(supplied, streamer.password)) {
      res.status(403).json({ status: 'error', message: 'Invalid password' });
      return;
    }
    res.json({ status: 'success' });
  });

  return router;
}
