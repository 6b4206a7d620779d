import express, { Request, Response } from 'express';
import { LoggerService } from '../services/LoggerService';
import { SettingsStore } from '../services/SettingsStore';

const logger = new LoggerService('PublishRoutes');

// nginx-rtmp sends the stream key as `name`, as a query or form field.
function streamKeyOf(req: Request): string | undefined {
  const fromQuery = req.query.name;
  if (typeof fromQuery === 'string' && fromQuery) return fromQuery;

  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'name' in body && typeof body.name === 'string' && body.name) {
    return body.name;
  }
  return undefined;
}

/**
 * RTMP publish hooks. A publish is allowed only for a registered stream key.
 */
export function createPublishRouter(store: SettingsStore): express.Router {
  const router = express.Router();

  const onPublish = async (req: Request, res: Response) => {
    const key = streamKeyOf(req);
    if (!key) {
      res.status(404).send('No stream key');
      return;
    }

    try {
      const streamer = await store.findByKey(key);
      if (!streamer) {
        logger.warn('Rejected publish with unknown stream key', { ip: req.ip });
        res.status(404).send('Unknown stream key');
        return;
      }
      logger.info(`${streamer.username} started publishing`);
      res.status(200).send('Stream ok!');
    } catch (error) {
      logger.error('Publish check failed', error);
      res.status(500).send('Publish check failed');
    }
  };

  const onPublishDone = (_req: Request, res: Response) => {
    res.status(200).send('Stream ok!');
  };

  router.get('/on_publish', onPublish);
  router.post('/on_publish', onPublish);
  router.get('/on_publish_done', onPublishDone);
  router.post('/on_publish_done', onPublishDone);

  return router;
}
