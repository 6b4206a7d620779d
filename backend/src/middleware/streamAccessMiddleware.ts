import { Request, Response, NextFunction, RequestHandler } from 'express';
import { StreamerSettings } from '../models/Streamer';
import { keysMatch } from '../services/IdentityValidator';
import { SettingsStore } from '../services/SettingsStore';
import { LoggerService } from '../services/LoggerService';

export const STREAM_PASSWORD_HEADER = 'x-stream-password';

// Extend Express Request interface to include the resolved streamer
declare global {
  namespace Express {
    interface Request {
      streamer?: StreamerSettings;
    }
  }
}

const logger = new LoggerService('StreamAccess');

/**
 * Resolves `:streamer` from the settings store and attaches it to the
 * request. Unknown streamers get a 404.
 */
export const loadStreamer = (store: SettingsStore): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const streamer = await store.lookupStreamer(req.params.streamer ?? '');
      if (!streamer) {
        res.status(404).json({ status: 'error', message: 'Streamer not found' });
        return;
      }
      req.streamer = streamer;
      next();
    } catch (error) {
      logger.error('Streamer lookup failed', error, { streamer: req.params.streamer });
      res.status(500).json({ status: 'error', message: 'Failed to look up streamer' });
    }
  };
};

/**
 * Rejects requests for a password-protected stream unless the password
 * header matches. Must run after `loadStreamer`.
 */
export const requireStreamPassword = (req: Request, res: Response, next: NextFunction) => {
  const streamer = req.streamer;
  if (!streamer) {
    res.status(404).json({ status: 'error', message: 'Streamer not found' });
    return;
  }

  const supplied = req.get(STREAM_PASSWORD_HEADER);
  if (streamer.password !== null && (supplied === undefined || !keysMatch(supplied, streamer.password))) {
    res.status(403).json({ status: 'error', message: 'This stream is password protected' });
    return;
  }

  next();
};
