import express from 'express';

export function createHealthRouter(sessionCount: () => number): express.Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: sessionCount()
    });
  });

  return router;
}
