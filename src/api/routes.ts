import { Router } from 'express';
import type { PresenceEngine } from '../presence/engine.js';
import { createHealthRouter } from './health.js';

export function createRouter(engine: PresenceEngine): Router {
  const router = Router();

  router.use('/api/health', createHealthRouter(engine));

  // Read-only view; does not drain the samples the next broadcast will carry
  router.get('/api/presence', (_req, res) => {
    res.json({ tenants: engine.describe(), timestamp: Date.now() });
  });

  // Same path as a file-change notification: queued, reloaded after debounce
  router.post('/api/registry/reload', (_req, res) => {
    engine.watcher.notify();
    res.status(202).json({ queued: true });
  });

  return router;
}
