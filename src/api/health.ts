import { Router } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { PresenceEngine } from '../presence/engine.js';
import { isBleSourceConnected } from '../clients/ble-mqtt.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const packageSchema = z.object({ version: z.string() });

let version = '1.0.0';
try {
  const pkgPath = join(__dirname, '..', '..', 'package.json');
  const pkg = packageSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
  if (pkg.success) version = pkg.data.version;
} catch (err) {
  console.warn('[Health] Could not read package version:', err instanceof Error ? err.message : err);
}

export function createHealthRouter(engine: PresenceEngine): Router {
  const healthRouter = Router();

  healthRouter.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version,
      presence: engine.stats(),
      bleSource: { connected: isBleSourceConnected() },
    });
  });

  return healthRouter;
}
