import express from 'express';
import { createServer } from 'node:http';
import { resolve } from 'node:path';
import cors from 'cors';
import { config } from './config.js';
import { createRouter } from './api/routes.js';
import { setupSocketIO } from './realtime/socket.js';
import { SubscriberSet } from './realtime/subscribers.js';
import { PresenceEngine } from './presence/engine.js';
import { readRegistrySnapshot } from './presence/registry-source.js';
import type { TransitionLog } from './presence/types.js';
import { LoggingBrightness, SysfsBrightness } from './clients/brightness.js';
import { startBleObservationSource, stopBleObservationSource } from './clients/ble-mqtt.js';

console.log('[System] Intercom proximity server starting...');

// Transition history is optional: run without it if the database is unavailable
let transitionLog: TransitionLog | undefined;
let closeDatabase: (() => void) | undefined;
if (config.presenceLogEnabled) {
  try {
    const { runMigrations } = await import('./db/migrate.js');
    const { sqliteTransitionLog } = await import('./db/transitions.js');
    const { sqlite } = await import('./db/index.js');
    runMigrations();
    transitionLog = sqliteTransitionLog;
    closeDatabase = () => sqlite.close();
  } catch (err) {
    console.error('Failed to open transition database:', err);
    console.warn('Starting without transition log -- history will be unavailable');
  }
}

const registryPath = resolve(config.registryPath);
const subscribers = new SubscriberSet();

const engine = new PresenceEngine({
  tuning: config.presence,
  actuator: config.brightnessEnabled
    ? new SysfsBrightness(config.brightnessPath)
    : new LoggingBrightness(),
  transport: subscribers,
  loadSnapshot: () => readRegistrySnapshot(registryPath),
  transitionLog,
  registryDebounceMs: config.registryReloadDebounceMs,
  registryWatchPath: registryPath,
});

// Create Express app and HTTP server
const app = express();
const server = createServer(app);

app.use(cors({
  origin: config.corsOrigins,
  credentials: true,
}));
app.use(express.json());
app.use(createRouter(engine));

const { io } = setupSocketIO(server, subscribers);

await engine.start();

if (config.mqttEnabled) {
  startBleObservationSource(
    {
      brokerUrl: config.mqttBrokerUrl,
      clientId: config.mqttClientId,
      topic: config.bleObservationTopic,
    },
    (observation) => {
      engine.ingest(observation);
    },
  );
} else {
  console.warn('[BLE MQTT] Disabled via config -- no observations will arrive');
}

// Listen on `server`, not `app` (Socket.IO requirement)
server.listen(config.port, () => {
  console.log(`Intercom presence server running on port ${config.port}`);
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Socket.IO:   ws://localhost:${config.port}/presence (broadcast ${config.presence.broadcastHz} Hz)`);
  console.log(`  Registry:    ${registryPath}`);
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`\n[${signal}] Shutting down gracefully...`);
  stopBleObservationSource();
  engine.stop()
    .catch((err) => {
      console.error('[Presence] Error during stop:', err instanceof Error ? err.message : err);
    })
    .finally(() => {
      closeDatabase?.();
      io.close();
      server.close(() => {
        console.log('Server closed.');
        process.exit(0);
      });
    });
  // Force exit after 10 seconds
  setTimeout(() => {
    console.error('Forced shutdown after timeout.');
    process.exit(1);
  }, 10000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
