import 'dotenv/config';
import { z } from 'zod';

/**
 * Presence tuning. Thresholds are dBm, times are seconds, rates are Hz.
 * Converted to milliseconds once by the engine.
 */
export const presenceTuningSchema = z
  .object({
    enterThreshold: z.number().finite(),
    exitThreshold: z.number().finite(),
    windowSec: z.number().positive(),
    packetsRequired: z.number().int().positive(),
    alphaNear: z.number().gt(0).lte(1),
    alphaFar: z.number().gt(0).lte(1),
    broadcastHz: z.number().positive(),
    tenantTimeoutSec: z.number().positive(),
    minLevel: z.number().int().nonnegative(),
    maxLevel: z.number().int().positive(),
    levelStepUp: z.number().int().positive(),
    levelStepDown: z.number().int().positive(),
  })
  .refine((t) => t.enterThreshold > t.exitThreshold, {
    message: 'enterThreshold must be greater than exitThreshold',
    path: ['enterThreshold'],
  })
  .refine((t) => t.minLevel < t.maxLevel, {
    message: 'minLevel must be less than maxLevel',
    path: ['minLevel'],
  });

export type PresenceTuning = z.infer<typeof presenceTuningSchema>;

export const DEFAULT_TUNING: PresenceTuning = {
  enterThreshold: -65,
  exitThreshold: -69,
  windowSec: 4,
  packetsRequired: 4,
  alphaNear: 0.3,
  alphaFar: 0.8,
  broadcastHz: 5,
  tenantTimeoutSec: 10,
  minLevel: 10,
  maxLevel: 255,
  levelStepUp: 30,
  levelStepDown: 60,
};

/** Validate tuning, throwing a ZodError on a collapsed hysteresis band or bad ranges. */
export function parsePresenceTuning(input: unknown): PresenceTuning {
  return presenceTuningSchema.parse(input);
}

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return parseFloat(raw);
}

export const config = {
  port: parseInt(process.env.PORT || '8769', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Tenant registry file (written by the pairing tool)
  registryPath: process.env.REGISTRY_PATH || './tenants-and-macs.json',
  registryReloadDebounceMs: parseInt(process.env.REGISTRY_RELOAD_DEBOUNCE_MS || '100', 10),

  presence: parsePresenceTuning({
    enterThreshold: envNumber('PRESENCE_ENTER_THRESHOLD', DEFAULT_TUNING.enterThreshold),
    exitThreshold: envNumber('PRESENCE_EXIT_THRESHOLD', DEFAULT_TUNING.exitThreshold),
    windowSec: envNumber('PRESENCE_WINDOW_SEC', DEFAULT_TUNING.windowSec),
    packetsRequired: envNumber('PRESENCE_PACKETS_REQUIRED', DEFAULT_TUNING.packetsRequired),
    alphaNear: envNumber('PRESENCE_ALPHA_NEAR', DEFAULT_TUNING.alphaNear),
    alphaFar: envNumber('PRESENCE_ALPHA_FAR', DEFAULT_TUNING.alphaFar),
    broadcastHz: envNumber('BROADCAST_HZ', DEFAULT_TUNING.broadcastHz),
    tenantTimeoutSec: envNumber('TENANT_TIMEOUT_SEC', DEFAULT_TUNING.tenantTimeoutSec),
    minLevel: envNumber('MIN_BRIGHTNESS', DEFAULT_TUNING.minLevel),
    maxLevel: envNumber('MAX_BRIGHTNESS', DEFAULT_TUNING.maxLevel),
    levelStepUp: envNumber('BRIGHTNESS_STEP_UP', DEFAULT_TUNING.levelStepUp),
    levelStepDown: envNumber('BRIGHTNESS_STEP_DOWN', DEFAULT_TUNING.levelStepDown),
  }),

  // Logo LED
  brightnessEnabled: process.env.BRIGHTNESS_ENABLED !== 'false', // default true
  brightnessPath: process.env.BRIGHTNESS_PATH || '/sys/class/leds/ledlogo/brightness',

  // BLE observations arrive from the scanner over MQTT
  mqttEnabled: process.env.MQTT_ENABLED !== 'false', // default true
  mqttBrokerUrl: process.env.MQTT_BROKER_URL || 'mqtt://localhost:1883',
  mqttClientId: process.env.MQTT_CLIENT_ID || 'intercom-presence',
  bleObservationTopic: process.env.BLE_OBSERVATION_TOPIC || 'intercom/ble/observations',

  // Transition log
  dbPath: process.env.DB_PATH || './data/intercom.db',
  presenceLogEnabled: process.env.PRESENCE_LOG_ENABLED !== 'false', // default true

  // CORS
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://localhost:5173')
    .split(',')
    .filter(Boolean),
} as const;
