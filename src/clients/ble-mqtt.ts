/**
 * BLE observation source.
 *
 * The scanner publishes every advertisement it hears from a bonded phone to
 * an MQTT topic. Payload is one observation or an array of them:
 *   { "address": "AA:BB:CC:DD:EE:FF", "rssi": -61 }
 * Observations are stamped with their arrival time. Any scanner-side
 * timestamp is ignored: windows and staleness run on the local clock.
 */

import mqtt, { type MqttClient } from 'mqtt';
import { z } from 'zod';
import type { Observation } from '../presence/types.js';

const observationSchema = z.object({
  address: z.string().min(1),
  rssi: z.number().int().finite(),
});

const payloadSchema = z.union([observationSchema, z.array(observationSchema)]);

export interface BleMqttOptions {
  brokerUrl: string;
  clientId: string;
  topic: string;
}

let client: MqttClient | null = null;
let isConnected = false;

/**
 * Parse one MQTT message into typed observations.
 * Returns an empty list (and logs) for anything that does not validate.
 */
export function parseObservationMessage(message: string, receivedAt: number): Observation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch (err) {
    console.warn('[BLE MQTT] Dropping non-JSON payload:', err instanceof Error ? err.message : err);
    return [];
  }

  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[BLE MQTT] Dropping invalid payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return [];
  }

  const items = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return items.map((item) => ({
    macAddress: item.address,
    signalStrengthDbm: item.rssi,
    observedAt: receivedAt,
  }));
}

/**
 * Connect and subscribe. Observations are delivered through onObservation
 * on the event loop; the client keeps reconnecting if the broker drops.
 */
export function startBleObservationSource(
  options: BleMqttOptions,
  onObservation: (observation: Observation) => void,
): void {
  if (client) {
    console.warn('[BLE MQTT] Already running');
    return;
  }

  console.log(`[BLE MQTT] Connecting to ${options.brokerUrl}...`);

  const mqttClient = mqtt.connect(options.brokerUrl, {
    clientId: options.clientId,
    clean: true,
    connectTimeout: 5000,
    reconnectPeriod: 5000,
  });
  client = mqttClient;

  mqttClient.on('connect', () => {
    isConnected = true;
    console.log('[BLE MQTT] Connected to broker');

    mqttClient.subscribe(options.topic, { qos: 0 }, (err) => {
      if (err) {
        console.error(`[BLE MQTT] Failed to subscribe to ${options.topic}:`, err.message);
        return;
      }
      console.log(`[BLE MQTT] Subscribed to ${options.topic}`);
    });
  });

  mqttClient.on('message', (_topic, message) => {
    for (const observation of parseObservationMessage(message.toString(), Date.now())) {
      onObservation(observation);
    }
  });

  mqttClient.on('error', (err) => {
    console.error('[BLE MQTT] Error:', err.message);
  });

  mqttClient.on('close', () => {
    if (isConnected) console.log('[BLE MQTT] Disconnected from broker');
    isConnected = false;
  });
}

export function stopBleObservationSource(): void {
  if (client) {
    client.end(true);
    client = null;
  }
  isConnected = false;
  console.log('[BLE MQTT] Stopped');
}

export function isBleSourceConnected(): boolean {
  return isConnected;
}
