/**
 * In-process stand-ins for the engine's collaborators.
 */

import type { PresenceTuning } from '../config.js';
import type {
  BrightnessActuator,
  PresenceTransition,
  RegistrySnapshot,
  SnapshotTransport,
  TransitionLog,
} from '../presence/types.js';

export const TEST_TUNING: PresenceTuning = {
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

export class FakeTransport implements SnapshotTransport {
  subscribers = 1;
  payloads: string[] = [];

  subscriberCount(): number {
    return this.subscribers;
  }

  publish(payload: string): void {
    this.payloads.push(payload);
  }
}

export class FakeActuator implements BrightnessActuator {
  writes: number[] = [];
  failNext = false;

  async write(level: number): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('EACCES: permission denied');
    }
    this.writes.push(level);
  }
}

export class FakeTransitionLog implements TransitionLog {
  transitions: PresenceTransition[] = [];

  record(transition: PresenceTransition): void {
    this.transitions.push(transition);
  }
}

export function fixedSnapshot(snapshot: RegistrySnapshot): () => Promise<RegistrySnapshot> {
  return async () => snapshot;
}
