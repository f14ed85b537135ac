/**
 * PresenceClassifier - NEAR/FAR hysteresis.
 *
 *   FAR  -> NEAR  when ewma >= enter AND packets >= required
 *   NEAR -> FAR   when ewma <  exit  OR  packets <  required
 *
 * enter > exit is enforced by the tuning schema, so a reading between the two
 * thresholds keeps whatever state the tenant is already in.
 */

import type { SignalTracker } from './signal.js';
import { ProximityState, type PresenceTransition, type Tenant } from './types.js';

export interface ClassifierThresholds {
  enterThreshold: number;
  exitThreshold: number;
  packetsRequired: number;
  alphaNear: number;
  alphaFar: number;
}

export class PresenceClassifier {
  constructor(
    private readonly thresholds: ClassifierThresholds,
    private readonly tracker: SignalTracker,
  ) {}

  evaluate(tenant: Tenant, now: number): PresenceTransition | null {
    const { enterThreshold, exitThreshold, packetsRequired } = this.thresholds;
    const packetCount = tenant.packetTimestamps.length;
    const ewma = tenant.ewma;

    let next = tenant.isNear;
    if (!tenant.isNear) {
      next = ewma !== null && ewma >= enterThreshold && packetCount >= packetsRequired;
    } else if (ewma === null || ewma < exitThreshold || packetCount < packetsRequired) {
      next = false;
    }

    if (next === tenant.isNear) return null;
    tenant.isNear = next;

    const transition: PresenceTransition = {
      tenantId: tenant.tenantId,
      macAddress: tenant.macAddress,
      from: next ? ProximityState.FAR : ProximityState.NEAR,
      to: next ? ProximityState.NEAR : ProximityState.FAR,
      ewma,
      packetCount,
      at: now,
    };

    const ewmaText = ewma === null ? 'n/a' : ewma.toFixed(1);
    if (next) {
      console.log(`[Presence] ${tenant.tenantId} is NEAR (EWMA ${ewmaText} dB, pkts ${packetCount})`);
    } else {
      console.log(`[Presence] ${tenant.tenantId} went FAR (EWMA ${ewmaText} dB, pkts ${packetCount})`);
    }
    return transition;
  }

  /**
   * Retune the shared ALPHA: smoother while anyone is near (close-range RSSI
   * is jumpy), faster when nobody is so a newcomer is picked up quickly.
   * Returns true when ALPHA changed.
   */
  adaptSensitivity(anyoneNear: boolean): boolean {
    const target = anyoneNear ? this.thresholds.alphaNear : this.thresholds.alphaFar;
    if (this.tracker.alpha === target) return false;
    this.tracker.alpha = target;
    console.log(`[Presence] ALPHA adjusted to ${target} (${anyoneNear ? 'someone is near' : 'no one near'})`);
    return true;
  }
}
