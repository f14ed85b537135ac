/**
 * SignalTracker - per-tenant EWMA of RSSI plus a rolling packet window.
 *
 * ALPHA is shared by every tenant and is retuned by the classifier once per
 * publish tick, so it lives here rather than on the Tenant.
 */

import type { Tenant } from './types.js';

export class SignalTracker {
  constructor(
    private readonly windowMs: number,
    public alpha: number,
  ) {}

  update(tenant: Tenant, signalStrength: number, now: number): void {
    tenant.ewma = tenant.ewma === null
      ? signalStrength
      : this.alpha * signalStrength + (1 - this.alpha) * tenant.ewma;

    // Keep the window non-decreasing even if the scanner reports out of order
    const newest = tenant.packetTimestamps[tenant.packetTimestamps.length - 1];
    tenant.packetTimestamps.push(newest !== undefined && newest > now ? newest : now);
    this.expire(tenant, now);

    tenant.pendingRssiSamples.push(signalStrength);
  }

  /** Drop packet times older than the window. Returns the remaining count. */
  expire(tenant: Tenant, now: number): number {
    const times = tenant.packetTimestamps;
    while (times.length > 0 && now - times[0] > this.windowMs) {
      times.shift();
    }
    return times.length;
  }

  /** Return and clear the samples gathered since the previous call. */
  drainSamples(tenant: Tenant): number[] {
    const samples = tenant.pendingRssiSamples;
    tenant.pendingRssiSamples = [];
    return samples;
  }
}
