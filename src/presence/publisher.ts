/**
 * PublishLoop - fixed-cadence snapshot + feedback tick.
 *
 * Each tick:
 *   1. expire every tenant's packet window and re-run the classifier, so a
 *      phone that went silent drops to FAR without needing a new packet
 *   2. build the snapshot of recently seen tenants, draining their samples
 *   3. retune ALPHA and step the LED from the full tracked set
 *   4. serialize and hand the snapshot to the transport
 *
 * All tenant mutation in a tick happens synchronously before the first await.
 */

import type { PresenceClassifier } from './classifier.js';
import type { FeedbackController } from './feedback.js';
import type { TenantRegistry } from './registry.js';
import type { SignalTracker } from './signal.js';
import type { PresenceTransition, PublishedTenant, SnapshotTransport, Tenant } from './types.js';

export interface PublishLoopDeps {
  registry: TenantRegistry;
  tracker: SignalTracker;
  classifier: PresenceClassifier;
  feedback: FeedbackController;
  transport: SnapshotTransport;
  intervalMs: number;
  tenantTimeoutMs: number;
  onTransition: (transition: PresenceTransition) => void;
}

/**
 * Snapshot of tenants seen within the timeout. Timed-out tenants are left
 * out (and keep their samples) but stay tracked.
 */
export function buildSnapshot(
  tenants: Tenant[],
  tracker: SignalTracker,
  now: number,
  tenantTimeoutMs: number,
): PublishedTenant[] {
  const snapshot: PublishedTenant[] = [];
  for (const t of tenants) {
    if (t.lastSeenAt === null || now - t.lastSeenAt > tenantTimeoutMs) continue;
    snapshot.push({
      tenantId: t.tenantId,
      macAddress: t.macAddress,
      isNear: t.isNear,
      ewma: t.ewma,
      packetCount: t.packetTimestamps.length,
      extraRssis: tracker.drainSamples(t),
    });
  }
  return snapshot;
}

export class PublishLoop {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly deps: PublishLoopDeps) {}

  async tick(now: number = Date.now()): Promise<PublishedTenant[]> {
    const { registry, tracker, classifier, feedback, transport, tenantTimeoutMs, onTransition } = this.deps;
    const tenants = registry.list();

    for (const t of tenants) {
      tracker.expire(t, now);
      const transition = classifier.evaluate(t, now);
      if (transition) onTransition(transition);
    }

    const snapshot = buildSnapshot(tenants, tracker, now, tenantTimeoutMs);

    const anyoneNear = tenants.some((t) => t.isNear);
    classifier.adaptSensitivity(anyoneNear);
    const written = feedback.step(anyoneNear);

    if (transport.subscriberCount() > 0) {
      try {
        transport.publish(JSON.stringify(snapshot));
      } catch (err) {
        console.error('[Publisher] Failed to publish snapshot:', err instanceof Error ? err.message : err);
      }
    }

    await written;
    return snapshot;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.error('[Publisher] Tick failed:', err instanceof Error ? err.message : err);
      });
    }, this.deps.intervalMs);
    console.log(`[Publisher] Broadcasting every ${this.deps.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[Publisher] Stopped');
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
