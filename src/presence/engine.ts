/**
 * PresenceEngine - owns all presence state for one receiver.
 *
 * Tenants, the shared ALPHA and the LED level live on this object, never in
 * module scope, so tests can run independent engines side by side. Every
 * public mutation is synchronous; the only awaits are the registry file read
 * (before reconcile) and the actuator write (after a tick's mutations).
 */

import type { PresenceTuning } from '../config.js';
import { PresenceClassifier } from './classifier.js';
import { FeedbackController } from './feedback.js';
import { PublishLoop } from './publisher.js';
import { TenantRegistry } from './registry.js';
import { RegistryWatcher } from './registry-watcher.js';
import { snapshotsEqual } from './registry-source.js';
import { SignalTracker } from './signal.js';
import type {
  BrightnessActuator,
  Observation,
  PresenceTransition,
  PublishedTenant,
  ReconcileResult,
  RegistrySnapshot,
  SnapshotTransport,
  TenantView,
  TransitionLog,
} from './types.js';

export interface PresenceEngineOptions {
  tuning: PresenceTuning;
  actuator: BrightnessActuator;
  transport: SnapshotTransport;
  loadSnapshot: () => Promise<RegistrySnapshot>;
  transitionLog?: TransitionLog;
  registryDebounceMs?: number;
  /** Registry file for the chokidar watcher. */
  registryWatchPath?: string;
}

export interface PresenceStats {
  tenants: number;
  near: number;
  alpha: number;
  brightness: number;
  subscribers: number;
}

export class PresenceEngine {
  readonly registry = new TenantRegistry();
  readonly tracker: SignalTracker;
  readonly classifier: PresenceClassifier;
  readonly feedback: FeedbackController;
  readonly publisher: PublishLoop;
  readonly watcher: RegistryWatcher;

  private lastApplied: RegistrySnapshot | null = null;

  constructor(private readonly options: PresenceEngineOptions) {
    const { tuning } = options;
    this.tracker = new SignalTracker(tuning.windowSec * 1000, tuning.alphaFar);
    this.classifier = new PresenceClassifier(tuning, this.tracker);
    this.feedback = new FeedbackController(tuning, options.actuator);
    this.publisher = new PublishLoop({
      registry: this.registry,
      tracker: this.tracker,
      classifier: this.classifier,
      feedback: this.feedback,
      transport: options.transport,
      intervalMs: Math.round(1000 / tuning.broadcastHz),
      tenantTimeoutMs: tuning.tenantTimeoutSec * 1000,
      onTransition: (t) => this.recordTransition(t),
    });
    this.watcher = new RegistryWatcher({
      reload: () => this.reloadRegistry(),
      debounceMs: options.registryDebounceMs ?? 100,
      watchPath: options.registryWatchPath,
    });
  }

  /**
   * Feed one BLE observation. Returns false for MACs not in the registry;
   * observations never create tenants.
   */
  ingest(observation: Observation): boolean {
    const tenant = this.registry.get(observation.macAddress);
    if (!tenant) return false;

    this.tracker.update(tenant, observation.signalStrengthDbm, observation.observedAt);
    const transition = this.classifier.evaluate(tenant, observation.observedAt);
    if (transition) this.recordTransition(transition);
    tenant.lastSeenAt = Math.max(tenant.lastSeenAt ?? 0, observation.observedAt);
    return true;
  }

  /** Reconcile against a snapshot unless it equals the last one applied. */
  applySnapshot(snapshot: RegistrySnapshot): ReconcileResult | null {
    if (this.lastApplied && snapshotsEqual(this.lastApplied, snapshot)) return null;
    this.lastApplied = snapshot;
    console.log(`[Registry] Loaded ${snapshot.length} tenants`);
    return this.registry.reconcile(snapshot);
  }

  async reloadRegistry(): Promise<ReconcileResult | null> {
    const snapshot = await this.options.loadSnapshot();
    return this.applySnapshot(snapshot);
  }

  tick(now?: number): Promise<PublishedTenant[]> {
    return this.publisher.tick(now);
  }

  async start(): Promise<void> {
    await this.reloadRegistry();
    const macs = this.registry.macs();
    console.log(macs.length > 0
      ? `[Presence] Scanning for: ${macs.join(', ')}`
      : '[Presence] No tenants loaded - waiting for registry updates');
    const { enterThreshold, exitThreshold, windowSec, packetsRequired } = this.options.tuning;
    console.log(`[Presence] ENTER >= ${enterThreshold} EXIT < ${exitThreshold} | window ${windowSec}s need ${packetsRequired} pkts`);
    this.publisher.start();
    this.watcher.start();
  }

  async stop(): Promise<void> {
    this.publisher.stop();
    await this.watcher.stop();
  }

  /** Non-draining view of every tracked tenant, including timed-out ones. */
  describe(): TenantView[] {
    return this.registry.list().map((t) => ({
      tenantId: t.tenantId,
      macAddress: t.macAddress,
      isNear: t.isNear,
      ewma: t.ewma,
      packetCount: t.packetTimestamps.length,
      lastSeenAt: t.lastSeenAt,
    }));
  }

  stats(): PresenceStats {
    const tenants = this.registry.list();
    return {
      tenants: tenants.length,
      near: tenants.filter((t) => t.isNear).length,
      alpha: this.tracker.alpha,
      brightness: this.feedback.level,
      subscribers: this.options.transport.subscriberCount(),
    };
  }

  private recordTransition(transition: PresenceTransition): void {
    this.options.transitionLog?.record(transition);
  }
}
