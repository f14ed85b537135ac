/**
 * Presence engine types.
 * Two-state machine (NEAR/FAR) with an asymmetric hysteresis band so a phone
 * hovering around one threshold does not flap.
 */

export enum ProximityState {
  NEAR = 'near',
  FAR = 'far',
}

export interface Tenant {
  readonly macAddress: string;   // Normalized, e.g. AA:BB:CC:DD:EE:FF
  tenantId: string;              // Opaque id from the registry file
  ewma: number | null;           // Smoothed RSSI (dBm), null until first packet
  packetTimestamps: number[];    // Epoch ms, oldest first, bounded by the window
  isNear: boolean;               // Written only by PresenceClassifier
  lastSeenAt: number | null;     // Epoch ms of most recent observation
  pendingRssiSamples: number[];  // Raw samples since the last publish tick
}

/** One (tenantId, mac) pair from the registry. */
export interface RegistryEntry {
  tenantId: string;
  mac: string;
}

export type RegistrySnapshot = readonly RegistryEntry[];

export interface ReconcileResult {
  added: RegistryEntry[];
  removed: RegistryEntry[];
  renamed: Array<RegistryEntry & { previousTenantId: string }>;
  unchanged: number;
  total: number;
}

/** Typed boundary record delivered by the BLE scanner. */
export interface Observation {
  macAddress: string;
  signalStrengthDbm: number;
  observedAt: number;
}

export interface PresenceTransition {
  tenantId: string;
  macAddress: string;
  from: ProximityState;
  to: ProximityState;
  ewma: number | null;
  packetCount: number;
  at: number;
}

/** One element of the per-tick publish message. */
export interface PublishedTenant {
  tenantId: string;
  macAddress: string;
  isNear: boolean;
  ewma: number | null;
  packetCount: number;
  extraRssis: number[];
}

/** Non-draining view used by the HTTP API. */
export interface TenantView {
  tenantId: string;
  macAddress: string;
  isNear: boolean;
  ewma: number | null;
  packetCount: number;
  lastSeenAt: number | null;
}

export interface SnapshotTransport {
  subscriberCount(): number;
  publish(payload: string): void;
}

export interface BrightnessActuator {
  write(level: number): Promise<void>;
}

export interface TransitionLog {
  record(transition: PresenceTransition): void;
}
