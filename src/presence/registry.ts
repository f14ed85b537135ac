/**
 * TenantRegistry - authoritative MAC -> tenant mapping.
 *
 * Reconciling against a new snapshot keeps the existing Tenant object for
 * every MAC that survives, so smoothing, window and NEAR/FAR state are not
 * reset when the registry file is rewritten. Only tenantId is updated in place.
 */

import { normalizeMac } from './mac.js';
import type { ReconcileResult, RegistryEntry, RegistrySnapshot, Tenant } from './types.js';

export function createTenant(macAddress: string, tenantId: string): Tenant {
  return {
    macAddress,
    tenantId,
    ewma: null,
    packetTimestamps: [],
    isNear: false,
    lastSeenAt: null,
    pendingRssiSamples: [],
  };
}

export class TenantRegistry {
  private tenants: Map<string, Tenant> = new Map();

  reconcile(snapshot: RegistrySnapshot): ReconcileResult {
    // Last write wins for duplicate MACs within one snapshot
    const wanted = new Map<string, string>();
    for (const entry of snapshot) {
      const mac = normalizeMac(entry.mac);
      if (!mac) {
        console.warn(`[Registry] Skipping entry ${entry.tenantId}: invalid MAC '${entry.mac}'`);
        continue;
      }
      wanted.set(mac, entry.tenantId);
    }

    const result: ReconcileResult = { added: [], removed: [], renamed: [], unchanged: 0, total: 0 };
    const next = new Map<string, Tenant>();

    for (const [mac, tenantId] of wanted) {
      const existing = this.tenants.get(mac);
      if (existing) {
        if (existing.tenantId !== tenantId) {
          result.renamed.push({ mac, tenantId, previousTenantId: existing.tenantId });
          console.log(`[Registry] Updated tenant ${existing.tenantId} -> ${tenantId} (MAC: ${mac})`);
          existing.tenantId = tenantId;
        } else {
          result.unchanged++;
        }
        next.set(mac, existing);
      } else {
        next.set(mac, createTenant(mac, tenantId));
        result.added.push({ mac, tenantId });
        console.log(`[Registry] Added tenant ${tenantId} (MAC: ${mac})`);
      }
    }

    for (const [mac, tenant] of this.tenants) {
      if (!next.has(mac)) {
        result.removed.push({ mac, tenantId: tenant.tenantId });
        console.log(`[Registry] Removed tenant ${tenant.tenantId} (MAC: ${mac})`);
      }
    }

    this.tenants = next;
    result.total = next.size;
    console.log(`[Registry] Tenant list updated: ${next.size} tenants active`);
    return result;
  }

  /** Look up a tenant by any accepted MAC spelling. */
  get(mac: string): Tenant | undefined {
    const normalized = normalizeMac(mac);
    return normalized ? this.tenants.get(normalized) : undefined;
  }

  list(): Tenant[] {
    return Array.from(this.tenants.values());
  }

  macs(): string[] {
    return Array.from(this.tenants.keys());
  }

  entries(): RegistryEntry[] {
    return this.list().map((t) => ({ mac: t.macAddress, tenantId: t.tenantId }));
  }

  get size(): number {
    return this.tenants.size;
  }
}
