/**
 * Registry file reader.
 *
 * Format: { "tenantsAndMacs": [ { "id": "...", "mac": "..." } ] }
 * A missing file, bad JSON, a missing key or a non-array value all read as an
 * empty registry. Single bad entries are skipped.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { normalizeMac } from './mac.js';
import type { RegistryEntry, RegistrySnapshot } from './types.js';

const registryFileSchema = z.object({
  tenantsAndMacs: z.array(z.unknown()),
});

const registryEntrySchema = z.object({
  id: z.string().min(1),
  mac: z.string().refine((mac) => normalizeMac(mac) !== null, { message: 'not a MAC address' }),
});

export function parseRegistry(raw: unknown, source = 'registry'): RegistrySnapshot {
  const file = registryFileSchema.safeParse(raw);
  if (!file.success) {
    console.warn(`[Registry] ${source} has no tenantsAndMacs list, treating as empty`);
    return [];
  }

  const entries: RegistryEntry[] = [];
  file.data.tenantsAndMacs.forEach((item, index) => {
    const entry = registryEntrySchema.safeParse(item);
    if (!entry.success) {
      console.warn(`[Registry] Skipping entry #${index} in ${source}: ${entry.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    entries.push({ tenantId: entry.data.id, mac: entry.data.mac });
  });
  return entries;
}

export async function readRegistrySnapshot(path: string): Promise<RegistrySnapshot> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.log(`[Registry] ${path} not found, starting with empty tenant list`);
    } else {
      console.warn(`[Registry] Error reading ${path}:`, err instanceof Error ? err.message : err);
    }
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    console.warn(`[Registry] Error parsing ${path}:`, err instanceof Error ? err.message : err);
    return [];
  }
  return parseRegistry(raw, path);
}

/** Order-sensitive equality on normalized entries. */
export function snapshotsEqual(a: RegistrySnapshot, b: RegistrySnapshot): boolean {
  if (a.length !== b.length) return false;
  return a.every((entry, i) =>
    entry.tenantId === b[i].tenantId && normalizeMac(entry.mac) === normalizeMac(b[i].mac),
  );
}
