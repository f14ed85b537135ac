import { sqlite } from './index.js';

/**
 * Create tables directly with CREATE TABLE IF NOT EXISTS.
 * Safe to run on every boot.
 */
export function runMigrations(): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS presence_transitions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL DEFAULT (datetime('now')),
      observed_at INTEGER NOT NULL,
      tenant_id TEXT NOT NULL,
      mac_address TEXT NOT NULL,
      previous_state TEXT NOT NULL,
      new_state TEXT NOT NULL,
      ewma REAL,
      packet_count INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_transitions_tenant ON presence_transitions(tenant_id);
    CREATE INDEX IF NOT EXISTS idx_transitions_mac ON presence_transitions(mac_address);
    CREATE INDEX IF NOT EXISTS idx_transitions_observed ON presence_transitions(observed_at);
  `);

  console.log('Database migrations applied (direct SQL)');
}
