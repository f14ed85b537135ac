import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// ---------------------------------------------------------------------------
// Presence Transitions -- every NEAR/FAR change, for arrival history
// ---------------------------------------------------------------------------
export const presenceTransitions = sqliteTable('presence_transitions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  timestamp: text('timestamp').notNull().default(sql`(datetime('now'))`),
  observedAt: integer('observed_at').notNull(),     // Unix timestamp ms of the deciding packet/tick
  tenantId: text('tenant_id').notNull(),
  macAddress: text('mac_address').notNull(),
  previousState: text('previous_state').notNull(),  // 'near' | 'far'
  newState: text('new_state').notNull(),
  ewma: real('ewma'),                               // null if no packet seen yet
  packetCount: integer('packet_count').notNull(),
});
