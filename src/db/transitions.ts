/**
 * SQLite-backed transition log. Inserts are synchronous (better-sqlite3),
 * so a transition is stored within the same unit of work that caused it.
 */

import { db } from './index.js';
import { presenceTransitions } from './schema.js';
import type { PresenceTransition, TransitionLog } from '../presence/types.js';

export const sqliteTransitionLog: TransitionLog = {
  record(transition: PresenceTransition): void {
    try {
      db.insert(presenceTransitions).values({
        observedAt: transition.at,
        tenantId: transition.tenantId,
        macAddress: transition.macAddress,
        previousState: transition.from,
        newState: transition.to,
        ewma: transition.ewma,
        packetCount: transition.packetCount,
      }).run();
    } catch (err) {
      console.error('[Presence] Failed to log transition:', err instanceof Error ? err.message : err);
    }
  },
};
