import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { config } from '../config.js';
import * as schema from './schema.js';

// Ensure the data directory exists before opening the database file
mkdirSync(dirname(config.dbPath), { recursive: true });

const sqlite: DatabaseType = new Database(config.dbPath);

// WAL keeps transition inserts from blocking readers of the history
sqlite.pragma('journal_mode = WAL');
sqlite.pragma('synchronous = NORMAL');

export const db = drizzle(sqlite, { schema });

// Export raw sqlite for migrations and shutdown
export { sqlite };
