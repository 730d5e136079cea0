import { drizzle } from 'drizzle-orm/libsql';
import { createClient } from '@libsql/client';
import { sql } from 'drizzle-orm';
import * as schema from './schema.js';

export type Database = ReturnType<typeof createDatabase>;

export function createDatabase(dbPath: string) {
  const client = createClient({ url: dbPath });
  const db = drizzle(client, { schema });
  return db;
}

export async function initDatabase(dbPath: string): Promise<Database> {
  const db = createDatabase(dbPath);

  await db.run(sql`PRAGMA foreign_keys = ON`);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS agents (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    )
  `);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS memories (
      id TEXT PRIMARY KEY,
      agent_id TEXT NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
      layer_1 TEXT NOT NULL,
      layer_2 TEXT NOT NULL,
      layer_3 TEXT NOT NULL,
      layer_1_embedding TEXT NOT NULL,
      layer_2_embedding TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]',
      importance_score REAL NOT NULL DEFAULT 0.5 CHECK (importance_score >= 0 AND importance_score <= 1),
      memory_type TEXT NOT NULL,
      temporal_layer TEXT NOT NULL DEFAULT 'working'
        CHECK (temporal_layer IN ('working', 'short', 'long', 'archive')),
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'expired', 'pending_review', 'archived', 'deleted')),
      domain TEXT NOT NULL DEFAULT 'general',
      source_type TEXT,
      expires_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      last_accessed TEXT,
      access_count INTEGER NOT NULL DEFAULT 0
    )
  `);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS memory_access_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      memory_id TEXT NOT NULL REFERENCES memories(id) ON DELETE CASCADE,
      agent_id TEXT NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
      layer_accessed INTEGER NOT NULL,
      query_text TEXT NOT NULL,
      relevance_score REAL NOT NULL,
      accessed_at TEXT NOT NULL
    )
  `);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS review_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      memory_id TEXT NOT NULL REFERENCES memories(id) ON DELETE CASCADE,
      decision TEXT NOT NULL,
      old_layer TEXT NOT NULL,
      new_layer TEXT NOT NULL,
      reason TEXT NOT NULL DEFAULT '',
      reviewed_by TEXT NOT NULL,
      reviewed_at TEXT NOT NULL
    )
  `);

  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_memories_agent_layer ON memories(agent_id, temporal_layer)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_memories_status_expiry ON memories(status, expires_at)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_access_log_memory ON memory_access_log(memory_id)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_review_log_memory ON review_log(memory_id)`);

  return db;
}

export { schema };
