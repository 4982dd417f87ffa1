/**
 * PostgreSQL pool for the memory store
 * Profiles, conversation turns and long-term memory facts.
 */

import pg from 'pg'

const { Pool } = pg
type PgPool = InstanceType<typeof Pool>

// Database pool (initialize with DATABASE_URL)
let pool: PgPool | null = null

export function initDatabase(databaseUrl: string): void {
  // Strip sslmode from URL; SSL is configured explicitly below
  const cleanUrl = databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

  pool = new Pool({
    connectionString: cleanUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    ssl: process.env.NODE_ENV === 'production'
      ? {
        ca: process.env.DATABASE_CA_CERT
          ? Buffer.from(process.env.DATABASE_CA_CERT, 'base64').toString()
          : undefined,
        rejectUnauthorized: !!process.env.DATABASE_CA_CERT,
      }
      : false,
  })
}

export function getPool(): PgPool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

export interface Migration {
  name: string
  sql: string
}

/** Idempotent DDL, applied in order on every startup */
export const MIGRATIONS: readonly Migration[] = [
  {
    name: 'user_profiles',
    sql: `
      CREATE TABLE IF NOT EXISTS user_profiles (
        user_id         TEXT PRIMARY KEY,
        persona_id      TEXT NOT NULL,
        preferred_city  TEXT,
        units           TEXT NOT NULL,
        response_style  TEXT NOT NULL,
        updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
  },
  {
    name: 'conversation_memory',
    sql: `
      CREATE TABLE IF NOT EXISTS conversation_memory (
        id          SERIAL PRIMARY KEY,
        user_id     TEXT NOT NULL,
        role        TEXT NOT NULL,
        message     TEXT NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
  },
  {
    name: 'memory_facts',
    sql: `
      CREATE TABLE IF NOT EXISTS memory_facts (
        id                SERIAL PRIMARY KEY,
        user_id           TEXT NOT NULL,
        memory_type       TEXT NOT NULL,
        value             TEXT NOT NULL,
        normalized_value  TEXT NOT NULL,
        importance        DOUBLE PRECISION NOT NULL DEFAULT 1.0,
        source_turn       TEXT,
        source_message    TEXT,
        created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        last_used_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (user_id, memory_type, normalized_value)
      )`,
  },
  {
    name: 'idx_conversation_user_time',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_conversation_user_time
        ON conversation_memory (user_id, created_at DESC)`,
  },
  {
    name: 'idx_memory_fact_user_type',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_memory_fact_user_type
        ON memory_facts (user_id, memory_type, last_used_at DESC)`,
  },
]

/** Apply every migration; returns the names applied, in order */
export async function runMigrations(): Promise<string[]> {
  const p = getPool()
  const applied: string[] = []
  for (const migration of MIGRATIONS) {
    await p.query(migration.sql)
    applied.push(migration.name)
  }
  return applied
}

// Cleanup
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}
