/**
 * Schema setup for the PostgreSQL memory store.
 * Every statement is IF NOT EXISTS, so re-running is harmless.
 *
 * Usage: npm run migrate
 */
import { config } from './config.js'
import { closeDatabase, initDatabase, runMigrations } from './db.js'
import { safeError } from './utils/safe-log.js'

if (!config.databaseUrl) {
    console.error('[migrate] DATABASE_URL is not set; nothing to migrate (the server falls back to in-process memory)')
    process.exit(1)
}

initDatabase(config.databaseUrl)

try {
    const applied = await runMigrations()
    for (const name of applied) console.log(`[migrate] ok ${name}`)
    console.log(`[migrate] ${applied.length} statements applied`)
} catch (err) {
    console.error('[migrate] failed:', safeError(err))
    process.exitCode = 1
} finally {
    await closeDatabase()
}
