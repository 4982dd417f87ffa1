/**
 * PostgreSQL memory store
 * Same contract as the in-memory store; conflict handling lives in SQL.
 */

import { getPool } from '../db.js'
import type {
    ClearMemoryResult,
    ConversationTurn,
    MemoryFact,
    ProfileUpdate,
    TurnRole,
    UserProfile,
} from '../types/memory.js'
import type { ResponseStyle, Units } from '../types/weather.js'
import {
    clampLimit,
    defaultProfile,
    MAX_TURN_LENGTH,
    mergeProfile,
    normalizeText,
    normalizeUserId,
    prepareFact,
    type FactInput,
    type FactQuery,
    type MemoryStore,
} from './store.js'

type Timestamp = Date | string

interface ProfileRow {
    userId: string
    personaId: string
    preferredCity: string | null
    units: string
    responseStyle: string
    updatedAt: Timestamp
}

interface TurnRow {
    id: string
    userId: string
    role: string
    message: string
    createdAt: Timestamp
}

interface FactRow {
    id: number
    userId: string
    memoryType: string
    value: string
    normalizedValue: string
    importance: number
    sourceTurn: string | null
    sourceMessage: string | null
    createdAt: Timestamp
    lastUsedAt: Timestamp
}

const FACT_COLUMNS = `id, user_id AS "userId", memory_type AS "memoryType", value,
    normalized_value AS "normalizedValue", importance, source_turn AS "sourceTurn",
    source_message AS "sourceMessage", created_at AS "createdAt", last_used_at AS "lastUsedAt"`

function iso(value: Timestamp): string {
    return value instanceof Date ? value.toISOString() : new Date(value).toISOString()
}

function toUnits(value: string): Units {
    return value === 'imperial' ? 'imperial' : 'metric'
}

function toStyle(value: string): ResponseStyle {
    return value === 'brief' || value === 'detailed' ? value : 'balanced'
}

function toProfile(row: ProfileRow): UserProfile {
    return {
        userId: row.userId,
        personaId: row.personaId,
        preferredCity: row.preferredCity,
        units: toUnits(row.units),
        responseStyle: toStyle(row.responseStyle),
        updatedAt: iso(row.updatedAt),
    }
}

function toFact(row: FactRow): MemoryFact {
    return {
        ...row,
        id: Number(row.id),
        importance: Number(row.importance),
        createdAt: iso(row.createdAt),
        lastUsedAt: iso(row.lastUsedAt),
    }
}

export class PgMemoryStore implements MemoryStore {
    constructor(private readonly now: () => Date = () => new Date()) {}

    async getProfile(userId: string): Promise<UserProfile> {
        const uid = normalizeUserId(userId)
        const result = await getPool().query<ProfileRow>(
            `SELECT user_id AS "userId", persona_id AS "personaId", preferred_city AS "preferredCity",
                    units, response_style AS "responseStyle", updated_at AS "updatedAt"
             FROM user_profiles
             WHERE user_id = $1`,
            [uid]
        )
        return result.rows.length > 0 ? toProfile(result.rows[0]) : defaultProfile(uid)
    }

    async upsertProfile(userId: string, update: ProfileUpdate): Promise<UserProfile> {
        const current = await this.getProfile(userId)
        const next = mergeProfile(current, update, this.now().toISOString())
        await getPool().query(
            `INSERT INTO user_profiles (user_id, persona_id, preferred_city, units, response_style, updated_at)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (user_id) DO UPDATE SET
                persona_id = EXCLUDED.persona_id,
                preferred_city = EXCLUDED.preferred_city,
                units = EXCLUDED.units,
                response_style = EXCLUDED.response_style,
                updated_at = EXCLUDED.updated_at`,
            [next.userId, next.personaId, next.preferredCity, next.units, next.responseStyle, next.updatedAt]
        )
        return next
    }

    async appendTurn(userId: string, role: TurnRole, message: string): Promise<string | null> {
        const text = message.trim().slice(0, MAX_TURN_LENGTH)
        if (!text) return null
        const result = await getPool().query<{ id: string }>(
            `INSERT INTO conversation_memory (user_id, role, message, created_at)
             VALUES ($1, $2, $3, $4)
             RETURNING id::text AS id`,
            [normalizeUserId(userId), role, text, this.now().toISOString()]
        )
        return result.rows[0]?.id ?? null
    }

    async getRecentTurns(userId: string, limit?: number): Promise<ConversationTurn[]> {
        const result = await getPool().query<TurnRow>(
            `SELECT id::text AS id, user_id AS "userId", role, message, created_at AS "createdAt"
             FROM conversation_memory
             WHERE user_id = $1
             ORDER BY id DESC
             LIMIT $2`,
            [normalizeUserId(userId), clampLimit(limit, 8, 50)]
        )
        return result.rows
            .map(row => ({
                id: row.id,
                userId: row.userId,
                role: row.role === 'assistant' ? 'assistant' as const : 'user' as const,
                message: row.message,
                createdAt: iso(row.createdAt),
            }))
            .reverse()
    }

    async upsertFact(input: FactInput): Promise<MemoryFact | null> {
        const fact = prepareFact(input)
        if (!fact) return null
        const timestamp = this.now().toISOString()
        const result = await getPool().query<FactRow>(
            `INSERT INTO memory_facts
                (user_id, memory_type, value, normalized_value, importance, source_turn, source_message,
                 created_at, last_used_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
             ON CONFLICT (user_id, memory_type, normalized_value) DO UPDATE SET
                importance = GREATEST(memory_facts.importance, EXCLUDED.importance),
                value = EXCLUDED.value,
                source_turn = EXCLUDED.source_turn,
                source_message = EXCLUDED.source_message,
                last_used_at = EXCLUDED.last_used_at
             RETURNING ${FACT_COLUMNS}`,
            [
                fact.userId, fact.memoryType, fact.value, fact.normalizedValue, fact.importance,
                fact.sourceTurn, fact.sourceMessage, timestamp,
            ]
        )
        return result.rows.length > 0 ? toFact(result.rows[0]) : null
    }

    async getFacts(userId: string, query: FactQuery = {}): Promise<MemoryFact[]> {
        const uid = normalizeUserId(userId)
        const limit = clampLimit(query.limit, 30, 500)
        const types = (query.memoryTypes ?? []).map(normalizeText).filter(Boolean)

        const result = types.length > 0
            ? await getPool().query<FactRow>(
                `SELECT ${FACT_COLUMNS} FROM memory_facts
                 WHERE user_id = $1 AND memory_type = ANY($2::text[])
                 ORDER BY importance DESC, last_used_at DESC
                 LIMIT $3`,
                [uid, types, limit]
            )
            : await getPool().query<FactRow>(
                `SELECT ${FACT_COLUMNS} FROM memory_facts
                 WHERE user_id = $1
                 ORDER BY importance DESC, last_used_at DESC
                 LIMIT $2`,
                [uid, limit]
            )
        return result.rows.map(toFact)
    }

    async touchFacts(ids: number[], usedAt: string): Promise<void> {
        if (ids.length === 0) return
        await getPool().query(
            `UPDATE memory_facts SET last_used_at = $2 WHERE id = ANY($1::int[])`,
            [ids, usedAt]
        )
    }

    async clearMemory(userId: string, clearProfile: boolean): Promise<ClearMemoryResult> {
        const uid = normalizeUserId(userId)
        const db = getPool()
        const turns = await db.query(`DELETE FROM conversation_memory WHERE user_id = $1`, [uid])
        const facts = await db.query(`DELETE FROM memory_facts WHERE user_id = $1`, [uid])

        let profileDeleted = 0
        if (clearProfile) {
            const profile = await db.query(`DELETE FROM user_profiles WHERE user_id = $1`, [uid])
            profileDeleted = profile.rowCount ?? 0
        } else {
            await db.query(
                `UPDATE user_profiles SET preferred_city = NULL, updated_at = $2 WHERE user_id = $1`,
                [uid, this.now().toISOString()]
            )
        }

        return {
            conversationDeleted: turns.rowCount ?? 0,
            memoryFactsDeleted: facts.rowCount ?? 0,
            profileDeleted,
        }
    }
}
