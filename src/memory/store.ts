/**
 * Memory Store contract
 *
 * One persistent store per process, shared by all requests. Implementations:
 *   - PgMemoryStore        (DATABASE_URL set)
 *   - InMemoryMemoryStore  (no database; tests and local runs)
 *
 * Facts are unique on (userId, memoryType, normalizedValue). Re-inserting a
 * fact keeps the larger importance and refreshes value, source and lastUsedAt.
 */

import type {
    ClearMemoryResult,
    ConversationTurn,
    MemoryFact,
    ProfileUpdate,
    TurnRole,
    UserProfile,
} from '../types/memory.js'

export const DEFAULT_USER_ID = 'guest'
export const DEFAULT_PERSONA_ID = 'professional'

export const MAX_TURN_LENGTH = 2000
export const MAX_FACT_VALUE_LENGTH = 300
export const MAX_SOURCE_MESSAGE_LENGTH = 500
export const MIN_IMPORTANCE = 0.1
export const MAX_IMPORTANCE = 5.0

export interface FactInput {
    userId: string
    memoryType: string
    value: string
    importance?: number
    sourceTurn?: string | null
    sourceMessage?: string | null
}

export interface FactQuery {
    memoryTypes?: string[]
    limit?: number
}

export interface MemoryStore {
    /** Stored profile, or defaults when the user has none */
    getProfile(userId: string): Promise<UserProfile>
    upsertProfile(userId: string, update: ProfileUpdate): Promise<UserProfile>
    /** Id of the stored turn, null for an empty message */
    appendTurn(userId: string, role: TurnRole, message: string): Promise<string | null>
    /** Oldest first */
    getRecentTurns(userId: string, limit?: number): Promise<ConversationTurn[]>
    upsertFact(input: FactInput): Promise<MemoryFact | null>
    /** Ordered by importance, then lastUsedAt, both descending */
    getFacts(userId: string, query?: FactQuery): Promise<MemoryFact[]>
    touchFacts(ids: number[], usedAt: string): Promise<void>
    clearMemory(userId: string, clearProfile: boolean): Promise<ClearMemoryResult>
}

// ─── Shared helpers ──────────────────────────────────────────────────────────

/** Alphanumerics plus `-_.:`, at most 64 chars, "guest" when nothing is left */
export function normalizeUserId(userId: string | null | undefined): string {
    const cleaned = (userId ?? '').trim().replace(/[^A-Za-z0-9\-_.:]/g, '').slice(0, 64).trim()
    return cleaned || DEFAULT_USER_ID
}

/** Lowercase with whitespace runs collapsed */
export function normalizeText(value: string): string {
    return value.trim().toLowerCase().split(/\s+/).filter(Boolean).join(' ')
}

export function clampImportance(importance: number | undefined): number {
    const value = typeof importance === 'number' && Number.isFinite(importance) ? importance : 1.0
    return Math.min(MAX_IMPORTANCE, Math.max(MIN_IMPORTANCE, value))
}

export function clampLimit(limit: number | undefined, fallback: number, max: number): number {
    const value = typeof limit === 'number' && Number.isFinite(limit) ? Math.trunc(limit) : fallback
    return Math.max(1, Math.min(value, max))
}

export function defaultProfile(userId: string): UserProfile {
    return {
        userId,
        personaId: DEFAULT_PERSONA_ID,
        preferredCity: null,
        units: 'metric',
        responseStyle: 'balanced',
        updatedAt: null,
    }
}

export function mergeProfile(base: UserProfile, update: ProfileUpdate, updatedAt: string): UserProfile {
    const city = update.preferredCity === undefined ? base.preferredCity : update.preferredCity?.trim() || null
    return {
        userId: base.userId,
        personaId: update.personaId?.trim() || base.personaId,
        preferredCity: city,
        units: update.units ?? base.units,
        responseStyle: update.responseStyle ?? base.responseStyle,
        updatedAt,
    }
}

export interface PreparedFact {
    userId: string
    memoryType: string
    value: string
    normalizedValue: string
    importance: number
    sourceTurn: string | null
    sourceMessage: string | null
}

/** Normalized, truncated and clamped fact; null when type or value is empty */
export function prepareFact(input: FactInput): PreparedFact | null {
    const memoryType = normalizeText(input.memoryType)
    const value = input.value.trim().slice(0, MAX_FACT_VALUE_LENGTH)
    if (!memoryType || !value) return null
    return {
        userId: normalizeUserId(input.userId),
        memoryType,
        value,
        normalizedValue: normalizeText(value).slice(0, MAX_FACT_VALUE_LENGTH),
        importance: clampImportance(input.importance),
        sourceTurn: input.sourceTurn?.trim() || null,
        sourceMessage: input.sourceMessage?.trim().slice(0, MAX_SOURCE_MESSAGE_LENGTH) || null,
    }
}
