/**
 * In-process memory store
 *
 * Used when no DATABASE_URL is configured, and by tests. Mirrors the SQL
 * semantics of PgMemoryStore, including fact conflict handling and ordering.
 * State lives only as long as the process; each user keeps at most the
 * newest MAX_TURNS_PER_USER turns, which is all getRecentTurns can return.
 */

import type {
    ClearMemoryResult,
    ConversationTurn,
    MemoryFact,
    ProfileUpdate,
    TurnRole,
    UserProfile,
} from '../types/memory.js'
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

export const MAX_TURNS_PER_USER = 50

function factKey(userId: string, memoryType: string, normalizedValue: string): string {
    return `${userId}\u0000${memoryType}\u0000${normalizedValue}`
}

export class InMemoryMemoryStore implements MemoryStore {
    private readonly profiles = new Map<string, UserProfile>()
    private readonly turns = new Map<string, ConversationTurn[]>()
    private readonly facts = new Map<string, MemoryFact>()
    private nextTurnId = 1
    private nextFactId = 1

    constructor(private readonly now: () => Date = () => new Date()) {}

    async getProfile(userId: string): Promise<UserProfile> {
        const uid = normalizeUserId(userId)
        const stored = this.profiles.get(uid)
        return stored ? { ...stored } : defaultProfile(uid)
    }

    async upsertProfile(userId: string, update: ProfileUpdate): Promise<UserProfile> {
        const next = mergeProfile(await this.getProfile(userId), update, this.now().toISOString())
        this.profiles.set(next.userId, next)
        return { ...next }
    }

    async appendTurn(userId: string, role: TurnRole, message: string): Promise<string | null> {
        const text = message.trim().slice(0, MAX_TURN_LENGTH)
        if (!text) return null
        const uid = normalizeUserId(userId)
        const id = String(this.nextTurnId++)
        const own = this.turns.get(uid) ?? []
        own.push({ id, userId: uid, role, message: text, createdAt: this.now().toISOString() })
        if (own.length > MAX_TURNS_PER_USER) own.splice(0, own.length - MAX_TURNS_PER_USER)
        this.turns.set(uid, own)
        return id
    }

    async getRecentTurns(userId: string, limit?: number): Promise<ConversationTurn[]> {
        const own = this.turns.get(normalizeUserId(userId)) ?? []
        return own.slice(-clampLimit(limit, 8, 50)).map(turn => ({ ...turn }))
    }

    async upsertFact(input: FactInput): Promise<MemoryFact | null> {
        const fact = prepareFact(input)
        if (!fact) return null
        const timestamp = this.now().toISOString()
        const key = factKey(fact.userId, fact.memoryType, fact.normalizedValue)
        const existing = this.facts.get(key)

        const stored: MemoryFact = existing
            ? {
                ...existing,
                importance: Math.max(existing.importance, fact.importance),
                value: fact.value,
                sourceTurn: fact.sourceTurn,
                sourceMessage: fact.sourceMessage,
                lastUsedAt: timestamp,
            }
            : { id: this.nextFactId++, ...fact, createdAt: timestamp, lastUsedAt: timestamp }

        this.facts.set(key, stored)
        return { ...stored }
    }

    async getFacts(userId: string, query: FactQuery = {}): Promise<MemoryFact[]> {
        const uid = normalizeUserId(userId)
        const types = new Set((query.memoryTypes ?? []).map(normalizeText).filter(Boolean))
        return [...this.facts.values()]
            .filter(f => f.userId === uid && (types.size === 0 || types.has(f.memoryType)))
            .sort((a, b) => b.importance - a.importance || b.lastUsedAt.localeCompare(a.lastUsedAt))
            .slice(0, clampLimit(query.limit, 30, 500))
            .map(f => ({ ...f }))
    }

    async touchFacts(ids: number[], usedAt: string): Promise<void> {
        const wanted = new Set(ids)
        for (const fact of this.facts.values()) {
            if (wanted.has(fact.id)) fact.lastUsedAt = usedAt
        }
    }

    async clearMemory(userId: string, clearProfile: boolean): Promise<ClearMemoryResult> {
        const uid = normalizeUserId(userId)

        const conversationDeleted = this.turns.get(uid)?.length ?? 0
        this.turns.delete(uid)

        let memoryFactsDeleted = 0
        for (const [key, fact] of this.facts) {
            if (fact.userId === uid) {
                this.facts.delete(key)
                memoryFactsDeleted++
            }
        }

        let profileDeleted = 0
        const profile = this.profiles.get(uid)
        if (profile && clearProfile) {
            this.profiles.delete(uid)
            profileDeleted = 1
        } else if (profile) {
            this.profiles.set(uid, { ...profile, preferredCity: null, updatedAt: this.now().toISOString() })
        }

        return { conversationDeleted, memoryFactsDeleted, profileDeleted }
    }
}
