/**
 * Memory Ranker
 *
 * score = 2 × overlap(query, value) + overlap(query, sourceMessage)
 *       + importance + typeBoost
 *
 * A fact with no token overlap against a non-empty query has its score
 * halved. Ties go to the more recently used fact.
 */

import type { MemoryFact } from '../types/memory.js'
import { clampLimit, normalizeText, type MemoryStore } from './store.js'

const TYPE_BOOST: Record<string, number> = {
    preferred_city: 2.0,
    location_preference: 1.8,
    activity_interest: 1.4,
    schedule_pattern: 1.2,
    weather_preference: 1.0,
}

const CANDIDATE_POOL = 200

export interface RankedFact {
    fact: MemoryFact
    score: number
}

/** Lowercase alphanumeric runs of length ≥ 3 */
export function tokenize(text: string | null | undefined): Set<string> {
    const tokens = (text ?? '').toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []
    return new Set(tokens.filter(t => t.length >= 3))
}

export function memoryTypeBoost(memoryType: string): number {
    return TYPE_BOOST[normalizeText(memoryType)] ?? 1.0
}

function overlap(a: Set<string>, b: Set<string>): number {
    let count = 0
    for (const token of a) if (b.has(token)) count++
    return count
}

export function scoreFact(fact: MemoryFact, queryTokens: Set<string>): number {
    const overlapScore =
        overlap(queryTokens, tokenize(fact.value)) * 2 +
        overlap(queryTokens, tokenize(fact.sourceMessage))
    const score = overlapScore + fact.importance + memoryTypeBoost(fact.memoryType)
    return queryTokens.size > 0 && overlapScore <= 0 ? score * 0.5 : score
}

export function rankMemoryFacts(facts: MemoryFact[], query: string): RankedFact[] {
    const queryTokens = tokenize(query)
    return facts
        .map(fact => ({ fact, score: scoreFact(fact, queryTokens) }))
        .sort((a, b) => b.score - a.score || b.fact.lastUsedAt.localeCompare(a.fact.lastUsedAt))
}

/**
 * Top facts for a query. Selected facts get lastUsedAt refreshed, in the
 * store and in the returned copies.
 */
export async function retrieveRelevantMemories(
    store: MemoryStore,
    userId: string,
    query: string,
    limit = 6,
    now: Date = new Date(),
): Promise<MemoryFact[]> {
    const candidates = await store.getFacts(userId, { limit: CANDIDATE_POOL })
    if (candidates.length === 0) return []

    const selected = rankMemoryFacts(candidates, query)
        .slice(0, clampLimit(limit, 6, 20))
        .map(ranked => ranked.fact)

    const usedAt = now.toISOString()
    await store.touchFacts(selected.map(f => f.id), usedAt)
    return selected.map(f => ({ ...f, lastUsedAt: usedAt }))
}

/** "preferred_city: Chennai" style snippets for the prompt and context note */
export function memorySnippets(facts: MemoryFact[]): string[] {
    return facts.map(f => `${f.memoryType}: ${f.value}`)
}
