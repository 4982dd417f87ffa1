/**
 * Memory fact inference + turn persistence
 *
 * Pattern-based extraction of long-term facts from a user message:
 *   preferred_city       the location the answer resolved to
 *   location_preference  "I live/work/stay in X"
 *   activity_interest    outdoor activities the user mentions
 *   schedule_pattern     "every morning", "on weekends"
 *   weather_preference   "I hate rain", "I love sunny weather"
 */

import type { MemoryType, UserProfile } from '../types/memory.js'
import type { ResponseStyle, Units } from '../types/weather.js'
import type { MemoryStore } from './store.js'

export interface InferredFact {
    memoryType: MemoryType
    value: string
    importance: number
}

const LOCATION_PATTERN = /\bi\s+(?:live|work|stay|am based|am staying)\s+in\s+([A-Za-z][A-Za-z .'-]{1,60})/i
const LOCATION_STOP = /\s+(?:and|but|so|near|with|since|for|where)\b.*$/i

const ACTIVITIES = [
    'running', 'jogging', 'cycling', 'hiking', 'trekking', 'swimming', 'walking', 'picnic',
    'camping', 'golf', 'fishing', 'gardening', 'cricket', 'football', 'tennis', 'commute',
] as const

const SCHEDULE_PATTERN =
    /\b(?:every|each)\s+(morning|afternoon|evening|night|day|weekend|weekday|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/i
const WEEKENDS_PATTERN = /\bon\s+weekends\b/i

const PREFERENCE_PATTERN =
    /\bi\s+(love|like|enjoy|prefer|hate|dislike)\s+((?:sunny|rainy|cold|hot|warm|cool|windy|cloudy|humid|dry)\s+weather|rain|snow|sunshine|sun|heat|cold|humidity|wind|fog|clouds|storms)\b/i

function cleanLocation(raw: string): string {
    return raw
        .split(/[,.;!?]/, 1)[0]
        .replace(LOCATION_STOP, '')
        .trim()
}

export function inferMemoryFacts(message: string, resolvedLocation: string | null): InferredFact[] {
    const facts: InferredFact[] = []
    const lowered = message.toLowerCase()

    if (resolvedLocation?.trim()) {
        facts.push({ memoryType: 'preferred_city', value: resolvedLocation.trim(), importance: 1.5 })
    }

    const location = message.match(LOCATION_PATTERN)
    if (location) {
        const value = cleanLocation(location[1])
        if (value) facts.push({ memoryType: 'location_preference', value, importance: 1.5 })
    }

    for (const activity of ACTIVITIES) {
        if (new RegExp(`\\b${activity}\\b`).test(lowered)) {
            facts.push({ memoryType: 'activity_interest', value: activity, importance: 1.2 })
        }
    }

    const schedule = message.match(SCHEDULE_PATTERN)
    if (schedule) {
        facts.push({ memoryType: 'schedule_pattern', value: `every ${schedule[1].toLowerCase()}`, importance: 1.2 })
    } else if (WEEKENDS_PATTERN.test(message)) {
        facts.push({ memoryType: 'schedule_pattern', value: 'weekends', importance: 1.2 })
    }

    const preference = message.match(PREFERENCE_PATTERN)
    if (preference) {
        const value = `${preference[1]} ${preference[2]}`.toLowerCase()
        facts.push({ memoryType: 'weather_preference', value, importance: 1.0 })
    }

    return facts
}

export interface RememberTurnInput {
    userId: string
    message: string
    answer: string
    /** Location the payload resolved to, if any */
    location: string | null
    personaId: string
    units: Units
    responseStyle: ResponseStyle
    preferredCity: string | null
}

/**
 * Persist one remembered turn: profile upsert, both conversation turns and
 * any facts inferred from the user message.
 */
export async function rememberTurn(store: MemoryStore, input: RememberTurnInput): Promise<UserProfile> {
    const profile = await store.upsertProfile(input.userId, {
        personaId: input.personaId,
        preferredCity: input.location?.trim() || input.preferredCity,
        units: input.units,
        responseStyle: input.responseStyle,
    })

    const turnId = await store.appendTurn(input.userId, 'user', input.message)
    await store.appendTurn(input.userId, 'assistant', input.answer)

    for (const fact of inferMemoryFacts(input.message, input.location)) {
        await store.upsertFact({
            userId: input.userId,
            memoryType: fact.memoryType,
            value: fact.value,
            importance: fact.importance,
            sourceTurn: turnId,
            sourceMessage: input.message,
        })
    }

    return profile
}
