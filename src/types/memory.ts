import type { ResponseStyle, Units } from './weather.js'

export interface UserProfile {
    userId: string
    personaId: string
    preferredCity: string | null
    units: Units
    responseStyle: ResponseStyle
    /** ISO timestamp, null until the first upsert */
    updatedAt: string | null
}

export interface ProfileUpdate {
    personaId?: string
    /** `null` clears the stored city, `undefined` keeps it */
    preferredCity?: string | null
    units?: Units
    responseStyle?: ResponseStyle
}

export type MemoryType =
    | 'preferred_city'
    | 'location_preference'
    | 'activity_interest'
    | 'schedule_pattern'
    | 'weather_preference'

export interface MemoryFact {
    id: number
    userId: string
    memoryType: string
    value: string
    normalizedValue: string
    importance: number
    sourceTurn: string | null
    sourceMessage: string | null
    createdAt: string
    lastUsedAt: string
}

export type TurnRole = 'user' | 'assistant'

export interface ConversationTurn {
    id: string
    userId: string
    role: TurnRole
    message: string
    createdAt: string
}

export interface ClearMemoryResult {
    conversationDeleted: number
    memoryFactsDeleted: number
    profileDeleted: number
}
