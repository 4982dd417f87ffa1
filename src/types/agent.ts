import type { ResponseStyle, Units, WeatherPayload } from './weather.js'
import type { UserProfile } from './memory.js'

export type TracePhase =
    | 'plan'
    | 'memory-retrieval'
    | 'thought'
    | 'action'
    | 'observation'
    | 'tool-call'
    | 'observe'
    | 'reflect'
    | 'final-answer'

export type TraceDetail = Record<string, string | number | boolean | null | string[]>

export interface TraceEntry {
    step: number
    phase: TracePhase
    detail: TraceDetail
}

export type ReflectDecision = 'continue' | 'stop'

/** One tool invocation reported back by the generative source */
export interface ToolTraceEntry {
    toolName: string
    toolInput: string
    observationText: string
}

export interface GenerativeResult {
    outputText: string
    toolTrace: ToolTraceEntry[]
    error?: string
}

/** Opaque text generator: prompt in, free text plus its own tool trace out */
export interface GenerativeSource {
    generate(prompt: string): Promise<GenerativeResult>
}

export type AnswerSource = 'generative' | 'deterministic'

export interface PreferenceUpdates {
    units?: Units
    responseStyle?: ResponseStyle
    city?: string
}

export interface AgentRequest {
    message?: string | null
    cityHint?: string | null
    userId?: string | null
    personaId?: string | null
    preferenceUpdates?: PreferenceUpdates
    rememberMemory?: boolean
    maxSteps?: number
}

export interface AgentResult {
    responseText: string
    structuredPayload: WeatherPayload
    resolvedCity: string
    trace: TraceEntry[]
    profile: UserProfile | null
    personaId: string
    units: Units
    responseStyle: ResponseStyle
    answerSource: AnswerSource
}
