/**
 * Weather Agent: bounded plan / act / observe / reflect loop
 *
 * Pipeline per request:
 *   1. plan               persona, units, style, candidate city
 *   2. memory-retrieval   ranked long-term facts (remembering enabled)
 *   3. generative pass    one call; an adopted tool payload skips step 4
 *   4. deterministic loop  up to maxSteps fetches, reflecting after each
 *   5. quality gate       generative text or the deterministic synthesis
 *   6. persona styling    exactly once
 *   7. memory write       profile, turns, inferred facts
 *
 * Every step lands in the trace returned to the caller.
 */

import type {
    AgentRequest,
    AgentResult,
    AnswerSource,
    GenerativeResult,
    GenerativeSource,
} from '../types/agent.js'
import type { UserProfile } from '../types/memory.js'
import type { WeatherPayload } from '../types/weather.js'
import { buildWeatherAnswer } from '../weather/answer.js'
import { decodeWeatherPayload } from '../weather/decode.js'
import { ensureCityInInput, inferCityFromText } from '../weather/extractor.js'
import { WEATHER_LIVE_DATA_UNAVAILABLE, type WeatherFetcher } from '../weather/fetcher.js'
import { WEATHER_TOOL_NAME } from '../llm/prompts/weatherBot.js'
import { resolvePersona, type PersonaCatalog } from '../persona/catalog.js'
import { applyPersonaStyle } from '../persona/styler.js'
import { rememberTurn } from '../memory/facts.js'
import { memorySnippets, retrieveRelevantMemories } from '../memory/ranker.js'
import { defaultProfile, normalizeUserId, type MemoryStore } from '../memory/store.js'
import { safeError } from '../utils/safe-log.js'
import { composeWeatherPrompt } from './prompt.js'
import { evaluateGenerativeAnswer } from './quality-gate.js'
import { AgentTrace } from './trace.js'

export const DEFAULT_MAX_STEPS = 4
export const MAX_STEPS_CEILING = 8

/** Caller mistakes: surfaced to HTTP clients as 400 with the message verbatim */
export class AgentInputError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'AgentInputError'
    }
}

export interface AgentDeps {
    store: MemoryStore
    fetchWeather: WeatherFetcher
    /** null runs the deterministic path only */
    generative: GenerativeSource | null
    personas?: PersonaCatalog
    defaultMaxSteps?: number
    now?: () => Date
    traceLog?: boolean
}

export function clampMaxSteps(value: number | undefined): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return DEFAULT_MAX_STEPS
    return Math.max(1, Math.min(Math.trunc(value), MAX_STEPS_CEILING))
}

function payloadLocation(payload: WeatherPayload): string | null {
    return 'location' in payload && payload.location ? payload.location : null
}

async function callGenerative(source: GenerativeSource, prompt: string): Promise<GenerativeResult> {
    try {
        return await source.generate(prompt)
    } catch (err) {
        return { outputText: '', toolTrace: [], error: err instanceof Error ? err.message : String(err) }
    }
}

export async function runWeatherAgent(request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
    const now = deps.now ?? (() => new Date())
    const message = request.message?.trim() ?? ''
    const updates = request.preferenceUpdates ?? {}
    const explicitCity = request.cityHint?.trim() || updates.city?.trim() || null

    if (!message && !explicitCity) {
        throw new AgentInputError('Either a message or a city must be provided.')
    }

    const trace = new AgentTrace(deps.traceLog ?? false)
    const userId = normalizeUserId(request.userId)
    const remember = request.rememberMemory ?? true
    let profile: UserProfile = remember ? await deps.store.getProfile(userId) : defaultProfile(userId)

    const persona = resolvePersona(request.personaId || profile.personaId, deps.personas)
    const units = updates.units ?? profile.units
    const responseStyle = updates.responseStyle ?? profile.responseStyle
    const maxSteps = clampMaxSteps(request.maxSteps ?? deps.defaultMaxSteps)

    const userInput = message || `Current weather in ${explicitCity}`
    const inferredCity = message ? inferCityFromText(message) : null
    const memoryCity = profile.preferredCity?.trim() || null
    const planCity = explicitCity || inferredCity

    // ── 1. plan ──
    trace.add('plan', {
        userId,
        personaId: persona.id,
        units,
        responseStyle,
        cityFromMemory: memoryCity,
        cityForPlan: planCity ?? memoryCity,
        maxSteps,
    })

    let query = planCity ? ensureCityInInput(userInput, planCity) : userInput

    // ── 2. memory-retrieval ──
    let snippets: string[] = []
    if (remember) {
        const facts = await retrieveRelevantMemories(deps.store, userId, userInput, 6, now())
        snippets = memorySnippets(facts)
        trace.add('memory-retrieval', { count: facts.length, memoryTypes: facts.map(f => f.memoryType) })
    }

    // ── 3. generative pass ──
    let generativeText = ''
    let generativePayload: WeatherPayload | null = null
    if (deps.generative) {
        trace.add('thought', { engine: 'llm-agent', personaId: persona.id, responseStyle })
        const prompt = composeWeatherPrompt({
            userInput: query,
            persona,
            responseStyle,
            units,
            memoryCity: remember ? memoryCity : null,
            memorySnippets: snippets,
        })
        const result = await callGenerative(deps.generative, prompt)

        if (result.error) {
            trace.add('observation', { engine: 'llm-agent', status: 'error', reason: result.error.slice(0, 180) })
        }
        for (const [i, step] of result.toolTrace.entries()) {
            const decoded = step.toolName === WEATHER_TOOL_NAME ? decodeWeatherPayload(step.observationText) : null
            if (decoded) generativePayload = decoded
            trace.add('action', { engine: 'llm-agent', index: i + 1, tool: step.toolName || 'unknown' })
            trace.add('observation', {
                engine: 'llm-agent',
                index: i + 1,
                toolStatus: decoded?.status ?? 'unknown',
                observationPreview: step.observationText.slice(0, 140),
            })
        }
        generativeText = result.outputText.trim()
    }

    // ── 4. deterministic loop ──
    let payload: WeatherPayload = { status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE }
    if (generativePayload) {
        payload = generativePayload
        trace.add('reflect', { decision: 'stop', reason: 'generative_payload_adopted' })
    } else {
        trace.add('reflect', { decision: 'continue', reason: 'generative_payload_missing_fallback_to_direct_tool' })

        for (let attempt = 1; attempt <= maxSteps; attempt++) {
            const isLast = attempt === maxSteps
            trace.add('tool-call', { attempt, tool: WEATHER_TOOL_NAME, query })

            try {
                payload = await deps.fetchWeather({ text: query, cityHint: explicitCity })
            } catch (err) {
                console.error('[agent] weather fetch failed:', safeError(err))
                payload = { status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE }
            }
            trace.add('observe', { attempt, status: payload.status, location: payloadLocation(payload) })

            if (payload.status === 'ok') {
                trace.add('reflect', { attempt, decision: 'stop', reason: 'data_sufficient' })
                break
            }

            if (payload.status === 'needs_location') {
                const rewritten = memoryCity ? ensureCityInInput(userInput, memoryCity) : null
                if (rewritten && rewritten !== query && !isLast) {
                    query = rewritten
                    trace.add('reflect', {
                        attempt,
                        decision: 'continue',
                        reason: 'retry_with_memory_city',
                        memoryCity,
                    })
                    continue
                }
                const reason = !rewritten
                    ? 'missing_city_and_no_memory_city'
                    : rewritten === query
                        ? 'missing_city_rewrite_unchanged'
                        : 'missing_city_retry_budget_exhausted'
                trace.add('reflect', { attempt, decision: 'stop', reason, ...(memoryCity ? { memoryCity } : {}) })
                break
            }

            if (payload.status === 'ambiguous_location') {
                trace.add('reflect', { attempt, decision: 'stop', reason: 'ambiguous_location' })
                break
            }

            if (!isLast) {
                trace.add('reflect', { attempt, decision: 'continue', reason: `status_${payload.status}_retry` })
                continue
            }
            trace.add('reflect', { attempt, decision: 'stop', reason: `status_${payload.status}` })
        }
    }

    const resolvedCity = explicitCity || inferredCity || payloadLocation(payload) || memoryCity || 'unknown'

    // ── 5. quality gate ──
    const gate = generativeText ? evaluateGenerativeAnswer(generativeText, payload.status) : null
    const answerSource: AnswerSource = gate?.accepted ? 'generative' : 'deterministic'
    const selected = gate?.accepted ? generativeText : buildWeatherAnswer(userInput, payload, units)

    // ── 6. persona styling ──
    const contextNote = remember && snippets.length ? snippets.slice(0, 3).join('; ') : null
    const responseText = applyPersonaStyle(selected, persona, responseStyle, contextNote)
    trace.add('final-answer', {
        personaId: persona.id,
        responseStyle,
        units,
        source: answerSource,
        gate: gate?.reason ?? null,
    })

    // ── 7. memory write ──
    if (remember) {
        try {
            profile = await rememberTurn(deps.store, {
                userId,
                message: userInput,
                answer: responseText,
                location: payload.status === 'ok' ? payload.location : null,
                personaId: persona.id,
                units,
                responseStyle,
                preferredCity: updates.city?.trim() || memoryCity,
            })
        } catch (err) {
            console.error('[agent] memory write failed:', safeError(err))
        }
    }

    return {
        responseText,
        structuredPayload: payload,
        resolvedCity,
        trace: trace.toJSON(),
        profile: remember ? profile : null,
        personaId: persona.id,
        units,
        responseStyle,
        answerSource,
    }
}
