/**
 * HTTP surface
 *
 *   GET    /health            liveness + which collaborators are wired
 *   GET    /personas          persona catalog summary
 *   POST   /chat              full agent turn
 *   GET    /chat?city=        city-only lookup, nothing remembered
 *   GET    /memory/:userId    profile, recent turns, stored facts
 *   DELETE /memory/:userId    clear turns + facts (?clearProfile=true drops the profile)
 *
 * Request bodies and queries are validated with zod; AgentInputError and
 * validation failures answer 400, anything else 500.
 */

import Fastify, { type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { z } from 'zod'
import { AgentInputError, MAX_STEPS_CEILING, runWeatherAgent, type AgentDeps } from './brain/agent.js'
import { defaultPersonaId, listPersonas } from './persona/catalog.js'
import { normalizeUserId } from './memory/store.js'
import { summarizePayload } from './weather/answer.js'
import type { AgentRequest, AgentResult } from './types/agent.js'
import { safeError } from './utils/safe-log.js'

// ─── Schemas ─────────────────────────────────────────────────────────────────

const UnitsSchema = z.enum(['metric', 'imperial'])
const StyleSchema = z.enum(['brief', 'balanced', 'detailed'])

const ChatRequestSchema = z.object({
    message: z.string().max(2000).optional(),
    city: z.string().max(100).optional(),
    userId: z.string().max(128).optional(),
    personaId: z.string().max(64).optional(),
    preferences: z.object({
        units: UnitsSchema.optional(),
        responseStyle: StyleSchema.optional(),
        city: z.string().max(100).optional(),
    }).optional(),
    rememberMemory: z.boolean().optional(),
    maxSteps: z.number().int().min(1).max(MAX_STEPS_CEILING).optional(),
})

const LegacyChatQuerySchema = z.object({
    city: z.string().trim().min(1).max(100),
})

const UserParamsSchema = z.object({
    userId: z.string().min(1).max(128),
})

const MemoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(50).optional(),
})

const ClearQuerySchema = z.object({
    clearProfile: z.enum(['true', 'false', '1', '0']).optional().transform(v => v === 'true' || v === '1'),
})

// ─── Helpers ─────────────────────────────────────────────────────────────────

export interface ServerDeps extends AgentDeps {
    storeKind: 'postgres' | 'memory'
}

function toChatResponse(result: AgentResult) {
    return {
        response: result.responseText,
        city: result.resolvedCity,
        answerSource: result.answerSource,
        personaId: result.personaId,
        units: result.units,
        responseStyle: result.responseStyle,
        summary: summarizePayload(result.structuredPayload, result.resolvedCity),
        payload: result.structuredPayload,
        trace: result.trace,
        profile: result.profile,
    }
}

function invalid(issues: z.ZodIssue[]) {
    return {
        error: 'Invalid request',
        issues: issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    }
}

// ─── Server ──────────────────────────────────────────────────────────────────

export async function buildServer(deps: ServerDeps, options: { logger?: boolean } = {}): Promise<FastifyInstance> {
    const server = Fastify({ logger: options.logger ?? true })
    await server.register(cors)

    server.setErrorHandler((err, request, reply) => {
        if (err instanceof AgentInputError) {
            return reply.code(400).send({ error: err.message })
        }
        if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
            return reply.code(err.statusCode).send({ error: err.message })
        }
        request.log.error(safeError(err), 'request failed')
        return reply.code(500).send({ error: 'Internal server error' })
    })

    server.get('/health', async () => ({
        status: 'ok',
        service: 'weather-agent',
        generative: deps.generative !== null,
        persistence: deps.storeKind,
    }))

    server.get('/personas', async () => ({
        defaultPersona: defaultPersonaId(deps.personas),
        personas: listPersonas(deps.personas),
    }))

    server.post('/chat', async (request, reply) => {
        const parsed = ChatRequestSchema.safeParse(request.body ?? {})
        if (!parsed.success) return reply.code(400).send(invalid(parsed.error.issues))

        const body = parsed.data
        const agentRequest: AgentRequest = {
            message: body.message,
            cityHint: body.city,
            userId: body.userId,
            personaId: body.personaId,
            preferenceUpdates: body.preferences,
            rememberMemory: body.rememberMemory,
            maxSteps: body.maxSteps,
        }
        return toChatResponse(await runWeatherAgent(agentRequest, deps))
    })

    server.get('/chat', async (request, reply) => {
        const parsed = LegacyChatQuerySchema.safeParse(request.query)
        if (!parsed.success) return reply.code(400).send(invalid(parsed.error.issues))

        const result = await runWeatherAgent({ cityHint: parsed.data.city, rememberMemory: false }, deps)
        return toChatResponse(result)
    })

    server.get('/memory/:userId', async (request, reply) => {
        const params = UserParamsSchema.safeParse(request.params)
        const query = MemoryQuerySchema.safeParse(request.query)
        if (!params.success) return reply.code(400).send(invalid(params.error.issues))
        if (!query.success) return reply.code(400).send(invalid(query.error.issues))

        const userId = normalizeUserId(params.data.userId)
        const [profile, turns, facts] = await Promise.all([
            deps.store.getProfile(userId),
            deps.store.getRecentTurns(userId, query.data.limit),
            deps.store.getFacts(userId, { limit: 50 }),
        ])
        return { userId, profile, turns, facts }
    })

    server.delete('/memory/:userId', async (request, reply) => {
        const params = UserParamsSchema.safeParse(request.params)
        const query = ClearQuerySchema.safeParse(request.query)
        if (!params.success) return reply.code(400).send(invalid(params.error.issues))
        if (!query.success) return reply.code(400).send(invalid(query.error.issues))

        const userId = normalizeUserId(params.data.userId)
        const cleared = await deps.store.clearMemory(userId, query.data.clearProfile)
        server.log.info({ userId, ...cleared }, 'memory cleared')
        return { userId, ...cleared }
    })

    return server
}
