/**
 * Runtime configuration
 *
 * Reads .env once at import time and exposes a typed, validated view of it.
 * Provider keys stay optional: a missing OpenWeatherMap key turns every fetch
 * into `service_unavailable`, a missing Groq key disables the generative path.
 */

import 'dotenv/config'
import { z } from 'zod'

const optionalString = z
    .string()
    .trim()
    .transform(v => (v.length > 0 ? v : undefined))
    .optional()

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    OPENWEATHERMAP_API_KEY: optionalString,
    GROQ_API_KEY: optionalString,
    GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
    DATABASE_URL: optionalString,
    AGENT_MAX_STEPS: z.coerce.number().int().min(1).max(8).default(4),
    AGENT_TRACE_LOG: z
        .string()
        .optional()
        .transform(v => v === 'true' || v === '1'),
})

export type Env = z.infer<typeof EnvSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
        throw new Error(`Invalid environment configuration: ${issues}`)
    }
    const e = parsed.data
    return {
        port: e.PORT,
        host: e.HOST,
        openWeatherApiKey: e.OPENWEATHERMAP_API_KEY,
        groqApiKey: e.GROQ_API_KEY,
        groqModel: e.GROQ_MODEL,
        databaseUrl: e.DATABASE_URL,
        agentMaxSteps: e.AGENT_MAX_STEPS,
        traceLog: e.AGENT_TRACE_LOG,
    }
}

export type AppConfig = ReturnType<typeof loadConfig>

export const config: AppConfig = loadConfig()
