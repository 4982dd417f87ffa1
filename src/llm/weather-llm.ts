/**
 * Groq generative source using native tool calling
 *
 * Round 1: model sees the weather tool (tool_choice 'auto') and usually
 *          calls it with the user request.
 * Round 2: tool observations are appended and the model writes the answer
 *          with tools disabled.
 *
 * The endpoint is never retried (maxRetries: 0, 20 s timeout). Errors are
 * returned in the result, not thrown, so the agent can fall back.
 */

import Groq from 'groq-sdk'
import type { GenerativeResult, GenerativeSource, ToolTraceEntry } from '../types/agent.js'
import { cleanGenerativeText } from '../brain/quality-gate.js'
import { runWeatherTool, type WeatherFetcher } from '../weather/fetcher.js'
import { WEATHER_BOT_PROMPT, WEATHER_TOOL_DESCRIPTION, WEATHER_TOOL_NAME } from './prompts/weatherBot.js'

type ChatMessage = Groq.Chat.Completions.ChatCompletionMessageParam
type ChatTool = Groq.Chat.Completions.ChatCompletionTool

const REQUEST_TIMEOUT_MS = 20_000
const MAX_TOOL_CALLS = 2

const WEATHER_TOOL: ChatTool = {
    type: 'function',
    function: {
        name: WEATHER_TOOL_NAME,
        description: WEATHER_TOOL_DESCRIPTION,
        parameters: {
            type: 'object',
            properties: {
                query: { type: 'string', description: 'The full user weather request' },
                location: { type: 'string', description: 'City name, when known' },
                date: { type: 'string', description: 'YYYY-MM-DD or a phrase like "tomorrow"' },
            },
            required: ['query'],
        },
    },
}

export interface GroqWeatherSourceOptions {
    apiKey: string
    model: string
    fetcher: WeatherFetcher
}

export class GroqWeatherSource implements GenerativeSource {
    private client: Groq | null = null

    constructor(private readonly options: GroqWeatherSourceOptions) {}

    private getGroq(): Groq {
        if (!this.client) {
            this.client = new Groq({
                apiKey: this.options.apiKey,
                maxRetries: 0,
                timeout: REQUEST_TIMEOUT_MS,
            })
        }
        return this.client
    }

    async generate(prompt: string): Promise<GenerativeResult> {
        const toolTrace: ToolTraceEntry[] = []
        const messages: ChatMessage[] = [
            { role: 'system', content: WEATHER_BOT_PROMPT },
            { role: 'user', content: prompt },
        ]

        try {
            const first = await this.getGroq().chat.completions.create({
                model: this.options.model,
                messages,
                tools: [WEATHER_TOOL],
                tool_choice: 'auto',
                temperature: 0.2,
                max_tokens: 512,
            })

            const choice = first.choices[0]
            const message = choice?.message
            const toolCalls = message?.tool_calls ?? []

            // ── Path A: no tool call, the text is the answer ──
            if (choice?.finish_reason !== 'tool_calls' || toolCalls.length === 0) {
                return { outputText: cleanGenerativeText(message?.content ?? ''), toolTrace }
            }

            // ── Path B: run the tool, then ask for the final answer ──
            const calls = toolCalls.slice(0, MAX_TOOL_CALLS)
            messages.push({
                role: 'assistant',
                content: message?.content ?? '',
                tool_calls: calls.map(call => ({
                    id: call.id,
                    type: 'function' as const,
                    function: { name: call.function.name, arguments: call.function.arguments },
                })),
            })

            for (const call of calls) {
                const observation = call.function.name === WEATHER_TOOL_NAME
                    ? await runWeatherTool(call.function.arguments, this.options.fetcher)
                    : JSON.stringify({ error: `unknown tool ${call.function.name}` })
                toolTrace.push({
                    toolName: call.function.name,
                    toolInput: call.function.arguments,
                    observationText: observation,
                })
                messages.push({ role: 'tool', tool_call_id: call.id, content: observation })
            }

            const second = await this.getGroq().chat.completions.create({
                model: this.options.model,
                messages,
                temperature: 0.2,
                max_tokens: 512,
            })
            return { outputText: cleanGenerativeText(second.choices[0]?.message?.content ?? ''), toolTrace }
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err)
            console.warn('[weather-llm] generation failed:', reason)
            return { outputText: '', toolTrace, error: reason }
        }
    }
}

/** null when no GROQ_API_KEY is configured; the agent then runs deterministically */
export function createGenerativeSource(
    apiKey: string | undefined,
    model: string,
    fetcher: WeatherFetcher,
): GenerativeSource | null {
    if (!apiKey) return null
    return new GroqWeatherSource({ apiKey, model, fetcher })
}
