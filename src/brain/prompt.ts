import type { Persona } from '../persona/catalog.js'
import { personaInstructionBlock } from '../persona/styler.js'
import type { ResponseStyle, Units } from '../types/weather.js'

const MAX_PROMPT_MEMORIES = 6

export interface PromptInput {
    userInput: string
    persona: Persona
    responseStyle: ResponseStyle
    units: Units
    memoryCity: string | null
    memorySnippets: string[]
}

/**
 * User message for the generative attempt:
 * persona policy → memory hint → profile context → memories → request.
 */
export function composeWeatherPrompt(input: PromptInput): string {
    const lines = [personaInstructionBlock(input.persona, input.responseStyle)]

    const city = input.memoryCity?.trim()
    if (city) lines.push(`Memory hint: preferred_city=${city}`)

    lines.push(`Profile context: persona=${input.persona.id}, units=${input.units}, response_style=${input.responseStyle}`)

    const snippets = input.memorySnippets.map(s => s.trim()).filter(Boolean).slice(0, MAX_PROMPT_MEMORIES)
    if (snippets.length) lines.push(`Relevant long-term memories: ${snippets.join(' | ')}`)

    lines.push(`User request: ${input.userInput.trim()}`)
    return lines.join('\n')
}
