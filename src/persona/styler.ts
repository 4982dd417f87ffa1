/**
 * Persona Styler
 *
 * Reshapes a chosen answer for {persona, responseStyle}. Applied exactly once
 * per turn: a second pass would prefix the label twice.
 */

import type { ResponseStyle } from '../types/weather.js'
import type { Persona } from './catalog.js'

const CURRENT_CONDITIONS_PREFIX = 'Current conditions in '

/**
 * First sentence of the text. A period between two digits ("21.5") is a
 * decimal point, not a boundary.
 */
export function clipFirstSentence(text: string): string {
    const payload = text.trim()
    for (let i = 0; i < payload.length; i++) {
        const char = payload[i]
        if (char !== '.' && char !== '!' && char !== '?') continue
        if (char === '.' && /\d/.test(payload[i - 1] ?? '') && /\d/.test(payload[i + 1] ?? '')) continue
        return payload.slice(0, i + 1).trim() || payload
    }
    return payload
}

function rephraseCurrentConditions(text: string): string {
    if (!text.startsWith(CURRENT_CONDITIONS_PREFIX)) return text
    const colon = text.indexOf(':')
    if (colon === -1) return text

    const location = text.slice(CURRENT_CONDITIONS_PREFIX.length, colon)
    // only the first sentence is rephrased; the rest is kept as is
    const rest = text.slice(colon + 1).trim()
    const end = rest.search(/\.(\s|$)/)
    const description = end === -1 ? rest : rest.slice(0, end)
    const tail = end === -1 ? '' : rest.slice(end + 1).trim()
    const sentence = `It looks like the weather in ${location} is currently showing ${description}.`
    return tail ? `${sentence} ${tail}` : sentence
}

function mentionsRisk(text: string, persona: Persona): boolean {
    const lowered = text.toLowerCase()
    return persona.riskKeywords.some(keyword => lowered.includes(keyword))
}

export function applyPersonaStyle(
    text: string,
    persona: Persona,
    responseStyle: ResponseStyle,
    contextNote?: string | null,
): string {
    let payload = text.trim()
    if (!payload) return payload

    if (responseStyle === 'brief') payload = clipFirstSentence(payload)
    if (persona.rephraseCurrentConditions) payload = rephraseCurrentConditions(payload)

    const risky = mentionsRisk(payload, persona)
    if (persona.label) payload = `${persona.label} ${payload}`
    if (risky && persona.actionNote) payload = `${payload} ${persona.actionNote}`

    const note = contextNote?.trim()
    if (note && responseStyle === 'detailed') payload = `${payload} Context used: ${note}`

    return payload.trim()
}

/** Persona policy block prepended to every generative prompt */
export function personaInstructionBlock(persona: Persona, responseStyle: ResponseStyle): string {
    const rules = persona.styleRules.map(r => r.trim()).filter(Boolean).join('; ')
    const lines = [
        'Persona policy:',
        `- Identity: ${persona.identity}`,
        `- Tone: ${persona.tone}`,
        `- Vocabulary: ${persona.vocabulary}`,
        `- Humor style: ${persona.humorStyle}`,
        `- Risk stance: ${persona.riskStance}`,
        `- Response style: ${responseStyle}`,
    ]
    if (rules) lines.push(`- Response rules: ${rules}`)
    lines.push('- Do not expose internal reasoning trace to the user.')
    return lines.join('\n')
}
