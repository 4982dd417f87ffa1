/**
 * Quality Gate for generative weather answers
 * Decide whether free text from the language model may be shown verbatim
 * or must be replaced by the deterministic synthesis.
 */

import type { WeatherStatus } from '../types/weather.js'

// Phrases that mean the model did not actually use live data
export const FAILURE_MARKERS = [
    'unable to fetch',
    'technical issue',
    'knowledge cutoff',
    "don't have real-time",
    'do not have real-time',
    'cannot access',
    "can't access",
    'cannot confirm',
    'cannot execute tools',
    'since i cannot',
    'current limitation',
    'check a weather website',
    'provide the data',
    'provide the output',
    'so i can assist further',
    'if you share',
    'weather not found',
    'service unavailable',
] as const

export const MAX_GENERATIVE_LENGTH = 520

export type GateReason =
    | 'accepted'
    | 'empty'
    | 'payload_not_ok'
    | 'failure_marker'
    | 'unfocused'
    | 'verbose'
    | 'no_numbers'

export interface GateResult {
    accepted: boolean
    reason: GateReason
}

/** Strip markdown fences and bold markers the model likes to add */
export function cleanGenerativeText(text: string): string {
    return text.replaceAll('```', '').replaceAll('**', '').trim()
}

export function looksLikeFailure(text: string): boolean {
    const lowered = text.toLowerCase()
    return FAILURE_MARKERS.some(marker => lowered.includes(marker))
}

/** Links, examples, or a follow-up question instead of an answer */
export function looksUnfocused(text: string): boolean {
    const lowered = text.toLowerCase()
    if (lowered.includes('http://') || lowered.includes('https://')) return true
    if (lowered.includes('for example')) return true
    // substring match: "this" and "Paris" count as well
    return lowered.includes('?') && (lowered.includes('do you need') || lowered.includes('is'))
}

export function looksTooVerbose(text: string): boolean {
    if (text.length > MAX_GENERATIVE_LENGTH) return true
    return text.includes('\n-') || text.includes('\n1.')
}

/**
 * All checks must pass; the first failing one is reported.
 */
export function evaluateGenerativeAnswer(text: string, payloadStatus: WeatherStatus): GateResult {
    const candidate = text.trim()
    if (!candidate) return { accepted: false, reason: 'empty' }
    if (payloadStatus !== 'ok') return { accepted: false, reason: 'payload_not_ok' }
    if (looksLikeFailure(candidate)) return { accepted: false, reason: 'failure_marker' }
    if (looksUnfocused(candidate)) return { accepted: false, reason: 'unfocused' }
    if (looksTooVerbose(candidate)) return { accepted: false, reason: 'verbose' }
    if (!/\d/.test(candidate)) return { accepted: false, reason: 'no_numbers' }
    return { accepted: true, reason: 'accepted' }
}
