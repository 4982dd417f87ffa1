import { describe, expect, it } from 'vitest'
import {
    cleanGenerativeText,
    evaluateGenerativeAnswer,
    looksTooVerbose,
    looksUnfocused,
} from './quality-gate.js'

describe('evaluateGenerativeAnswer', () => {
    it('accepts a short numeric answer on an ok payload', () => {
        const result = evaluateGenerativeAnswer('Rain probability in Pune for today: 70%. Rain likely.', 'ok')
        expect(result).toEqual({ accepted: true, reason: 'accepted' })
    })

    it('rejects empty text', () => {
        expect(evaluateGenerativeAnswer('   ', 'ok').reason).toBe('empty')
    })

    it('rejects any answer when the payload is not ok', () => {
        expect(evaluateGenerativeAnswer('It is 21 C in Pune.', 'service_unavailable')).toEqual({
            accepted: false,
            reason: 'payload_not_ok',
        })
    })

    it('rejects failure phrasing even with numbers', () => {
        const text = "I don't have real-time data, but Pune is usually 28 C."
        expect(evaluateGenerativeAnswer(text, 'ok').reason).toBe('failure_marker')
    })

    it('rejects answers without digits', () => {
        expect(evaluateGenerativeAnswer('Pune looks pleasant today.', 'ok').reason).toBe('no_numbers')
    })

    it('rejects a follow-up question mentioning the city as unfocused', () => {
        const result = evaluateGenerativeAnswer('This afternoon Paris reaches 22 C. Anything else?', 'ok')
        expect(result).toEqual({ accepted: false, reason: 'unfocused' })
    })

    it('rejects list-shaped answers as verbose', () => {
        const text = 'Pune today:\n- 28 C\n- 60% humidity'
        expect(evaluateGenerativeAnswer(text, 'ok').reason).toBe('verbose')
    })
})

describe('looksUnfocused', () => {
    it('flags links', () => {
        expect(looksUnfocused('See https://example.com for 12 C')).toBe(true)
    })

    it('flags a follow-up question using the word "is"', () => {
        expect(looksUnfocused('It is 20 C. Anything else?')).toBe(true)
    })

    it('flags a follow-up question where "is" only appears inside a word', () => {
        expect(looksUnfocused('Mist this morning, 18 C. Ready?')).toBe(true)
    })

    it('flags "do you need" follow-ups', () => {
        expect(looksUnfocused('Rain at 70%. Do you need hourly details?')).toBe(true)
    })

    it('passes a question mark without a follow-up phrase', () => {
        expect(looksUnfocused('Rain at 70% in Lyon, umbrella?')).toBe(false)
    })

    it('passes a plain statement', () => {
        expect(looksUnfocused('It is 20 C in Lyon.')).toBe(false)
    })
})

describe('looksTooVerbose', () => {
    it('flags text over 520 characters', () => {
        expect(looksTooVerbose('a'.repeat(521))).toBe(true)
        expect(looksTooVerbose('a'.repeat(520))).toBe(false)
    })

    it('flags numbered lists', () => {
        expect(looksTooVerbose('Forecast\n1. Monday 20 C')).toBe(true)
    })

    it('flags a line starting with a dash even without a following space', () => {
        expect(looksTooVerbose('Oslo tonight:\n-2 C and clear')).toBe(true)
    })

    it('passes a single line with an inline dash', () => {
        expect(looksTooVerbose('Oslo tonight -2 C and clear')).toBe(false)
    })
})

describe('cleanGenerativeText', () => {
    it('removes code fences and bold markers', () => {
        expect(cleanGenerativeText('```\n**Pune**: 28 C\n```')).toBe('Pune: 28 C')
    })
})
