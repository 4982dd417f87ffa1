import { describe, expect, it } from 'vitest'
import { composeWeatherPrompt } from './prompt.js'
import { parsePersonaCatalog, resolvePersona } from '../persona/catalog.js'

const catalog = parsePersonaCatalog({
    defaultPersona: 'plain',
    personas: [{ id: 'plain', name: 'Plain', styleRules: ['Be short.'] }],
})

describe('composeWeatherPrompt', () => {
    it('orders persona policy, memory, profile and request', () => {
        const prompt = composeWeatherPrompt({
            userInput: '  Will it rain tomorrow? ',
            persona: resolvePersona('plain', catalog),
            responseStyle: 'balanced',
            units: 'imperial',
            memoryCity: 'Chennai',
            memorySnippets: ['preferred_city: Chennai', ' ', 'activity_interest: running'],
        })

        const lines = prompt.split('\n')
        expect(lines[0]).toBe('Persona policy:')
        expect(lines.slice(-4)).toEqual([
            'Memory hint: preferred_city=Chennai',
            'Profile context: persona=plain, units=imperial, response_style=balanced',
            'Relevant long-term memories: preferred_city: Chennai | activity_interest: running',
            'User request: Will it rain tomorrow?',
        ])
    })

    it('omits memory lines when there is nothing remembered', () => {
        const prompt = composeWeatherPrompt({
            userInput: 'weather in Pune',
            persona: resolvePersona('plain', catalog),
            responseStyle: 'brief',
            units: 'metric',
            memoryCity: null,
            memorySnippets: [],
        })

        expect(prompt).not.toContain('Memory hint')
        expect(prompt).not.toContain('Relevant long-term memories')
        expect(prompt.endsWith('User request: weather in Pune')).toBe(true)
    })
})
