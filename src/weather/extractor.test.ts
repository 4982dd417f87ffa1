import { describe, expect, it } from 'vitest'
import {
    ensureCityInInput,
    extractCityName,
    extractIntentFlags,
    extractTimeReference,
    inferCityFromText,
    isAmbiguousCity,
    parseSpecificDate,
    resolveIntentFlags,
} from './extractor.js'
import { NOW } from '../tests/owm-fixtures.js'

describe('inferCityFromText', () => {
    it('takes the phrase after "in" and drops the time word', () => {
        expect(inferCityFromText("What's the weather in Paris tomorrow?")).toBe('Paris')
    })

    it('keeps multi-word cities and strips trailing noise', () => {
        expect(inferCityFromText('Is it going to rain at New York this weekend?')).toBe('New York')
        expect(inferCityFromText('weather in London on Friday')).toBe('London')
    })

    it('uses the segment after the last inner preposition', () => {
        expect(inferCityFromText('I need weather for a run in Berlin')).toBe('Berlin')
    })

    it('accepts a bare city name', () => {
        expect(inferCityFromText('Chennai')).toBe('Chennai')
        expect(inferCityFromText('  san francisco ')).toBe('san francisco')
    })

    it('returns null when only query words are present', () => {
        expect(inferCityFromText('what is the weather')).toBeNull()
        expect(inferCityFromText('Do I need an umbrella?')).toBeNull()
        expect(inferCityFromText('')).toBeNull()
        expect(inferCityFromText(null)).toBeNull()
    })

    it('passes ambiguous pairs through unchanged', () => {
        expect(inferCityFromText('Georgia or Florida')).toBe('Georgia or Florida')
    })
})

describe('isAmbiguousCity', () => {
    it('flags "or" and slash pairs', () => {
        expect(isAmbiguousCity('Georgia or Florida')).toBe(true)
        expect(isAmbiguousCity('Portland/Salem')).toBe(true)
        expect(isAmbiguousCity('Oranjestad')).toBe(false)
    })
})

describe('extractCityName', () => {
    it('reads JSON and keyed tool arguments', () => {
        expect(extractCityName('{"city": "Pune"}')).toBe('Pune')
        expect(extractCityName('{"location": "Lyon"}')).toBe('Lyon')
        expect(extractCityName('"Pune"')).toBe('Pune')
    })
})

describe('ensureCityInInput', () => {
    it('appends the city only when missing', () => {
        expect(ensureCityInInput('Do I need an umbrella?', 'Chennai')).toBe('Do I need an umbrella? in Chennai')
        expect(ensureCityInInput('rain in chennai', 'Chennai')).toBe('rain in chennai')
    })
})

describe('extractTimeReference', () => {
    it('defaults to an assumed today', () => {
        expect(extractTimeReference('weather in Pune', NOW)).toEqual({
            type: 'today',
            startDate: '2026-10-14',
            endDate: '2026-10-14',
            granularity: 'daily',
            assumedToday: true,
        })
    })

    it('does not assume today when the text says today', () => {
        expect(extractTimeReference('weather in Pune today', NOW).assumedToday).toBe(false)
    })

    it('resolves tomorrow', () => {
        const ref = extractTimeReference('rain tomorrow?', NOW)
        expect(ref.type).toBe('tomorrow')
        expect(ref.startDate).toBe('2026-10-15')
        expect(ref.endDate).toBe('2026-10-15')
    })

    it('resolves the coming weekend', () => {
        const ref = extractTimeReference('this weekend', NOW)
        expect(ref).toMatchObject({ type: 'weekend', startDate: '2026-10-17', endDate: '2026-10-18' })
    })

    it('never resolves a weekday to the same day', () => {
        expect(extractTimeReference('on friday', NOW)).toMatchObject({
            type: 'weekday',
            startDate: '2026-10-16',
            weekday: 'friday',
        })
        expect(extractTimeReference('on wednesday', NOW).startDate).toBe('2026-10-21')
    })

    it('gives future windows three days starting tomorrow', () => {
        const ref = extractTimeReference('upcoming forecast', NOW)
        expect(ref).toMatchObject({ type: 'future_window', startDate: '2026-10-15', endDate: '2026-10-17' })
    })

    it('prefers an explicit date over other markers', () => {
        const ref = extractTimeReference('tomorrow or 2026-10-20?', NOW)
        expect(ref).toMatchObject({ type: 'specific_date', startDate: '2026-10-20' })
        expect(extractTimeReference('on 5/11/2026', NOW).startDate).toBe('2026-11-05')
    })

    it('detects hourly granularity', () => {
        expect(extractTimeReference('hourly forecast tomorrow', NOW).granularity).toBe('hourly')
    })

    it('keeps startDate <= endDate for every type', () => {
        for (const text of ['', 'tomorrow', 'weekend', 'monday', 'future', '2026-12-01']) {
            const ref = extractTimeReference(text, NOW)
            expect(ref.startDate <= ref.endDate).toBe(true)
        }
    })
})

describe('parseSpecificDate', () => {
    it('rejects impossible calendar dates', () => {
        expect(parseSpecificDate('2026-02-30')).toBeNull()
        expect(parseSpecificDate('31/4/2026')).toBeNull()
    })
})

describe('intent flags', () => {
    it('sets flags independently', () => {
        const flags = extractIntentFlags('Will it be windy and humid tomorrow?')
        expect(flags.wind).toBe(true)
        expect(flags.humidity).toBe(true)
        expect(flags.rain).toBe(false)
    })

    it('treats umbrella questions as rain questions', () => {
        expect(extractIntentFlags('Do I need an umbrella?').rain).toBe(true)
    })

    it('defaults to climate when nothing matches', () => {
        const flags = resolveIntentFlags("What's the weather in Paris tomorrow?")
        expect(flags.climate).toBe(true)
        expect(Object.values(flags).filter(Boolean)).toHaveLength(1)
    })
})
