import { describe, expect, it } from 'vitest'
import { buildWeatherAnswer, rainStatement, summarizePayload } from './answer.js'
import { fetchWeather, NEEDS_LOCATION_MESSAGE, WEATHER_LIVE_DATA_UNAVAILABLE } from './fetcher.js'
import type { WeatherPayload } from '../types/weather.js'
import { alertsPayload, FakeProvider, NOW } from '../tests/owm-fixtures.js'

function payloadFor(text: string, provider = new FakeProvider()): Promise<WeatherPayload> {
    return fetchWeather({ text }, { provider, now: NOW })
}

async function answerFor(text: string, provider?: FakeProvider, units: 'metric' | 'imperial' = 'metric') {
    return buildWeatherAnswer(text, await payloadFor(text, provider), units)
}

describe('rainStatement', () => {
    it('grades the probability', () => {
        expect(rainStatement(61, 'Paris', 'today')).toBe('Rain is likely. Rain probability in Paris for today: 61%.')
        expect(rainStatement(60, 'Paris', 'today')).toBe('There is a chance of rain. Rain probability in Paris for today: 60%.')
        expect(rainStatement(30, 'Paris', 'today')).toBe('There is a chance of rain. Rain probability in Paris for today: 30%.')
        expect(rainStatement(29, 'Paris', 'today')).toBe('Rain is unlikely. Rain probability in Paris for today: 29%.')
    })

    it('says when the probability is missing', () => {
        expect(rainStatement(null, 'Paris', 'today')).toBe('Rain probability is unavailable for Paris today.')
    })
})

describe('buildWeatherAnswer', () => {
    it('leads with rain for rain questions', async () => {
        expect(await answerFor('Will it rain in Paris tomorrow?'))
            .toBe('Rain is likely. Rain probability in Paris for tomorrow: 80%.')
    })

    it('converts temperatures for imperial units', async () => {
        expect(await answerFor('How hot will it be in Paris tomorrow?', undefined, 'imperial'))
            .toBe('Temperature in Paris for tomorrow: 57.2 F to 62.6 F.')
    })

    it('adds detail sentences for secondary topics', async () => {
        expect(await answerFor('Is it windy and humid in Paris today?'))
            .toBe('Current humidity in Paris: 72%. Wind: 4.1 m/s S.')
    })

    it('describes the requested day for general questions about another day', async () => {
        expect(await answerFor("What's the weather in Paris tomorrow?"))
            .toBe('Conditions in Paris for tomorrow (2026-10-15): 14-17 C, light rain.')
    })

    it('describes current conditions for today', async () => {
        expect(await answerFor('weather in Paris')).toBe('Current conditions in Paris: broken clouds.')
    })

    it('lists storm windows and alerts', async () => {
        const provider = new FakeProvider({ alerts: alertsPayload() })
        expect(await answerFor('Any storm alert in Paris tomorrow?', provider)).toBe(
            'Rain is likely. Rain probability in Paris for tomorrow: 80%.' +
            ' Storm windows: 2026-10-15 15:00.' +
            ' Alerts: Thunderstorm warning (2026-10-15T14:00:00.000Z).',
        )
    })

    it('summarizes daily forecasts', async () => {
        expect(await answerFor('forecast for Paris tomorrow')).toBe(
            'Forecast for Paris (tomorrow): 2026-10-15 14-17 C, light rain.' +
            ' Daily: 2026-10-15: 14-17 C, light rain, rain 80%.',
        )
    })

    it('summarizes hourly forecasts', async () => {
        expect(await answerFor('hourly forecast for Paris tomorrow')).toBe(
            'Hourly forecast for Paris tomorrow: 09:00 14 C, light rain.' +
            ' Hourly: 09:00: 14 C, light rain, rain 65%; 12:00: 16.5 C, light rain, rain 80%;' +
            ' 15:00: 17 C, thunderstorm, rain 40%.',
        )
    })

    it('returns fixed messages for non-ok payloads', () => {
        expect(buildWeatherAnswer('rain?', { status: 'needs_location', message: 'x' })).toBe(NEEDS_LOCATION_MESSAGE)
        expect(buildWeatherAnswer('rain?', {
            status: 'ambiguous_location',
            message: "Please clarify the location: 'Georgia or Florida'.",
            location: 'Georgia or Florida',
        })).toBe("Please clarify the location: 'Georgia or Florida'.")
        expect(buildWeatherAnswer('rain?', { status: 'service_unavailable', message: 'x' }))
            .toBe(WEATHER_LIVE_DATA_UNAVAILABLE)
    })
})

describe('summarizePayload', () => {
    it('flattens ok payloads', async () => {
        expect(summarizePayload(await payloadFor('weather in Paris tomorrow'), 'Lyon')).toEqual({
            city: 'Paris',
            temperatureC: 18.4,
            humidityPercent: 72,
            windSpeedMps: 4.1,
            forecast: [{ date: '2026-10-15', tempMinC: 14, tempMaxC: 17, description: 'light rain' }],
        })
    })

    it('keeps only the location for other statuses', () => {
        expect(summarizePayload({ status: 'needs_location', message: 'x' }, 'Lyon')).toEqual({
            city: 'Lyon',
            temperatureC: null,
            humidityPercent: null,
            windSpeedMps: null,
            forecast: [],
        })
    })
})
