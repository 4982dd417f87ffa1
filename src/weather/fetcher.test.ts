import { describe, expect, it } from 'vitest'
import { fetchWeather, parseToolInput, runWeatherTool, WEATHER_LIVE_DATA_UNAVAILABLE } from './fetcher.js'
import { decodeWeatherPayload } from './decode.js'
import { alertsPayload, FakeProvider, lateStormForecastPayload, NOW } from '../tests/owm-fixtures.js'

describe('fetchWeather', () => {
    it('returns service_unavailable without a provider', async () => {
        const payload = await fetchWeather({ text: 'weather in Paris' }, { provider: null, now: NOW })
        expect(payload).toEqual({ status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE })
    })

    it('asks for a location when none can be found', async () => {
        const provider = new FakeProvider()
        const payload = await fetchWeather({ text: 'Do I need an umbrella?' }, { provider, now: NOW })
        expect(payload.status).toBe('needs_location')
        expect(provider.calls).toEqual([])
    })

    it('never resolves an ambiguous location', async () => {
        const provider = new FakeProvider()
        const payload = await fetchWeather({ text: 'Georgia or Florida' }, { provider, now: NOW })
        expect(payload).toEqual({
            status: 'ambiguous_location',
            message: "Please clarify the location: 'Georgia or Florida'.",
            location: 'Georgia or Florida',
        })
        expect(provider.calls).toEqual([])
    })

    it('accepts a custom ambiguity policy', async () => {
        const provider = new FakeProvider()
        const payload = await fetchWeather(
            { text: 'weather in Springfield' },
            { provider, now: NOW, ambiguity: city => city === 'Springfield' },
        )
        expect(payload.status).toBe('ambiguous_location')
    })

    it('reports service_unavailable when the forecast call fails', async () => {
        const provider = new FakeProvider({ forecast: null })
        const payload = await fetchWeather({ text: 'weather in Paris' }, { provider, now: NOW })
        expect(payload).toEqual({
            status: 'service_unavailable',
            message: WEATHER_LIVE_DATA_UNAVAILABLE,
            location: 'Paris',
        })
    })

    it('reports service_unavailable when current readings are not numeric', async () => {
        const provider = new FakeProvider({ current: { main: { temp: null, humidity: 50 } } })
        const payload = await fetchWeather({ text: 'weather in Paris' }, { provider, now: NOW })
        expect(payload.status).toBe('service_unavailable')
    })

    it('builds an ok payload scoped to the requested day', async () => {
        const provider = new FakeProvider({ alerts: alertsPayload() })
        const payload = await fetchWeather({ text: 'Will it rain in Paris tomorrow?' }, { provider, now: NOW })

        expect(payload.status).toBe('ok')
        if (payload.status !== 'ok') return
        expect(payload.location).toBe('Paris')
        expect(payload.timeReference).toMatchObject({
            type: 'tomorrow',
            startDate: '2026-10-15',
            timezoneShiftSeconds: 0,
        })
        expect(payload.hourlyForecast.map(h => h.time)).toEqual(['09:00', '12:00', '15:00'])
        expect(payload.rainProbabilityPercent).toBe(80)
        expect(payload.stormPossible).toBe(true)
        expect(payload.stormPeriods).toEqual(['2026-10-15 15:00'])
        expect(payload.severeAlerts[0]?.event).toBe('Thunderstorm warning')
        expect(provider.calls).toEqual(['current:Paris', 'forecast:Paris', 'alerts:48.85,2.35'])
    })

    it('derives rain and storm figures from the whole window before trimming the hourly list', async () => {
        const provider = new FakeProvider({ forecast: lateStormForecastPayload() })
        const payload = await fetchWeather({ text: 'Will it rain in Paris in the upcoming days?' }, { provider, now: NOW })

        expect(payload.status).toBe('ok')
        if (payload.status !== 'ok') return
        expect(payload.timeReference).toMatchObject({ startDate: '2026-10-15', endDate: '2026-10-17' })
        expect(payload.hourlyForecast).toHaveLength(12)
        expect(payload.hourlyForecast[11]?.localTime).toBe('2026-10-16 09:00')
        expect(payload.dailyForecast.map(d => d.precipProbabilityPercent)).toEqual([0, 0, 90])
        expect(payload.rainProbabilityPercent).toBe(90)
        expect(payload.stormPossible).toBe(true)
        expect(payload.stormPeriods).toEqual(['2026-10-17 18:00'])
    })

    it('prefers the city hint over the text', async () => {
        const provider = new FakeProvider()
        await fetchWeather({ text: 'weather in Paris', cityHint: 'Lyon' }, { provider, now: NOW })
        expect(provider.calls[0]).toBe('current:Lyon')
    })

    it('skips alerts when coordinates are missing', async () => {
        const provider = new FakeProvider({ current: { main: { temp: 10, humidity: 40 }, weather: [] } })
        const payload = await fetchWeather({ text: 'weather in Oslo' }, { provider, now: NOW })
        expect(payload.status === 'ok' && payload.severeAlerts).toEqual([])
        expect(provider.calls).toEqual(['current:Oslo', 'forecast:Oslo'])
    })
})

describe('parseToolInput', () => {
    it('passes raw weather text through', () => {
        expect(parseToolInput('rain in Pune today')).toEqual({ text: 'rain in Pune today', cityHint: null, dateHint: null })
    })

    it('reads JSON arguments and appends the location', () => {
        expect(parseToolInput('{"query": "Will it rain?", "location": "Pune", "date": "tomorrow"}')).toEqual({
            text: 'Will it rain? in Pune',
            cityHint: 'Pune',
            dateHint: 'tomorrow',
        })
    })

    it('prefixes non-weather text so the query stays a weather query', () => {
        expect(parseToolInput('Pune').text).toBe('weather Pune')
    })
})

describe('runWeatherTool', () => {
    it('serializes a payload the decoder accepts', async () => {
        const provider = new FakeProvider()
        const raw = await runWeatherTool('{"query": "weather", "city": "Paris"}', q => fetchWeather(q, { provider, now: NOW }))
        const decoded = decodeWeatherPayload(raw)
        expect(decoded?.status).toBe('ok')
    })
})
