/**
 * Weather Data Fetcher: WeatherQuery → WeatherPayload
 *
 * Resolution order:
 *   1. no provider (missing API key)     → service_unavailable
 *   2. no city from hint or text         → needs_location
 *   3. ambiguous city                    → ambiguous_location
 *   4. current/forecast fetch failed     → service_unavailable
 *   5. otherwise                         → ok
 *
 * Ambiguous locations are never auto-resolved.
 */

import type { TimeReference, WeatherPayload } from '../types/weather.js'
import {
    ensureCityInInput,
    extractCityName,
    extractTimeReference,
    inferCityFromText,
    isAmbiguousCity,
    looksLikeWeatherQuery,
    type AmbiguityPolicy,
} from './extractor.js'
import {
    buildDailyEntries,
    buildHourlyEntries,
    MAX_DAILY_POINTS,
    MAX_HOURLY_POINTS,
    normalizeAlerts,
    normalizeCurrent,
    rainProbability,
    selectWindow,
    stormPeriods,
} from './forecast.js'
import type { WeatherProvider } from './openweather.js'

export const WEATHER_LIVE_DATA_UNAVAILABLE = 'Live weather data is temporarily unavailable'
export const NEEDS_LOCATION_MESSAGE = 'Please specify the location (city) for the weather request.'

export interface WeatherQuery {
    text: string
    cityHint?: string | null
    dateHint?: string | null
}

export interface FetchWeatherOptions {
    /** null when no API key is configured */
    provider: WeatherProvider | null
    now?: Date
    ambiguity?: AmbiguityPolicy
}

export type WeatherFetcher = (query: WeatherQuery) => Promise<WeatherPayload>

function withDateHint(reference: TimeReference, text: string, dateHint: string | null | undefined, now: Date): TimeReference {
    if (!dateHint?.trim()) return reference
    return extractTimeReference(`${text} ${dateHint}`, now)
}

export async function fetchWeather(query: WeatherQuery, options: FetchWeatherOptions): Promise<WeatherPayload> {
    const now = options.now ?? new Date()
    const ambiguity = options.ambiguity ?? isAmbiguousCity
    const text = query.text.trim()

    if (!options.provider) {
        return { status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE }
    }

    const hinted = query.cityHint ? extractCityName(query.cityHint) : ''
    const city = hinted || inferCityFromText(text)
    if (!city) {
        return { status: 'needs_location', message: NEEDS_LOCATION_MESSAGE }
    }

    if (ambiguity(city)) {
        return {
            status: 'ambiguous_location',
            message: `Please clarify the location: '${city}'.`,
            location: city,
        }
    }

    const timeReference = withDateHint(extractTimeReference(text, now), text, query.dateHint, now)
    const [currentBody, forecastBody] = await Promise.all([
        options.provider.fetchCurrent(city),
        options.provider.fetchForecast(city),
    ])
    if (currentBody === null || forecastBody === null) {
        return { status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE, location: city }
    }

    const current = normalizeCurrent(currentBody, city)
    if (!current) {
        return { status: 'service_unavailable', message: WEATHER_LIVE_DATA_UNAVAILABLE, location: city }
    }

    const { hourly, timezoneShiftSeconds } = buildHourlyEntries(forecastBody)
    const daily = buildDailyEntries(hourly)
    const window = selectWindow(hourly, daily, timeReference.startDate, timeReference.endDate)
    const periods = stormPeriods(window)

    let severeAlerts: ReturnType<typeof normalizeAlerts> = []
    if (current.lat !== null && current.lon !== null) {
        severeAlerts = normalizeAlerts(await options.provider.fetchAlerts(current.lat, current.lon))
    }

    return {
        status: 'ok',
        source: 'openweather',
        location: current.city,
        query: text,
        timeReference: { ...timeReference, timezoneShiftSeconds },
        current: current.current,
        rainProbabilityPercent: rainProbability(window),
        hourlyForecast: window.hourly.slice(0, MAX_HOURLY_POINTS),
        dailyForecast: window.daily.slice(0, MAX_DAILY_POINTS),
        stormPossible: periods.length > 0,
        stormPeriods: periods,
        severeAlerts,
    }
}

// ─── Tool Entry Point ────────────────────────────────────────────────────────

function stringField(record: Record<string, unknown>, ...keys: string[]): string | null {
    for (const key of keys) {
        const value = record[key]
        if (typeof value === 'string' && value.trim()) return value.trim()
    }
    return null
}

/**
 * Tool arguments arrive as raw text or JSON
 * `{query|message|question, location|city, date|time_reference}`.
 */
export function parseToolInput(toolInput: string): WeatherQuery {
    const raw = toolInput.trim()
    let text = raw
    let cityHint: string | null = null
    let dateHint: string | null = null

    let parsed: unknown = null
    try {
        parsed = JSON.parse(raw)
    } catch {
        parsed = null
    }

    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        const record = Object.fromEntries(Object.entries(parsed))
        cityHint = stringField(record, 'location', 'city')
        dateHint = stringField(record, 'date', 'time_reference')
        text = stringField(record, 'query', 'message', 'question') ?? ''
    }

    if (cityHint) text = ensureCityInInput(text, cityHint)
    if (!looksLikeWeatherQuery(text)) text = `weather ${text}`.trim()
    return { text, cityHint, dateHint }
}

/** Weather tool as exposed to the generative source: text in, JSON payload out */
export async function runWeatherTool(toolInput: string, fetcher: WeatherFetcher): Promise<string> {
    return JSON.stringify(await fetcher(parseToolInput(toolInput)))
}
