/**
 * Answer Synthesizer
 *
 * Deterministic text built only from payload numbers. Used whenever the
 * generative answer is missing or rejected by the quality gate.
 *
 * Primary sentence priority:
 *   rain > storm > alert > temperature > humidity > wind > forecast > climate
 */

import type {
    DailyPoint,
    IntentFlags,
    OkWeatherPayload,
    ResolvedTimeReference,
    Units,
    WeatherPayload,
} from '../types/weather.js'
import { resolveIntentFlags } from './extractor.js'
import { round1 } from './forecast.js'
import { NEEDS_LOCATION_MESSAGE, WEATHER_LIVE_DATA_UNAVAILABLE } from './fetcher.js'

const DETAIL_POINTS = 3

// ─── Unit Rendering ──────────────────────────────────────────────────────────

export function formatTemperature(celsius: number | null, units: Units): string {
    if (celsius === null) return 'N/A'
    return units === 'imperial' ? `${round1(celsius * 9 / 5 + 32)} F` : `${celsius} C`
}

function formatTemperatureRange(min: number | null, max: number | null, units: Units): string {
    if (min === null || max === null) return 'N/A'
    if (units === 'imperial') {
        return `${round1(min * 9 / 5 + 32)}-${round1(max * 9 / 5 + 32)} F`
    }
    return `${min}-${max} C`
}

export function formatWindSpeed(mps: number, units: Units): string {
    return units === 'imperial' ? `${round1(mps * 2.23694)} mph` : `${mps} m/s`
}

function formatWind(speed: number | null, direction: string | null, units: Units): string | null {
    if (speed === null) return null
    return direction ? `${formatWindSpeed(speed, units)} ${direction}` : formatWindSpeed(speed, units)
}

// ─── Scope & Rain ────────────────────────────────────────────────────────────

export function timeScopeLabel(reference: ResolvedTimeReference): string {
    if (reference.type === 'today') return 'today'
    if (reference.type === 'tomorrow') return 'tomorrow'
    if (reference.startDate !== reference.endDate) return `${reference.startDate} to ${reference.endDate}`
    return reference.startDate
}

export function rainStatement(probability: number | null, location: string, scope: string): string {
    if (probability === null) return `Rain probability is unavailable for ${location} ${scope}.`
    const percent = Math.round(probability)
    let verdict = 'Rain is unlikely.'
    if (percent > 60) verdict = 'Rain is likely.'
    else if (percent >= 30) verdict = 'There is a chance of rain.'
    return `${verdict} Rain probability in ${location} for ${scope}: ${percent}%.`
}

// ─── Sentences ───────────────────────────────────────────────────────────────

type Topic = keyof IntentFlags

const PRIORITY: Topic[] = ['rain', 'storm', 'alert', 'temperature', 'humidity', 'wind', 'forecast', 'climate']

interface Context {
    payload: OkWeatherPayload
    location: string
    scope: string
    firstDay: DailyPoint | undefined
    units: Units
}

function temperatureRange(ctx: Context): string | null {
    const day = ctx.firstDay
    if (!day || day.tempMinC === null || day.tempMaxC === null) return null
    return `${formatTemperature(day.tempMinC, ctx.units)} to ${formatTemperature(day.tempMaxC, ctx.units)}`
}

function primarySentence(topic: Topic, ctx: Context): string {
    const { payload, location, scope, units } = ctx
    const current = payload.current

    switch (topic) {
        case 'rain':
            return rainStatement(payload.rainProbabilityPercent, location, scope)
        case 'storm':
            return payload.stormPossible
                ? `Storm conditions may occur in ${location} for ${scope}.`
                : `No storm conditions are indicated in ${location} for ${scope}.`
        case 'alert': {
            const first = payload.severeAlerts[0]
            return first
                ? `Severe alert active in ${location}: ${first.event}.`
                : `No severe weather alerts are currently reported for ${location}.`
        }
        case 'temperature': {
            const range = temperatureRange(ctx)
            if (range) return `Temperature in ${location} for ${scope}: ${range}.`
            return `Current temperature in ${location}: ${formatTemperature(current.temperatureC, units)}.`
        }
        case 'humidity':
            return `Current humidity in ${location}: ${current.humidityPercent}%.`
        case 'wind': {
            const wind = formatWind(current.windSpeedMps, current.windDirection, units)
            return wind ? `Current wind in ${location}: ${wind}.` : `Wind data is unavailable for ${location}.`
        }
        case 'forecast': {
            const hour = payload.hourlyForecast[0]
            if (payload.timeReference.granularity === 'hourly' && hour) {
                return `Hourly forecast for ${location} ${scope}: ${hour.time} ${formatTemperature(hour.temperatureC, units)}, ${hour.description}.`
            }
            const day = ctx.firstDay
            if (day) {
                return `Forecast for ${location} (${scope}): ${day.date} ${formatTemperatureRange(day.tempMinC, day.tempMaxC, units)}, ${day.description}.`
            }
            return `Forecast data is unavailable for ${location}.`
        }
        case 'climate': {
            const day = ctx.firstDay
            const reference = payload.timeReference
            if (reference.type !== 'today' && day && day.tempMinC !== null && day.tempMaxC !== null) {
                return `Conditions in ${location} for ${scope} (${day.date}): ${formatTemperatureRange(day.tempMinC, day.tempMaxC, units)}, ${day.description}.`
            }
            return `Current conditions in ${location}: ${current.description}.`
        }
    }
}

function forecastDetail(ctx: Context): string {
    const { payload, units } = ctx
    const hourly = payload.hourlyForecast.slice(0, DETAIL_POINTS)
    if (payload.timeReference.granularity === 'hourly' && hourly.length) {
        const points = hourly.map(h =>
            `${h.time}: ${formatTemperature(h.temperatureC, units)}, ${h.description}, rain ${h.precipProbabilityPercent ?? 'N/A'}%`)
        return `Hourly: ${points.join('; ')}.`
    }
    const daily = payload.dailyForecast.slice(0, DETAIL_POINTS)
    if (daily.length) {
        const points = daily.map(d =>
            `${d.date}: ${formatTemperatureRange(d.tempMinC, d.tempMaxC, units)}, ${d.description}, rain ${d.precipProbabilityPercent ?? 'N/A'}%`)
        return `Daily: ${points.join('; ')}.`
    }
    return 'Forecast: unavailable.'
}

function detailSentences(flags: IntentFlags, primary: Topic, ctx: Context): string[] {
    const { payload, units } = ctx
    const current = payload.current
    const details: string[] = []

    if (flags.temperature && primary !== 'temperature') {
        const range = temperatureRange(ctx)
        details.push(range
            ? `Temperature range: ${range}.`
            : `Temperature now: ${formatTemperature(current.temperatureC, units)}.`)
    }
    if (flags.humidity && primary !== 'humidity') {
        details.push(`Humidity: ${current.humidityPercent}%.`)
    }
    if (flags.wind && primary !== 'wind') {
        const wind = formatWind(current.windSpeedMps, current.windDirection, units)
        details.push(wind ? `Wind: ${wind}.` : 'Wind: unavailable.')
    }
    if (flags.rain && primary !== 'rain') {
        const rain = payload.rainProbabilityPercent
        details.push(rain === null ? 'Rain probability: unavailable.' : `Rain probability: ${Math.round(rain)}%.`)
    }
    if (flags.forecast) {
        details.push(forecastDetail(ctx))
    }
    if (flags.storm) {
        if (payload.stormPossible && payload.stormPeriods.length) {
            details.push(`Storm windows: ${payload.stormPeriods.slice(0, DETAIL_POINTS).join(', ')}.`)
        } else if (primary !== 'storm') {
            details.push('Storm windows: none indicated.')
        }
    }
    if (flags.alert) {
        const alerts = payload.severeAlerts.slice(0, 2)
        if (alerts.length) {
            details.push(`Alerts: ${alerts.map(a => `${a.event} (${a.startUtc ?? 'unknown start'})`).join('; ')}.`)
        } else if (primary !== 'alert') {
            details.push('Severe alerts: none currently reported.')
        }
    }
    if (flags.climate && primary !== 'climate' && !flags.forecast) {
        details.push(`Condition: ${current.description}.`)
    }
    return details
}

export function buildWeatherAnswer(userInput: string, payload: WeatherPayload, units: Units = 'metric'): string {
    switch (payload.status) {
        case 'needs_location':
            return NEEDS_LOCATION_MESSAGE
        case 'ambiguous_location':
            return payload.message || 'Please clarify the location.'
        case 'service_unavailable':
            return WEATHER_LIVE_DATA_UNAVAILABLE
    }

    const ctx: Context = {
        payload,
        location: payload.location || 'the requested location',
        scope: timeScopeLabel(payload.timeReference),
        firstDay: payload.dailyForecast[0],
        units,
    }
    const flags = resolveIntentFlags(userInput)
    const primary = PRIORITY.find(topic => flags[topic]) ?? 'climate'

    const sentences = new Set([primarySentence(primary, ctx), ...detailSentences(flags, primary, ctx)])
    return [...sentences].join(' ')
}

// ─── Summary Fields ──────────────────────────────────────────────────────────

export interface WeatherSummary {
    city: string
    temperatureC: number | null
    humidityPercent: number | null
    windSpeedMps: number | null
    forecast: Array<{ date: string; tempMinC: number; tempMaxC: number; description: string }>
}

/** Flat numbers for clients that do not want to walk the payload union */
export function summarizePayload(payload: WeatherPayload, fallbackCity: string): WeatherSummary {
    if (payload.status !== 'ok') {
        return {
            city: ('location' in payload && payload.location) || fallbackCity,
            temperatureC: null,
            humidityPercent: null,
            windSpeedMps: null,
            forecast: [],
        }
    }
    return {
        city: payload.location || fallbackCity,
        temperatureC: payload.current.temperatureC,
        humidityPercent: payload.current.humidityPercent,
        windSpeedMps: payload.current.windSpeedMps,
        forecast: payload.dailyForecast.flatMap(d =>
            d.tempMinC !== null && d.tempMaxC !== null
                ? [{ date: d.date, tempMinC: d.tempMinC, tempMaxC: d.tempMaxC, description: d.description }]
                : []),
    }
}
