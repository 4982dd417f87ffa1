/**
 * Tolerant weather payload decoder
 *
 * Tool observations come back as text that may be bare JSON, JSON wrapped in
 * prose, or garbage. Strict parse first, then the outermost `{...}` span, then
 * zod validation against the payload union. Anything else → null.
 */

import { z } from 'zod'
import type { WeatherPayload } from '../types/weather.js'

const nullableNumber = z.number().nullable()

const TimeReferenceSchema = z.object({
    type: z.enum(['today', 'tomorrow', 'weekend', 'weekday', 'specific_date', 'future_window']),
    startDate: z.string(),
    endDate: z.string(),
    granularity: z.enum(['hourly', 'daily']),
    assumedToday: z.boolean(),
    weekday: z.string().optional(),
    timezoneShiftSeconds: z.number(),
})

const HourlyPointSchema = z.object({
    date: z.string(),
    time: z.string(),
    localTime: z.string(),
    temperatureC: nullableNumber,
    humidityPercent: nullableNumber,
    windSpeedMps: nullableNumber,
    windDeg: nullableNumber,
    windDirection: z.string().nullable(),
    precipProbabilityPercent: nullableNumber,
    description: z.string(),
    stormPossible: z.boolean(),
})

const DailyPointSchema = z.object({
    date: z.string(),
    tempMinC: nullableNumber,
    tempMaxC: nullableNumber,
    humidityPercent: nullableNumber,
    windSpeedMps: nullableNumber,
    windDirection: z.string().nullable(),
    precipProbabilityPercent: nullableNumber,
    description: z.string(),
    stormPossible: z.boolean(),
})

export const WeatherPayloadSchema: z.ZodType<WeatherPayload> = z.discriminatedUnion('status', [
    z.object({
        status: z.literal('ok'),
        source: z.literal('openweather'),
        location: z.string(),
        query: z.string(),
        timeReference: TimeReferenceSchema,
        current: z.object({
            temperatureC: z.number(),
            humidityPercent: z.number(),
            windSpeedMps: nullableNumber,
            windDeg: nullableNumber,
            windDirection: z.string().nullable(),
            description: z.string(),
        }),
        rainProbabilityPercent: nullableNumber,
        hourlyForecast: z.array(HourlyPointSchema),
        dailyForecast: z.array(DailyPointSchema),
        stormPossible: z.boolean(),
        stormPeriods: z.array(z.string()),
        severeAlerts: z.array(z.object({
            event: z.string(),
            startUtc: z.string().nullable(),
            endUtc: z.string().nullable(),
            description: z.string(),
        })),
    }),
    z.object({ status: z.literal('needs_location'), message: z.string() }),
    z.object({ status: z.literal('ambiguous_location'), message: z.string(), location: z.string() }),
    z.object({ status: z.literal('service_unavailable'), message: z.string(), location: z.string().optional() }),
])

function parseJsonObject(text: string): unknown {
    try {
        return JSON.parse(text)
    } catch {
        return null
    }
}

function isObject(value: unknown): boolean {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function decodeWeatherPayload(raw: string | null | undefined): WeatherPayload | null {
    const text = (raw ?? '').trim()
    if (!text) return null

    let candidate = parseJsonObject(text)
    if (!isObject(candidate)) {
        const start = text.indexOf('{')
        const end = text.lastIndexOf('}')
        if (start === -1 || end <= start) return null
        candidate = parseJsonObject(text.slice(start, end + 1))
        if (!isObject(candidate)) return null
    }

    const result = WeatherPayloadSchema.safeParse(candidate)
    if (result.success) return result.data
    console.warn('[weather] payload validation failed:', result.error.issues.length, 'issue(s)')
    return null
}
