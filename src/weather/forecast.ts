/**
 * Forecast Normalizer: converts raw OpenWeatherMap JSON into payload shapes.
 *
 * Normalizes:
 *   - current conditions → temperature/humidity/wind/description
 *   - 3-hourly forecast list → local-time hourly points
 *   - hourly points → per-day buckets (min/max, mean, max, modal values)
 *   - One Call alerts → start/end as ISO UTC strings
 *
 * Individual malformed fields degrade to null; only a current payload without
 * numeric temperature and humidity is rejected outright.
 */

import { z } from 'zod'
import type {
    CurrentConditions,
    DailyPoint,
    HourlyPoint,
    SevereAlert,
} from '../types/weather.js'
import { STORM_MARKERS } from './extractor.js'

export const MAX_HOURLY_POINTS = 12
export const MAX_DAILY_POINTS = 5

const COMPASS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const

// ─── Provider Shapes ─────────────────────────────────────────────────────────

const looseNumber = z.number().finite().nullish().catch(null)
const looseString = z.string().nullish().catch(null)
const looseConditions = z.array(z.object({ description: looseString }).catch({})).catch([])
const looseWind = z.object({ speed: looseNumber, deg: looseNumber }).catch({})

const CurrentPayloadSchema = z.object({
    name: looseString,
    main: z.object({ temp: z.number().finite(), humidity: z.number().finite() }),
    weather: looseConditions,
    wind: looseWind,
    coord: z.object({ lat: looseNumber, lon: looseNumber }).catch({}),
})

const ForecastEntrySchema = z.object({
    dt: z.number().finite(),
    main: z.object({ temp: looseNumber, humidity: looseNumber }).catch({}),
    wind: looseWind,
    weather: looseConditions,
    pop: looseNumber,
})

const ForecastPayloadSchema = z.object({
    list: z.array(z.unknown()).catch([]),
    city: z.object({ timezone: looseNumber }).catch({}),
})

const AlertSchema = z.object({
    event: looseString,
    start: looseNumber,
    end: looseNumber,
    description: looseString,
})

const AlertsPayloadSchema = z.object({
    alerts: z.array(z.unknown()).catch([]),
})

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function round1(value: number): number {
    return Math.round(value * 10) / 10
}

function isStormy(description: string): boolean {
    const lowered = description.toLowerCase()
    return STORM_MARKERS.some(m => lowered.includes(m))
}

/** Most frequent value; ties go to the value seen first */
function mode(values: string[]): string | null {
    const counts = new Map<string, number>()
    for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1)
    let best: string | null = null
    let bestCount = 0
    for (const [value, count] of counts) {
        if (count > bestCount) {
            best = value
            bestCount = count
        }
    }
    return best
}

/** 8-point compass label, `directions[round(deg / 45) mod 8]` */
export function windDirectionLabel(degrees: number | null | undefined): string | null {
    if (typeof degrees !== 'number' || !Number.isFinite(degrees)) return null
    const normalized = ((degrees % 360) + 360) % 360
    return COMPASS[Math.floor(normalized / 45 + 0.5) % 8]
}

// ─── Current Conditions ──────────────────────────────────────────────────────

export interface NormalizedCurrent {
    city: string
    current: CurrentConditions
    lat: number | null
    lon: number | null
}

export function normalizeCurrent(payload: unknown, fallbackCity: string): NormalizedCurrent | null {
    const parsed = CurrentPayloadSchema.safeParse(payload)
    if (!parsed.success) return null

    const data = parsed.data
    const description = data.weather[0]?.description?.trim() || 'No description'
    const name = data.name?.trim()
    const windDeg = data.wind.deg ?? null

    return {
        city: name || fallbackCity,
        current: {
            temperatureC: round1(data.main.temp),
            humidityPercent: Math.trunc(data.main.humidity),
            windSpeedMps: typeof data.wind.speed === 'number' ? round1(data.wind.speed) : null,
            windDeg,
            windDirection: windDirectionLabel(windDeg),
            description,
        },
        lat: data.coord.lat ?? null,
        lon: data.coord.lon ?? null,
    }
}

// ─── Hourly / Daily ──────────────────────────────────────────────────────────

export interface HourlySeries {
    hourly: HourlyPoint[]
    timezoneShiftSeconds: number
}

export function buildHourlyEntries(payload: unknown): HourlySeries {
    const parsed = ForecastPayloadSchema.safeParse(payload)
    if (!parsed.success) return { hourly: [], timezoneShiftSeconds: 0 }

    const shift = Math.trunc(parsed.data.city.timezone ?? 0)
    const hourly: HourlyPoint[] = []

    for (const raw of parsed.data.list) {
        const entry = ForecastEntrySchema.safeParse(raw)
        if (!entry.success) continue
        const e = entry.data

        const local = new Date((Math.trunc(e.dt) + shift) * 1000).toISOString()
        const date = local.slice(0, 10)
        const time = local.slice(11, 16)
        const description = e.weather[0]?.description?.trim() || 'No description'
        const windDeg = e.wind.deg ?? null

        hourly.push({
            date,
            time,
            localTime: `${date} ${time}`,
            temperatureC: typeof e.main.temp === 'number' ? round1(e.main.temp) : null,
            humidityPercent: typeof e.main.humidity === 'number' ? Math.trunc(e.main.humidity) : null,
            windSpeedMps: typeof e.wind.speed === 'number' ? round1(e.wind.speed) : null,
            windDeg,
            windDirection: windDirectionLabel(windDeg),
            precipProbabilityPercent: typeof e.pop === 'number' ? Math.round(e.pop * 100) : null,
            description,
            stormPossible: isStormy(description),
        })
    }

    return { hourly, timezoneShiftSeconds: shift }
}

interface DayBucket {
    temps: number[]
    humidity: number[]
    wind: number[]
    pop: number[]
    descriptions: string[]
    windDirections: string[]
}

export function buildDailyEntries(hourly: HourlyPoint[]): DailyPoint[] {
    const buckets = new Map<string, DayBucket>()

    for (const point of hourly) {
        let bucket = buckets.get(point.date)
        if (!bucket) {
            bucket = { temps: [], humidity: [], wind: [], pop: [], descriptions: [], windDirections: [] }
            buckets.set(point.date, bucket)
        }
        if (point.temperatureC !== null) bucket.temps.push(point.temperatureC)
        if (point.humidityPercent !== null) bucket.humidity.push(point.humidityPercent)
        if (point.windSpeedMps !== null) bucket.wind.push(point.windSpeedMps)
        if (point.precipProbabilityPercent !== null) bucket.pop.push(point.precipProbabilityPercent)
        if (point.description.trim()) bucket.descriptions.push(point.description.trim())
        if (point.windDirection) bucket.windDirections.push(point.windDirection)
    }

    const byDate = [...buckets.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return byDate.map(([date, b]) => {
        const description = mode(b.descriptions) ?? 'No description'
        return {
            date,
            tempMinC: b.temps.length ? round1(Math.min(...b.temps)) : null,
            tempMaxC: b.temps.length ? round1(Math.max(...b.temps)) : null,
            humidityPercent: b.humidity.length
                ? Math.round(b.humidity.reduce((sum, h) => sum + h, 0) / b.humidity.length)
                : null,
            windSpeedMps: b.wind.length ? round1(Math.max(...b.wind)) : null,
            windDirection: mode(b.windDirections),
            precipProbabilityPercent: b.pop.length ? Math.max(...b.pop) : null,
            description,
            stormPossible: isStormy(description),
        }
    })
}

export function filterByDate<T extends { date: string }>(items: T[], startDate: string, endDate: string): T[] {
    return items.filter(item => startDate <= item.date && item.date <= endDate)
}

export interface SelectedWindow {
    hourly: HourlyPoint[]
    daily: DailyPoint[]
}

/**
 * Points inside [startDate, endDate], untruncated so rain and storm figures
 * see the whole window. A window outside the returned range falls back to the
 * head of each series.
 */
export function selectWindow(
    hourly: HourlyPoint[],
    daily: DailyPoint[],
    startDate: string,
    endDate: string,
): SelectedWindow {
    let selectedHourly = filterByDate(hourly, startDate, endDate)
    let selectedDaily = filterByDate(daily, startDate, endDate)
    if (selectedHourly.length === 0) selectedHourly = hourly.slice(0, MAX_HOURLY_POINTS)
    if (selectedDaily.length === 0) selectedDaily = daily.slice(0, MAX_DAILY_POINTS)
    return { hourly: selectedHourly, daily: selectedDaily }
}

export function rainProbability(window: SelectedWindow): number | null {
    const fromHourly = window.hourly
        .map(p => p.precipProbabilityPercent)
        .filter((p): p is number => p !== null)
    const values = fromHourly.length
        ? fromHourly
        : window.daily.map(p => p.precipProbabilityPercent).filter((p): p is number => p !== null)
    return values.length ? Math.max(...values) : null
}

export function stormPeriods(window: SelectedWindow): string[] {
    const hourly = window.hourly.filter(p => p.stormPossible).map(p => p.localTime)
    const periods = hourly.length ? hourly : window.daily.filter(p => p.stormPossible).map(p => p.date)
    return periods.slice(0, MAX_HOURLY_POINTS)
}

// ─── Alerts ──────────────────────────────────────────────────────────────────

function epochToIso(seconds: number | null | undefined): string | null {
    if (typeof seconds !== 'number') return null
    return new Date(Math.trunc(seconds) * 1000).toISOString()
}

export function normalizeAlerts(payload: unknown): SevereAlert[] {
    const parsed = AlertsPayloadSchema.safeParse(payload)
    if (!parsed.success) return []

    const alerts: SevereAlert[] = []
    for (const raw of parsed.data.alerts) {
        const alert = AlertSchema.safeParse(raw)
        if (!alert.success) continue
        alerts.push({
            event: alert.data.event || 'Weather alert',
            startUtc: epochToIso(alert.data.start),
            endUtc: epochToIso(alert.data.end),
            description: (alert.data.description ?? '').trim(),
        })
    }
    return alerts
}
