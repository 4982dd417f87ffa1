/**
 * Entity & Intent Extractor
 *
 * Regex/keyword heuristics that pull a city, a time window and topic flags
 * out of a free-text weather question. Everything here is pure and
 * deterministic; `now` is injectable so date math can be pinned in tests.
 */

import type { Granularity, IntentFlags, IntentTopic, TimeReference } from '../types/weather.js'

// ─── Keyword Sets ────────────────────────────────────────────────────────────

export const WEATHER_QUERY_MARKERS = [
    'weather', 'forecast', 'temperature', 'rain', 'humidity', 'wind', 'storm', 'alert', 'climate',
] as const

export const TOPIC_MARKERS: Record<IntentTopic, readonly string[]> = {
    rain: ['rain', 'drizzle', 'shower', 'thunderstorm', 'storm', 'precipitation', 'umbrella'],
    temperature: ['temperature', 'temp', 'hot', 'cold', 'warm', 'cool'],
    humidity: ['humidity', 'humid'],
    wind: ['wind', 'breeze', 'gust'],
    storm: ['storm', 'thunderstorm', 'cyclone', 'hurricane', 'tornado'],
    alert: ['alert', 'warning', 'advisory', 'severe'],
    forecast: [
        'forecast', 'future', 'upcoming', 'hourly', 'daily', 'weekend',
        'this week', 'next 3 days', 'next few days',
    ],
    climate: ['climate', 'condition', 'conditions', 'overall'],
}

/** Descriptions containing any of these mark a storm period */
export const STORM_MARKERS = TOPIC_MARKERS.storm

const HOURLY_MARKERS = ['hourly', 'hour', 'next few hours', 'next 24 hours'] as const

const WEEKDAY_INDEX: ReadonlyArray<[string, number]> = [
    // JS getUTCDay numbering (Sunday = 0); iteration order decides ties
    ['monday', 1],
    ['tuesday', 2],
    ['wednesday', 3],
    ['thursday', 4],
    ['friday', 5],
    ['saturday', 6],
    ['sunday', 0],
]

const NON_CITY_QUERY_WORDS = new Set([
    'what', "what's", 'how', "how's", 'can', 'could', 'would', 'should', 'will', 'tell', 'show',
    'help', 'me', 'you', 'i', 'is', 'are', 'it', 'the', 'do', 'does', 'need', 'weather',
    'temperature', 'humidity', 'wind', 'windy', 'forecast', 'today', 'tomorrow', 'hourly',
    'daily', 'weekend', 'storm', 'alert', 'chance', 'probability', 'there', 'be', 'rain',
    'raining', 'umbrella', 'hot', 'cold', 'outside',
])

// ─── City Extraction ─────────────────────────────────────────────────────────

const CITY_IN_TEXT_PATTERN = /\b(?:in|at|for)\s+([A-Za-z][A-Za-z\s.'-]{1,80})/gi
const INNER_PREPOSITION = /\s+(?:in|at|for)\s+/i
const TRAILING_NOISE_PATTERN =
    /\b(?:today|tonight|tomorrow|now|please|currently|right now|this|next|on|during|over|later|weekend|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b.*$/i
const EDGE_CHARS = /^[`"'\s]+|[`"'\s.]+$/g
const SIMPLE_CITY_PATTERN = /^[A-Za-z][A-Za-z\s.'-]{0,80}$/

function sanitizeCityCandidate(candidate: string): string {
    let value = candidate.replace(EDGE_CHARS, '')
    value = value.split(/[?!;,]/, 1)[0].trim()
    value = value.replace(TRAILING_NOISE_PATTERN, '').replace(EDGE_CHARS, '')
    return value.replace(/\s{2,}/g, ' ')
}

function wordsOf(text: string): string[] {
    return (text.match(/[A-Za-z']+/g) ?? []).map(w => w.toLowerCase())
}

function onlyQueryWords(candidate: string): boolean {
    const words = wordsOf(candidate)
    return words.length === 0 || words.every(w => NON_CITY_QUERY_WORDS.has(w))
}

/**
 * Best-effort city from free text.
 *
 * 1. A phrase after in/at/for ("weather in Paris tomorrow" → "Paris").
 * 2. Otherwise the whole message, when it is 1-4 plain words and none of
 *    them is a query word ("Chennai" → "Chennai", "what is the weather" → null).
 */
export function inferCityFromText(text: string | null | undefined): string | null {
    const raw = (text ?? '').trim()
    if (!raw) return null

    for (const match of raw.matchAll(CITY_IN_TEXT_PATTERN)) {
        // "for a run in Paris" → keep the segment after the last preposition
        const segments = match[1].split(INNER_PREPOSITION)
        const candidate = sanitizeCityCandidate(segments[segments.length - 1])
        if (candidate && !onlyQueryWords(candidate)) return candidate
    }

    const simple = sanitizeCityCandidate(raw)
    if (!SIMPLE_CITY_PATTERN.test(simple)) return null
    const words = wordsOf(simple)
    if (words.length < 1 || words.length > 4) return null
    if (words.some(w => NON_CITY_QUERY_WORDS.has(w))) return null
    return simple
}

export type AmbiguityPolicy = (city: string) => boolean

/** Placeholder disambiguation: "Georgia or Florida", "Portland/Salem" */
export const isAmbiguousCity: AmbiguityPolicy = city => {
    const lowered = city.toLowerCase()
    return lowered.includes(' or ') || lowered.includes('/')
}

/**
 * Pull a city name out of a tool argument that may be JSON or quoted text.
 * `{"city": "Pune"}` → "Pune", `"Pune"` → "Pune".
 */
export function extractCityName(rawCity: string): string {
    const trimmed = rawCity.trim()
    if (!trimmed) return ''

    const start = trimmed.indexOf('{')
    const end = trimmed.lastIndexOf('}')
    if (start !== -1 && end > start) {
        try {
            const parsed: unknown = JSON.parse(trimmed.slice(start, end + 1))
            if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
                const record = new Map<string, unknown>(Object.entries(parsed))
                const candidate = record.get('city') ?? record.get('location')
                if (typeof candidate === 'string') return candidate.replace(EDGE_CHARS, '')
            }
        } catch {
            // not JSON, fall through to the key scan
        }
    }

    const keyed = trimmed.match(/"(?:city|location)"\s*:\s*"([^"]+)"/)
    return (keyed ? keyed[1] : trimmed).replace(EDGE_CHARS, '')
}

export function ensureCityInInput(userInput: string, cityName: string): string {
    if (userInput.toLowerCase().includes(cityName.toLowerCase())) return userInput
    return `${userInput} in ${cityName}`.trim()
}

export function looksLikeWeatherQuery(text: string): boolean {
    const lowered = text.toLowerCase()
    return WEATHER_QUERY_MARKERS.some(m => lowered.includes(m))
}

// ─── Time Reference ──────────────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000

function utcMidnight(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
}

function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS)
}

export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10)
}

/** Next occurrence of a weekday, never the same day */
function nextWeekday(base: Date, targetDay: number): Date {
    const delta = (targetDay - base.getUTCDay() + 7) % 7
    return addDays(base, delta === 0 ? 7 : delta)
}

function calendarDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day))
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null
    }
    return date
}

export function parseSpecificDate(text: string): Date | null {
    const iso = text.match(/\b(\d{4})-(\d{2})-(\d{2})\b/)
    if (iso) {
        return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))
    }
    const dmy = text.match(/\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/)
    if (dmy) {
        return calendarDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]))
    }
    return null
}

function detectGranularity(lowered: string): Granularity {
    return HOURLY_MARKERS.some(m => lowered.includes(m)) ? 'hourly' : 'daily'
}

function singleDay(type: TimeReference['type'], date: Date, granularity: Granularity): TimeReference {
    const iso = toIsoDate(date)
    return { type, startDate: iso, endDate: iso, granularity, assumedToday: false }
}

/**
 * Resolve the time window a question is about.
 * Priority: explicit date > future/upcoming > tomorrow > weekend > weekday > today.
 */
export function extractTimeReference(text: string, now: Date = new Date()): TimeReference {
    const today = utcMidnight(now)
    const lowered = text.toLowerCase()
    const granularity = detectGranularity(lowered)

    const explicit = parseSpecificDate(lowered)
    if (explicit) return singleDay('specific_date', explicit, granularity)

    if (lowered.includes('future') || lowered.includes('upcoming')) {
        const start = addDays(today, 1)
        return {
            type: 'future_window',
            startDate: toIsoDate(start),
            endDate: toIsoDate(addDays(start, 2)),
            granularity: 'daily',
            assumedToday: false,
        }
    }

    if (lowered.includes('tomorrow')) return singleDay('tomorrow', addDays(today, 1), granularity)

    if (lowered.includes('weekend')) {
        const saturday = nextWeekday(today, 6)
        return {
            type: 'weekend',
            startDate: toIsoDate(saturday),
            endDate: toIsoDate(addDays(saturday, 1)),
            granularity: 'daily',
            assumedToday: false,
        }
    }

    for (const [name, index] of WEEKDAY_INDEX) {
        if (lowered.includes(name)) {
            return { ...singleDay('weekday', nextWeekday(today, index), granularity), weekday: name }
        }
    }

    const iso = toIsoDate(today)
    const saidToday = /\b(?:today|tonight|now|currently)\b/.test(lowered)
    return { type: 'today', startDate: iso, endDate: iso, granularity, assumedToday: !saidToday }
}

// ─── Intent Flags ────────────────────────────────────────────────────────────

export function extractIntentFlags(text: string): IntentFlags {
    const lowered = text.toLowerCase()
    const has = (topic: IntentTopic) => TOPIC_MARKERS[topic].some(m => lowered.includes(m))
    return {
        rain: has('rain'),
        temperature: has('temperature'),
        humidity: has('humidity'),
        wind: has('wind'),
        storm: has('storm'),
        alert: has('alert'),
        forecast: has('forecast'),
        climate: has('climate'),
    }
}

/** Intent flags with the general-conditions default applied */
export function resolveIntentFlags(text: string): IntentFlags {
    const flags = extractIntentFlags(text)
    if (!Object.values(flags).some(Boolean)) flags.climate = true
    return flags
}
