/**
 * OpenWeatherMap client
 *
 * Three endpoints, all metric:
 *   - /data/2.5/weather   current conditions by city name
 *   - /data/2.5/forecast  5-day / 3-hour forecast by city name
 *   - /data/3.0/onecall   alerts only, by coordinates
 *
 * Each call has a 10 s timeout and one retry on transient failure. Failures
 * resolve to null; callers decide what a missing body means.
 */

import { HttpStatusError, withRetry } from '../utils/retry.js'
import { safeError } from '../utils/safe-log.js'

const BASE_URL = 'https://api.openweathermap.org/data'
const REQUEST_TIMEOUT_MS = 10_000

export interface WeatherProvider {
    fetchCurrent(city: string): Promise<unknown | null>
    fetchForecast(city: string): Promise<unknown | null>
    fetchAlerts(lat: number, lon: number): Promise<unknown | null>
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>

export class OpenWeatherProvider implements WeatherProvider {
    constructor(
        private readonly apiKey: string,
        private readonly fetchImpl: FetchLike = fetch,
    ) {}

    fetchCurrent(city: string): Promise<unknown | null> {
        return this.getJson('2.5/weather', { q: city, units: 'metric' }, 'openweather-current')
    }

    fetchForecast(city: string): Promise<unknown | null> {
        return this.getJson('2.5/forecast', { q: city, units: 'metric' }, 'openweather-forecast')
    }

    fetchAlerts(lat: number, lon: number): Promise<unknown | null> {
        return this.getJson(
            '3.0/onecall',
            { lat: String(lat), lon: String(lon), exclude: 'current,minutely,hourly,daily', units: 'metric' },
            'openweather-alerts',
        )
    }

    private async getJson(path: string, params: Record<string, string>, label: string): Promise<unknown | null> {
        const url = new URL(`${BASE_URL}/${path}`)
        for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value)
        url.searchParams.set('appid', this.apiKey)

        try {
            return await withRetry(async () => {
                const res = await this.fetchImpl(url.toString(), {
                    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
                })
                if (res.status !== 200) throw new HttpStatusError(res.status, label)
                const body: unknown = await res.json()
                return body && typeof body === 'object' ? body : null
            }, label)
        } catch (err) {
            console.warn(`[weather] ${label} failed:`, safeError(err))
            return null
        }
    }
}
