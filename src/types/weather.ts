/**
 * Weather domain types
 *
 * WeatherPayload is a closed union on `status`: numeric readings only exist
 * on the `ok` variant, so consumers must narrow before touching them.
 */

export type TimeReferenceType =
    | 'today'
    | 'tomorrow'
    | 'weekend'
    | 'weekday'
    | 'specific_date'
    | 'future_window'

export type Granularity = 'hourly' | 'daily'

export interface TimeReference {
    type: TimeReferenceType
    /** YYYY-MM-DD, inclusive */
    startDate: string
    /** YYYY-MM-DD, inclusive, never before startDate */
    endDate: string
    granularity: Granularity
    /** True only when the text carried no time marker at all */
    assumedToday: boolean
    weekday?: string
}

export interface ResolvedTimeReference extends TimeReference {
    /** Provider UTC offset applied to forecast timestamps */
    timezoneShiftSeconds: number
}

export type IntentTopic =
    | 'rain'
    | 'temperature'
    | 'humidity'
    | 'wind'
    | 'storm'
    | 'alert'
    | 'forecast'
    | 'climate'

export type IntentFlags = Record<IntentTopic, boolean>

export interface CurrentConditions {
    temperatureC: number
    humidityPercent: number
    windSpeedMps: number | null
    windDeg: number | null
    windDirection: string | null
    description: string
}

export interface HourlyPoint {
    date: string
    time: string
    localTime: string
    temperatureC: number | null
    humidityPercent: number | null
    windSpeedMps: number | null
    windDeg: number | null
    windDirection: string | null
    precipProbabilityPercent: number | null
    description: string
    stormPossible: boolean
}

export interface DailyPoint {
    date: string
    tempMinC: number | null
    tempMaxC: number | null
    humidityPercent: number | null
    windSpeedMps: number | null
    windDirection: string | null
    precipProbabilityPercent: number | null
    description: string
    stormPossible: boolean
}

export interface SevereAlert {
    event: string
    startUtc: string | null
    endUtc: string | null
    description: string
}

export type WeatherStatus = 'ok' | 'needs_location' | 'ambiguous_location' | 'service_unavailable'

export interface OkWeatherPayload {
    status: 'ok'
    source: 'openweather'
    location: string
    query: string
    timeReference: ResolvedTimeReference
    current: CurrentConditions
    rainProbabilityPercent: number | null
    hourlyForecast: HourlyPoint[]
    dailyForecast: DailyPoint[]
    stormPossible: boolean
    stormPeriods: string[]
    severeAlerts: SevereAlert[]
}

export interface NeedsLocationPayload {
    status: 'needs_location'
    message: string
}

export interface AmbiguousLocationPayload {
    status: 'ambiguous_location'
    message: string
    location: string
}

export interface ServiceUnavailablePayload {
    status: 'service_unavailable'
    message: string
    location?: string
}

export type WeatherPayload =
    | OkWeatherPayload
    | NeedsLocationPayload
    | AmbiguousLocationPayload
    | ServiceUnavailablePayload

export type Units = 'metric' | 'imperial'
export type ResponseStyle = 'brief' | 'balanced' | 'detailed'
