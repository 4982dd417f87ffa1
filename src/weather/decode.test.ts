import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { decodeWeatherPayload } from './decode.js'

describe('decodeWeatherPayload', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('accepts bare JSON', () => {
        expect(decodeWeatherPayload('{"status": "needs_location", "message": "Which city?"}'))
            .toEqual({ status: 'needs_location', message: 'Which city?' })
    })

    it('recovers JSON wrapped in prose', () => {
        const raw = 'Tool result: {"status": "ambiguous_location", "message": "Clarify", "location": "Georgia or Florida"} done'
        expect(decodeWeatherPayload(raw)).toEqual({
            status: 'ambiguous_location',
            message: 'Clarify',
            location: 'Georgia or Florida',
        })
    })

    it('rejects empty, non-object and unparseable text', () => {
        expect(decodeWeatherPayload('')).toBeNull()
        expect(decodeWeatherPayload(null)).toBeNull()
        expect(decodeWeatherPayload('[1, 2]')).toBeNull()
        expect(decodeWeatherPayload('no json here')).toBeNull()
        expect(decodeWeatherPayload('{ broken')).toBeNull()
    })

    it('rejects objects that do not match a payload variant', () => {
        expect(decodeWeatherPayload('{"status": "ok", "location": "Paris"}')).toBeNull()
        expect(decodeWeatherPayload('{"status": "sunny"}')).toBeNull()
        expect(console.warn).toHaveBeenCalledTimes(2)
    })
})
