/**
 * Tests: PostgreSQL memory store
 *
 * The pool is mocked; assertions cover parameters, row mapping and the
 * ordering the store applies on top of SQL.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'

// ─── Hoist mocks ──────────────────────────────────────────────────────────────

const mocks = vi.hoisted(() => ({
    query: vi.fn(),
}))

vi.mock('../db.js', () => ({
    getPool: () => ({ query: mocks.query }),
}))

import { PgMemoryStore } from './pg-store.js'

const NOW = new Date('2026-10-14T09:00:00Z')

describe('PgMemoryStore', () => {
    let store: PgMemoryStore

    beforeEach(() => {
        mocks.query.mockReset()
        store = new PgMemoryStore(() => NOW)
    })

    it('returns the default profile when no row exists', async () => {
        mocks.query.mockResolvedValueOnce({ rows: [] })

        const profile = await store.getProfile('u 1')

        expect(profile).toMatchObject({ userId: 'u1', personaId: 'professional', preferredCity: null })
        expect(mocks.query.mock.calls[0][1]).toEqual(['u1'])
    })

    it('maps stored profile rows and tolerates unknown units', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [{
                userId: 'u1',
                personaId: 'safety',
                preferredCity: 'Pune',
                units: 'kelvin',
                responseStyle: 'detailed',
                updatedAt: new Date('2026-10-01T00:00:00Z'),
            }],
        })

        expect(await store.getProfile('u1')).toEqual({
            userId: 'u1',
            personaId: 'safety',
            preferredCity: 'Pune',
            units: 'metric',
            responseStyle: 'detailed',
            updatedAt: '2026-10-01T00:00:00.000Z',
        })
    })

    it('merges the update into the stored profile before writing', async () => {
        mocks.query
            .mockResolvedValueOnce({ rows: [] })
            .mockResolvedValueOnce({ rows: [], rowCount: 1 })

        const profile = await store.upsertProfile('u1', { preferredCity: 'Chennai', units: 'imperial' })

        expect(profile.updatedAt).toBe('2026-10-14T09:00:00.000Z')
        expect(mocks.query.mock.calls[1][1]).toEqual([
            'u1', 'professional', 'Chennai', 'imperial', 'balanced', '2026-10-14T09:00:00.000Z',
        ])
    })

    it('skips empty turns without touching the database', async () => {
        expect(await store.appendTurn('u1', 'user', '  ')).toBeNull()
        expect(mocks.query).not.toHaveBeenCalled()
    })

    it('returns recent turns oldest first', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [
                { id: '3', userId: 'u1', role: 'assistant', message: 'b', createdAt: '2026-10-14T09:00:02Z' },
                { id: '2', userId: 'u1', role: 'user', message: 'a', createdAt: '2026-10-14T09:00:01Z' },
            ],
        })

        const turns = await store.getRecentTurns('u1', 500)

        expect(turns.map(t => t.id)).toEqual(['2', '3'])
        expect(mocks.query.mock.calls[0][1]).toEqual(['u1', 50])
    })

    it('normalizes facts before the upsert and maps numeric columns', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [{
                id: '7',
                userId: 'u1',
                memoryType: 'activity_interest',
                value: 'Running',
                normalizedValue: 'running',
                importance: '1.2',
                sourceTurn: null,
                sourceMessage: null,
                createdAt: NOW,
                lastUsedAt: NOW,
            }],
        })

        const fact = await store.upsertFact({ userId: 'u1', memoryType: ' Activity_Interest ', value: ' Running ', importance: 1.2 })

        expect(mocks.query.mock.calls[0][1]).toEqual([
            'u1', 'activity_interest', 'Running', 'running', 1.2, null, null, '2026-10-14T09:00:00.000Z',
        ])
        expect(fact).toMatchObject({ id: 7, importance: 1.2, lastUsedAt: '2026-10-14T09:00:00.000Z' })
    })

    it('filters facts by type when asked', async () => {
        mocks.query.mockResolvedValueOnce({ rows: [] })

        await store.getFacts('u1', { memoryTypes: ['Preferred_City'], limit: 5 })

        const [sql, params] = mocks.query.mock.calls[0]
        expect(sql).toContain('memory_type = ANY($2::text[])')
        expect(params).toEqual(['u1', ['preferred_city'], 5])
    })

    it('does not query when there is nothing to touch', async () => {
        await store.touchFacts([], NOW.toISOString())
        expect(mocks.query).not.toHaveBeenCalled()
    })

    it('reports deletion counts and resets the city when the profile is kept', async () => {
        mocks.query
            .mockResolvedValueOnce({ rows: [], rowCount: 4 })
            .mockResolvedValueOnce({ rows: [], rowCount: 2 })
            .mockResolvedValueOnce({ rows: [], rowCount: 1 })

        const result = await store.clearMemory('u1', false)

        expect(result).toEqual({ conversationDeleted: 4, memoryFactsDeleted: 2, profileDeleted: 0 })
        expect(mocks.query.mock.calls[2][0]).toContain('preferred_city = NULL')
    })

    it('deletes the profile row when asked to', async () => {
        mocks.query
            .mockResolvedValueOnce({ rows: [], rowCount: 0 })
            .mockResolvedValueOnce({ rows: [], rowCount: 0 })
            .mockResolvedValueOnce({ rows: [], rowCount: 1 })

        expect((await store.clearMemory('u1', true)).profileDeleted).toBe(1)
        expect(mocks.query.mock.calls[2][0]).toContain('DELETE FROM user_profiles')
    })
})
