import { InMemoryPageviewStore } from '../../tests/helpers/in-memory-store'
import { EmptyWindowError, InvalidDumpModeError } from '../utils/errors'
import { dumpWindow, formatId, getDump, laplaceLogprobs, parseDumpMode } from './dump'

describe('parseDumpMode', () => {
    it('defaults to views', () => {
        expect(parseDumpMode(undefined)).toBe('views')
        expect(parseDumpMode('views')).toBe('views')
        expect(parseDumpMode('logprobs')).toBe('logprobs')
    })

    it('rejects other modes', () => {
        expect(() => parseDumpMode('probs')).toThrow(new InvalidDumpModeError('probs'))
        expect(() => parseDumpMode('probs')).toThrow('Unknown mode probs')
    })
})

describe('laplaceLogprobs', () => {
    it('smooths counts with the largest id as vocabulary size', () => {
        const { logprobs, defaultLogprob } = laplaceLogprobs({ Q1: 50, Q2: 48 }, 98, 2)

        expect(logprobs.Q1).toBeCloseTo(Math.log(51) - Math.log(100), 12)
        expect(logprobs.Q2).toBeCloseTo(Math.log(49) - Math.log(100), 12)
        expect(defaultLogprob).toBeCloseTo(-Math.log(100), 12)
    })

    it('orders log probabilities like the counts, all above the default', () => {
        const { logprobs, defaultLogprob } = laplaceLogprobs({ Q1: 1, Q2: 7, Q3: 0 }, 8, 3)

        expect(logprobs.Q2).toBeGreaterThan(logprobs.Q1)
        expect(logprobs.Q1).toBeGreaterThan(logprobs.Q3)
        expect(logprobs.Q3).toBe(defaultLogprob)
    })
})

describe('dumps', () => {
    let store: InMemoryPageviewStore

    beforeEach(async () => {
        store = new InMemoryPageviewStore()
        await store.addHour('2018-10-10 00:00:00', { 0: 5, 1: 10, 42: 2 })
        await store.addHour('2018-10-10 01:00:00', { 0: 1, 1: 20 })
        await store.addHour('2018-10-10 02:00:00', { 7: 3 })
    })

    it('formats ids as item names', () => {
        expect(formatId(42)).toBe('Q42')
    })

    it('dumps views over the window, counting unresolved views only in the total', async () => {
        const result = await dumpWindow(store, { start: '2018-10-10 00:00:00', end: '2018-10-10 01:00:00' })

        expect(result).toEqual({
            start: '2018-10-10 00:00:00',
            end: '2018-10-10 01:00:00',
            hours: ['2018-10-10 00:00:00', '2018-10-10 01:00:00'],
            maxId: 42,
            totalViews: 38,
            mode: 'views',
            views: { Q1: 30, Q42: 2 },
        })
    })

    it('dumps log probabilities without raw views', async () => {
        const result = await dumpWindow(store, { start: '2018-10-10 02:00:00', end: '2018-10-10 02:00:00' }, 'logprobs')

        expect(result.mode).toBe('logprobs')
        expect(result).not.toHaveProperty('views')
        if (result.mode === 'logprobs') {
            expect(result.totalViews).toBe(3)
            expect(result.maxId).toBe(7)
            expect(result.logprobs.Q7).toBeCloseTo(Math.log(4) - Math.log(10), 12)
            expect(result.defaultLogprob).toBeCloseTo(-Math.log(10), 12)
        }
    })

    it('resolves start and end from their API forms', async () => {
        const result = await getDump(store, { start: '2h' })

        expect(result).toMatchObject({
            start: '2018-10-10 01:00:00',
            end: '2018-10-10 02:00:00',
            hours: ['2018-10-10 01:00:00', '2018-10-10 02:00:00'],
            totalViews: 24,
            views: { Q1: 20, Q7: 3 },
        })
    })

    it('returns an empty dump for a window without data', async () => {
        const result = await getDump(store, { start: '2018-09-01T00', end: '2018-09-01T05' })

        expect(result).toMatchObject({ hours: [], maxId: 0, totalViews: 0, views: {} })
    })

    it('rejects log probabilities for a window without data', async () => {
        await expect(
            dumpWindow(store, { start: '2018-09-01 00:00:00', end: '2018-09-01 05:00:00' }, 'logprobs')
        ).rejects.toThrow(new EmptyWindowError('2018-09-01 00:00:00', '2018-09-01 05:00:00'))
    })

    it('checks the mode before touching the store', async () => {
        const empty = new InMemoryPageviewStore()

        await expect(getDump(empty, { mode: 'counts' })).rejects.toBeInstanceOf(InvalidDumpModeError)
    })
})
