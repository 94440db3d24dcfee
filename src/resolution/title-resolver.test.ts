import { FakeTitleLookup } from '../../tests/helpers/fake-title-lookup'
import { DependencyUnavailableError } from '../utils/db/error'
import { parseItemTitle, TitleLookup, TitleResolver, TitleResolverOptions } from './title-resolver'

const options: TitleResolverOptions = {
    chunkSize: 2,
    retryInitialIntervalMs: 10,
    retryMaxIntervalMs: 100,
    wait: () => Promise.resolve(),
}

describe('parseItemTitle', () => {
    it.each<[string, number | null]>([
        ['Q42', 42],
        ['q7', 7],
        ['Q', null],
        ['Q42a', null],
        ['Property:P31', null],
    ])('parses %s', (title, expected) => {
        expect(parseItemTitle(title)).toBe(expected)
    })
})

describe('TitleResolver', () => {
    it('returns ids parallel to the titles, trying redirects for the rest', async () => {
        const lookup = new FakeTitleLookup(
            { enwiki: { Cat: 100, Dog: 200 } },
            { enwiki: { Kitty: 100, Cat: 999 } }
        )
        const resolver = new TitleResolver(lookup, options)

        const ids = await resolver.resolve('enwiki', ['Cat', 'Kitty', 'Nope', 'Dog', 'Cat'])

        expect(ids).toEqual([100, 100, null, 200, 100])
    })

    it('looks up unique titles in chunks, and only unresolved ones as redirects', async () => {
        const lookup = new FakeTitleLookup({ enwiki: { A: 1, B: 2, C: 3 } })
        const resolver = new TitleResolver(lookup, options)

        await resolver.resolve('enwiki', ['A', 'B', 'A', 'C', 'D', 'E'])

        expect(lookup.calls).toEqual([
            { pass: 'direct', dbname: 'enwiki', titles: ['A', 'B'] },
            { pass: 'direct', dbname: 'enwiki', titles: ['C', 'D'] },
            { pass: 'direct', dbname: 'enwiki', titles: ['E'] },
            { pass: 'redirect', dbname: 'enwiki', titles: ['D', 'E'] },
        ])
    })

    it('skips the redirect pass when everything resolved directly', async () => {
        const lookup = new FakeTitleLookup({ dewiki: { Katze: 5 } })

        await new TitleResolver(lookup, options).resolve('dewiki', ['Katze'])

        expect(lookup.calls.map((call) => call.pass)).toEqual(['direct'])
    })

    it('reads wikidata item titles without any lookup', async () => {
        const lookup = new FakeTitleLookup({})

        const ids = await new TitleResolver(lookup, options).resolve('wikidatawiki', ['Q42', 'Main_Page', 'Q1'])

        expect(ids).toEqual([42, null, 1])
        expect(lookup.calls).toEqual([])
    })

    it('only reads item titles as ids on wikidata', async () => {
        const lookup = new FakeTitleLookup({})

        const ids = await new TitleResolver(lookup, options).resolve('enwiki', ['Q42'])

        expect(ids).toEqual([null])
        expect(lookup.calls).toHaveLength(2)
    })

    it('ignores matches for titles that were not requested', async () => {
        const lookup: TitleLookup = {
            lookupDirect: () =>
                Promise.resolve([
                    { title: 'Cat', id: 100 },
                    { title: 'Stranger', id: 5 },
                ]),
            lookupRedirect: () => Promise.resolve([]),
        }

        const ids = await new TitleResolver(lookup, options).resolve('enwiki', ['Cat', 'Dog'])

        expect(ids).toEqual([100, null])
    })

    it('retries lookups while the replica is unavailable', async () => {
        const lookupDirect = jest
            .fn<ReturnType<TitleLookup['lookupDirect']>, Parameters<TitleLookup['lookupDirect']>>()
            .mockRejectedValueOnce(new DependencyUnavailableError('down', 'replica:enwiki', new Error('ECONNRESET')))
            .mockResolvedValueOnce([{ title: 'Cat', id: 100 }])
        const wait = jest.fn((_ms: number) => Promise.resolve())
        const lookup: TitleLookup = { lookupDirect, lookupRedirect: () => Promise.resolve([]) }

        const ids = await new TitleResolver(lookup, { ...options, wait }).resolve('enwiki', ['Cat'])

        expect(ids).toEqual([100])
        expect(lookupDirect).toHaveBeenCalledTimes(2)
        expect(wait).toHaveBeenCalledTimes(1)
    })

    it('propagates other lookup errors', async () => {
        const lookup: TitleLookup = {
            lookupDirect: () => Promise.reject(new Error('permission denied')),
            lookupRedirect: () => Promise.resolve([]),
        }

        await expect(new TitleResolver(lookup, options).resolve('enwiki', ['Cat'])).rejects.toThrow(
            'permission denied'
        )
    })
})
