import { chunks } from '../ingestion/partitioned-batcher'
import { logger } from '../utils/logger'
import { resolvedTitlesCounter } from '../utils/metrics'
import { retryWithRandomExponentialBackoff } from '../utils/retries'
import { WIKIDATA_DATABASE } from './project-database'

export interface TitleMatch {
    title: string
    id: number
}

/** Looks titles up in a wiki's replica database */
export interface TitleLookup {
    /** Matches for titles that are articles carrying an id themselves */
    lookupDirect(dbname: string, titles: string[]): Promise<TitleMatch[]>
    /** Matches for titles that redirect to an article carrying an id */
    lookupRedirect(dbname: string, titles: string[]): Promise<TitleMatch[]>
}

export interface TitleResolverOptions {
    chunkSize: number
    retryInitialIntervalMs: number
    retryMaxIntervalMs: number
    /** Overridable in tests */
    wait?: (ms: number) => Promise<void>
}

type ResolutionPass = 'direct' | 'redirect'

const ITEM_TITLE_RE = /^[Qq](\d+)$/

/** Id of a title like "Q42" on the wiki whose pages are the items themselves */
export function parseItemTitle(title: string): number | null {
    const match = ITEM_TITLE_RE.exec(title)
    return match ? parseInt(match[1], 10) : null
}

export class TitleResolver {
    constructor(
        private readonly lookup: TitleLookup,
        private readonly options: TitleResolverOptions
    ) {}

    /**
     * Converts titles into ids, returning a parallel array with null where no id was found.
     * Titles are first matched as articles, and whatever is left over as redirects.
     */
    async resolve(dbname: string, titles: Iterable<string>): Promise<(number | null)[]> {
        const requested = Array.from(titles)

        if (dbname === WIKIDATA_DATABASE) {
            const ids = requested.map(parseItemTitle)
            logger.info('🪪', `Wikidata special case: ${requested.length} titles converted to ${ids.filter((id) => id !== null).length} ids`)
            return ids
        }

        const unique = new Set(requested)
        logger.info('🔎', `Resolving titles`, { dbname, titles: requested.length, unique: unique.size })

        const direct = await this.runPass('direct', dbname, unique, unique)
        const remaining = Array.from(unique).filter((title) => !direct.has(title))
        const redirect = remaining.length > 0 ? await this.runPass('redirect', dbname, remaining, unique) : new Map<string, number>()

        logger.info(
            '🔎',
            `Converted ${requested.length} titles into ${direct.size + redirect.size} ids (${direct.size} direct and ${redirect.size} redirect)`,
            { dbname }
        )

        return requested.map((title) => direct.get(title) ?? redirect.get(title) ?? null)
    }

    private async runPass(
        pass: ResolutionPass,
        dbname: string,
        titles: Iterable<string>,
        requested: ReadonlySet<string>
    ): Promise<Map<string, number>> {
        const results = new Map<string, number>()
        for (const chunk of chunks(titles, this.options.chunkSize)) {
            const matches = await retryWithRandomExponentialBackoff(
                () =>
                    pass === 'direct'
                        ? this.lookup.lookupDirect(dbname, chunk)
                        : this.lookup.lookupRedirect(dbname, chunk),
                `${pass} lookup on ${dbname}`,
                {
                    initialIntervalMs: this.options.retryInitialIntervalMs,
                    maxIntervalMs: this.options.retryMaxIntervalMs,
                    wait: this.options.wait,
                }
            )
            mergeMatches(results, matches, requested, dbname)
        }
        resolvedTitlesCounter.labels(pass).inc(results.size)
        return results
    }
}

function mergeMatches(
    results: Map<string, number>,
    matches: TitleMatch[],
    requested: ReadonlySet<string>,
    dbname: string
): void {
    for (const { title, id } of matches) {
        if (!requested.has(title)) {
            logger.error('⚠️', `Unexpected title ${title} for id Q${id}`, { dbname })
            continue
        }
        results.set(title, id)
    }
}
