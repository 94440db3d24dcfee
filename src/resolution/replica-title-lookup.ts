import { Pool } from 'pg'

import { processDatabaseError } from '../utils/db/error'
import { logger } from '../utils/logger'
import { instrumentQuery } from '../utils/metrics'
import { createPostgresPool } from '../utils/utils'
import { parseItemTitle, TitleLookup, TitleMatch } from './title-resolver'

// Only main namespace pages carry sitelinks worth counting
const DIRECT_SQL = `
    SELECT page_title AS title, pp_value AS item
    FROM page
    JOIN page_props ON pp_page = page_id
    WHERE page_namespace = 0
    AND page_title = ANY($1::text[])
    AND pp_propname = 'wikibase_item'
`

const REDIRECT_SQL = `
    SELECT p1.page_title AS title, pp_value AS item
    FROM page AS p1
    JOIN redirect ON rd_from = p1.page_id
    JOIN page AS p2 ON p2.page_namespace = 0 AND p2.page_title = rd_title
    JOIN page_props ON pp_page = p2.page_id
    WHERE p1.page_namespace = 0
    AND p1.page_title = ANY($1::text[])
    AND p1.page_is_redirect
    AND rd_namespace = 0
    AND rd_interwiki = ''
    AND rd_fragment = ''
    AND pp_propname = 'wikibase_item'
`

type ItemRow = {
    title: string
    item: string
}

/** Resolves titles against per-wiki replica databases, one pool per wiki */
export class ReplicaTitleLookup implements TitleLookup {
    private pools = new Map<string, Pool>()

    constructor(
        private readonly urlTemplate: string,
        private readonly poolSize: number = 2
    ) {
        if (!urlTemplate.includes('{dbname}')) {
            throw new Error('Replica database url template must contain a {dbname} placeholder')
        }
    }

    lookupDirect(dbname: string, titles: string[]): Promise<TitleMatch[]> {
        return this.query(dbname, 'direct', DIRECT_SQL, titles)
    }

    lookupRedirect(dbname: string, titles: string[]): Promise<TitleMatch[]> {
        return this.query(dbname, 'redirect', REDIRECT_SQL, titles)
    }

    async close(): Promise<void> {
        const pools = Array.from(this.pools.values())
        this.pools.clear()
        await Promise.all(pools.map((pool) => pool.end()))
    }

    private pool(dbname: string): Pool {
        let pool = this.pools.get(dbname)
        if (!pool) {
            pool = createPostgresPool(this.urlTemplate.replace('{dbname}', dbname), this.poolSize, 'wiki-pageviews')
            this.pools.set(dbname, pool)
        }
        return pool
    }

    private async query(dbname: string, tag: string, sql: string, titles: string[]): Promise<TitleMatch[]> {
        if (titles.length === 0) {
            return []
        }
        let rows: ItemRow[]
        try {
            const result = await instrumentQuery('replica_title_lookup', tag, () =>
                this.pool(dbname).query<ItemRow>(sql, [titles])
            )
            rows = result.rows
        } catch (error) {
            logger.error('🔴', `Title lookup failed`, { dbname, tag, error })
            throw processDatabaseError(error, `replica:${dbname}`)
        }

        const matches: TitleMatch[] = []
        for (const { title, item } of rows) {
            // A handful of historical values use a lower-case "q"
            const id = parseItemTitle(item.trim())
            if (id === null) {
                logger.warn('⚠️', `Ignoring malformed item value ${item} for title ${title}`, { dbname })
                continue
            }
            matches.push({ title, id })
        }
        return matches
    }
}
