import { fetch } from 'undici'
import { z } from 'zod'

import { instrumentQuery } from '../utils/metrics'
import { logger } from '../utils/logger'

const SiteSchema = z.object({
    dbname: z.string(),
    private: z.unknown().optional(),
})

const LanguageGroupSchema = z.object({
    site: z.array(SiteSchema),
})

const SitematrixResponseSchema = z.object({
    sitematrix: z.record(z.string(), z.unknown()),
})

/** Names of the public databases listed in a MediaWiki `action=sitematrix` response */
export function sitematrixDatabaseNames(response: unknown): string[] {
    const { sitematrix } = SitematrixResponseSchema.parse(response)
    const names: string[] = []
    for (const [key, value] of Object.entries(sitematrix)) {
        let sites: z.infer<typeof SiteSchema>[] = []
        if (/^\d+$/.test(key)) {
            sites = LanguageGroupSchema.parse(value).site
        } else if (key === 'specials') {
            sites = z.array(SiteSchema).parse(value)
        }
        for (const site of sites) {
            if (site.private === undefined) {
                names.push(site.dbname)
            }
        }
    }
    return names
}

export async function fetchSitematrixDatabaseNames(url: string): Promise<string[]> {
    return instrumentQuery('sitematrix', 'fetch', async () => {
        const response = await fetch(url, { headers: { accept: 'application/json' } })
        if (!response.ok) {
            throw new Error(`Sitematrix request failed with status ${response.status}`)
        }
        return sitematrixDatabaseNames(await response.json())
    })
}

/**
 * Process-scoped set of wiki databases that page views can be attributed to.
 * Must be refreshed once before use; refresh again to pick up new wikis.
 */
export class KnownDatabases {
    private names: Set<string> | null = null

    constructor(private readonly loader: () => Promise<Iterable<string>>) {}

    static fromNames(names: Iterable<string>): KnownDatabases {
        const known = new KnownDatabases(() => Promise.resolve(names))
        known.names = new Set(names)
        return known
    }

    async refresh(): Promise<void> {
        this.names = new Set(await this.loader())
        logger.info('📚', `Loaded ${this.names.size} known databases`)
    }

    has(dbname: string): boolean {
        if (!this.names) {
            throw new Error('KnownDatabases used before refresh()')
        }
        return this.names.has(dbname)
    }
}
