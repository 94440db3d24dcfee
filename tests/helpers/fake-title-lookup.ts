import { TitleLookup, TitleMatch } from '../../src/resolution/title-resolver'

/** TitleLookup over fixed tables of articles and redirects, recording every call */
export class FakeTitleLookup implements TitleLookup {
    calls: { pass: 'direct' | 'redirect'; dbname: string; titles: string[] }[] = []

    constructor(
        private readonly articles: Record<string, Record<string, number>>,
        private readonly redirects: Record<string, Record<string, number>> = {}
    ) {}

    lookupDirect(dbname: string, titles: string[]): Promise<TitleMatch[]> {
        this.calls.push({ pass: 'direct', dbname, titles })
        return Promise.resolve(match(this.articles[dbname] ?? {}, titles))
    }

    lookupRedirect(dbname: string, titles: string[]): Promise<TitleMatch[]> {
        this.calls.push({ pass: 'redirect', dbname, titles })
        return Promise.resolve(match(this.redirects[dbname] ?? {}, titles))
    }
}

function match(table: Record<string, number>, titles: string[]): TitleMatch[] {
    return titles.filter((title) => title in table).map((title) => ({ title, id: table[title] }))
}
