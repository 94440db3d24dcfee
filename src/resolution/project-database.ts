import { KnownDatabases } from './known-databases'

// Site codes combined with the language, e.g. "en.d" -> "enwiktionary"
const SUFFIX_MAP: Record<string, string> = {
    z: 'wiki',
    d: 'wiktionary',
    b: 'wikibooks',
    n: 'wikinews',
    q: 'wikiquote',
    s: 'wikisource',
    v: 'wikiversity',
    voy: 'wikivoyage',
    m: 'wiki',
}

// Projects without a language, e.g. "www.wd" -> "wikidatawiki"
const COMPLETE_MAP: Record<string, string> = {
    s: 'sourceswiki',
    w: 'mediawikiwiki',
    wd: 'wikidatawiki',
}

// Chapter wikis, only ever seen with "m" and without a language
const WIKIMEDIA_CHAPTERS = new Set(['bd', 'dk', 'mx', 'nyc', 'rs', 'ua'])

const SPECIAL_MAP: Record<string, string> = { be_tarask: 'be_x_oldwiki' }

const MOBILE_LABELS = ['m', 'zero']

export const WIKIDATA_DATABASE = 'wikidatawiki'

/**
 * Maps page view project codes (as in the pageviews dumps, e.g. "en", "en.m", "de.d",
 * "www.wd") to replica database names, or null when the project has no known database.
 */
export class ProjectDatabaseMapper {
    constructor(private readonly knownDatabases: KnownDatabases) {}

    databaseFromProjectName(projectName: string): string | null {
        const candidate = candidateDatabase(projectName)
        return candidate !== null && this.knownDatabases.has(candidate) ? candidate : null
    }
}

function lookup(map: Record<string, string>, key: string | undefined): string | undefined {
    return key !== undefined && Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined
}

export function candidateDatabase(projectName: string): string | null {
    const labels = projectName.split('.')
    const [first, second] = labels

    const complete = lookup(COMPLETE_MAP, second)
    if (labels.length === 2 && ['www', ...MOBILE_LABELS].includes(first) && complete) {
        return complete
    }

    if (
        labels[labels.length - 1] === 'm' &&
        WIKIMEDIA_CHAPTERS.has(first) &&
        (labels.length === 2 || MOBILE_LABELS.includes(second))
    ) {
        return `${first}wikimedia`
    }

    const prefix = first.replace(/-/g, '_')
    const special = lookup(SPECIAL_MAP, prefix)
    if (special) {
        return special
    }

    const rest = labels.length > 1 && MOBILE_LABELS.includes(second) ? labels.slice(2) : labels.slice(1)
    const suffix = lookup(SUFFIX_MAP, rest[0] ?? 'z')
    return suffix ? prefix + suffix : null
}
