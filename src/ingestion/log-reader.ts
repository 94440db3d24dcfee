import { createReadStream } from 'fs'
import { createInterface } from 'readline'
import { Readable } from 'stream'
import { createGunzip } from 'zlib'

import { LogEntry } from '../types'
import { logger } from '../utils/logger'
import { malformedLinesCounter } from '../utils/metrics'

const VIEWS_RE = /^\d+$/

/** Parses "project title views bytes", returning null for anything else */
export function parseLogLine(line: string): LogEntry | null {
    const fields = line.split(' ')
    if (fields.length !== 4) {
        return null
    }
    const [project, title, views] = fields
    if (!project || !title || !VIEWS_RE.test(views)) {
        return null
    }
    return { project, title, views: parseInt(views, 10) }
}

/** Streams log entries out of text lines, dropping (and logging) lines that do not parse */
export async function* readLogLines(input: Readable, source = 'log'): AsyncGenerator<LogEntry> {
    const lines = createInterface({ input, crlfDelay: Infinity })
    let lineNumber = 0
    for await (const line of lines) {
        lineNumber += 1
        if (line === '') {
            continue
        }
        const entry = parseLogLine(line)
        if (entry === null) {
            malformedLinesCounter.inc()
            logger.warn('⚠️', `Dropping malformed line ${lineNumber} of ${source}`, { line })
            continue
        }
        yield entry
    }
}

/** Streams log entries from a gzipped hourly page view file */
export async function* readLog(file: string): AsyncGenerator<LogEntry> {
    const source = createReadStream(file)
    const gunzip = createGunzip()
    // pipe() does not forward errors, so a missing file has to fail the gunzip stream itself
    source.on('error', (error) => gunzip.destroy(error)).pipe(gunzip)
    try {
        yield* readLogLines(gunzip, file)
    } finally {
        // Also reached when the consumer stops early
        source.destroy()
        gunzip.destroy()
    }
}
