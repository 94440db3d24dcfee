import { readdir } from 'fs/promises'
import { DateTime } from 'luxon'
import { join } from 'path'

import { logger } from '../utils/logger'

export const LOG_FILE_RE = /^pageviews-\d{8}-\d{6}\.gz$/

/**
 * Path the oldest file worth processing would have, e.g.
 * `<dir>/2018/2018-10/pageviews-20181003-010000.gz`. It need not exist.
 */
export function getEarliestFile(dir: string, maxDays: number, now: DateTime = DateTime.utc()): string {
    const earliest = now.toUTC().minus({ days: maxDays })
    return join(
        dir,
        earliest.toFormat('yyyy'),
        earliest.toFormat('yyyy-MM'),
        earliest.toFormat("'pageviews-'yyyyMMdd-HHmmss'.gz'")
    )
}

/**
 * Lists log files under `dir` at least as recent as `maxDays` ago, most recent first.
 * Traversing the whole dump tree is expensive, so directories whose path sorts before
 * the earliest file are skipped.
 */
export async function getFiles(dir: string, maxDays: number, now?: DateTime): Promise<string[]> {
    const earliestFile = getEarliestFile(dir, maxDays, now)
    logger.info('📁', `earliest file: ${earliestFile}`)

    const files: string[] = []
    const walk = async (current: string): Promise<void> => {
        for (const entry of await readdir(current, { withFileTypes: true })) {
            const path = join(current, entry.name)
            if (entry.isDirectory()) {
                if (path >= earliestFile.slice(0, path.length)) {
                    await walk(path)
                }
            } else if (path >= earliestFile && LOG_FILE_RE.test(entry.name)) {
                files.push(path)
            }
        }
    }
    await walk(dir)

    return files.sort().reverse()
}
