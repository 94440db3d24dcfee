import { writeFile } from 'fs/promises'
import { promisify } from 'util'
import { gzip } from 'zlib'

import { PageviewStore } from '../storage/pageview-store'
import { CombinationResult, DumpMetadata, ViewsDumpResult } from '../types'
import { logger } from '../utils/logger'
import { dumpViews } from './dump'
import { resolveEnd, resolveStart } from './time-window'

const gzipAsync = promisify(gzip)

export const DEFAULT_DURATIONS = ['1d', '1w']

/**
 * Merges views dumps into one report: the metadata of each window in order, and for every
 * id seen in any window one count per window, 0 where the window lacks the id.
 */
export function combineDumps(dumps: ViewsDumpResult[]): CombinationResult {
    const aggregations: DumpMetadata[] = dumps.map(({ start, end, hours, maxId, totalViews }) => ({
        start,
        end,
        hours,
        maxId,
        totalViews,
    }))

    const views: Record<string, number[]> = {}
    dumps.forEach((dump, index) => {
        for (const [id, count] of Object.entries(dump.views)) {
            let counts = views[id]
            if (!counts) {
                counts = new Array<number>(dumps.length).fill(0)
                views[id] = counts
            }
            counts[index] = count
        }
    })

    return { aggregations, views }
}

/** Views dumps for each duration ending at the same hour, merged */
export async function getCombinationDump(
    store: PageviewStore,
    durations: string[] = DEFAULT_DURATIONS,
    end?: string
): Promise<CombinationResult> {
    const endHour = await resolveEnd(store, end)
    const dumps: ViewsDumpResult[] = []
    for (const duration of durations) {
        dumps.push(await dumpViews(store, resolveStart(duration, endHour)))
    }
    return combineDumps(dumps)
}

/** Field names of the published file, which its readers already depend on */
export interface CombinationFile {
    aggregations: {
        start: string
        end: string
        hours: string[]
        max_qid: number
        total_views: number
    }[]
    views: Record<string, number[]>
}

export function toCombinationFile({ aggregations, views }: CombinationResult): CombinationFile {
    return {
        aggregations: aggregations.map(({ start, end, hours, maxId, totalViews }) => ({
            start,
            end,
            hours,
            max_qid: maxId,
            total_views: totalViews,
        })),
        views,
    }
}

export async function writeCombinationFile(output: string, result: CombinationResult): Promise<void> {
    const compressed = await gzipAsync(Buffer.from(JSON.stringify(toCombinationFile(result))))
    await writeFile(output, compressed)
    logger.info('💾', `Wrote ${Object.keys(result.views).length} ids over ${result.aggregations.length} windows to ${output}`)
}
