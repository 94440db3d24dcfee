import { UNRESOLVED_ID } from '../ingestion/aggregation-pipeline'
import { PageviewStore } from '../storage/pageview-store'
import { DumpMode, DumpResult, TimeWindow, ViewsDumpResult } from '../types'
import { EmptyWindowError, InvalidDumpModeError } from '../utils/errors'
import { logger } from '../utils/logger'
import { convertStartAndEnd } from './time-window'

export interface DumpOptions {
    /** Hour like "2018-10-10T01" or duration like "1d" */
    start?: string
    /** Hour like "2018-10-10T01", defaults to the latest available hour */
    end?: string
    mode?: string
}

export function parseDumpMode(mode: string | undefined): DumpMode {
    if (mode === undefined || mode === 'views') {
        return 'views'
    }
    if (mode === 'logprobs') {
        return 'logprobs'
    }
    throw new InvalidDumpModeError(mode)
}

export const formatId = (id: number): string => `Q${id}`

export interface LaplaceSmoothed {
    logprobs: Record<string, number>
    defaultLogprob: number
}

/**
 * Add-one smoothed log probabilities. The largest id stands in for the number of ids,
 * so the denominator is `totalViews + maxId` rather than an exact vocabulary size.
 */
export function laplaceLogprobs(views: Record<string, number>, totalViews: number, maxId: number): LaplaceSmoothed {
    const logDenominator = Math.log(totalViews + maxId)
    const logprobs: Record<string, number> = {}
    for (const [id, count] of Object.entries(views)) {
        logprobs[id] = Math.log(count + 1) - logDenominator
    }
    return { logprobs, defaultLogprob: Math.log(1) - logDenominator }
}

/** Metadata and raw per-id views for a resolved window */
export async function dumpViews(store: PageviewStore, window: TimeWindow): Promise<ViewsDumpResult> {
    const { start, end } = window
    logger.info('📊', `Dumping views`, { start, end })

    const hours = await store.hoursInRange(start, end)
    logger.info('📊', `${hours.length} hours`)
    const { maxId, totalViews } = await store.summaryForRange(start, end)

    const views: Record<string, number> = {}
    for (const [id, count] of await store.viewsByIdInRange(start, end)) {
        // Unresolved views only count towards the total
        if (id !== UNRESOLVED_ID) {
            views[formatId(id)] = count
        }
    }

    return { start, end, hours, maxId, totalViews, mode: 'views', views }
}

export async function dumpWindow(store: PageviewStore, window: TimeWindow, mode: DumpMode = 'views'): Promise<DumpResult> {
    const result = await dumpViews(store, window)
    if (mode === 'views') {
        return result
    }
    const { views, ...metadata } = result
    if (metadata.totalViews + metadata.maxId === 0) {
        throw new EmptyWindowError(metadata.start, metadata.end)
    }
    return { ...metadata, mode, ...laplaceLogprobs(views, metadata.totalViews, metadata.maxId) }
}

/** Bulk aggregation over the window described by `start` and `end` */
export async function getDump(store: PageviewStore, { start, end, mode }: DumpOptions = {}): Promise<DumpResult> {
    const dumpMode = parseDumpMode(mode)
    const window = await convertStartAndEnd(store, start, end)
    return dumpWindow(store, window, dumpMode)
}
