import { basename } from 'path'

import { PageviewStore } from '../storage/pageview-store'
import { AggregationMap, HourlyViewRow, HourString, LogEntry } from '../types'
import { InvalidFileNameError } from '../utils/errors'
import { logger } from '../utils/logger'
import { filesProcessedCounter } from '../utils/metrics'
import { AggregationDependencies, aggregateLogEntries } from './aggregation-pipeline'
import { readLog } from './log-reader'

const FILE_HOUR_RE = /\b(\d{4})(\d{2})(\d{2})-(\d{2})0000\b/

/** "pageviews-20181010-010000.gz" -> "2018-10-10 01:00:00" */
export function fileHour(file: string): HourString {
    const match = FILE_HOUR_RE.exec(basename(file))
    if (!match) {
        throw new InvalidFileNameError(file)
    }
    const [, year, month, day, hour] = match
    return `${year}-${month}-${day} ${hour}:00:00`
}

export interface FileProcessorDependencies extends AggregationDependencies {
    store: PageviewStore
    /** Defaults to reading the gzipped file from disk */
    readEntries?: (file: string) => AsyncIterable<LogEntry>
    now?: () => number
}

/**
 * Reads an hourly log file, aggregates it by id and stores the rows and the hour summary.
 * Returns false without doing anything when the file already has a summary.
 */
export async function processFile(file: string, dependencies: FileProcessorDependencies): Promise<boolean> {
    const { store, readEntries = readLog, now = Date.now } = dependencies
    const name = basename(file)

    logger.info('📄', `Starting to process file ${file}`)
    if (await store.hasSummaryForFile(name)) {
        logger.warn('⏭️', `Record already exists for file ${file}`)
        filesProcessedCounter.labels('skipped').inc()
        return false
    }

    const startedAt = now()
    const hour = fileHour(name)
    const aggregation = await aggregateLogEntries(readEntries(file), dependencies)
    const rows = toHourlyRows(aggregation, hour)

    const summary = {
        file: name,
        hour,
        durationSeconds: (now() - startedAt) / 1000,
        views: rows.reduce((total, row) => total + row.views, 0),
        maxId: rows.reduce((max, row) => Math.max(max, row.id), 0),
        idCount: rows.length,
    }
    await store.insertHour(rows, summary)

    logger.info('✅', `Processed file ${file}`, { ...summary })
    filesProcessedCounter.labels('processed').inc()
    return true
}

export function toHourlyRows(aggregation: AggregationMap, hour: HourString): HourlyViewRow[] {
    return Array.from(aggregation, ([id, views]) => ({ id, hour, views }))
}
