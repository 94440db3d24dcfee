import { ProjectDatabaseMapper } from '../resolution/project-database'
import { TitleResolver } from '../resolution/title-resolver'
import { AggregationMap, LogEntry } from '../types'
import { logger } from '../utils/logger'
import { unresolvedViewsCounter } from '../utils/metrics'
import { ChunkAndPartitionOptions, chunkAndPartition, sumValues } from './partitioned-batcher'

/** Views that could not be attributed to an id are filed under this id so they stay in the total */
export const UNRESOLVED_ID = 0

export interface AggregationDependencies {
    mapper: ProjectDatabaseMapper
    resolver: TitleResolver
    partitioning: ChunkAndPartitionOptions
}

/**
 * Converts log entries into `[id, views]` pairs, batching lookups per wiki database.
 * The last pair is always `[UNRESOLVED_ID, views that could not be converted]`.
 */
export async function* processLogEntries(
    entries: Iterable<LogEntry> | AsyncIterable<LogEntry>,
    { mapper, resolver, partitioning }: AggregationDependencies
): AsyncGenerator<[number, number]> {
    let unresolvedTitles = 0
    let unresolvedViews = 0

    const batches = chunkAndPartition(entries, (entry) => mapper.databaseFromProjectName(entry.project), partitioning)

    for await (const [dbname, batch] of batches) {
        if (dbname === null) {
            for (const entry of batch) {
                unresolvedTitles += 1
                unresolvedViews += entry.views
            }
            continue
        }

        const ids = await resolver.resolve(
            dbname,
            batch.map((entry) => entry.title)
        )
        for (let i = 0; i < batch.length; i++) {
            const id = ids[i]
            if (id !== null && id !== undefined) {
                yield [id, batch[i].views]
            } else {
                unresolvedTitles += 1
                unresolvedViews += batch[i].views
            }
        }
    }

    logger.warn('🕳️', `Failed to convert ${unresolvedTitles} titles representing ${unresolvedViews} views`)
    unresolvedViewsCounter.inc(unresolvedViews)
    yield [UNRESOLVED_ID, unresolvedViews]
}

/** Sums views by id. The values always add up to the views of the input entries. */
export function aggregateLogEntries(
    entries: Iterable<LogEntry> | AsyncIterable<LogEntry>,
    dependencies: AggregationDependencies
): Promise<AggregationMap> {
    return sumValues(processLogEntries(entries, dependencies))
}
