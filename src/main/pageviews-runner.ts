import { parseDurationList } from '../config/config'
import { getCombinationDump, writeCombinationFile } from '../dump/combination-dump'
import { AggregationDependencies } from '../ingestion/aggregation-pipeline'
import { getFiles } from '../ingestion/log-files'
import { FileProcessorDependencies, processFile } from '../ingestion/process-file'
import { fetchSitematrixDatabaseNames, KnownDatabases } from '../resolution/known-databases'
import { ProjectDatabaseMapper } from '../resolution/project-database'
import { ReplicaTitleLookup } from '../resolution/replica-title-lookup'
import { TitleLookup, TitleResolver } from '../resolution/title-resolver'
import { PageviewStore } from '../storage/pageview-store'
import { PostgresPageviewStore } from '../storage/postgres-pageview-store'
import { PageviewsConfig } from '../types'
import { filesProcessedCounter, logRunMetrics } from '../utils/metrics'
import { logger } from '../utils/logger'
import { createPostgresPool, iterateUntilNSucceed } from '../utils/utils'

export function buildAggregationDependencies(
    config: PageviewsConfig,
    knownDatabases: KnownDatabases,
    lookup: TitleLookup
): AggregationDependencies {
    return {
        mapper: new ProjectDatabaseMapper(knownDatabases),
        resolver: new TitleResolver(lookup, {
            chunkSize: config.RESOLVE_CHUNK_SIZE,
            retryInitialIntervalMs: config.RESOLVE_RETRY_INITIAL_INTERVAL_MS,
            retryMaxIntervalMs: config.RESOLVE_RETRY_MAX_INTERVAL_MS,
        }),
        partitioning: {
            chunkSize: config.PARTITION_CHUNK_SIZE,
            maxBuckets: config.PARTITION_MAX_BUCKETS,
            maxUnprocessed: config.PARTITION_MAX_UNPROCESSED,
        },
    }
}

/**
 * Processes up to `maxFiles` of the given files, most recent first. A file that fails is
 * logged and counted, and the run moves on to the next one.
 */
export async function processLogFiles(
    files: string[],
    maxFiles: number,
    dependencies: FileProcessorDependencies
): Promise<number> {
    const processed = await iterateUntilNSucceed(
        async (file: string) => {
            try {
                return await processFile(file, dependencies)
            } catch (error) {
                logger.error('🔴', `Failed to process file ${file}`, { error })
                filesProcessedCounter.labels('failed').inc()
                return false
            }
        },
        files,
        maxFiles
    )
    logger.info('🏁', `Processed ${processed} of ${files.length} candidate files`)
    return processed
}

/** Writes the multi-window dump of everything recorded so far */
export async function writeLatestDump(store: PageviewStore, config: PageviewsConfig): Promise<void> {
    const result = await getCombinationDump(store, parseDurationList(config.DUMP_DURATIONS))
    await writeCombinationFile(config.OUTPUT_FILE, result)
}

/** Processes unprocessed log files and writes out the result file */
export async function runPageviewsJob(config: PageviewsConfig): Promise<void> {
    if (!config.DATABASE_URL || !config.REPLICA_DATABASE_URL_TEMPLATE) {
        throw new Error('DATABASE_URL and REPLICA_DATABASE_URL_TEMPLATE must be set')
    }

    const pool = createPostgresPool(config.DATABASE_URL, config.POSTGRES_CONNECTION_POOL_SIZE, 'wiki-pageviews')
    const lookup = new ReplicaTitleLookup(config.REPLICA_DATABASE_URL_TEMPLATE)
    const store = new PostgresPageviewStore(pool)

    try {
        const knownDatabases = new KnownDatabases(() => fetchSitematrixDatabaseNames(config.SITEMATRIX_URL))
        await knownDatabases.refresh()

        const files = await getFiles(config.PAGEVIEWS_DIR, config.MAX_DAYS)
        await processLogFiles(files, config.MAX_FILES, {
            ...buildAggregationDependencies(config, knownDatabases, lookup),
            store,
        })
        await writeLatestDump(store, config)
    } finally {
        await lookup.close()
        await pool.end()
        await logRunMetrics()
    }
}
