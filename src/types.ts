export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface PageviewsConfig {
    LOG_LEVEL: LogLevel
    DATABASE_URL: string // where hourly views and hour summaries are persisted
    POSTGRES_CONNECTION_POOL_SIZE: number
    REPLICA_DATABASE_URL_TEMPLATE: string // wiki replica connection string, `{dbname}` is substituted
    SITEMATRIX_URL: string
    PAGEVIEWS_DIR: string
    MAX_FILES: number // maximum number of log files to process per run
    MAX_DAYS: number // maximum age of log files to consider
    OUTPUT_FILE: string
    DUMP_DURATIONS: string // comma-separated, e.g. "1d,1w"
    RESOLVE_CHUNK_SIZE: number
    RESOLVE_RETRY_INITIAL_INTERVAL_MS: number
    RESOLVE_RETRY_MAX_INTERVAL_MS: number
    PARTITION_CHUNK_SIZE: number
    PARTITION_MAX_BUCKETS: number
    PARTITION_MAX_UNPROCESSED: number
}

/** A single line of an hourly page view log */
export interface LogEntry {
    readonly project: string
    readonly title: string
    readonly views: number
}

/** Canonical (Wikidata) id to summed views. Id 0 collects views that could not be resolved. */
export type AggregationMap = Map<number, number>

/** Hour instant in storage form, e.g. "2018-10-10 01:00:00" */
export type HourString = string

export interface TimeWindow {
    start: HourString
    end: HourString
}

export interface HourlyViewRow {
    id: number
    hour: HourString
    views: number
}

export interface HourSummary {
    file: string
    hour: HourString
    durationSeconds: number
    views: number
    maxId: number
    idCount: number
}

export interface RangeSummary {
    maxId: number
    totalViews: number
}

export type DumpMode = 'views' | 'logprobs'

export interface DumpMetadata extends TimeWindow {
    hours: HourString[]
    maxId: number
    totalViews: number
}

export interface ViewsDumpResult extends DumpMetadata {
    mode: 'views'
    views: Record<string, number>
}

export interface LogprobsDumpResult extends DumpMetadata {
    mode: 'logprobs'
    logprobs: Record<string, number>
    defaultLogprob: number
}

export type DumpResult = ViewsDumpResult | LogprobsDumpResult

export interface CombinationResult {
    aggregations: DumpMetadata[]
    views: Record<string, number[]>
}
