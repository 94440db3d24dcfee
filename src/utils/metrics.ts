import { Counter, register, Summary } from 'prom-client'

import { logger } from './logger'

const instrumentedFnSummary = new Summary({
    name: 'pageviews_instrumented_fn_duration_ms',
    help: 'Duration of instrumented functions',
    labelNames: ['metricName', 'tag'],
    percentiles: [0.5, 0.9, 0.95, 0.99],
})

export async function instrumentQuery<T>(metricName: string, tag: string | undefined, runQuery: () => Promise<T>): Promise<T> {
    const start = Date.now()
    try {
        return await runQuery()
    } finally {
        instrumentedFnSummary.labels(metricName, String(tag ?? 'null')).observe(Date.now() - start)
    }
}

export const filesProcessedCounter = new Counter({
    name: 'pageviews_files_processed_total',
    help: 'Log files by outcome',
    labelNames: ['outcome'],
})

export const malformedLinesCounter = new Counter({
    name: 'pageviews_malformed_lines_total',
    help: 'Log lines dropped because they could not be parsed',
})

export const resolvedTitlesCounter = new Counter({
    name: 'pageviews_resolved_titles_total',
    help: 'Titles resolved to an id, by resolution pass',
    labelNames: ['pass'],
})

export const unresolvedViewsCounter = new Counter({
    name: 'pageviews_unresolved_views_total',
    help: 'Views that could not be attributed to an id',
})

/** Writes every registered metric to the log, once at the end of a run */
export async function logRunMetrics(): Promise<void> {
    logger.info('📈', 'Run metrics', { metrics: await register.getMetricsAsJSON() })
}
