import { Pool, PoolClient, QueryResultRow } from 'pg'

import { HourlyViewRow, HourString, HourSummary, RangeSummary } from '../types'
import { processDatabaseError } from '../utils/db/error'
import { logger } from '../utils/logger'
import { instrumentQuery } from '../utils/metrics'
import { PageviewStore } from './pageview-store'

const INSERT_BATCH_SIZE = 10_000
const HOUR_FORMAT = `'YYYY-MM-DD HH24:MI:SS'`

export class PostgresPageviewStore implements PageviewStore {
    constructor(private readonly pool: Pool) {}

    async insertHour(rows: HourlyViewRow[], summary: HourSummary): Promise<void> {
        const client = await this.pool.connect().catch((error: unknown) => {
            throw processDatabaseError(error, 'pageview-store')
        })

        try {
            await this.clientQuery(client, 'begin', 'BEGIN', [])
            for (let offset = 0; offset < rows.length; offset += INSERT_BATCH_SIZE) {
                const batch = rows.slice(offset, offset + INSERT_BATCH_SIZE)
                await this.clientQuery(
                    client,
                    'insertHourlyViews',
                    `INSERT INTO qid_hourly_views (qid, hour, views)
                    SELECT * FROM unnest($1::int[], $2::timestamp[], $3::int[])`,
                    [batch.map((row) => row.id), batch.map((row) => row.hour), batch.map((row) => row.views)]
                )
            }
            await this.clientQuery(
                client,
                'insertHourSummary',
                `INSERT INTO hours (file, hour, duration, views, max_qid, n_qids)
                VALUES ($1, $2::timestamp, $3, $4, $5, $6)`,
                [
                    summary.file,
                    summary.hour,
                    Math.round(summary.durationSeconds),
                    summary.views,
                    summary.maxId,
                    summary.idCount,
                ]
            )
            await this.clientQuery(client, 'commit', 'COMMIT', [])
        } catch (error) {
            try {
                await client.query('ROLLBACK')
            } catch (rollbackError) {
                logger.error('🔴', `Failed to roll back insert of ${summary.file}`, { error: rollbackError })
            }
            throw processDatabaseError(error, 'pageview-store')
        } finally {
            client.release()
        }
    }

    async hasSummaryForFile(file: string): Promise<boolean> {
        const rows = await this.query<{ found: number }>(
            'hasSummaryForFile',
            `SELECT 1 AS found FROM hours WHERE file = $1`,
            [file]
        )
        return rows.length > 0
    }

    async latestHour(): Promise<HourString | null> {
        const rows = await this.query<{ hour: string | null }>(
            'latestHour',
            `SELECT to_char(MAX(hour), ${HOUR_FORMAT}) AS hour FROM hours`,
            []
        )
        return rows[0]?.hour ?? null
    }

    async hoursInRange(start: HourString, end: HourString): Promise<HourString[]> {
        const rows = await this.query<{ hour: string }>(
            'hoursInRange',
            `SELECT to_char(hour, ${HOUR_FORMAT}) AS hour FROM hours
            WHERE hour >= $1::timestamp AND hour <= $2::timestamp
            ORDER BY hour`,
            [start, end]
        )
        return rows.map((row) => row.hour)
    }

    async summaryForRange(start: HourString, end: HourString): Promise<RangeSummary> {
        const rows = await this.query<{ max_qid: string; views: string }>(
            'summaryForRange',
            `SELECT COALESCE(MAX(max_qid), 0)::bigint AS max_qid, COALESCE(SUM(views), 0)::bigint AS views
            FROM hours
            WHERE hour >= $1::timestamp AND hour <= $2::timestamp`,
            [start, end]
        )
        const row = rows[0]
        return row ? { maxId: Number(row.max_qid), totalViews: Number(row.views) } : { maxId: 0, totalViews: 0 }
    }

    async viewsByIdInRange(start: HourString, end: HourString): Promise<Map<number, number>> {
        // bigint comes back as a string
        const rows = await this.query<{ qid: number; views: string }>(
            'viewsByIdInRange',
            `SELECT qid, SUM(views)::bigint AS views
            FROM qid_hourly_views
            WHERE hour >= $1::timestamp AND hour <= $2::timestamp
            GROUP BY qid`,
            [start, end]
        )
        return new Map(rows.map((row) => [row.qid, Number(row.views)]))
    }

    private async clientQuery(client: PoolClient, tag: string, sql: string, values: unknown[]): Promise<void> {
        await instrumentQuery('pageview_store', tag, () => client.query(sql, values))
    }

    private async query<R extends QueryResultRow = QueryResultRow>(
        tag: string,
        sql: string,
        values: unknown[]
    ): Promise<R[]> {
        try {
            const result = await instrumentQuery('pageview_store', tag, () => this.pool.query<R>(sql, values))
            return result.rows
        } catch (error) {
            throw processDatabaseError(error, 'pageview-store')
        }
    }
}
