import { HourlyViewRow, HourString, HourSummary, RangeSummary } from '../types'

/** Persistence for hourly per-id views and the per-file hour summaries. Ranges are inclusive. */
export interface PageviewStore {
    /** Writes an hour's rows and its summary together: either both are stored or neither is */
    insertHour(rows: HourlyViewRow[], summary: HourSummary): Promise<void>
    hasSummaryForFile(file: string): Promise<boolean>
    /** Latest recorded hour, or null when nothing has been recorded */
    latestHour(): Promise<HourString | null>
    hoursInRange(start: HourString, end: HourString): Promise<HourString[]>
    /** Zeroes when no hour falls in the range */
    summaryForRange(start: HourString, end: HourString): Promise<RangeSummary>
    /** Summed views per id, including the unresolved id 0 */
    viewsByIdInRange(start: HourString, end: HourString): Promise<Map<number, number>>
}
