import { DateTime } from 'luxon'

import { PageviewStore } from '../storage/pageview-store'
import { HourString, TimeWindow } from '../types'
import { InvalidTimeSpecError, NoHoursRecordedError } from '../utils/errors'
import { logger } from '../utils/logger'

export const HOUR_FORMAT = 'yyyy-MM-dd HH:mm:ss'
export const DEFAULT_START = '1d'

const HOUR_RE = /^(\d{4}-\d{2}-\d{2})T(\d{2})$/
const DURATION_RE = /^(\d+)([hdwm]?)$/i

/** Hours per duration unit. A month is taken to be 30 days. */
export const DURATION_UNITS: Record<string, number> = {
    '': 1,
    h: 1,
    d: 24,
    w: 24 * 7,
    m: 24 * 30,
}

function toDateTime(hour: HourString): DateTime | null {
    const parsed = DateTime.fromFormat(hour, HOUR_FORMAT, { zone: 'utc' })
    return parsed.isValid ? parsed : null
}

/** "2018-10-10T01" -> "2018-10-10 01:00:00", or null when it is not an hour */
export function parseHour(hour: string): HourString | null {
    const match = HOUR_RE.exec(hour)
    if (match) {
        const converted = `${match[1]} ${match[2]}:00:00`
        if (toDateTime(converted)) {
            return converted
        }
    }
    logger.debug('🕐', `parseHour: Could not parse: ${hour}`)
    return null
}

/** Number of hours in a duration like "1d", or null when it is not a duration */
export function durationHours(duration: string): number | null {
    const match = DURATION_RE.exec(duration)
    if (!match) {
        return null
    }
    const value = parseInt(match[1], 10)
    const multiplier = DURATION_UNITS[match[2].toLowerCase()]
    return value > 0 ? value * multiplier : null
}

/**
 * Start hour of the window that ends at `end` and lasts `duration`.
 *
 * The duration is the number of hours in the closed interval [start, end], not the
 * difference between them, so "1h" gives start == end and "1d" starts 23 hours earlier.
 */
export function parseDuration(duration: string, end: HourString): HourString | null {
    const hours = durationHours(duration)
    if (hours === null) {
        logger.debug('🕐', `parseDuration: Could not parse: ${duration}`)
        return null
    }
    const anchor = toDateTime(end)
    if (!anchor) {
        throw new InvalidTimeSpecError(`Unable to parse ${end} as an hour`, end)
    }
    return anchor.minus({ hours: hours - 1 }).toFormat(HOUR_FORMAT)
}

/** The given end hour, or the latest hour recorded in the store */
export async function resolveEnd(store: PageviewStore, end?: string): Promise<HourString> {
    if (end === undefined) {
        const latest = await store.latestHour()
        if (latest === null) {
            throw new NoHoursRecordedError()
        }
        return latest
    }
    const parsed = parseHour(end)
    if (parsed === null) {
        throw new InvalidTimeSpecError(`Unable to parse to hour ${end}`, end)
    }
    return parsed
}

/** Start given either as an hour like "2018-10-10T01" or a duration like "1d" back from `end` */
export function resolveStart(start: string, end: HourString): TimeWindow {
    const parsed = parseHour(start) ?? parseDuration(start, end)
    if (parsed === null) {
        throw new InvalidTimeSpecError(`Unable to parse ${start} as either hour or duration`, start)
    }
    if (parsed > end) {
        throw new InvalidTimeSpecError(`Start ${parsed} is after end ${end}`, start)
    }
    return { start: parsed, end }
}

/**
 * Converts API/CLI forms of start and end into a window.
 *
 * @param start hour like "2018-10-10T01" or duration like "1d", defaults to one day
 * @param end hour like "2018-10-10T01", defaults to the latest available hour
 */
export async function convertStartAndEnd(
    store: PageviewStore,
    start: string = DEFAULT_START,
    end?: string
): Promise<TimeWindow> {
    return resolveStart(start, await resolveEnd(store, end))
}

/** Number of hour instants in the closed window */
export function windowLengthHours({ start, end }: TimeWindow): number {
    const from = toDateTime(start)
    const to = toDateTime(end)
    if (!from || !to) {
        throw new InvalidTimeSpecError(`Invalid window ${start} - ${end}`, `${start} - ${end}`)
    }
    return to.diff(from, 'hours').hours + 1
}
