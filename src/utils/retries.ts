import { DependencyUnavailableError } from './db/error'
import { logger } from './logger'
import { sleep } from './utils'

export interface RandomExponentialBackoffOptions {
    /** Wait ceiling of the first retry */
    initialIntervalMs: number
    /** Per-attempt wait never grows beyond this */
    maxIntervalMs: number
    /** Defaults to retrying DependencyUnavailableError only */
    isRetriable?: (error: unknown) => boolean
    /** Overridable in tests */
    random?: () => number
    wait?: (ms: number) => Promise<void>
}

const isDependencyUnavailable = (error: unknown): boolean => error instanceof DependencyUnavailableError

/** Upper bound of the randomized wait before retry number `attempt` (1-indexed) */
export function getBackoffCeilingMs(initialIntervalMs: number, maxIntervalMs: number, attempt: number): number {
    if (attempt < 1) {
        throw new Error('Attempts are indexed starting with 1')
    }
    return Math.min(maxIntervalMs, initialIntervalMs * 2 ** (attempt - 1))
}

/**
 * Retries `fn` for as long as it fails with a retriable error, waiting a uniformly random
 * time up to an exponentially growing, capped ceiling between attempts. Attempts are unbounded.
 */
export async function retryWithRandomExponentialBackoff<T>(
    fn: () => Promise<T>,
    name: string,
    options: RandomExponentialBackoffOptions
): Promise<T> {
    const isRetriable = options.isRetriable ?? isDependencyUnavailable
    const random = options.random ?? Math.random
    const wait = options.wait ?? sleep

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (!isRetriable(error)) {
                logger.debug('🚫', `failed ${name}, non-retriable error encountered`, { error })
                throw error
            }
            const ceilingMs = getBackoffCeilingMs(options.initialIntervalMs, options.maxIntervalMs, attempt)
            const waitMs = Math.floor(random() * ceilingMs)
            logger.warn('🔁', `failed ${name}, retrying`, { error, attempt, waitMs })
            await wait(waitMs)
        }
    }
}
