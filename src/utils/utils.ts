import { Pool } from 'pg'

import { logger } from './logger'

export async function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export function createPostgresPool(connectionString: string, poolSize: number, applicationName: string): Pool {
    const pgPool = new Pool({
        connectionString,
        idleTimeoutMillis: 500,
        application_name: applicationName,
        max: poolSize,
    })

    pgPool.on('error', (error: Error) => {
        logger.error('🔴', 'PostgreSQL error encountered!', { error })
    })

    return pgPool
}

/** Runs `job` over `items` in order until `n` calls report success, returning the number that did */
export async function iterateUntilNSucceed<T>(
    job: (item: T) => Promise<boolean>,
    items: Iterable<T>,
    n: number
): Promise<number> {
    let succeeded = 0
    for (const item of items) {
        if (succeeded >= n) {
            break
        }
        if (await job(item)) {
            succeeded += 1
        }
    }
    return succeeded
}
