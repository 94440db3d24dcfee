/** Raised when a downstream dependency (a replica database, the store) is temporarily unreachable */
export class DependencyUnavailableError extends Error {
    readonly isRetriable = true

    constructor(
        message: string,
        public readonly dependencyName: string,
        public readonly originalError: Error
    ) {
        super(message)
        this.name = 'DependencyUnavailableError'
    }
}

// Connection-level failures and the Postgres error classes that mean "try again later":
// 08 connection exception, 53 insufficient resources, 57P0x operator intervention
const TRANSIENT_NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN'])
const TRANSIENT_SQLSTATE_PREFIXES = ['08', '53', '57P']

export function isTransientDatabaseError(error: unknown): error is Error {
    if (!(error instanceof Error)) {
        return false
    }
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    if (code === undefined) {
        return /timeout|terminated unexpectedly|Connection terminated/i.test(error.message)
    }
    return TRANSIENT_NETWORK_CODES.has(code) || TRANSIENT_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix))
}

/** Wraps transient failures as DependencyUnavailableError, passes anything else through untouched */
export function processDatabaseError(error: unknown, dependencyName: string): unknown {
    if (isTransientDatabaseError(error)) {
        return new DependencyUnavailableError(error.message, dependencyName, error)
    }
    return error
}
