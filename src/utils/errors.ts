/** A start or end specification that is neither an hour like "2018-10-10T01" nor a duration like "1d" */
export class InvalidTimeSpecError extends Error {
    constructor(
        message: string,
        public readonly spec: string
    ) {
        super(message)
        this.name = 'InvalidTimeSpecError'
    }
}

/** The latest hour was requested but nothing has been recorded yet. Distinct from an hour with zero views. */
export class NoHoursRecordedError extends Error {
    constructor() {
        super('No hours available in database')
        this.name = 'NoHoursRecordedError'
    }
}

export class InvalidDumpModeError extends Error {
    constructor(public readonly mode: string) {
        super(`Unknown mode ${mode}`)
        this.name = 'InvalidDumpModeError'
    }
}

/** Log probabilities are undefined for a window without any views or ids */
export class EmptyWindowError extends Error {
    constructor(
        public readonly start: string,
        public readonly end: string
    ) {
        super(`No views recorded between ${start} and ${end}`)
        this.name = 'EmptyWindowError'
    }
}

export class InvalidFileNameError extends Error {
    constructor(public readonly file: string) {
        super(`Trying to process a file that doesn't contain an hour: ${file}`)
        this.name = 'InvalidFileNameError'
    }
}
