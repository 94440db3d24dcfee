export interface ChunkAndPartitionOptions {
    /** Maximum number of items per emitted chunk */
    chunkSize?: number
    /** Maximum number of items held back, across all buckets */
    maxUnprocessed?: number
    /** Maximum number of buckets open at once */
    maxBuckets?: number
}

function checkOptionalPositiveInteger(value: number | undefined, name: string): void {
    if (value !== undefined && !(Number.isInteger(value) && value > 0)) {
        throw new RangeError(`${name} must be either undefined or a positive integer, got ${value}`)
    }
}

/**
 * Splits items into buckets by partition key and yields `[key, items]` pairs, so that each
 * chunk handed to the consumer holds items of a single kind.
 *
 * The largest open bucket is yielded whenever
 *  - a bucket reaches `chunkSize` (that bucket is then necessarily the largest),
 *  - the number of held items reaches `maxUnprocessed`, or
 *  - an item would open a bucket beyond `maxBuckets`.
 * Ties for largest go to the bucket opened first. Once the input is exhausted the remaining
 * buckets are yielded in the order they were opened.
 *
 * Chunks come out close to `chunkSize` when the input has long runs per key or when the
 * bounds leave room for every distinct key; otherwise they tend to be smaller. Without any
 * bound the whole input is grouped before anything is yielded.
 */
export async function* chunkAndPartition<T, K>(
    items: Iterable<T> | AsyncIterable<T>,
    key: (item: T) => K,
    { chunkSize, maxUnprocessed, maxBuckets }: ChunkAndPartitionOptions = {}
): AsyncGenerator<[K, T[]]> {
    checkOptionalPositiveInteger(chunkSize, 'chunkSize')
    checkOptionalPositiveInteger(maxUnprocessed, 'maxUnprocessed')
    checkOptionalPositiveInteger(maxBuckets, 'maxBuckets')

    const buckets = new Map<K, T[]>()
    let unprocessed = 0

    const popLargest = (): [K, T[]] => {
        let largest: [K, T[]] | undefined
        for (const entry of buckets) {
            if (!largest || entry[1].length > largest[1].length) {
                largest = entry
            }
        }
        if (!largest) {
            throw new Error('popLargest called without any open bucket')
        }
        buckets.delete(largest[0])
        unprocessed -= largest[1].length
        return largest
    }

    for await (const item of items) {
        const partition = key(item)
        let bucket = buckets.get(partition)
        if (!bucket) {
            if (maxBuckets !== undefined && buckets.size === maxBuckets) {
                yield popLargest()
            }
            bucket = []
            buckets.set(partition, bucket)
        }
        bucket.push(item)
        unprocessed += 1

        if (chunkSize !== undefined && bucket.length === chunkSize) {
            buckets.delete(partition)
            unprocessed -= bucket.length
            yield [partition, bucket]
        } else if (maxUnprocessed !== undefined && unprocessed === maxUnprocessed) {
            yield popLargest()
        }
        // Here every bucket is below chunkSize and the held total below maxUnprocessed
    }

    for (const entry of buckets) {
        yield entry
    }
    buckets.clear()
}

/** Slices items into consecutive arrays of at most `size` elements */
export function* chunks<T>(items: Iterable<T>, size: number): Generator<T[]> {
    checkOptionalPositiveInteger(size, 'size')
    let chunk: T[] = []
    for (const item of items) {
        chunk.push(item)
        if (chunk.length === size) {
            yield chunk
            chunk = []
        }
    }
    if (chunk.length > 0) {
        yield chunk
    }
}

/** Sums the values of key/number pairs by key */
export async function sumValues<K>(pairs: Iterable<[K, number]> | AsyncIterable<[K, number]>): Promise<Map<K, number>> {
    const totals = new Map<K, number>()
    for await (const [key, value] of pairs) {
        totals.set(key, (totals.get(key) ?? 0) + value)
    }
    return totals
}
