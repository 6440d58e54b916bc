import { ArgumentError } from './errors'

/**
 * Options for {@link ArgumentPool}
 */
export interface ArgumentPoolOptions {
	/** Buffers kept per size once released (default 8) */
	maxRetainedPerSize?: number
}

const DEFAULT_MAX_RETAINED = 8

// ============================================================================
// Argument Pool
// ============================================================================

/**
 * Pool of argument buffers used to stage resolved parameters before a
 * constructor or method is invoked
 *
 * Every rented buffer must be released exactly once. Prefer {@link lease},
 * which releases on every exit path.
 *
 * @example
 * const pool = new ArgumentPool()
 * const value = pool.lease(2, (args) => {
 *   args[0] = 'a'
 *   args[1] = 'b'
 *   return args.join('')
 * })
 */
export class ArgumentPool {
	private readonly buckets = new Map<number, unknown[][]>()
	private readonly rented = new Set<unknown[]>()
	private readonly maxRetainedPerSize: number

	constructor(options: ArgumentPoolOptions = {}) {
		this.maxRetainedPerSize = options.maxRetainedPerSize ?? DEFAULT_MAX_RETAINED
	}

	/**
	 * Rent a buffer of exactly `size` slots, all `undefined`
	 *
	 * @param size - Number of arguments
	 * @returns A buffer owned by the caller until released
	 */
	rent(size: number): unknown[] {
		if (!Number.isInteger(size) || size < 0) {
			throw new ArgumentError('size', `Buffer size must be a non-negative integer, got ${size}`)
		}
		const buffer = this.buckets.get(size)?.pop() ?? new Array<unknown>(size).fill(undefined)
		this.rented.add(buffer)
		return buffer
	}

	/**
	 * Return a rented buffer to the pool
	 *
	 * @param buffer - A buffer obtained from {@link rent} and not yet released
	 * @throws {ArgumentError} If the buffer is not currently rented from this pool
	 */
	release(buffer: unknown[]): void {
		if (!this.rented.delete(buffer)) {
			throw new ArgumentError(
				'buffer',
				'Buffer was not rented from this pool or has already been released',
			)
		}
		buffer.fill(undefined)

		let bucket = this.buckets.get(buffer.length)
		if (bucket === undefined) {
			bucket = []
			this.buckets.set(buffer.length, bucket)
		}
		if (bucket.length < this.maxRetainedPerSize) {
			bucket.push(buffer)
		}
	}

	/**
	 * Rent a buffer for the duration of `fn`, releasing it however `fn` exits
	 *
	 * @param size - Number of arguments
	 * @param fn - Callback receiving the buffer
	 * @returns Whatever `fn` returns
	 */
	lease<T>(size: number, fn: (args: unknown[]) => T): T {
		const buffer = this.rent(size)
		try {
			return fn(buffer)
		} finally {
			this.release(buffer)
		}
	}

	/**
	 * Number of pooled buffers of the given size ready to be rented
	 */
	available(size: number): number {
		return this.buckets.get(size)?.length ?? 0
	}

	/**
	 * Number of buffers currently rented out
	 */
	get rentedCount(): number {
		return this.rented.size
	}
}
