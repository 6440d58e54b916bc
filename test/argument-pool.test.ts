import { describe, expect, test } from '@jest/globals'
import { ArgumentError, ArgumentPool } from '../src'

describe('ArgumentPool', () => {
	test('should rent buffers of the requested size filled with undefined', () => {
		const pool = new ArgumentPool()

		expect(pool.rent(0)).toEqual([])
		expect(pool.rent(3)).toEqual([undefined, undefined, undefined])
		expect(pool.rentedCount).toBe(2)
	})

	test('should reuse a released buffer after clearing it', () => {
		const pool = new ArgumentPool()
		const buffer = pool.rent(2)
		buffer[0] = 'a'
		buffer[1] = 'b'

		pool.release(buffer)

		expect(pool.available(2)).toBe(1)
		const again = pool.rent(2)
		expect(again).toBe(buffer)
		expect(again).toEqual([undefined, undefined])
	})

	test('should reject invalid sizes', () => {
		const pool = new ArgumentPool()

		expect(() => pool.rent(-1)).toThrow(ArgumentError)
		expect(() => pool.rent(1.5)).toThrow('Buffer size must be a non-negative integer, got 1.5')
	})

	test('should reject a double release', () => {
		const pool = new ArgumentPool()
		const buffer = pool.rent(1)
		pool.release(buffer)

		expect(() => pool.release(buffer)).toThrow(
			'Buffer was not rented from this pool or has already been released',
		)
	})

	test('should reject a buffer rented from another pool', () => {
		const other = new ArgumentPool().rent(1)

		expect(() => new ArgumentPool().release(other)).toThrow(ArgumentError)
	})

	test('should retain at most maxRetainedPerSize buffers per size', () => {
		const pool = new ArgumentPool({ maxRetainedPerSize: 1 })
		const first = pool.rent(2)
		const second = pool.rent(2)

		pool.release(first)
		pool.release(second)

		expect(pool.available(2)).toBe(1)
		expect(pool.rentedCount).toBe(0)
	})

	test('should release a leased buffer when the callback throws', () => {
		const pool = new ArgumentPool()

		expect(() =>
			pool.lease(2, () => {
				throw new Error('boom')
			}),
		).toThrow('boom')
		expect(pool.rentedCount).toBe(0)
		expect(pool.available(2)).toBe(1)
	})

	test('should return the value of a leased callback', () => {
		const pool = new ArgumentPool()

		const joined = pool.lease(2, (args) => {
			args[0] = 'a'
			args[1] = 'b'
			return args.join('')
		})

		expect(joined).toBe('ab')
		expect(pool.rentedCount).toBe(0)
	})
})
