import {
	InvocationError,
	requireArgument,
	toInvocationError,
} from './errors'
import { Logger, LogLevel } from './logger'
import type { MemberDescriptor } from './metadata'
import { isZeroValue, resolveValue, zeroValueOf } from './parameter-resolver'
import type { InjectParameter, ObjectResolver } from './types'

/**
 * Writes resolved values into the fields or properties of an existing instance
 *
 * An optional member that resolves to its zero value keeps its current
 * value, so a field initializer survives an unresolved optional dependency.
 * The exception is an unset (`undefined`) member of a type with a zero value:
 * an unset numeric field still reads `0`.
 *
 * @example
 * const fields = new MemberInjector('field')
 * fields.inject(service, metadata.fields, registry)
 */
export class MemberInjector {
	constructor(
		readonly kind: MemberDescriptor['kind'],
		private readonly logger: Logger = new Logger(LogLevel.OFF),
	) {}

	/**
	 * @throws {ArgumentError} If descriptors are given without an instance or resolver
	 * @throws {ResolutionError} If a required member cannot be resolved
	 * @throws {InvocationError} If a write fails or is refused
	 */
	inject(
		instance: object | null | undefined,
		descriptors: readonly MemberDescriptor[],
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): void {
		if (descriptors.length === 0) {
			return
		}
		const target = requireArgument(instance, 'instance')
		const source = requireArgument(resolver, 'resolver')

		for (const descriptor of descriptors) {
			const owner = descriptor.declaringType.name
			try {
				const value = resolveValue(descriptor, source, overrides)
				if (this.keepsCurrentValue(target, descriptor, value)) {
					this.logger.log(`  Skipped optional ${this.kind} ${owner}.${String(descriptor.name)}`)
					continue
				}
				if (!descriptor.handle.set(target, value)) {
					throw new InvocationError(
						owner,
						descriptor.name,
						new TypeError(`Cannot assign to ${this.kind} '${String(descriptor.name)}'`),
					)
				}
				this.logger.log(`  Injected ${this.kind} ${owner}.${String(descriptor.name)}`)
			} catch (error) {
				throw toInvocationError(error, owner, descriptor.name)
			}
		}
	}

	private keepsCurrentValue(
		target: object,
		descriptor: MemberDescriptor,
		value: unknown,
	): boolean {
		if (!descriptor.isOptional || !isZeroValue(value, descriptor.token)) {
			return false
		}
		const unset = Reflect.get(target, descriptor.name) === undefined
		return !(unset && zeroValueOf(descriptor.token) !== undefined)
	}
}
