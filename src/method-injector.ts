import type { ArgumentPool } from './argument-pool'
import { requireArgument, toInvocationError } from './errors'
import { Logger, LogLevel } from './logger'
import type { MethodDescriptor } from './metadata'
import { resolveValue } from './parameter-resolver'
import type { InjectParameter, ObjectResolver } from './types'

/**
 * Calls injection methods on an existing instance, in metadata order
 *
 * Each call stages its arguments in its own pooled buffer. Methods that ran
 * before a failure are not undone.
 */
export class MethodInjector {
	constructor(
		private readonly pool: ArgumentPool,
		private readonly logger: Logger = new Logger(LogLevel.OFF),
	) {}

	/**
	 * @throws {ArgumentError} If methods are given without an instance or resolver
	 * @throws {ResolutionError} If a required parameter cannot be resolved
	 * @throws {InvocationError} If a method fails
	 */
	inject(
		instance: object | null | undefined,
		methods: readonly MethodDescriptor[],
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): void {
		if (methods.length === 0) {
			return
		}
		const target = requireArgument(instance, 'instance')
		const source = requireArgument(resolver, 'resolver')

		for (const method of methods) {
			const owner = method.declaringType.name
			this.logger.log(`  Calling ${owner}.${String(method.name)} (order ${method.order})`)

			this.pool.lease(method.parameters.length, (args) => {
				try {
					for (const parameter of method.parameters) {
						args[parameter.index] = resolveValue(parameter, source, overrides)
					}
					method.handle.invoke(target, args)
				} catch (error) {
					throw toInvocationError(error, owner, method.name)
				}
			})
		}
	}
}
