import type { ArgumentPool } from './argument-pool'
import { requireArgument, toInvocationError } from './errors'
import { Logger, LogLevel } from './logger'
import type { ConstructorDescriptor } from './metadata'
import { resolveValue } from './parameter-resolver'
import type { InjectParameter, ObjectResolver } from './types'

// ============================================================================
// Constructor Injector
// ============================================================================

/**
 * Builds instances through a selected constructor or static factory
 *
 * Arguments are staged in a buffer rented from the {@link ArgumentPool};
 * the buffer goes back to the pool whether or not construction succeeds.
 */
export class ConstructorInjector {
	constructor(
		private readonly pool: ArgumentPool,
		private readonly logger: Logger = new Logger(LogLevel.OFF),
	) {}

	/**
	 * Resolve every parameter and invoke the constructor
	 *
	 * @param descriptor - The selected constructor
	 * @param resolver - Source of dependencies
	 * @param overrides - Explicit values for this call
	 * @returns The new instance
	 * @throws {ArgumentError} If the descriptor or resolver is missing
	 * @throws {ResolutionError} If a required parameter cannot be resolved
	 * @throws {InvocationError} If the constructor itself fails
	 */
	createInstance(
		descriptor: ConstructorDescriptor | null | undefined,
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): unknown {
		const ctor = requireArgument(descriptor, 'descriptor')
		const source = requireArgument(resolver, 'resolver')
		const { parameters } = ctor

		this.logger.log(
			`  Constructing ${ctor.type.name} via ${ctor.handle.name}(${parameters.length} parameter(s))`,
		)

		return this.pool.lease(parameters.length, (args) => {
			try {
				for (const parameter of parameters) {
					args[parameter.index] = resolveValue(parameter, source, overrides)
				}
				return ctor.handle.invoke(args)
			} catch (error) {
				throw toInvocationError(error, ctor.type.name)
			}
		})
	}
}
