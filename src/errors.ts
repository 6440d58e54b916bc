import { getTokenName, type InjectionToken, type MemberName } from './types'

// ============================================================================
// Error Taxonomy
// ============================================================================

/** Base class of every error raised by the injection engine. */
export abstract class InjectError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = new.target.name
	}
}

/**
 * A dependency could not be resolved
 *
 * Resolution errors propagate to the caller unchanged unless the failing
 * dependency is optional or has a default value.
 */
export class ResolutionError extends InjectError {
	constructor(
		message: string,
		public readonly token: InjectionToken,
		public readonly key?: string,
	) {
		super(message)
	}
}

/** Error thrown when nothing is registered for a required dependency. */
export class ServiceNotRegisteredError extends ResolutionError {
	constructor(token: InjectionToken, key?: string) {
		const suffix = key === undefined ? '' : ` (key: '${key}')`
		super(
			`Unable to resolve service '${getTokenName(token)}'${suffix}. ` +
				'Make sure it is registered with the resolver.',
			token,
			key,
		)
	}
}

/** Error thrown when a `@FromParent()` dependency is requested from a root resolver. */
export class NoParentContainerError extends ResolutionError {
	constructor(token: InjectionToken) {
		super(
			`Attempted to resolve '${getTokenName(token)}' from the parent container, ` +
				'but the resolver has no parent.',
			token,
		)
	}
}

/** Error thrown when a type has no constructor the injector may call. */
export class NoConstructorError extends ResolutionError {
	constructor(token: InjectionToken) {
		super(
			`Type '${getTokenName(token)}' has no available constructor. ` +
				'Expose the class constructor or mark a static factory with @Factory().',
			token,
		)
	}
}

/**
 * Error thrown when resolving a registration requires that same registration
 *
 * @example
 * // Chain: OrderService -> PaymentService -> OrderService
 */
export class CircularDependencyError extends ResolutionError {
	constructor(
		token: InjectionToken,
		public readonly chain: readonly string[],
	) {
		super(
			'Circular dependency detected!\n' +
				`Chain: ${[...chain, getTokenName(token)].join(' -> ')}`,
			token,
		)
	}
}

/**
 * A constructor, method or member write failed for a reason unrelated to
 * resolution. The underlying failure is kept as `cause`.
 */
export class InvocationError extends InjectError {
	constructor(
		public readonly target: string,
		public readonly member: MemberName | undefined,
		cause: unknown,
	) {
		const where =
			member === undefined ? target : `${target}.${String(member)}`
		super(`Error invoking ${where}: ${describeCause(cause)}`, { cause })
	}
}

/** Error thrown when an injector receives a missing argument. */
export class ArgumentError extends InjectError {
	constructor(
		public readonly argumentName: string,
		message = `Argument '${argumentName}' must not be null or undefined`,
	) {
		super(message)
	}
}

/**
 * Check whether an error was raised by the injection engine itself
 *
 * Engine errors are rethrown as-is; anything else gets wrapped in an
 * {@link InvocationError}.
 */
export function isInjectError(error: unknown): error is InjectError {
	return error instanceof InjectError
}

/**
 * Turn a failure caught around an invocation into the error to rethrow
 *
 * @param error - The caught value
 * @param target - Name of the type being built or injected
 * @param member - The member being written or called, if any
 * @returns The error itself when it is an {@link InjectError}, otherwise an {@link InvocationError}
 */
export function toInvocationError(
	error: unknown,
	target: string,
	member?: MemberName,
): InjectError {
	return isInjectError(error) ? error : new InvocationError(target, member, error)
}

/**
 * Reject a missing argument
 *
 * @throws {ArgumentError} If `value` is null or undefined
 */
export function requireArgument<T>(
	value: T | null | undefined,
	argumentName: string,
): T {
	if (value === null || value === undefined) {
		throw new ArgumentError(argumentName)
	}
	return value
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause)
}
