import {
	NoParentContainerError,
	ResolutionError,
	ServiceNotRegisteredError,
} from './errors'
import type { DependencyDescriptor } from './metadata'
import type { InjectionToken, InjectParameter, ObjectResolver } from './types'

// ============================================================================
// Zero Values
// ============================================================================

const ZERO_VALUES = new Map<unknown, unknown>([
	[Number, 0],
	[Boolean, false],
	[BigInt, BigInt(0)],
])

/**
 * The value a dependency of the given token takes when nothing supplies it
 *
 * Numeric and boolean types have a zero value; everything else is absent.
 *
 * @example
 * zeroValueOf(Number) // 0
 * zeroValueOf(Logger) // undefined
 */
export function zeroValueOf(token: InjectionToken): unknown {
	return ZERO_VALUES.get(token)
}

/**
 * Whether `value` carries no information for a dependency of `token`
 * (its zero value, or null/undefined for reference types)
 */
export function isZeroValue(value: unknown, token: InjectionToken): boolean {
	const zero = zeroValueOf(token)
	return zero === undefined ? value === undefined || value === null : value === zero
}

function fallbackValue(descriptor: DependencyDescriptor): unknown {
	return descriptor.hasDefaultValue
		? descriptor.defaultValue
		: zeroValueOf(descriptor.token)
}

// ============================================================================
// Parameter Resolver
// ============================================================================

/**
 * Outcome of resolving one dependency without throwing
 */
export type ResolutionOutcome =
	| { readonly found: true; readonly value: unknown }
	| { readonly found: false; readonly error: ResolutionError }

function resolved(value: unknown): ResolutionOutcome {
	return { found: true, value }
}

/**
 * Resolve one dependency, reporting an unrecoverable miss as a value
 *
 * First match wins:
 * 1. explicit override
 * 2. from-parent (keyed when the descriptor has a key)
 * 3. keyed
 * 4. ordinary resolution
 * 5. default / zero value when optional, otherwise "not registered"
 *
 * Failures thrown by the resolver itself (a required keyed or parent
 * lookup) propagate unchanged. An optional keyed lookup also recovers from a
 * {@link ResolutionError} thrown while producing the keyed value.
 *
 * @param descriptor - The dependency to resolve
 * @param resolver - The resolver to resolve through
 * @param overrides - Explicit overrides for this call
 */
export function tryResolveValue(
	descriptor: DependencyDescriptor,
	resolver: ObjectResolver,
	overrides?: readonly InjectParameter[],
): ResolutionOutcome {
	const { token, key } = descriptor

	if (overrides !== undefined) {
		for (const override of overrides) {
			if (override.canSupply(token, descriptor.name)) {
				return resolved(override.getValue(resolver))
			}
		}
	}

	const recoverable = descriptor.isOptional || descriptor.hasDefaultValue

	if (descriptor.fromParent) {
		const parent = resolver.parent
		if (parent === undefined) {
			return recoverable
				? resolved(fallbackValue(descriptor))
				: { found: false, error: new NoParentContainerError(token) }
		}
		return resolved(
			key === undefined ? parent.resolve(token) : parent.resolveKeyed(token, key),
		)
	}

	if (key !== undefined) {
		if (!recoverable) {
			return resolved(resolver.resolveKeyed(token, key))
		}
		try {
			const lookup = resolver.tryResolveKeyed(token, key)
			return resolved(lookup.found ? lookup.value : fallbackValue(descriptor))
		} catch (error) {
			// A registered key whose own dependencies are missing
			if (error instanceof ResolutionError) {
				return resolved(fallbackValue(descriptor))
			}
			throw error
		}
	}

	const lookup = resolver.tryResolve(token)
	if (lookup.found) {
		return resolved(lookup.value)
	}

	return recoverable
		? resolved(fallbackValue(descriptor))
		: { found: false, error: new ServiceNotRegisteredError(token) }
}

/**
 * Resolve one dependency
 *
 * @returns The resolved value
 * @throws {NoParentContainerError} A required from-parent dependency on a root resolver
 * @throws {ServiceNotRegisteredError} A required dependency nothing supplies
 *
 * @example
 * const value = resolveValue(metadata.fields[0], registry)
 */
export function resolveValue(
	descriptor: DependencyDescriptor,
	resolver: ObjectResolver,
	overrides?: readonly InjectParameter[],
): unknown {
	const outcome = tryResolveValue(descriptor, resolver, overrides)
	if (!outcome.found) {
		throw outcome.error
	}
	return outcome.value
}
