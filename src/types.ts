// ============================================================================
// Type Definitions
// ============================================================================

/**
 * A constructor function that creates instances of type T
 * @template T - The type of instance the constructor creates
 * @example
 * class MyService {}
 * const ctor: Constructor<MyService> = MyService
 */
// biome-ignore lint/suspicious/noExplicitAny: Constructor args can be any type
export type Constructor<T = unknown> = new (...args: any[]) => T

/**
 * Token used to identify a dependency
 * Can be a string, symbol, or class constructor
 * @template T - The type of value associated with this token
 * @example
 * const TOKEN: InjectionToken<string> = 'MY_TOKEN'
 * const SYMBOL_TOKEN: InjectionToken<number> = Symbol('COUNT')
 * const CLASS_TOKEN: InjectionToken<MyService> = MyService
 */
export type InjectionToken<T = unknown> = string | symbol | Constructor<T>

/**
 * Name of a parameter or member taking part in injection
 */
export type MemberName = string | symbol

// ============================================================================
// Lookup (option type for non-throwing resolution)
// ============================================================================

/**
 * Result of a non-throwing lookup
 *
 * A registered value can itself be `undefined`, so absence is modelled
 * explicitly instead of overloading `undefined`.
 *
 * @template T - The type of the value looked up
 * @example
 * const lookup = resolver.tryResolve(Logger)
 * if (lookup.found) {
 *   lookup.value.info('ready')
 * }
 */
export type Lookup<T> =
	| { readonly found: true; readonly value: T }
	| { readonly found: false }

/**
 * Shared "nothing found" lookup result
 */
export const NOT_FOUND: Lookup<never> = Object.freeze({ found: false as const })

/**
 * Wrap a value in a successful lookup result
 *
 * @param value - The value that was found
 * @returns A lookup with `found: true`
 */
export function found<T>(value: T): Lookup<T> {
	return { found: true, value }
}

// ============================================================================
// Object Resolver (consumed collaborator)
// ============================================================================

/**
 * Capability the injection engine resolves dependencies through
 *
 * The engine never registers anything; it only asks an ObjectResolver for
 * already-registered dependencies, optionally by key, and walks to the
 * enclosing scope through `parent` for `@FromParent()` dependencies.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register(Logger, new ConsoleLogger())
 * injector.instantiate(UserService, registry)
 */
export interface ObjectResolver {
	/** The enclosing scope, if any */
	readonly parent: ObjectResolver | undefined

	/**
	 * Resolve a dependency by token
	 * @throws {ResolutionError} If nothing is registered for the token
	 */
	resolve<T = unknown>(token: InjectionToken<T>): T

	/**
	 * Look up a dependency by token without throwing for "not registered"
	 */
	tryResolve<T = unknown>(token: InjectionToken<T>): Lookup<T>

	/**
	 * Resolve a dependency registered under a token and key
	 * @throws {ResolutionError} If nothing is registered for the token and key
	 */
	resolveKeyed<T = unknown>(token: InjectionToken<T>, key: string): T

	/**
	 * Look up a keyed dependency without throwing for "not registered"
	 */
	tryResolveKeyed<T = unknown>(token: InjectionToken<T>, key: string): Lookup<T>
}

// ============================================================================
// Explicit Overrides
// ============================================================================

/**
 * Caller-supplied value provider that takes precedence over every other
 * resolution strategy for a single `createInstance` / `injectAll` call
 *
 * @example
 * injector.createInstance(Mailer, registry, [
 *   new NamedParameter('sender', 'noreply@example.com'),
 * ])
 */
export interface InjectParameter {
	/**
	 * Whether this override supplies the dependency with the given token and name
	 */
	canSupply(token: InjectionToken, name: MemberName): boolean

	/**
	 * Produce the override value
	 */
	getValue(resolver: ObjectResolver): unknown
}

/**
 * Check whether a value can serve as a class token
 *
 * @param value - The value to check
 */
export function isConstructor(value: unknown): value is Constructor {
	return typeof value === 'function'
}

/**
 * Get a human-readable name for a token
 *
 * @param token - The injection token
 * @returns A string representation of the token
 */
export function getTokenName(token: InjectionToken): string {
	if (typeof token === 'function') {
		return token.name
	}
	return String(token)
}
