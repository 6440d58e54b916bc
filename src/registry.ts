import {
	ArgumentError,
	CircularDependencyError,
	ServiceNotRegisteredError,
} from './errors'
import { Injector } from './injector'
import { Logger, LogLevel } from './logger'
import {
	type Constructor,
	found,
	getTokenName,
	type InjectionToken,
	type Lookup,
	NOT_FOUND,
	type ObjectResolver,
} from './types'

/**
 * Produces a service each time it is resolved
 *
 * @template T - The type of service produced
 */
export type ServiceFactory<T = unknown> = (resolver: ObjectResolver) => T

type Registration =
	| { readonly kind: 'value'; readonly label: string; readonly value: unknown }
	| {
			readonly kind: 'factory'
			readonly label: string
			readonly factory: ServiceFactory
	  }

/**
 * Options for {@link ServiceRegistry}
 */
export interface ServiceRegistryOptions {
	/** Injector used by {@link ServiceRegistry.registerType} (default: a new one) */
	injector?: Injector
	/** Logger for registrations (default: the injector's level, or OFF) */
	logger?: Logger
}

// ============================================================================
// Service Registry
// ============================================================================

/**
 * Minimal in-memory {@link ObjectResolver}
 *
 * Holds values and factories by token (and optionally by key). Lookups that
 * miss fall back to the parent registry. Nothing is cached: a factory runs
 * on every resolution.
 *
 * @example
 * const root = new ServiceRegistry()
 * root.register('CONFIG', { url: 'postgres://localhost/test' })
 * root.registerType(UserRepository)
 *
 * const request = root.createChild()
 * request.registerKeyed(Database, 'replica', replica)
 * const service = request.resolve(UserRepository)
 */
export class ServiceRegistry implements ObjectResolver {
	private readonly entries = new Map<InjectionToken, Registration>()
	private readonly keyedEntries = new Map<
		InjectionToken,
		Map<string, Registration>
	>()

	// Registrations currently being produced, to detect circular dependencies
	private readonly resolutionStack = new Set<Registration>()

	private readonly injector: Injector
	private readonly logger: Logger

	constructor(
		options: ServiceRegistryOptions = {},
		public readonly parent: ServiceRegistry | undefined = undefined,
	) {
		this.injector = options.injector ?? new Injector({ logLevel: LogLevel.OFF })
		this.logger =
			options.logger ?? new Logger(options.injector?.getLogLevel() ?? LogLevel.OFF)
	}

	/**
	 * Create a child scope that falls back to this registry
	 *
	 * The child shares this registry's injector and logger.
	 */
	public createChild(): ServiceRegistry {
		return new ServiceRegistry(
			{ injector: this.injector, logger: this.logger },
			this,
		)
	}

	// ============================================================================
	// Registration
	// ============================================================================

	/**
	 * Register a fixed value
	 *
	 * @param token - The token the value is resolved by
	 * @param value - The value
	 * @returns This registry, for chaining
	 */
	public register<T>(token: InjectionToken<T>, value: T): this {
		this.logger.log(`Registering value: ${getTokenName(token)}`)
		this.entries.set(token, { kind: 'value', label: getTokenName(token), value })
		return this
	}

	/**
	 * Register a factory that runs on every resolution
	 *
	 * @param token - The token the service is resolved by
	 * @param factory - Receives the registry that holds the registration
	 * @returns This registry, for chaining
	 */
	public registerFactory<T>(
		token: InjectionToken<T>,
		factory: ServiceFactory<T>,
	): this {
		this.logger.log(`Registering factory: ${getTokenName(token)}`)
		this.entries.set(token, {
			kind: 'factory',
			label: getTokenName(token),
			factory,
		})
		return this
	}

	/**
	 * Register a class built by the injector on every resolution
	 *
	 * @param token - The token the service is resolved by, or the class itself
	 * @param type - The class to build (default: `token`)
	 * @returns This registry, for chaining
	 * @throws {ArgumentError} If no class is given and the token is not one
	 *
	 * @example
	 * registry.registerType(UserRepository)
	 * registry.registerType('REPOSITORY', SqlUserRepository)
	 */
	public registerType<T extends object>(
		token: InjectionToken<T>,
		type?: Constructor<T>,
	): this {
		const implementation = type ?? (typeof token === 'function' ? token : undefined)
		if (implementation === undefined) {
			throw new ArgumentError(
				'type',
				`A class is required to register '${getTokenName(token)}'`,
			)
		}
		return this.registerFactory(token, (resolver) =>
			this.injector.instantiate(implementation, resolver),
		)
	}

	/**
	 * Register a fixed value under a token and key
	 *
	 * @returns This registry, for chaining
	 */
	public registerKeyed<T>(token: InjectionToken<T>, key: string, value: T): this {
		this.logger.log(`Registering keyed value: ${getTokenName(token)} (key: '${key}')`)
		this.keyedBucket(token).set(key, {
			kind: 'value',
			label: `${getTokenName(token)}[${key}]`,
			value,
		})
		return this
	}

	/**
	 * Register a factory under a token and key
	 *
	 * @returns This registry, for chaining
	 */
	public registerKeyedFactory<T>(
		token: InjectionToken<T>,
		key: string,
		factory: ServiceFactory<T>,
	): this {
		this.logger.log(`Registering keyed factory: ${getTokenName(token)} (key: '${key}')`)
		this.keyedBucket(token).set(key, {
			kind: 'factory',
			label: `${getTokenName(token)}[${key}]`,
			factory,
		})
		return this
	}

	/**
	 * Whether this registry or an ancestor can resolve the token
	 */
	public isRegistered(token: InjectionToken): boolean {
		return this.entries.has(token) || (this.parent?.isRegistered(token) ?? false)
	}

	/**
	 * Whether this registry or an ancestor can resolve the token and key
	 */
	public isRegisteredKeyed(token: InjectionToken, key: string): boolean {
		return (
			(this.keyedEntries.get(token)?.has(key) ?? false) ||
			(this.parent?.isRegisteredKeyed(token, key) ?? false)
		)
	}

	// ============================================================================
	// ObjectResolver
	// ============================================================================

	public resolve<T = unknown>(token: InjectionToken<T>): T {
		const lookup = this.tryResolve(token)
		if (!lookup.found) {
			throw new ServiceNotRegisteredError(token)
		}
		return lookup.value
	}

	public tryResolve<T = unknown>(token: InjectionToken<T>): Lookup<T> {
		const registration = this.entries.get(token)
		if (registration !== undefined) {
			return found(this.produce<T>(token, registration))
		}
		return this.parent?.tryResolve(token) ?? NOT_FOUND
	}

	public resolveKeyed<T = unknown>(token: InjectionToken<T>, key: string): T {
		const lookup = this.tryResolveKeyed(token, key)
		if (!lookup.found) {
			throw new ServiceNotRegisteredError(token, key)
		}
		return lookup.value
	}

	public tryResolveKeyed<T = unknown>(
		token: InjectionToken<T>,
		key: string,
	): Lookup<T> {
		const registration = this.keyedEntries.get(token)?.get(key)
		if (registration !== undefined) {
			return found(this.produce<T>(token, registration))
		}
		return this.parent?.tryResolveKeyed(token, key) ?? NOT_FOUND
	}

	// ============================================================================
	// Internals
	// ============================================================================

	private keyedBucket(token: InjectionToken): Map<string, Registration> {
		let bucket = this.keyedEntries.get(token)
		if (bucket === undefined) {
			bucket = new Map()
			this.keyedEntries.set(token, bucket)
		}
		return bucket
	}

	private produce<T>(token: InjectionToken<T>, registration: Registration): T {
		if (registration.kind === 'value') {
			return registration.value as T
		}

		if (this.resolutionStack.has(registration)) {
			const chain = Array.from(this.resolutionStack, (entry) => entry.label)
			throw new CircularDependencyError(token, chain)
		}

		this.resolutionStack.add(registration)
		try {
			this.logger.log(`Resolving: ${registration.label}`)
			return registration.factory(this) as T
		} finally {
			this.resolutionStack.delete(registration)
		}
	}
}
