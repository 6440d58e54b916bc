import { ArgumentPool } from './argument-pool'
import { ConstructorInjector } from './constructor-injector'
import {
	ArgumentError,
	InvocationError,
	NoConstructorError,
	requireArgument,
} from './errors'
import { Logger, LogLevel } from './logger'
import { MemberInjector } from './member-injector'
import type { InjectionMetadata } from './metadata'
import { MetadataCache } from './metadata-cache'
import { MethodInjector } from './method-injector'
import type { TypeReflector } from './reflection'
import {
	type Constructor,
	type InjectParameter,
	isConstructor,
	type ObjectResolver,
} from './types'

// ============================================================================
// Injector
// ============================================================================

/**
 * Options for {@link Injector}
 */
export interface InjectorOptions {
	/** Metadata cache to share between injectors (default: a new one) */
	cache?: MetadataCache
	/** Pool for argument buffers (default: a new one) */
	pool?: ArgumentPool
	/** Reflector for a new cache; cannot be combined with `cache` */
	reflector?: TypeReflector
	/** Initial log level (default: MINIMAL) */
	logLevel?: LogLevel
	/** Logger to write to; `logLevel` is applied to it when both are given */
	logger?: Logger
}

/**
 * Entry point of the injection engine
 *
 * Owns one {@link MetadataCache}, one {@link ArgumentPool} and one
 * {@link Logger}. Injection runs in a fixed order: constructor, fields,
 * properties, then methods sorted by `@Order()`.
 *
 * @example
 * &#64;Injectable()
 * class ReportService {
 *   &#64;Inject() clock!: Clock
 *
 *   constructor(private readonly repo: ReportRepository) {}
 *
 *   &#64;Inject()
 *   configure(&#64;Key('reports') settings: Settings) {
 *     this.pageSize = settings.pageSize
 *   }
 * }
 *
 * const injector = new Injector({ logLevel: LogLevel.OFF })
 * const service = injector.instantiate(ReportService, registry)
 */
export class Injector {
	private readonly logger: Logger
	private readonly cache: MetadataCache
	private readonly constructorInjector: ConstructorInjector
	private readonly fieldInjector: MemberInjector
	private readonly propertyInjector: MemberInjector
	private readonly methodInjector: MethodInjector

	constructor(options: InjectorOptions = {}) {
		if (options.cache !== undefined && options.reflector !== undefined) {
			throw new ArgumentError(
				'reflector',
				'A reflector only configures a new cache; pass either cache or reflector',
			)
		}

		this.logger = options.logger ?? new Logger(options.logLevel ?? LogLevel.MINIMAL)
		if (options.logger !== undefined && options.logLevel !== undefined) {
			this.logger.setLevel(options.logLevel)
		}

		this.cache =
			options.cache ??
			new MetadataCache({ reflector: options.reflector, logger: this.logger })
		const pool = options.pool ?? new ArgumentPool()

		this.constructorInjector = new ConstructorInjector(pool, this.logger)
		this.fieldInjector = new MemberInjector('field', this.logger)
		this.propertyInjector = new MemberInjector('property', this.logger)
		this.methodInjector = new MethodInjector(pool, this.logger)
	}

	/**
	 * Set the logging level
	 *
	 * @param level - The desired log level
	 *
	 * @example
	 * injector.setLogLevel(LogLevel.VERBOSE)
	 */
	public setLogLevel(level: LogLevel): void {
		this.logger.setLevel(level)
	}

	/**
	 * Get the current logging level
	 *
	 * @returns The current log level
	 */
	public getLogLevel(): LogLevel {
		return this.logger.getLevel()
	}

	/**
	 * Get the injection metadata of a type, building it on first use
	 *
	 * @param type - The class to describe
	 * @returns The cached metadata
	 */
	public getMetadata(type: Constructor | null | undefined): InjectionMetadata {
		return this.cache.getOrCreate(requireArgument(type, 'type'))
	}

	/**
	 * Whether the type has any injection point (constructor included)
	 *
	 * @param type - The class to check
	 */
	public requiresInjection(type: Constructor | null | undefined): boolean {
		return this.getMetadata(type).hasInjectionPoints
	}

	/**
	 * Drop every cached metadata entry
	 */
	public clearCache(): void {
		this.cache.clear()
	}

	/**
	 * Build an instance through its selected constructor, without member injection
	 *
	 * @param type - The class to build
	 * @param resolver - Source of dependencies
	 * @param overrides - Explicit values for this call
	 * @returns The new instance
	 * @throws {NoConstructorError} If the type has no selectable constructor
	 * @throws {ResolutionError} If a required parameter cannot be resolved
	 * @throws {InvocationError} If construction fails or a factory returns something else
	 */
	public createInstance<T>(
		type: Constructor<T> | null | undefined,
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): T {
		const target = requireArgument(type, 'type')
		const source = requireArgument(resolver, 'resolver')
		const descriptor = this.cache.getOrCreate(target).constructorDescriptor
		if (descriptor === undefined) {
			throw new NoConstructorError(target)
		}

		this.logger.log(`Creating ${target.name}`)
		try {
			const instance = this.constructorInjector.createInstance(
				descriptor,
				source,
				overrides,
			)
			if (!(instance instanceof target)) {
				throw new InvocationError(
					target.name,
					undefined,
					new TypeError(`${descriptor.handle.name} did not return an instance of ${target.name}`),
				)
			}
			return instance
		} catch (error) {
			this.logFailure(`create ${target.name}`, error)
			throw error
		}
	}

	/**
	 * Inject fields, then properties, then methods into an existing instance
	 *
	 * @param instance - The object to fill
	 * @param type - The type whose metadata applies (usually the instance's class)
	 * @param resolver - Source of dependencies
	 * @param overrides - Explicit values for this call
	 * @throws {ResolutionError} If a required member or parameter cannot be resolved
	 * @throws {InvocationError} If a write or a method fails; earlier steps stay applied
	 */
	public injectAll(
		instance: object | null | undefined,
		type: Constructor | null | undefined,
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): void {
		const target = requireArgument(instance, 'instance')
		const source = requireArgument(resolver, 'resolver')
		const metadata = this.getMetadata(type)

		this.logger.log(`Injecting members of ${metadata.type.name}`)
		try {
			this.fieldInjector.inject(target, metadata.fields, source, overrides)
			this.propertyInjector.inject(target, metadata.properties, source, overrides)
			this.methodInjector.inject(target, metadata.methods, source, overrides)
		} catch (error) {
			this.logFailure(`inject ${metadata.type.name}`, error)
			throw error
		}
	}

	/**
	 * Inject into an existing instance using the metadata of its own class
	 *
	 * @param instance - The object to fill
	 * @param resolver - Source of dependencies
	 * @param overrides - Explicit values for this call
	 */
	public inject(
		instance: object | null | undefined,
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): void {
		const target = requireArgument(instance, 'instance')
		const type: unknown = target.constructor
		if (!isConstructor(type)) {
			throw new ArgumentError('instance', 'Instance has no constructor to read metadata from')
		}
		this.injectAll(target, type, resolver, overrides)
	}

	/**
	 * Build an instance and inject all of its members
	 *
	 * @param type - The class to build
	 * @param resolver - Source of dependencies
	 * @param overrides - Explicit values for this call, shared by every step
	 * @returns The fully injected instance
	 *
	 * @example
	 * const mailer = injector.instantiate(Mailer, registry, [
	 *   new NamedParameter('sender', 'noreply@example.com'),
	 * ])
	 */
	public instantiate<T extends object>(
		type: Constructor<T> | null | undefined,
		resolver: ObjectResolver | null | undefined,
		overrides?: readonly InjectParameter[],
	): T {
		const instance = this.createInstance(type, resolver, overrides)
		this.injectAll(instance, type, resolver, overrides)
		this.logger.log(`Instantiated ${instance.constructor.name}`)
		return instance
	}

	private logFailure(action: string, error: unknown): void {
		const message = error instanceof Error ? error.message : String(error)
		this.logger.error(`  ✗ Failed to ${action}: ${message}`)
	}
}
