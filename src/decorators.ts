import 'reflect-metadata'
import type { Constructor, InjectionToken, MemberName } from './types'

// ============================================================================
// Metadata Keys
// ============================================================================

/** Class-level options stored by `@Injectable()` */
export const INJECTABLE_OPTIONS = 'injectable:options'
/** Marks the class constructor itself as the annotated constructor */
export const INJECT_CONSTRUCTOR = 'inject:constructor'
/** Sparse array of {@link ParameterFacts}, keyed by owner and member */
export const INJECT_PARAMETERS = 'inject:parameters'
/** Map of member name to {@link MemberFacts}, stored on the prototype (instance) or class (static) */
export const INJECT_MEMBERS = 'inject:members'

// ============================================================================
// Facts recorded by the decorators
// ============================================================================

/**
 * Facts recorded for one constructor or method parameter
 */
export interface ParameterFacts {
	token?: InjectionToken
	optional?: boolean
	key?: string
	fromParent?: boolean
	hasDefault?: boolean
	defaultValue?: unknown
}

/**
 * Facts recorded for one decorated member
 *
 * `factory` members are static methods acting as alternative constructors.
 */
export interface MemberFacts {
	kind: 'field' | 'property' | 'method' | 'factory'
	inject: boolean
	token?: InjectionToken
	optional: boolean
	key?: string
	fromParent: boolean
	order: number
	internal: boolean
}

/**
 * Decorator usable on classes, parameters, fields, accessors and methods
 *
 * Each decorator validates where it was applied and throws a TypeError
 * when the placement makes no sense (e.g. `@Order()` on a parameter).
 */
export type InjectionDecorator = (
	target: object,
	propertyKey?: MemberName,
	indexOrDescriptor?: number | PropertyDescriptor,
) => void

type DecorationSite =
	| { kind: 'class'; owner: object }
	| {
			kind: 'parameter'
			owner: object
			member: MemberName | undefined
			index: number
	  }
	| { kind: 'field'; owner: object; member: MemberName; isStatic: boolean }
	| { kind: 'property'; owner: object; member: MemberName; isStatic: boolean }
	| { kind: 'method'; owner: object; member: MemberName; isStatic: boolean }

function classify(
	target: object,
	propertyKey: MemberName | undefined,
	indexOrDescriptor: number | PropertyDescriptor | undefined,
): DecorationSite {
	if (typeof indexOrDescriptor === 'number') {
		return {
			kind: 'parameter',
			owner: target,
			member: propertyKey,
			index: indexOrDescriptor,
		}
	}
	if (propertyKey === undefined) {
		return { kind: 'class', owner: target }
	}
	const isStatic = typeof target === 'function'
	if (indexOrDescriptor === undefined) {
		return { kind: 'field', owner: target, member: propertyKey, isStatic }
	}
	if (
		indexOrDescriptor.get !== undefined ||
		indexOrDescriptor.set !== undefined
	) {
		return { kind: 'property', owner: target, member: propertyKey, isStatic }
	}
	return { kind: 'method', owner: target, member: propertyKey, isStatic }
}

function describeSite(site: DecorationSite): string {
	switch (site.kind) {
		case 'class':
			return 'a class'
		case 'parameter':
			return `parameter #${site.index}`
		default:
			return `${site.isStatic ? 'static ' : ''}${site.kind} '${String(site.member)}'`
	}
}

function misplaced(decorator: string, site: DecorationSite): TypeError {
	return new TypeError(`${decorator} cannot decorate ${describeSite(site)}`)
}

// ============================================================================
// Metadata Storage Helpers
// ============================================================================

function getOwn(
	metadataKey: string,
	target: object,
	member?: MemberName,
): unknown {
	return member === undefined
		? Reflect.getOwnMetadata(metadataKey, target)
		: Reflect.getOwnMetadata(metadataKey, target, member)
}

function defineOwn(
	metadataKey: string,
	value: unknown,
	target: object,
	member?: MemberName,
): void {
	if (member === undefined) {
		Reflect.defineMetadata(metadataKey, value, target)
	} else {
		Reflect.defineMetadata(metadataKey, value, target, member)
	}
}

/**
 * Read the parameter facts recorded on a constructor (no member) or method
 *
 * @param owner - The class (constructor and static methods) or prototype (instance methods)
 * @param member - The method name, or undefined for the class constructor
 * @returns A sparse array of facts indexed by parameter position
 */
export function getParameterFacts(
	owner: object,
	member?: MemberName,
): ReadonlyArray<ParameterFacts | undefined> {
	const stored = getOwn(INJECT_PARAMETERS, owner, member)
	return Array.isArray(stored) ? stored : []
}

/**
 * Read the member facts recorded on a prototype (instance members) or class (static members)
 *
 * @param owner - The prototype or class that declares the members
 * @returns Facts keyed by member name, in declaration order
 */
export function getMemberFacts(
	owner: object,
): ReadonlyMap<MemberName, MemberFacts> {
	const stored = getOwn(INJECT_MEMBERS, owner)
	return stored instanceof Map ? stored : new Map()
}

function updateParameter(
	site: Extract<DecorationSite, { kind: 'parameter' }>,
	patch: ParameterFacts,
): void {
	// Copy so a subclass never writes into the array it would otherwise inherit
	const facts = [...getParameterFacts(site.owner, site.member)]
	facts[site.index] = { ...facts[site.index], ...patch }
	defineOwn(INJECT_PARAMETERS, facts, site.owner, site.member)
}

function updateMember(
	site: Extract<DecorationSite, { kind: 'field' | 'property' | 'method' }>,
	kind: MemberFacts['kind'],
	patch: Partial<MemberFacts>,
): void {
	const members = new Map(getMemberFacts(site.owner))
	const existing = members.get(site.member) ?? {
		kind,
		inject: false,
		optional: false,
		fromParent: false,
		order: 0,
		internal: false,
	}
	members.set(site.member, { ...existing, ...patch, kind })
	defineOwn(INJECT_MEMBERS, members, site.owner)
}

/**
 * Apply a dependency fact (optional / key / fromParent) to a parameter, field or accessor
 */
function applyDependencyFact(
	decorator: string,
	patch: Pick<ParameterFacts, 'optional' | 'key' | 'fromParent'>,
): InjectionDecorator {
	return (target, propertyKey, indexOrDescriptor) => {
		const site = classify(target, propertyKey, indexOrDescriptor)
		switch (site.kind) {
			case 'parameter':
				updateParameter(site, patch)
				return
			case 'field':
			case 'property':
				if (site.isStatic) {
					throw misplaced(decorator, site)
				}
				updateMember(site, site.kind, patch)
				return
			default:
				throw misplaced(decorator, site)
		}
	}
}

// ============================================================================
// Decorators
// ============================================================================

/**
 * Options for @Injectable decorator
 */
export interface InjectableOptions {
	/**
	 * Whether the class constructor may be selected by the injector
	 * - public (default): the constructor is a candidate
	 * - internal: only `@Factory()` / `@Inject()` static methods are candidates
	 */
	constructorVisibility?: 'public' | 'internal'

	/**
	 * Custom metadata for the injectable
	 */
	metadata?: Record<string, unknown>

	/**
	 * Additional options (for future extensibility)
	 */
	[key: string]: unknown
}

/**
 * Injectable class decorator
 *
 * Stores options for the injector. Any class decorator also makes TypeScript
 * emit `design:paramtypes` for the constructor.
 *
 * @param options - Optional configuration for the injectable
 * @returns A class decorator
 *
 * @example
 * &#64;Injectable()
 * class UserService {
 *   constructor(private readonly repo: UserRepository) {}
 * }
 *
 * @example
 * // Only the static factory may be used to build instances
 * &#64;Injectable({ constructorVisibility: 'internal' })
 * class Connection {
 *   &#64;Factory()
 *   static open(config: Config) {
 *     return new Connection(config.url)
 *   }
 *   constructor(readonly url: string) {}
 * }
 */
export function Injectable(options?: InjectableOptions): ClassDecorator {
	return (target: object) => {
		const metadata: InjectableOptions = {
			constructorVisibility: 'public',
			...(options || {}),
		}
		Reflect.defineMetadata(INJECTABLE_OPTIONS, metadata, target)
	}
}

/**
 * Get injectable metadata from a class
 *
 * @param target - The class to get metadata from
 * @returns The injectable options or undefined if not decorated with @Injectable
 *
 * @example
 * &#64;Injectable({ metadata: { role: 'service' } })
 * class MyService {}
 *
 * const metadata = getInjectableMetadata(MyService)
 * console.log(metadata?.metadata) // { role: 'service' }
 */
export function getInjectableMetadata(
	target: Constructor,
): InjectableOptions | undefined {
	const stored = getOwn(INJECTABLE_OPTIONS, target)
	return isInjectableOptions(stored) ? stored : undefined
}

function isInjectableOptions(value: unknown): value is InjectableOptions {
	return typeof value === 'object' && value !== null
}

/**
 * Inject decorator
 *
 * Marks an injection point. Where it is placed decides what it means:
 * - class: the class constructor is the annotated constructor
 * - constructor/method parameter: resolve the parameter by `token`
 * - field or accessor: inject the member (by `token` when given)
 * - instance method: call the method with resolved arguments after construction
 * - static method: an annotated factory constructor
 *
 * @param token - Optional injection token overriding the design-time type
 * @returns A decorator
 *
 * @example
 * &#64;Injectable()
 * class ReportService {
 *   &#64;Inject() logger!: Logger
 *
 *   constructor(&#64;Inject('CONFIG') private config: Config) {}
 *
 *   &#64;Inject()
 *   init(clock: Clock) {
 *     this.startedAt = clock.now()
 *   }
 * }
 */
export function Inject(token?: InjectionToken): InjectionDecorator {
	return (target, propertyKey, indexOrDescriptor) => {
		const site = classify(target, propertyKey, indexOrDescriptor)
		switch (site.kind) {
			case 'class':
				Reflect.defineMetadata(INJECT_CONSTRUCTOR, true, site.owner)
				return
			case 'parameter':
				if (token !== undefined) {
					updateParameter(site, { token })
				}
				return
			case 'field':
			case 'property':
				if (site.isStatic) {
					throw misplaced('@Inject()', site)
				}
				updateMember(
					site,
					site.kind,
					token === undefined ? { inject: true } : { inject: true, token },
				)
				return
			case 'method':
				updateMember(site, site.isStatic ? 'factory' : 'method', {
					inject: true,
				})
				return
		}
	}
}

/**
 * Optional decorator
 *
 * An optional dependency that cannot be resolved falls back to its default
 * (or the zero value of its type) instead of failing.
 *
 * @example
 * class Notifier {
 *   constructor(&#64;Optional() private readonly sms?: SmsGateway) {}
 * }
 */
export function Optional(): InjectionDecorator {
	return applyDependencyFact('@Optional()', { optional: true })
}

/**
 * Key decorator
 *
 * Resolve the dependency as a keyed registration.
 *
 * @param key - Discriminator between several registrations of the same token
 *
 * @example
 * class Replicator {
 *   constructor(
 *     &#64;Key('primary') private readonly primary: Database,
 *     &#64;Key('replica') private readonly replica: Database,
 *   ) {}
 * }
 */
export function Key(key: string): InjectionDecorator {
	return applyDependencyFact('@Key()', { key })
}

/**
 * FromParent decorator
 *
 * Resolve the dependency from the resolver's parent scope.
 *
 * @example
 * class RequestHandler {
 *   &#64;Inject() &#64;FromParent() settings!: Settings
 * }
 */
export function FromParent(): InjectionDecorator {
	return applyDependencyFact('@FromParent()', { fromParent: true })
}

/**
 * Default decorator
 *
 * Declares the value a parameter takes when it cannot be resolved.
 * A parameter with a default is optional.
 *
 * @param value - The default value
 *
 * @example
 * class Poller {
 *   constructor(&#64;Default(1000) private readonly intervalMs: number) {}
 * }
 */
export function Default(value: unknown): InjectionDecorator {
	return (target, propertyKey, indexOrDescriptor) => {
		const site = classify(target, propertyKey, indexOrDescriptor)
		if (site.kind !== 'parameter') {
			throw misplaced('@Default()', site)
		}
		updateParameter(site, {
			optional: true,
			hasDefault: true,
			defaultValue: value,
		})
	}
}

/**
 * Order decorator
 *
 * Injection methods run in ascending order; methods with the same order run
 * in the order they were declared.
 *
 * @param order - The method's position (default 0)
 *
 * @example
 * class Plugin {
 *   &#64;Inject() &#64;Order(1) start(bus: EventBus) {}
 *   &#64;Inject() configure(settings: Settings) {}
 * }
 */
export function Order(order: number): InjectionDecorator {
	return (target, propertyKey, indexOrDescriptor) => {
		const site = classify(target, propertyKey, indexOrDescriptor)
		if (site.kind !== 'method' || site.isStatic) {
			throw misplaced('@Order()', site)
		}
		updateMember(site, 'method', { order })
	}
}

/**
 * Options for @Factory decorator
 */
export interface FactoryOptions {
	/** Hide the factory from constructor selection unless it is also `@Inject()` */
	internal?: boolean
}

/**
 * Factory decorator
 *
 * Registers a static method as an alternative constructor. Without an
 * `@Inject()` annotation, the public candidate with the most parameters wins.
 * Below, `fromRates` wins; were it internal, the constructor would run with
 * `rate` at its default of 1 unless a `Number` is registered.
 *
 * @param options - Optional configuration for the factory
 *
 * @example
 * &#64;Injectable()
 * class Money {
 *   &#64;Factory()
 *   static fromRates(rates: RateTable, currency: Currency) {
 *     return new Money(rates.get(currency))
 *   }
 *   constructor(readonly rate = 1) {}
 * }
 */
export function Factory(options?: FactoryOptions): InjectionDecorator {
	return (target, propertyKey, indexOrDescriptor) => {
		const site = classify(target, propertyKey, indexOrDescriptor)
		if (site.kind !== 'method' || !site.isStatic) {
			throw misplaced('@Factory()', site)
		}
		updateMember(site, 'factory', { internal: options?.internal === true })
	}
}
