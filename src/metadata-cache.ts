import { Logger, LogLevel } from './logger'
import {
	type ConstructorDescriptor,
	InjectionMetadata,
	type MemberDescriptor,
	type MethodDescriptor,
	type ParameterDescriptor,
} from './metadata'
import {
	type ConstructorHandle,
	DecoratorReflector,
	type MemberHandle,
	type ParameterHandle,
	type TypeReflector,
} from './reflection'
import type { Constructor, MemberName } from './types'

/**
 * Options for {@link MetadataCache}
 */
export interface MetadataCacheOptions {
	/** Front end reading the shape of types (default: {@link DecoratorReflector}) */
	reflector?: TypeReflector
	/** Logger shared with the owning injector */
	logger?: Logger
}

// ============================================================================
// Metadata Cache
// ============================================================================

/**
 * Builds {@link InjectionMetadata} for a type on first use and returns the
 * same frozen instance on every later request.
 *
 * Construction is synchronous and never yields, so the check-then-insert in
 * `getOrCreate` cannot interleave with another caller: each type is built
 * at most once and every caller observes the same metadata instance.
 *
 * The cache is owned by an {@link Injector}; there is no process-wide instance.
 *
 * @example
 * const cache = new MetadataCache()
 * const metadata = cache.getOrCreate(UserService)
 * cache.getOrCreate(UserService) === metadata // true
 */
export class MetadataCache {
	private readonly entries = new Map<Constructor, InjectionMetadata>()
	private readonly reflector: TypeReflector
	private readonly logger: Logger

	constructor(options: MetadataCacheOptions = {}) {
		this.reflector = options.reflector ?? new DecoratorReflector()
		this.logger = options.logger ?? new Logger(LogLevel.OFF)
	}

	/**
	 * Get or create the injection metadata for a type
	 *
	 * @param type - The class to describe
	 * @returns The cached metadata
	 */
	getOrCreate(type: Constructor): InjectionMetadata {
		const cached = this.entries.get(type)
		if (cached !== undefined) {
			return cached
		}
		const metadata = this.build(type)
		this.entries.set(type, metadata)
		return metadata
	}

	/**
	 * Get the cached metadata without building it
	 *
	 * @param type - The class to look up
	 * @returns The metadata, or undefined if it was never built
	 */
	tryGet(type: Constructor): InjectionMetadata | undefined {
		return this.entries.get(type)
	}

	/**
	 * Evict one type
	 *
	 * @returns True if the type was cached
	 */
	remove(type: Constructor): boolean {
		return this.entries.delete(type)
	}

	/**
	 * Evict every type
	 */
	clear(): void {
		const count = this.entries.size
		this.entries.clear()
		this.logger.log(
			`Cleared injection metadata for ${count} type(s)`,
			LogLevel.MINIMAL,
		)
	}

	/**
	 * Number of cached types
	 */
	get count(): number {
		return this.entries.size
	}

	// ============================================================================
	// Construction
	// ============================================================================

	private build(type: Constructor): InjectionMetadata {
		this.logger.log(`Building injection metadata for ${type.name}`)

		const constructorDescriptor = this.buildConstructor(type)
		const fields: MemberDescriptor[] = []
		const properties: MemberDescriptor[] = []
		const methods: MethodDescriptor[] = []

		// Most-derived first; a name taken by a subclass hides the ancestor's member
		const seen = new Set<MemberName>()
		let level: Constructor | undefined = type
		while (level !== undefined) {
			const declared = this.reflector
				.declaredMembersOf(level)
				.filter((member) => member.annotated && !seen.has(member.name))

			for (const member of declared) {
				seen.add(member.name)
				this.collect(member, fields, properties, methods)
			}
			level = this.reflector.baseOf(level)
		}

		// Array.prototype.sort is stable: equal orders keep traversal order
		methods.sort((a, b) => a.order - b.order)

		this.logger.log(
			`  -> ${type.name}: constructor=${constructorDescriptor?.handle.name ?? 'none'}, ` +
				`fields=${fields.length}, properties=${properties.length}, methods=${methods.length}`,
		)

		return new InjectionMetadata(
			type,
			constructorDescriptor,
			fields,
			properties,
			methods,
		)
	}

	private collect(
		member: MemberHandle,
		fields: MemberDescriptor[],
		properties: MemberDescriptor[],
		methods: MethodDescriptor[],
	): void {
		switch (member.kind) {
			case 'field':
			case 'property': {
				if (member.kind === 'property' && !member.writable) {
					return
				}
				const descriptor: MemberDescriptor = {
					kind: member.kind,
					name: member.name,
					declaringType: member.declaringType,
					handle: member,
					token: member.token,
					isOptional: member.facts.optional,
					key: member.facts.key,
					fromParent: member.facts.fromParent,
					hasDefaultValue: false,
					defaultValue: undefined,
				}
				if (member.kind === 'field') {
					fields.push(Object.freeze(descriptor))
				} else {
					properties.push(Object.freeze(descriptor))
				}
				return
			}
			case 'method':
				methods.push(
					Object.freeze({
						name: member.name,
						declaringType: member.declaringType,
						order: member.order,
						handle: member,
						parameters: this.buildParameters(member.parameters),
					}),
				)
				return
		}
	}

	/**
	 * Pick the constructor to build instances with
	 *
	 * 1. the first candidate annotated with `@Inject()`
	 * 2. otherwise the public candidate with the most parameters (first wins ties)
	 * 3. otherwise none
	 */
	private buildConstructor(type: Constructor): ConstructorDescriptor | undefined {
		const candidates = this.reflector.constructorsOf(type)

		let selected: ConstructorHandle | undefined = candidates.find(
			(candidate) => candidate.annotated,
		)
		if (selected === undefined) {
			for (const candidate of candidates) {
				if (candidate.visibility !== 'public') continue
				if (
					selected === undefined ||
					candidate.parameters.length > selected.parameters.length
				) {
					selected = candidate
				}
			}
		}

		if (selected === undefined) {
			return undefined
		}

		return Object.freeze({
			type,
			handle: selected,
			parameters: this.buildParameters(selected.parameters),
		})
	}

	private buildParameters(
		parameters: readonly ParameterHandle[],
	): readonly ParameterDescriptor[] {
		return Object.freeze(
			parameters.map((parameter) =>
				Object.freeze({
					index: parameter.index,
					name: parameter.name,
					token: parameter.token,
					isOptional: parameter.facts.optional || parameter.facts.hasDefaultValue,
					key: parameter.facts.key,
					fromParent: parameter.facts.fromParent,
					hasDefaultValue: parameter.facts.hasDefaultValue,
					defaultValue: parameter.facts.defaultValue,
				}),
			),
		)
	}
}
