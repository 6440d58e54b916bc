import 'reflect-metadata'
import {
	getInjectableMetadata,
	getMemberFacts,
	getParameterFacts,
	INJECT_CONSTRUCTOR,
	type MemberFacts,
	type ParameterFacts,
} from './decorators'
import {
	type Constructor,
	type InjectionToken,
	isConstructor,
	type MemberName,
} from './types'

// ============================================================================
// Type Descriptor + Member Handle capability
// ============================================================================

/**
 * Dependency facts attached to a parameter, field or property
 */
export interface DependencyFacts {
	readonly optional: boolean
	readonly key: string | undefined
	readonly fromParent: boolean
	readonly hasDefaultValue: boolean
	readonly defaultValue: unknown
}

export interface ParameterHandle {
	readonly index: number
	readonly name: string
	readonly token: InjectionToken
	readonly facts: DependencyFacts
}

/**
 * A way to build an instance: the class constructor or a static factory
 */
export interface ConstructorHandle {
	readonly name: string
	readonly visibility: 'public' | 'internal'
	/** Explicitly marked with `@Inject()` */
	readonly annotated: boolean
	readonly parameters: readonly ParameterHandle[]
	invoke(args: readonly unknown[]): unknown
}

interface MemberHandleBase {
	readonly name: MemberName
	readonly declaringType: Constructor
	/** Explicitly marked with `@Inject()` */
	readonly annotated: boolean
}

export interface FieldHandle extends MemberHandleBase {
	readonly kind: 'field'
	readonly token: InjectionToken
	readonly facts: DependencyFacts
	/** @returns false when the runtime refused the write */
	set(instance: object, value: unknown): boolean
}

export interface PropertyHandle extends MemberHandleBase {
	readonly kind: 'property'
	readonly token: InjectionToken
	readonly facts: DependencyFacts
	readonly writable: boolean
	/** @returns false when the runtime refused the write */
	set(instance: object, value: unknown): boolean
}

export interface MethodHandle extends MemberHandleBase {
	readonly kind: 'method'
	readonly order: number
	readonly parameters: readonly ParameterHandle[]
	invoke(instance: object, args: readonly unknown[]): unknown
}

export type MemberHandle = FieldHandle | PropertyHandle | MethodHandle

/**
 * Reads the injection-relevant shape of a type
 *
 * The metadata cache only talks to this interface, so decorators are one
 * front end among others (a hand-written table, generated accessors, ...).
 */
export interface TypeReflector {
	/** The direct base class, or undefined at the root of the hierarchy */
	baseOf(type: Constructor): Constructor | undefined
	/** Every way to construct the type, in declaration order */
	constructorsOf(type: Constructor): ConstructorHandle[]
	/** Members declared on exactly this type (not inherited), in declaration order */
	declaredMembersOf(type: Constructor): MemberHandle[]
}

// ============================================================================
// Parameter Name Parsing
// ============================================================================

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/
const CONSTRUCTOR_START = /(?:^|[^.\w$])constructor\s*\(/
const COMMENTS = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g

/**
 * A parameter as written in source
 */
export interface SourceParameter {
	readonly name: string
	/** Declared with `= value`; the function fills it in when passed `undefined` */
	readonly hasDefault: boolean
}

/**
 * Extract the parameter list from a function or class source
 *
 * Destructured parameters have no name and come back as `arg<index>`.
 *
 * @param source - `Function.prototype.toString()` output
 * @param isClass - Look for the `constructor(` of a class body
 * @returns The parameters, or undefined when the source declares no such parameter list
 *
 * @example
 * parseParameters('greet(name, punctuation = "!") {}', false)
 * // [{ name: 'name', hasDefault: false }, { name: 'punctuation', hasDefault: true }]
 */
export function parseParameters(
	source: string,
	isClass: boolean,
): SourceParameter[] | undefined {
	let start: number
	if (isClass) {
		const match = CONSTRUCTOR_START.exec(source)
		if (!match) {
			return undefined
		}
		start = match.index + match[0].length
	} else {
		start = source.indexOf('(') + 1
		if (start === 0) {
			return undefined
		}
	}

	const segments: string[] = []
	let depth = 0
	let quote: string | undefined
	let current = ''
	for (let i = start; i < source.length; i++) {
		const char = source[i]
		if (quote !== undefined) {
			current += char
			if (char === '\\') {
				current += source[++i] ?? ''
			} else if (char === quote) {
				quote = undefined
			}
			continue
		}
		if (char === "'" || char === '"' || char === '`') {
			quote = char
		} else if (char === '(' || char === '[' || char === '{') {
			depth++
		} else if (char === ')' || char === ']' || char === '}') {
			if (depth === 0) {
				segments.push(current)
				break
			}
			depth--
		} else if (char === ',' && depth === 0) {
			segments.push(current)
			current = ''
			continue
		}
		current += char
	}

	return segments
		.map((segment) => segment.replace(COMMENTS, '').trim())
		.filter((segment) => segment.length > 0)
		.map((segment, index) => {
			const name = segment.replace(/^\.\.\./, '').split('=')[0].trim()
			return {
				name: IDENTIFIER.test(name) ? name : `arg${index}`,
				hasDefault: hasTopLevelDefault(segment),
			}
		})
}

/**
 * Extract parameter names from a function or class source
 *
 * @see parseParameters
 *
 * @example
 * parseParameterNames('greet(name, punctuation = "!") {}', false) // ['name', 'punctuation']
 */
export function parseParameterNames(
	source: string,
	isClass: boolean,
): string[] | undefined {
	return parseParameters(source, isClass)?.map((parameter) => parameter.name)
}

// `{ a = 1 }` destructures with a default inside; only an `=` outside any bracket counts
function hasTopLevelDefault(segment: string): boolean {
	let depth = 0
	let quote: string | undefined
	for (let i = 0; i < segment.length; i++) {
		const char = segment[i]
		if (quote !== undefined) {
			if (char === '\\') {
				i++
			} else if (char === quote) {
				quote = undefined
			}
		} else if (char === "'" || char === '"' || char === '`') {
			quote = char
		} else if (char === '(' || char === '[' || char === '{') {
			depth++
		} else if (char === ')' || char === ']' || char === '}') {
			depth--
		} else if (char === '=' && depth === 0) {
			return true
		}
	}
	return false
}

// ============================================================================
// Decorator-based Reflector
// ============================================================================

function toFacts(
	facts: ParameterFacts | MemberFacts | undefined,
	sourceDefault = false,
): DependencyFacts {
	const parameter: ParameterFacts = facts ?? {}
	// `@Default()` wins over a default written in source; the latter is left to the function
	return {
		optional: parameter.optional === true,
		key: parameter.key,
		fromParent: parameter.fromParent === true,
		hasDefaultValue: parameter.hasDefault === true || sourceDefault,
		defaultValue: parameter.hasDefault === true ? parameter.defaultValue : undefined,
	}
}

/**
 * {@link TypeReflector} over `reflect-metadata`
 *
 * Reads the facts stored by the decorators in `./decorators` together with
 * the `design:*` metadata TypeScript emits under `emitDecoratorMetadata`.
 * Tokens that cannot be determined fall back to `Object`.
 */
export class DecoratorReflector implements TypeReflector {
	baseOf(type: Constructor): Constructor | undefined {
		const base: unknown = Object.getPrototypeOf(type)
		if (!isConstructor(base) || base === Function.prototype) {
			return undefined
		}
		return base
	}

	constructorsOf(type: Constructor): ConstructorHandle[] {
		const handles: ConstructorHandle[] = [this.classConstructor(type)]

		for (const [member, facts] of getMemberFacts(type)) {
			if (facts.kind !== 'factory') {
				continue
			}
			const factory: unknown = Reflect.get(type, member)
			handles.push({
				name: `${type.name}.${String(member)}`,
				visibility: facts.internal ? 'internal' : 'public',
				annotated: facts.inject,
				parameters: this.parameters(
					Reflect.getOwnMetadata('design:paramtypes', type, member),
					getParameterFacts(type, member),
					parseParameters(String(factory), false),
				),
				invoke: (args) => {
					if (typeof factory !== 'function') {
						throw new TypeError(`${type.name}.${String(member)} is not a function`)
					}
					return Reflect.apply(factory, type, args)
				},
			})
		}

		return handles
	}

	declaredMembersOf(type: Constructor): MemberHandle[] {
		const prototype: object = type.prototype
		const handles: MemberHandle[] = []

		for (const [name, facts] of getMemberFacts(prototype)) {
			switch (facts.kind) {
				case 'field':
					handles.push({
						kind: 'field',
						name,
						declaringType: type,
						annotated: facts.inject,
						token: this.memberToken(prototype, name, facts),
						facts: toFacts(facts),
						set: (instance, value) => Reflect.set(instance, name, value),
					})
					break
				case 'property': {
					const descriptor = Object.getOwnPropertyDescriptor(prototype, name)
					handles.push({
						kind: 'property',
						name,
						declaringType: type,
						annotated: facts.inject,
						token: this.memberToken(prototype, name, facts),
						facts: toFacts(facts),
						writable: descriptor?.set !== undefined,
						set: (instance, value) => Reflect.set(instance, name, value),
					})
					break
				}
				case 'method': {
					const descriptor = Object.getOwnPropertyDescriptor(prototype, name)
					handles.push({
						kind: 'method',
						name,
						declaringType: type,
						annotated: facts.inject,
						order: facts.order,
						parameters: this.parameters(
							Reflect.getOwnMetadata('design:paramtypes', prototype, name),
							getParameterFacts(prototype, name),
							parseParameters(String(descriptor?.value), false),
						),
						invoke: (instance, args) => {
							// Looked up on the instance so an override in a subclass runs
							const method: unknown = Reflect.get(instance, name)
							if (typeof method !== 'function') {
								throw new TypeError(`${type.name}.${String(name)} is not a function`)
							}
							return Reflect.apply(method, instance, args)
						},
					})
					break
				}
				case 'factory':
					break
			}
		}

		return handles
	}

	private classConstructor(type: Constructor): ConstructorHandle {
		const level = this.constructorLevel(type)
		const options = getInjectableMetadata(type)
		return {
			name: type.name,
			visibility: options?.constructorVisibility === 'internal' ? 'internal' : 'public',
			annotated: Reflect.getOwnMetadata(INJECT_CONSTRUCTOR, type) === true,
			parameters: this.parameters(
				Reflect.getOwnMetadata('design:paramtypes', level),
				getParameterFacts(level),
				parseParameters(String(level), true) ?? [],
			),
			invoke: (args) => Reflect.construct(type, args),
		}
	}

	/**
	 * Find the class whose constructor `type` actually runs
	 *
	 * A class without its own constructor forwards its arguments to the
	 * nearest ancestor that declares one.
	 */
	private constructorLevel(type: Constructor): Constructor {
		let level: Constructor | undefined = type
		while (level !== undefined) {
			if (
				Reflect.hasOwnMetadata('design:paramtypes', level) ||
				parseParameterNames(String(level), true) !== undefined
			) {
				return level
			}
			level = this.baseOf(level)
		}
		return type
	}

	private parameters(
		designTypes: unknown,
		facts: ReadonlyArray<ParameterFacts | undefined>,
		declared: readonly SourceParameter[] | undefined,
	): ParameterHandle[] {
		const types: unknown[] = Array.isArray(designTypes) ? designTypes : []
		const count = Array.isArray(designTypes)
			? designTypes.length
			: Math.max(declared?.length ?? 0, facts.length)

		const handles: ParameterHandle[] = []
		for (let index = 0; index < count; index++) {
			const parameterFacts = facts[index]
			const designType = types[index]
			handles.push({
				index,
				name: declared?.[index]?.name ?? `arg${index}`,
				token:
					parameterFacts?.token ??
					(isConstructor(designType) ? designType : Object),
				facts: toFacts(parameterFacts, declared?.[index]?.hasDefault),
			})
		}
		return handles
	}

	private memberToken(
		prototype: object,
		name: MemberName,
		facts: MemberFacts,
	): InjectionToken {
		if (facts.token !== undefined) {
			return facts.token
		}
		const designType: unknown = Reflect.getOwnMetadata('design:type', prototype, name)
		return isConstructor(designType) ? designType : Object
	}
}
