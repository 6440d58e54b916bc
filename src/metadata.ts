import type {
	ConstructorHandle,
	FieldHandle,
	MethodHandle,
	PropertyHandle,
} from './reflection'
import type { Constructor, InjectionToken, MemberName } from './types'

// ============================================================================
// Injection Metadata (immutable data model)
// ============================================================================

/**
 * Everything the parameter resolver needs to know about one dependency
 *
 * Constructor parameters, method parameters, fields and properties all share
 * this shape, so one resolution algorithm serves all four.
 */
export interface DependencyDescriptor {
	readonly name: MemberName
	readonly token: InjectionToken
	readonly isOptional: boolean
	readonly key: string | undefined
	readonly fromParent: boolean
	readonly hasDefaultValue: boolean
	readonly defaultValue: unknown
}

export interface ParameterDescriptor extends DependencyDescriptor {
	readonly name: string
	readonly index: number
}

export interface ConstructorDescriptor {
	readonly type: Constructor
	readonly handle: ConstructorHandle
	readonly parameters: readonly ParameterDescriptor[]
}

/**
 * A field or property injection point
 *
 * Members never carry a default value; `hasDefaultValue` is always false.
 */
export interface MemberDescriptor extends DependencyDescriptor {
	readonly kind: 'field' | 'property'
	readonly declaringType: Constructor
	readonly handle: FieldHandle | PropertyHandle
}

export interface MethodDescriptor {
	readonly name: MemberName
	readonly declaringType: Constructor
	readonly order: number
	readonly handle: MethodHandle
	readonly parameters: readonly ParameterDescriptor[]
}

/**
 * Cached description of all injection points of one type
 *
 * Built once per type by the {@link MetadataCache} and frozen; safe to share.
 *
 * @example
 * const metadata = injector.getMetadata(ReportService)
 * metadata.methods.map((m) => m.name) // ['configure', 'start']
 */
export class InjectionMetadata {
	readonly fields: readonly MemberDescriptor[]
	readonly properties: readonly MemberDescriptor[]
	readonly methods: readonly MethodDescriptor[]

	constructor(
		readonly type: Constructor,
		readonly constructorDescriptor: ConstructorDescriptor | undefined,
		fields: MemberDescriptor[],
		properties: MemberDescriptor[],
		methods: MethodDescriptor[],
	) {
		this.fields = Object.freeze(fields)
		this.properties = Object.freeze(properties)
		this.methods = Object.freeze(methods)
		Object.freeze(this)
	}

	/**
	 * Whether an injector has anything to do for this type
	 */
	get hasInjectionPoints(): boolean {
		return (
			this.constructorDescriptor !== undefined ||
			this.fields.length > 0 ||
			this.properties.length > 0 ||
			this.methods.length > 0
		)
	}
}
