import 'reflect-metadata'

export { ArgumentPool, type ArgumentPoolOptions } from './argument-pool'
export { ConstructorInjector } from './constructor-injector'
export {
	Default,
	FromParent,
	Factory,
	type FactoryOptions,
	getInjectableMetadata,
	Inject,
	Injectable,
	type InjectableOptions,
	type InjectionDecorator,
	Key,
	Optional,
	Order,
} from './decorators'
export {
	ArgumentError,
	CircularDependencyError,
	InjectError,
	InvocationError,
	isInjectError,
	NoConstructorError,
	NoParentContainerError,
	ResolutionError,
	ServiceNotRegisteredError,
} from './errors'
export { Injector, type InjectorOptions } from './injector'
export { Logger, LogLevel } from './logger'
export { MemberInjector } from './member-injector'
export {
	type ConstructorDescriptor,
	type DependencyDescriptor,
	InjectionMetadata,
	type MemberDescriptor,
	type MethodDescriptor,
	type ParameterDescriptor,
} from './metadata'
export { MetadataCache, type MetadataCacheOptions } from './metadata-cache'
export { MethodInjector } from './method-injector'
export {
	isZeroValue,
	type ResolutionOutcome,
	resolveValue,
	tryResolveValue,
	zeroValueOf,
} from './parameter-resolver'
export {
	NamedParameter,
	ResolvedParameter,
	TypedParameter,
} from './parameters'
export {
	type ConstructorHandle,
	DecoratorReflector,
	type DependencyFacts,
	type FieldHandle,
	type MemberHandle,
	type MethodHandle,
	type ParameterHandle,
	type PropertyHandle,
	parseParameterNames,
	parseParameters,
	type SourceParameter,
	type TypeReflector,
} from './reflection'
export {
	ServiceRegistry,
	type ServiceFactory,
	type ServiceRegistryOptions,
} from './registry'
export {
	type Constructor,
	found,
	getTokenName,
	type InjectionToken,
	type InjectParameter,
	isConstructor,
	type Lookup,
	type MemberName,
	NOT_FOUND,
	type ObjectResolver,
} from './types'
