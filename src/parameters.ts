import type {
	InjectionToken,
	InjectParameter,
	MemberName,
	ObjectResolver,
} from './types'

// ============================================================================
// Override Parameters
// ============================================================================

/**
 * Supplies `value` to every dependency declared with `token`
 *
 * @example
 * injector.instantiate(Uploader, registry, [
 *   new TypedParameter(Storage, new MemoryStorage()),
 * ])
 */
export class TypedParameter<T = unknown> implements InjectParameter {
	constructor(
		readonly token: InjectionToken<T>,
		readonly value: T,
	) {}

	canSupply(token: InjectionToken): boolean {
		return token === this.token
	}

	getValue(): T {
		return this.value
	}
}

/**
 * Supplies `value` to the parameter, field or property called `name`
 *
 * Parameter names are read from the compiled function source, so a
 * minifier that renames parameters breaks name matching.
 *
 * @example
 * injector.instantiate(Mailer, registry, [
 *   new NamedParameter('sender', 'noreply@example.com'),
 * ])
 */
export class NamedParameter<T = unknown> implements InjectParameter {
	constructor(
		readonly name: MemberName,
		readonly value: T,
	) {}

	canSupply(_token: InjectionToken, name: MemberName): boolean {
		return name === this.name
	}

	getValue(): T {
		return this.value
	}
}

/**
 * Computes a value from the resolver for every dependency `predicate` accepts
 *
 * @example
 * new ResolvedParameter(
 *   (token) => token === Logger,
 *   (resolver) => resolver.resolve(LoggerFactory).create('mailer'),
 * )
 */
export class ResolvedParameter<T = unknown> implements InjectParameter {
	constructor(
		private readonly predicate: (token: InjectionToken, name: MemberName) => boolean,
		private readonly factory: (resolver: ObjectResolver) => T,
	) {}

	canSupply(token: InjectionToken, name: MemberName): boolean {
		return this.predicate(token, name)
	}

	getValue(resolver: ObjectResolver): T {
		return this.factory(resolver)
	}
}
