import 'reflect-metadata'
import { describe, expect, test } from '@jest/globals'
import {
	Default,
	Factory,
	FromParent,
	getInjectableMetadata,
	Inject,
	Injectable,
	Key,
	MetadataCache,
	Optional,
	Order,
} from '../src'

class Target {
	static count = 0
	name = ''

	run(): void {}
}

function methodDescriptor(): PropertyDescriptor {
	return { value: () => {}, writable: true, enumerable: false, configurable: true }
}

describe('@Injectable', () => {
	test('should store options with a public constructor by default', () => {
		@Injectable({ metadata: { role: 'service' } })
		class Service {}

		expect(getInjectableMetadata(Service)).toEqual({
			constructorVisibility: 'public',
			metadata: { role: 'service' },
		})
	})

	test('should return undefined for an undecorated class', () => {
		expect(getInjectableMetadata(Target)).toBeUndefined()
	})

	test('should not leak options to subclasses', () => {
		@Injectable({ constructorVisibility: 'internal' })
		class Base {}
		class Derived extends Base {}

		expect(getInjectableMetadata(Derived)).toBeUndefined()
	})
})

describe('@Inject', () => {
	test('should annotate the class constructor when placed on a class', () => {
		@Inject()
		class Annotated {
			@Factory()
			static create(_a: string, _b: string): Annotated {
				return new Annotated()
			}
		}

		const descriptor = new MetadataCache().getOrCreate(Annotated).constructorDescriptor

		expect(descriptor?.handle.name).toBe('Annotated')
		expect(descriptor?.handle.annotated).toBe(true)
	})

	test('should reject a static field', () => {
		expect(() => Inject()(Target, 'count')).toThrow(
			"@Inject() cannot decorate static field 'count'",
		)
	})
})

describe('Decorator Placement', () => {
	test('should reject @Order outside instance methods', () => {
		expect(() => Order(1)(Target.prototype, 'name')).toThrow(
			"@Order() cannot decorate field 'name'",
		)
		expect(() => Order(1)(Target, 'run', methodDescriptor())).toThrow(
			"@Order() cannot decorate static method 'run'",
		)
	})

	test('should reject @Default outside parameters', () => {
		expect(() => Default(1)(Target.prototype, 'name')).toThrow(
			"@Default() cannot decorate field 'name'",
		)
	})

	test('should reject @Factory on instance methods', () => {
		expect(() => Factory()(Target.prototype, 'run', methodDescriptor())).toThrow(
			"@Factory() cannot decorate method 'run'",
		)
	})

	test('should reject dependency facts on classes and methods', () => {
		expect(() => Optional()(Target)).toThrow('@Optional() cannot decorate a class')
		expect(() => Key('k')(Target.prototype, 'run', methodDescriptor())).toThrow(
			"@Key() cannot decorate method 'run'",
		)
		expect(() => FromParent()(Target, 'count')).toThrow(
			"@FromParent() cannot decorate static field 'count'",
		)
	})
})

describe('Dependency Facts', () => {
	test('should combine facts on one parameter', () => {
		class Combined {
			@Inject()
			setup(@Default('fallback') @Key('k') @FromParent() _value: string): void {}
		}

		const [parameter] = new MetadataCache().getOrCreate(Combined).methods[0].parameters

		expect(parameter).toMatchObject({
			name: '_value',
			token: String,
			isOptional: true,
			key: 'k',
			fromParent: true,
			hasDefaultValue: true,
			defaultValue: 'fallback',
		})
	})

	test('should keep a subclass from writing into inherited facts', () => {
		class Base {
			@Inject() @Key('base') dependency!: string
		}
		class Derived extends Base {
			@Inject() @Key('derived') other!: string
		}

		const base = new MetadataCache().getOrCreate(Base)
		const derived = new MetadataCache().getOrCreate(Derived)

		expect(base.fields.map((f) => f.name)).toEqual(['dependency'])
		expect(derived.fields.map((f) => [f.name, f.key])).toEqual([
			['other', 'derived'],
			['dependency', 'base'],
		])
	})

	test('should ignore members that only carry dependency facts', () => {
		class Unmarked {
			@Optional() maybe!: string
		}

		expect(new MetadataCache().getOrCreate(Unmarked).fields).toHaveLength(0)
	})
})
