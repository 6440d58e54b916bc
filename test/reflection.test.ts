import 'reflect-metadata'
import { describe, expect, test } from '@jest/globals'
import {
	DecoratorReflector,
	Factory,
	Inject,
	Injectable,
	parseParameterNames,
	parseParameters,
} from '../src'

describe('parseParameterNames', () => {
	test('should read method parameters', () => {
		expect(parseParameterNames('greet(name, punctuation = "!") {}', false)).toEqual([
			'name',
			'punctuation',
		])
	})

	test('should read the constructor of a class body', () => {
		const source = 'class Mailer { send(to) {} constructor(sender, ...rest) {} }'

		expect(parseParameterNames(source, true)).toEqual(['sender', 'rest'])
	})

	test('should skip commas inside default values', () => {
		expect(parseParameterNames('f(a = [1, 2], b = "x,y", c = { d: 1, e: 2 }) {}', false)).toEqual([
			'a',
			'b',
			'c',
		])
	})

	test('should strip comments', () => {
		expect(parseParameterNames('f(/* first */ a, // second\n b) {}', false)).toEqual(['a', 'b'])
	})

	test('should name destructured parameters by position', () => {
		expect(parseParameterNames('f(first, { second }, [third]) {}', false)).toEqual([
			'first',
			'arg1',
			'arg2',
		])
	})

	test('should return an empty list for a parameterless function', () => {
		expect(parseParameterNames('f() {}', false)).toEqual([])
	})

	test('should return undefined for a class without a constructor', () => {
		expect(parseParameterNames('class A { run() { return new this.constructor(1) } }', true)).toBeUndefined()
	})
})

describe('parseParameters', () => {
	test('should report defaults written in source', () => {
		expect(parseParameters('f(a, b = 3, c = "x,y") {}', false)).toEqual([
			{ name: 'a', hasDefault: false },
			{ name: 'b', hasDefault: true },
			{ name: 'c', hasDefault: true },
		])
	})

	test('should ignore defaults inside a destructuring pattern', () => {
		expect(parseParameters('f({ a = 1 }, { b } = {}) {}', false)).toEqual([
			{ name: 'arg0', hasDefault: false },
			{ name: 'arg1', hasDefault: true },
		])
	})

	test('should read defaults of a class constructor', () => {
		const source = 'class Policy { constructor(clock, retries = 3) { this.retries = retries } }'

		expect(parseParameters(source, true)).toEqual([
			{ name: 'clock', hasDefault: false },
			{ name: 'retries', hasDefault: true },
		])
	})
})

describe('DecoratorReflector', () => {
	test('should stop at the root of the hierarchy', () => {
		class Base {}
		class Derived extends Base {}
		const reflector = new DecoratorReflector()

		expect(reflector.baseOf(Derived)).toBe(Base)
		expect(reflector.baseOf(Base)).toBeUndefined()
	})

	test('should list the class constructor before static factories', () => {
		class Port {}

		@Injectable()
		class Server {
			constructor(readonly port: Port) {}

			@Factory()
			static local(): Server {
				return new Server(new Port())
			}
		}

		const candidates = new DecoratorReflector().constructorsOf(Server)

		expect(candidates.map((c) => c.name)).toEqual(['Server', 'Server.local'])
		expect(candidates[0].parameters).toEqual([
			{
				index: 0,
				name: 'port',
				token: Port,
				facts: {
					optional: false,
					key: undefined,
					fromParent: false,
					hasDefaultValue: false,
					defaultValue: undefined,
				},
			},
		])
		expect(candidates[1].invoke([])).toBeInstanceOf(Server)
	})

	test('should fall back to Object for parameters without design types', () => {
		class Plain {
			constructor(readonly a: unknown) {}
		}

		const [candidate] = new DecoratorReflector().constructorsOf(Plain)

		expect(candidate.parameters.map((p) => [p.name, p.token])).toEqual([['a', Object]])
	})

	test('should refuse writes to an accessor without a setter', () => {
		class Snapshot {
			@Inject()
			get value(): string {
				return 'fixed'
			}
		}

		const [member] = new DecoratorReflector().declaredMembersOf(Snapshot)

		expect(member.kind).toBe('property')
		if (member.kind === 'property') {
			expect(member.writable).toBe(false)
			expect(member.set(new Snapshot(), 'changed')).toBe(false)
		}
	})
})
