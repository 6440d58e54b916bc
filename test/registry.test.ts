import 'reflect-metadata'
import { describe, expect, test } from '@jest/globals'
import {
	ArgumentError,
	CircularDependencyError,
	Inject,
	Injectable,
	NOT_FOUND,
	ServiceNotRegisteredError,
	ServiceRegistry,
} from '../src'

// ============================================================================
// Test Services
// ============================================================================

class Database {
	constructor(readonly name: string) {}
}

@Injectable()
class UserRepository {
	constructor(readonly db: Database) {}
}

@Injectable()
class CycleA {
	constructor(@Inject('CycleB') readonly b: unknown) {}
}

@Injectable()
class CycleB {
	constructor(@Inject('CycleA') readonly a: unknown) {}
}

// ============================================================================
// Tests
// ============================================================================

describe('ServiceRegistry', () => {
	test('should resolve registered values', () => {
		const db = new Database('main')
		const registry = new ServiceRegistry().register(Database, db)

		expect(registry.resolve(Database)).toBe(db)
		expect(registry.tryResolve(Database)).toEqual({ found: true, value: db })
		expect(registry.isRegistered(Database)).toBe(true)
	})

	test('should run factories on every resolution', () => {
		let calls = 0
		const registry = new ServiceRegistry().registerFactory('COUNTER', () => ++calls)

		expect(registry.resolve('COUNTER')).toBe(1)
		expect(registry.resolve('COUNTER')).toBe(2)
	})

	test('should build registered types through the injector', () => {
		const db = new Database('main')
		const registry = new ServiceRegistry()
			.register(Database, db)
			.registerType(UserRepository)

		const repository = registry.resolve(UserRepository)

		expect(repository).toBeInstanceOf(UserRepository)
		expect(repository.db).toBe(db)
		expect(registry.resolve(UserRepository)).not.toBe(repository)
	})

	test('should require a class for a non-class token', () => {
		expect(() => new ServiceRegistry().registerType('REPOSITORY')).toThrow(ArgumentError)
	})

	test('should keep keyed registrations apart from plain ones', () => {
		const primary = new Database('primary')
		const replica = new Database('replica')
		const registry = new ServiceRegistry()
			.register(Database, primary)
			.registerKeyed(Database, 'replica', replica)
			.registerKeyedFactory(Database, 'scratch', () => new Database('scratch'))

		expect(registry.resolve(Database)).toBe(primary)
		expect(registry.resolveKeyed(Database, 'replica')).toBe(replica)
		expect(registry.resolveKeyed(Database, 'scratch').name).toBe('scratch')
		expect(registry.isRegisteredKeyed(Database, 'replica')).toBe(true)
		expect(registry.isRegisteredKeyed(Database, 'archive')).toBe(false)
		expect(registry.tryResolveKeyed(Database, 'archive')).toBe(NOT_FOUND)
	})

	test('should fall back to the parent', () => {
		const root = new ServiceRegistry()
			.register(Database, new Database('root'))
			.registerKeyed(Database, 'replica', new Database('root-replica'))
		const child = root.createChild()

		expect(child.parent).toBe(root)
		expect(child.resolve(Database).name).toBe('root')
		expect(child.resolveKeyed(Database, 'replica').name).toBe('root-replica')
		expect(child.isRegistered(Database)).toBe(true)

		child.register(Database, new Database('child'))
		expect(child.resolve(Database).name).toBe('child')
		expect(root.resolve(Database).name).toBe('root')
	})

	test('should report missing registrations', () => {
		const registry = new ServiceRegistry()

		expect(registry.tryResolve(Database)).toBe(NOT_FOUND)
		expect(() => registry.resolve(Database)).toThrow(ServiceNotRegisteredError)
		expect(() => registry.resolveKeyed(Database, 'replica')).toThrow(
			"Unable to resolve service 'Database' (key: 'replica'). Make sure it is registered with the resolver.",
		)
	})

	test('should detect circular dependencies', () => {
		const registry = new ServiceRegistry()
			.registerType('CycleA', CycleA)
			.registerType('CycleB', CycleB)

		expect(() => registry.resolve('CycleA')).toThrow(
			'Circular dependency detected!\nChain: CycleA -> CycleB -> CycleA',
		)
		// The chain is unwound after the failure
		expect(() => registry.resolve('CycleB')).toThrow(CircularDependencyError)
		expect(() => registry.resolve('CycleB')).toThrow(
			'Circular dependency detected!\nChain: CycleB -> CycleA -> CycleB',
		)
	})
})
