import 'reflect-metadata'
import {
	Default,
	FromParent,
	getInjectableMetadata,
	Inject,
	Injectable,
	Injector,
	Key,
	LogLevel,
	NamedParameter,
	Optional,
	Order,
	ServiceRegistry,
} from '../src'

// ============================================================================
// Example: Constructor, Member and Method Injection Across Scopes
// ============================================================================

/**
 * Configuration shared by every request
 */
class AppConfig {
	constructor(
		readonly name: string,
		readonly port: number,
	) {}
}

/**
 * Database connection, registered once per role
 */
class Database {
	constructor(readonly role: string) {}

	query(sql: string): string[] {
		console.log(`📊 [${this.role}] ${sql}`)
		return []
	}
}

const AUDIT_LOG = Symbol('AuditLog')

interface AuditLog {
	record(message: string): void
}

/**
 * Repository reading from the replica and writing to the primary
 */
@Injectable({ metadata: { layer: 'repository' } })
class UserRepository {
	constructor(
		@Key('primary') private readonly primary: Database,
		@Key('replica') private readonly replica: Database,
		@Default(50) readonly pageSize: number,
	) {}

	findAll(): string[] {
		return this.replica.query(`SELECT * FROM users LIMIT ${this.pageSize}`)
	}

	rename(id: number, name: string): void {
		this.primary.query(`UPDATE users SET name = '${name}' WHERE id = ${id}`)
	}
}

/**
 * Request handler built in a child scope
 */
@Injectable({ metadata: { layer: 'handler' } })
class UserHandler {
	@Inject() @FromParent() config!: AppConfig
	@Inject(AUDIT_LOG) @Optional() audit: AuditLog | undefined

	private ready = false

	constructor(
		private readonly users: UserRepository,
		readonly requestId: string,
	) {}

	@Inject()
	@Order(1)
	announce(): void {
		this.ready = true
		console.log(`🚀 ${this.config.name} handling ${this.requestId}`)
	}

	@Inject()
	validate(@Key('replica') replica: Database): void {
		console.log(`🔍 Replica available: ${replica.role}`)
	}

	handle(): void {
		if (!this.ready) {
			throw new Error('Handler was not initialised')
		}
		this.users.findAll()
		this.users.rename(1, 'ada')
		this.audit?.record(`${this.requestId} done`)
	}
}

// ============================================================================
// Run
// ============================================================================

function runExample(): void {
	console.log('\n═══════════════════════════════════════════════════════')
	console.log('  Scoped Injection Example')
	console.log('═══════════════════════════════════════════════════════\n')

	const injector = new Injector({ logLevel: LogLevel.VERBOSE })

	const root = new ServiceRegistry({ injector })
		.register(AppConfig, new AppConfig('users-api', 3000))
		.registerKeyed(Database, 'primary', new Database('primary'))
		.registerKeyed(Database, 'replica', new Database('replica'))
		.registerType(UserRepository)

	const request = root.createChild().register(AUDIT_LOG, {
		record: (message: string) => console.log(`📝 ${message}`),
	})

	const handler = injector.instantiate(UserHandler, request, [
		new NamedParameter('requestId', 'req-1'),
	])
	handler.handle()

	console.log('\n═══════════════════════════════════════════════════════')
	console.log('  Inspecting Injection Metadata')
	console.log('═══════════════════════════════════════════════════════\n')

	for (const type of [UserRepository, UserHandler]) {
		const metadata = injector.getMetadata(type)
		console.log(`📦 ${type.name}:`)
		console.log(`   Layer: ${JSON.stringify(getInjectableMetadata(type)?.metadata ?? {})}`)
		console.log(
			`   Constructor: ${metadata.constructorDescriptor?.parameters.map((p) => p.name).join(', ')}`,
		)
		console.log(`   Fields: ${metadata.fields.map((f) => String(f.name)).join(', ') || '-'}`)
		console.log(`   Methods: ${metadata.methods.map((m) => String(m.name)).join(', ') || '-'}`)
		console.log('')
	}
}

runExample()
