/**
 * PostgreSQL Engine
 *
 * Runs guarded SELECT statements through a pg pool with a per-connection
 * statement_timeout, and classifies failures by SQLSTATE:
 * - syntax: class 42/22/0A/21 and unknown codes (regenerate the query)
 * - transient: class 08/40/53/57/58/XX and network errors (run again unchanged)
 *
 * Also serves schema introspection and row lookup by identifier.
 */

import { Pool } from "pg"
import { Cancelled, classifySQLSTATE, DEFAULTS, getSQLSTATEHint } from "./config.js"
import type { AskDataConfig } from "./config/loadConfig.js"
import { outcomeFromTable, type ColumnInfo, type DataEngine, type EngineError, type ExecutionOutcome } from "./executor.js"
import { silentLogger, type Logger } from "./logger.js"
import { makeTable, type Row, type Table } from "./query_types.js"

// ============================================================================
// Pool Contract
// ============================================================================

export interface PgQueryResult {
	rows: Row[]
	fields?: Array<{ name: string }>
}

export interface PgClient {
	query(text: string, values?: unknown[]): Promise<PgQueryResult>
	release(): void
}

/**
 * The subset of pg.Pool the engine uses
 */
export interface PgPool {
	connect(): Promise<PgClient>
	end(): Promise<void>
}

/**
 * Pool for the configured database; a connection string replaces the
 * host/port/name/user/password settings
 */
export function createPgPool(db: AskDataConfig["database"], connectionString?: string): Pool {
	if (connectionString) {
		return new Pool({ connectionString, max: 10, idleTimeoutMillis: 30000 })
	}
	return new Pool({
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
		max: 10,
		idleTimeoutMillis: 30000,
	})
}

// ============================================================================
// Error Classification
// ============================================================================

const NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND", "EHOSTUNREACH"])

function stringField(error: unknown, field: string): string | undefined {
	if (typeof error !== "object" || error === null || !(field in error)) return undefined
	const value: unknown = Reflect.get(error, field)
	return typeof value === "string" ? value : undefined
}

/**
 * Map a pg or network error to a classified engine error
 */
export function classifyPgError(error: unknown): EngineError {
	const message = stringField(error, "message") ?? String(error)
	const code = stringField(error, "code")

	if (code && NETWORK_CODES.has(code)) {
		return { kind: "transient", message, code }
	}
	if (code && /^[0-9A-Z]{5}$/.test(code)) {
		return { kind: classifySQLSTATE(code), message, code, hint: getSQLSTATEHint(code) }
	}
	if (/connection terminated|connect|timeout/i.test(message)) {
		return { kind: "transient", message, code }
	}
	return { kind: "syntax", message, code }
}

function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, "\"\"")}"`
}

// ============================================================================
// Engine
// ============================================================================

export interface PostgresEngineOptions {
	schema?: string
	statementTimeoutMs?: number
	logger?: Logger
}

export class PostgresEngine implements DataEngine {
	readonly dialect = "sql"
	private schema: string
	private statementTimeoutMs: number
	private logger: Logger

	constructor(
		private pool: PgPool,
		options: PostgresEngineOptions = {},
	) {
		this.schema = options.schema ?? "public"
		this.statementTimeoutMs = options.statementTimeoutMs ?? DEFAULTS.statementTimeoutMs
		this.logger = options.logger ?? silentLogger
	}

	async execute(text: string, signal?: AbortSignal): Promise<ExecutionOutcome> {
		if (signal?.aborted) {
			throw new Cancelled()
		}

		const startTime = Date.now()
		let client: PgClient | null = null
		try {
			client = await this.pool.connect()
			// Read-only transaction; the timeout is scoped to it and never outlives it on the pooled client
			await client.query("BEGIN READ ONLY")
			try {
				await client.query(`SET LOCAL statement_timeout = ${this.statementTimeoutMs}`)
				const result = await client.query(text)
				const table = toTable(result)

				this.logger.debug("Query executed", { rows: table.row_count, execution_time_ms: Date.now() - startTime })
				return outcomeFromTable(table)
			} finally {
				await this.rollback(client)
			}
		} catch (error) {
			const classified = classifyPgError(error)
			this.logger.warn("Query failed", { kind: classified.kind, code: classified.code, message: classified.message })
			return { kind: "error", error: classified }
		} finally {
			if (client) {
				client.release()
			}
		}
	}

	private async rollback(client: PgClient): Promise<void> {
		try {
			await client.query("ROLLBACK")
		} catch (error) {
			this.logger.warn("Rollback failed", { error: error instanceof Error ? error.message : String(error) })
		}
	}

	async listTables(): Promise<string[]> {
		const result = await this.run(
			`
			SELECT t.table_name
			FROM information_schema.tables t
			WHERE t.table_schema = $1
				AND t.table_type IN ('BASE TABLE', 'VIEW')
			ORDER BY t.table_name
		`,
			[this.schema],
		)
		return result.rows.map((r) => String(r.table_name))
	}

	async describe(objectName: string): Promise<ColumnInfo[]> {
		const result = await this.run(
			`
			SELECT c.column_name, c.data_type
			FROM information_schema.columns c
			WHERE c.table_schema = $1
				AND c.table_name = $2
			ORDER BY c.ordinal_position
		`,
			[this.schema, objectName],
		)
		return result.rows.map((r) => ({ name: String(r.column_name), data_type: String(r.data_type) }))
	}

	async sampleValues(objectName: string, column: string, limit: number): Promise<string[]> {
		if (limit <= 0) return []
		const col = quoteIdent(column)
		const result = await this.run(
			`SELECT DISTINCT ${col} AS value FROM ${this.qualify(objectName)} WHERE ${col} IS NOT NULL LIMIT $1`,
			[limit],
		)
		return result.rows.map((r) => String(r.value))
	}

	async fetchRowsById(objectName: string, idColumn: string, ids: unknown[]): Promise<Table> {
		const result = await this.run(
			`SELECT * FROM ${this.qualify(objectName)} WHERE ${quoteIdent(idColumn)} = ANY($1)`,
			[ids],
		)
		return toTable(result)
	}

	async close(): Promise<void> {
		await this.pool.end()
	}

	private qualify(objectName: string): string {
		return `${quoteIdent(this.schema)}.${quoteIdent(objectName)}`
	}

	private async run(sql: string, values: unknown[]): Promise<PgQueryResult> {
		const client = await this.pool.connect()
		try {
			return await client.query(sql, values)
		} finally {
			client.release()
		}
	}
}

function toTable(result: PgQueryResult): Table {
	const columns = result.fields && result.fields.length > 0
		? result.fields.map((f) => f.name)
		: Object.keys(result.rows[0] ?? {})
	return makeTable(columns, result.rows)
}
