/**
 * Frame Engine
 *
 * Evaluates a guarded JavaScript expression over an in-memory frame (an array
 * of row records) inside a fresh `vm` context. The frame and the helpers are
 * built inside the context from the prelude, and results leave it as JSON, so
 * no host object is ever shared with an expression. Every run has a timeout.
 */

import * as fs from "fs"
import * as path from "path"
import * as vm from "vm"
import { parse } from "csv-parse/sync"
import { Cancelled, DEFAULTS } from "./config.js"
import { outcomeFromTable, type ColumnInfo, type DataEngine, type EngineError, type ExecutionOutcome } from "./executor.js"
import { FRAME_PRELUDE, RESULT_SERIALIZER, RESULT_SLOT } from "./frame_prelude.js"
import { silentLogger, type Logger } from "./logger.js"
import { makeTable, type Row, type Table } from "./query_types.js"

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function toNumber(value: unknown): number | null {
	if (typeof value === "number") return Number.isFinite(value) ? value : null
	if (typeof value === "bigint") return Number(value)
	if (typeof value === "string") {
		const cleaned = value.trim().replace(/,/g, "")
		if (!cleaned) return null
		const n = Number(cleaned)
		return Number.isFinite(n) ? n : null
	}
	return null
}

function isMissing(value: unknown): boolean {
	return value === null || value === undefined || value === ""
}

// ============================================================================
// Result Normalization
// ============================================================================

function isDate(value: unknown): value is Date {
	return Object.prototype.toString.call(value) === "[object Date]"
}

function plainValue(value: unknown): unknown {
	if (isDate(value)) return value.toISOString()
	return value
}

/**
 * Normalize an expression result to a Table
 *
 * - array of records: one row per record, columns in first-appearance order
 * - array of scalars: one `value` column
 * - record: a single row
 * - scalar: a single `value` cell
 */
export function resultToTable(result: unknown): Table {
	if (result === undefined) return makeTable(["value"], [])

	if (Array.isArray(result)) {
		if (result.length > 0 && result.every(isRecord)) {
			const columns: string[] = []
			const rows: Row[] = []
			for (const item of result) {
				const row: Row = {}
				for (const [key, value] of Object.entries(item)) {
					if (!columns.includes(key)) columns.push(key)
					row[key] = plainValue(value)
				}
				rows.push(row)
			}
			return makeTable(columns, rows)
		}
		return makeTable(["value"], result.map((value) => ({ value: plainValue(value) })))
	}

	if (isRecord(result) && !isDate(result)) {
		const row: Row = {}
		for (const [key, value] of Object.entries(result)) row[key] = plainValue(value)
		return makeTable(Object.keys(row), [row])
	}

	return makeTable(["value"], [{ value: plainValue(result) }])
}

/**
 * Classify an error thrown while evaluating an expression
 */
export function classifyFrameError(error: unknown): EngineError {
	// Errors raised inside the context come from its own realm, so no instanceof
	if (!isRecord(error)) return { kind: "syntax", message: String(error) }
	const name = typeof error.name === "string" ? error.name : ""
	const message = typeof error.message === "string" ? error.message : String(error)
	const code = typeof error.code === "string" ? error.code : undefined

	if (code === "ERR_SCRIPT_EXECUTION_TIMEOUT") {
		return { kind: "transient", message, code }
	}
	return { kind: "syntax", message: name ? `${name}: ${message}` : message, code: name || code }
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value)
		for (const child of Object.values(value)) deepFreeze(child)
	}
	return value
}

// ============================================================================
// Engine
// ============================================================================

export interface FrameEngineOptions {
	/** Variable name of the frame inside expressions */
	name?: string
	timeoutMs?: number
	logger?: Logger
}

export class FrameEngine implements DataEngine {
	readonly dialect = "frame"
	readonly name: string
	readonly columns: string[]
	private rows: readonly Row[]
	private frameJson: string
	private timeoutMs: number
	private logger: Logger

	constructor(rows: Row[], options: FrameEngineOptions = {}) {
		this.name = options.name ?? "df"
		this.timeoutMs = options.timeoutMs ?? 2000
		this.logger = options.logger ?? silentLogger
		this.rows = deepFreeze(rows.map((row) => ({ ...row })))
		const columns: string[] = []
		for (const row of this.rows) {
			for (const key of Object.keys(row)) if (!columns.includes(key)) columns.push(key)
		}
		this.columns = columns
		this.frameJson = JSON.stringify(this.rows)
	}

	/**
	 * Evaluate one expression against the frame
	 *
	 * The value comes back through JSON: dates become ISO strings and
	 * functions or undefined fields are dropped.
	 */
	runSnippet(code: string): unknown {
		const sandbox: Record<string, unknown> = Object.create(null)
		const context = vm.createContext(sandbox, { codeGeneration: { strings: false, wasm: false } })
		const install: unknown = vm.runInContext(FRAME_PRELUDE, context, { filename: "frame-prelude.js" })
		if (typeof install !== "function") {
			throw new Error("Frame prelude did not evaluate to a function")
		}
		install(this.name, this.frameJson)

		const options = { timeout: this.timeoutMs, filename: "frame-expression.js" }
		sandbox[RESULT_SLOT] = vm.runInContext(code, context, options)
		const json: unknown = vm.runInContext(`${RESULT_SERIALIZER}(${RESULT_SLOT})`, context, options)
		if (typeof json !== "string") return undefined
		const parsed: unknown = JSON.parse(json)
		return isRecord(parsed) ? parsed.value : undefined
	}

	async execute(text: string, signal?: AbortSignal): Promise<ExecutionOutcome> {
		if (signal?.aborted) {
			throw new Cancelled()
		}

		const startTime = Date.now()
		try {
			const table = resultToTable(this.runSnippet(text))
			this.logger.debug("Expression evaluated", { rows: table.row_count, execution_time_ms: Date.now() - startTime })
			return outcomeFromTable(table)
		} catch (error) {
			const classified = classifyFrameError(error)
			this.logger.warn("Expression failed", { kind: classified.kind, message: classified.message })
			return { kind: "error", error: classified }
		}
	}

	async listTables(): Promise<string[]> {
		return [this.name]
	}

	async describe(objectName: string): Promise<ColumnInfo[]> {
		if (objectName !== this.name) return []
		return this.columns.map((name) => ({ name, data_type: inferType(this.rows.map((r) => r[name])) }))
	}

	async sampleValues(objectName: string, column: string, limit: number): Promise<string[]> {
		if (objectName !== this.name || limit <= 0) return []
		const out: string[] = []
		for (const row of this.rows) {
			const value = row[column]
			if (isMissing(value)) continue
			const text = String(value)
			if (!out.includes(text)) out.push(text)
			if (out.length >= limit) break
		}
		return out
	}

	async fetchRowsById(objectName: string, idColumn: string, ids: unknown[]): Promise<Table> {
		const wanted = new Set(ids.map((id) => String(id)))
		const rows = objectName === this.name ? this.rows.filter((r) => wanted.has(String(r[idColumn]))) : []
		return makeTable([...this.columns], rows.map((r) => ({ ...r })))
	}

	async close(): Promise<void> {
		// Nothing to release
	}
}

function inferType(values: unknown[]): string {
	const present = values.filter((v) => !isMissing(v))
	if (present.length === 0) return "unknown"
	if (present.every((v) => typeof v === "boolean")) return "boolean"
	if (present.every((v) => toNumber(v) !== null)) return "numeric"
	if (present.every(isDate)) return "timestamp"
	return "text"
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a frame from a .csv or .json file
 *
 * CSV cells stay text (numeric inference happens in helpers and describe).
 * A missing row-identifier column is added as a 0-based index.
 */
export function loadFrameFile(filePath: string, rowIdColumn: string = DEFAULTS.rowIdColumn): Row[] {
	const raw = fs.readFileSync(filePath, "utf-8")
	const ext = path.extname(filePath).toLowerCase()

	let records: Row[]
	if (ext === ".csv") {
		const parsed: unknown = parse(raw, { columns: true, skip_empty_lines: true, bom: true, trim: true })
		records = Array.isArray(parsed) ? parsed.filter(isRecord) : []
	} else if (ext === ".json") {
		const parsed: unknown = JSON.parse(raw)
		if (!Array.isArray(parsed) || !parsed.every(isRecord)) {
			throw new Error(`Frame file ${filePath} must contain an array of objects`)
		}
		records = parsed
	} else {
		throw new Error(`Unsupported frame file type: ${ext || "(none)"}`)
	}

	return records.map((row, i) => (rowIdColumn in row ? row : { [rowIdColumn]: i, ...row }))
}
