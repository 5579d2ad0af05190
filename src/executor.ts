/**
 * Executor Adapter
 *
 * Common contract for the data engines. An engine runs guard-normalized text
 * once and classifies the outcome; it never retries.
 */

import { ExecutionError, type Dialect } from "./config.js"
import type { Table } from "./query_types.js"

export type EngineErrorKind = "syntax" | "transient"

export interface EngineError {
	kind: EngineErrorKind
	message: string
	/** SQLSTATE or runtime error code */
	code?: string
	hint?: string
}

export type ExecutionOutcome =
	| { kind: "success"; table: Table }
	| { kind: "empty"; table: Table }
	| { kind: "error"; error: EngineError }

export interface ColumnInfo {
	name: string
	data_type: string
}

/**
 * A relational database or an in-memory frame
 */
export interface DataEngine {
	readonly dialect: Dialect

	/** Run normalized text; aborts before starting when `signal` is aborted */
	execute(text: string, signal?: AbortSignal): Promise<ExecutionOutcome>

	listTables(): Promise<string[]>
	describe(objectName: string): Promise<ColumnInfo[]>
	/** Distinct non-null values of one column, as text */
	sampleValues(objectName: string, column: string, limit: number): Promise<string[]>

	/** Full source rows whose identifier column is in `ids` */
	fetchRowsById(objectName: string, idColumn: string, ids: unknown[]): Promise<Table>

	close(): Promise<void>
}

/**
 * success when the table has rows, empty otherwise
 */
export function outcomeFromTable(table: Table): ExecutionOutcome {
	return table.row_count > 0 ? { kind: "success", table } : { kind: "empty", table }
}

export function toExecutionError(error: EngineError): ExecutionError {
	return new ExecutionError(error.kind, error.message, error.code)
}
