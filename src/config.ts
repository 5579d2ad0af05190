/**
 * Configuration for the askdata MCP Server
 *
 * Includes types, constants, and configuration for:
 * - Policy guard denylists and resource caps
 * - Repair loop and history bounds
 * - Request/response interfaces
 * - Structured error taxonomy
 */

import type { Attempt } from "./query_types.js"

/**
 * Query dialects the engine can synthesize and execute
 *
 * - sql: a single SELECT statement against the relational engine
 * - frame: a single JavaScript expression over an in-memory frame (`df`)
 */
export type Dialect = "sql" | "frame"

/**
 * Default configuration values
 */
export const DEFAULTS = {
	timeoutMs: 60000,
	statementTimeoutMs: 30000,
	sampleValuesPerColumn: 5,
	rowIdColumn: "__row_idx",
}

/**
 * Policy guard configuration defaults
 */
export const GUARD_DEFAULTS = {
	maxLimit: 500,

	// Data- and schema-modifying SQL keywords (checked outside strings/comments)
	sqlMutationKeywords: [
		// DDL
		"DROP",
		"CREATE",
		"ALTER",
		"TRUNCATE",
		"RENAME",
		// DML
		"INSERT",
		"UPDATE",
		"DELETE",
		"MERGE",
		"UPSERT",
		// SELECT ... INTO creates a table
		"INTO",
		"LOCK",
		// DCL
		"GRANT",
		"REVOKE",
		// TCL
		"BEGIN",
		"COMMIT",
		"ROLLBACK",
		"SAVEPOINT",
		"TRANSACTION",
		// Other
		"EXEC",
		"EXECUTE",
		"PREPARE",
		"CALL",
		"VACUUM",
		"SET",
		"RESET",
	],

	// File, network and process functions reachable from SQL (matched as calls)
	sqlCapabilityFunctions: [
		"pg_read_file",
		"pg_read_binary_file",
		"pg_ls_dir",
		"pg_stat_file",
		"lo_import",
		"lo_export",
		"pg_sleep",
		"pg_terminate_backend",
		"pg_cancel_backend",
		"pg_reload_conf",
		"dblink",
		"dblink_connect",
		"dblink_exec",
		"read_csv",
		"read_csv_auto",
		"read_parquet",
		"read_json",
		"read_json_auto",
		"read_text",
		"read_blob",
		"glob",
		"query_to_xml",
		"current_setting",
		"set_config",
	],

	// Statement words that reach files or other databases (matched as whole words)
	sqlCapabilityKeywords: ["COPY", "ATTACH", "DETACH", "PRAGMA", "PROGRAM"],

	// Mutating methods and operators for frame snippets
	frameMutationMethods: [
		"push",
		"pop",
		"shift",
		"unshift",
		"splice",
		"sort",
		"reverse",
		"fill",
		"copyWithin",
		"set",
		"add",
		"clear",
	],

	frameMutationCalls: [
		"Object.assign",
		"Object.defineProperty",
		"Object.defineProperties",
		"Object.setPrototypeOf",
		"Reflect.set",
		"Reflect.deleteProperty",
		"Reflect.defineProperty",
	],

	// File, network and process primitives reachable from frame snippets
	frameCapabilityNames: [
		"require",
		"import",
		"process",
		"global",
		"globalThis",
		"module",
		"exports",
		"eval",
		"Function",
		"AsyncFunction",
		"constructor",
		"__proto__",
		"prototype",
		"__defineGetter__",
		"__defineSetter__",
		"fetch",
		"XMLHttpRequest",
		"WebSocket",
		"setTimeout",
		"setInterval",
		"setImmediate",
		"queueMicrotask",
		"Buffer",
		"child_process",
		"fs",
		"net",
		"http",
		"https",
		"WebAssembly",
		"Proxy",
		"Reflect",
		"Atomics",
		"SharedArrayBuffer",
		"this",
	],
}

/**
 * Helper functions available to frame expressions
 */
export const FRAME_HELPERS = [
	"groupBy",
	"mean",
	"sum",
	"count",
	"min",
	"max",
	"uniq",
	"sortBy",
	"limit",
	"round",
	"toNumber",
] as const

/**
 * Globals a frame expression may use without allow-listing
 */
export const FRAME_SAFE_GLOBALS = [
	"Math",
	"Number",
	"String",
	"Boolean",
	"Array",
	"Object",
	"JSON",
	"Date",
	"Infinity",
	"NaN",
	"undefined",
	"isNaN",
	"isFinite",
	"parseInt",
	"parseFloat",
]

/**
 * Repair loop configuration
 */
export const REPAIR_CONFIG = {
	maxAttempts: 3,
	backoffMs: 0,
}

/**
 * History window configuration
 */
export const HISTORY_CONFIG = {
	maxTokens: 3000,
	previewRows: 5,
}

/**
 * Result reconciliation configuration
 */
export const RECONCILER_CONFIG = {
	rowIdColumn: DEFAULTS.rowIdColumn,
	expandThreshold: 10,
}

/**
 * LLM connection defaults (Ollama-compatible HTTP API)
 */
export const LLM_CONFIG = {
	baseUrl: process.env.OLLAMA_BASE_URL || "http://localhost:11434",
	timeout: 60000,
	synthesisModel: "qwen2.5-coder:7b",
	temperature: 0,
	endpoints: {
		generate: "/api/generate",
		health: "/api/tags",
	},
}

/**
 * Request from the caller (MCP tool or library user)
 */
export interface AskRequest {
	/** Natural language question */
	question: string

	/** Logical session key (one history per key) */
	session_key: string

	/** Optional: overall deadline for this question */
	timeout_ms?: number
}

/**
 * Structured failure surfaced to the caller
 */
export interface AskFailure {
	kind: "retry_exhausted" | "session" | "cancelled"
	message: string

	/** Last candidate text tried before giving up */
	last_candidate?: string

	/** Last guard violations (rule_id: message) */
	last_violations?: string[]

	/** Last engine or synthesis error */
	last_error?: string
}

/**
 * Final response to the caller
 */
export interface AskResponse {
	/** Unique query ID */
	query_id: string

	/** Original question */
	question: string

	/** Context-resolved question produced by the rewriter */
	rewritten_question: string

	/** Rewriter rationale */
	rationale: string

	/** Whether the rewriter tied the question to earlier turns */
	is_related: boolean

	/** Text actually executed (guard-normalized) */
	executed_query_text: string

	/** Result table (columns + rows) when answered */
	answer_table?: {
		columns: string[]
		rows: Record<string, unknown>[]
		row_count: number
	}

	/** Canonical rendered table */
	answer_text?: string

	/** Whether identifier-only rows were expanded to full source rows */
	expanded: boolean

	/** Number of synthesize→guard→execute attempts spent */
	attempts: number

	/** Failure information */
	failure?: AskFailure

	latency_ms: number
}

/**
 * Audit log entry
 */
export interface AuditLogEntry {
	query_id: string
	timestamp: Date
	session_key: string
	question: string
	rewritten_question: string
	is_related: boolean
	executed_query_text: string
	answered: boolean
	attempts: number
	rows_returned?: number
	error?: string
	latency_ms: number
}

/**
 * Error kinds for structured error handling
 */
export type AskDataErrorKind =
	| "synthesis"
	| "guard"
	| "execution"
	| "retry_exhausted"
	| "session"
	| "cancelled"

/**
 * Base error for the query engine
 */
export class AskDataError extends Error {
	constructor(
		public kind: AskDataErrorKind,
		message: string,
		public retryable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AskDataError"
	}
}

/**
 * The LLM collaborator produced unusable output (malformed JSON, empty
 * completion, provider error)
 */
export class SynthesisFailure extends AskDataError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("synthesis", message, true, context)
		this.name = "SynthesisFailure"
	}
}

/**
 * A candidate was rejected by the policy guard
 */
export class GuardViolation extends AskDataError {
	constructor(
		message: string,
		public violations: Array<{ rule_id: string; message: string }>,
	) {
		super("guard", message, true, { violations })
		this.name = "GuardViolation"
	}
}

/**
 * Data engine failure
 *
 * - syntax: the candidate itself is wrong; regenerate with a stricter prompt
 * - transient: timeouts, connection loss; safe to run unchanged again
 */
export class ExecutionError extends AskDataError {
	constructor(
		public errorKind: "syntax" | "transient",
		message: string,
		public code?: string,
	) {
		super("execution", message, true, { error_kind: errorKind, code })
		this.name = "ExecutionError"
	}
}

/**
 * Terminal: the attempt bound was reached without an answer
 */
export class RetryExhausted extends AskDataError {
	constructor(
		message: string,
		public attempts: number,
		public lastCandidate?: string,
		public lastViolations: string[] = [],
		public lastError?: string,
		/** Every attempt of the loop, oldest first */
		public attemptLog: readonly Attempt[] = [],
	) {
		super("retry_exhausted", message, false, {
			attempts,
			last_candidate: lastCandidate,
			last_violations: lastViolations,
			last_error: lastError,
		})
		this.name = "RetryExhausted"
	}
}

/**
 * Missing or invalid session context (fatal, never retried)
 */
export class SessionError extends AskDataError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("session", message, false, context)
		this.name = "SessionError"
	}
}

/**
 * The caller aborted or the deadline passed
 */
export class Cancelled extends AskDataError {
	constructor(message: string = "Request was cancelled") {
		super("cancelled", message, false)
		this.name = "Cancelled"
	}
}

/**
 * SQLSTATE classification for execution error handling
 */
export const SQLSTATE_CLASSIFICATION = {
	// Connection, resource and shutdown conditions: the same query may succeed later
	transient: [
		"08", // Connection exception
		"40", // Transaction rollback (serialization failure, deadlock)
		"53", // Insufficient resources
		"57", // Operator intervention (statement_timeout, shutdown)
		"58", // System error
		"XX", // Internal error
	],

	// The query text is at fault: regenerate with feedback
	syntax: [
		"42", // Syntax error or access rule violation
		"22", // Data exception (e.g., division by zero)
		"0A", // Feature not supported
		"21", // Cardinality violation
	],
}

function matchesSQLSTATE(sqlstate: string, codes: string[]): boolean {
	if (codes.includes(sqlstate)) {
		return true
	}
	return codes.some((prefix) => prefix.length === 2 && sqlstate.startsWith(prefix))
}

/**
 * Classify an engine error code into syntax or transient
 *
 * Unknown codes count as syntax: regenerating is the safer default than
 * re-running the same text.
 */
export function classifySQLSTATE(sqlstate: string): "syntax" | "transient" {
	if (matchesSQLSTATE(sqlstate, SQLSTATE_CLASSIFICATION.transient)) {
		return "transient"
	}
	return "syntax"
}

/**
 * Get hint for SQLSTATE error
 */
export function getSQLSTATEHint(sqlstate: string): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use correct table name from the allowed list",
		"42703": "Use correct column name - check schema",
		"42702": "Qualify ambiguous column with table alias",
		"42804": "Fix datatype mismatch in comparison",
		"42883": "Use correct function name or check argument types",
		"42803": "Add missing column to GROUP BY or use aggregate",
		"22012": "Avoid division by zero - add NULLIF or CASE",
		"22P02": "Cast text values before numeric comparison",
		"57014": "Query timed out - simplify query or add filters",
	}
	return hints[sqlstate] || "Review the error message and fix the query"
}
