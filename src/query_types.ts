/**
 * Data model shared across the query pipeline
 *
 * Defines types for:
 * - Tables (the canonical result shape)
 * - Schema descriptors produced by introspection
 * - Query candidates, guard verdicts and attempts
 * - History turns
 */

import type { AskDataError, Dialect } from "./config.js"

// ============================================================================
// Tables
// ============================================================================

export type Row = Record<string, unknown>

/**
 * Canonical in-memory result shape produced by the executor
 */
export interface Table {
	columns: string[]
	rows: Row[]
	row_count: number
}

export function makeTable(columns: string[], rows: Row[]): Table {
	return { columns, rows, row_count: rows.length }
}

// ============================================================================
// Schema
// ============================================================================

export interface ColumnDescriptor {
	name: string
	inferred_type: string
	sample_values: string[]
	/** Domain glossary entry, when one is configured */
	description?: string
}

/**
 * One accessible table or frame
 */
export interface SchemaDescriptor {
	object_name: string
	columns: ColumnDescriptor[]
}

// ============================================================================
// Candidates and Verdicts
// ============================================================================

export type SourceStage = "synthesis" | "repair"

/**
 * A generated, not-yet-validated snippet
 */
export interface QueryCandidate {
	text: string
	declared_columns: string[]
	source_stage: SourceStage
	dialect: Dialect
	reasoning: string
}

export type GuardRuleId =
	| "MultiStatement"
	| "ForbiddenOperation"
	| "UnauthorizedObject"
	| "UnsafeCapability"

export interface Violation {
	rule_id: GuardRuleId
	message: string
}

/**
 * Deterministic decision over a candidate; normalized_text is what runs
 */
export interface GuardVerdict {
	accepted: boolean
	normalized_text: string
	violations: Violation[]
}

/**
 * Policy the guard enforces for one session
 */
export interface GuardPolicy {
	/** Table or frame names the candidate may reference (case-insensitive for SQL) */
	readonly allowedObjects: readonly string[]
	readonly maxLimit: number
}

/**
 * One dialect's rules over a single candidate text, evaluated in order by
 * the policy guard
 */
export interface GuardRuleSet {
	shape(): Violation | null
	mutation(): Violation | null
	scope(): Violation | null
	/** Returns the text with its result bound injected or clamped */
	resource(): string
	environment(): Violation | null
}

// ============================================================================
// Attempts
// ============================================================================

export type AttemptOutcome = "guard_rejected" | "empty" | "error" | "synthesis_failed" | "success"

/**
 * One iteration of synthesize → guard → execute
 */
export interface Attempt {
	candidate?: QueryCandidate
	verdict?: GuardVerdict
	outcome: AttemptOutcome
	/** GuardViolation, ExecutionError or SynthesisFailure; absent on success */
	error_detail?: AskDataError
}

// ============================================================================
// History
// ============================================================================

/**
 * One completed question/answer exchange
 */
export interface Turn {
	raw_question: string
	rewritten_question: string
	rationale: string
	query_text: string
	used_columns: string[]
	result_table: Table
	/** ISO-8601 */
	timestamp: string
}
