/**
 * Result Reconciler
 *
 * Post-processes a successful result:
 * - Expands identifier-only projections back into full source rows when the
 *   result is small
 * - Renders the canonical pipe-table text that callers and history see
 */

import { makeTable, type Row, type Table } from "./query_types.js"

export interface ReconcileOptions {
	/** Column carrying the stable source-row identifier */
	rowIdColumn: string
	/** Expand only when the number of distinct identifiers is below this */
	expandThreshold: number
}

/**
 * Fetch full source rows for the given identifiers
 */
export type RowLookup = (ids: unknown[]) => Promise<Table>

export interface ReconcileResult {
	table: Table
	expanded: boolean
}

export const EMPTY_TABLE_TEXT = "| (empty) |\n|---|\n| (no rows) |"

// ============================================================================
// Expansion
// ============================================================================

function idKey(value: unknown): string {
	return typeof value === "number" || typeof value === "bigint" ? `n:${value}` : `s:${String(value)}`
}

/**
 * Distinct identifiers in order of first appearance (null/undefined skipped)
 */
export function distinctIds(table: Table, rowIdColumn: string): unknown[] {
	const seen = new Set<string>()
	const ids: unknown[] = []
	for (const row of table.rows) {
		const value = row[rowIdColumn]
		if (value === null || value === undefined) continue
		const key = idKey(value)
		if (seen.has(key)) continue
		seen.add(key)
		ids.push(value)
	}
	return ids
}

/**
 * Replace an identifier-keyed result with its full source rows
 *
 * Passes the table through unchanged when the identifier column is missing,
 * when there are no identifiers or the threshold is reached, when no lookup is
 * available, or when the lookup finds nothing.
 */
export async function reconcile(
	table: Table,
	options: ReconcileOptions,
	lookup?: RowLookup,
): Promise<ReconcileResult> {
	if (!lookup || !table.columns.includes(options.rowIdColumn)) {
		return { table, expanded: false }
	}

	const ids = distinctIds(table, options.rowIdColumn)
	if (ids.length === 0 || ids.length >= options.expandThreshold) {
		return { table, expanded: false }
	}

	const source = await lookup(ids)
	if (source.row_count === 0) {
		return { table, expanded: false }
	}

	// Engines may return rows in storage order; restore first-appearance order
	const byId = new Map<string, Row>()
	for (const row of source.rows) {
		const key = String(row[options.rowIdColumn])
		if (!byId.has(key)) byId.set(key, row)
	}
	const ordered: Row[] = []
	for (const id of ids) {
		const row = byId.get(String(id))
		if (row) ordered.push(row)
	}

	if (ordered.length === 0) {
		return { table, expanded: false }
	}
	return { table: makeTable(source.columns, ordered), expanded: true }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render one cell: null → "", objects as JSON, whitespace collapsed, pipes escaped
 */
export function formatCell(value: unknown): string {
	let text: string
	if (value === null || value === undefined) {
		text = ""
	} else if (value instanceof Date) {
		text = isNaN(value.getTime()) ? "" : value.toISOString()
	} else if (typeof value === "number") {
		text = Number.isNaN(value) ? "" : String(value)
	} else if (typeof value === "object") {
		text = JSON.stringify(value)
	} else {
		text = String(value)
	}
	return text.replace(/\s+/g, " ").trim().replace(/\|/g, "\\|")
}

/**
 * Canonical pipe table
 *
 * @param maxRows - render only the first N rows
 */
export function renderTable(table: Table, maxRows?: number): string {
	if (table.columns.length === 0 || table.rows.length === 0) {
		return EMPTY_TABLE_TEXT
	}
	const rows = maxRows === undefined ? table.rows : table.rows.slice(0, maxRows)
	const header = "| " + table.columns.map(formatCell).join(" | ") + " |"
	const sep = "|" + table.columns.map(() => "---").join("|") + "|"
	const body = rows.map((row) => "| " + table.columns.map((c) => formatCell(row[c])).join(" | ") + " |")
	return [header, sep, ...body].join("\n")
}
