/**
 * History Store
 *
 * Ordered, append-only record of completed turns for one session, and the
 * token-bounded context string built from them for synthesis prompts.
 * No network or disk access.
 */

import { HISTORY_CONFIG } from "./config.js"
import type { Table, Turn } from "./query_types.js"
import { renderTable } from "./result_reconciler.js"

export interface HistoryStoreOptions {
	/** Default context budget in estimated tokens */
	maxTokens?: number
	/** Rows of the result table included in each serialized turn */
	previewRows?: number
}

/**
 * Approximate token count (4 chars per token)
 */
export function estimateTokens(text: string): number {
	return Math.max(1, Math.ceil(text.length / 4))
}

function deepFreeze(value: unknown): void {
	if (value === null || typeof value !== "object" || Object.isFrozen(value)) return
	Object.freeze(value)
	for (const child of Object.values(value)) {
		deepFreeze(child)
	}
}

function copyTable(table: Table): Table {
	return {
		columns: [...table.columns],
		rows: table.rows.map((row) => ({ ...row })),
		row_count: table.row_count,
	}
}

interface SerializeParts {
	answer: boolean
	rationale: boolean
	usedColumns: boolean
	/** Replacement for the query text (shortened form) */
	query?: string
}

const FULL: SerializeParts = { answer: true, rationale: true, usedColumns: true }

// Dropped in this order when one turn alone is over budget
const TRUNCATION_STAGES: SerializeParts[] = [
	{ answer: false, rationale: true, usedColumns: true },
	{ answer: false, rationale: false, usedColumns: true },
	{ answer: false, rationale: false, usedColumns: false },
]

export class HistoryStore {
	private readonly items: Turn[] = []
	private readonly maxTokens: number
	private readonly previewRows: number

	constructor(options: HistoryStoreOptions = {}) {
		this.maxTokens = options.maxTokens ?? HISTORY_CONFIG.maxTokens
		this.previewRows = options.previewRows ?? HISTORY_CONFIG.previewRows
	}

	get size(): number {
		return this.items.length
	}

	/** Read-only snapshot, oldest first */
	turns(): readonly Turn[] {
		return [...this.items]
	}

	/**
	 * Freeze and append a turn
	 *
	 * @returns false when the turn repeats the last one and was not stored
	 */
	append(turn: Turn): boolean {
		const last = this.items[this.items.length - 1]
		if (last && this.isDuplicate(last, turn)) {
			return false
		}
		const stored: Turn = {
			...turn,
			raw_question: turn.raw_question.trim(),
			rewritten_question: turn.rewritten_question.trim(),
			used_columns: [...new Set(turn.used_columns)],
			result_table: copyTable(turn.result_table),
		}
		deepFreeze(stored)
		this.items.push(stored)
		return true
	}

	clear(): void {
		this.items.length = 0
	}

	/**
	 * Build the context string: most recent turns that fit within `budget`
	 * estimated tokens, rendered oldest-first
	 */
	context(budget: number = this.maxTokens): string {
		if (this.items.length === 0 || budget <= 0) return ""

		const pieces: string[] = []
		for (let i = this.items.length - 1; i >= 0; i--) {
			const block = this.serialize(this.items[i], FULL)
			const joined = [block, ...pieces].join("\n")
			if (estimateTokens(joined) <= budget) {
				pieces.unshift(block)
				continue
			}
			if (pieces.length === 0) {
				pieces.unshift(this.truncate(this.items[i], budget))
			}
			break
		}
		return pieces.join("\n")
	}

	private isDuplicate(a: Turn, b: Turn): boolean {
		return (
			a.raw_question.trim() === b.raw_question.trim() &&
			a.rewritten_question.trim() === b.rewritten_question.trim() &&
			a.query_text === b.query_text &&
			renderTable(a.result_table) === renderTable(b.result_table)
		)
	}

	private serialize(turn: Turn, parts: SerializeParts): string {
		const lines = [
			"<turn>",
			`<question_original>${turn.raw_question}</question_original>`,
			`<question_rewritten>${turn.rewritten_question}</question_rewritten>`,
		]
		if (parts.rationale && turn.rationale) {
			lines.push(`<rationale>${turn.rationale}</rationale>`)
		}
		if (parts.usedColumns) {
			lines.push(`<used_columns>${JSON.stringify(turn.used_columns)}</used_columns>`)
		}
		lines.push(`<executed_query>${parts.query ?? turn.query_text}</executed_query>`)
		if (parts.answer) {
			lines.push(`<answer>\n${renderTable(turn.result_table, this.previewRows)}\n</answer>`)
		}
		lines.push("</turn>")
		return lines.join("\n")
	}

	/**
	 * Shrink a single over-budget turn: preview, rationale and used columns
	 * go first, then the query text; the questions are cut only by the final
	 * hard limit
	 */
	private truncate(turn: Turn, budget: number): string {
		const maxChars = budget * 4

		for (const stage of TRUNCATION_STAGES) {
			const block = this.serialize(turn, stage)
			if (block.length <= maxChars) return block
		}

		const bare: SerializeParts = { answer: false, rationale: false, usedColumns: false, query: "" }
		const room = maxChars - this.serialize(turn, bare).length
		if (room > 1) {
			return this.serialize(turn, { ...bare, query: turn.query_text.slice(0, room - 1) + "…" })
		}

		return this.serialize(turn, bare).slice(0, maxChars)
	}
}
