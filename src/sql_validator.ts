/**
 * SQL Validator with State Machine Parsing
 *
 * Guard rules for the relational dialect, with proper handling of:
 * - Strings (single/double quotes with escaping)
 * - Dollar-quoted strings ($tag$...$tag$)
 * - Comments (line comments and block comments)
 * - Multiple statement detection
 * - Mutating keywords and capability functions
 * - Table allowlist enforcement (CTE names excluded)
 * - LIMIT injection and clamping
 */

import { GUARD_DEFAULTS } from "./config.js"
import type { GuardPolicy, GuardRuleSet, Violation } from "./query_types.js"

const MUTATION_KEYWORDS = new Set(GUARD_DEFAULTS.sqlMutationKeywords)
const CAPABILITY_KEYWORDS = new Set(GUARD_DEFAULTS.sqlCapabilityKeywords)
const CAPABILITY_FUNCTIONS = new Set(GUARD_DEFAULTS.sqlCapabilityFunctions.map((f) => f.toLowerCase()))

// Keywords that end a FROM list at the same nesting level
const FROM_LIST_END = new Set([
	"WHERE",
	"GROUP",
	"HAVING",
	"ORDER",
	"LIMIT",
	"OFFSET",
	"FETCH",
	"UNION",
	"INTERSECT",
	"EXCEPT",
	"WINDOW",
	"FOR",
	"RETURNING",
	"SELECT",
])

/**
 * Token types for state machine
 */
enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

/**
 * Token extracted from SQL
 */
interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/

/**
 * Tokenize SQL with proper handling of strings, comments, and dollar quoting
 */
function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	let i = 0
	const len = sql.length

	const push = (type: TokenType, start: number, end: number) => {
		tokens.push({ type, value: sql.substring(start, end), start, end })
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		// Line comment: -- ...
		if (char === "-" && next === "-") {
			const start = i
			i += 2
			while (i < len && sql[i] !== "\n") {
				i++
			}
			push(TokenType.LINE_COMMENT, start, i)
			continue
		}

		// Block comment: /* ... */
		if (char === "/" && next === "*") {
			const start = i
			i += 2
			let closed = false
			while (i < len - 1) {
				if (sql[i] === "*" && sql[i + 1] === "/") {
					i += 2
					closed = true
					break
				}
				i++
			}
			if (!closed) i = len
			push(TokenType.BLOCK_COMMENT, start, i)
			continue
		}

		// Single-quoted string: '...' (with '' escaping)
		// Double-quoted identifier: "..." (with "" escaping)
		if (char === "'" || char === '"') {
			const start = i
			i++
			while (i < len) {
				if (sql[i] === char) {
					if (i + 1 < len && sql[i + 1] === char) {
						i += 2
						continue
					}
					i++
					break
				}
				i++
			}
			push(char === "'" ? TokenType.SINGLE_QUOTE : TokenType.DOUBLE_QUOTE, start, i)
			continue
		}

		// Dollar-quoted string: $tag$...$tag$ or $$...$$
		if (char === "$") {
			const tagMatch = DOLLAR_TAG.exec(sql.substring(i))
			if (tagMatch) {
				const start = i
				const delim = tagMatch[0]
				const close = sql.indexOf(delim, i + delim.length)
				i = close === -1 ? len : close + delim.length
				push(TokenType.DOLLAR_QUOTE, start, i)
				continue
			}
		}

		// Normal token (accumulate until special char)
		const start = i
		while (
			i < len &&
			sql[i] !== "'" &&
			sql[i] !== '"' &&
			sql[i] !== "$" &&
			sql[i] !== "/" &&
			sql[i] !== "-"
		) {
			i++
		}
		if (i === start) {
			// Lone '-', '/' or '$' that opens nothing
			i++
		}
		push(TokenType.NORMAL, start, i)
	}

	return tokens
}

/**
 * Same-length copy of the SQL with string and comment contents blanked, so
 * positions found in the mask are positions in the original text
 */
function maskSQL(tokens: Token[]): string {
	return tokens
		.map((t) => {
			switch (t.type) {
				case TokenType.NORMAL:
				case TokenType.DOUBLE_QUOTE:
					return t.value
				case TokenType.SINGLE_QUOTE:
				case TokenType.DOLLAR_QUOTE:
					return t.value.length >= 2 ? "'" + " ".repeat(t.value.length - 2) + "'" : " ".repeat(t.value.length)
				default:
					return t.value.replace(/[^\n]/g, " ")
			}
		})
		.join("")
}

/**
 * Remove line and block comments, keeping strings intact
 */
export function stripSqlComments(sql: string): string {
	return tokenizeSQL(sql)
		.map((t) => {
			switch (t.type) {
				case TokenType.LINE_COMMENT:
					return ""
				case TokenType.BLOCK_COMMENT:
					return " "
				default:
					return t.value
			}
		})
		.join("")
		.replace(/[ \t]+$/gm, "")
		.trim()
}

// ============================================================================
// Lexemes
// ============================================================================

interface Lexeme {
	kind: "word" | "quoted" | "number" | "string" | "punct"
	/** Identifier text without quotes; raw text otherwise */
	text: string
	upper: string
	start: number
	end: number
}

function lexMasked(masked: string): Lexeme[] {
	const out: Lexeme[] = []
	const len = masked.length
	let i = 0

	const push = (kind: Lexeme["kind"], text: string, start: number, end: number) => {
		out.push({ kind, text, upper: text.toUpperCase(), start, end })
	}

	while (i < len) {
		const ch = masked[i]
		if (/\s/.test(ch)) {
			i++
			continue
		}
		const start = i
		if (/[A-Za-z_]/.test(ch)) {
			while (i < len && /[A-Za-z0-9_$]/.test(masked[i])) i++
			push("word", masked.substring(start, i), start, i)
		} else if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(masked[i + 1] ?? ""))) {
			while (i < len && /[0-9.]/.test(masked[i])) i++
			if (/[eE]/.test(masked[i] ?? "") && /[-+0-9]/.test(masked[i + 1] ?? "")) {
				i += 2
				while (i < len && /[0-9]/.test(masked[i])) i++
			}
			push("number", masked.substring(start, i), start, i)
		} else if (ch === '"') {
			i++
			let name = ""
			while (i < len) {
				if (masked[i] === '"') {
					if (masked[i + 1] === '"') {
						name += '"'
						i += 2
						continue
					}
					i++
					break
				}
				name += masked[i]
				i++
			}
			push("quoted", name, start, i)
		} else if (ch === "'") {
			const close = masked.indexOf("'", i + 1)
			i = close === -1 ? len : close + 1
			push("string", masked.substring(start, i), start, i)
		} else if (ch === ":" && masked[i + 1] === ":") {
			i += 2
			push("punct", "::", start, i)
		} else {
			i++
			push("punct", ch, start, i)
		}
	}
	return out
}

function isName(lx: Lexeme | undefined): lx is Lexeme {
	return lx !== undefined && (lx.kind === "word" || lx.kind === "quoted")
}

function isPunct(lx: Lexeme | undefined, p: string): boolean {
	return lx !== undefined && lx.kind === "punct" && lx.text === p
}

function isWord(lx: Lexeme | undefined, ...words: string[]): boolean {
	return lx !== undefined && lx.kind === "word" && words.includes(lx.upper)
}

// ============================================================================
// Rule Helpers
// ============================================================================

/**
 * CTE names defined anywhere in the statement (lowercased)
 */
function extractCteNames(masked: string): Set<string> {
	const names = new Set<string>()
	const ident = `("(?:[^"]|"")+"|[A-Za-z_][A-Za-z0-9_$]*)`
	const patterns = [
		new RegExp(`\\bWITH\\s+(?:RECURSIVE\\s+)?${ident}`, "gi"),
		new RegExp(`,\\s*${ident}\\s*(?:\\([^()]*\\)\\s*)?AS\\s*(?:NOT\\s+)?(?:MATERIALIZED\\s+)?\\(`, "gi"),
	]
	for (const pattern of patterns) {
		let match
		while ((match = pattern.exec(masked)) !== null) {
			const raw = match[1]
			const name = raw.startsWith('"') ? raw.slice(1, -1).replace(/""/g, '"') : raw
			if (["ORDINALITY", "TIME", "RECURSIVE"].includes(name.toUpperCase())) continue
			names.add(name.toLowerCase())
		}
	}
	return names
}

interface Frame {
	query: boolean
	fromList: boolean
	expecting: boolean
}

/**
 * Relations referenced from FROM/JOIN (best-effort, not a full parser)
 *
 * Tracks parenthesis frames so FROM inside EXTRACT/SUBSTRING/TRIM is not
 * taken for a table, and walks comma-separated and parenthesized FROM lists. Table functions
 * (a name followed by "(") are not relations.
 */
function extractTableRefs(lexemes: Lexeme[]): string[] {
	const frames: Frame[] = [{ query: true, fromList: false, expecting: false }]
	const refs: string[] = []

	for (let i = 0; i < lexemes.length; i++) {
		const lx = lexemes[i]
		const top = frames[frames.length - 1]

		if (isPunct(lx, "(")) {
			const subquery = isWord(lexemes[i + 1], "SELECT", "WITH", "VALUES")
			// FROM (a JOIN b ON ...): a parenthesized join list is still a FROM list
			const joinList = top.query && top.expecting && !subquery
			top.expecting = false
			frames.push({ query: subquery || joinList, fromList: joinList, expecting: joinList })
			continue
		}
		if (isPunct(lx, ")")) {
			if (frames.length > 1) frames.pop()
			continue
		}
		if (!top.query) continue

		if ((isWord(lx, "FROM") && !isWord(lexemes[i - 1], "DISTINCT")) || isWord(lx, "JOIN")) {
			top.fromList = true
			top.expecting = true
			continue
		}
		if (lx.kind === "word" && FROM_LIST_END.has(lx.upper)) {
			top.fromList = false
			top.expecting = false
			continue
		}
		if (isPunct(lx, ",") && top.fromList) {
			top.expecting = true
			continue
		}
		if (top.expecting && isName(lx)) {
			if (isWord(lx, "LATERAL", "ONLY")) continue
			const parts = [lx.text]
			let j = i
			while (isPunct(lexemes[j + 1], ".") && isName(lexemes[j + 2])) {
				parts.push(lexemes[j + 2].text)
				j += 2
			}
			if (!isPunct(lexemes[j + 1], "(")) {
				refs.push(parts.join(".").toLowerCase())
			}
			top.expecting = false
			i = j
		}
	}

	return Array.from(new Set(refs))
}

function isAllowedTable(name: string, allowed: Set<string>): boolean {
	if (allowed.has(name)) return true
	if (name.includes(".")) return false
	for (const entry of allowed) {
		if (entry.endsWith("." + name)) return true
	}
	return false
}

/**
 * Positions of top-level (depth 0) lexemes
 */
function topLevelIndexes(lexemes: Lexeme[]): number[] {
	const indexes: number[] = []
	let depth = 0
	lexemes.forEach((lx, i) => {
		if (isPunct(lx, "(")) depth++
		else if (isPunct(lx, ")")) depth = Math.max(0, depth - 1)
		else if (depth === 0) indexes.push(i)
	})
	return indexes
}

// ============================================================================
// Rule Set
// ============================================================================

/**
 * Build the relational rule set over one candidate text
 */
export function sqlRuleSet(candidateText: string, policy: GuardPolicy): GuardRuleSet {
	const text = candidateText.trim()
	const masked = maskSQL(tokenizeSQL(text))
	const lexemes = lexMasked(masked)
	const code = lexemes.filter((lx) => !isPunct(lx, ";"))
	const lastCode = code[code.length - 1]

	return {
		shape(): Violation | null {
			if (code.length === 0) {
				return { rule_id: "MultiStatement", message: "Query is empty; expected one SELECT statement" }
			}
			const semicolons = lexemes.filter((lx) => isPunct(lx, ";"))
			const trailingOnly =
				semicolons.length === 0 ||
				(semicolons.length === 1 && semicolons[0] === lexemes[lexemes.length - 1])
			if (!trailingOnly) {
				return { rule_id: "MultiStatement", message: "Multiple statements detected (separated by semicolons)" }
			}
			return null
		},

		mutation(): Violation | null {
			const found = new Set<string>()
			for (const lx of lexemes) {
				if (lx.kind === "word" && MUTATION_KEYWORDS.has(lx.upper)) found.add(lx.upper)
			}
			if (found.size > 0) {
				return { rule_id: "ForbiddenOperation", message: `Forbidden keywords detected: ${[...found].join(", ")}` }
			}
			let first = 0
			while (isPunct(code[first], "(")) first++
			if (!isWord(code[first], "SELECT", "WITH")) {
				return { rule_id: "ForbiddenOperation", message: "Query must start with SELECT or WITH" }
			}
			return null
		},

		scope(): Violation | null {
			const allowed = new Set(policy.allowedObjects.map((o) => o.toLowerCase()))
			const ctes = extractCteNames(masked)
			const unknown = extractTableRefs(lexemes).filter(
				(t) => !ctes.has(t) && !CAPABILITY_FUNCTIONS.has(t) && !isAllowedTable(t, allowed),
			)
			if (unknown.length > 0) {
				const plain = policy.allowedObjects.filter((o) => !o.includes("."))
				const listed = plain.length > 0 ? plain : policy.allowedObjects
				return {
					rule_id: "UnauthorizedObject",
					message: `Unknown tables: ${unknown.join(", ")}. Use only these tables: ${listed.join(", ")}`,
				}
			}
			return null
		},

		resource(): string {
			const max = policy.maxLimit
			const replacements: Array<{ start: number; end: number; text: string }> = []
			let bounded = false
			let opaque = false

			const top = topLevelIndexes(lexemes)
			for (const idx of top) {
				const lx = lexemes[idx]
				if (isWord(lx, "LIMIT")) {
					bounded = true
					const arg = lexemes[idx + 1]
					if (arg && arg.kind === "number") {
						if (Number(arg.text) > max) replacements.push({ start: arg.start, end: arg.end, text: String(max) })
					} else if (arg && isWord(arg, "ALL")) {
						replacements.push({ start: arg.start, end: arg.end, text: String(max) })
					} else {
						opaque = true
					}
				} else if (isWord(lx, "FETCH") && isWord(lexemes[idx + 1], "FIRST", "NEXT")) {
					bounded = true
					const arg = lexemes[idx + 2]
					if (arg && arg.kind === "number") {
						if (Number(arg.text) > max) replacements.push({ start: arg.start, end: arg.end, text: String(max) })
					} else if (!isWord(arg, "ROW", "ROWS")) {
						opaque = true
					}
				}
			}

			if (!lastCode) return text
			const body = text.slice(0, lastCode.end)
			const tail = lexemes.some((lx) => isPunct(lx, ";")) ? ";" : ""

			if (opaque) {
				return `SELECT * FROM (${body}) AS bounded LIMIT ${max}${tail}`
			}
			if (!bounded) {
				return `${body} LIMIT ${max}${tail}`
			}
			let out = text
			for (const r of replacements.sort((a, b) => b.start - a.start)) {
				out = out.slice(0, r.start) + r.text + out.slice(r.end)
			}
			return out
		},

		environment(): Violation | null {
			const found = new Set<string>()
			lexemes.forEach((lx, i) => {
				if (isName(lx) && isPunct(lexemes[i + 1], "(") && CAPABILITY_FUNCTIONS.has(lx.text.toLowerCase())) {
					found.add(lx.text.toLowerCase())
				} else if (lx.kind === "word" && CAPABILITY_KEYWORDS.has(lx.upper)) {
					found.add(lx.upper)
				}
			})
			if (found.size > 0) {
				return {
					rule_id: "UnsafeCapability",
					message: `File, network or process access is not allowed: ${[...found].join(", ")}`,
				}
			}
			return null
		},
	}
}
