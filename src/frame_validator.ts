/**
 * Frame Expression Validator
 *
 * Guard rules for the dataframe dialect: a single JavaScript expression over
 * the frame (`df`) and the helper functions. The lexer understands strings,
 * template literals (including `${}` substitutions), regex literals and
 * comments, so rules only look at code.
 */

import { FRAME_HELPERS, FRAME_SAFE_GLOBALS, GUARD_DEFAULTS } from "./config.js"
import type { GuardPolicy, GuardRuleSet, Violation } from "./query_types.js"

const MUTATION_METHODS = new Set(GUARD_DEFAULTS.frameMutationMethods)
const MUTATION_CALLS = new Set(GUARD_DEFAULTS.frameMutationCalls)
const CAPABILITY_NAMES = new Set(GUARD_DEFAULTS.frameCapabilityNames)

const KEYWORDS = new Set([
	"break", "case", "catch", "class", "const", "continue", "debugger", "default", "delete",
	"do", "else", "export", "extends", "false", "finally", "for", "function", "if", "import",
	"in", "instanceof", "let", "new", "null", "of", "return", "super", "switch", "this",
	"throw", "true", "try", "typeof", "var", "void", "while", "with", "yield", "async", "await",
])

// A candidate starting with one of these is a statement, not an expression
const STATEMENT_KEYWORDS = new Set([
	"break", "class", "const", "continue", "debugger", "do", "export", "for", "function",
	"if", "import", "let", "return", "switch", "throw", "try", "var", "while", "with",
])

// Keywords after which "/" starts a regex literal
const REGEX_PRECEDERS = new Set([
	"return", "typeof", "instanceof", "in", "of", "new", "delete", "void", "throw",
	"case", "do", "else", "yield", "await",
])

const ASSIGNMENT_OPERATORS = new Set([
	"=", "+=", "-=", "*=", "/=", "%=", "**=", "<<=", ">>=", ">>>=", "&=", "|=", "^=", "&&=", "||=", "??=",
])

const OPERATORS = [
	">>>=", "...", "===", "!==", "**=", "<<=", ">>=", ">>>", "&&=", "||=", "??=",
	"=>", "==", "!=", "<=", ">=", "&&", "||", "??", "?.", "++", "--", "+=", "-=", "*=", "/=",
	"%=", "&=", "|=", "^=", "**", "<<", ">>",
]

const IDENT_RE = /[A-Za-z_$\u0080-\uffff][\w$\u0080-\uffff]*/y
const NUMBER_RE = /(?:0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*)?\.?\d[\d_]*(?:[eE][+-]?\d+)?)n?/y

type JsTokenKind = "ident" | "keyword" | "number" | "string" | "template" | "regex" | "punct"

interface JsToken {
	kind: JsTokenKind
	/** Decoded content for strings and template chunks */
	value: string
	start: number
	end: number
	newlineBefore: boolean
}

// ============================================================================
// Lexer
// ============================================================================

const SIMPLE_ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", b: "\b", f: "\f", v: "\v", "0": "\0" }

/**
 * Read an escape sequence starting after the backslash at `i`
 */
function readEscape(src: string, i: number): { text: string; next: number } {
	const ch = src[i] ?? ""
	if (ch === "x") {
		const hex = src.substring(i + 1, i + 3)
		return { text: String.fromCharCode(parseInt(hex, 16) || 0), next: i + 3 }
	}
	if (ch === "u") {
		if (src[i + 1] === "{") {
			const close = src.indexOf("}", i + 2)
			const end = close === -1 ? src.length : close
			const code = parseInt(src.substring(i + 2, end), 16)
			return { text: isNaN(code) || code > 0x10ffff ? "" : String.fromCodePoint(code), next: end + 1 }
		}
		const hex = src.substring(i + 1, i + 5)
		return { text: String.fromCharCode(parseInt(hex, 16) || 0), next: i + 5 }
	}
	if (ch === "\r" || ch === "\n") {
		return { text: "", next: i + 1 }
	}
	return { text: SIMPLE_ESCAPES[ch] ?? ch, next: i + 1 }
}

function lastSignificant(tokens: JsToken[]): JsToken | undefined {
	return tokens[tokens.length - 1]
}

function regexAllowed(prev: JsToken | undefined): boolean {
	if (!prev) return true
	if (prev.kind === "keyword") return REGEX_PRECEDERS.has(prev.value)
	if (prev.kind === "punct") return ![")", "]", "}", "++", "--"].includes(prev.value)
	return false
}

/**
 * Tokenize a JavaScript expression; comment ranges go to `comments` when given
 */
function lexJs(src: string, comments: Array<[number, number]> = []): JsToken[] {
	const tokens: JsToken[] = []
	const len = src.length
	// Open brace counts inside each active template substitution
	const templateBraces: number[] = []
	let i = 0
	let newline = false

	const push = (kind: JsTokenKind, value: string, start: number, end: number) => {
		tokens.push({ kind, value, start, end, newlineBefore: newline })
		newline = false
	}

	// Scan template text from `from` up to the closing backtick or a `${`
	const scanTemplate = (from: number) => {
		let j = from
		let text = ""
		while (j < len) {
			if (src[j] === "\\") {
				const esc = readEscape(src, j + 1)
				text += esc.text
				j = esc.next
				continue
			}
			if (src[j] === "`") {
				push("template", text, from, j + 1)
				return j + 1
			}
			if (src[j] === "$" && src[j + 1] === "{") {
				push("template", text, from, j)
				push("punct", "${", j, j + 2)
				templateBraces.push(0)
				return j + 2
			}
			text += src[j]
			j++
		}
		push("template", text, from, len)
		return len
	}

	while (i < len) {
		const ch = src[i]
		const next = src[i + 1] ?? ""

		if (ch === "\n" || ch === "\r" || ch === "\u2028" || ch === "\u2029") {
			newline = true
			i++
			continue
		}
		if (/\s/.test(ch)) {
			i++
			continue
		}

		// Comments
		if (ch === "/" && next === "/") {
			const start = i
			while (i < len && src[i] !== "\n") i++
			comments.push([start, i])
			continue
		}
		if (ch === "/" && next === "*") {
			const close = src.indexOf("*/", i + 2)
			const end = close === -1 ? len : close + 2
			if (src.substring(i, end).includes("\n")) newline = true
			comments.push([i, end])
			i = end
			continue
		}

		// Strings
		if (ch === "'" || ch === '"') {
			const start = i
			let text = ""
			i++
			while (i < len && src[i] !== ch && src[i] !== "\n") {
				if (src[i] === "\\") {
					const esc = readEscape(src, i + 1)
					text += esc.text
					i = esc.next
					continue
				}
				text += src[i]
				i++
			}
			i = Math.min(len, i + 1)
			push("string", text, start, i)
			continue
		}

		// Templates
		if (ch === "`") {
			i = scanTemplate(i + 1)
			continue
		}

		// Braces (template substitution aware)
		if (ch === "{") {
			if (templateBraces.length > 0) templateBraces[templateBraces.length - 1]++
			push("punct", "{", i, i + 1)
			i++
			continue
		}
		if (ch === "}") {
			push("punct", "}", i, i + 1)
			i++
			if (templateBraces.length > 0) {
				if (templateBraces[templateBraces.length - 1] === 0) {
					templateBraces.pop()
					i = scanTemplate(i)
				} else {
					templateBraces[templateBraces.length - 1]--
				}
			}
			continue
		}

		// Regex literal
		if (ch === "/" && regexAllowed(lastSignificant(tokens))) {
			const start = i
			let inClass = false
			i++
			while (i < len && src[i] !== "\n") {
				if (src[i] === "\\") {
					i += 2
					continue
				}
				if (src[i] === "[") inClass = true
				else if (src[i] === "]") inClass = false
				else if (src[i] === "/" && !inClass) break
				i++
			}
			i = Math.min(len, i + 1)
			while (i < len && /[a-z]/.test(src[i])) i++
			push("regex", src.substring(start, i), start, i)
			continue
		}

		// Identifiers and keywords
		IDENT_RE.lastIndex = i
		const ident = IDENT_RE.exec(src)
		if (ident) {
			const word = ident[0]
			push(KEYWORDS.has(word) ? "keyword" : "ident", word, i, i + word.length)
			i += word.length
			continue
		}

		// Numbers
		if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(next))) {
			NUMBER_RE.lastIndex = i
			const num = NUMBER_RE.exec(src)
			const text = num ? num[0] : ch
			push("number", text, i, i + text.length)
			i += text.length
			continue
		}

		const op = OPERATORS.find((o) => src.startsWith(o, i))
		const value = op ?? ch
		push("punct", value, i, i + value.length)
		i += value.length
	}

	return tokens
}

/**
 * Remove comments from an expression, keeping strings and templates intact
 */
export function stripFrameComments(src: string): string {
	const comments: Array<[number, number]> = []
	lexJs(src, comments)
	let out = src
	for (const [start, end] of [...comments].reverse()) {
		const isBlock = src.startsWith("/*", start)
		out = out.slice(0, start) + (isBlock ? " " : "") + out.slice(end)
	}
	return out.replace(/[ \t]+$/gm, "").trim()
}

// ============================================================================
// Structure
// ============================================================================

interface Structure {
	/** Index of the matching bracket for every bracket token */
	match: Map<number, number>
	/** Bracket depth before each token */
	depth: number[]
	/** Index of the innermost open bracket around each token (-1 at top level) */
	enclosing: number[]
}

const OPENERS = ["(", "[", "{", "${"]
const CLOSERS = [")", "]", "}"]

function analyzeStructure(tokens: JsToken[]): Structure {
	const match = new Map<number, number>()
	const depth: number[] = []
	const enclosing: number[] = []
	const stack: number[] = []

	// Both brackets of a pair sit at the depth outside them
	tokens.forEach((tok, i) => {
		if (isPunct(tok, ...CLOSERS)) {
			const open = stack.pop()
			if (open !== undefined) {
				match.set(open, i)
				match.set(i, open)
			}
		}
		depth.push(stack.length)
		enclosing.push(stack.length > 0 ? stack[stack.length - 1] : -1)
		if (isPunct(tok, ...OPENERS)) {
			stack.push(i)
		}
	})
	return { match, depth, enclosing }
}

function isPunct(tok: JsToken | undefined, ...values: string[]): boolean {
	return tok !== undefined && tok.kind === "punct" && values.includes(tok.value)
}

function isKeyword(tok: JsToken | undefined, ...values: string[]): boolean {
	return tok !== undefined && tok.kind === "keyword" && values.includes(tok.value)
}

function endsExpression(tok: JsToken): boolean {
	switch (tok.kind) {
		case "ident":
		case "number":
		case "string":
		case "template":
		case "regex":
			return true
		case "keyword":
			return ["this", "null", "true", "false"].includes(tok.value)
		default:
			return [")", "]", "}", "++", "--"].includes(tok.value)
	}
}

function startsStatement(tok: JsToken): boolean {
	switch (tok.kind) {
		case "ident":
		case "number":
		case "string":
		case "regex":
			return true
		case "keyword":
			return !["in", "instanceof", "of"].includes(tok.value)
		case "punct":
			return ["{", "!", "~", "++", "--"].includes(tok.value)
		default:
			return false
	}
}

/**
 * Binding names inside a parameter list or destructuring pattern
 */
function collectBindings(tokens: JsToken[], open: number, close: number, into: Set<string>): void {
	for (let k = open + 1; k < close; k++) {
		const tok = tokens[k]
		if (tok.kind !== "ident") continue
		if (
			isPunct(tokens[k - 1], "{", "[", "(", ",", ":", "...") &&
			isPunct(tokens[k + 1], ",", "}", "]", ")", "=")
		) {
			into.add(tok.value)
		}
	}
}

/**
 * Names declared anywhere in the expression (const/let/var, parameters,
 * catch bindings, function names). Block scoping is not modelled.
 */
function collectLocals(tokens: JsToken[], structure: Structure): Set<string> {
	const locals = new Set<string>()

	tokens.forEach((tok, i) => {
		if (isKeyword(tok, "const", "let", "var")) {
			const base = structure.depth[i]
			let k = i + 1
			let expectBinding = true
			while (k < tokens.length) {
				const t = tokens[k]
				const d = structure.depth[k]
				if (d < base) break
				if (d === base) {
					if (isPunct(t, ";") || isKeyword(t, "of", "in", "const", "let", "var")) break
					if (isPunct(t, ",")) {
						expectBinding = true
						k++
						continue
					}
				}
				if (expectBinding && d === base) {
					if (t.kind === "ident") {
						locals.add(t.value)
					} else if (isPunct(t, "{", "[")) {
						const close = structure.match.get(k)
						if (close !== undefined) {
							collectBindings(tokens, k, close, locals)
							k = close
						}
					}
					expectBinding = false
				}
				k++
			}
		} else if (isPunct(tok, "=>")) {
			const prev = tokens[i - 1]
			if (prev && prev.kind === "ident") {
				locals.add(prev.value)
			} else if (isPunct(prev, ")")) {
				const open = structure.match.get(i - 1)
				if (open !== undefined) collectBindings(tokens, open, i - 1, locals)
			}
		} else if (isKeyword(tok, "function")) {
			let k = i + 1
			const name = tokens[k]
			if (name && name.kind === "ident") {
				locals.add(name.value)
				k++
			}
			const close = isPunct(tokens[k], "(") ? structure.match.get(k) : undefined
			if (close !== undefined) collectBindings(tokens, k, close, locals)
		} else if (isKeyword(tok, "catch") && isPunct(tokens[i + 1], "(")) {
			const close = structure.match.get(i + 1)
			if (close !== undefined) collectBindings(tokens, i + 1, close, locals)
		}
	})

	return locals
}

function isDeclarationPattern(tokens: JsToken[], structure: Structure, closeIdx: number): boolean {
	const open = structure.match.get(closeIdx)
	return open !== undefined && isKeyword(tokens[open - 1], "const", "let", "var")
}

function isMemberAccess(tokens: JsToken[], i: number): boolean {
	return isPunct(tokens[i - 1], ".", "?.")
}

// ============================================================================
// Rule Set
// ============================================================================

/**
 * Build the dataframe rule set over one candidate expression
 */
export function frameRuleSet(candidateText: string, policy: GuardPolicy): GuardRuleSet {
	const text = candidateText.trim()
	const tokens = lexJs(text)
	const structure = analyzeStructure(tokens)
	const locals = collectLocals(tokens, structure)

	const trailingSemicolon = isPunct(tokens[tokens.length - 1], ";") && structure.depth[tokens.length - 1] === 0
	const bodyTokens = trailingSemicolon ? tokens.slice(0, -1) : tokens
	const lastBody = bodyTokens[bodyTokens.length - 1]
	const body = lastBody ? text.slice(0, lastBody.end) : ""

	return {
		shape(): Violation | null {
			if (bodyTokens.length === 0) {
				return { rule_id: "MultiStatement", message: "Expression is empty; expected one expression over the frame" }
			}
			const first = bodyTokens[0]
			if (first.kind === "keyword" && STATEMENT_KEYWORDS.has(first.value)) {
				return {
					rule_id: "MultiStatement",
					message: `Expected a single expression, found a '${first.value}' statement`,
				}
			}
			for (let i = 0; i < bodyTokens.length; i++) {
				if (structure.depth[i] !== 0) continue
				const tok = bodyTokens[i]
				if (isPunct(tok, ";")) {
					return { rule_id: "MultiStatement", message: "Multiple statements detected (separated by ';')" }
				}
				const prev = bodyTokens[i - 1]
				if (i > 0 && tok.newlineBefore && prev && structure.depth[i - 1] === 0 && endsExpression(prev) && startsStatement(tok)) {
					return { rule_id: "MultiStatement", message: "Multiple statements detected (separated by line breaks)" }
				}
			}
			return null
		},

		mutation(): Violation | null {
			const found = new Set<string>()
			tokens.forEach((tok, i) => {
				if (isKeyword(tok, "delete")) {
					found.add("delete")
				} else if (isPunct(tok, "++", "--")) {
					found.add(tok.value)
				} else if (tok.kind === "ident" && isMemberAccess(tokens, i) && isPunct(tokens[i + 1], "(") && MUTATION_METHODS.has(tok.value)) {
					found.add(`.${tok.value}()`)
				} else if (tok.kind === "ident" && !isMemberAccess(tokens, i) && isPunct(tokens[i + 1], ".")) {
					const member = tokens[i + 2]
					const qualified = member ? `${tok.value}.${member.value}` : ""
					if (MUTATION_CALLS.has(qualified)) found.add(qualified)
				} else if (tok.kind === "punct" && ASSIGNMENT_OPERATORS.has(tok.value)) {
					const target = tokens[i - 1]
					if (!target) return
					if (target.kind === "ident") {
						if (isMemberAccess(tokens, i - 1)) found.add(`assignment to .${target.value}`)
						else if (!locals.has(target.value)) found.add(`assignment to ${target.value}`)
					} else if (isPunct(target, "]", "}")) {
						if (!isDeclarationPattern(tokens, structure, i - 1)) found.add("assignment to an element")
					} else {
						found.add("assignment")
					}
				}
			})
			if (found.size > 0) {
				return {
					rule_id: "ForbiddenOperation",
					message: `Mutating operations detected: ${[...found].join(", ")}`,
				}
			}
			return null
		},

		scope(): Violation | null {
			const allowed = new Set<string>([...policy.allowedObjects, ...FRAME_HELPERS, ...FRAME_SAFE_GLOBALS])
			const unknown = new Set<string>()
			tokens.forEach((tok, i) => {
				if (tok.kind !== "ident") return
				if (isMemberAccess(tokens, i)) return
				const opener = structure.enclosing[i]
				const isObjectKey =
					isPunct(tokens[i + 1], ":") &&
					isPunct(tokens[i - 1], "{", ",") &&
					opener >= 0 &&
					isPunct(tokens[opener], "{")
				if (isObjectKey) return
				if (locals.has(tok.value) || allowed.has(tok.value) || CAPABILITY_NAMES.has(tok.value)) return
				unknown.add(tok.value)
			})
			if (unknown.size > 0) {
				return {
					rule_id: "UnauthorizedObject",
					message: `Unknown names: ${[...unknown].join(", ")}. Use only: ${[...policy.allowedObjects, ...FRAME_HELPERS].join(", ")}`,
				}
			}
			return null
		},

		resource(): string {
			const max = policy.maxLimit
			if (!lastBody) return text
			const n = bodyTokens.length
			const lastIdx = n - 1

			// limit(<expr>, n) around the whole expression
			const first = bodyTokens[0]
			if (first.kind === "ident" && first.value === "limit" && isPunct(bodyTokens[1], "(") && structure.match.get(1) === lastIdx) {
				let comma = -1
				for (let k = 2; k < lastIdx; k++) {
					if (structure.depth[k] === 1 && isPunct(bodyTokens[k], ",")) comma = k
				}
				const arg = bodyTokens[comma + 1]
				if (comma > 0 && comma + 2 === lastIdx && arg.kind === "number") {
					if (Number(arg.value) <= max) return text
					return text.slice(0, arg.start) + String(max) + text.slice(arg.end)
				}
			}

			// Trailing .slice(0, n)
			const tail = bodyTokens.slice(-7)
			if (
				tail.length === 7 &&
				isPunct(tail[0], ".") &&
				tail[1].value === "slice" &&
				isPunct(tail[2], "(") &&
				tail[3].kind === "number" &&
				Number(tail[3].value) === 0 &&
				isPunct(tail[4], ",") &&
				tail[5].kind === "number" &&
				isPunct(tail[6], ")") &&
				structure.depth[n - 7] === 0
			) {
				if (Number(tail[5].value) <= max) return text
				return text.slice(0, tail[5].start) + String(max) + text.slice(tail[5].end)
			}

			return `limit(${body}, ${max})`
		},

		environment(): Violation | null {
			const found = new Set<string>()
			tokens.forEach((tok, i) => {
				if ((tok.kind === "ident" || tok.kind === "keyword") && CAPABILITY_NAMES.has(tok.value)) {
					found.add(tok.value)
					return
				}
				// Computed keys (obj[k], { [k]: v }) may only be a number or a plain string
				if (!isPunct(tok, "[")) return
				const prev = tokens[i - 1]
				const opener = structure.enclosing[i]
				const isMemberKey = prev !== undefined && (endsExpression(prev) || isPunct(prev, "?."))
				const isPropertyKey = isPunct(prev, "{", ",") && opener >= 0 && isPunct(tokens[opener], "{")
				if (!isMemberKey && !isPropertyKey) return

				const close = structure.match.get(i)
				const key = tokens[i + 1]
				if (close === i + 2 && key.kind === "number") return
				if (close === i + 2 && key.kind === "string") {
					if (CAPABILITY_NAMES.has(key.value.trim())) found.add(key.value.trim())
					return
				}
				const end = close !== undefined ? tokens[close].end : text.length
				found.add(`computed key ${text.slice(tok.start, end)}`)
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
