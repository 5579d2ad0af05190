/**
 * Query Synthesizer
 *
 * Second synthesis stage: narrows the schema to the columns the question
 * needs, then turns the rewritten question, schema, history and optional
 * repair feedback into a Query Candidate for one dialect.
 *
 * The prompt carries the dialect rules (read-only, single statement or
 * expression, result bound, tie ordering, NULL handling). On repair cycles a
 * <repair_feedback> block describes why the previous candidate failed.
 */

import { z } from "zod"
import { FRAME_HELPERS, SynthesisFailure, type Dialect } from "./config.js"
import { readConfigJson } from "./config/loadConfig.js"
import { stripFrameComments } from "./frame_validator.js"
import { parseJsonCompletion, stripCodeFence, type LLMClient } from "./llm_client.js"
import { silentLogger, type Logger } from "./logger.js"
import type { QueryCandidate, SchemaDescriptor } from "./query_types.js"
import { stripSqlComments } from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export interface FewShotExample {
	question: string
	query: string
}

export type FeedbackKind = "guard_rejected" | "empty" | "syntax_error" | "synthesis_failed"

/**
 * Why the previous attempt failed, fed back into the next prompt
 */
export interface RepairFeedback {
	kind: FeedbackKind
	previous_candidate?: string
	/** Guard violations or the engine/synthesis error message */
	details: string[]
}

export interface SynthesisInput {
	question: string
	schema: readonly SchemaDescriptor[]
	historyContext: string
	dialect: Dialect
	maxLimit: number
	rowIdColumn: string
	/** Frame variable name (dataframe dialect) */
	frameName?: string
	examples?: readonly FewShotExample[]
	columnHints?: readonly string[]
	feedback?: RepairFeedback
}

export interface SynthesizerDeps {
	llm: LLMClient
	model?: string
	signal?: AbortSignal
	logger?: Logger
}

const synthesisOutputSchema = z.object({
	query: z.string().optional(),
	sql: z.string().optional(),
	columns: z.array(z.string()).optional(),
	reasoning: z.string().optional(),
})

// ============================================================================
// Prompt
// ============================================================================

function sqlRules(input: SynthesisInput): string[] {
	return [
		"Output exactly ONE read-only SELECT statement (WITH ... SELECT is allowed). No INSERT/UPDATE/DELETE/DDL, no semicolon-separated statements.",
		"Use only the tables and columns listed in <schema>.",
		`Bound the result with LIMIT ${input.maxLimit} or less; apply ORDER BY before LIMIT.`,
		`When the question gives no order and rows tie, order by ${input.rowIdColumn} ASC.`,
		`When the answer is a set of source rows, include ${input.rowIdColumn} in the output columns.`,
		"Exclude NULLs before numeric comparisons (IS NOT NULL) and CAST text to numbers when needed.",
		"Round non-integer results to 6 decimal places.",
		"No file, network or system functions.",
	]
}

function frameRules(input: SynthesisInput): string[] {
	const frame = input.frameName ?? "df"
	return [
		`Output exactly ONE JavaScript expression over \`${frame}\` (an array of row objects). No statements, no semicolons between expressions.`,
		`Never modify ${frame} or its rows: no assignment to members, no push/pop/splice/sort/reverse, no delete, no ++/--. Copy first when you need a sorted list, or use sortBy.`,
		`Helpers: ${FRAME_HELPERS.join(", ")}. groupBy(rows, key) returns [{ key, rows }]; mean/sum/min/max(rows, key?) aggregate a field or plain numbers; sortBy(rows, key, "asc" | "desc"); limit(rows, n); round(x, digits).`,
		`Bound row results with limit(expr, ${input.maxLimit}) or less.`,
		`When the question gives no order and rows tie, keep ${input.rowIdColumn} ascending.`,
		`When the answer is a set of source rows, keep ${input.rowIdColumn} in each output record.`,
		"Skip null and empty values before numeric comparisons; use toNumber for text values.",
		"Round non-integer results to 6 decimal places.",
		"Read fields with dot access; a bracket key must be a number or a quoted string literal.",
		"No require, import, process, fetch, eval, timers or globalThis.",
	]
}

function renderSchema(schema: readonly SchemaDescriptor[]): string {
	if (schema.length === 0) return "(no schema)"
	return schema
		.map((table) => {
			const lines = table.columns.map((col) => {
				let line = `- ${col.name} (${col.inferred_type})`
				if (col.description) line += `: ${col.description}`
				if (col.sample_values.length > 0) line += ` [samples: ${col.sample_values.join(", ")}]`
				return line
			})
			return [`Table: ${table.object_name}`, ...lines].join("\n")
		})
		.join("\n\n")
}

function renderFeedback(feedback: RepairFeedback): string {
	const header: Record<FeedbackKind, string> = {
		guard_rejected: "The previous candidate was rejected by the safety policy and was NOT executed.",
		empty: "The previous candidate returned no rows. Consider broadening the filter.",
		syntax_error: "The previous candidate failed in the engine. Fix the error; be stricter about names and syntax.",
		synthesis_failed: "The previous output could not be parsed. Respond with the JSON object only.",
	}
	const lines = [`<repair_feedback kind="${feedback.kind}">`, header[feedback.kind]]
	if (feedback.previous_candidate) {
		lines.push("Previous candidate:", feedback.previous_candidate)
	}
	if (feedback.details.length > 0) {
		lines.push("Problems:", ...feedback.details.map((d) => `- ${d}`))
	}
	if (feedback.kind === "syntax_error") {
		lines.push("Use only names from <schema> exactly as written and keep the query as simple as possible.")
	}
	lines.push("</repair_feedback>")
	return lines.join("\n")
}

/**
 * Build the synthesis prompt for one attempt
 */
export function buildSynthesisPrompt(input: SynthesisInput): string {
	const rules = input.dialect === "sql" ? sqlRules(input) : frameRules(input)
	const target = input.dialect === "sql" ? "a PostgreSQL query" : "a JavaScript frame expression"

	const sections = [
		`You translate a question about tabular data into ${target}.`,
		`<rules>\n${rules.map((r, i) => `${i + 1}. ${r}`).join("\n")}\n</rules>`,
		`<schema>\n${renderSchema(input.schema)}\n</schema>`,
		`<history>\n${input.historyContext || "(none)"}\n</history>`,
	]

	if (input.examples && input.examples.length > 0) {
		const shots = input.examples.map((ex) => `Q: ${ex.question}\n${JSON.stringify({ query: ex.query })}`)
		sections.push(`<examples>\n${shots.join("\n\n")}\n</examples>`)
	}
	if (input.columnHints && input.columnHints.length > 0) {
		sections.push(`<column_focus>${input.columnHints.join(", ")}</column_focus>`)
	}
	if (input.feedback) {
		sections.push(renderFeedback(input.feedback))
	}

	sections.push(
		`<question>\n${input.question}\n</question>`,
		"Respond with JSON only:",
		"{\"query\": \"...\", \"columns\": [\"columns the query uses\"], \"reasoning\": \"one line\"}",
	)
	return sections.join("\n\n")
}

// ============================================================================
// Synthesis
// ============================================================================

/**
 * Strip fences and comments from the model's query text
 */
export function cleanQueryText(text: string, dialect: Dialect): string {
	const unfenced = stripCodeFence(text)
	return dialect === "sql" ? stripSqlComments(unfenced) : stripFrameComments(unfenced)
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Columns a candidate uses: the model's list filtered to schema columns, or
 * the schema columns mentioned in the query text
 */
export function resolveDeclaredColumns(
	declared: readonly string[] | undefined,
	queryText: string,
	schema: readonly SchemaDescriptor[],
): string[] {
	const known = new Map<string, string>()
	for (const table of schema) {
		for (const col of table.columns) {
			if (!known.has(col.name.toLowerCase())) known.set(col.name.toLowerCase(), col.name)
		}
	}

	const fromModel: string[] = []
	for (const name of declared ?? []) {
		const match = known.get(name.trim().toLowerCase())
		if (match && !fromModel.includes(match)) fromModel.push(match)
	}
	if (fromModel.length > 0) return fromModel

	return [...known.values()].filter((name) =>
		new RegExp(`(^|[^A-Za-z0-9_$])${escapeRegExp(name)}($|[^A-Za-z0-9_$])`, "i").test(queryText),
	)
}

/**
 * Produce one Query Candidate
 *
 * @throws SynthesisFailure on malformed or empty output
 */
export async function synthesizeCandidate(input: SynthesisInput, deps: SynthesizerDeps): Promise<QueryCandidate> {
	const logger = deps.logger ?? silentLogger
	const completion = await deps.llm.complete(buildSynthesisPrompt(input), {
		format: "json",
		model: deps.model,
		signal: deps.signal,
	})

	const parsed = synthesisOutputSchema.safeParse(parseJsonCompletion(completion))
	if (!parsed.success) {
		throw new SynthesisFailure("Synthesizer output does not match the expected shape", {
			issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		})
	}

	const text = cleanQueryText(parsed.data.query ?? parsed.data.sql ?? "", input.dialect)
	if (!text) {
		throw new SynthesisFailure("Synthesizer returned an empty query")
	}

	const candidate: QueryCandidate = {
		text,
		declared_columns: resolveDeclaredColumns(parsed.data.columns, text, input.schema),
		source_stage: input.feedback ? "repair" : "synthesis",
		dialect: input.dialect,
		reasoning: (parsed.data.reasoning ?? "").trim(),
	}
	logger.debug("Candidate synthesized", { stage: candidate.source_stage, dialect: candidate.dialect })
	return candidate
}

// ============================================================================
// Column Selection
// ============================================================================

export interface ColumnSelectionInput {
	question: string
	schema: readonly SchemaDescriptor[]
	historyContext: string
	/** Columns named by the rewriter, kept whatever the model picks */
	columnHints?: readonly string[]
	/** Kept in every narrowed object so row results stay expandable */
	rowIdColumn: string
}

const columnSelectionSchema = z.union([z.array(z.string()), z.object({ columns: z.array(z.string()) })])

export function buildColumnSelectionPrompt(input: ColumnSelectionInput): string {
	return [
		"You select the columns needed to answer a question about tabular data.",
		`<schema>\n${renderSchema(input.schema)}\n</schema>`,
		`<history>\n${input.historyContext || "(none)"}\n</history>`,
		`<question>\n${input.question}\n</question>`,
		[
			"Include every column the question names or whose values it mentions.",
			"When the question refers to an earlier result, include the columns that produced it.",
			"Use only columns listed in <schema>.",
		].join("\n"),
		"Respond with JSON only:",
		"{\"columns\": [\"column\", \"...\"]}",
	].join("\n\n")
}

/**
 * Keep the named columns (case-insensitive) plus the row identifier
 *
 * Objects with none of the names are dropped; when nothing matches at all
 * the schema is returned unchanged.
 */
export function narrowSchema(
	schema: readonly SchemaDescriptor[],
	names: readonly string[],
	rowIdColumn: string,
): readonly SchemaDescriptor[] {
	const wanted = new Set(names.map((name) => name.trim().toLowerCase()))
	const narrowed: SchemaDescriptor[] = []
	for (const object of schema) {
		if (!object.columns.some((col) => wanted.has(col.name.toLowerCase()))) continue
		narrowed.push({
			object_name: object.object_name,
			columns: object.columns.filter((col) => wanted.has(col.name.toLowerCase()) || col.name === rowIdColumn),
		})
	}
	return narrowed.length > 0 ? narrowed : schema
}

/**
 * Narrow the schema to the columns the question needs
 *
 * An unusable selection, or one naming no known column, keeps the full
 * schema. Rewriter hints are merged into a usable selection.
 */
export async function selectColumns(
	input: ColumnSelectionInput,
	deps: SynthesizerDeps,
): Promise<readonly SchemaDescriptor[]> {
	const logger = deps.logger ?? silentLogger

	let selected: string[]
	try {
		const completion = await deps.llm.complete(buildColumnSelectionPrompt(input), {
			format: "json",
			model: deps.model,
			signal: deps.signal,
		})
		const parsed = columnSelectionSchema.safeParse(parseJsonCompletion(completion))
		if (!parsed.success) {
			logger.warn("Column selection output does not match the expected shape, keeping the full schema")
			return input.schema
		}
		selected = Array.isArray(parsed.data) ? parsed.data : parsed.data.columns
	} catch (error) {
		if (!(error instanceof SynthesisFailure)) throw error
		logger.warn("Column selection failed, keeping the full schema", { message: error.message })
		return input.schema
	}

	const known = new Set(input.schema.flatMap((object) => object.columns.map((col) => col.name.toLowerCase())))
	if (!selected.some((name) => known.has(name.trim().toLowerCase()))) return input.schema

	const narrowed = narrowSchema(input.schema, [...selected, ...(input.columnHints ?? [])], input.rowIdColumn)
	logger.debug("Columns selected", {
		columns: narrowed.flatMap((object) => object.columns.map((col) => `${object.object_name}.${col.name}`)),
	})
	return narrowed
}

// ============================================================================
// Few-shot Examples
// ============================================================================

const examplesFileSchema = z.array(
	z.object({
		question: z.string(),
		sql: z.string().optional(),
		frame: z.string().optional(),
	}),
)

/**
 * Load few-shot examples for one dialect from the config directory
 *
 * Returns an empty list when the file is absent.
 */
export function loadExamples(fileName: string, dialect: Dialect): FewShotExample[] {
	const raw = readConfigJson(fileName)
	if (raw === undefined) return []
	const parsed = examplesFileSchema.safeParse(raw)
	if (!parsed.success) {
		throw new Error(`Invalid examples file ${fileName}: ${parsed.error.issues[0]?.message ?? "unknown error"}`)
	}
	const examples: FewShotExample[] = []
	for (const entry of parsed.data) {
		const query = dialect === "sql" ? entry.sql : entry.frame
		if (query) examples.push({ question: entry.question, query })
	}
	return examples
}
