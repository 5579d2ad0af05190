/**
 * Question Rewriter
 *
 * First synthesis stage: turns the raw question plus history context into a
 * single explicit question. Anaphora ("that line", "the previous filter",
 * "그 라인", "그 중") are resolved against the supplied history only.
 */

import { z } from "zod"
import { SynthesisFailure } from "./config.js"
import { parseJsonCompletion, type LLMClient } from "./llm_client.js"
import { silentLogger, type Logger } from "./logger.js"

export interface RewriteResult {
	rewritten_question: string
	rationale: string
	/** Whether the question builds on earlier turns */
	is_related: boolean
	/** Column names the question likely needs */
	column_hints: string[]
}

export interface RewriterDeps {
	llm: LLMClient
	model?: string
	signal?: AbortSignal
	logger?: Logger
}

const rewriteOutputSchema = z.object({
	rewritten: z.string(),
	reason: z.string().default(""),
	is_related: z.boolean().default(false),
	column_hints: z.array(z.string()).default([]),
})

/**
 * Build the rewrite prompt
 */
export function buildRewritePrompt(question: string, historyContext: string): string {
	return `You rewrite questions about tabular data into one explicit, self-contained question.

Rules:
1. Decide whether the current question depends on the previous turns in <history>.
2. If it does, resolve every reference ("that line", "those rows", "the previous filter", "그 라인", "그 중", "위에서 구한") using ONLY values, filters and result sets present in <history>. Spell the referenced values out in the rewritten question.
3. Never invent tables, columns, values or conditions that appear neither in <history> nor in the question.
4. If it does not depend on history, keep the intent unchanged and only make numbers, conditions and targets explicit.
5. The rewritten question is a single imperative question.
6. column_hints lists the column names the question needs (a guess is fine).

Respond with JSON only:
{"is_related": true, "reason": "one-line rationale", "rewritten": "explicit question", "column_hints": ["col"]}

<history>
${historyContext || "(none)"}
</history>

<question>
${question}
</question>`
}

/**
 * Rewrite a raw question into an explicit one
 *
 * @throws SynthesisFailure when the completion is malformed or the rewritten
 *   question is empty
 */
export async function rewriteQuestion(
	question: string,
	historyContext: string,
	deps: RewriterDeps,
): Promise<RewriteResult> {
	const logger = deps.logger ?? silentLogger
	const completion = await deps.llm.complete(buildRewritePrompt(question, historyContext), {
		format: "json",
		model: deps.model,
		signal: deps.signal,
	})

	const parsed = rewriteOutputSchema.safeParse(parseJsonCompletion(completion))
	if (!parsed.success) {
		throw new SynthesisFailure("Rewriter output does not match the expected shape", {
			issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		})
	}

	const rewritten = parsed.data.rewritten.trim()
	if (!rewritten) {
		throw new SynthesisFailure("Rewriter returned an empty question")
	}

	const result: RewriteResult = {
		rewritten_question: rewritten,
		rationale: parsed.data.reason.trim(),
		is_related: parsed.data.is_related,
		column_hints: [...new Set(parsed.data.column_hints.map((h) => h.trim()).filter(Boolean))],
	}
	logger.debug("Question rewritten", { is_related: result.is_related, rewritten })
	return result
}
