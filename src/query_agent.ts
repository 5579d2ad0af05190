/**
 * Query Agent - caller-facing orchestration
 *
 * One question, end to end:
 * 1. Resolve the session (data context + history)
 * 2. Rewrite the question against the history context
 * 3. Narrow the schema to the columns the question needs
 * 4. Synthesize → guard → execute in the bounded retry loop
 * 5. Reconcile identifier-only results and render the answer table
 * 6. Append one Turn on success
 *
 * RetryExhausted, SessionError and Cancelled come back as a structured
 * `failure` in the response; no turn is appended for them.
 */

import { v4 as uuidv4 } from "uuid"
import {
	Cancelled,
	DEFAULTS,
	GUARD_DEFAULTS,
	RECONCILER_CONFIG,
	REPAIR_CONFIG,
	RetryExhausted,
	SessionError,
	SynthesisFailure,
	type AskFailure,
	type AskRequest,
	type AskResponse,
	type AuditLogEntry,
} from "./config.js"
import type { LLMClient } from "./llm_client.js"
import { silentLogger, type Logger } from "./logger.js"
import { createGuardPolicy } from "./policy_guard.js"
import type { Table } from "./query_types.js"
import { reconcile, renderTable, type ReconcileResult, type RowLookup } from "./result_reconciler.js"
import { runRetryLoop } from "./retry_controller.js"
import { rewriteQuestion, type RewriteResult } from "./rewriter.js"
import type { SessionContext, SessionRegistry } from "./session_store.js"
import { selectColumns, synthesizeCandidate, type FewShotExample } from "./synthesizer.js"

// ============================================================================
// Types
// ============================================================================

export interface QueryAgentOptions {
	llm: LLMClient
	sessions: SessionRegistry
	logger?: Logger
	rewriteModel?: string
	synthesisModel?: string
	maxLimit?: number
	maxAttempts?: number
	backoffMs?: number
	expandThreshold?: number
	/** Few-shot examples for the dialect of the sessions */
	examples?: readonly FewShotExample[]
	/** Column selection before synthesis (default true) */
	selectColumns?: boolean
	/** Clock for turn timestamps */
	now?: () => Date
}

interface Progress {
	rewritten_question: string
	rationale: string
	is_related: boolean
	attempts: number
}

// ============================================================================
// Agent
// ============================================================================

export class QueryAgent {
	private llm: LLMClient
	private sessions: SessionRegistry
	private logger: Logger
	private maxLimit: number
	private maxAttempts: number
	private backoffMs: number
	private expandThreshold: number
	private now: () => Date

	constructor(private options: QueryAgentOptions) {
		this.llm = options.llm
		this.sessions = options.sessions
		this.logger = options.logger ?? silentLogger
		this.maxLimit = options.maxLimit ?? GUARD_DEFAULTS.maxLimit
		this.maxAttempts = options.maxAttempts ?? REPAIR_CONFIG.maxAttempts
		this.backoffMs = options.backoffMs ?? REPAIR_CONFIG.backoffMs
		this.expandThreshold = options.expandThreshold ?? RECONCILER_CONFIG.expandThreshold
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Answer one question
	 *
	 * @param signal - caller cancellation; `timeout_ms` adds a deadline on top
	 */
	async ask(request: AskRequest, signal?: AbortSignal): Promise<AskResponse> {
		const startTime = Date.now()
		const queryId = uuidv4()
		const progress: Progress = { rewritten_question: "", rationale: "", is_related: false, attempts: 0 }

		this.logger.info("Question received", {
			query_id: queryId,
			session_key: request.session_key,
			question: request.question,
		})

		const controller = new AbortController()
		const onAbort = () => controller.abort()
		if (signal?.aborted) controller.abort()
		signal?.addEventListener("abort", onAbort, { once: true })
		const timeoutMs = request.timeout_ms ?? DEFAULTS.timeoutMs
		let timedOut = false
		const timer = setTimeout(() => {
			timedOut = true
			controller.abort()
		}, timeoutMs)

		try {
			const response = await this.sessions.runExclusive(request.session_key, () =>
				this.answer(request, queryId, startTime, controller.signal, progress),
			)
			this.logAudit(request, response)
			return response
		} catch (error) {
			const failure = toFailure(error)
			if (!failure) throw error
			if (failure.kind === "cancelled" && timedOut) {
				failure.message = `Request timed out after ${timeoutMs}ms`
			}

			this.logger.warn("Question not answered", { query_id: queryId, kind: failure.kind, message: failure.message })
			const response: AskResponse = {
				query_id: queryId,
				question: request.question,
				rewritten_question: progress.rewritten_question,
				rationale: progress.rationale,
				is_related: progress.is_related,
				executed_query_text: "",
				expanded: false,
				attempts: error instanceof RetryExhausted ? error.attempts : progress.attempts,
				failure,
				latency_ms: Date.now() - startTime,
			}
			this.logAudit(request, response)
			return response
		} finally {
			clearTimeout(timer)
			signal?.removeEventListener("abort", onAbort)
		}
	}

	/**
	 * Clear the history of a session
	 */
	resetHistory(sessionKey: string): boolean {
		return this.sessions.reset(sessionKey)
	}

	private async answer(
		request: AskRequest,
		queryId: string,
		startTime: number,
		signal: AbortSignal,
		progress: Progress,
	): Promise<AskResponse> {
		const context = await this.sessions.resolve(request.session_key)
		const history = this.sessions.history(request.session_key)
		const historyContext = history.context()
		const dialect = context.engine.dialect

		if (signal.aborted) throw new Cancelled()
		const rewrite = await this.rewrite(request.question, historyContext, signal, queryId)
		progress.rewritten_question = rewrite.rewritten_question
		progress.rationale = rewrite.rationale
		progress.is_related = rewrite.is_related

		const schema =
			this.options.selectColumns === false
				? context.schema
				: await selectColumns(
						{
							question: rewrite.rewritten_question,
							schema: context.schema,
							historyContext,
							columnHints: rewrite.column_hints,
							rowIdColumn: context.rowIdColumn,
						},
						{ llm: this.llm, model: this.options.rewriteModel, signal, logger: this.logger },
					)
		if (signal.aborted) throw new Cancelled()

		const loop = await runRetryLoop(
			{
				synthesis: {
					question: rewrite.rewritten_question,
					schema,
					historyContext,
					dialect,
					maxLimit: this.maxLimit,
					rowIdColumn: context.rowIdColumn,
					frameName: dialect === "frame" ? context.allowedObjects[0] : undefined,
					examples: this.options.examples,
					columnHints: rewrite.column_hints,
				},
				policy: createGuardPolicy(context.allowedObjects, this.maxLimit),
				maxAttempts: this.maxAttempts,
				backoffMs: this.backoffMs,
			},
			{
				synthesize: (input) =>
					synthesizeCandidate(input, {
						llm: this.llm,
						model: this.options.synthesisModel,
						signal,
						logger: this.logger,
					}),
				engine: context.engine,
				signal,
				logger: this.logger,
			},
		)
		progress.attempts = loop.attemptCount

		const reconciled = await this.expand(loop.table, context, queryId)
		if (signal.aborted) throw new Cancelled()

		const answerText = renderTable(reconciled.table)
		const appended = history.append({
			raw_question: request.question,
			rewritten_question: rewrite.rewritten_question,
			rationale: rewrite.rationale,
			query_text: loop.verdict.normalized_text,
			used_columns: loop.candidate.declared_columns,
			result_table: reconciled.table,
			timestamp: this.now().toISOString(),
		})

		this.logger.info("Question answered", {
			query_id: queryId,
			attempts: loop.attemptCount,
			rows: reconciled.table.row_count,
			expanded: reconciled.expanded,
			turn_appended: appended,
		})

		return {
			query_id: queryId,
			question: request.question,
			rewritten_question: rewrite.rewritten_question,
			rationale: rewrite.rationale,
			is_related: rewrite.is_related,
			executed_query_text: loop.verdict.normalized_text,
			answer_table: reconciled.table,
			answer_text: answerText,
			expanded: reconciled.expanded,
			attempts: loop.attemptCount,
			latency_ms: Date.now() - startTime,
		}
	}

	/**
	 * Rewrite the question; unusable rewriter output falls back to the raw question
	 */
	private async rewrite(question: string, historyContext: string, signal: AbortSignal, queryId: string): Promise<RewriteResult> {
		try {
			return await rewriteQuestion(question, historyContext, {
				llm: this.llm,
				model: this.options.rewriteModel,
				signal,
				logger: this.logger,
			})
		} catch (error) {
			if (!(error instanceof SynthesisFailure)) throw error
			this.logger.warn("Rewrite failed, using the question as asked", { query_id: queryId, message: error.message })
			return { rewritten_question: question.trim(), rationale: "", is_related: false, column_hints: [] }
		}
	}

	/**
	 * Restore full source rows; a failed lookup keeps the answer as executed
	 */
	private async expand(table: Table, context: SessionContext, queryId: string): Promise<ReconcileResult> {
		const lookup: RowLookup | undefined = context.sourceObject
			? (ids) => context.engine.fetchRowsById(context.sourceObject, context.rowIdColumn, ids)
			: undefined
		try {
			return await reconcile(table, { rowIdColumn: context.rowIdColumn, expandThreshold: this.expandThreshold }, lookup)
		} catch (error) {
			if (error instanceof Cancelled) throw error
			this.logger.warn("Row expansion failed, keeping the result as executed", {
				query_id: queryId,
				error: error instanceof Error ? error.message : String(error),
			})
			return { table, expanded: false }
		}
	}

	private logAudit(request: AskRequest, response: AskResponse): void {
		const entry: AuditLogEntry = {
			query_id: response.query_id,
			timestamp: new Date(),
			session_key: request.session_key,
			question: request.question,
			rewritten_question: response.rewritten_question,
			is_related: response.is_related,
			executed_query_text: response.executed_query_text,
			answered: !response.failure,
			attempts: response.attempts,
			rows_returned: response.answer_table?.row_count,
			error: response.failure?.message,
			latency_ms: response.latency_ms,
		}
		this.logger.info("AUDIT_LOG", { ...entry })
	}
}

/**
 * Structured failure for the errors that end a question; undefined for anything else
 */
export function toFailure(error: unknown): AskFailure | undefined {
	if (error instanceof RetryExhausted) {
		return {
			kind: "retry_exhausted",
			message: error.message,
			last_candidate: error.lastCandidate,
			last_violations: error.lastViolations,
			last_error: error.lastError,
		}
	}
	if (error instanceof SessionError) {
		return { kind: "session", message: error.message }
	}
	if (error instanceof Cancelled) {
		return { kind: "cancelled", message: error.message }
	}
	return undefined
}
