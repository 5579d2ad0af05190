/**
 * Retry Controller
 *
 * Bounded state machine around synthesize → guard → execute:
 *
 *   SYNTHESIZE → GUARD → EXECUTE → { DONE, REPAIR, FAILED }
 *
 * - guard rejection, empty result, engine error and unusable LLM output all go
 *   to REPAIR with structured feedback for the next synthesis
 * - a transient engine error re-runs the same accepted candidate unchanged
 * - REPAIR counts attempts; at max_attempts the loop FAILS with RetryExhausted
 *
 * `nextState` is pure so each transition can be tested in isolation.
 */

import { setTimeout as delay } from "timers/promises"
import { Cancelled, GuardViolation, REPAIR_CONFIG, RetryExhausted, SynthesisFailure } from "./config.js"
import { toExecutionError, type DataEngine, type EngineError, type EngineErrorKind } from "./executor.js"
import { silentLogger, type Logger } from "./logger.js"
import { describeViolations, guardCandidate } from "./policy_guard.js"
import type { Attempt, GuardPolicy, GuardVerdict, QueryCandidate, Table } from "./query_types.js"
import type { RepairFeedback, SynthesisInput } from "./synthesizer.js"

// ============================================================================
// State Machine
// ============================================================================

export type RetryState = "SYNTHESIZE" | "GUARD" | "EXECUTE" | "REPAIR" | "DONE" | "FAILED"

export type RetryEvent =
	| { type: "synthesized" }
	| { type: "synthesis_failed" }
	| { type: "accepted" }
	| { type: "rejected" }
	| { type: "success" }
	| { type: "empty" }
	| { type: "error"; errorKind: EngineErrorKind }
	| { type: "retry"; attempts: number; maxAttempts: number; reuseCandidate: boolean }

/**
 * Transition function of the retry loop
 *
 * @throws Error for an event the state does not accept
 */
export function nextState(state: RetryState, event: RetryEvent): RetryState {
	switch (state) {
		case "SYNTHESIZE":
			if (event.type === "synthesized") return "GUARD"
			if (event.type === "synthesis_failed") return "REPAIR"
			break
		case "GUARD":
			if (event.type === "accepted") return "EXECUTE"
			if (event.type === "rejected") return "REPAIR"
			break
		case "EXECUTE":
			if (event.type === "success") return "DONE"
			if (event.type === "empty" || event.type === "error") return "REPAIR"
			break
		case "REPAIR":
			if (event.type === "retry") {
				if (event.attempts >= event.maxAttempts) return "FAILED"
				return event.reuseCandidate ? "EXECUTE" : "SYNTHESIZE"
			}
			break
		case "DONE":
		case "FAILED":
			break
	}
	throw new Error(`No transition from ${state} on ${event.type}`)
}

// ============================================================================
// Loop
// ============================================================================

export interface RetryLoopInput {
	/** Everything the synthesizer needs except the repair feedback */
	synthesis: Omit<SynthesisInput, "feedback">
	policy: GuardPolicy
	maxAttempts?: number
	/** Base delay between attempts, doubled each time; 0 disables */
	backoffMs?: number
}

export interface RetryLoopDeps {
	synthesize: (input: SynthesisInput) => Promise<QueryCandidate>
	engine: Pick<DataEngine, "execute">
	signal?: AbortSignal
	logger?: Logger
}

export interface RetryResult {
	candidate: QueryCandidate
	verdict: GuardVerdict
	table: Table
	/** Attempts spent, including the successful one */
	attemptCount: number
	attempts: Attempt[]
}

function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new Cancelled()
	}
}

function formatEngineError(error: EngineError): string {
	const code = error.code ? ` [${error.code}]` : ""
	const hint = error.hint ? ` Hint: ${error.hint}` : ""
	return `${error.message}${code}${hint}`
}

/**
 * Run the bounded loop until a candidate executes with rows
 *
 * @throws RetryExhausted when max attempts are spent
 * @throws Cancelled when the signal aborts at a suspension point
 */
export async function runRetryLoop(input: RetryLoopInput, deps: RetryLoopDeps): Promise<RetryResult> {
	const logger = deps.logger ?? silentLogger
	const maxAttempts = input.maxAttempts ?? REPAIR_CONFIG.maxAttempts
	const backoffMs = input.backoffMs ?? REPAIR_CONFIG.backoffMs
	const dialect = input.synthesis.dialect

	const attempts: Attempt[] = []
	let state: RetryState = "SYNTHESIZE"
	let counter = 0
	let feedback: RepairFeedback | undefined
	let reuseCandidate = false

	let candidate: QueryCandidate | undefined
	let verdict: GuardVerdict | undefined
	let result: RetryResult | undefined
	let lastViolations: string[] = []
	let lastError: string | undefined

	while (true) {
		switch (state) {
			case "SYNTHESIZE": {
				throwIfAborted(deps.signal)
				try {
					candidate = await deps.synthesize({ ...input.synthesis, feedback })
					verdict = undefined
					state = nextState(state, { type: "synthesized" })
				} catch (error) {
					if (!(error instanceof SynthesisFailure)) throw error
					logger.warn("Synthesis failed", { attempt: counter + 1, message: error.message })
					attempts.push({ outcome: "synthesis_failed", error_detail: error })
					lastViolations = []
					lastError = error.message
					feedback = { kind: "synthesis_failed", details: [error.message] }
					reuseCandidate = false
					state = nextState(state, { type: "synthesis_failed" })
				}
				break
			}

			case "GUARD": {
				if (!candidate) throw new Error("GUARD entered without a candidate")
				verdict = guardCandidate(candidate, input.policy)
				if (verdict.accepted) {
					state = nextState(state, { type: "accepted" })
					break
				}

				lastViolations = verdict.violations.map((v) => `${v.rule_id}: ${v.message}`)
				lastError = undefined
				logger.warn("Candidate rejected by guard", { attempt: counter + 1, violations: lastViolations })
				attempts.push({
					candidate,
					verdict,
					outcome: "guard_rejected",
					error_detail: new GuardViolation(verdict.violations[0]?.message ?? "Rejected", verdict.violations),
				})
				feedback = {
					kind: "guard_rejected",
					previous_candidate: candidate.text,
					details: describeViolations(verdict, dialect),
				}
				reuseCandidate = false
				state = nextState(state, { type: "rejected" })
				break
			}

			case "EXECUTE": {
				if (!candidate || !verdict?.accepted) throw new Error("EXECUTE entered without an accepted verdict")
				throwIfAborted(deps.signal)
				const outcome = await deps.engine.execute(verdict.normalized_text, deps.signal)
				throwIfAborted(deps.signal)

				if (outcome.kind === "success") {
					attempts.push({ candidate, verdict, outcome: "success" })
					logger.info("Candidate executed", { attempt: counter + 1, rows: outcome.table.row_count })
					result = { candidate, verdict, table: outcome.table, attemptCount: counter + 1, attempts }
					state = nextState(state, { type: "success" })
					break
				}

				lastViolations = []

				if (outcome.kind === "empty") {
					attempts.push({ candidate, verdict, outcome: "empty" })
					logger.info("Candidate returned no rows", { attempt: counter + 1 })
					lastError = "Query returned no rows"
					feedback = { kind: "empty", previous_candidate: verdict.normalized_text, details: [] }
					reuseCandidate = false
					state = nextState(state, { type: "empty" })
					break
				}

				const detail = toExecutionError(outcome.error)
				attempts.push({ candidate, verdict, outcome: "error", error_detail: detail })
				logger.warn("Candidate failed in engine", {
					attempt: counter + 1,
					kind: outcome.error.kind,
					code: outcome.error.code,
					message: outcome.error.message,
				})
				lastError = formatEngineError(outcome.error)
				if (outcome.error.kind === "syntax") {
					feedback = {
						kind: "syntax_error",
						previous_candidate: verdict.normalized_text,
						details: [formatEngineError(outcome.error)],
					}
				}
				reuseCandidate = outcome.error.kind === "transient"
				state = nextState(state, { type: "error", errorKind: outcome.error.kind })
				break
			}

			case "REPAIR": {
				counter++
				state = nextState(state, { type: "retry", attempts: counter, maxAttempts, reuseCandidate })
				if (state !== "FAILED" && backoffMs > 0) {
					throwIfAborted(deps.signal)
					await waitBeforeRetry(backoffMs * 2 ** (counter - 1), deps.signal)
				}
				break
			}

			case "FAILED":
				logger.warn("Retry bound reached", { attempts: counter, last_error: lastError })
				throw new RetryExhausted(
					`Could not produce a valid answer in ${counter} attempt${counter === 1 ? "" : "s"}`,
					counter,
					candidate?.text,
					lastViolations,
					lastError,
					attempts,
				)

			case "DONE":
				if (!result) throw new Error("DONE reached without a result")
				return result
		}
	}
}

async function waitBeforeRetry(ms: number, signal?: AbortSignal): Promise<void> {
	try {
		await delay(ms, undefined, { signal })
	} catch (error) {
		if (signal?.aborted) throw new Cancelled()
		throw error
	}
}
