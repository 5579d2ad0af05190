import { describe, it, expect, vi } from "vitest"
import { Cancelled, RetryExhausted, SynthesisFailure } from "./config.js"
import type { ExecutionOutcome } from "./executor.js"
import { createGuardPolicy } from "./policy_guard.js"
import { makeTable, type QueryCandidate } from "./query_types.js"
import { nextState, runRetryLoop, type RetryEvent, type RetryLoopInput, type RetryState } from "./retry_controller.js"
import type { SynthesisInput } from "./synthesizer.js"

const POLICY = createGuardPolicy(["t"], 500)

const LOOP_INPUT: RetryLoopInput = {
	synthesis: {
		question: "What is the average of k?",
		schema: [{ object_name: "t", columns: [{ name: "k", inferred_type: "numeric", sample_values: [] }] }],
		historyContext: "",
		dialect: "sql",
		maxLimit: 500,
		rowIdColumn: "__row_idx",
	},
	policy: POLICY,
	maxAttempts: 3,
}

const ROWS = makeTable(["avg"], [{ avg: 2 }])
const SUCCESS: ExecutionOutcome = { kind: "success", table: ROWS }
const EMPTY: ExecutionOutcome = { kind: "empty", table: makeTable(["avg"], []) }

function candidate(text: string): QueryCandidate {
	return { text, declared_columns: [], source_stage: "synthesis", dialect: "sql", reasoning: "" }
}

/**
 * Synthesizer stand-in answering from a script; strings become candidates
 */
function scriptedSynthesizer(script: Array<string | Error>) {
	const inputs: SynthesisInput[] = []
	let i = 0
	const synthesize = vi.fn(async (input: SynthesisInput) => {
		inputs.push(input)
		const step = script[Math.min(i++, script.length - 1)]
		if (step instanceof Error) throw step
		return candidate(step)
	})
	return { synthesize, inputs }
}

function scriptedEngine(script: ExecutionOutcome[]) {
	let i = 0
	return { execute: vi.fn(async (_text: string) => script[Math.min(i++, script.length - 1)]) }
}

describe("nextState", () => {
	const cases: Array<[RetryState, RetryEvent, RetryState]> = [
		["SYNTHESIZE", { type: "synthesized" }, "GUARD"],
		["SYNTHESIZE", { type: "synthesis_failed" }, "REPAIR"],
		["GUARD", { type: "accepted" }, "EXECUTE"],
		["GUARD", { type: "rejected" }, "REPAIR"],
		["EXECUTE", { type: "success" }, "DONE"],
		["EXECUTE", { type: "empty" }, "REPAIR"],
		["EXECUTE", { type: "error", errorKind: "syntax" }, "REPAIR"],
		["EXECUTE", { type: "error", errorKind: "transient" }, "REPAIR"],
		["REPAIR", { type: "retry", attempts: 1, maxAttempts: 3, reuseCandidate: false }, "SYNTHESIZE"],
		["REPAIR", { type: "retry", attempts: 1, maxAttempts: 3, reuseCandidate: true }, "EXECUTE"],
		["REPAIR", { type: "retry", attempts: 3, maxAttempts: 3, reuseCandidate: false }, "FAILED"],
		["REPAIR", { type: "retry", attempts: 3, maxAttempts: 3, reuseCandidate: true }, "FAILED"],
	]

	it.each(cases)("should move from %s on %o to %s", (state, event, expected) => {
		expect(nextState(state, event)).toBe(expected)
	})

	it("should refuse events a state does not accept", () => {
		expect(() => nextState("GUARD", { type: "success" })).toThrow("No transition from GUARD on success")
		expect(() => nextState("DONE", { type: "synthesized" })).toThrow("No transition from DONE on synthesized")
	})
})

describe("runRetryLoop", () => {
	it("should execute a clean candidate with its bound injected", async () => {
		const { synthesize } = scriptedSynthesizer(["SELECT AVG(k) FROM t"])
		const engine = scriptedEngine([SUCCESS])

		const result = await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(result.attemptCount).toBe(1)
		expect(result.table).toEqual(ROWS)
		expect(result.verdict.normalized_text).toBe("SELECT AVG(k) FROM t LIMIT 500")
		expect(engine.execute).toHaveBeenCalledWith("SELECT AVG(k) FROM t LIMIT 500", undefined)
		expect(result.attempts.map((a) => a.outcome)).toEqual(["success"])
	})

	it("should repair a rejected candidate without executing it", async () => {
		const { synthesize, inputs } = scriptedSynthesizer(["DROP TABLE t", "SELECT k FROM t"])
		const engine = scriptedEngine([SUCCESS])

		const result = await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(result.attemptCount).toBe(2)
		expect(engine.execute).toHaveBeenCalledTimes(1)
		expect(engine.execute).toHaveBeenCalledWith("SELECT k FROM t LIMIT 500", undefined)
		expect(inputs[0].feedback).toBeUndefined()
		expect(inputs[1].feedback?.kind).toBe("guard_rejected")
		expect(inputs[1].feedback?.previous_candidate).toBe("DROP TABLE t")
		expect(inputs[1].feedback?.details[0]).toContain("Forbidden keywords detected: DROP")
		expect(result.attempts.map((a) => a.outcome)).toEqual(["guard_rejected", "success"])
	})

	it("should give up after the bound with the last diagnostic", async () => {
		const { synthesize } = scriptedSynthesizer(["DROP TABLE t"])
		const engine = scriptedEngine([SUCCESS])

		const failure = await runRetryLoop({ ...LOOP_INPUT, maxAttempts: 2 }, { synthesize, engine }).catch((e: unknown) => e)

		expect(failure).toBeInstanceOf(RetryExhausted)
		if (failure instanceof RetryExhausted) {
			expect(failure.attempts).toBe(2)
			expect(failure.lastCandidate).toBe("DROP TABLE t")
			expect(failure.lastViolations).toEqual(["ForbiddenOperation: Forbidden keywords detected: DROP"])
			expect(failure.lastError).toBeUndefined()
			expect(failure.attemptLog.map((a) => a.outcome)).toEqual(["guard_rejected", "guard_rejected"])
		}
		expect(synthesize).toHaveBeenCalledTimes(2)
		expect(engine.execute).not.toHaveBeenCalled()
	})

	it("should ask to broaden the filter after an empty result", async () => {
		const { synthesize, inputs } = scriptedSynthesizer(["SELECT k FROM t WHERE k > 99", "SELECT k FROM t WHERE k > 1"])
		const engine = scriptedEngine([EMPTY, SUCCESS])

		const result = await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(result.attemptCount).toBe(2)
		expect(inputs[1].feedback).toEqual({
			kind: "empty",
			previous_candidate: "SELECT k FROM t WHERE k > 99 LIMIT 500",
			details: [],
		})
		expect(result.candidate.text).toBe("SELECT k FROM t WHERE k > 1")
	})

	it("should re-run the same candidate after a transient error", async () => {
		const { synthesize } = scriptedSynthesizer(["SELECT k FROM t"])
		const engine = scriptedEngine([
			{ kind: "error", error: { kind: "transient", message: "connection reset", code: "ECONNRESET" } },
			SUCCESS,
		])

		const result = await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(synthesize).toHaveBeenCalledTimes(1)
		expect(engine.execute.mock.calls.map((c) => c[0])).toEqual(["SELECT k FROM t LIMIT 500", "SELECT k FROM t LIMIT 500"])
		expect(result.attemptCount).toBe(2)
		expect(result.attempts.map((a) => a.outcome)).toEqual(["error", "success"])
	})

	it("should pass the engine error back after a syntax error", async () => {
		const { synthesize, inputs } = scriptedSynthesizer(["SELECT kk FROM t", "SELECT k FROM t"])
		const engine = scriptedEngine([
			{
				kind: "error",
				error: { kind: "syntax", message: "column \"kk\" does not exist", code: "42703", hint: "Use correct column name - check schema" },
			},
			SUCCESS,
		])

		await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(inputs[1].feedback).toEqual({
			kind: "syntax_error",
			previous_candidate: "SELECT kk FROM t LIMIT 500",
			details: ["column \"kk\" does not exist [42703] Hint: Use correct column name - check schema"],
		})
	})

	it("should repair after unusable LLM output", async () => {
		const { synthesize, inputs } = scriptedSynthesizer([new SynthesisFailure("LLM output is not valid JSON"), "SELECT k FROM t"])
		const engine = scriptedEngine([SUCCESS])

		const result = await runRetryLoop(LOOP_INPUT, { synthesize, engine })

		expect(inputs[1].feedback).toEqual({ kind: "synthesis_failed", details: ["LLM output is not valid JSON"] })
		expect(result.attempts.map((a) => a.outcome)).toEqual(["synthesis_failed", "success"])
	})

	it("should report the last engine error when exhausted", async () => {
		const { synthesize } = scriptedSynthesizer(["SELECT k FROM t WHERE k > 99"])
		const engine = scriptedEngine([EMPTY])

		const failure = await runRetryLoop(LOOP_INPUT, { synthesize, engine }).catch((e: unknown) => e)

		expect(failure).toBeInstanceOf(RetryExhausted)
		if (failure instanceof RetryExhausted) {
			expect(failure.attempts).toBe(3)
			expect(failure.lastViolations).toEqual([])
			expect(failure.lastError).toBe("Query returned no rows")
		}
		expect(synthesize).toHaveBeenCalledTimes(3)
	})

	it("should propagate errors other than synthesis failures", async () => {
		const { synthesize } = scriptedSynthesizer([new Error("bug")])
		await expect(runRetryLoop(LOOP_INPUT, { synthesize, engine: scriptedEngine([SUCCESS]) })).rejects.toThrow("bug")
	})

	it("should give identical results for identical collaborator responses", async () => {
		const run = () => {
			const { synthesize } = scriptedSynthesizer(["DROP TABLE t", "SELECT k FROM t"])
			return runRetryLoop(LOOP_INPUT, { synthesize, engine: scriptedEngine([SUCCESS]) })
		}
		const first = await run()
		const second = await run()
		expect(second.candidate).toEqual(first.candidate)
		expect(second.verdict).toEqual(first.verdict)
		expect(second.table).toEqual(first.table)
		expect(second.attemptCount).toBe(first.attemptCount)
	})

	describe("cancellation", () => {
		it("should not synthesize when already aborted", async () => {
			const controller = new AbortController()
			controller.abort()
			const { synthesize } = scriptedSynthesizer(["SELECT k FROM t"])

			await expect(
				runRetryLoop(LOOP_INPUT, { synthesize, engine: scriptedEngine([SUCCESS]), signal: controller.signal }),
			).rejects.toBeInstanceOf(Cancelled)
			expect(synthesize).not.toHaveBeenCalled()
		})

		it("should discard a result that arrives after the abort", async () => {
			const controller = new AbortController()
			const { synthesize } = scriptedSynthesizer(["SELECT k FROM t"])
			const engine = {
				execute: vi.fn(async () => {
					controller.abort()
					return SUCCESS
				}),
			}

			await expect(runRetryLoop(LOOP_INPUT, { synthesize, engine, signal: controller.signal })).rejects.toBeInstanceOf(
				Cancelled,
			)
		})

		it("should stop waiting between attempts when aborted", async () => {
			const controller = new AbortController()
			const { synthesize } = scriptedSynthesizer(["DROP TABLE t"])
			setTimeout(() => controller.abort(), 20)

			await expect(
				runRetryLoop(
					{ ...LOOP_INPUT, backoffMs: 60_000 },
					{ synthesize, engine: scriptedEngine([SUCCESS]), signal: controller.signal },
				),
			).rejects.toBeInstanceOf(Cancelled)
			expect(synthesize).toHaveBeenCalledTimes(1)
		})
	})
})
