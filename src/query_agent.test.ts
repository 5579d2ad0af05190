import { describe, it, expect, vi } from "vitest"
import { Cancelled } from "./config.js"
import type { ColumnInfo, DataEngine, ExecutionOutcome } from "./executor.js"
import { FrameEngine } from "./frame_engine.js"
import type { LLMClient } from "./llm_client.js"
import { QueryAgent, toFailure } from "./query_agent.js"
import { makeTable, type SchemaDescriptor, type Table } from "./query_types.js"
import { SchemaIntrospector } from "./schema_introspector.js"
import { createStaticSource, SessionRegistry, type SessionSource } from "./session_store.js"

const SCHEMA: SchemaDescriptor[] = [
	{ object_name: "t", columns: [{ name: "k", inferred_type: "numeric", sample_values: [] }] },
]

const AVG_TABLE = makeTable(["avg_k"], [{ avg_k: 2 }])
const FIXED_NOW = () => new Date("2024-05-01T09:00:00.000Z")

/**
 * Relational engine stand-in answering from a script
 */
class ScriptedEngine implements DataEngine {
	readonly dialect = "sql"
	executed: string[] = []

	constructor(private outcomes: ExecutionOutcome[]) {}

	async execute(text: string): Promise<ExecutionOutcome> {
		this.executed.push(text)
		return this.outcomes[Math.min(this.executed.length - 1, this.outcomes.length - 1)]
	}

	async listTables(): Promise<string[]> {
		return ["t"]
	}

	async describe(): Promise<ColumnInfo[]> {
		return [{ name: "k", data_type: "numeric" }]
	}

	async sampleValues(): Promise<string[]> {
		return []
	}

	async fetchRowsById(): Promise<Table> {
		return makeTable([], [])
	}

	async close(): Promise<void> {}
}

function rewriteJson(rewritten: string, isRelated = false): string {
	return JSON.stringify({ rewritten, reason: "standalone question", is_related: isRelated, column_hints: ["k"] })
}

function queryJson(query: string): string {
	return JSON.stringify({ query, columns: ["k"], reasoning: "direct" })
}

/**
 * LLM stand-in: rewrite, column selection and synthesis prompts each answer from their own script
 */
function scriptedLlm(rewrites: string[], syntheses: string[], selections: string[] = ['{"columns": ["k"]}']) {
	const prompts: { rewrite: string[]; selection: string[]; synthesis: string[] } = { rewrite: [], selection: [], synthesis: [] }
	let r = 0
	let c = 0
	let s = 0
	const llm = {
		complete: vi.fn(async (prompt: string) => {
			if (prompt.startsWith("You rewrite")) {
				prompts.rewrite.push(prompt)
				return rewrites[Math.min(r++, rewrites.length - 1)]
			}
			if (prompt.startsWith("You select")) {
				prompts.selection.push(prompt)
				return selections[Math.min(c++, selections.length - 1)]
			}
			prompts.synthesis.push(prompt)
			return syntheses[Math.min(s++, syntheses.length - 1)]
		}),
	}
	return { llm, prompts }
}

function sqlAgent(engine: DataEngine, llm: LLMClient, maxAttempts = 3) {
	const sessions = new SessionRegistry(
		createStaticSource({ engine, schema: SCHEMA, allowedObjects: ["t"], rowIdColumn: "__row_idx", sourceObject: "t" }),
	)
	return { agent: new QueryAgent({ llm, sessions, maxAttempts, now: FIXED_NOW }), sessions }
}

describe("QueryAgent", () => {
	describe("ask", () => {
		it("should answer a clean query and record the turn", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm } = scriptedLlm([rewriteJson("What is the average of k?")], [queryJson("SELECT AVG(k) AS avg_k FROM t LIMIT 500")])
			const { agent, sessions } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: "average of k", session_key: "s1" })

			expect(response.failure).toBeUndefined()
			expect(response.rewritten_question).toBe("What is the average of k?")
			expect(response.rationale).toBe("standalone question")
			expect(response.executed_query_text).toBe("SELECT AVG(k) AS avg_k FROM t LIMIT 500")
			expect(response.answer_table).toEqual(AVG_TABLE)
			expect(response.answer_text).toBe("| avg_k |\n|---|\n| 2 |")
			expect(response.expanded).toBe(false)
			expect(response.attempts).toBe(1)
			expect(engine.executed).toEqual(["SELECT AVG(k) AS avg_k FROM t LIMIT 500"])

			expect(sessions.history("s1").turns()).toEqual([
				{
					raw_question: "average of k",
					rewritten_question: "What is the average of k?",
					rationale: "standalone question",
					query_text: "SELECT AVG(k) AS avg_k FROM t LIMIT 500",
					used_columns: ["k"],
					result_table: AVG_TABLE,
					timestamp: "2024-05-01T09:00:00.000Z",
				},
			])
		})

		it("should repair a destructive candidate before executing", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm } = scriptedLlm(
				[rewriteJson("What is the average of k?")],
				[queryJson("DROP TABLE t"), queryJson("SELECT AVG(k) AS avg_k FROM t")],
			)
			const { agent } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: "average of k", session_key: "s1" })

			expect(response.attempts).toBe(2)
			expect(response.executed_query_text).toBe("SELECT AVG(k) AS avg_k FROM t LIMIT 500")
			expect(engine.executed).toEqual(["SELECT AVG(k) AS avg_k FROM t LIMIT 500"])
		})

		it("should report exhaustion with the last diagnostic and keep history unchanged", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm } = scriptedLlm([rewriteJson("What is the average of k?")], [queryJson("DROP TABLE t")])
			const { agent, sessions } = sqlAgent(engine, llm, 2)

			const response = await agent.ask({ question: "average of k", session_key: "s1" })

			expect(response.failure).toEqual({
				kind: "retry_exhausted",
				message: "Could not produce a valid answer in 2 attempts",
				last_candidate: "DROP TABLE t",
				last_violations: ["ForbiddenOperation: Forbidden keywords detected: DROP"],
				last_error: undefined,
			})
			expect(response.attempts).toBe(2)
			expect(response.executed_query_text).toBe("")
			expect(response.answer_table).toBeUndefined()
			expect(engine.executed).toEqual([])
			expect(sessions.history("s1").size).toBe(0)
		})

		it("should broaden the filter after an empty result", async () => {
			const rows = makeTable(["k"], [{ k: 3 }])
			const engine = new ScriptedEngine([{ kind: "empty", table: makeTable(["k"], []) }, { kind: "success", table: rows }])
			const { llm, prompts } = scriptedLlm(
				[rewriteJson("Which k values exceed 99?")],
				[queryJson("SELECT k FROM t WHERE k > 99"), queryJson("SELECT k FROM t WHERE k > 1")],
			)
			const { agent } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: "k over 99", session_key: "s1" })

			expect(response.attempts).toBe(2)
			expect(response.executed_query_text).toBe("SELECT k FROM t WHERE k > 1 LIMIT 500")
			expect(prompts.synthesis[1]).toContain("The previous candidate returned no rows. Consider broadening the filter.")
			expect(prompts.synthesis[1]).toContain("SELECT k FROM t WHERE k > 99 LIMIT 500")
		})

		it("should expand identifier-only results to full source rows", async () => {
			const engine = new FrameEngine([
				{ __row_idx: 0, line: "L1", k: 1 },
				{ __row_idx: 1, line: "L2", k: 3 },
				{ __row_idx: 2, line: "L1", k: 2 },
				{ __row_idx: 3, line: "L3", k: 5 },
				{ __row_idx: 4, line: "L2", k: 0 },
			])
			const schema = await new SchemaIntrospector(engine).introspect()
			const sessions = new SessionRegistry(
				createStaticSource({ engine, schema, allowedObjects: ["df"], rowIdColumn: "__row_idx", sourceObject: "df" }),
			)
			const { llm } = scriptedLlm(
				[rewriteJson("Which rows have k above 1?")],
				[queryJson("df.filter(r => r.k > 1).map(r => ({ __row_idx: r.__row_idx }))")],
			)
			const agent = new QueryAgent({ llm, sessions, now: FIXED_NOW })

			const response = await agent.ask({ question: "rows with k above 1", session_key: "s1" })

			expect(response.executed_query_text).toBe("limit(df.filter(r => r.k > 1).map(r => ({ __row_idx: r.__row_idx })), 500)")
			expect(response.expanded).toBe(true)
			expect(response.answer_table).toEqual({
				columns: ["__row_idx", "line", "k"],
				rows: [
					{ __row_idx: 1, line: "L2", k: 3 },
					{ __row_idx: 2, line: "L1", k: 2 },
					{ __row_idx: 3, line: "L3", k: 5 },
				],
				row_count: 3,
			})
			expect(response.answer_text).toBe(
				"| __row_idx | line | k |\n|---|---|---|\n| 1 | L2 | 3 |\n| 2 | L1 | 2 |\n| 3 | L3 | 5 |",
			)
		})

		it("should keep the executed result when row expansion fails", async () => {
			const ids = makeTable(["__row_idx"], [{ __row_idx: 1 }])
			const engine = new ScriptedEngine([{ kind: "success", table: ids }])
			vi.spyOn(engine, "fetchRowsById").mockRejectedValue(new Error('column "__row_idx" does not exist'))
			const { llm } = scriptedLlm([rewriteJson("Which row has the largest k?")], [queryJson("SELECT __row_idx FROM t")])
			const { agent, sessions } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: "row with largest k", session_key: "s1" })

			expect(response.failure).toBeUndefined()
			expect(response.expanded).toBe(false)
			expect(response.answer_table).toEqual(ids)
			expect(response.answer_text).toBe("| __row_idx |\n|---|\n| 1 |")
			expect(engine.fetchRowsById).toHaveBeenCalledWith("t", "__row_idx", [1])
			expect(sessions.history("s1").size).toBe(1)
		})

		it("should send only the selected columns to synthesis", async () => {
			const rows = [
				{ __row_idx: 0, line: "L1", shift: "A", k: 1 },
				{ __row_idx: 1, line: "L2", shift: "B", k: 3 },
			]
			const run = async (selectColumns: boolean) => {
				const engine = new FrameEngine(rows)
				const schema = await new SchemaIntrospector(engine).introspect()
				const sessions = new SessionRegistry(
					createStaticSource({ engine, schema, allowedObjects: ["df"], rowIdColumn: "__row_idx", sourceObject: "df" }),
				)
				const { llm, prompts } = scriptedLlm(
					[rewriteJson("What is the total of k per line?")],
					[queryJson('groupBy(df, "line").map(g => ({ line: g.key, total: sum(g.rows, "k") }))')],
					['{"columns": ["line"]}'],
				)
				const agent = new QueryAgent({ llm, sessions, selectColumns, now: FIXED_NOW })
				await agent.ask({ question: "k per line", session_key: "s1" })
				return prompts
			}

			const narrowed = await run(true)
			expect(narrowed.selection).toHaveLength(1)
			expect(narrowed.synthesis[0]).toContain("- line (text)")
			expect(narrowed.synthesis[0]).toContain("- k (numeric)")
			expect(narrowed.synthesis[0]).toContain("- __row_idx (numeric)")
			expect(narrowed.synthesis[0]).not.toContain("- shift (")

			const full = await run(false)
			expect(full.selection).toEqual([])
			expect(full.synthesis[0]).toContain("- shift (text)")
		})

		it("should give follow-up questions the previous turn as context", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm, prompts } = scriptedLlm(
				[rewriteJson("What is the average of k?"), rewriteJson("What is the maximum of k?", true)],
				[queryJson("SELECT AVG(k) AS avg_k FROM t"), queryJson("SELECT MAX(k) AS avg_k FROM t")],
			)
			const { agent, sessions } = sqlAgent(engine, llm)

			const first = await agent.ask({ question: "average of k", session_key: "s1" })
			const second = await agent.ask({ question: "and the maximum?", session_key: "s1" })

			expect(first.is_related).toBe(false)
			expect(second.is_related).toBe(true)
			expect(prompts.selection).toHaveLength(2)

			expect(prompts.rewrite[0]).toContain("<history>\n(none)\n</history>")
			expect(prompts.rewrite[1]).toContain("<question_original>average of k</question_original>")
			expect(prompts.synthesis[1]).toContain("<executed_query>SELECT AVG(k) AS avg_k FROM t LIMIT 500</executed_query>")
			expect(sessions.history("s1").size).toBe(2)
			expect(sessions.history("s2").size).toBe(0)
		})

		it("should fall back to the question as asked when the rewrite is unusable", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm, prompts } = scriptedLlm(["not json"], [queryJson("SELECT AVG(k) AS avg_k FROM t")])
			const { agent } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: " average of k ", session_key: "s1" })

			expect(response.rewritten_question).toBe("average of k")
			expect(response.rationale).toBe("")
			expect(prompts.synthesis[0]).toContain("<question>\naverage of k\n</question>")
			expect(response.failure).toBeUndefined()
		})

		it("should produce identical turns for identical collaborator responses", async () => {
			const run = async () => {
				const engine = new ScriptedEngine([{ kind: "empty", table: makeTable(["avg_k"], []) }, { kind: "success", table: AVG_TABLE }])
				const { llm } = scriptedLlm(
					[rewriteJson("What is the average of k?")],
					[queryJson("DROP TABLE t"), queryJson("SELECT AVG(k) AS avg_k FROM t WHERE k > 9"), queryJson("SELECT AVG(k) AS avg_k FROM t")],
				)
				const { agent, sessions } = sqlAgent(engine, llm)
				await agent.ask({ question: "average of k", session_key: "s1" })
				return sessions.history("s1").turns()
			}

			const first = await run()
			const second = await run()
			expect(first).toHaveLength(1)
			expect(second).toEqual(first)
		})
	})

	describe("failures", () => {
		it("should report an unknown session without calling the LLM", async () => {
			const source: SessionSource = { load: async () => undefined }
			const { llm } = scriptedLlm([rewriteJson("x")], [queryJson("SELECT k FROM t")])
			const agent = new QueryAgent({ llm, sessions: new SessionRegistry(source) })

			const response = await agent.ask({ question: "average of k", session_key: "nope" })

			expect(response.failure).toEqual({ kind: "session", message: "Unknown session: nope" })
			expect(response.attempts).toBe(0)
			expect(llm.complete).not.toHaveBeenCalled()
		})

		it("should report a caller abort as cancelled", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const { llm } = scriptedLlm([rewriteJson("x")], [queryJson("SELECT k FROM t")])
			const { agent, sessions } = sqlAgent(engine, llm)
			const controller = new AbortController()
			controller.abort()

			const response = await agent.ask({ question: "average of k", session_key: "s1" }, controller.signal)

			expect(response.failure).toEqual({ kind: "cancelled", message: "Request was cancelled" })
			expect(llm.complete).not.toHaveBeenCalled()
			expect(sessions.history("s1").size).toBe(0)
		})

		it("should cancel at the deadline", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const llm: LLMClient = {
				complete: (_prompt, options) =>
					new Promise<string>((_resolve, reject) => {
						options?.signal?.addEventListener("abort", () => reject(new Cancelled()), { once: true })
					}),
			}
			const { agent, sessions } = sqlAgent(engine, llm)

			const response = await agent.ask({ question: "average of k", session_key: "s1", timeout_ms: 10 })

			expect(response.failure).toEqual({ kind: "cancelled", message: "Request timed out after 10ms" })
			expect(engine.executed).toEqual([])
			expect(sessions.history("s1").size).toBe(0)
		})

		it("should let unexpected errors through", async () => {
			const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
			const llm: LLMClient = { complete: async () => Promise.reject(new Error("socket closed")) }
			const { agent } = sqlAgent(engine, llm)

			await expect(agent.ask({ question: "average of k", session_key: "s1" })).rejects.toThrow("socket closed")
		})
	})

	it("should clear a session's history on reset", async () => {
		const engine = new ScriptedEngine([{ kind: "success", table: AVG_TABLE }])
		const { llm } = scriptedLlm([rewriteJson("What is the average of k?")], [queryJson("SELECT AVG(k) AS avg_k FROM t")])
		const { agent, sessions } = sqlAgent(engine, llm)

		await agent.ask({ question: "average of k", session_key: "s1" })
		expect(agent.resetHistory("s1")).toBe(true)
		expect(sessions.history("s1").size).toBe(0)
	})
})

describe("toFailure", () => {
	it("should leave other errors unmapped", () => {
		expect(toFailure(new Error("x"))).toBeUndefined()
	})

	it("should map cancellation", () => {
		expect(toFailure(new Cancelled())).toEqual({ kind: "cancelled", message: "Request was cancelled" })
	})
})
