/**
 * askdata MCP Server
 *
 * Exposes the query agent as MCP tools:
 * - ask_data: answer a free-text question over the configured source
 * - reset_history: clear one session's conversation history
 *
 * The data source (PostgreSQL or a CSV/JSON frame), its schema and the LLM
 * client are set up on the first tool call.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import type { AskFailure } from "./config.js"
import { getConfig, type AskDataConfig } from "./config/loadConfig.js"
import type { DataEngine } from "./executor.js"
import { FrameEngine, loadFrameFile } from "./frame_engine.js"
import { OllamaClient } from "./llm_client.js"
import { silentLogger, type Logger } from "./logger.js"
import { createPgPool, PostgresEngine } from "./pg_engine.js"
import { QueryAgent } from "./query_agent.js"
import { loadColumnDescriptions, SchemaIntrospector } from "./schema_introspector.js"
import { createStaticSource, SessionRegistry } from "./session_store.js"
import { loadExamples } from "./synthesizer.js"

export const SERVER_NAME = "mcp-server-askdata"
export const SERVER_VERSION = "0.1.0"

/**
 * Server configuration passed by the MCP host; values here win over config.yaml
 */
export const configSchema = z.object({
	postgresConnectionString: z.string().optional(),
	/** Serve a .csv or .json file as the frame instead of PostgreSQL */
	framePath: z.string().optional(),
})

export type ServerConfig = z.infer<typeof configSchema>

const askDataInput = {
	question: z.string().min(1).describe("Free-text question about the data"),
	session_key: z.string().min(1).default("default").describe("Conversation key; follow-up questions share it"),
	timeout_ms: z.number().int().positive().optional().describe("Deadline for the whole question"),
}

const resetHistoryInput = {
	session_key: z.string().min(1).default("default"),
}

// ============================================================================
// Runtime
// ============================================================================

export interface Runtime {
	agent: QueryAgent
	engine: DataEngine
}

interface SourceSetup {
	engine: DataEngine
	allowedObjects: string[]
	sourceObject: string
}

async function createEngine(config: ServerConfig, cfg: AskDataConfig, logger: Logger): Promise<SourceSetup> {
	const framePath = config.framePath || (cfg.source.kind === "frame" ? cfg.source.frame_path : "")
	if (framePath) {
		const rows = loadFrameFile(framePath, cfg.reconciler.row_id_column)
		const name = cfg.source.frame_name
		logger.info("Frame loaded", { path: framePath, rows: rows.length, name })
		return {
			engine: new FrameEngine(rows, { name, logger }),
			allowedObjects: [name],
			sourceObject: name,
		}
	}

	const pool = createPgPool(cfg.database, config.postgresConnectionString)
	const engine = new PostgresEngine(pool, {
		schema: cfg.database.schema,
		statementTimeoutMs: cfg.database.statement_timeout_ms,
		logger,
	})
	const allowedObjects = await engine.listTables()
	logger.info("Database tables discovered", { schema: cfg.database.schema, tables: allowedObjects.length })
	return { engine, allowedObjects, sourceObject: cfg.source.object }
}

/**
 * Build the engine, schema, LLM client and agent from configuration
 */
export async function createRuntime(config: ServerConfig, logger: Logger = silentLogger): Promise<Runtime> {
	const cfg = getConfig()
	const { engine, allowedObjects, sourceObject } = await createEngine(config, cfg, logger)

	const schema = await new SchemaIntrospector(engine, logger).introspect({
		sampleValues: cfg.introspection.sample_values,
		descriptions: loadColumnDescriptions(cfg.introspection.descriptions_file),
		objects: allowedObjects,
	})

	const sessions = new SessionRegistry(
		createStaticSource({
			engine,
			schema,
			allowedObjects,
			rowIdColumn: cfg.reconciler.row_id_column,
			sourceObject,
		}),
		{ maxTokens: cfg.history.max_tokens, previewRows: cfg.history.preview_rows },
	)

	const llm = new OllamaClient({
		baseUrl: cfg.llm.ollama_url,
		timeout: cfg.llm.timeout_ms,
		temperature: cfg.llm.temperature,
		logger,
	})

	const agent = new QueryAgent({
		llm,
		sessions,
		logger,
		rewriteModel: cfg.llm.rewrite_model,
		synthesisModel: cfg.llm.synthesis_model,
		maxLimit: cfg.guard.max_limit,
		maxAttempts: cfg.retry.max_attempts,
		backoffMs: cfg.retry.backoff_ms,
		expandThreshold: cfg.reconciler.expand_threshold,
		examples: loadExamples(cfg.synthesis.examples_file, engine.dialect),
		selectColumns: cfg.synthesis.select_columns,
	})

	return { agent, engine }
}

// ============================================================================
// Server
// ============================================================================

export interface CreateServerOptions {
	config: ServerConfig
	logger?: Logger
	/** Overrides createRuntime (embedding, tests) */
	runtime?: () => Promise<Runtime>
}

export default function createServer({ config, logger = silentLogger, runtime }: CreateServerOptions) {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	let ready: Promise<Runtime> | null = null
	const getRuntime = (): Promise<Runtime> => {
		if (!ready) {
			ready = (runtime ?? (() => createRuntime(config, logger)))()
			// A failed start is retried on the next call
			ready.catch((error: unknown) => {
				logger.error("Runtime initialization failed", { error: error instanceof Error ? error.message : String(error) })
				ready = null
			})
		}
		return ready
	}

	server.tool(
		"ask_data",
		"Answer a natural-language question about the configured tables. Returns the executed read-only query and the result table.",
		askDataInput,
		async ({ question, session_key, timeout_ms }, extra) => {
			const { agent } = await getRuntime()
			const response = await agent.ask({ question, session_key, timeout_ms }, extra.signal)

			const text = response.failure
				? formatFailure(response.failure)
				: `${response.answer_text ?? ""}\n\nQuery: ${response.executed_query_text}`
			return {
				content: [
					{ type: "text" as const, text },
					{ type: "text" as const, text: JSON.stringify(response, null, 2) },
				],
				isError: response.failure !== undefined,
			}
		},
	)

	server.tool(
		"reset_history",
		"Forget the conversation history of one session.",
		resetHistoryInput,
		async ({ session_key }) => {
			const { agent } = await getRuntime()
			const cleared = agent.resetHistory(session_key)
			return {
				content: [{ type: "text" as const, text: cleared ? `History cleared for ${session_key}` : `No history for ${session_key}` }],
			}
		},
	)

	return server
}

function formatFailure(failure: AskFailure): string {
	const lines = [`Could not answer (${failure.kind}): ${failure.message}`]
	if (failure.last_candidate) lines.push(`Last candidate: ${failure.last_candidate}`)
	if (failure.last_violations && failure.last_violations.length > 0) {
		lines.push(`Violations: ${failure.last_violations.join("; ")}`)
	}
	if (failure.last_error) lines.push(`Last error: ${failure.last_error}`)
	return lines.join("\n")
}
