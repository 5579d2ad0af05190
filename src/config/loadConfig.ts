/**
 * Unified config loader for askdata.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > schema defaults
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const fileConfigSchema = z.object({
	database: z
		.object({
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("postgres"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
			schema: z.string().default("public"),
			statement_timeout_ms: z.number().int().positive().default(30000),
		})
		.default({}),
	llm: z
		.object({
			ollama_url: z.string().default("http://localhost:11434"),
			timeout_ms: z.number().int().positive().default(60000),
			rewrite_model: z.string().default("qwen2.5-coder:7b"),
			synthesis_model: z.string().default("qwen2.5-coder:7b"),
			temperature: z.number().min(0).default(0),
		})
		.default({}),
	guard: z
		.object({
			max_limit: z.number().int().positive().default(500),
		})
		.default({}),
	retry: z
		.object({
			max_attempts: z.number().int().positive().default(3),
			backoff_ms: z.number().int().nonnegative().default(0),
		})
		.default({}),
	history: z
		.object({
			max_tokens: z.number().int().positive().default(3000),
			preview_rows: z.number().int().nonnegative().default(5),
		})
		.default({}),
	reconciler: z
		.object({
			row_id_column: z.string().default("__row_idx"),
			expand_threshold: z.number().int().nonnegative().default(10),
		})
		.default({}),
	source: z
		.object({
			kind: z.enum(["postgres", "frame"]).default("postgres"),
			frame_path: z.string().default(""),
			frame_name: z.string().default("df"),
			// Table whose rows are restored by the reconciler (postgres only)
			object: z.string().default(""),
		})
		.default({}),
	introspection: z
		.object({
			sample_values: z.number().int().nonnegative().default(5),
			descriptions_file: z.string().default("column_descriptions.json"),
		})
		.default({}),
	synthesis: z
		.object({
			examples_file: z.string().default("examples.json"),
			// Narrow the schema to the columns a question needs before synthesis
			select_columns: z.boolean().default(true),
		})
		.default({}),
	logging: z
		.object({
			level: z.string().default("info"),
		})
		.default({}),
})

export type AskDataConfig = z.infer<typeof fileConfigSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

/** Walk up from cwd looking for config/config.yaml. */
export function findConfigDir(): string | null {
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): PlainObject {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
	const result: PlainObject = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: PlainObject, name: string): PlainObject {
	const existing = cfg[name]
	if (isPlainObject(existing)) return existing
	const created: PlainObject = {}
	cfg[name] = created
	return created
}

function override(target: PlainObject, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: PlainObject): void {
	const db = section(cfg, "database")
	override(db, "host", env("DB_HOST"))
	override(db, "port", envInt("DB_PORT"))
	override(db, "name", env("DB_NAME"))
	override(db, "user", env("DB_USER"))
	override(db, "password", env("DB_PASSWORD"))
	override(db, "schema", env("DB_SCHEMA"))

	const llm = section(cfg, "llm")
	override(llm, "ollama_url", env("OLLAMA_BASE_URL"))
	override(llm, "timeout_ms", envInt("OLLAMA_TIMEOUT"))
	override(llm, "rewrite_model", env("REWRITE_MODEL") ?? env("OLLAMA_MODEL"))
	override(llm, "synthesis_model", env("SYNTHESIS_MODEL") ?? env("OLLAMA_MODEL"))
	override(llm, "temperature", envFloat("TEMPERATURE"))

	override(section(cfg, "guard"), "max_limit", envInt("GUARD_MAX_LIMIT"))

	const retry = section(cfg, "retry")
	override(retry, "max_attempts", envInt("RETRY_MAX_ATTEMPTS"))
	override(retry, "backoff_ms", envInt("RETRY_BACKOFF_MS"))

	override(section(cfg, "history"), "max_tokens", envInt("HISTORY_MAX_TOKENS"))

	const rec = section(cfg, "reconciler")
	override(rec, "row_id_column", env("ROW_ID_COLUMN"))
	override(rec, "expand_threshold", envInt("EXPAND_THRESHOLD"))

	const source = section(cfg, "source")
	override(source, "kind", env("SOURCE_KIND"))
	override(source, "frame_path", env("FRAME_PATH"))

	override(section(cfg, "logging"), "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AskDataConfig | null = null
let _configDir: string | null = null

export function loadConfig(): AskDataConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: PlainObject = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)

	const parsed = fileConfigSchema.safeParse(merged)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new Error(`Invalid configuration: ${issues.join("; ")}`)
	}

	_config = parsed.data
	_configDir = configDir
	return _config
}

export function getConfig(): AskDataConfig {
	return _config ?? loadConfig()
}

/**
 * Resolve a file named in the config relative to the config directory.
 * Returns null when no config directory was found.
 */
export function resolveConfigFile(fileName: string): string | null {
	if (!fileName) return null
	if (path.isAbsolute(fileName)) return fileName
	if (!_config) loadConfig()
	return _configDir ? path.join(_configDir, fileName) : null
}

/**
 * Read a JSON asset from the config directory, or undefined when it is absent.
 */
export function readConfigJson(fileName: string): unknown {
	const filePath = resolveConfigFile(fileName)
	if (!filePath || !fs.existsSync(filePath)) return undefined
	const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"))
	return parsed
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
	_configDir = null
}
