#!/usr/bin/env node
/**
 * Stdio entry point for the askdata MCP server
 *
 * Config priority:
 *   1. .mcp.json file in the package root
 *   2. CLI argument (JSON)
 *   3. Environment variables (POSTGRES_CONNECTION_STRING, FRAME_PATH)
 *   4. config/config.yaml alone
 *
 * Usage:
 *   node dist/stdio.js '{"framePath":"./data/sales.csv"}'
 *   POSTGRES_CONNECTION_STRING=postgresql://... node dist/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { existsSync, readFileSync } from "fs"
import { dirname, join } from "path"
import { fileURLToPath } from "url"
import { getConfig } from "./config/loadConfig.js"
import createServer, { configSchema, SERVER_NAME, type ServerConfig } from "./index.js"
import { createLogger, parseLogLevel } from "./logger.js"

const logger = createLogger(parseLogLevel(getConfig().logging.level))

function loadConfigFromFile(): ServerConfig | null {
	const configPath = join(dirname(fileURLToPath(import.meta.url)), "..", ".mcp.json")
	if (!existsSync(configPath)) return null

	try {
		const config = configSchema.parse(JSON.parse(readFileSync(configPath, "utf-8")))
		logger.info("Config loaded from file", { path: configPath })
		return config
	} catch (error) {
		logger.warn("Ignoring invalid .mcp.json", { path: configPath, error: errorMessage(error) })
		return null
	}
}

function loadConfigFromEnv(): ServerConfig | null {
	const { POSTGRES_CONNECTION_STRING, FRAME_PATH } = process.env
	if (!POSTGRES_CONNECTION_STRING && !FRAME_PATH) return null
	logger.info("Config loaded from environment variables")
	return configSchema.parse({
		postgresConnectionString: POSTGRES_CONNECTION_STRING || undefined,
		framePath: FRAME_PATH || undefined,
	})
}

function resolveServerConfig(): ServerConfig {
	const fileConfig = loadConfigFromFile()
	if (fileConfig) return fileConfig

	const configArg = process.argv[2]
	if (configArg) {
		const config = configSchema.parse(JSON.parse(configArg))
		logger.info("Config loaded from CLI argument")
		return config
	}

	return loadConfigFromEnv() ?? {}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

async function main() {
	const config = resolveServerConfig()

	logger.info("Starting MCP server with stdio transport", {
		server: SERVER_NAME,
		source: config.framePath ? "frame" : "postgres",
		database: config.postgresConnectionString?.replace(/:[^:@]+@/, ":***@"),
	})

	const server = createServer({ config, logger })
	await server.connect(new StdioServerTransport())
	logger.info("MCP server running via stdio")

	const shutdown = (signal: string) => {
		logger.info("Shutting down", { signal })
		server.close().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error("Shutdown failed", { error: errorMessage(error) })
				process.exit(1)
			},
		)
	}
	process.on("SIGINT", () => shutdown("SIGINT"))
	process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
	logger.error("Fatal error", { error: errorMessage(error) })
	process.exit(1)
})
