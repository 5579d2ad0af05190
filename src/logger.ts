/**
 * Structured logger shared by the server and the query pipeline
 *
 * Writes to stderr: stdout is reserved for the MCP protocol.
 */

export interface Logger {
	info: (message: string, context?: Record<string, unknown>) => void
	warn: (message: string, context?: Record<string, unknown>) => void
	error: (message: string, context?: Record<string, unknown>) => void
	debug: (message: string, context?: Record<string, unknown>) => void
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch ((value || "").toLowerCase()) {
		case "debug":
			return "debug"
		case "warn":
		case "warning":
			return "warn"
		case "error":
			return "error"
		case "silent":
		case "none":
			return "silent"
		default:
			return "info"
	}
}

/**
 * Create a level-filtered logger
 *
 * @param write - sink for formatted lines (defaults to console.error)
 */
export function createLogger(
	level: LogLevel = "info",
	write: (...args: unknown[]) => void = (...args) => console.error(...args),
): Logger {
	const threshold = LEVEL_ORDER[level]

	const emit = (lvl: Exclude<LogLevel, "silent">, message: string, context?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		if (context && Object.keys(context).length > 0) {
			write(tag, message, JSON.stringify(context))
		} else {
			write(tag, message)
		}
	}

	return {
		info: (message, context) => emit("info", message, context),
		warn: (message, context) => emit("warn", message, context),
		error: (message, context) => emit("error", message, context),
		debug: (message, context) => emit("debug", message, context),
	}
}

/** Logger that drops everything (tests, embedded use). */
export const silentLogger: Logger = createLogger("silent")
