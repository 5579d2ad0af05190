/**
 * Session Store
 *
 * Key-scoped registry handed to the query agent. Each session key owns one
 * History Store; data context (engine, schema, allow-list) comes from an
 * injected SessionSource and is shared read-only. Requests for the same key
 * run one at a time so turns are appended in completion order.
 */

import { SessionError } from "./config.js"
import type { DataEngine } from "./executor.js"
import { HistoryStore, type HistoryStoreOptions } from "./history_store.js"
import type { SchemaDescriptor } from "./query_types.js"

// ============================================================================
// Types
// ============================================================================

/**
 * Data context of a session
 */
export interface SessionContext {
	engine: DataEngine
	schema: readonly SchemaDescriptor[]
	/** Tables or frame names the guard allows */
	allowedObjects: readonly string[]
	rowIdColumn: string
	/** Object whose rows the reconciler restores; empty disables expansion */
	sourceObject: string
}

/**
 * Resolves a session key to its data context; undefined when unknown
 */
export interface SessionSource {
	load(key: string): Promise<SessionContext | undefined>
}

/**
 * Source that serves one shared context to every key
 */
export function createStaticSource(context: SessionContext): SessionSource {
	const frozen = Object.freeze({ ...context, allowedObjects: Object.freeze([...context.allowedObjects]) })
	return {
		load: async () => frozen,
	}
}

// ============================================================================
// Registry
// ============================================================================

export class SessionRegistry {
	private histories = new Map<string, HistoryStore>()
	private queues = new Map<string, Promise<void>>()

	constructor(
		private source: SessionSource,
		private historyOptions: HistoryStoreOptions = {},
	) {}

	/**
	 * Load the data context of a session
	 *
	 * @throws SessionError for a blank key, an unknown session or a context without objects
	 */
	async resolve(key: string): Promise<SessionContext> {
		const normalized = key.trim()
		if (!normalized) {
			throw new SessionError("Session key is required")
		}

		const context = await this.source.load(normalized)
		if (!context) {
			throw new SessionError(`Unknown session: ${normalized}`, { session_key: normalized })
		}
		if (context.allowedObjects.length === 0) {
			throw new SessionError("Session has no accessible tables", { session_key: normalized })
		}
		return context
	}

	/** History of a session, created on first use */
	history(key: string): HistoryStore {
		const normalized = key.trim()
		let store = this.histories.get(normalized)
		if (!store) {
			store = new HistoryStore(this.historyOptions)
			this.histories.set(normalized, store)
		}
		return store
	}

	/**
	 * Clear a session's history
	 *
	 * @returns false when the session had no history
	 */
	reset(key: string): boolean {
		const store = this.histories.get(key.trim())
		if (!store) return false
		store.clear()
		return true
	}

	get size(): number {
		return this.histories.size
	}

	/**
	 * Run `fn` after every earlier request of the same session has settled
	 */
	async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const normalized = key.trim()
		const previous = this.queues.get(normalized) ?? Promise.resolve()
		const run = previous.then(fn)
		// The queue only orders requests; each caller gets its own outcome from `run`
		const tail = run.then(
			() => undefined,
			() => undefined,
		)
		this.queues.set(normalized, tail)

		try {
			return await run
		} finally {
			if (this.queues.get(normalized) === tail) {
				this.queues.delete(normalized)
			}
		}
	}
}
