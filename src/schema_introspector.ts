/**
 * Schema Introspector
 *
 * Builds Schema Descriptors from any DataEngine: tables (or the frame), their
 * columns and inferred types, a few distinct sample values per column, and
 * glossary descriptions from config/column_descriptions.json.
 *
 * Descriptors are built once per source and frozen; sessions share them.
 */

import { z } from "zod"
import { DEFAULTS } from "./config.js"
import { readConfigJson } from "./config/loadConfig.js"
import type { DataEngine } from "./executor.js"
import { silentLogger, type Logger } from "./logger.js"
import type { ColumnDescriptor, SchemaDescriptor } from "./query_types.js"

// ============================================================================
// Types
// ============================================================================

/**
 * Column glossary keyed by `column` or `object.column` (the latter wins)
 */
export type ColumnDescriptions = Record<string, string>

export interface IntrospectOptions {
	/** Distinct sample values per column (0 disables sampling) */
	sampleValues?: number
	descriptions?: ColumnDescriptions
	/** Restrict to these objects; defaults to everything the engine lists */
	objects?: string[]
}

const descriptionsSchema = z.record(z.string())

// ============================================================================
// Introspector Class
// ============================================================================

export class SchemaIntrospector {
	constructor(
		private engine: DataEngine,
		private logger: Logger = silentLogger,
	) {}

	/**
	 * Describe every accessible object of the engine
	 */
	async introspect(options: IntrospectOptions = {}): Promise<readonly SchemaDescriptor[]> {
		const startTime = Date.now()
		const sampleCount = options.sampleValues ?? DEFAULTS.sampleValuesPerColumn
		const descriptions = options.descriptions ?? {}

		const listed = await this.engine.listTables()
		const objects = options.objects
			? listed.filter((name) => options.objects?.some((o) => o.toLowerCase() === name.toLowerCase()))
			: listed

		const result: SchemaDescriptor[] = []
		for (const objectName of objects) {
			const columns = await this.engine.describe(objectName)
			const described: ColumnDescriptor[] = []

			for (const column of columns) {
				const samples = sampleCount > 0 ? await this.engine.sampleValues(objectName, column.name, sampleCount) : []
				const description = descriptions[`${objectName}.${column.name}`] ?? descriptions[column.name]
				const descriptor: ColumnDescriptor = {
					name: column.name,
					inferred_type: column.data_type,
					sample_values: samples,
					...(description ? { description } : {}),
				}
				Object.freeze(descriptor.sample_values)
				described.push(Object.freeze(descriptor))
			}

			Object.freeze(described)
			result.push(Object.freeze({ object_name: objectName, columns: described }))
		}

		this.logger.info("Schema introspection complete", {
			objects: result.length,
			total_columns: result.reduce((n, d) => n + d.columns.length, 0),
			latency_ms: Date.now() - startTime,
		})

		Object.freeze(result)
		return result
	}
}

/**
 * Load the column glossary from the config directory; empty when absent
 */
export function loadColumnDescriptions(fileName: string): ColumnDescriptions {
	const raw = readConfigJson(fileName)
	if (raw === undefined) return {}
	const parsed = descriptionsSchema.safeParse(raw)
	if (!parsed.success) {
		throw new Error(`Invalid column descriptions in ${fileName}: expected an object of strings`)
	}
	return parsed.data
}

