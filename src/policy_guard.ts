/**
 * Policy Guard
 *
 * Pure, synchronous validator over a query candidate. Rules run in a fixed
 * order and the first violation short-circuits:
 *
 * 1. Shape        - exactly one statement/expression        (MultiStatement)
 * 2. Mutation     - no data- or schema-modifying operations (ForbiddenOperation)
 * 3. Scope        - only allow-listed tables/frames          (UnauthorizedObject)
 * 4. Resource     - result bound injected or clamped, never rejected
 * 5. Environment  - no file, network or process primitives  (UnsafeCapability)
 *
 * `normalized_text` in the verdict is what the executor runs.
 */

import { GUARD_DEFAULTS, type Dialect } from "./config.js"
import { frameRuleSet } from "./frame_validator.js"
import type { GuardPolicy, GuardRuleSet, GuardVerdict, QueryCandidate, Violation } from "./query_types.js"
import { sqlRuleSet } from "./sql_validator.js"

const RULE_SETS: Record<Dialect, (text: string, policy: GuardPolicy) => GuardRuleSet> = {
	sql: sqlRuleSet,
	frame: frameRuleSet,
}

/**
 * Build an immutable policy shared by every request of a session
 */
export function createGuardPolicy(allowedObjects: readonly string[], maxLimit: number = GUARD_DEFAULTS.maxLimit): GuardPolicy {
	if (!Number.isInteger(maxLimit) || maxLimit < 1) {
		throw new RangeError(`maxLimit must be a positive integer, got ${maxLimit}`)
	}
	return Object.freeze({
		allowedObjects: Object.freeze([...allowedObjects]),
		maxLimit,
	})
}

/**
 * Validate and normalize one candidate
 */
export function guardCandidate(candidate: QueryCandidate, policy: GuardPolicy): GuardVerdict {
	const rules = RULE_SETS[candidate.dialect](candidate.text, policy)

	const reject = (violation: Violation): GuardVerdict => ({
		accepted: false,
		normalized_text: candidate.text.trim(),
		violations: [violation],
	})

	const shape = rules.shape()
	if (shape) return reject(shape)

	const mutation = rules.mutation()
	if (mutation) return reject(mutation)

	const scope = rules.scope()
	if (scope) return reject(scope)

	const normalized = rules.resource()

	const environment = rules.environment()
	if (environment) return reject(environment)

	return { accepted: true, normalized_text: normalized, violations: [] }
}

/**
 * Compress guard violations into short instructions for the repair prompt
 */
export function describeViolations(verdict: GuardVerdict, dialect: Dialect): string[] {
	const instructions: string[] = []
	const seen = new Set<string>()

	for (const violation of verdict.violations) {
		let instruction = ""

		switch (violation.rule_id) {
			case "MultiStatement":
				instruction = dialect === "sql"
					? "Output exactly one SELECT statement, no semicolon-separated queries"
					: "Output exactly one expression, no statements or semicolons"
				break
			case "ForbiddenOperation":
				instruction = dialect === "sql"
					? "Read only: remove INSERT/UPDATE/DELETE/DROP/ALTER/CREATE and start with SELECT or WITH"
					: "Read only: do not mutate df or its rows (no assignment, delete, push/sort/splice, ++/--)"
				break
			case "UnauthorizedObject":
				instruction = dialect === "sql"
					? "Reference only the allowed tables"
					: "Reference only df and the helper functions"
				break
			case "UnsafeCapability":
				instruction = "Remove file, network and process access"
				break
		}

		const line = `${instruction} (${violation.message})`
		if (!seen.has(line)) {
			seen.add(line)
			instructions.push(line)
		}
	}

	return instructions
}
