/**
 * Frame Prelude
 *
 * Source evaluated inside each frame context. It defines the helper functions,
 * rebuilds the frame from JSON text and installs a result serializer, so every
 * object an expression can reach belongs to the context's own realm.
 *
 * Evaluates to `install(frameName, frameJson)`.
 */

export const RESULT_SERIALIZER = "__frameResultJson"
export const RESULT_SLOT = "__frameResult"

export const FRAME_PRELUDE = `"use strict";
(function install(frameName, frameJson) {
	function isRecord(value) {
		return typeof value === "object" && value !== null && !Array.isArray(value)
	}

	function isMissing(value) {
		return value === null || value === undefined || value === ""
	}

	function field(item, key) {
		if (typeof key !== "string") return item
		return isRecord(item) ? item[key] : undefined
	}

	function toNumber(value) {
		if (typeof value === "number") return Number.isFinite(value) ? value : null
		if (typeof value === "bigint") return Number(value)
		if (typeof value === "string") {
			const cleaned = value.trim().replace(/,/g, "")
			if (!cleaned) return null
			const n = Number(cleaned)
			return Number.isFinite(n) ? n : null
		}
		return null
	}

	function numbers(values, key) {
		if (!Array.isArray(values)) return []
		const out = []
		for (const item of values) {
			const n = toNumber(field(item, key))
			if (n !== null) out.push(n)
		}
		return out
	}

	function compareValues(a, b) {
		const na = toNumber(a)
		const nb = toNumber(b)
		if (na !== null && nb !== null) return na - nb
		return String(a).localeCompare(String(b))
	}

	function groupBy(rows, key) {
		const groups = new Map()
		for (const row of Array.isArray(rows) ? rows : []) {
			const value = field(row, key)
			const id = JSON.stringify(value === undefined ? null : value)
			const group = groups.get(id)
			if (group) group.rows.push(row)
			else groups.set(id, { key: value, rows: [row] })
		}
		return Array.from(groups.values())
	}

	function mean(values, key) {
		const ns = numbers(values, key)
		return ns.length > 0 ? ns.reduce((a, b) => a + b, 0) / ns.length : null
	}

	function sum(values, key) {
		return numbers(values, key).reduce((a, b) => a + b, 0)
	}

	function count(values, key) {
		if (!Array.isArray(values)) return 0
		if (key === undefined) return values.length
		return values.filter((item) => !isMissing(field(item, key))).length
	}

	function min(values, key) {
		const ns = numbers(values, key)
		return ns.length > 0 ? Math.min(...ns) : null
	}

	function max(values, key) {
		const ns = numbers(values, key)
		return ns.length > 0 ? Math.max(...ns) : null
	}

	function uniq(values, key) {
		if (!Array.isArray(values)) return []
		const seen = new Set()
		const out = []
		for (const item of values) {
			const value = field(item, key)
			const id = JSON.stringify(value === undefined ? null : value)
			if (!seen.has(id)) {
				seen.add(id)
				out.push(value)
			}
		}
		return out
	}

	// Missing values go last in both directions
	function sortBy(rows, key, direction) {
		if (!Array.isArray(rows)) return []
		const sign = direction === "desc" ? -1 : 1
		return rows.slice().sort((a, b) => {
			const va = field(a, key)
			const vb = field(b, key)
			if (isMissing(va) || isMissing(vb)) return Number(isMissing(va)) - Number(isMissing(vb))
			return sign * compareValues(va, vb)
		})
	}

	function limit(value, n) {
		const bound = toNumber(n)
		if (!Array.isArray(value) || bound === null) return value
		return value.slice(0, Math.max(0, Math.floor(bound)))
	}

	function round(value, digits) {
		const n = toNumber(value)
		const d = digits === undefined ? 6 : toNumber(digits)
		if (n === null) return null
		const factor = Math.pow(10, d === null ? 6 : d)
		return Math.round(n * factor) / factor
	}

	function deepFreeze(value) {
		if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
			Object.freeze(value)
			for (const child of Object.values(value)) deepFreeze(child)
		}
		return value
	}

	const helpers = { groupBy, mean, sum, count, min, max, uniq, sortBy, limit, round, toNumber }
	for (const name of Object.keys(helpers)) {
		globalThis[name] = Object.freeze(helpers[name])
	}
	globalThis[frameName] = deepFreeze(JSON.parse(frameJson))
	globalThis.${RESULT_SERIALIZER} = function (value) {
		return JSON.stringify({ value: value })
	}
})`
