import { describe, it, expect, vi } from "vitest"
import { makeTable, type Table } from "./query_types.js"
import { distinctIds, EMPTY_TABLE_TEXT, formatCell, reconcile, renderTable } from "./result_reconciler.js"

const OPTIONS = { rowIdColumn: "__row_idx", expandThreshold: 10 }

const SOURCE: Table = makeTable(
	["__row_idx", "line", "defect_count", "shift"],
	[
		{ __row_idx: 0, line: "L1", defect_count: 2, shift: "A" },
		{ __row_idx: 1, line: "L2", defect_count: 0, shift: "B" },
		{ __row_idx: 2, line: "L1", defect_count: 5, shift: "C" },
		{ __row_idx: 3, line: "L3", defect_count: 1, shift: "A" },
	],
)

function sourceLookup(ids: unknown[]): Promise<Table> {
	const wanted = new Set(ids.map(String))
	// Storage order on purpose
	return Promise.resolve(makeTable(SOURCE.columns, SOURCE.rows.filter((r) => wanted.has(String(r.__row_idx)))))
}

describe("distinctIds", () => {
	it("should keep first-appearance order and drop duplicates and nulls", () => {
		const table = makeTable(["__row_idx"], [
			{ __row_idx: 3 }, { __row_idx: 1 }, { __row_idx: 3 }, { __row_idx: null }, { __row_idx: 0 },
		])
		expect(distinctIds(table, "__row_idx")).toEqual([3, 1, 0])
	})
})

describe("reconcile", () => {
	it("should expand a three-row identifier result to full source rows", async () => {
		const narrow = makeTable(["__row_idx", "defect_count"], [
			{ __row_idx: 2, defect_count: 5 },
			{ __row_idx: 0, defect_count: 2 },
			{ __row_idx: 3, defect_count: 1 },
		])
		const result = await reconcile(narrow, OPTIONS, sourceLookup)

		expect(result.expanded).toBe(true)
		expect(result.table.columns).toEqual(["__row_idx", "line", "defect_count", "shift"])
		expect(result.table.row_count).toBe(3)
		expect(result.table.rows.map((r) => r.__row_idx)).toEqual([2, 0, 3])
		expect(result.table.rows[0]).toEqual({ __row_idx: 2, line: "L1", defect_count: 5, shift: "C" })
	})

	it("should pass through when the identifier column is absent", async () => {
		const lookup = vi.fn(sourceLookup)
		const table = makeTable(["avg"], [{ avg: 2 }])
		const result = await reconcile(table, OPTIONS, lookup)
		expect(result).toEqual({ table, expanded: false })
		expect(lookup).not.toHaveBeenCalled()
	})

	it("should pass through when distinct identifiers reach the threshold", async () => {
		const lookup = vi.fn(sourceLookup)
		const table = makeTable(["__row_idx"], [{ __row_idx: 0 }, { __row_idx: 1 }])
		const result = await reconcile(table, { rowIdColumn: "__row_idx", expandThreshold: 2 }, lookup)
		expect(result.expanded).toBe(false)
		expect(result.table).toBe(table)
		expect(lookup).not.toHaveBeenCalled()
	})

	it("should count distinct identifiers, not rows", async () => {
		const table = makeTable(["__row_idx"], [{ __row_idx: 1 }, { __row_idx: 1 }, { __row_idx: 1 }])
		const result = await reconcile(table, { rowIdColumn: "__row_idx", expandThreshold: 2 }, sourceLookup)
		expect(result.expanded).toBe(true)
		expect(result.table.rows).toEqual([{ __row_idx: 1, line: "L2", defect_count: 0, shift: "B" }])
	})

	it("should pass through when every identifier is null", async () => {
		const table = makeTable(["__row_idx"], [{ __row_idx: null }])
		const result = await reconcile(table, OPTIONS, sourceLookup)
		expect(result.expanded).toBe(false)
	})

	it("should pass through when the lookup finds nothing", async () => {
		const table = makeTable(["__row_idx"], [{ __row_idx: 99 }])
		const result = await reconcile(table, OPTIONS, sourceLookup)
		expect(result).toEqual({ table, expanded: false })
	})

	it("should pass through without a lookup", async () => {
		const table = makeTable(["__row_idx"], [{ __row_idx: 0 }])
		expect(await reconcile(table, OPTIONS)).toEqual({ table, expanded: false })
	})
})

describe("formatCell", () => {
	it("should render null and undefined as empty", () => {
		expect(formatCell(null)).toBe("")
		expect(formatCell(undefined)).toBe("")
	})

	it("should collapse whitespace and escape pipes", () => {
		expect(formatCell("  a\n\tb |  c ")).toBe("a b \\| c")
	})

	it("should JSON-encode objects and arrays", () => {
		expect(formatCell({ a: 1 })).toBe("{\"a\":1}")
		expect(formatCell([1, "x"])).toBe("[1,\"x\"]")
	})

	it("should render dates as ISO strings", () => {
		expect(formatCell(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z")
	})

	it("should render NaN as empty", () => {
		expect(formatCell(NaN)).toBe("")
	})
})

describe("renderTable", () => {
	it("should render a canonical pipe table", () => {
		const table = makeTable(["line", "avg"], [{ line: "L1", avg: 3.5 }, { line: "L2", avg: null }])
		expect(renderTable(table)).toBe("| line | avg |\n|---|---|\n| L1 | 3.5 |\n| L2 |  |")
	})

	it("should render the empty marker for zero rows", () => {
		expect(renderTable(makeTable(["a"], []))).toBe(EMPTY_TABLE_TEXT)
		expect(renderTable(makeTable([], []))).toBe("| (empty) |\n|---|\n| (no rows) |")
	})

	it("should honor maxRows", () => {
		const table = makeTable(["n"], [{ n: 1 }, { n: 2 }, { n: 3 }])
		expect(renderTable(table, 2)).toBe("| n |\n|---|\n| 1 |\n| 2 |")
	})
})
