import { afterEach, beforeEach, describe, it, expect } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { FrameEngine } from "./frame_engine.js"
import { loadColumnDescriptions, SchemaIntrospector } from "./schema_introspector.js"

const ROWS = [
	{ __row_idx: 0, line: "L1", defect_count: 2 },
	{ __row_idx: 1, line: "L2", defect_count: 0 },
	{ __row_idx: 2, line: "L1", defect_count: 5 },
]

describe("SchemaIntrospector", () => {
	it("should describe columns with types, samples and descriptions", async () => {
		const introspector = new SchemaIntrospector(new FrameEngine(ROWS))
		const schema = await introspector.introspect({
			sampleValues: 2,
			descriptions: { line: "Production line", "df.defect_count": "Defects per inspection" },
		})

		expect(schema).toEqual([
			{
				object_name: "df",
				columns: [
					{ name: "__row_idx", inferred_type: "numeric", sample_values: ["0", "1"] },
					{ name: "line", inferred_type: "text", sample_values: ["L1", "L2"], description: "Production line" },
					{
						name: "defect_count",
						inferred_type: "numeric",
						sample_values: ["2", "0"],
						description: "Defects per inspection",
					},
				],
			},
		])
	})

	it("should freeze the descriptors", async () => {
		const schema = await new SchemaIntrospector(new FrameEngine(ROWS)).introspect()
		expect(Object.isFrozen(schema)).toBe(true)
		expect(Object.isFrozen(schema[0].columns)).toBe(true)
		expect(Object.isFrozen(schema[0].columns[1].sample_values)).toBe(true)
	})

	it("should skip sampling when disabled", async () => {
		const schema = await new SchemaIntrospector(new FrameEngine(ROWS)).introspect({ sampleValues: 0 })
		expect(schema[0].columns.map((c) => c.sample_values)).toEqual([[], [], []])
	})

	it("should restrict to the requested objects", async () => {
		const introspector = new SchemaIntrospector(new FrameEngine(ROWS))
		expect(await introspector.introspect({ objects: ["other"] })).toEqual([])
		expect((await introspector.introspect({ objects: ["DF"] })).map((d) => d.object_name)).toEqual(["df"])
	})
})

describe("loadColumnDescriptions", () => {
	let tmpDir: string

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "askdata-desc-test-"))
	})

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true })
	})

	it("should read a glossary file", () => {
		const file = path.join(tmpDir, "descriptions.json")
		fs.writeFileSync(file, JSON.stringify({ line: "Production line" }))
		expect(loadColumnDescriptions(file)).toEqual({ line: "Production line" })
	})

	it("should return an empty glossary when the file is missing", () => {
		expect(loadColumnDescriptions(path.join(tmpDir, "missing.json"))).toEqual({})
	})

	it("should reject a glossary that is not an object of strings", () => {
		const file = path.join(tmpDir, "bad.json")
		fs.writeFileSync(file, JSON.stringify({ line: 3 }))
		expect(() => loadColumnDescriptions(file)).toThrow("Invalid column descriptions")
	})
})
