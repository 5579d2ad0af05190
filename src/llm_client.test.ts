import { afterEach, describe, it, expect, vi } from "vitest"
import { Cancelled, SynthesisFailure } from "./config.js"
import { OllamaClient, parseJsonCompletion, stripCodeFence } from "./llm_client.js"

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	})
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe("OllamaClient", () => {
	describe("complete", () => {
		it("should post the prompt and return the completion text", async () => {
			const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: "  hello \n", done: true }))
			vi.stubGlobal("fetch", fetchMock)

			const client = new OllamaClient({ baseUrl: "http://llm.test/", model: "m1", temperature: 0 })
			const text = await client.complete("say hello", { format: "json" })

			expect(text).toBe("hello")
			expect(fetchMock).toHaveBeenCalledTimes(1)
			const [url, init] = fetchMock.mock.calls[0]
			expect(url).toBe("http://llm.test/api/generate")
			expect(JSON.parse(String(init.body))).toEqual({
				model: "m1",
				prompt: "say hello",
				stream: false,
				format: "json",
				options: { temperature: 0 },
			})
		})

		it("should let the call override the model", async () => {
			const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: "ok" }))
			vi.stubGlobal("fetch", fetchMock)

			await new OllamaClient({ baseUrl: "http://llm.test", model: "m1" }).complete("p", { model: "m2" })
			const body = JSON.parse(String(fetchMock.mock.calls[0][1].body))
			expect(body.model).toBe("m2")
			expect(body.format).toBeUndefined()
		})

		it("should raise SynthesisFailure on an HTTP error", async () => {
			vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("model not found", { status: 404 })))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			await expect(client.complete("p")).rejects.toThrow("LLM returned error: 404 model not found")
		})

		it("should raise SynthesisFailure on an empty completion", async () => {
			vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ response: "   " })))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			await expect(client.complete("p")).rejects.toBeInstanceOf(SynthesisFailure)
		})

		it("should raise SynthesisFailure when the payload has no response field", async () => {
			vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: "boom" })))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			await expect(client.complete("p")).rejects.toThrow("LLM response is missing the completion text")
		})

		it("should open the breaker after a connection failure", async () => {
			const fetchMock = vi.fn().mockRejectedValue(new TypeError("fetch failed"))
			vi.stubGlobal("fetch", fetchMock)

			const client = new OllamaClient({ baseUrl: "http://llm.test", breakerCooldownMs: 60000 })
			await expect(client.complete("p")).rejects.toThrow("Cannot connect to LLM at http://llm.test")
			expect(client.isHealthyStatus()).toBe(false)

			await expect(client.complete("p")).rejects.toThrow("LLM service is unavailable")
			expect(fetchMock).toHaveBeenCalledTimes(1)
		})

		it("should throw Cancelled when the caller has already aborted", async () => {
			const fetchMock = vi.fn()
			vi.stubGlobal("fetch", fetchMock)
			const controller = new AbortController()
			controller.abort()

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			await expect(client.complete("p", { signal: controller.signal })).rejects.toBeInstanceOf(Cancelled)
			expect(fetchMock).not.toHaveBeenCalled()
		})

		it("should throw Cancelled when the caller aborts mid-request", async () => {
			const controller = new AbortController()
			vi.stubGlobal("fetch", vi.fn((_url: string, init: RequestInit) => {
				controller.abort()
				const err = new Error("aborted")
				err.name = "AbortError"
				return init.signal?.aborted ? Promise.reject(err) : Promise.resolve(jsonResponse({ response: "x" }))
			}))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			await expect(client.complete("p", { signal: controller.signal })).rejects.toBeInstanceOf(Cancelled)
		})
	})

	describe("healthCheck", () => {
		it("should close the breaker when the server answers", async () => {
			vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ models: [] })))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			client.setHealthStatus(false)
			expect(await client.healthCheck()).toBe(true)
			expect(client.isHealthyStatus()).toBe(true)
		})

		it("should report false when the server is unreachable", async () => {
			vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")))

			const client = new OllamaClient({ baseUrl: "http://llm.test" })
			expect(await client.healthCheck()).toBe(false)
			expect(client.isHealthyStatus()).toBe(false)
		})
	})
})

describe("stripCodeFence", () => {
	it("should remove a language-tagged fence", () => {
		expect(stripCodeFence("```json\n{\"a\": 1}\n```")).toBe("{\"a\": 1}")
	})

	it("should leave unfenced text alone", () => {
		expect(stripCodeFence("  SELECT 1 ")).toBe("SELECT 1")
	})
})

describe("parseJsonCompletion", () => {
	it("should parse plain JSON", () => {
		expect(parseJsonCompletion("{\"query\": \"SELECT 1\"}")).toEqual({ query: "SELECT 1" })
	})

	it("should parse a fenced object", () => {
		expect(parseJsonCompletion("```json\n{\"a\": [1, 2]}\n```")).toEqual({ a: [1, 2] })
	})

	it("should extract an object embedded in prose", () => {
		expect(parseJsonCompletion("Here you go: {\"a\": true} hope it helps")).toEqual({ a: true })
	})

	it("should raise SynthesisFailure on malformed output", () => {
		expect(() => parseJsonCompletion("not json at all")).toThrow(SynthesisFailure)
		expect(() => parseJsonCompletion("```\n```")).toThrow("LLM returned an empty completion")
	})
})
