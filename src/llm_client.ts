/**
 * LLM HTTP Client
 *
 * Talks to an Ollama-compatible /api/generate endpoint.
 *
 * Responsibilities:
 * - Send prompts with text or JSON response format
 * - Timeouts and caller cancellation
 * - Health check and circuit breaker
 * - Parse JSON completions (code fences and surrounding prose tolerated)
 */

import { z } from "zod"
import { Cancelled, LLM_CONFIG, SynthesisFailure } from "./config.js"
import { silentLogger, type Logger } from "./logger.js"

export type ResponseFormat = "text" | "json"

export interface CompleteOptions {
	format?: ResponseFormat
	model?: string
	temperature?: number
	signal?: AbortSignal
}

/**
 * The LLM collaborator as seen by the rewriter and synthesizer
 */
export interface LLMClient {
	complete(prompt: string, options?: CompleteOptions): Promise<string>
}

export interface OllamaClientOptions {
	baseUrl?: string
	timeout?: number
	model?: string
	temperature?: number
	/** How long the breaker stays open after a connection failure */
	breakerCooldownMs?: number
	logger?: Logger
}

const generateResponseSchema = z.object({
	response: z.string(),
	done: z.boolean().optional(),
})

export class OllamaClient implements LLMClient {
	private baseUrl: string
	private timeout: number
	private model: string
	private temperature: number
	private breakerCooldownMs: number
	private logger: Logger
	private isHealthy: boolean = true
	private unhealthySince = 0

	constructor(options: OllamaClientOptions = {}) {
		this.baseUrl = (options.baseUrl || LLM_CONFIG.baseUrl).replace(/\/+$/, "")
		this.timeout = options.timeout || LLM_CONFIG.timeout
		this.model = options.model || LLM_CONFIG.synthesisModel
		this.temperature = options.temperature ?? LLM_CONFIG.temperature
		this.breakerCooldownMs = options.breakerCooldownMs ?? 30000
		this.logger = options.logger ?? silentLogger
	}

	/**
	 * Generate a completion for a single prompt
	 */
	async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
		const model = options.model || this.model

		if (options.signal?.aborted) {
			throw new Cancelled()
		}

		// Circuit breaker: fail fast until the cooldown passes
		if (!this.isHealthy && Date.now() - this.unhealthySince < this.breakerCooldownMs) {
			throw new SynthesisFailure("LLM service is unavailable. Please try again later.", {
				baseUrl: this.baseUrl,
			})
		}

		const url = `${this.baseUrl}${LLM_CONFIG.endpoints.generate}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)
		const onAbort = () => controller.abort()
		options.signal?.addEventListener("abort", onAbort, { once: true })

		const startTime = Date.now()
		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					model,
					prompt,
					stream: false,
					...(options.format === "json" ? { format: "json" } : {}),
					options: { temperature: options.temperature ?? this.temperature },
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new SynthesisFailure(`LLM returned error: ${response.status} ${errorText}`, {
					statusCode: response.status,
					responseBody: errorText,
				})
			}

			const parsed = generateResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new SynthesisFailure("LLM response is missing the completion text", { model })
			}

			this.isHealthy = true
			const text = parsed.data.response.trim()
			this.logger.debug("LLM completion", { model, latency_ms: Date.now() - startTime, chars: text.length })

			if (!text) {
				throw new SynthesisFailure("LLM returned an empty completion", { model })
			}
			return text
		} catch (error) {
			if (options.signal?.aborted) {
				throw new Cancelled()
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new SynthesisFailure(`LLM request timed out after ${this.timeout}ms`, {
					timeout: this.timeout,
					url,
				})
			}

			// Network errors open the breaker
			if (error instanceof TypeError) {
				this.isHealthy = false
				this.unhealthySince = Date.now()
				this.logger.warn("LLM unreachable", { baseUrl: this.baseUrl, error: error.message })
				throw new SynthesisFailure(`Cannot connect to LLM at ${this.baseUrl}. Is it running?`, {
					baseUrl: this.baseUrl,
					originalError: error.message,
				})
			}

			if (error instanceof SynthesisFailure) {
				throw error
			}

			throw new SynthesisFailure(`Unexpected error communicating with LLM: ${String(error)}`, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
			options.signal?.removeEventListener("abort", onAbort)
		}
	}

	/**
	 * Health check endpoint
	 *
	 * Returns true if the LLM server is reachable; updates the breaker.
	 */
	async healthCheck(): Promise<boolean> {
		const url = `${this.baseUrl}${LLM_CONFIG.endpoints.health}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)

		try {
			const response = await fetch(url, { method: "GET", signal: controller.signal })
			this.setHealthStatus(response.ok)
			return response.ok
		} catch (error) {
			this.logger.warn("LLM health check failed", { baseUrl: this.baseUrl, error: String(error) })
			this.setHealthStatus(false)
			return false
		} finally {
			clearTimeout(timeoutId)
		}
	}

	isHealthyStatus(): boolean {
		return this.isHealthy
	}

	/**
	 * Force set health status (for testing)
	 */
	setHealthStatus(healthy: boolean): void {
		this.isHealthy = healthy
		if (!healthy) this.unhealthySince = Date.now()
	}
}

// ============================================================================
// Completion Parsing
// ============================================================================

/**
 * Remove a surrounding markdown code fence
 */
export function stripCodeFence(text: string): string {
	return text
		.trim()
		.replace(/^```[A-Za-z]*\s*/, "")
		.replace(/\s*```$/, "")
		.trim()
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(text) }
	} catch {
		return { ok: false }
	}
}

/**
 * Parse a JSON completion
 *
 * Accepts a fenced block, or an object embedded in prose (first "{" to last
 * "}"). Throws SynthesisFailure when nothing parses.
 */
export function parseJsonCompletion(text: string): unknown {
	const body = stripCodeFence(text)
	if (!body) {
		throw new SynthesisFailure("LLM returned an empty completion")
	}

	const whole = tryParse(body)
	if (whole.ok) return whole.value

	const head = body.indexOf("{")
	const tail = body.lastIndexOf("}")
	if (head !== -1 && tail > head) {
		const embedded = tryParse(body.slice(head, tail + 1))
		if (embedded.ok) return embedded.value
	}
	throw new SynthesisFailure("LLM output is not valid JSON", { output: body.slice(0, 200) })
}
