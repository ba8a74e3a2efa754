import OpenAI from "openai";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { LLMError } from "../core/errors";
import { retryWithBackoff } from "../core/retry";
import type { LLMCallOptions, LLMClient, LLMCompletion, LLMPrompt } from "./contracts";

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.2;

export interface OpenRouterClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
}

function isRetryable(error: unknown): boolean {
  if (!(error instanceof LLMError)) return true;
  return error.code === "timeout" || error.code === "request_failed" || error.code === "api_error_429" || error.code.startsWith("api_error_5");
}

export class OpenRouterClient implements LLMClient {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenRouterClientOptions = {}) {
    const apiKey = options.apiKey ?? env.OPENROUTER_API_KEY;
    if (!apiKey) {
      throw new LLMError("OPENROUTER_API_KEY is required", "config_missing_api_key");
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL ?? env.OPENROUTER_BASE_URL,
      defaultHeaders: {
        "X-Title": "fin-profiler",
      },
    });
    this.model = options.model ?? env.OPENROUTER_MODEL;
  }

  async complete(prompt: LLMPrompt, options?: LLMCallOptions): Promise<LLMCompletion> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const temperature = options?.temperature ?? DEFAULT_TEMPERATURE;
    const maxTokens = options?.maxTokens ?? DEFAULT_MAX_TOKENS;

    return retryWithBackoff(
      () => this.makeRequest(prompt, temperature, maxTokens, timeoutMs),
      {
        maxAttempts: 3,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        jitterMs: 500,
        shouldRetry: isRetryable,
      },
      "llm_complete"
    );
  }

  private async makeRequest(
    prompt: LLMPrompt,
    temperature: number,
    maxTokens: number,
    timeoutMs: number
  ): Promise<LLMCompletion> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          temperature,
          max_tokens: maxTokens,
        },
        {
          signal: controller.signal,
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError("No content in response", "empty_response");
      }

      return {
        text: content,
        model: response.model || this.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      if (error instanceof LLMError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new LLMError("Request timed out", "timeout");
      }
      if (error instanceof OpenAI.APIError) {
        logger.error({ status: error.status, message: error.message }, "OpenRouter API error");
        throw new LLMError(`OpenRouter API error: ${error.status}`, `api_error_${error.status}`);
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new LLMError(`Request failed: ${message}`, "request_failed");
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
