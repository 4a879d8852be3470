import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import { logger } from "../logger";
import { ExhaustedRetriesError, ExtractionCallError, RateLimitedError } from "../errors";
import { parseRetryAfter } from "../connectors/base";
import { exponentialBackoff, retryLogLine, withRetry, type RetryPolicy } from "../workers/retry";
import type { EnvConfig } from "../config";

/** One system + user prompt in, raw model text out. */
export interface ExtractionClient {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ChatCompletionsOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
  dispatcher?: Dispatcher;
  /** Attempts per call while the endpoint answers 429. Defaults to 5. */
  rateLimitAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .nullish(),
});

/** Any OpenAI-compatible chat completions endpoint, JSON response format. */
export class ChatCompletionsClient implements ExtractionClient {
  constructor(private readonly options: ChatCompletionsOptions) {}

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const { apiKey, model } = this.options;

    if (!apiKey) {
      throw new ExtractionCallError("LLM_API_KEY is not configured");
    }

    const policy: RetryPolicy = {
      maxAttempts: this.options.rateLimitAttempts ?? 5,
      delayMs: exponentialBackoff(2, {
        random: this.options.random,
        serverDelayMs: (error) => (error instanceof RateLimitedError ? error.retryAfterMs : null),
      }),
      isRetryable: (error) => error instanceof RateLimitedError,
    };

    try {
      return await withRetry(policy, () => this.request(systemPrompt, userPrompt), {
        sleep: this.options.sleep,
        onRetry: (attempt, error, delayMs) =>
          logger.warn(`AI: ${model} ${retryLogLine(attempt, policy.maxAttempts, error, delayMs)}`),
      });
    } catch (error) {
      if (error instanceof ExhaustedRetriesError) {
        throw new ExtractionCallError(
          `${model} rate limited after ${error.attempts} attempt(s)`,
          429,
        );
      }
      throw error;
    }
  }

  private async request(systemPrompt: string, userPrompt: string): Promise<string> {
    const { apiUrl, apiKey, model, timeoutMs } = this.options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const startTime = Date.now();

    try {
      logger.debug(`AI: calling ${model}...`);

      const response = await fetch(apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          max_tokens: this.options.maxTokens ?? 8192,
          temperature: 0.1,
          response_format: { type: "json_object" },
        }),
        signal: controller.signal,
        dispatcher: this.options.dispatcher,
      });

      if (response.status === 429) {
        await response.body?.cancel();
        throw new RateLimitedError(apiUrl, parseRetryAfter(response.headers.get("Retry-After")));
      }

      if (!response.ok) {
        const errorText = await response.text();
        throw new ExtractionCallError(
          `${model} returned ${response.status}: ${errorText.substring(0, 200)}`,
          response.status,
        );
      }

      const parsed = chatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ExtractionCallError(`${model} returned an unexpected body`);
      }

      const body = parsed.data;
      const content = body.choices[0]?.message?.content;
      if (!content) {
        throw new ExtractionCallError(`${model} returned empty content`);
      }

      logger.info(
        `AI: ${model} responded in ${Date.now() - startTime}ms ` +
          `(${body.usage?.prompt_tokens ?? 0} prompt + ${body.usage?.completion_tokens ?? 0} completion tokens)`,
      );

      return content;
    } catch (error) {
      if (error instanceof ExtractionCallError || error instanceof RateLimitedError) throw error;
      const isAbort = error instanceof Error && error.name === "AbortError";
      throw new ExtractionCallError(
        isAbort
          ? `${model} timed out after ${timeoutMs}ms`
          : `${model} request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createExtractionClient(env: EnvConfig): ExtractionClient {
  return new ChatCompletionsClient({
    apiUrl: env.llmApiUrl,
    apiKey: env.llmApiKey,
    model: env.llmModel,
    timeoutMs: env.llmTimeoutMs,
  });
}

export { SYSTEM_PROMPT, buildExtractionPrompt, parseExtractionResponse } from "./prompt";
