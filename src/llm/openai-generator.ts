import OpenAI from "openai";
import type { LlmConfig } from "../core/config.js";
import { RateLimiter } from "../core/rate-limiter.js";
import { logDebug, logWarn } from "../core/logging.js";
import type { CompletionRequest, TextGenerator } from "./text-generator.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionParams {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

/** Sends one chat completion and returns the reply text (null when empty). */
export type ChatTransport = (
  params: ChatCompletionParams,
) => Promise<string | null>;

/**
 * The SDK client is created on first use: the constructor throws without an
 * API key, and the server should still start (matching needs no model).
 */
export function openAiTransport(config: LlmConfig): ChatTransport {
  let client: OpenAI | null = null;

  return async (params) => {
    if (!client) {
      client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: config.maxRetries,
        timeout: config.timeoutMs,
      });
    }
    const response = await client.chat.completions.create(params);
    return response.choices[0]?.message?.content ?? null;
  };
}

/**
 * TextGenerator backed by any OpenAI-compatible chat completions endpoint.
 * Calls are serialized through a RateLimiter; transient HTTP failures are
 * retried by the SDK itself (`maxRetries`).
 */
export class OpenAiTextGenerator implements TextGenerator {
  private config: LlmConfig;
  private transport: ChatTransport;
  private rateLimiter: RateLimiter;

  constructor(config: LlmConfig, transport?: ChatTransport) {
    this.config = config;
    this.transport = transport ?? openAiTransport(config);
    this.rateLimiter = new RateLimiter(config.rateLimitMs);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: ChatMessage[] = [
      { role: "system", content: request.systemPrompt },
    ];

    const window = this.config.historyWindow;
    const history = window > 0 ? (request.history ?? []).slice(-window) : [];
    for (const turn of history) {
      messages.push({ role: turn.role, content: turn.content });
    }
    messages.push({ role: "user", content: request.userMessage });

    const params: ChatCompletionParams = {
      model: this.config.model,
      messages,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };

    const content = await this.rateLimiter.schedule(() =>
      this.transport(params),
    );
    if (!content) {
      logWarn(`Text generation returned an empty reply (model ${params.model})`);
      return "";
    }
    logDebug(`Text generation: ${messages.length} messages -> ${content.length} chars`);
    return content;
  }
}
