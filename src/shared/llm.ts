// Shared LLM interface for the refinement stages

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { createLLMError, createRateLimitError, createTimeoutError, createTransportError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger('LLM');

export const DEFAULT_TIMEOUT_MS = 60_000;

const CONNECTION_FAILURE = /ECONNREFUSED|ECONNRESET|ENOTFOUND|ETIMEDOUT|fetch failed|Cannot connect/i;

export interface LLMConfig {
  provider: 'openai' | 'anthropic';
  model: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

export interface CompletionRequest {
  // Which stage is calling; used for logging only
  label: string;
  systemPrompt: string;
  prompt: string;
  temperature?: number;
}

// The one capability the workflow needs from a model: prompt in, text out.
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

export class LLMClient implements TextGenerator {
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  private getModel() {
    if (this.config.provider === 'anthropic') {
      return anthropic(this.config.model);
    }
    return openai(this.config.model);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const apiKey = this.config.provider === 'anthropic'
      ? process.env.ANTHROPIC_API_KEY
      : process.env.OPENAI_API_KEY;

    if (!apiKey) {
      throw createLLMError(`${this.config.provider} API key not configured`);
    }

    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const startedAt = Date.now();

    try {
      // Retries are the workflow controller's decision, never the SDK's
      const result = await generateText({
        model: this.getModel(),
        system: request.systemPrompt,
        prompt: request.prompt,
        temperature: request.temperature ?? this.config.temperature,
        maxOutputTokens: this.config.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs)
      });

      log.debug(`${request.label} completed in ${Date.now() - startedAt}ms (${result.text.length} chars)`);
      return result.text;
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'TimeoutError' || error.name === 'AbortError') {
          throw createTimeoutError(this.config.provider, timeoutMs);
        }
        if (error.message.includes('API key')) {
          throw createLLMError('API key is invalid or missing');
        }
        if (error.message.toLowerCase().includes('rate limit')) {
          throw createRateLimitError(this.config.provider);
        }
        if (CONNECTION_FAILURE.test(error.message)) {
          throw createTransportError(this.config.provider, error.message);
        }
      }
      throw createLLMError(error instanceof Error ? error.message : 'Unknown LLM error');
    }
  }
}
