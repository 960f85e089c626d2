import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { LLMConfig } from './config';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string | null;
  finishReason: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * The single request/response completion call the answer stage depends on.
 * Tests provide their own implementation.
 */
export interface ChatModel {
  chat(
    messages: LLMMessage[],
    options?: { maxTokens?: number; temperature?: number }
  ): Promise<LLMResponse>;
}

function toMessageParam(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * LLM Client for OpenAI-compatible APIs (OpenAI, DeepSeek, local gateways)
 */
export class LLMClient implements ChatModel {
  private client: OpenAI;

  constructor(private config: LLMConfig, apiKey: string) {
    this.client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
    });
  }

  /**
   * Non-streaming chat completion
   */
  async chat(
    messages: LLMMessage[],
    options?: { maxTokens?: number; temperature?: number }
  ): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages: messages.map(toMessageParam),
      max_tokens: options?.maxTokens ?? this.config.maxTokens,
      temperature: options?.temperature ?? this.config.temperature,
      stream: false,
    });

    const choice = response.choices[0];
    if (!choice) {
      return { content: null, finishReason: 'empty' };
    }

    return {
      content: choice.message.content,
      finishReason: choice.finish_reason,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }
}

/**
 * Build the configured client, or null when LLM_API_KEY is absent.
 * A null model puts the answer stage into its deterministic fallback mode.
 */
export function createLLMClient(config: LLMConfig, apiKey = process.env.LLM_API_KEY): LLMClient | null {
  if (!apiKey) {
    return null;
  }
  return new LLMClient(config, apiKey);
}
