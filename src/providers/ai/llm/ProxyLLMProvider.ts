/**
 * Proxy LLM Provider
 *
 * Chat completions against an OpenAI-compatible proxy endpoint. Only the base
 * URL and default model differ from a plain OpenAI client.
 */

import { OpenAI } from 'openai';
import type { ILLMProvider, ChatMessage, ChatOptions } from '../ILLMProvider';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'ProxyLLMProvider' });

export const DEFAULT_PROXY_MODEL = 'llama-3.1-70B';
export const DEFAULT_PROXY_BASE_URL = 'http://ncompass.tech';

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the OpenAI client this provider calls
 */
export interface ChatCompletionClient {
  create(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

export interface ProxyLLMProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  client?: ChatCompletionClient;
}

export class ProxyLLMProvider implements ILLMProvider {
  readonly name = 'llm-proxy';
  readonly baseUrl: string;
  readonly defaultModel: string;
  private client: ChatCompletionClient;

  constructor(options: ProxyLLMProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_PROXY_BASE_URL;
    this.defaultModel = options.model ?? DEFAULT_PROXY_MODEL;
    this.client = options.client ?? this.createOpenAIClient(options.apiKey ?? '');
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    const allMessages: ChatMessage[] = options?.systemPrompt
      ? [{ role: 'system', content: options.systemPrompt }, ...messages]
      : messages;

    try {
      const response = await this.client.create({
        model: options?.model ?? this.defaultModel,
        messages: allMessages,
        temperature: options?.temperature ?? 0.7,
        max_tokens: options?.maxTokens ?? 150
      });

      return response.choices[0]?.message.content ?? '';
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : error, baseUrl: this.baseUrl }, 'Proxy chat completion failed');
      throw new Error(`LLM proxy chat failed: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error
      });
    }
  }

  private createOpenAIClient(apiKey: string): ChatCompletionClient {
    const openai = new OpenAI({ apiKey, baseURL: this.baseUrl });
    return {
      create: (request) => openai.chat.completions.create(request)
    };
  }
}
