/**
 * LLM Provider Interface
 *
 * Abstraction for chat completion services
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  model?: string;
}

export interface ILLMProvider {
  /**
   * Provider name for logging/debugging
   */
  readonly name: string;

  /**
   * Generate a chat completion
   * @param messages - Conversation history
   * @returns Generated response text
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}
