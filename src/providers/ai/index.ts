export type { ILLMProvider, ChatMessage, ChatOptions } from './ILLMProvider';
export { ProxyLLMProvider, DEFAULT_PROXY_BASE_URL, DEFAULT_PROXY_MODEL } from './llm/ProxyLLMProvider';
export type {
  ProxyLLMProviderOptions,
  ChatCompletionClient,
  ChatCompletionRequest,
  ChatCompletionResult
} from './llm/ProxyLLMProvider';
