import type { z } from 'zod';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';

/** Injection token for the chat completions resource of the OpenAI client. */
export const OPENAI_CHAT_COMPLETIONS = 'OPENAI_CHAT_COMPLETIONS';

export const DEFAULT_LLM_MODEL = 'gpt-4o';
export const DEFAULT_LLM_MAX_TOKENS = 4096;

/** The one SDK call this service makes; `openai.chat.completions` satisfies it. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface LlmImage {
  data: Buffer;
  mediaType: string;
}

export interface StructuredRequest<T> {
  systemPrompt: string;
  userText: string;
  images?: readonly LlmImage[];
  schema: z.ZodType<T>;
  /** Function name the model is forced to call; snake_case. */
  toolName: string;
  toolDescription?: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface TextRequest {
  systemPrompt: string;
  messages: readonly ConversationTurn[];
}
