export interface LLMCallOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface LLMPrompt {
  system: string;
  user: string;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletion {
  text: string;
  model: string;
  usage?: LLMUsage;
}

/** Raw text completion. Parsing and validation of the text belong to the caller. */
export interface LLMClient {
  complete(prompt: LLMPrompt, options?: LLMCallOptions): Promise<LLMCompletion>;
}
