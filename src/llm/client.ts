import type { ChatMessage, ToolCall } from "./types";

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type CompletionInput = {
  systemPrompt: string;
  messages: ChatMessage[];
  tools: ToolDefinition[];
};

export type CompletionResult = {
  content: string;
  toolCalls: ToolCall[];
};

export type LLMClient = {
  complete(input: CompletionInput): Promise<CompletionResult>;
};

export class LLMProviderError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(provider: string, message: string, status: number | null = null) {
    super(message);
    this.name = "LLMProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export function describeProviderError(error: LLMProviderError): string {
  return error.status !== null
    ? `[API error ${error.status}: ${error.message}]`
    : "[Connection error: check your internet and try again.]";
}
