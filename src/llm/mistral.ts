import { Mistral } from "@mistralai/mistralai";
import { nanoid } from "nanoid";
import {
  type CompletionInput,
  type CompletionResult,
  type LLMClient,
  LLMProviderError,
  type ToolDefinition
} from "./client";
import { llmMaxTokens, llmTemperature, mistralApiKey, mistralModelName } from "./config";
import { parseToolArguments } from "./toolArguments";
import type { ChatMessage, ToolCall } from "./types";

function toMistralMessages(systemPrompt: string, messages: ChatMessage[]) {
  const mapped = messages.map((message) => {
    switch (message.role) {
      case "system":
        return { role: "system" as const, content: message.content };
      case "user":
        return { role: "user" as const, content: message.content };
      case "assistant":
        return {
          role: "assistant" as const,
          content: message.content,
          toolCalls: message.toolCalls?.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) }
          }))
        };
      case "tool":
        return {
          role: "tool" as const,
          content: message.content,
          toolCallId: message.toolCallId,
          name: message.name
        };
    }
  });
  return [{ role: "system" as const, content: systemPrompt }, ...mapped];
}

function toMistralTools(tools: ToolDefinition[]) {
  return tools.map((tool) => ({
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  }));
}

export class MistralLLMClient implements LLMClient {
  private mistral: Mistral;

  constructor(
    apiKey = mistralApiKey,
    private readonly model: string = mistralModelName
  ) {
    this.mistral = new Mistral({ apiKey });
  }

  async complete(input: CompletionInput): Promise<CompletionResult> {
    let response: Awaited<ReturnType<Mistral["chat"]["complete"]>>;
    try {
      response = await this.mistral.chat.complete({
        model: this.model,
        messages: toMistralMessages(input.systemPrompt, input.messages),
        tools: input.tools.length > 0 ? toMistralTools(input.tools) : undefined,
        toolChoice: input.tools.length > 0 ? "auto" : undefined,
        temperature: llmTemperature,
        maxTokens: llmMaxTokens
      });
    } catch (error) {
      throw toProviderError(error);
    }

    const message = response.choices?.[0]?.message;
    if (!message) {
      throw new LLMProviderError("mistral", "Response contained no choices.");
    }

    const toolCalls: ToolCall[] = (message.toolCalls ?? []).map((call) => ({
      id: call.id ?? `call_${nanoid(9)}`,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments, "mistral")
    }));

    return { content: extractText(message.content), toolCalls };
  }
}

function extractText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content
    .map((chunk: unknown) =>
      typeof chunk === "object" && chunk !== null && "text" in chunk && typeof chunk.text === "string"
        ? chunk.text
        : ""
    )
    .join("");
}

function toProviderError(error: unknown): LLMProviderError {
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return new LLMProviderError("mistral", error.message, error.statusCode);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LLMProviderError("mistral", message);
}
