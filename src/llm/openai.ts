import { z } from "zod";
import {
  type CompletionInput,
  type CompletionResult,
  type LLMClient,
  LLMProviderError,
  type ToolDefinition
} from "./client";
import { llmMaxTokens, llmTemperature, openaiApiKey, openaiBaseUrl, openaiModelName, openaiTimeoutMs } from "./config";
import { parseToolArguments } from "./toolArguments";
import type { ChatMessage } from "./types";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([z.string(), z.array(z.object({ text: z.string().optional() }).passthrough())]).nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() })
              })
            )
            .nullish()
        })
      })
    )
    .min(1)
});

function toOpenAIMessages(systemPrompt: string, messages: ChatMessage[]) {
  const mapped = messages.map((message) => {
    switch (message.role) {
      case "assistant":
        return {
          role: "assistant",
          content: message.content,
          ...(message.toolCalls?.length
            ? {
                tool_calls: message.toolCalls.map((call) => ({
                  id: call.id,
                  type: "function",
                  function: { name: call.name, arguments: JSON.stringify(call.arguments) }
                }))
              }
            : {})
        };
      case "tool":
        return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
      default:
        return { role: message.role, content: message.content };
    }
  });
  return [{ role: "system", content: systemPrompt }, ...mapped];
}

function toOpenAITools(tools: ToolDefinition[]) {
  return tools.map((tool) => ({
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  }));
}

export class OpenAILLMClient implements LLMClient {
  constructor(
    private readonly apiKey: string = openaiApiKey,
    private readonly model: string = openaiModelName
  ) {}

  async complete(input: CompletionInput): Promise<CompletionResult> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: toOpenAIMessages(input.systemPrompt, input.messages),
      max_completion_tokens: llmMaxTokens
    };
    if (input.tools.length > 0) {
      body.tools = toOpenAITools(input.tools);
      body.tool_choice = "auto";
    }
    if (supportsCustomTemperature(this.model)) {
      body.temperature = llmTemperature;
    }

    let response: Response;
    try {
      response = await this.postChatCompletion(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LLMProviderError("openai", message);
    }
    if (!response.ok) {
      const errorText = await safeReadText(response);
      throw new LLMProviderError("openai", errorText.slice(0, 500) || response.statusText, response.status);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LLMProviderError("openai", "Unexpected chat completion payload.");
    }
    const message = parsed.data.choices[0].message;
    const content = message.content;
    const text =
      typeof content === "string"
        ? content
        : Array.isArray(content)
          ? content.map((part) => part.text ?? "").join("")
          : "";

    return {
      content: text,
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: parseToolArguments(call.function.arguments, "openai")
      }))
    };
  }

  private postChatCompletion(body: Record<string, unknown>): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), openaiTimeoutMs);
    return fetch(`${openaiBaseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(body),
      signal: controller.signal
    }).finally(() => clearTimeout(timeout));
  }
}

async function safeReadText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "<failed to read body>";
  }
}

function supportsCustomTemperature(model: string): boolean {
  // Reasoning models only accept the default temperature.
  return !/^(gpt-5|o\d)/i.test(model.trim());
}
