import { nanoid } from "nanoid";
import { appConfig } from "../config/appConfig";
import type { City } from "../core/cities";
import { runAgentGraph } from "../graph/agentGraph";
import type { LLMClient } from "../llm/client";
import { buildSystemPrompt } from "../llm/prompts";
import type { ChatMessage } from "../llm/types";
import { createToolbox } from "../tools";

export type ChatSession = {
  id: string;
  createdAt: string;
  history: ChatMessage[];
};

export type ChatTurnResult = {
  session: ChatSession;
  reply: string;
  newMessages: ChatMessage[];
};

export type ChatEngineDeps = {
  llm: LLMClient;
  catalog: readonly City[];
  now?: Date;
  maxIterations?: number;
  historyLimit?: number;
};

export function createSession(): ChatSession {
  return {
    id: nanoid(),
    createdAt: new Date().toISOString(),
    history: []
  };
}

export async function handleUserMessage(
  session: ChatSession,
  message: string,
  deps: ChatEngineDeps
): Promise<ChatTurnResult> {
  const now = deps.now ?? new Date();
  const previous = trimHistory(session.history, deps.historyLimit ?? appConfig.chatHistoryLimit);
  const userMessage: ChatMessage = { role: "user", content: message };

  const result = await runAgentGraph(
    deps.llm,
    {
      systemPrompt: buildSystemPrompt(deps.catalog.length, now),
      toolbox: createToolbox(deps.catalog, now),
      maxIterations: deps.maxIterations ?? appConfig.agentMaxIterations
    },
    { messages: [...previous, userMessage] }
  );

  const newMessages = result.messages.slice(previous.length);
  session.history = result.messages;
  return { session, reply: result.reply, newMessages };
}

export function trimHistory(history: ChatMessage[], limit: number): ChatMessage[] {
  if (history.length <= limit) return history;
  const start = history.findIndex((message, index) => index >= history.length - limit && message.role === "user");
  return start === -1 ? [] : history.slice(start);
}
