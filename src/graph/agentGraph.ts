import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { LLMClient } from "../llm/client";
import type { ChatMessage } from "../llm/types";
import type { Toolbox } from "../tools";

export const ITERATION_LIMIT_MESSAGE = "[Season Radar hit an iteration limit. Please try again.]";

const AgentStateDef = Annotation.Root({
  messages: Annotation<ChatMessage[]>({
    reducer: (prev, next) => [...prev, ...next],
    default: () => []
  }),
  iterations: Annotation<number>({
    reducer: (_prev, next) => next,
    default: () => 0
  }),
  reply: Annotation<string | null>({
    reducer: (_prev, next) => next,
    default: () => null
  })
});

type AgentState = typeof AgentStateDef.State;
type AgentUpdate = typeof AgentStateDef.Update;

export type AgentGraphOptions = {
  systemPrompt: string;
  toolbox: Toolbox;
  maxIterations: number;
};

export type RunAgentGraphInput = {
  messages: ChatMessage[];
};

export type RunAgentGraphOutput = {
  messages: ChatMessage[];
  reply: string;
  iterations: number;
};

export function buildAgentGraph(llm: LLMClient, options: AgentGraphOptions) {
  const graph = new StateGraph(AgentStateDef)
    .addNode("agent", async (state: AgentState): Promise<AgentUpdate> => {
      if (state.iterations >= options.maxIterations) {
        return {
          messages: [{ role: "assistant", content: ITERATION_LIMIT_MESSAGE }],
          reply: ITERATION_LIMIT_MESSAGE
        };
      }
      const completion = await llm.complete({
        systemPrompt: options.systemPrompt,
        messages: state.messages,
        tools: options.toolbox.definitions
      });
      const assistant: ChatMessage =
        completion.toolCalls.length > 0
          ? { role: "assistant", content: completion.content, toolCalls: completion.toolCalls }
          : { role: "assistant", content: completion.content };
      return {
        messages: [assistant],
        iterations: state.iterations + 1,
        reply: completion.toolCalls.length > 0 ? null : completion.content
      };
    })
    .addNode("tools", async (state: AgentState): Promise<AgentUpdate> => {
      const last = state.messages[state.messages.length - 1];
      if (!last || last.role !== "assistant" || !last.toolCalls) return {};
      const results = last.toolCalls.map((call): ChatMessage => ({
        role: "tool",
        toolCallId: call.id,
        name: call.name,
        content: options.toolbox.execute(call)
      }));
      return { messages: results };
    })
    .addEdge(START, "agent")
    .addConditionalEdges("agent", (state: AgentState) => (state.reply !== null ? END : "tools"))
    .addEdge("tools", "agent");

  return graph.compile();
}

export async function runAgentGraph(
  llm: LLMClient,
  options: AgentGraphOptions,
  input: RunAgentGraphInput
): Promise<RunAgentGraphOutput> {
  const app = buildAgentGraph(llm, options);
  const result = await app.invoke(
    { messages: input.messages, iterations: 0, reply: null },
    { recursionLimit: options.maxIterations * 2 + 3 }
  );
  return {
    messages: result.messages,
    reply: result.reply ?? ITERATION_LIMIT_MESSAGE,
    iterations: result.iterations
  };
}
