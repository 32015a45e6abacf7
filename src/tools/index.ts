import type { City } from "../core/cities";
import type { ToolDefinition } from "../llm/client";
import type { ToolCall } from "../llm/types";
import { buildSearchDestinationsTool, executeSearchDestinations, SEARCH_DESTINATIONS_TOOL } from "./searchDestinations";

export type Toolbox = {
  definitions: ToolDefinition[];
  execute(call: ToolCall): string;
};

export function createToolbox(catalog: readonly City[], now: Date = new Date()): Toolbox {
  return {
    definitions: [buildSearchDestinationsTool(now)],
    execute(call) {
      if (call.name === SEARCH_DESTINATIONS_TOOL) {
        return executeSearchDestinations(call.arguments, catalog);
      }
      return `[Unknown tool: ${call.name}]`;
    }
  };
}
