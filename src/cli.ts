import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { createSession, handleUserMessage } from "./conversations/engine";
import { describeProviderError, LLMProviderError } from "./llm/client";
import { getAppContainer } from "./runtime/appContainer";

const EXIT_WORDS = new Set(["quit", "exit", "q", "bye"]);
const RULE = "─".repeat(62);

function banner(cityCount: number): string {
  const line = "=".repeat(64);
  return [
    "",
    line,
    "         SEASON RADAR  --  Seasonal Travel Decision Engine",
    line,
    "",
    `Powered by climate data for ${cityCount} global destinations.`,
    "",
    "Try asking:",
    "  - Where is spring right now?",
    "  - Best beach destinations in April with low crowds",
    "  - I want warm weather, dry, shoulder season, not Europe",
    "  - Good places in October, mild with little rain?",
    "",
    "Type 'quit' or Ctrl+C to exit.",
    line
  ].join("\n");
}

async function main(): Promise<void> {
  const container = getAppContainer();
  const catalog = container.getCatalog();
  const llm = container.getLLMClient();
  const rl = readline.createInterface({ input, output });
  const session = createSession();

  console.log(banner(catalog.length));
  rl.on("SIGINT", () => rl.close());

  try {
    while (true) {
      let line: string;
      try {
        line = (await rl.question("You: ")).trim();
      } catch {
        break;
      }
      if (!line) continue;
      if (EXIT_WORDS.has(line.toLowerCase())) break;

      let reply: string;
      try {
        reply = (await handleUserMessage(session, line, { llm, catalog })).reply;
      } catch (error) {
        if (!(error instanceof LLMProviderError)) throw error;
        reply = describeProviderError(error);
      }
      console.log(`\nSeason Radar: ${reply}\n\n${RULE}\n`);
    }
  } finally {
    rl.close();
  }
  console.log("\nGoodbye! Safe travels.");
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
