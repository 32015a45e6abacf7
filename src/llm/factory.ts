import type { LLMClient } from "./client";
import { assertLLMConfig, type LLMProfile } from "./config";
import { MistralLLMClient } from "./mistral";
import { OpenAILLMClient } from "./openai";
import { StubLLMClient } from "./stub";

export function createLLMClientForProfile(profile: LLMProfile): LLMClient {
  if (profile === "stub") return new StubLLMClient();
  assertLLMConfig(profile);
  if (profile === "openai") return new OpenAILLMClient();
  return new MistralLLMClient();
}
