import dotenv from "dotenv";

dotenv.config();

export type LLMProfile = "mistral" | "openai" | "stub";

const LLM_PROFILES: readonly LLMProfile[] = ["mistral", "openai", "stub"];

export const llmProfile: LLMProfile = parseProfile(process.env.LLM_PROFILE);

export const mistralApiKey = process.env.MISTRAL_API_KEY ?? "";
export const openaiApiKey = process.env.OPENAI_API_KEY ?? "";

export const mistralModelName = process.env.MISTRAL_MODEL ?? "mistral-large-latest";
export const openaiModelName = process.env.OPENAI_MODEL ?? "gpt-4o";
export const openaiBaseUrl = process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1";
export const openaiTimeoutMs = Number(process.env.OPENAI_HTTP_TIMEOUT_MS ?? 45000);

export const llmTemperature = Number(process.env.LLM_TEMPERATURE ?? 0.3);
export const llmMaxTokens = Number(process.env.LLM_MAX_TOKENS ?? 2048);

function parseProfile(raw: string | undefined): LLMProfile {
  const value = raw?.trim().toLowerCase();
  if (!value) return "mistral";
  const profile = LLM_PROFILES.find((candidate) => candidate === value);
  if (!profile) {
    throw new Error(`Unknown LLM_PROFILE "${raw}". Use one of: ${LLM_PROFILES.join(", ")}.`);
  }
  return profile;
}

export function assertLLMConfig(profile: LLMProfile = llmProfile): void {
  if (profile === "mistral" && !mistralApiKey) {
    throw new Error("Missing MISTRAL_API_KEY. Set it in .env.");
  }
  if (profile === "openai" && !openaiApiKey) {
    throw new Error("Missing OPENAI_API_KEY. Set it in .env.");
  }
}
