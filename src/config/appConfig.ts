import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

dotenv.config();

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

function envNumber(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}").`);
  }
  return value;
}

export const appConfig = {
  port: envNumber("PORT", 5001),
  citiesDataPath: process.env.CITIES_DATA_PATH ?? path.join(repoRoot, "data", "cities.json"),
  agentMaxIterations: envNumber("AGENT_MAX_ITERATIONS", 6),
  chatHistoryLimit: envNumber("CHAT_HISTORY_LIMIT", 40)
};
