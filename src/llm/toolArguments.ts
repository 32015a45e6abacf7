import { z } from "zod";

const ArgumentsSchema = z.record(z.unknown());

export function parseToolArguments(raw: unknown, provider: string): Record<string, unknown> {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = raw.trim() ? JSON.parse(raw) : {};
    } catch (error) {
      console.warn(`[${provider}] tool arguments are not valid JSON:`, error);
      return {};
    }
  }
  const parsed = ArgumentsSchema.safeParse(value);
  if (!parsed.success) {
    console.warn(`[${provider}] tool arguments are not an object.`);
    return {};
  }
  return parsed.data;
}
