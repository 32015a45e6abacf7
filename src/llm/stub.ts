import { nanoid } from "nanoid";
import { currentMonth, nextMonth } from "../core/months";
import { ENVIRONMENT_TAGS, SEARCH_DESTINATIONS_TOOL } from "../tools/searchDestinations";
import type { CompletionInput, CompletionResult, LLMClient } from "./client";

export const STUB_CLARIFYING_QUESTION =
  "Which month are you planning to travel, and do you have a temperature or crowd preference?";

const MONTH_PATTERNS: Array<[RegExp, number]> = [
  [/\bjan(uary)?\b/, 1],
  [/\bfeb(ruary)?\b/, 2],
  [/\bmar(ch)?\b/, 3],
  [/\bapr(il)?\b/, 4],
  [/\bmay\b/, 5],
  [/\bjune?\b/, 6],
  [/\bjuly?\b/, 7],
  [/\baug(ust)?\b/, 8],
  [/\bsep(t|tember)?\b/, 9],
  [/\boct(ober)?\b/, 10],
  [/\bnov(ember)?\b/, 11],
  [/\bdec(ember)?\b/, 12]
];

const TEMPERATURE_WORDS: Array<[string, number, number]> = [
  ["hot", 28, 38],
  ["warm", 22, 30],
  ["mild", 15, 24],
  ["cool", 8, 18],
  ["cold", 0, 12]
];

export class StubLLMClient implements LLMClient {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async complete(input: CompletionInput): Promise<CompletionResult> {
    const last = input.messages[input.messages.length - 1];
    if (!last) return { content: STUB_CLARIFYING_QUESTION, toolCalls: [] };

    if (last.role === "tool") {
      return { content: summarizeReport(last.content), toolCalls: [] };
    }

    const canSearch = input.tools.some((tool) => tool.name === SEARCH_DESTINATIONS_TOOL);
    if (last.role !== "user" || !canSearch) {
      return { content: STUB_CLARIFYING_QUESTION, toolCalls: [] };
    }

    const args = inferSearchArguments(last.content, this.now());
    if (!args) return { content: STUB_CLARIFYING_QUESTION, toolCalls: [] };
    return {
      content: "",
      toolCalls: [{ id: `call_${nanoid(9)}`, name: SEARCH_DESTINATIONS_TOOL, arguments: args }]
    };
  }
}

export function inferSearchArguments(message: string, now: Date): Record<string, unknown> | null {
  const text = message.toLowerCase();
  const args: Record<string, unknown> = {};

  const month = inferMonth(text, now);
  const tags = ENVIRONMENT_TAGS.filter((tag) => new RegExp(`\\b${tag}`).test(text));
  const temperature = TEMPERATURE_WORDS.find(([word]) => new RegExp(`\\b${word}\\b`).test(text));

  if (month === null && tags.length === 0 && !temperature) return null;

  args.travel_month = month ?? currentMonth(now);
  args.crowd_preference = /off[- ]?(peak|season)|low crowds?|avoid(ing)? crowds|quiet/.test(text)
    ? "off_peak"
    : /shoulder/.test(text)
      ? "shoulder"
      : "any";

  if (temperature) {
    args.temp_min = temperature[1];
    args.temp_max = temperature[2];
  }
  if (/\bdry\b|little rain|no rain/.test(text)) {
    args.rain_tolerance = "low";
  } else if (/rain (is )?(fine|ok)|don'?t mind (the )?rain/.test(text)) {
    args.rain_tolerance = "high";
  }
  if (tags.length > 0) args.environment_tags = [...tags];

  const exclusions = [...text.matchAll(/\b(?:not|except|outside(?: of)?|i'?m in)\s+([a-z][a-z ]*?)(?=[,.!?;]|$)/g)]
    .map((match) => match[1].trim())
    .filter((term) => term.length > 0);
  if (exclusions.length > 0) args.exclude_regions = exclusions;

  const count = text.match(/\b(?:top|best)\s+(\d{1,2})\b/);
  if (count) args.num_results = Math.min(10, Math.max(1, Number(count[1])));

  return args;
}

function inferMonth(text: string, now: Date): number | null {
  if (/next month/.test(text)) return nextMonth(now);
  if (/this month|right now/.test(text)) return currentMonth(now);
  const match = MONTH_PATTERNS.find(([pattern]) => pattern.test(text));
  return match ? match[1] : null;
}

function summarizeReport(report: string): string {
  if (report.startsWith("[No destinations")) {
    return "Nothing in the dataset fits those preferences for that month. Try widening the temperature range or dropping an exclusion.";
  }
  if (report.startsWith("[Invalid") || report.startsWith("[Unknown")) {
    return STUB_CLARIFYING_QUESTION;
  }

  const lines = report.split("\n");
  const picks: string[] = [];
  lines.forEach((line, index) => {
    const heading = line.match(/^\d+\. (.+?)  \[Score: /);
    const details = lines[index + 1]?.match(/Avg temp: (.+?)°C .*Status: (.+)$/);
    if (heading && details && picks.length < 5) {
      picks.push(`**${heading[1]}** - ${details[1]}°C avg, ${details[2]}`);
    }
  });
  return picks.length > 0 ? `Here is what the climate data shows:\n${picks.join("\n")}` : STUB_CLARIFYING_QUESTION;
}
