import type { City } from "../core/cities";
import { rankDestinations } from "../core/destinationRanking";
import { InvalidArgumentError } from "../core/errors";
import { currentMonth, monthName, nextMonth } from "../core/months";
import { SearchDestinationsInputSchema, toDestinationPreferences } from "../core/preferences";
import { formatRankedDestinations } from "../core/resultFormatter";
import type { ToolDefinition } from "../llm/client";

export const SEARCH_DESTINATIONS_TOOL = "search_destinations";

export const ENVIRONMENT_TAGS = [
  "beach",
  "city",
  "mountain",
  "island",
  "tropical",
  "cultural",
  "ski",
  "nature",
  "desert",
  "coastal",
  "history",
  "food",
  "adventure",
  "diving",
  "romantic"
] as const;

export function buildSearchDestinationsTool(now: Date = new Date()): ToolDefinition {
  const thisMonth = currentMonth(now);
  return {
    name: SEARCH_DESTINATIONS_TOOL,
    description:
      "Search and rank global destinations from the climate dataset based on the user's travel timing preferences. " +
      "Always call this tool before recommending destinations; never rely on general knowledge alone.",
    parameters: {
      type: "object",
      properties: {
        travel_month: {
          type: "integer",
          description:
            `Month of intended travel (1-12). Default to the current month (${thisMonth}) if not specified. ` +
            `If the user says 'next month', use ${nextMonth(now)}.`,
          minimum: 1,
          maximum: 12
        },
        temp_min: {
          type: "number",
          description:
            "Minimum preferred temperature in °C. Infer from descriptors: 'hot'->28, 'warm'->22, 'mild'->15, " +
            "'cool'->8, 'cold'->0. Omit if no temperature preference."
        },
        temp_max: {
          type: "number",
          description:
            "Maximum preferred temperature in °C. Infer from descriptors: 'hot'->38, 'warm'->30, 'mild'->24, " +
            "'cool'->18, 'cold'->12. Omit if no temperature preference."
        },
        rain_tolerance: {
          type: "string",
          enum: ["low", "medium", "high"],
          description:
            "low = dry conditions preferred (under ~30mm/month); medium = moderate rain OK; " +
            "high = rain is not a concern. Default: medium."
        },
        crowd_preference: {
          type: "string",
          enum: ["off_peak", "shoulder", "any"],
          description:
            "off_peak = strongly avoid crowds/peak season; shoulder = moderate tourist traffic acceptable; " +
            "any = no crowd preference."
        },
        environment_tags: {
          type: "array",
          items: { type: "string" },
          description: `Preferred environment types from: ${ENVIRONMENT_TAGS.join(", ")}. Omit for no preference.`
        },
        exclude_regions: {
          type: "array",
          items: { type: "string" },
          description:
            "Regions or countries to exclude (e.g. ['Europe'] if the user is already there, " +
            "or ['United Arab Emirates'] if the user is in Dubai). Omit if no exclusions are needed."
        },
        num_results: {
          type: "integer",
          description: "Number of top destinations to return (default 5, max 10).",
          minimum: 1,
          maximum: 10
        }
      },
      required: ["travel_month", "crowd_preference"]
    }
  };
}

export function executeSearchDestinations(args: unknown, catalog: readonly City[]): string {
  const parsed = SearchDestinationsInputSchema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"} ${issue.message}`);
    return `[Invalid ${SEARCH_DESTINATIONS_TOOL} input: ${issues.join("; ")}]`;
  }

  const preferences = toDestinationPreferences(parsed.data);
  try {
    const ranked = rankDestinations(catalog, preferences);
    return formatRankedDestinations(ranked, monthName(preferences.travelMonth));
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return `[Invalid ${SEARCH_DESTINATIONS_TOOL} input: ${error.message}]`;
    }
    throw error;
  }
}
