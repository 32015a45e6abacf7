import { z } from "zod";
import type { CrowdPreference } from "./scoringPolicy";

export const RAIN_TOLERANCES = ["low", "medium", "high"] as const;
export type RainTolerance = (typeof RAIN_TOLERANCES)[number];

export const CROWD_PREFERENCES = ["off_peak", "shoulder", "any"] as const satisfies readonly CrowdPreference[];

export type DestinationPreferences = {
  travelMonth: number;
  tempMin?: number;
  tempMax?: number;
  rainTolerance: RainTolerance;
  crowdPreference: CrowdPreference;
  environmentTags: string[];
  excludeRegions: string[];
  numResults?: number;
};

export const SearchDestinationsInputSchema = z.object({
  travel_month: z.number().int().min(1).max(12),
  temp_min: z.number().nullish(),
  temp_max: z.number().nullish(),
  rain_tolerance: z.string().nullish(),
  crowd_preference: z.string(),
  environment_tags: z.array(z.string()).nullish(),
  exclude_regions: z.array(z.string()).nullish(),
  num_results: z.number().int().min(1).max(10).nullish()
});
export type SearchDestinationsInput = z.infer<typeof SearchDestinationsInputSchema>;

export function toDestinationPreferences(input: SearchDestinationsInput): DestinationPreferences {
  return {
    travelMonth: input.travel_month,
    tempMin: input.temp_min ?? undefined,
    tempMax: input.temp_max ?? undefined,
    rainTolerance: normalizeRainTolerance(input.rain_tolerance),
    crowdPreference: normalizeCrowdPreference(input.crowd_preference),
    environmentTags: input.environment_tags ?? [],
    excludeRegions: input.exclude_regions ?? [],
    numResults: input.num_results ?? undefined
  };
}

export function normalizeRainTolerance(value: string | null | undefined): RainTolerance {
  const normalized = value?.trim().toLowerCase();
  return RAIN_TOLERANCES.find((tolerance) => tolerance === normalized) ?? "medium";
}

export function normalizeCrowdPreference(value: string | null | undefined): CrowdPreference {
  const normalized = value?.trim().toLowerCase();
  return CROWD_PREFERENCES.find((preference) => preference === normalized) ?? "any";
}
