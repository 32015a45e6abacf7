import type { Season } from "./scoringPolicy";

export type SeasonLabel = "peak season" | "shoulder season" | "off season";

const SEASON_LABELS: Record<Season, SeasonLabel> = {
  peak: "peak season",
  shoulder: "shoulder season",
  off: "off season"
};

// Peak wins when a month sits in both sets.
export function classifySeason(
  month: number,
  peakMonths: readonly number[],
  shoulderMonths: readonly number[]
): Season {
  if (peakMonths.includes(month)) return "peak";
  if (shoulderMonths.includes(month)) return "shoulder";
  return "off";
}

export function seasonLabel(season: Season): SeasonLabel {
  return SEASON_LABELS[season];
}
