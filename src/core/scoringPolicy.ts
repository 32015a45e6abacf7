export type Season = "peak" | "shoulder" | "off";
export type CrowdPreference = "off_peak" | "shoulder" | "any";

export const NEUTRAL_SCORE = 0.65;

export const TEMPERATURE_POLICY = {
  openBoundSpanC: 10,
  inRangeFloor: 0.85,
  midpointPenalty: 0.15,
  minHalfRangeC: 1,
  minSigmaC: 3
} as const;

export const PRECIPITATION_POLICY = {
  saturationMm: 300,
  lowToleranceExponent: 0.6,
  highToleranceFloor: 0.5
} as const;

export const TAGLESS_CITY_SCORE = 0.2;

export const CROWD_SEASON_TABLE: Record<CrowdPreference, Record<Season, number>> = {
  off_peak: { off: 1, shoulder: 0.55, peak: 0.05 },
  shoulder: { off: 0.7, shoulder: 1, peak: 0.25 },
  any: { off: 0.85, shoulder: 1, peak: 0.75 }
};

export const SCORE_WEIGHTS = {
  temp: 0.4,
  rain: 0.3,
  crowd: 0.2,
  tags: 0.1
} as const;

export const DEFAULT_RESULT_COUNT = 8;

export function assertWeightTable(weights: Record<string, number> = SCORE_WEIGHTS): void {
  const total = Object.values(weights).reduce((sum, value) => sum + value, 0);
  if (Math.abs(total - 1) > 1e-9) {
    throw new Error(`Score weights must sum to 1.0 (got ${total}).`);
  }
}

assertWeightTable();
