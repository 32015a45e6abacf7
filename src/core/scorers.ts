import { classifySeason } from "./season";
import {
  CROWD_SEASON_TABLE,
  type CrowdPreference,
  NEUTRAL_SCORE,
  PRECIPITATION_POLICY,
  TAGLESS_CITY_SCORE,
  TEMPERATURE_POLICY
} from "./scoringPolicy";

export function scoreTemperature(cityTemp: number, tempMin?: number, tempMax?: number): number {
  if (tempMin === undefined && tempMax === undefined) return NEUTRAL_SCORE;

  const lowerInput = tempMin ?? cityTemp - TEMPERATURE_POLICY.openBoundSpanC;
  const upperInput = tempMax ?? cityTemp + TEMPERATURE_POLICY.openBoundSpanC;
  const lower = Math.min(lowerInput, upperInput);
  const upper = Math.max(lowerInput, upperInput);

  if (cityTemp >= lower && cityTemp <= upper) {
    const mid = (lower + upper) / 2;
    const halfRange = Math.max((upper - lower) / 2, TEMPERATURE_POLICY.minHalfRangeC);
    const closeness = 1 - (TEMPERATURE_POLICY.midpointPenalty * Math.abs(cityTemp - mid)) / halfRange;
    return round4(Math.max(TEMPERATURE_POLICY.inRangeFloor, closeness));
  }

  const gap = Math.max(lower - cityTemp, cityTemp - upper);
  const sigma = Math.max((upper - lower) / 2, TEMPERATURE_POLICY.minSigmaC);
  const score = Math.exp(-0.5 * (gap / sigma) ** 2);
  return round4(Math.max(0, score));
}

export function scorePrecipitation(precipMm: number, tolerance: string): number {
  const base = Math.max(0, 1 - precipMm / PRECIPITATION_POLICY.saturationMm);

  switch (tolerance) {
    case "low":
      return round4(base ** PRECIPITATION_POLICY.lowToleranceExponent);
    case "high":
      return round4(PRECIPITATION_POLICY.highToleranceFloor + base * (1 - PRECIPITATION_POLICY.highToleranceFloor));
    default:
      return round4(base);
  }
}

export function scoreCrowd(
  month: number,
  peakMonths: readonly number[],
  shoulderMonths: readonly number[],
  preference: string
): number {
  const season = classifySeason(month, peakMonths, shoulderMonths);
  const row = isCrowdPreference(preference) ? CROWD_SEASON_TABLE[preference] : CROWD_SEASON_TABLE.any;
  return row[season];
}

export function scoreTags(cityTags: readonly string[], preferredTags: readonly string[]): number {
  if (preferredTags.length === 0) return NEUTRAL_SCORE;
  if (cityTags.length === 0) return TAGLESS_CITY_SCORE;

  const cityLower = new Set(cityTags.map((tag) => tag.toLowerCase()));
  const preferredLower = preferredTags.map((tag) => tag.toLowerCase());

  const matches = preferredLower.filter(
    (preferred) =>
      cityLower.has(preferred) ||
      [...cityLower].some((cityTag) => cityTag.includes(preferred) || preferred.includes(cityTag))
  ).length;

  return round4(Math.min(1, matches / preferredLower.length));
}

function isCrowdPreference(value: string): value is CrowdPreference {
  return Object.prototype.hasOwnProperty.call(CROWD_SEASON_TABLE, value);
}

export function round4(value: number): number {
  return Number(value.toFixed(4));
}
