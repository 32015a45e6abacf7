import type { City } from "./cities";
import { InvalidArgumentError } from "./errors";
import type { DestinationPreferences } from "./preferences";
import { round4, scoreCrowd, scorePrecipitation, scoreTags, scoreTemperature } from "./scorers";
import { classifySeason, seasonLabel, type SeasonLabel } from "./season";
import { DEFAULT_RESULT_COUNT, SCORE_WEIGHTS } from "./scoringPolicy";

export type ComponentScores = {
  temp: number;
  rain: number;
  crowd: number;
  tags: number;
  final: number;
};

export type ScoredDestination = {
  city: City;
  scores: ComponentScores;
  monthData: {
    temp: number;
    precip: number;
    season: SeasonLabel;
  };
};

export function rankDestinations(
  cities: readonly City[],
  preferences: DestinationPreferences
): ScoredDestination[] {
  const month = requireTravelMonth(preferences.travelMonth);
  const limit = requireResultCount(preferences.numResults);
  const exclusions = preferences.excludeRegions.map((term) => term.toLowerCase());

  const scored = cities
    .filter((city) => !isExcluded(city, exclusions))
    .map((city) => scoreDestination(city, month, preferences));

  return scored.sort((a, b) => b.scores.final - a.scores.final).slice(0, limit);
}

export function scoreDestination(
  city: City,
  month: number,
  preferences: DestinationPreferences
): ScoredDestination {
  const monthIndex = month - 1;
  const temp = city.monthlyTemp[monthIndex];
  const precip = city.monthlyPrecip[monthIndex];

  const scores = {
    temp: scoreTemperature(temp, preferences.tempMin, preferences.tempMax),
    rain: scorePrecipitation(precip, preferences.rainTolerance),
    crowd: scoreCrowd(month, city.peakMonths, city.shoulderMonths, preferences.crowdPreference),
    tags: scoreTags(city.tags, preferences.environmentTags)
  };

  const final = round4(
    SCORE_WEIGHTS.temp * scores.temp +
      SCORE_WEIGHTS.rain * scores.rain +
      SCORE_WEIGHTS.crowd * scores.crowd +
      SCORE_WEIGHTS.tags * scores.tags
  );

  return {
    city,
    scores: { ...scores, final },
    monthData: {
      temp,
      precip,
      season: seasonLabel(classifySeason(month, city.peakMonths, city.shoulderMonths))
    }
  };
}

export function isExcluded(city: City, exclusions: readonly string[]): boolean {
  const region = city.region.toLowerCase();
  const country = city.country.toLowerCase();
  return exclusions.some((term) => region.includes(term) || country.includes(term));
}

function requireTravelMonth(month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidArgumentError("travelMonth", `travel_month must be an integer from 1 to 12 (got ${month}).`);
  }
  return month;
}

function requireResultCount(count: number | undefined): number {
  if (count === undefined) return DEFAULT_RESULT_COUNT;
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError("numResults", `num_results must be a positive integer (got ${count}).`);
  }
  return count;
}
