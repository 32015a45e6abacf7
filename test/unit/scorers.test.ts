import test from "node:test";
import assert from "node:assert/strict";
import { scoreCrowd, scorePrecipitation, scoreTags, scoreTemperature } from "../../src/core/scorers";
import { assertWeightTable, CROWD_SEASON_TABLE, SCORE_WEIGHTS } from "../../src/core/scoringPolicy";
import { classifySeason, seasonLabel } from "../../src/core/season";

test("scoreTemperature is neutral when no bounds are given", () => {
  for (const temp of [-20, 0, 17.5, 42]) {
    assert.equal(scoreTemperature(temp), 0.65);
  }
});

test("scoreTemperature peaks at the range midpoint and floors in-range scores at 0.85", () => {
  assert.equal(scoreTemperature(20, 15, 25), 1);
  assert.equal(scoreTemperature(24, 20, 30), 0.97);
  assert.equal(scoreTemperature(25, 15, 25), 0.85);
  assert.equal(scoreTemperature(15, 15, 25), 0.85);
});

test("scoreTemperature decays along a Gaussian outside the range", () => {
  assert.equal(scoreTemperature(30, 15, 25), 0.6065);
  assert.equal(scoreTemperature(10, 20, 21), 0.0039);

  const mid = scoreTemperature(20, 15, 25);
  const boundary = scoreTemperature(25, 15, 25);
  const oneSigmaOut = scoreTemperature(30, 15, 25);
  assert.ok(mid >= boundary && boundary >= oneSigmaOut);

  let previous = Infinity;
  for (let temp = 26; temp <= 45; temp += 1) {
    const score = scoreTemperature(temp, 15, 25);
    assert.ok(score <= previous, `score rose at ${temp}°C`);
    assert.ok(score >= 0 && score <= 1);
    previous = score;
  }
});

test("scoreTemperature swaps reversed bounds", () => {
  assert.equal(scoreTemperature(20, 25, 15), scoreTemperature(20, 15, 25));
  assert.equal(scoreTemperature(30, 25, 15), 0.6065);
});

test("scoreTemperature synthesizes a missing bound ten degrees from the city", () => {
  assert.equal(scoreTemperature(30, 25), 0.95);
  assert.equal(scoreTemperature(20, 25), 0.2494);
  assert.equal(scoreTemperature(30, undefined, 10), 0.1353);
});

test("scorePrecipitation applies the tolerance curves", () => {
  assert.equal(scorePrecipitation(150, "medium"), 0.5);
  assert.equal(scorePrecipitation(150, "low"), 0.6598);
  assert.equal(scorePrecipitation(150, "high"), 0.75);
  assert.equal(scorePrecipitation(300, "medium"), 0);
  assert.equal(scorePrecipitation(450, "low"), 0);
  assert.equal(scorePrecipitation(450, "high"), 0.5);
});

test("scorePrecipitation scores a dry month at the maximum for every tolerance", () => {
  for (const tolerance of ["low", "medium", "high"]) {
    assert.equal(scorePrecipitation(0, tolerance), 1);
  }
});

test("scorePrecipitation is non-increasing in rainfall", () => {
  for (const tolerance of ["low", "medium", "high"]) {
    let previous = Infinity;
    for (let precip = 0; precip <= 400; precip += 25) {
      const score = scorePrecipitation(precip, tolerance);
      assert.ok(score <= previous, `${tolerance} rose at ${precip}mm`);
      previous = score;
    }
  }
});

test("scorePrecipitation treats an unknown tolerance as medium", () => {
  assert.equal(scorePrecipitation(120, "torrential"), scorePrecipitation(120, "medium"));
});

test("scoreCrowd returns the table value for every preference and season", () => {
  const peak = [7];
  const shoulder = [6];
  const expected: Array<[string, number, number]> = [
    ["off_peak", 1, 1],
    ["off_peak", 6, 0.55],
    ["off_peak", 7, 0.05],
    ["shoulder", 1, 0.7],
    ["shoulder", 6, 1],
    ["shoulder", 7, 0.25],
    ["any", 1, 0.85],
    ["any", 6, 1],
    ["any", 7, 0.75]
  ];
  for (const [preference, month, value] of expected) {
    assert.equal(scoreCrowd(month, peak, shoulder, preference), value, `${preference} / month ${month}`);
  }
});

test("scoreCrowd falls back to the any row for unknown preferences", () => {
  assert.equal(scoreCrowd(7, [7], [], "party"), CROWD_SEASON_TABLE.any.peak);
  assert.equal(scoreCrowd(2, [7], [], "party"), CROWD_SEASON_TABLE.any.off);
});

test("classifySeason checks peak before shoulder", () => {
  assert.equal(classifySeason(5, [5], [5]), "peak");
  assert.equal(classifySeason(4, [5], [4]), "shoulder");
  assert.equal(classifySeason(3, [5], [4]), "off");
  assert.equal(seasonLabel("shoulder"), "shoulder season");
});

test("scoreTags distinguishes no preference from a tagless city", () => {
  assert.equal(scoreTags(["beach"], []), 0.65);
  assert.equal(scoreTags([], ["beach"]), 0.2);
});

test("scoreTags matches exact, case-insensitive and substring tags", () => {
  assert.equal(scoreTags(["city", "beach", "food"], ["beach", "city"]), 1);
  assert.equal(scoreTags(["coastal"], ["coast"]), 1);
  assert.equal(scoreTags(["coast"], ["coastal"]), 1);
  assert.equal(scoreTags(["beach"], ["BEACH"]), 1);
  assert.equal(scoreTags(["beach"], ["beach", "ski", "desert"]), 0.3333);
});

test("score weights sum to one", () => {
  assert.doesNotThrow(() => assertWeightTable(SCORE_WEIGHTS));
  assert.throws(() => assertWeightTable({ temp: 0.5, rain: 0.4 }), /must sum to 1.0/);
});
