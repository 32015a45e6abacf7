import test from "node:test";
import assert from "node:assert/strict";
import { makeCity } from "../helpers/cityFactory";
import { createToolbox } from "../../src/tools";
import { buildSearchDestinationsTool, executeSearchDestinations } from "../../src/tools/searchDestinations";
import { normalizeCrowdPreference, normalizeRainTolerance } from "../../src/core/preferences";

const catalog = [
  makeCity({ name: "Lagoon", country: "Fiji", region: "Oceania", temp: 27, precip: 90, tags: ["beach", "island"] }),
  makeCity({ name: "Alpine", country: "Austria", region: "Central Europe", temp: 2, precip: 60, tags: ["ski"] })
];

test("search_destinations ranks the catalog and returns the report", () => {
  const report = executeSearchDestinations(
    { travel_month: 8, crowd_preference: "any", environment_tags: ["beach"], num_results: 1 },
    catalog
  );
  const lines = report.split("\n");
  assert.equal(lines[0], "[DATASET: TOP DESTINATIONS FOR AUGUST]");
  assert.match(lines[2], /^1\. Lagoon, Fiji {2}\[Score: /);
  assert.ok(!report.includes("Alpine"));
});

test("search_destinations reports invalid input back to the caller", () => {
  const report = executeSearchDestinations({ travel_month: 13, crowd_preference: "any" }, catalog);
  assert.ok(report.startsWith("[Invalid search_destinations input: travel_month"));

  const missing = executeSearchDestinations({ travel_month: 3 }, catalog);
  assert.ok(missing.startsWith("[Invalid search_destinations input: crowd_preference"));
});

test("search_destinations treats unknown enum values as their defaults", () => {
  const base = { travel_month: 4, crowd_preference: "any", rain_tolerance: "medium" };
  assert.equal(
    executeSearchDestinations({ ...base, rain_tolerance: "torrential", crowd_preference: "whatever" }, catalog),
    executeSearchDestinations(base, catalog)
  );
  assert.equal(normalizeRainTolerance(" HIGH "), "high");
  assert.equal(normalizeRainTolerance(undefined), "medium");
  assert.equal(normalizeCrowdPreference("Off_Peak"), "off_peak");
  assert.equal(normalizeCrowdPreference("crowded"), "any");
});

test("search_destinations accepts null for omitted optional fields", () => {
  const report = executeSearchDestinations(
    { travel_month: 1, crowd_preference: "any", temp_min: null, exclude_regions: null },
    catalog
  );
  assert.ok(report.startsWith("[DATASET: TOP DESTINATIONS FOR JANUARY]"));
});

test("search_destinations renders the empty message when everything is excluded", () => {
  const report = executeSearchDestinations(
    { travel_month: 1, crowd_preference: "any", exclude_regions: ["oceania", "europe"] },
    catalog
  );
  assert.equal(report, "[No destinations matched the criteria for January. Suggest broadening preferences.]");
});

test("the tool definition describes the current and next month", () => {
  const tool = buildSearchDestinationsTool(new Date(2026, 9, 19));
  assert.equal(tool.name, "search_destinations");
  assert.deepEqual(tool.parameters.required, ["travel_month", "crowd_preference"]);
  const serialized = JSON.stringify(tool.parameters);
  assert.ok(serialized.includes("current month (10)"));
  assert.ok(serialized.includes("use 11"));
});

test("the toolbox answers unknown tools without throwing", () => {
  const toolbox = createToolbox(catalog);
  assert.equal(toolbox.execute({ id: "call_1", name: "book_flight", arguments: {} }), "[Unknown tool: book_flight]");
});
