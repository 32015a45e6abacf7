import type { ScoredDestination } from "./destinationRanking";

const CITATION_INSTRUCTION =
  "[INSTRUCTION: Use the data above to explain your recommendations. " +
  "Cite actual temperatures and crowd status. " +
  "Do NOT invent data not shown above.]";

export function formatRankedDestinations(ranked: readonly ScoredDestination[], monthLabel: string): string {
  if (ranked.length === 0) {
    return `[No destinations matched the criteria for ${monthLabel}. Suggest broadening preferences.]`;
  }

  const lines = [`[DATASET: TOP DESTINATIONS FOR ${monthLabel.toUpperCase()}]`, ""];

  ranked.forEach(({ city, scores, monthData }, index) => {
    lines.push(`${index + 1}. ${city.name}, ${city.country}  [Score: ${fixed2(scores.final)}]`);
    lines.push(
      `   Avg temp: ${monthData.temp}°C | Precipitation: ${monthData.precip}mm | Status: ${monthData.season}`
    );
    lines.push(
      `   Score breakdown: temp:${fixed2(scores.temp)}  rain:${fixed2(scores.rain)}  ` +
        `crowd:${fixed2(scores.crowd)}  tags:${fixed2(scores.tags)}`
    );
    lines.push(`   Tags: ${city.tags.join(", ")}`);
    lines.push("");
  });

  lines.push(CITATION_INSTRUCTION);
  return lines.join("\n");
}

function fixed2(value: number): string {
  return value.toFixed(2);
}
