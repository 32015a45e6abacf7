import { Router } from "express";
import { rankDestinations, type ScoredDestination } from "../../core/destinationRanking";
import { monthName } from "../../core/months";
import { SearchDestinationsInputSchema, toDestinationPreferences } from "../../core/preferences";
import { formatRankedDestinations } from "../../core/resultFormatter";
import { badRequestFromZod, sendRouteError } from "../../http/routeErrors";
import { getAppContainer } from "../../runtime/appContainer";

export const destinationsRouter = Router();

destinationsRouter.post("/search", (req, res) => {
  try {
    const parse = SearchDestinationsInputSchema.safeParse(req.body ?? {});
    if (!parse.success) {
      throw badRequestFromZod("Invalid destination search.", parse.error);
    }
    const preferences = toDestinationPreferences(parse.data);
    const ranked = rankDestinations(getAppContainer().getCatalog(), preferences);
    const month = monthName(preferences.travelMonth);
    res.json({
      month,
      results: ranked.map(toResultPayload),
      report: formatRankedDestinations(ranked, month)
    });
  } catch (error) {
    sendRouteError(res, error, "Failed to rank destinations.");
  }
});

function toResultPayload(entry: ScoredDestination, index: number) {
  return {
    rank: index + 1,
    name: entry.city.name,
    country: entry.city.country,
    region: entry.city.region,
    tags: entry.city.tags,
    scores: entry.scores,
    monthData: entry.monthData
  };
}
