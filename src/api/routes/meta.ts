import { Router } from "express";
import { catalogFacets } from "../../core/cities";
import { CROWD_SEASON_TABLE, SCORE_WEIGHTS } from "../../core/scoringPolicy";
import { sendRouteError } from "../../http/routeErrors";
import { getAppContainer } from "../../runtime/appContainer";
import { ENVIRONMENT_TAGS } from "../../tools/searchDestinations";

export const metaRouter = Router();

metaRouter.get("/catalog", (_req, res) => {
  try {
    res.json(catalogFacets(getAppContainer().getCatalog()));
  } catch (error) {
    sendRouteError(res, error, "Failed to load the city catalog.");
  }
});

metaRouter.get("/scoring", (_req, res) => {
  res.json({ weights: SCORE_WEIGHTS, crowdTable: CROWD_SEASON_TABLE, environmentTags: ENVIRONMENT_TAGS });
});
