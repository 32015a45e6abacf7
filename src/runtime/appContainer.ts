import { appConfig } from "../config/appConfig";
import { type City, loadCityCatalog } from "../core/cities";
import type { LLMClient } from "../llm/client";
import { llmProfile } from "../llm/config";
import { createLLMClientForProfile } from "../llm/factory";

export class AppContainer {
  private catalog: readonly City[] | null = null;
  private llmClient: LLMClient | null = null;

  getCatalog(): readonly City[] {
    if (!this.catalog) {
      this.catalog = loadCityCatalog(appConfig.citiesDataPath);
    }
    return this.catalog;
  }

  getLLMClient(): LLMClient {
    if (!this.llmClient) {
      this.llmClient = createLLMClientForProfile(llmProfile);
    }
    return this.llmClient;
  }
}

let container: AppContainer | null = null;

export function getAppContainer(): AppContainer {
  if (!container) {
    container = new AppContainer();
  }
  return container;
}
