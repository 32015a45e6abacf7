import { app } from "./app";
import { appConfig } from "./config/appConfig";
import { getAppContainer } from "./runtime/appContainer";

const catalog = getAppContainer().getCatalog();

app.listen(appConfig.port, () => {
  console.log(`Season Radar running on http://localhost:${appConfig.port} (${catalog.length} cities)`);
});
