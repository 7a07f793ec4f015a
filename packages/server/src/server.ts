import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { FileFlowStoreProvider } from "./db/flow-store.js";
import { createServices } from "./services/index.js";

const config = loadConfig();
const stores = new FileFlowStoreProvider(config.dbPath, config.tables);
const app = createApp(createServices(stores, config));

app.listen(config.port, () => {
  console.log(`\n[server] OD flow API running at http://localhost:${config.port}`);
  console.log(`[server] database: ${config.dbPath}`);
  console.log(`[server] OpenAPI spec: http://localhost:${config.port}/api-docs\n`);
});
