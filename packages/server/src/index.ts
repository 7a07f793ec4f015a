export { createApp } from "./app.js";
export { loadConfig, DEFAULT_TABLES, type ServerConfig, type TableNames } from "./config.js";
export {
  FileFlowStoreProvider,
  SharedFlowStoreProvider,
  SqliteFlowStore,
  type FlowStore,
  type FlowStoreProvider,
  type StoreCounts,
} from "./db/flow-store.js";
export {
  createSchema,
  insertFlows,
  insertPlaces,
  insertRelations,
  type FlowInsert,
  type PlaceInsert,
  type RelationInsert,
} from "./db/schema.js";
export { createServices, type Services } from "./services/index.js";
export type * from "./models/requests.js";
export type * from "./models/responses.js";
