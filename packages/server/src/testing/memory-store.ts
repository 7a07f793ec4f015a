import Database from "better-sqlite3";
import { DEFAULT_TABLES } from "../config.js";
import { SharedFlowStoreProvider } from "../db/flow-store.js";
import {
  createSchema,
  insertFlows,
  insertPlaces,
  insertRelations,
  type FlowInsert,
  type PlaceInsert,
  type RelationInsert,
} from "../db/schema.js";

export interface MemoryStoreSeed {
  places?: PlaceInsert[];
  relations?: RelationInsert[];
  flows?: FlowInsert[];
}

export interface MemoryStore {
  db: Database.Database;
  provider: SharedFlowStoreProvider;
}

/** In-memory database with the server schema, seeded for a test */
export function createMemoryStore(seed: MemoryStoreSeed = {}): MemoryStore {
  const db = new Database(":memory:");
  createSchema(db, DEFAULT_TABLES);
  insertPlaces(db, DEFAULT_TABLES, seed.places ?? []);
  insertRelations(db, DEFAULT_TABLES, seed.relations ?? []);
  insertFlows(db, DEFAULT_TABLES, seed.flows ?? []);
  return { db, provider: new SharedFlowStoreProvider(db, DEFAULT_TABLES) };
}

export const T1 = "2022-01-11T00:00:00Z";
export const T2 = "2022-01-12T00:00:00Z";
export const T3 = "2022-01-13T00:00:00Z";

/** Small directory shared by the service and controller tests */
export const SAMPLE_PLACES: PlaceInsert[] = [
  { id: 1, name: "Lhasa", province: "Xizang" },
  { id: 2, name: "Shigatse", province: "Xizang" },
  { id: 3, name: "Xining", province: "Qinghai" },
  { id: 4, name: "Golmud", province: null },
];

export const SAMPLE_FLOWS: FlowInsert[] = [
  { time: T1, originId: 1, destinationId: 2, flow: 10 },
  { time: T1, originId: 1, destinationId: 3, flow: 5 },
  { time: T1, originId: 3, destinationId: 1, flow: 5, type: "event" },
  { time: T2, originId: 1, destinationId: 2, flow: 4 },
  { time: T2, originId: 2, destinationId: 4, flow: null },
  { time: T3, originId: 9, destinationId: 1, flow: 2 },
];

export const SAMPLE_RELATIONS: RelationInsert[] = [
  { originId: 1, destinationId: 2, cost: 270 },
  { originId: 2, destinationId: 1, cost: null },
  { originId: 1, destinationId: 9, cost: 1 },
  { originId: 1, destinationId: 2, cost: 275 },
];
