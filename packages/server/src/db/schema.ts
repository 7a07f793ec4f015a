import type Database from "better-sqlite3";
import type { TableNames } from "../config.js";

/**
 * Create the places / relations / flows tables and their indexes if they
 * do not exist. Used by the demo seed script and the tests; request paths
 * only ever read.
 */
export function createSchema(db: Database.Database, tables: TableNames): void {
  const { places, relations, flows } = tables;
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${places} (
      geo_id INTEGER PRIMARY KEY,
      type TEXT,
      coordinates TEXT,
      name TEXT NOT NULL,
      province TEXT
    );
    CREATE TABLE IF NOT EXISTS ${relations} (
      rel_id INTEGER PRIMARY KEY,
      type TEXT,
      origin_id INTEGER NOT NULL,
      destination_id INTEGER NOT NULL,
      cost REAL
    );
    CREATE TABLE IF NOT EXISTS ${flows} (
      dyna_id INTEGER PRIMARY KEY,
      type TEXT,
      time TEXT NOT NULL,
      origin_id INTEGER NOT NULL,
      destination_id INTEGER NOT NULL,
      flow REAL
    );
    CREATE INDEX IF NOT EXISTS idx_${flows}_time ON ${flows} (time);
    CREATE INDEX IF NOT EXISTS idx_${flows}_pair_time
      ON ${flows} (origin_id, destination_id, time);
  `);
}

export interface PlaceInsert {
  id: number;
  name: string;
  province: string | null;
  type?: string;
  coordinates?: string;
}

export interface RelationInsert {
  originId: number;
  destinationId: number;
  cost: number | null;
  type?: string;
}

export interface FlowInsert {
  time: string;
  originId: number;
  destinationId: number;
  flow: number | null;
  type?: string | null;
}

/** Bulk insert helpers, each wrapped in one transaction */
export function insertPlaces(
  db: Database.Database,
  tables: TableNames,
  rows: readonly PlaceInsert[],
): void {
  const stmt = db.prepare(
    `INSERT INTO ${tables.places} (geo_id, type, coordinates, name, province) VALUES (?, ?, ?, ?, ?)`,
  );
  db.transaction(() => {
    for (const p of rows) {
      stmt.run(p.id, p.type ?? "Point", p.coordinates ?? null, p.name, p.province);
    }
  })();
}

export function insertRelations(
  db: Database.Database,
  tables: TableNames,
  rows: readonly RelationInsert[],
): void {
  const stmt = db.prepare(
    `INSERT INTO ${tables.relations} (type, origin_id, destination_id, cost) VALUES (?, ?, ?, ?)`,
  );
  db.transaction(() => {
    for (const r of rows) {
      stmt.run(r.type ?? "geo", r.originId, r.destinationId, r.cost);
    }
  })();
}

export function insertFlows(
  db: Database.Database,
  tables: TableNames,
  rows: readonly FlowInsert[],
): void {
  const stmt = db.prepare(
    `INSERT INTO ${tables.flows} (type, time, origin_id, destination_id, flow) VALUES (?, ?, ?, ?, ?)`,
  );
  db.transaction(() => {
    for (const f of rows) {
      stmt.run(f.type === undefined ? "state" : f.type, f.time, f.originId, f.destinationId, f.flow);
    }
  })();
}
