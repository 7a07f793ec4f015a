/**
 * SQLite-backed flow store.
 *
 * Every predicate is a bound parameter. Table names come only from startup
 * configuration (validated as identifiers) and are interpolated once per
 * statement.
 */

import Database from "better-sqlite3";
import {
  OdflowError,
  type FlowRecord,
  type FlowScanFilter,
  type Place,
  type PlaceCandidate,
  type PlaceNameSource,
  type RelationEdge,
} from "@odflow/engine";
import type { TableNames } from "../config.js";

export interface StoreCounts {
  places: number;
  relations: number;
  flows: number;
}

/** Read-only view of the place directory, relations and flow records */
export interface FlowStore extends PlaceNameSource {
  listPlaceIds(): number[];
  listPlaces(): Place[];
  scanRelations(): RelationEdge[];
  /** Records with time in [start, end), ascending by time then storage order */
  scan(filter: FlowScanFilter): FlowRecord[];
  scanPair(
    start: string,
    end: string,
    originId: number,
    destinationId: number,
    type?: string,
  ): FlowRecord[];
  counts(): StoreCounts;
}

/** Scoped store acquisition: the store is only valid inside `fn` */
export interface FlowStoreProvider {
  withStore<T>(fn: (store: FlowStore) => T): T;
}

interface PlaceRow {
  geo_id: number;
  name: string;
  province: string | null;
}

interface CandidateRow {
  geo_id: number;
  name: string;
}

interface FlowRow {
  time: string;
  type: string | null;
  origin_id: number;
  destination_id: number;
  flow: number | null;
}

interface RelationRow {
  origin_id: number;
  destination_id: number;
  cost: number | null;
}

/** Escape LIKE wildcards so the fragment matches literally (ESCAPE '\') */
export function escapeLike(fragment: string): string {
  return fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toRecord(row: FlowRow): FlowRecord {
  return {
    time: row.time,
    type: row.type,
    originId: row.origin_id,
    destinationId: row.destination_id,
    flow: row.flow,
  };
}

export class SqliteFlowStore implements FlowStore {
  constructor(
    private readonly db: Database.Database,
    private readonly tables: TableNames,
  ) {}

  listPlaceIds(): number[] {
    const rows = this.db
      .prepare(`SELECT DISTINCT geo_id FROM ${this.tables.places} ORDER BY geo_id`)
      .all() as { geo_id: number }[];
    return rows.map((r) => r.geo_id);
  }

  listPlaces(): Place[] {
    const rows = this.db
      .prepare(`SELECT geo_id, name, province FROM ${this.tables.places} ORDER BY geo_id`)
      .all() as PlaceRow[];
    return rows.map((r) => ({ id: r.geo_id, name: r.name, province: r.province }));
  }

  findByExactName(name: string): PlaceCandidate | undefined {
    const row = this.db
      .prepare(
        `SELECT geo_id, name FROM ${this.tables.places} WHERE name = ? ORDER BY geo_id LIMIT 1`,
      )
      .get(name) as CandidateRow | undefined;
    return row ? { id: row.geo_id, name: row.name } : undefined;
  }

  searchByName(fragment: string, limit: number, excludeId?: number): PlaceCandidate[] {
    const pattern = `%${escapeLike(fragment)}%`;
    const rows = (
      excludeId === undefined
        ? this.db
            .prepare(
              `SELECT geo_id, name FROM ${this.tables.places}
               WHERE name LIKE ? ESCAPE '\\'
               ORDER BY geo_id LIMIT ?`,
            )
            .all(pattern, limit)
        : this.db
            .prepare(
              `SELECT geo_id, name FROM ${this.tables.places}
               WHERE name LIKE ? ESCAPE '\\' AND geo_id != ?
               ORDER BY geo_id LIMIT ?`,
            )
            .all(pattern, excludeId, limit)
    ) as CandidateRow[];
    return rows.map((r) => ({ id: r.geo_id, name: r.name }));
  }

  scanRelations(): RelationEdge[] {
    const rows = this.db
      .prepare(
        `SELECT origin_id, destination_id, cost FROM ${this.tables.relations} ORDER BY rel_id`,
      )
      .all() as RelationRow[];
    return rows.map((r) => ({
      originId: r.origin_id,
      destinationId: r.destination_id,
      cost: r.cost,
    }));
  }

  scan(filter: FlowScanFilter): FlowRecord[] {
    const clauses = ["time >= ?", "time < ?"];
    const params: (string | number)[] = [filter.start, filter.end];

    if (filter.type !== undefined) {
      clauses.push("type = ?");
      params.push(filter.type);
    }
    if (filter.ids !== undefined) {
      const ids = JSON.stringify(filter.ids);
      clauses.push(
        "origin_id IN (SELECT value FROM json_each(?))",
        "destination_id IN (SELECT value FROM json_each(?))",
      );
      params.push(ids, ids);
    }

    const rows = this.db
      .prepare(
        `SELECT time, type, origin_id, destination_id, flow FROM ${this.tables.flows}
         WHERE ${clauses.join(" AND ")}
         ORDER BY time, dyna_id`,
      )
      .all(...params) as FlowRow[];
    return rows.map(toRecord);
  }

  scanPair(
    start: string,
    end: string,
    originId: number,
    destinationId: number,
    type?: string,
  ): FlowRecord[] {
    const typeClause = type === undefined ? "" : " AND type = ?";
    const params: (string | number)[] = [originId, destinationId, start, end];
    if (type !== undefined) params.push(type);

    const rows = this.db
      .prepare(
        `SELECT time, type, origin_id, destination_id, flow FROM ${this.tables.flows}
         WHERE origin_id = ? AND destination_id = ? AND time >= ? AND time < ?${typeClause}
         ORDER BY time, dyna_id`,
      )
      .all(...params) as FlowRow[];
    return rows.map(toRecord);
  }

  counts(): StoreCounts {
    const count = (table: string): number => {
      const row = this.db.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get() as { n: number };
      return row.n;
    };
    return {
      places: count(this.tables.places),
      relations: count(this.tables.relations),
      flows: count(this.tables.flows),
    };
  }
}

/**
 * Opens the database file read-only for each request and closes it
 * afterwards. A file that cannot be opened is reported as
 * UpstreamUnavailable.
 */
export class FileFlowStoreProvider implements FlowStoreProvider {
  constructor(
    private readonly dbPath: string,
    private readonly tables: TableNames,
  ) {}

  withStore<T>(fn: (store: FlowStore) => T): T {
    let db: Database.Database;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[store] cannot open ${this.dbPath}: ${reason}`);
      throw new OdflowError("UpstreamUnavailable", `flow store unavailable: ${reason}`);
    }
    try {
      return fn(new SqliteFlowStore(db, this.tables));
    } finally {
      db.close();
    }
  }
}

/** Serves every request from one already-open connection (tests, embedding) */
export class SharedFlowStoreProvider implements FlowStoreProvider {
  private readonly store: SqliteFlowStore;

  constructor(db: Database.Database, tables: TableNames) {
    this.store = new SqliteFlowStore(db, tables);
  }

  withStore<T>(fn: (store: FlowStore) => T): T {
    return fn(this.store);
  }
}
