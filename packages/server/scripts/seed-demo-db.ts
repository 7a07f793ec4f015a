/**
 * Write a small demo database: the places in data/demo-places.json,
 * distance-based relations and two weeks of synthetic daily flows.
 *
 * Usage: npm run seed:demo [-- <output path>]
 */

import { existsSync, readFileSync, rmSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { z } from "zod";
import { mulberry32 } from "@odflow/engine";
import { loadConfig } from "../src/config.js";
import {
  createSchema,
  insertFlows,
  insertPlaces,
  insertRelations,
  type FlowInsert,
  type RelationInsert,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const placesSchema = z.array(
  z.object({
    id: z.number().int(),
    name: z.string().min(1),
    province: z.string().nullable(),
    coordinates: z.string().nullable(),
  }),
);

const DAYS = 14;
const FIRST_DAY = Date.UTC(2024, 0, 1);

function parseLngLat(coordinates: string | null): [number, number] | null {
  if (coordinates === null) return null;
  const parsed = z.tuple([z.number(), z.number()]).safeParse(JSON.parse(coordinates));
  return parsed.success ? parsed.data : null;
}

function main(): void {
  const config = loadConfig();
  const output = resolve(process.argv[2] ?? config.dbPath);
  const raw: unknown = JSON.parse(
    readFileSync(resolve(__dirname, "..", "data", "demo-places.json"), "utf-8"),
  );
  const places = placesSchema.parse(raw);

  if (existsSync(output)) rmSync(output);
  const db = new Database(output);
  createSchema(db, config.tables);
  insertPlaces(
    db,
    config.tables,
    places.map((p) => ({
      id: p.id,
      name: p.name,
      province: p.province,
      coordinates: p.coordinates ?? undefined,
    })),
  );

  const random = mulberry32(20240101);
  const relations: RelationInsert[] = [];
  const flows: FlowInsert[] = [];

  for (const origin of places) {
    for (const destination of places) {
      if (origin.id === destination.id) continue;
      const a = parseLngLat(origin.coordinates);
      const b = parseLngLat(destination.coordinates);
      const distance = a && b ? Math.hypot(a[0] - b[0], a[1] - b[1]) * 100 : null;
      relations.push({ originId: origin.id, destinationId: destination.id, cost: distance });

      // Closer pairs exchange more travellers
      const base = distance === null ? 20 : Math.round(20000 / (10 + distance));
      for (let day = 0; day < DAYS; day++) {
        const time = new Date(FIRST_DAY + day * 86_400_000).toISOString().replace(".000Z", "Z");
        const weekend = day % 7 >= 5 ? 1.3 : 1;
        const missing = random() < 0.02;
        flows.push({
          time,
          originId: origin.id,
          destinationId: destination.id,
          flow: missing ? null : Math.round(base * weekend * (0.8 + 0.4 * random())),
        });
      }
    }
  }

  insertRelations(db, config.tables, relations);
  insertFlows(db, config.tables, flows);
  db.close();

  console.log(
    `[seed] wrote ${places.length} places, ${relations.length} relations, ${flows.length} flows to ${output}`,
  );
}

main();
