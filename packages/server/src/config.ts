import { z } from "zod";

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  OD_DB_PATH: z.string().min(1).default("./data/geo_points.db"),
  OD_TABLE_PLACES: identifier.default("places"),
  OD_TABLE_RELATIONS: identifier.default("relations"),
  OD_TABLE_FLOWS: identifier.default("dyna"),
  OD_PREDICT_NOISE_RATIO: z.coerce.number().min(0).default(0.03),
  OD_DEFAULT_PAIR_TYPE: z.string().min(1).default("state"),
});

/** Table names the store binds to. Never taken from a request. */
export interface TableNames {
  places: string;
  relations: string;
  flows: string;
}

export interface ServerConfig {
  port: number;
  dbPath: string;
  tables: TableNames;
  predictNoiseRatio: number;
  defaultPairType: string;
}

export const DEFAULT_TABLES: TableNames = {
  places: "places",
  relations: "relations",
  flows: "dyna",
};

/**
 * Resolve server configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const cfg = parsed.data;
  return {
    port: cfg.PORT,
    dbPath: cfg.OD_DB_PATH,
    tables: {
      places: cfg.OD_TABLE_PLACES,
      relations: cfg.OD_TABLE_RELATIONS,
      flows: cfg.OD_TABLE_FLOWS,
    },
    predictNoiseRatio: cfg.OD_PREDICT_NOISE_RATIO,
    defaultPairType: cfg.OD_DEFAULT_PAIR_TYPE,
  };
}
