import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import cors from "cors";
import { registerRoutes } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { Services } from "./services/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const SPEC_PATH = resolve(__dirname, "..", "build", "swagger.json");

export function createApp(services: Services): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  // OpenAPI document written by `npm run spec`
  app.get("/api-docs", (_req, res) => {
    if (!existsSync(SPEC_PATH)) {
      res.status(404).json({ error: "OpenAPI document not generated; run the spec script" });
      return;
    }
    const spec: unknown = JSON.parse(readFileSync(SPEC_PATH, "utf-8"));
    res.json(spec);
  });

  registerRoutes(app, services);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
