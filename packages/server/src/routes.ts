/**
 * Express route table for the tsoa controllers.
 *
 * Each route validates its query or body with the matching zod schema,
 * creates a fresh controller for the request and sends the result with the
 * status the controller set (200 by default).
 */

import type { Controller } from "@tsoa/runtime";
import type { Express, NextFunction, Request, Response } from "express";
import { AnalysisController } from "./controllers/analysis.controller.js";
import { GeoController } from "./controllers/geo.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { MetricsController } from "./controllers/metrics.controller.js";
import { OdController } from "./controllers/od.controller.js";
import { PredictController } from "./controllers/predict.controller.js";
import { RelationsController } from "./controllers/relations.controller.js";
import {
  cityCorridorRequestSchema,
  flowAnalysisRequestSchema,
  forecastRequestSchema,
  geoIdQuerySchema,
  growthRequestSchema,
  metricsRequestSchema,
  odQuerySchema,
  pairQuerySchema,
  predictPairQuerySchema,
  predictQuerySchema,
  provinceCorridorRequestSchema,
  relationsMatrixQuerySchema,
} from "./models/schemas.js";
import type { Services } from "./services/index.js";
import { parseRequest } from "./validation.js";

type ControllerCtor<C extends Controller> = new (services: Services) => C;

export function registerRoutes(app: Express, services: Services): void {
  function handle<C extends Controller>(
    Ctor: ControllerCtor<C>,
    invoke: (controller: C, req: Request) => Promise<unknown>,
  ) {
    return (req: Request, res: Response, next: NextFunction): void => {
      const controller = new Ctor(services);
      Promise.resolve()
        .then(() => invoke(controller, req))
        .then((body) => {
          res.status(controller.getStatus() ?? 200).json(body);
        })
        .catch(next);
    };
  }

  app.get(
    "/health",
    handle(HealthController, (c) => c.getHealth()),
  );

  app.get(
    "/api/geo-id",
    handle(GeoController, (c, req) => {
      const q = parseRequest(geoIdQuerySchema, req.query, "query");
      return c.resolveName(q.name);
    }),
  );

  app.get(
    "/api/relations/matrix",
    handle(RelationsController, (c, req) => {
      const q = parseRequest(relationsMatrixQuerySchema, req.query, "query");
      return c.getMatrix(q.fill);
    }),
  );

  app.get(
    "/api/od",
    handle(OdController, (c, req) => {
      const q = parseRequest(odQuerySchema, req.query, "query");
      return c.getTensor(q.start, q.end, q.geoIds, q.type, q.flowPolicy);
    }),
  );

  app.get(
    "/api/od/pair",
    handle(OdController, (c, req) => {
      const q = parseRequest(pairQuerySchema, req.query, "query");
      return c.getPair(q.start, q.end, q.originId, q.destinationId, q.type, q.flowPolicy);
    }),
  );

  app.get(
    "/api/predict",
    handle(PredictController, (c, req) => {
      const q = parseRequest(predictQuerySchema, req.query, "query");
      return c.predictTensor(q.start, q.end, q.geoIds, q.type, q.flowPolicy, q.noiseRatio, q.seed);
    }),
  );

  app.get(
    "/api/predict/pair",
    handle(PredictController, (c, req) => {
      const q = parseRequest(predictPairQuerySchema, req.query, "query");
      return c.predictPair(
        q.start,
        q.end,
        q.originId,
        q.destinationId,
        q.type,
        q.flowPolicy,
        q.noiseRatio,
        q.seed,
      );
    }),
  );

  app.post(
    "/api/forecast",
    handle(MetricsController, (c, req) =>
      c.forecast(parseRequest(forecastRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/growth",
    handle(MetricsController, (c, req) =>
      c.growth(parseRequest(growthRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/metrics",
    handle(MetricsController, (c, req) =>
      c.metrics(parseRequest(metricsRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/analyze/province-flow",
    handle(AnalysisController, (c, req) =>
      c.provinceFlow(parseRequest(flowAnalysisRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/analyze/city-flow",
    handle(AnalysisController, (c, req) =>
      c.cityFlow(parseRequest(flowAnalysisRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/analyze/province-corridor",
    handle(AnalysisController, (c, req) =>
      c.provinceCorridor(parseRequest(provinceCorridorRequestSchema, req.body, "body")),
    ),
  );

  app.post(
    "/api/analyze/city-corridor",
    handle(AnalysisController, (c, req) =>
      c.cityCorridor(parseRequest(cityCorridorRequestSchema, req.body, "body")),
    ),
  );
}
