/**
 * @odflow/engine
 *
 * Query engine for origin-destination mobility flows.
 *
 * Key concepts:
 * - Dense index: place ids mapped onto [0, N) per request
 * - Time axis: distinct timestamps of a scan mapped onto [0, T)
 * - Tensor: dense [T, N, N] flows built from sparse records
 * - Corridor: summed flow along an ordered origin -> destination pair
 *
 * Pipeline:
 * 1. Validate the request window and filters
 * 2. Scan flow records from the store
 * 3. Build a dense tensor/series, or aggregate and rank by province/city
 *
 * The engine performs no I/O; the server supplies scanned records.
 */

// Domain types
export * from "@odflow/types";

// Modules
export * from "./errors.js";
export * from "./time/index.js";
export * from "./directory/index.js";
export * from "./tensor/index.js";
export * from "./analysis/index.js";
export * from "./metrics/index.js";
export * from "./forecast/index.js";
