/**
 * @odflow/types
 *
 * Shared domain types for the OD flow query engine.
 *
 * - Place: City nodes with their province
 * - Flow: Time-stamped OD records and relation edges
 * - Tensor: Dense results built from sparse scans
 * - Analysis: Ranked aggregation and corridor rows
 */

export * from "./place.js";
export * from "./flow.js";
export * from "./tensor.js";
export * from "./analysis.js";
export * from "./errors.js";
