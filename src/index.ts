/**
 * Re-exports the table renderer, the exercise engine, the session layer and the lab exercises.
 * This is the main entry point for the cql-labs package API.
 */
export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/table-renderer.js";
export * from "./core/rows.js";
export * from "./core/config.js";
export * from "./core/engine.js";
export * from "./core/logger.js";
export * from "./core/state.js";
export * from "./cassandra/session.js";
export * from "./cassandra/result-rows.js";
export * from "./exercises/index.js";
