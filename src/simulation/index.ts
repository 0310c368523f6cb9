/**
 * Simulation module exports
 */

export * from "./document.js";
export * from "./pair-set.js";
export * from "./source.js";
