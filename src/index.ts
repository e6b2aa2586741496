export * from "./region-code.js";
export * from "./predicate.js";
export * from "./nodes.js";
export * from "./search-tree.js";
export * from "./rebalance-scheduler.js";
export * from "./rect.js";
export * from "./logger.js";
