export * from "./types.js";
export * from "./text-match.js";
export * from "./money.js";
export * from "./dietary-rules.js";
export * from "./product-matcher.js";
export * from "./store-aggregator.js";
export * from "./plan-selector.js";
export * from "./decision-engine.js";
export * from "./response-body.js";
export * from "./catalog-cache.js";
export * from "./catalog-loader.js";
export * from "./config.js";
