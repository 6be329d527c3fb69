export * from "./restrictions.js";
export * from "./schemas.js";
