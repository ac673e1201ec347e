export * from "./config/index.js";
export * from "./errors.js";
export * from "./logging/index.js";
export * from "./provenance/index.js";
export * from "./store/index.js";
export * from "./target/index.js";
