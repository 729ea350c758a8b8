export * from "./manager.js";
export * from "./source.js";
