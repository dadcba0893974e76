export * from "./euid";
export * from "./store";
export * from "./service";
export * from "./config";
export { ObjectEngine, type ObjectEngineOptions } from "./core/ObjectEngine";
export { createDevEngine } from "./core/createDevEngine";
