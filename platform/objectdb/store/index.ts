export type { ObjectStore, StoreSession } from "./ObjectStore";
export * from "./types";
export * from "./errors";
export { InMemoryObjectStore } from "./InMemoryObjectStore";
