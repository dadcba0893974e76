import { InMemoryObjectStore } from "../store/InMemoryObjectStore";
import { ObjectEngine, type ObjectEngineOptions } from "./ObjectEngine";

export function createDevEngine(opts: ObjectEngineOptions = {}) {
  const store = new InMemoryObjectStore();
  const engine = new ObjectEngine(store, opts);

  return { store, engine };
}
