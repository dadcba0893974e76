export * from "./errors";
export * from "./types";
export * from "./kinds";
export * from "./TemplateResolver";
export * from "./PayloadValidator";
export * from "./PersistenceBoundary";
export * from "./InstanceFactory";
export * from "./LineageGraph";
export * from "./ActionDispatcher";
export type { ObjectService, InstanceUpdate } from "./ObjectService";
export { StoreBackedObjectService, DEFAULT_PAGE_SIZE } from "./impl/StoreBackedObjectService";
