export * from "./codec";
export { EuidRegistry, CORE_PREFIXES, OPTIONAL_PREFIXES, type EuidRegistryOptions } from "./registry";
