export * from "./instantiationLayouts";
export * from "./templateDocuments";
export * from "./seedTemplates";
export * from "./loadTemplateDocuments";
