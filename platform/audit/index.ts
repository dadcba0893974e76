export type { AuditSink } from "./AuditSink";
export { AuditRecorder, toAuditText, canonicalJson, type AuditedRow } from "./AuditRecorder";
