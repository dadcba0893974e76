import { readdir, readFile } from "fs/promises";
import path from "path";
import type { ConfigIssue } from "../service/errors";
import type { TemplateDocumentSource } from "./templateDocuments";

export type LoadedDocuments = Readonly<{
  sources: TemplateDocumentSource[];
  issues: ConfigIssue[];
}>;

async function collectJsonFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    // Directories and files starting with "_" hold drafts and are not loaded.
    if (entry.name.startsWith("_") || entry.name.startsWith(".")) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectJsonFiles(full)));
    } else if (entry.isFile() && entry.name.endsWith(".json")) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Reads every template document under `dir`. Unparseable files are reported
 * as issues; the remaining documents are still returned.
 */
export async function loadTemplateDocuments(dir: string): Promise<LoadedDocuments> {
  const sources: TemplateDocumentSource[] = [];
  const issues: ConfigIssue[] = [];

  for (const file of await collectJsonFiles(dir)) {
    const sourceFile = path.relative(dir, file);
    try {
      const content: unknown = JSON.parse(await readFile(file, "utf8"));
      sources.push({ sourceFile, content });
    } catch (err) {
      issues.push({
        level: "error",
        sourceFile,
        message: `Could not read JSON: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }
  return { sources, issues };
}
