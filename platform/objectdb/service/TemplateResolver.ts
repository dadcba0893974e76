import type { Template } from "@shared/schema";
import type { StoreSession, TemplateFilter, Page, StoreReadOptions } from "../store";
import { TemplateIntegrityError, TemplateNotFound } from "./errors";

export type TemplateKey = Readonly<{
  category: string;
  type: string;
  subtype: string;
  version: string;
}>;

export function normalizeTemplateCode(code: string): string {
  const trimmed = code.trim();
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

/** Parses `category/type/subtype/version` (trailing slash allowed). */
export function parseTemplateCode(code: string): TemplateKey | undefined {
  const parts = normalizeTemplateCode(code).split("/");
  if (parts.length !== 4 || parts.some((p) => p.trim() === "")) return undefined;
  const [category, type, subtype, version] = parts;
  return { category, type, subtype, version };
}

export function templateCodeOf(key: TemplateKey): string {
  return `${key.category}/${key.type}/${key.subtype}/${key.version}`;
}

/**
 * Resolves template codes and identifiers to live template rows.
 *
 * The cache only remembers which uuid a code or euid points at; the row is
 * always re-read through the caller's session, so a template deleted since
 * it was cached is never served.
 */
export class TemplateResolver {
  private readonly uuidByCode = new Map<string, string>();
  private readonly uuidByEuid = new Map<string, string>();

  invalidateCache(): void {
    this.uuidByCode.clear();
    this.uuidByEuid.clear();
  }

  async resolve(session: StoreSession, code: string): Promise<Template> {
    const template = await this.find(session, code);
    if (!template) throw new TemplateNotFound(code);
    return template;
  }

  async find(session: StoreSession, code: string): Promise<Template | undefined> {
    const normalized = normalizeTemplateCode(code);
    const key = parseTemplateCode(normalized);
    if (!key) {
      console.warn(`[template-resolver] Malformed template code "${code}"`);
      return undefined;
    }

    const cached = this.uuidByCode.get(normalized);
    if (cached) {
      const row = await session.getTemplate(cached);
      if (row && !row.isDeleted) return row;
      this.uuidByCode.delete(normalized);
    }

    const page = await session.listTemplates(key);
    if (page.total > 1) {
      throw new TemplateIntegrityError(`${page.total} live templates share the code ${normalized}`);
    }
    const [row] = page.items;
    if (!row) return undefined;

    this.uuidByCode.set(normalized, row.uuid);
    this.uuidByEuid.set(row.euid, row.uuid);
    return row;
  }

  async resolveByIdentifier(session: StoreSession, euid: string): Promise<Template> {
    const cached = this.uuidByEuid.get(euid);
    const row = cached ? await session.getTemplate(cached) : await session.findTemplateByEuid(euid);
    if (!row || row.isDeleted) {
      this.uuidByEuid.delete(euid);
      throw new TemplateNotFound(euid);
    }
    this.uuidByEuid.set(euid, row.uuid);
    return row;
  }

  async resolveByUuid(session: StoreSession, uuid: string): Promise<Template> {
    const row = await session.getTemplate(uuid);
    if (!row || row.isDeleted) throw new TemplateNotFound(uuid);
    return row;
  }

  async list(session: StoreSession, filter: TemplateFilter = {}, opts?: StoreReadOptions): Promise<Page<Template>> {
    return session.listTemplates(filter, opts);
  }
}
