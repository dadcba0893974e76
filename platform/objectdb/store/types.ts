export type Page<T> = Readonly<{
  items: readonly T[];
  total: number;
}>;

export type StoreReadOptions = Readonly<{
  limit?: number;
  offset?: number;
  includeDeleted?: boolean;
}>;

export type TypeKeyFilter = Readonly<{
  category?: string;
  type?: string;
  subtype?: string;
  version?: string;
  polymorphicDiscriminator?: string;
  status?: string;
}>;

export type TemplateFilter = TypeKeyFilter &
  Readonly<{
    instancePrefix?: string;
  }>;

export type InstanceFilter = TypeKeyFilter &
  Readonly<{
    templateUuid?: string;
    isSingleton?: boolean;
    name?: string;
  }>;

export type LineageFilter = Readonly<{
  parentInstanceUuid?: string;
  childInstanceUuid?: string;
  relationshipType?: string;
  status?: string;
}>;

export type AuditFilter = Readonly<{
  relTableUuid?: string;
  relTableEuid?: string;
}>;

export const MAX_PAGE_LIMIT = 1000;

export function clampLimit(limit?: number): number {
  if (limit == null) return 200;
  if (limit <= 0) return 1;
  return Math.min(limit, MAX_PAGE_LIMIT);
}

export function clampOffset(offset?: number): number {
  return offset != null && Number.isFinite(offset) && offset >= 0 ? Math.floor(offset) : 0;
}

/** Reads page after page until every matching row has been returned. */
export async function readAllPages<T>(
  read: (opts: StoreReadOptions) => Promise<Page<T>>,
  opts: Readonly<{ includeDeleted?: boolean }> = {},
): Promise<T[]> {
  const rows: T[] = [];
  for (;;) {
    const page = await read({ ...opts, limit: MAX_PAGE_LIMIT, offset: rows.length });
    rows.push(...page.items);
    if (page.items.length === 0 || rows.length >= page.total) return rows;
  }
}
