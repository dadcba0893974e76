import { describe, it, expect } from "vitest";
import { getTableName } from "drizzle-orm";
import { getTableConfig, type PgTable } from "drizzle-orm/pg-core";
import { CONSTRAINTS, genericInstance, genericInstanceLineage } from "@shared/schema";

function foreignKeysOf(table: PgTable) {
  return getTableConfig(table).foreignKeys.map((fk) => {
    const ref = fk.reference();
    return {
      name: fk.getName(),
      columns: ref.columns.map((c) => c.name),
      foreignTable: getTableName(ref.foreignTable),
      foreignColumns: ref.foreignColumns.map((c) => c.name),
    };
  });
}

describe("schema foreign keys", () => {
  it("ties instances to their template under the constraint name the boundary translates", () => {
    expect(foreignKeysOf(genericInstance)).toEqual([
      {
        name: CONSTRAINTS.instanceTemplate,
        columns: ["template_uuid"],
        foreignTable: "generic_template",
        foreignColumns: ["uuid"],
      },
    ]);
  });

  it("ties both ends of a lineage edge to existing instances", () => {
    expect(foreignKeysOf(genericInstanceLineage)).toEqual([
      {
        name: CONSTRAINTS.lineageParent,
        columns: ["parent_instance_uuid"],
        foreignTable: "generic_instance",
        foreignColumns: ["uuid"],
      },
      {
        name: CONSTRAINTS.lineageChild,
        columns: ["child_instance_uuid"],
        foreignTable: "generic_instance",
        foreignColumns: ["uuid"],
      },
    ]);
  });
});
