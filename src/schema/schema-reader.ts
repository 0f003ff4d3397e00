import type { Queryable } from "../db/postgres.client";
import { mapPgToGroup, type ColumnTypeGroup } from "./type-mapper";

export type ColumnInfo = {
  name: string;
  group: ColumnTypeGroup;
};

export type TableInfo = {
  schema: string;
  name: string;
  columns: ColumnInfo[];
};

export async function readTable(client: Queryable, schema: string, table: string): Promise<TableInfo> {
  const colsRes = await client.query(
    `
    SELECT column_name, data_type, udt_name
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position
  `,
    [schema, table]
  );

  if (colsRes.rows.length === 0) {
    throw new Error(`Table "${schema}.${table}" not found or has no columns`);
  }

  return {
    schema,
    name: table,
    columns: colsRes.rows.map((r) => ({
      name: String(r.column_name),
      group: mapPgToGroup(String(r.data_type), typeof r.udt_name === "string" ? r.udt_name : undefined),
    })),
  };
}
