import type { Queryable } from "../db/postgres.client";
import type { CellValue, Dataset } from "../detector/detector.types";
import { readTable } from "../schema/schema-reader";
import { buildDataset, DatasetReadError } from "./dataset-builder";

function quoteIdent(ident: string): string {
  return `"${ident.replace(/"/g, '""')}"`;
}

/** Accepts "schema.table" or a bare table name in `public`. */
export function splitTable(full: string): { schema: string; name: string } {
  const parts = full.split(".");
  if (parts.length === 1 && parts[0]) return { schema: "public", name: parts[0] };
  if (parts.length === 2 && parts[0] && parts[1]) return { schema: parts[0], name: parts[1] };
  throw new DatasetReadError(`Invalid table name "${full}". Expected format: schema.table`);
}

function toCell(v: unknown): CellValue {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (v instanceof Date) return v;
  if (typeof v === "bigint") return v.toString();
  if (Buffer.isBuffer(v)) return v.toString("utf8");
  return JSON.stringify(v);
}

export async function readDatasetFromTable(
  client: Queryable,
  params: { table: string; limit: number }
): Promise<Dataset> {
  const { schema, name } = splitTable(params.table);
  const info = await readTable(client, schema, name);

  const res = await client.query(
    `SELECT * FROM ${quoteIdent(schema)}.${quoteIdent(name)} LIMIT $1`,
    [params.limit]
  );

  return buildDataset(
    info.columns.map((c) => ({
      name: c.name,
      dataType: c.group,
      values: res.rows.map((row) => toCell(row[c.name])),
    }))
  );
}
