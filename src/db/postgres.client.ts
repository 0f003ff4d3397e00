import { Client } from "pg";
import type { DbConfig } from "../config/tool.config";

/** The slice of pg.Client the readers use; tests pass an in-memory stand-in. */
export type Queryable = {
  query(sql: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
};

export async function withPgClient<T>(
  db: DbConfig,
  fn: (client: Client) => Promise<T>
): Promise<T> {
  const client = new Client({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
    ssl: db.ssl ? { rejectUnauthorized: false } : undefined,
  });

  await client.connect();
  try {
    return await fn(client);
  } finally {
    await client.end();
  }
}
