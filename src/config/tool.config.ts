export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl?: boolean;
};

export type ToolConfig = {
  port: number;
  maxUploadBytes: number;
  previewRows: number;
  sampleLimit: number;
  reportDir: string;
};

function env(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

function positiveInt(name: string, fallback: string): number {
  const raw = env(name, fallback);
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid env var ${name}: expected a positive integer, got "${raw}"`);
  }
  return n;
}

export function loadToolConfig(): ToolConfig {
  return {
    port: positiveInt("PLATFORM_PORT", "5050"),
    maxUploadBytes: positiveInt("MAX_UPLOAD_MB", "25") * 1024 * 1024,
    previewRows: positiveInt("PREVIEW_ROWS", "10"),
    sampleLimit: positiveInt("SAMPLE_LIMIT", "1000"),
    reportDir: env("REPORT_DIR", "."),
  };
}

/** Only needed when scanning a table; file scans never touch these. */
export function loadDbConfig(): DbConfig {
  return {
    host: env("PGHOST", "localhost"),
    port: Number(env("PGPORT", "5432")),
    user: env("PGUSER"),
    password: env("PGPASSWORD"),
    database: env("PGDATABASE"),
    ssl: env("PGSSLMODE", "").toLowerCase() === "require",
  };
}
