import { z } from "zod";
import { REPORT_FORMATS, type ReportFormat } from "../reporting/report-writer";

export type CliMode = "scan" | "table";

export type CliArgs = {
  mode: CliMode;
  /** file path for "scan", schema.table for "table" */
  target: string;
  out?: string;
  format: ReportFormat;
};

const FormatZ = z.enum(REPORT_FORMATS);

const MODE_FLAGS = new Map<string, CliMode>([
  ["--scan", "scan"],
  ["--table", "table"],
]);

const USAGE = "Use one of: --scan <file> | --table <schema.table> [--out <path>] [--format json|yaml|csv|xlsx]";

function valueAfter(argv: string[], i: number, flag: string): string {
  const v = argv[i + 1];
  if (v === undefined || v.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return v;
}

export function parseArgs(argv: string[]): CliArgs {
  const modes: { mode: CliMode; target: string }[] = [];
  let out: string | undefined;
  let format: ReportFormat = "json";

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const mode = MODE_FLAGS.get(flag);

    if (mode) {
      modes.push({ mode, target: valueAfter(argv, i, flag) });
      i++;
    } else if (flag === "--out") {
      out = valueAfter(argv, i, flag);
      i++;
    } else if (flag === "--format") {
      const parsed = FormatZ.safeParse(valueAfter(argv, i, flag));
      if (!parsed.success) {
        throw new Error(`Invalid --format "${argv[i + 1]}". Expected one of: ${REPORT_FORMATS.join(", ")}`);
      }
      format = parsed.data;
      i++;
    } else {
      throw new Error(`Unknown argument "${flag}". ${USAGE}`);
    }
  }

  if (modes.length === 0) {
    throw new Error(`No mode specified. ${USAGE}`);
  }

  if (modes.length > 1) {
    throw new Error("Multiple modes specified. Use only one of: --scan | --table");
  }

  return { ...modes[0], out, format };
}
