import { formatTimestamp } from "@/lib/format";
import type { JoinedRow } from "@/lib/types";

export const CSV_HEADER = ["datetime", "CHW", "MTHW"] as const;

export type ExportRow = { datetime: string; CHW: number | null; MTHW: number | null };

function field(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

const numField = (n: number | null) => (n === null ? "" : String(n));

export function toExportRow(row: Pick<JoinedRow, "timestamp" | "chw" | "mthw">): ExportRow {
  return { datetime: formatTimestamp(row.timestamp), CHW: row.chw, MTHW: row.mthw };
}

/** CSV of the simultaneous hours: datetime,CHW,MTHW with a trailing newline. */
export function toSimultaneousCsv(rows: readonly JoinedRow[]): string {
  const lines = [CSV_HEADER.join(",")];
  for (const r of rows) {
    if (!r.simultaneous) continue;
    const e = toExportRow(r);
    lines.push([field(e.datetime), numField(e.CHW), numField(e.MTHW)].join(","));
  }
  return lines.join("\n") + "\n";
}

export function exportFileName(building: string): string {
  return `simultaneous_${building.split(" ").join("_")}.csv`;
}
