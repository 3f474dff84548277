import type {
  BuildingAnalysis,
  BuildingColumns,
  BuildingSeries,
  JoinedPair,
  JoinedRow,
  LoadSheet,
  LoadedWorkbook,
  SeriesKind,
} from "@/lib/types";

export function buildingSeries(sheet: LoadSheet, column: string, building: string, kind: SeriesKind): BuildingSeries {
  return {
    building,
    kind,
    records: sheet.rows.map((r) => ({ timestamp: r.timestamp, value: r.values[column] ?? null })),
  };
}

/** Inner join on exact timestamp; output follows the CHW series order. */
export function joinSeries(chw: BuildingSeries, mthw: BuildingSeries): JoinedPair[] {
  const mthwByTime = new Map<number, number | null>();
  for (const r of mthw.records) {
    if (!mthwByTime.has(r.timestamp)) mthwByTime.set(r.timestamp, r.value);
  }
  const out: JoinedPair[] = [];
  for (const r of chw.records) {
    const m = mthwByTime.get(r.timestamp);
    if (m === undefined) continue;
    out.push({ timestamp: r.timestamp, chw: r.value, mthw: m });
  }
  return out;
}

/** Strictly above: a load equal to the threshold is off, a missing one never on. */
export function isOn(value: number | null, threshold: number): boolean {
  return value !== null && value > threshold;
}

export function flagRows(pairs: readonly JoinedPair[], threshold: number): JoinedRow[] {
  return pairs.map((p) => {
    const chwOn = isOn(p.chw, threshold);
    const mthwOn = isOn(p.mthw, threshold);
    return { ...p, chwOn, mthwOn, simultaneous: chwOn && mthwOn };
  });
}

export function simultaneousRows(rows: readonly JoinedRow[]): JoinedRow[] {
  return rows.filter((r) => r.simultaneous);
}

export function analyzeBuilding(
  workbook: Pick<LoadedWorkbook, "chw" | "mthw">,
  columns: BuildingColumns,
  threshold: number,
): BuildingAnalysis {
  const chw = buildingSeries(workbook.chw, columns.chwColumn, columns.building, "CHW");
  const mthw = buildingSeries(workbook.mthw, columns.mthwColumn, columns.building, "MTHW");
  const rows = flagRows(joinSeries(chw, mthw), threshold);
  const simultaneous = simultaneousRows(rows);

  return {
    building: columns.building,
    threshold,
    rows,
    simultaneous,
    joinedHours: rows.length,
    chwOnHours: rows.filter((r) => r.chwOn).length,
    mthwOnHours: rows.filter((r) => r.mthwOn).length,
    simultaneousHours: simultaneous.length,
  };
}
