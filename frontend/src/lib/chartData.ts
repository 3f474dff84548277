import { isoTimestamp } from "@/lib/format";
import type { JoinedRow, LoadPoint } from "@/lib/types";

/** Chart rows; `highlight` carries the CHW load only on simultaneous hours. */
export function toLoadPoints(rows: readonly JoinedRow[]): LoadPoint[] {
  return rows.map((r) => ({
    t: isoTimestamp(r.timestamp),
    chw: r.chw,
    mthw: r.mthw,
    highlight: r.simultaneous ? r.chw : null,
  }));
}
