import type { Timestamp } from "@/lib/types";

const pad = (n: number) => String(n).padStart(2, "0");

export function num(n?: number | null, digits = 1) {
  if (n === undefined || n === null || Number.isNaN(n)) return "—";
  return n.toFixed(digits);
}

/** "YYYY-MM-DD HH:MM:SS" of the stored wall-clock time. */
export function formatTimestamp(t: Timestamp): string {
  const d = new Date(t);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

export function isoTimestamp(t: Timestamp): string {
  return new Date(t).toISOString();
}

// Axis ticks and tooltips read the ISO string back without shifting it into the viewer's zone.
export const tickLabel = (t: unknown) => String(t).slice(5, 16).replace("T", " ");
export const tooltipLabel = (t: unknown) => String(t).slice(0, 16).replace("T", " ");
