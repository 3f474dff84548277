import * as XLSX from "xlsx";
import { buildBuildingSchema } from "@/lib/buildings";
import { CONFIG } from "@/lib/config";
import { WorkbookError, errorMessage } from "@/lib/errors";
import type { LoadReport, LoadSheet, LoadedWorkbook, SheetRow, Timestamp } from "@/lib/types";

// Spreadsheet serial 25569 is 1970-01-01; the 1904 date system starts 1462 days later.
const SERIAL_UNIX_EPOCH = 25569;
const DATE1904_OFFSET_DAYS = 1462;
const SECONDS_PER_DAY = 86_400;

export type TimestampOptions = { date1904?: boolean };

const ISO_STAMP = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?$/;
const US_STAMP = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AaPp][Mm]))?)?$/;

function utcStamp(y: number, mo: number, d: number, h = 0, mi = 0, s = 0): Timestamp | null {
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59 || s > 59) return null;
  const ms = Date.UTC(y, mo - 1, d, h, mi, s);
  const back = new Date(ms);
  // rejects 2024-02-30 and friends, which Date.UTC would roll over
  if (back.getUTCFullYear() !== y || back.getUTCMonth() !== mo - 1 || back.getUTCDate() !== d) return null;
  return ms;
}

export function serialToTimestamp(serial: number, { date1904 = false }: TimestampOptions = {}): Timestamp | null {
  if (!Number.isFinite(serial) || serial <= 0) return null;
  const days = serial - SERIAL_UNIX_EPOCH + (date1904 ? DATE1904_OFFSET_DAYS : 0);
  return Math.round(days * SECONDS_PER_DAY) * 1000;
}

function parseTimestampText(text: string): Timestamp | null {
  const s = text.trim();
  let m = ISO_STAMP.exec(s);
  if (m) {
    const ms = utcStamp(+m[1], +m[2], +m[3], +(m[4] ?? 0), +(m[5] ?? 0), +(m[6] ?? 0));
    // fractional seconds round to the whole second, as serials do
    return ms === null ? null : ms + Math.round(Number(m[7] ?? 0)) * 1000;
  }
  m = US_STAMP.exec(s);
  if (m) {
    let hour = +(m[4] ?? 0);
    const meridiem = m[7]?.toUpperCase();
    if (meridiem) {
      if (hour < 1 || hour > 12) return null;
      hour = (hour % 12) + (meridiem === "PM" ? 12 : 0);
    }
    return utcStamp(+m[3], +m[1], +m[2], hour, +(m[5] ?? 0), +(m[6] ?? 0));
  }
  return null;
}

/**
 * Reads a Timestamp cell as a wall-clock instant (epoch ms, UTC-encoded).
 * Numbers are spreadsheet date serials in the workbook's date system; text may be
 * ISO-style or M/D/YYYY. Returns null for anything else.
 */
export function parseTimestamp(cell: unknown, options: TimestampOptions = {}): Timestamp | null {
  if (typeof cell === "number") return serialToTimestamp(cell, options);
  if (typeof cell === "string") return parseTimestampText(cell);
  return null;
}

export function parseLoadValue(cell: unknown): number | null {
  if (typeof cell === "number") return Number.isFinite(cell) ? cell : null;
  if (typeof cell === "string" && cell.trim() !== "") {
    const n = Number(cell.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function headerText(cell: unknown): string {
  return cell === null || cell === undefined ? "" : String(cell);
}

export function usesDate1904(book: XLSX.WorkBook): boolean {
  return book.Workbook?.WBProps?.date1904 === true;
}

/**
 * Loads one hourly sheet: rows with an unparseable Timestamp are dropped, the rest
 * sorted ascending. When a timestamp repeats, the first row in sheet order wins.
 */
export function loadSheet(book: XLSX.WorkBook, sheetName: string): { sheet: LoadSheet; report: LoadReport } {
  if (!book.SheetNames.includes(sheetName)) {
    throw new WorkbookError("missing-sheet", `Workbook has no sheet named "${sheetName}".`, sheetName);
  }
  const ws = book.Sheets[sheetName];
  const grid = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: null, blankrows: false });
  const [headerRow = [], ...body] = grid;

  const headers = headerRow.map(headerText);
  const tsKey = CONFIG.timestampColumn.toLowerCase();
  const tsIndex = headers.findIndex((h) => h.trim().toLowerCase() === tsKey);
  if (tsIndex < 0) {
    throw new WorkbookError(
      "missing-column",
      `Sheet "${sheetName}" has no "${CONFIG.timestampColumn}" column.`,
      sheetName,
    );
  }

  const valueCols = headers
    .map((name, index) => ({ name, index }))
    .filter((c) => c.index !== tsIndex && c.name.trim() !== "");

  const date1904 = usesDate1904(book);
  let invalidTimestamps = 0;
  const parsed: SheetRow[] = [];
  for (const row of body) {
    const timestamp = parseTimestamp(row[tsIndex], { date1904 });
    if (timestamp === null) {
      invalidTimestamps += 1;
      continue;
    }
    const values: Record<string, number | null> = {};
    for (const c of valueCols) {
      if (!(c.name in values)) values[c.name] = parseLoadValue(row[c.index]);
    }
    parsed.push({ timestamp, values });
  }

  parsed.sort((a, b) => a.timestamp - b.timestamp); // stable
  const rows: SheetRow[] = [];
  let duplicateTimestamps = 0;
  for (const row of parsed) {
    const prev = rows[rows.length - 1];
    if (prev !== undefined && prev.timestamp === row.timestamp) {
      duplicateTimestamps += 1;
      continue;
    }
    rows.push(row);
  }

  return {
    sheet: { name: sheetName, columns: valueCols.map((c) => c.name), rows },
    report: { sheet: sheetName, rowsRead: body.length, invalidTimestamps, duplicateTimestamps },
  };
}

export function loadWorkbook(book: XLSX.WorkBook): LoadedWorkbook {
  const chw = loadSheet(book, CONFIG.sheets.CHW);
  const mthw = loadSheet(book, CONFIG.sheets.MTHW);
  return {
    chw: chw.sheet,
    mthw: mthw.sheet,
    reports: [chw.report, mthw.report],
    schema: buildBuildingSchema(chw.sheet, mthw.sheet),
  };
}

export function parseWorkbook(data: ArrayBuffer): LoadedWorkbook {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(new Uint8Array(data), { type: "array", cellFormula: false, cellHTML: false });
  } catch (e) {
    throw new WorkbookError("unreadable", `Could not read workbook: ${errorMessage(e)}`);
  }
  return loadWorkbook(book);
}
