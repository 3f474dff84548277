import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { WorkbookError } from "../errors";
import {
  loadSheet,
  loadWorkbook,
  parseLoadValue,
  parseTimestamp,
  parseWorkbook,
  serialToTimestamp,
  usesDate1904,
} from "../workbook";

function makeBook(sheets: Record<string, unknown[][]>): XLSX.WorkBook {
  const book = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return book;
}

function caught(fn: () => unknown): WorkbookError {
  try {
    fn();
  } catch (e) {
    if (e instanceof WorkbookError) return e;
    throw e;
  }
  throw new Error("expected a WorkbookError");
}

const JAN_1 = Date.UTC(2024, 0, 1);
const HOUR = 3_600_000;

describe("parseTimestamp", () => {
  it("reads spreadsheet date serials", () => {
    expect(serialToTimestamp(45292)).toBe(JAN_1);
    expect(parseTimestamp(45292.5)).toBe(JAN_1 + 12 * HOUR);
    expect(parseTimestamp(45292 + 13 / 24)).toBe(JAN_1 + 13 * HOUR);
  });

  it("reads 1904-system serials when asked", () => {
    expect(serialToTimestamp(43830, { date1904: true })).toBe(JAN_1);
    expect(parseTimestamp(43830 + 5 / 24, { date1904: true })).toBe(JAN_1 + 5 * HOUR);
  });

  it("rounds fractional seconds in text to the nearest second", () => {
    expect(parseTimestamp("2024-01-01 05:00:00.4")).toBe(JAN_1 + 5 * HOUR);
    expect(parseTimestamp("2024-01-01 05:00:00.6")).toBe(JAN_1 + 5 * HOUR + 1000);
    expect(parseTimestamp("2024-01-01 05:59:59.5")).toBe(JAN_1 + 6 * HOUR);
  });

  it("reads ISO-style text", () => {
    expect(parseTimestamp("2024-01-01 13:00")).toBe(JAN_1 + 13 * HOUR);
    expect(parseTimestamp("2024-01-01T13:00:00")).toBe(JAN_1 + 13 * HOUR);
    expect(parseTimestamp("2024-01-01")).toBe(JAN_1);
  });

  it("reads month-first text with an optional meridiem", () => {
    expect(parseTimestamp("1/2/2024 1:00 PM")).toBe(JAN_1 + 24 * HOUR + 13 * HOUR);
    expect(parseTimestamp("12/31/2023 12:00 AM")).toBe(Date.UTC(2023, 11, 31, 0));
    expect(parseTimestamp("01/01/2024 07:30")).toBe(JAN_1 + 7.5 * HOUR);
  });

  it("rejects impossible and unrecognised values", () => {
    expect(parseTimestamp("2024-02-30 00:00")).toBeNull();
    expect(parseTimestamp("2024-01-01 24:00")).toBeNull();
    expect(parseTimestamp("13/01/2024")).toBeNull();
    expect(parseTimestamp("0:00 PM 1/1/2024")).toBeNull();
    expect(parseTimestamp("not a date")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(true)).toBeNull();
    expect(parseTimestamp(-1)).toBeNull();
  });
});

describe("parseLoadValue", () => {
  it("keeps numbers and numeric text", () => {
    expect(parseLoadValue(812.5)).toBe(812.5);
    expect(parseLoadValue(" 640 ")).toBe(640);
  });

  it("turns blanks and text into null", () => {
    expect(parseLoadValue(null)).toBeNull();
    expect(parseLoadValue("")).toBeNull();
    expect(parseLoadValue("n/a")).toBeNull();
    expect(parseLoadValue(false)).toBeNull();
  });
});

describe("loadSheet", () => {
  const book = makeBook({
    "CHW hourly": [
      ["Timestamp", "Library CHW (kbtuh)", "Notes"],
      ["2024-01-01 02:00", 10, "a"],
      ["garbage", 99, "b"],
      ["2024-01-01 00:00", 5, "c"],
      ["2024-01-01 02:00", 20, "d"],
      [null, 1, "e"],
    ],
  });

  it("drops unparseable timestamps, sorts, and keeps the first of repeated timestamps", () => {
    const { sheet, report } = loadSheet(book, "CHW hourly");
    expect(sheet.rows.map((r) => r.timestamp)).toEqual([JAN_1, JAN_1 + 2 * HOUR]);
    expect(sheet.rows.map((r) => r.values["Library CHW (kbtuh)"])).toEqual([5, 10]);
    expect(report).toEqual({ sheet: "CHW hourly", rowsRead: 5, invalidTimestamps: 2, duplicateTimestamps: 1 });
  });

  it("keeps every value column except the timestamp", () => {
    const { sheet } = loadSheet(book, "CHW hourly");
    expect(sheet.columns).toEqual(["Library CHW (kbtuh)", "Notes"]);
    expect(sheet.rows[0].values["Notes"]).toBeNull();
  });

  it("matches the timestamp header ignoring case and padding", () => {
    const b = makeBook({ S: [[" timestamp ", "Gym CHW (kbtuh)"], [45292, 1]] });
    expect(loadSheet(b, "S").sheet.rows).toEqual([{ timestamp: JAN_1, values: { "Gym CHW (kbtuh)": 1 } }]);
  });

  it("fails on a missing sheet", () => {
    const e = caught(() => loadSheet(book, "MTHW hourly"));
    expect(e.code).toBe("missing-sheet");
    expect(e.sheet).toBe("MTHW hourly");
    expect(e.message).toBe('Workbook has no sheet named "MTHW hourly".');
  });

  it("fails on a missing timestamp column", () => {
    const b = makeBook({ "CHW hourly": [["Date", "Library CHW (kbtuh)"], [45292, 1]] });
    const e = caught(() => loadSheet(b, "CHW hourly"));
    expect(e.code).toBe("missing-column");
    expect(e.message).toBe('Sheet "CHW hourly" has no "Timestamp" column.');
  });

  it("returns an empty sheet when only the header is present", () => {
    const b = makeBook({ S: [["Timestamp", "Gym CHW (kbtuh)"]] });
    const { sheet, report } = loadSheet(b, "S");
    expect(sheet.rows).toEqual([]);
    expect(report.rowsRead).toBe(0);
  });
});

describe("loadWorkbook / parseWorkbook", () => {
  const sheets = {
    "CHW hourly": [
      ["Timestamp", "Library CHW (kbtuh)", "Annex CHW (kbtuh)"],
      [45292, 750, 100],
      [45292 + 1 / 24, 750, 100],
    ],
    "MTHW hourly": [
      ["Timestamp", "Library MTHW (kbtuh)"],
      [45292, 800],
      [45292 + 1 / 24, 650],
    ],
  };

  it("loads both sheets and builds the building schema", () => {
    const wb = loadWorkbook(makeBook(sheets));
    expect(wb.schema.buildings).toEqual([
      { building: "Library", chwColumn: "Library CHW (kbtuh)", mthwColumn: "Library MTHW (kbtuh)" },
    ]);
    expect(wb.schema.chwOnly).toEqual(["Annex"]);
    expect(wb.mthw.rows.map((r) => r.timestamp)).toEqual([JAN_1, JAN_1 + HOUR]);
  });

  it("reads serials in a 1904-dated workbook", () => {
    const book = makeBook({
      "CHW hourly": [["Timestamp", "Library CHW (kbtuh)"], [43830 + 5 / 24, 750]],
      "MTHW hourly": [["Timestamp", "Library MTHW (kbtuh)"], [43830 + 5 / 24, 800]],
    });
    book.Workbook = { WBProps: { date1904: true } };
    expect(usesDate1904(book)).toBe(true);
    const wb = loadWorkbook(book);
    expect(wb.chw.rows.map((r) => r.timestamp)).toEqual([JAN_1 + 5 * HOUR]);
    expect(wb.mthw.rows.map((r) => r.timestamp)).toEqual([JAN_1 + 5 * HOUR]);
  });

  it("keeps padded headers as column keys while matching buildings", () => {
    const wb = loadWorkbook(makeBook({
      "CHW hourly": [["Timestamp", "Library CHW (kbtuh) "], [45292, 750]],
      "MTHW hourly": [["Timestamp", "Library MTHW (kbtuh)"], [45292, 800]],
    }));
    expect(wb.schema.buildings).toEqual([
      { building: "Library", chwColumn: "Library CHW (kbtuh) ", mthwColumn: "Library MTHW (kbtuh)" },
    ]);
    expect(wb.schema.mthwOnly).toEqual([]);
    expect(wb.chw.rows[0].values["Library CHW (kbtuh) "]).toBe(750);
  });

  it("reads a written xlsx file", () => {
    const data: ArrayBuffer = XLSX.write(makeBook(sheets), { type: "array", bookType: "xlsx" });
    const wb = parseWorkbook(data);
    expect(wb.chw.rows.map((r) => r.values["Library CHW (kbtuh)"])).toEqual([750, 750]);
    expect(wb.mthw.rows.map((r) => r.values["Library MTHW (kbtuh)"])).toEqual([800, 650]);
    expect(wb.reports.map((r) => r.rowsRead)).toEqual([2, 2]);
  });

  it("fails when the MTHW sheet is absent", () => {
    const e = caught(() => loadWorkbook(makeBook({ "CHW hourly": sheets["CHW hourly"] })));
    expect(e.code).toBe("missing-sheet");
    expect(e.sheet).toBe("MTHW hourly");
  });

  it("fails with a WorkbookError on bytes that are not a workbook", () => {
    const junk = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x00, 0x01, 0x02]).buffer;
    expect(() => parseWorkbook(junk)).toThrowError(WorkbookError);
  });
});
