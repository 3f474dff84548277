import { CONFIG } from "@/lib/config";
import { WorkbookError } from "@/lib/errors";
import type { BuildingColumns, BuildingSchema, LoadSheet, SeriesKind } from "@/lib/types";

type SheetHeaders = Pick<LoadSheet, "name" | "columns">;

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Lazy prefix: the name ends at the first " <suffix> (kbtuh)" that closes the header.
function headerPattern(suffix: string): RegExp {
  return new RegExp(`^(.+?) ${escapeRegExp(suffix)} ${escapeRegExp(CONFIG.unitSuffix)}$`);
}

// Padding around the header cell is ignored; callers keep the raw text as the column key.
function matchHeader(column: string, pattern: RegExp): string | null {
  const m = pattern.exec(column.trim());
  return m ? m[1] : null;
}

/** Building names parsed from headers like "Library CHW (kbtuh)", in column order. */
export function extractBuildingNames(columns: readonly string[], suffix: string): string[] {
  const pattern = headerPattern(suffix);
  const names: string[] = [];
  for (const col of columns) {
    const name = matchHeader(col, pattern);
    if (name !== null) names.push(name);
  }
  return names;
}

export function commonBuildings(chwNames: readonly string[], mthwNames: readonly string[]): string[] {
  const mthw = new Set(mthwNames);
  return [...new Set(chwNames)].filter((n) => mthw.has(n)).sort();
}

const SERIES_TOKEN = /(^|\s)(CHW|MTHW)(\s|$)/;

function columnsByBuilding(sheet: SheetHeaders, kind: SeriesKind): Map<string, string> {
  const pattern = headerPattern(kind);
  const out = new Map<string, string>();
  for (const col of sheet.columns) {
    const name = matchHeader(col, pattern);
    if (name === null) continue;
    const seen = out.get(name);
    if (seen !== undefined) {
      throw new WorkbookError(
        "duplicate-column",
        `Sheet "${sheet.name}" has two ${kind} columns for building "${name}" ("${seen}" and "${col}").`,
        sheet.name,
      );
    }
    out.set(name, col);
  }
  return out;
}

/**
 * Maps every building to its CHW and MTHW column, once per load.
 *
 * Names that themselves contain a CHW/MTHW token are still accepted but listed in
 * `ambiguous`: the header convention cannot tell "Plant CHW" the building from a
 * mislabelled column.
 */
export function buildBuildingSchema(chw: SheetHeaders, mthw: SheetHeaders): BuildingSchema {
  const chwCols = columnsByBuilding(chw, "CHW");
  const mthwCols = columnsByBuilding(mthw, "MTHW");

  const names = commonBuildings([...chwCols.keys()], [...mthwCols.keys()]);
  const buildings: BuildingColumns[] = [];
  for (const building of names) {
    const chwColumn = chwCols.get(building);
    const mthwColumn = mthwCols.get(building);
    if (chwColumn !== undefined && mthwColumn !== undefined) {
      buildings.push({ building, chwColumn, mthwColumn });
    }
  }

  const all = new Set([...chwCols.keys(), ...mthwCols.keys()]);
  return {
    buildings,
    chwOnly: [...chwCols.keys()].filter((n) => !mthwCols.has(n)).sort(),
    mthwOnly: [...mthwCols.keys()].filter((n) => !chwCols.has(n)).sort(),
    ambiguous: [...all].filter((n) => SERIES_TOKEN.test(n)).sort(),
  };
}
