export type SeriesKind = "CHW" | "MTHW";

/** Epoch milliseconds of the sheet's wall-clock time, read as UTC. */
export type Timestamp = number;

export type LoadRecord = { timestamp: Timestamp; value: number | null };

export type SheetRow = {
  timestamp: Timestamp;
  values: Record<string, number | null>;
};

export type LoadSheet = {
  name: string;
  columns: string[]; // value columns, sheet order, Timestamp excluded
  rows: SheetRow[];  // ascending, one row per timestamp
};

export type LoadReport = {
  sheet: string;
  rowsRead: number;
  invalidTimestamps: number;
  duplicateTimestamps: number;
};

export type BuildingColumns = {
  building: string;
  chwColumn: string;
  mthwColumn: string;
};

export type BuildingSchema = {
  buildings: BuildingColumns[];
  chwOnly: string[];
  mthwOnly: string[];
  ambiguous: string[];
};

export type LoadedWorkbook = {
  chw: LoadSheet;
  mthw: LoadSheet;
  reports: [LoadReport, LoadReport];
  schema: BuildingSchema;
};

export type BuildingSeries = {
  building: string;
  kind: SeriesKind;
  records: LoadRecord[];
};

export type JoinedPair = {
  timestamp: Timestamp;
  chw: number | null;
  mthw: number | null;
};

export type JoinedRow = JoinedPair & {
  chwOn: boolean;
  mthwOn: boolean;
  simultaneous: boolean;
};

export type BuildingAnalysis = {
  building: string;
  threshold: number;
  rows: JoinedRow[];
  simultaneous: JoinedRow[];
  joinedHours: number;
  chwOnHours: number;
  mthwOnHours: number;
  simultaneousHours: number;
};

export type LoadPoint = {
  t: string; // ISO
  chw: number | null;
  mthw: number | null;
  highlight: number | null;
};
