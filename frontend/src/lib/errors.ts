export type WorkbookErrorCode =
  | "unreadable"
  | "missing-sheet"
  | "missing-column"
  | "duplicate-column";

export class WorkbookError extends Error {
  readonly code: WorkbookErrorCode;
  readonly sheet?: string;

  constructor(code: WorkbookErrorCode, message: string, sheet?: string) {
    super(message);
    this.name = "WorkbookError";
    this.code = code;
    this.sheet = sheet;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
