export type Cell = string | number | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: Cell[][];
};

/** One row of lab data keyed by column name. Identity is its index in the dataset. */
export type LabRecord = Record<string, Cell>;

export type Dataset = {
  name: string;
  columns: string[];
  records: LabRecord[];
};

export type InputErrorCode = "EMPTY_FILE" | "UNSUPPORTED_FILE" | "MISSING_HEADER" | "UNREADABLE";

export class InputError extends Error {
  code: InputErrorCode;

  constructor(code: InputErrorCode, message: string) {
    super(message);
    this.name = "InputError";
    this.code = code;
  }
}
