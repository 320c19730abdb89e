import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import { InputError, type RawTable } from "./types";

export type ParseFileResult = {
  rawTables: RawTable[];
  activeTable: RawTable;
  fileType: "csv" | "xlsx";
  sheetNames: string[];
};

export type TableSource = {
  name: string;
  text: () => Promise<string>;
  arrayBuffer: () => Promise<ArrayBuffer>;
};

export const fileExtension = (name: string): string =>
  name.includes(".") ? name.split(".").pop()?.toLowerCase() ?? "" : "";

/** Parses a browser `File` or anything exposing the same readers. */
export const parseFile = async (file: TableSource): Promise<ParseFileResult> => {
  const extension = fileExtension(file.name);
  if (extension === "csv") {
    const table = parseCsvText(await file.text());
    return {
      rawTables: [table],
      activeTable: table,
      fileType: "csv",
      sheetNames: []
    };
  }

  if (extension === "xlsx") {
    const tables = parseXlsxBuffer(await file.arrayBuffer());
    if (tables.length === 0) {
      throw new InputError("EMPTY_FILE", "No sheets detected in the XLSX file.");
    }
    return {
      rawTables: tables,
      activeTable: tables[0],
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new InputError(
    "UNSUPPORTED_FILE",
    "Unsupported file type. Please upload a .csv or .xlsx file."
  );
};
