import * as XLSX from "xlsx";
import { coerceCell } from "./parseCsv";
import type { Cell, RawTable } from "./types";

const normalizeCell = (value: unknown): Cell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return coerceCell(String(value));
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  rawHeaders.map((header, index) => {
    const label = normalizeCell(header);
    if (label === null) {
      return `Column ${index + 1}`;
    }
    return String(label);
  });

export const parseXlsxBuffer = (buffer: ArrayBuffer): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "array" });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      blankrows: false
    });

    const headers = buildHeaders(rows[0] ?? []);
    const dataRows = rows
      .slice(1)
      .map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return {
      sheetName,
      headers,
      rows: dataRows
    };
  });
};
