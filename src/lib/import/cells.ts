import type { Cell } from "./types";

export type CellKind = "numeric" | "text";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const commaDecimalPattern = /^-?\d+,\d+(?:[eE][+-]?\d+)?$/;

export const isMissingCell = (cell: Cell | undefined): cell is null | undefined => {
  if (cell === null || cell === undefined) {
    return true;
  }
  if (typeof cell === "number") {
    return Number.isNaN(cell);
  }
  return cell.trim().length === 0;
};

/**
 * Lenient numeric reading used by the domain validators: accepts numbers and
 * numeric strings, including comma decimals ("7,4").
 */
export const parseNumericCell = (value: Cell | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const cleaned = value.trim().replace(/\s+/g, "");
  if (!cleaned) {
    return null;
  }
  if (commaDecimalPattern.test(cleaned)) {
    const parsed = Number(cleaned.replace(",", "."));
    return Number.isNaN(parsed) ? null : parsed;
  }
  if (numericPattern.test(cleaned)) {
    const parsed = Number(cleaned);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
};

/** Storage kind of a present cell: parsed numbers are numeric, anything else is text. */
export const cellKind = (cell: Cell): CellKind | null => {
  if (isMissingCell(cell)) {
    return null;
  }
  return typeof cell === "number" ? "numeric" : "text";
};

export const numericValues = (cells: Cell[]): number[] =>
  cells.filter((cell): cell is number => typeof cell === "number" && Number.isFinite(cell));
