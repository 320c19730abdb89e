import type { AnalyzerConfig } from "../config";
import { cellKind, type CellKind } from "../import/cells";
import type { Cell } from "../import/types";

export type ColumnType = CellKind | "unknown";

export type ColumnTypeInfo = {
  type: ColumnType;
  declared: boolean;
  matching: number;
  present: number;
};

/**
 * Declared types win; otherwise the majority kind among present cells, with
 * numeric taking ties. Columns without any value stay "unknown".
 */
export const resolveColumnType = (
  column: string,
  cells: Cell[],
  config: Pick<AnalyzerConfig, "columnTypes">
): ColumnTypeInfo => {
  let numeric = 0;
  let text = 0;
  cells.forEach((cell) => {
    const kind = cellKind(cell);
    if (kind === "numeric") {
      numeric += 1;
    } else if (kind === "text") {
      text += 1;
    }
  });
  const present = numeric + text;

  if (Object.hasOwn(config.columnTypes, column)) {
    const declared = config.columnTypes[column];
    return {
      type: declared,
      declared: true,
      matching: declared === "numeric" ? numeric : text,
      present
    };
  }

  if (present === 0) {
    return { type: "unknown", declared: false, matching: 0, present };
  }
  const type: CellKind = numeric >= text ? "numeric" : "text";
  return {
    type,
    declared: false,
    matching: type === "numeric" ? numeric : text,
    present
  };
};
