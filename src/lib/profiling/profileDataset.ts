import { defaultAnalyzerConfig, type AnalyzerConfig } from "../config";
import { columnCells } from "../import/buildDataset";
import { isMissingCell, numericValues } from "../import/cells";
import type { Cell, Dataset } from "../import/types";
import {
  mean,
  median,
  quantile,
  sampleStdDev,
  skewness,
  sortAscending
} from "../stats/descriptive";
import { resolveColumnType, type ColumnType } from "./columnTypes";

export type DistributionShape =
  | "symmetric"
  | "right-skewed"
  | "left-skewed"
  | "constant"
  | "insufficient";

export type NumericSummary = {
  count: number;
  mean: number | null;
  median: number | null;
  /** Sample standard deviation; 0 when fewer than two values exist. */
  stdDev: number;
  min: number | null;
  max: number | null;
  q1: number | null;
  q3: number | null;
  skewness: number | null;
  shape: DistributionShape;
};

export type ColumnProfile = {
  name: string;
  type: ColumnType;
  declaredType: boolean;
  total: number;
  nonMissing: number;
  missing: number;
  completeness: number;
  uniqueCount: number;
  numeric: NumericSummary | null;
  insufficientData: boolean;
};

export type DatasetOverview = {
  rows: number;
  columns: number;
  totalCells: number;
  missingCells: number;
  missingRatio: number;
};

export type DatasetProfile = {
  overview: DatasetOverview;
  columns: ColumnProfile[];
};

const SYMMETRY_TOLERANCE = 0.5;

const classifyShape = (count: number, stdDev: number, skew: number | null): DistributionShape => {
  if (count < 3) {
    return "insufficient";
  }
  if (stdDev === 0 || skew === null) {
    return "constant";
  }
  if (Math.abs(skew) < SYMMETRY_TOLERANCE) {
    return "symmetric";
  }
  return skew > 0 ? "right-skewed" : "left-skewed";
};

export const summarizeNumeric = (values: number[]): NumericSummary => {
  const sorted = sortAscending(values);
  const stdDev = sampleStdDev(values) ?? 0;
  const skew = skewness(values);
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    stdDev,
    min: sorted.length > 0 ? sorted[0] : null,
    max: sorted.length > 0 ? sorted[sorted.length - 1] : null,
    q1: quantile(sorted, 0.25),
    q3: quantile(sorted, 0.75),
    skewness: skew,
    shape: classifyShape(values.length, stdDev, skew)
  };
};

const countUnique = (cells: Cell[]): number =>
  new Set(cells.filter((cell) => !isMissingCell(cell)).map((cell) => `${typeof cell}:${cell}`)).size;

export const profileColumn = (
  dataset: Dataset,
  column: string,
  config: AnalyzerConfig = defaultAnalyzerConfig
): ColumnProfile => {
  const cells = columnCells(dataset, column);
  const total = cells.length;
  const nonMissing = cells.filter((cell) => !isMissingCell(cell)).length;
  const typeInfo = resolveColumnType(column, cells, config);
  const numeric = typeInfo.type === "numeric" ? summarizeNumeric(numericValues(cells)) : null;

  return {
    name: column,
    type: typeInfo.type,
    declaredType: typeInfo.declared,
    total,
    nonMissing,
    missing: total - nonMissing,
    completeness: total === 0 ? 0 : nonMissing / total,
    uniqueCount: countUnique(cells),
    numeric,
    insufficientData: numeric !== null && numeric.count < 2
  };
};

export const profileDataset = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig
): DatasetProfile => {
  const columns = dataset.columns.map((column) => profileColumn(dataset, column, config));
  const totalCells = dataset.records.length * dataset.columns.length;
  const missingCells = columns.reduce((sum, column) => sum + column.missing, 0);

  return {
    overview: {
      rows: dataset.records.length,
      columns: dataset.columns.length,
      totalCells,
      missingCells,
      missingRatio: totalCells === 0 ? 0 : missingCells / totalCells
    },
    columns
  };
};
