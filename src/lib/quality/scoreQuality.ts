import {
  defaultAnalyzerConfig,
  type AnalyzerConfig,
  type DomainField,
  type QualityWeights
} from "../config";
import {
  detectAnomalies,
  summarizeAnomalies,
  type Anomaly,
  type AnomalySummary
} from "../anomalies/detectAnomalies";
import { columnCells } from "../import/buildDataset";
import { isMissingCell } from "../import/cells";
import type { Dataset } from "../import/types";
import { resolveColumnType, type ColumnType } from "../profiling/columnTypes";
import { resolveDomainField, validateField } from "../validation/domain";

export type QualityGrade = "excellent" | "good" | "fair" | "poor" | "no-data";

export type QualityScores = {
  completeness: number;
  accuracy: number;
  consistency: number;
  uniqueness: number;
};

export type ColumnQuality = {
  column: string;
  type: ColumnType;
  domainField: DomainField | null;
  completeness: number;
  /** Share of present values matching the column type; null without values. */
  consistency: number | null;
  /** Share of checked values passing the domain rule; null for non-domain columns. */
  accuracy: number | null;
  presentValues: number;
  matchingValues: number;
  checkedValues: number;
  validValues: number;
};

export type QualityReport = {
  datasetName: string;
  rowCount: number;
  columnCount: number;
  empty: boolean;
  scores: QualityScores;
  weights: QualityWeights;
  overallScore: number;
  overallPercent: number;
  grade: QualityGrade;
  columns: ColumnQuality[];
  duplicateRowIndices: number[];
  anomalies: Anomaly[];
  anomalySummary: AnomalySummary;
};

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

export const weightedOverallScore = (scores: QualityScores, weights: QualityWeights): number => {
  const totalWeight =
    weights.completeness + weights.accuracy + weights.consistency + weights.uniqueness;
  if (totalWeight <= 0) {
    return 0;
  }
  const weighted =
    scores.completeness * weights.completeness +
    scores.accuracy * weights.accuracy +
    scores.consistency * weights.consistency +
    scores.uniqueness * weights.uniqueness;
  return clampUnit(weighted / totalWeight);
};

export const toPercent = (score: number): number => Math.round(score * 1000) / 10;

export const gradeFor = (percent: number, empty = false): QualityGrade => {
  if (empty) {
    return "no-data";
  }
  if (percent >= 90) {
    return "excellent";
  }
  if (percent >= 75) {
    return "good";
  }
  if (percent >= 60) {
    return "fair";
  }
  return "poor";
};

/** Row indices that repeat an earlier row exactly across every column. */
export const findDuplicateRows = (dataset: Dataset): number[] => {
  const seen = new Set<string>();
  const duplicates: number[] = [];
  dataset.records.forEach((record, rowIndex) => {
    const key = JSON.stringify(dataset.columns.map((column) => record[column] ?? null));
    if (seen.has(key)) {
      duplicates.push(rowIndex);
    } else {
      seen.add(key);
    }
  });
  return duplicates;
};

const scoreColumn = (dataset: Dataset, column: string, config: AnalyzerConfig): ColumnQuality => {
  const cells = columnCells(dataset, column);
  const typeInfo = resolveColumnType(column, cells, config);
  const domainField = resolveDomainField(column, config);

  let checkedValues = 0;
  let validValues = 0;
  if (domainField) {
    dataset.records.forEach((record) => {
      const value = record[column] ?? null;
      if (isMissingCell(value)) {
        return;
      }
      const validation = validateField(column, value, record, config);
      if (!validation) {
        return;
      }
      checkedValues += 1;
      if (validation.result.ok) {
        validValues += 1;
      }
    });
  }

  return {
    column,
    type: typeInfo.type,
    domainField,
    completeness: cells.length === 0 ? 0 : typeInfo.present / cells.length,
    consistency: typeInfo.present === 0 ? null : typeInfo.matching / typeInfo.present,
    accuracy: domainField && checkedValues > 0 ? validValues / checkedValues : null,
    presentValues: typeInfo.present,
    matchingValues: typeInfo.matching,
    checkedValues,
    validValues
  };
};

const emptyScores: QualityScores = {
  completeness: 0,
  accuracy: 0,
  consistency: 0,
  uniqueness: 0
};

export const scoreQuality = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig,
  anomalies: Anomaly[] = detectAnomalies(dataset, config)
): QualityReport => {
  const rowCount = dataset.records.length;
  const columnCount = dataset.columns.length;
  const empty = rowCount === 0 || columnCount === 0;
  const columns = dataset.columns.map((column) => scoreColumn(dataset, column, config));
  const duplicateRowIndices = findDuplicateRows(dataset);

  let scores = emptyScores;
  if (!empty) {
    const sumOf = (pick: (column: ColumnQuality) => number) =>
      columns.reduce((sum, column) => sum + pick(column), 0);
    const present = sumOf((column) => column.presentValues);
    const matching = sumOf((column) => column.matchingValues);
    const checked = sumOf((column) => column.checkedValues);
    const valid = sumOf((column) => column.validValues);

    scores = {
      completeness: present / (rowCount * columnCount),
      accuracy: checked === 0 ? 1 : valid / checked,
      consistency: present === 0 ? 1 : matching / present,
      uniqueness: 1 - duplicateRowIndices.length / rowCount
    };
  }

  const overallScore = empty ? 0 : weightedOverallScore(scores, config.weights);
  const overallPercent = toPercent(overallScore);

  return {
    datasetName: dataset.name,
    rowCount,
    columnCount,
    empty,
    scores,
    weights: config.weights,
    overallScore,
    overallPercent,
    grade: gradeFor(overallPercent, empty),
    columns,
    duplicateRowIndices,
    anomalies,
    anomalySummary: summarizeAnomalies(anomalies)
  };
};
