import { defaultAnalyzerConfig, type AnalyzerConfig, type DomainField } from "../config";
import { columnCells } from "../import/buildDataset";
import { isMissingCell } from "../import/cells";
import type { Cell, Dataset } from "../import/types";
import { resolveColumnType } from "../profiling/columnTypes";
import { mean, quantile, sampleStdDev, sortAscending } from "../stats/descriptive";
import { resolveDomainField, validateField } from "../validation/domain";

export type AnomalyMethod = "z-score" | "iqr" | "domain";

export const anomalyMethods: AnomalyMethod[] = ["z-score", "iqr", "domain"];

type AnomalyBase = {
  rowIndex: number;
  column: string;
  value: Cell;
  reason: string;
};

export type ZScoreAnomaly = AnomalyBase & {
  method: "z-score";
  details: { zScore: number; mean: number; stdDev: number; threshold: number };
};

export type IqrAnomaly = AnomalyBase & {
  method: "iqr";
  details: {
    q1: number;
    q3: number;
    iqr: number;
    lowerBound: number;
    upperBound: number;
    direction: "below" | "above";
  };
};

export type DomainAnomaly = AnomalyBase & {
  method: "domain";
  details: { field: DomainField };
};

export type Anomaly = ZScoreAnomaly | IqrAnomaly | DomainAnomaly;

export type AnomalySummary = {
  total: number;
  byMethod: Record<AnomalyMethod, number>;
};

type NumericPoint = { rowIndex: number; value: number };

export const formatNumber = (value: number): string => Number(value.toFixed(3)).toString();

const numericPoints = (cells: Cell[]): NumericPoint[] =>
  cells.flatMap((cell, rowIndex) =>
    typeof cell === "number" && Number.isFinite(cell) ? [{ rowIndex, value: cell }] : []
  );

const numericColumns = (dataset: Dataset, config: AnalyzerConfig) =>
  dataset.columns
    .map((column) => ({ column, cells: columnCells(dataset, column) }))
    .filter(({ column, cells }) => resolveColumnType(column, cells, config).type === "numeric");

export const detectZScoreOutliers = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig
): ZScoreAnomaly[] =>
  numericColumns(dataset, config).flatMap(({ column, cells }) => {
    const points = numericPoints(cells);
    if (points.length < config.minValuesForZScore) {
      return [];
    }
    const values = points.map((point) => point.value);
    const average = mean(values);
    const stdDev = sampleStdDev(values);
    // Zero spread leaves the score undefined, so the column is skipped.
    if (average === null || stdDev === null || stdDev === 0) {
      return [];
    }

    return points.flatMap((point): ZScoreAnomaly[] => {
      const zScore = Math.abs(point.value - average) / stdDev;
      if (zScore <= config.zScoreThreshold) {
        return [];
      }
      return [
        {
          rowIndex: point.rowIndex,
          column,
          value: point.value,
          method: "z-score",
          reason: `|z| = ${zScore.toFixed(2)} exceeds ${config.zScoreThreshold}`,
          details: { zScore, mean: average, stdDev, threshold: config.zScoreThreshold }
        }
      ];
    });
  });

export const detectIqrOutliers = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig
): IqrAnomaly[] =>
  numericColumns(dataset, config).flatMap(({ column, cells }) => {
    const points = numericPoints(cells);
    if (points.length < config.minValuesForIqr) {
      return [];
    }
    const sorted = sortAscending(points.map((point) => point.value));
    const q1 = quantile(sorted, 0.25);
    const q3 = quantile(sorted, 0.75);
    if (q1 === null || q3 === null || q3 - q1 === 0) {
      return [];
    }
    const iqr = q3 - q1;
    const lowerBound = q1 - config.iqrMultiplier * iqr;
    const upperBound = q3 + config.iqrMultiplier * iqr;

    return points.flatMap((point): IqrAnomaly[] => {
      if (point.value >= lowerBound && point.value <= upperBound) {
        return [];
      }
      return [
        {
          rowIndex: point.rowIndex,
          column,
          value: point.value,
          method: "iqr",
          reason: `Outside IQR bounds [${formatNumber(lowerBound)}, ${formatNumber(upperBound)}]`,
          details: {
            q1,
            q3,
            iqr,
            lowerBound,
            upperBound,
            direction: point.value < lowerBound ? "below" : "above"
          }
        }
      ];
    });
  });

export const detectDomainViolations = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig
): DomainAnomaly[] =>
  dataset.columns
    .filter((column) => resolveDomainField(column, config) !== null)
    .flatMap((column) =>
      dataset.records.flatMap((record, rowIndex): DomainAnomaly[] => {
        const value = record[column] ?? null;
        if (isMissingCell(value)) {
          return [];
        }
        const validation = validateField(column, value, record, config);
        if (!validation || validation.result.ok) {
          return [];
        }
        return [
          {
            rowIndex,
            column,
            value,
            method: "domain",
            reason: validation.result.reason,
            details: { field: validation.field }
          }
        ];
      })
    );

/** Union of all tests; a value flagged by several tests appears once per test. */
export const detectAnomalies = (
  dataset: Dataset,
  config: AnalyzerConfig = defaultAnalyzerConfig
): Anomaly[] => [
  ...detectZScoreOutliers(dataset, config),
  ...detectIqrOutliers(dataset, config),
  ...detectDomainViolations(dataset, config)
];

export const summarizeAnomalies = (anomalies: Anomaly[]): AnomalySummary => {
  const byMethod: Record<AnomalyMethod, number> = { "z-score": 0, iqr: 0, domain: 0 };
  anomalies.forEach((anomaly) => {
    byMethod[anomaly.method] += 1;
  });
  return { total: anomalies.length, byMethod };
};
