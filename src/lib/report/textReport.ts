import {
  anomalyMethods,
  formatNumber,
  type Anomaly,
  type AnomalyMethod
} from "../anomalies/detectAnomalies";
import type { QualityAnalysis } from "../quality/analyzer";
import type { QualityGrade, QualityReport } from "../quality/scoreQuality";

const RULE = "=".repeat(60);

export const methodTitles: Record<AnomalyMethod, string> = {
  "z-score": "Z-Score Outliers",
  iqr: "IQR Outliers",
  domain: "Domain Rule Violations"
};

export const gradeLabels: Record<QualityGrade, string> = {
  excellent: "EXCELLENT",
  good: "GOOD",
  fair: "FAIR",
  poor: "POOR",
  "no-data": "NO DATA"
};

const gradeAdvice: Record<QualityGrade, string> = {
  excellent: "Proceed with confidence",
  good: "Minor issues to address",
  fair: "Significant improvements needed",
  poor: "Major data cleaning required",
  "no-data": "Dataset has no rows to assess"
};

const percent = (value: number): string => `${(value * 100).toFixed(1)}%`;

const weightLabel = (weight: number): string => `${Math.round(weight * 100)}%`;

const formatValue = (anomaly: Anomaly): string =>
  typeof anomaly.value === "number" ? formatNumber(anomaly.value) : String(anomaly.value);

export const buildRecommendations = (report: QualityReport): string[] => {
  const recommendations: string[] = [];
  const totalCells = report.rowCount * report.columnCount;
  const missingCells = report.columns.reduce(
    (sum, column) => sum + (report.rowCount - column.presentValues),
    0
  );
  if (missingCells > 0 && totalCells > 0) {
    recommendations.push(
      `Address ${missingCells} missing values (${percent(missingCells / totalCells)} of data)`
    );
  }

  const violations = report.columns.reduce(
    (sum, column) => sum + (column.checkedValues - column.validValues),
    0
  );
  if (violations > 0) {
    recommendations.push(`Investigate ${violations} accuracy violations`);
  }
  if (report.anomalySummary.total > 0) {
    recommendations.push(`Review ${report.anomalySummary.total} detected anomalies`);
  }
  if (report.duplicateRowIndices.length > 0) {
    recommendations.push(`Remove ${report.duplicateRowIndices.length} duplicate records`);
  }

  recommendations.push(
    `Overall data quality: ${gradeLabels[report.grade]} - ${gradeAdvice[report.grade]}`
  );
  return recommendations;
};

const anomalySection = (report: QualityReport, limit: number): string[] => {
  const lines = ["ANOMALY DETECTION", RULE, `Total Anomalies Found: ${report.anomalySummary.total}`];
  if (report.anomalySummary.total === 0) {
    lines.push("No anomalies detected");
    return lines;
  }

  anomalyMethods.forEach((method) => {
    const found = report.anomalies.filter((anomaly) => anomaly.method === method);
    if (found.length === 0) {
      return;
    }
    lines.push("", `${methodTitles[method]}: ${found.length}`);
    found.slice(0, limit).forEach((anomaly) => {
      lines.push(`  - Row ${anomaly.rowIndex}, ${anomaly.column}: ${formatValue(anomaly)} (${anomaly.reason})`);
    });
    if (found.length > limit) {
      lines.push(`  ... and ${found.length - limit} more`);
    }
  });
  return lines;
};

export const renderTextReport = (
  analysis: QualityAnalysis,
  options: { generatedAt: Date; maxExamplesPerMethod?: number }
): string => {
  const { profile, report } = analysis;
  const limit = options.maxExamplesPerMethod ?? 5;
  const { overview } = profile;
  const names = overview.columns > 5
    ? `${profile.columns.slice(0, 5).map((column) => column.name).join(", ")}...`
    : profile.columns.map((column) => column.name).join(", ");

  const lines = [
    RULE,
    "LAB DATA QUALITY REPORT",
    RULE,
    `Dataset:           ${report.datasetName}`,
    `Analysis Date:     ${options.generatedAt.toISOString()}`,
    "",
    "DATASET OVERVIEW",
    RULE,
    `Rows:              ${overview.rows}`,
    `Columns:           ${overview.columns}`,
    `Missing Values:    ${overview.missingCells} (${percent(overview.missingRatio)})`,
    `Column Names:      ${names}`,
    "",
    "OVERALL QUALITY SCORE",
    RULE,
    `Score:             ${report.overallPercent.toFixed(1)}%`,
    `Grade:             ${gradeLabels[report.grade]}`,
    "",
    "QUALITY BREAKDOWN",
    RULE,
    `Completeness:      ${percent(report.scores.completeness)}  (Weight: ${weightLabel(report.weights.completeness)})`,
    `Accuracy:          ${percent(report.scores.accuracy)}  (Weight: ${weightLabel(report.weights.accuracy)})`,
    `Consistency:       ${percent(report.scores.consistency)}  (Weight: ${weightLabel(report.weights.consistency)})`,
    `Uniqueness:        ${percent(report.scores.uniqueness)}  (Weight: ${weightLabel(report.weights.uniqueness)})`,
    "",
    "COMPLETENESS ANALYSIS",
    RULE,
    ...profile.columns.map(
      (column) =>
        `${column.name.padEnd(20)} ${percent(column.completeness).padStart(6)} complete (${column.missing} missing)`
    ),
    "",
    ...anomalySection(report, limit),
    "",
    "RECOMMENDATIONS",
    RULE,
    ...buildRecommendations(report).map((item, index) => `${index + 1}. ${item}`),
    ""
  ];

  return lines.join("\n");
};
