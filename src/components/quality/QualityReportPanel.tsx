import {
  anomalyMethods,
  formatNumber,
  type Anomaly
} from "../../lib/anomalies/detectAnomalies";
import type { QualityWeights } from "../../lib/config";
import type { QualityAnalysis } from "../../lib/quality/analyzer";
import type { QualityGrade } from "../../lib/quality/scoreQuality";
import { buildRecommendations, gradeLabels, methodTitles } from "../../lib/report/textReport";

type QualityReportPanelProps = {
  analysis: QualityAnalysis;
  maxExamplesPerMethod?: number;
};

const gradeTone: Record<QualityGrade, string> = {
  excellent: "status-clean",
  good: "status-done",
  fair: "status-warning",
  poor: "status-error",
  "no-data": "status-neutral"
};

const dimensionLabels: Record<keyof QualityWeights, string> = {
  completeness: "Completeness",
  accuracy: "Accuracy",
  consistency: "Consistency",
  uniqueness: "Uniqueness"
};

const dimensions: (keyof QualityWeights)[] = [
  "completeness",
  "accuracy",
  "consistency",
  "uniqueness"
];

const formatAnomalyValue = (anomaly: Anomaly): string =>
  typeof anomaly.value === "number" ? formatNumber(anomaly.value) : String(anomaly.value);

export const QualityReportPanel = ({ analysis, maxExamplesPerMethod = 5 }: QualityReportPanelProps) => {
  const { report } = analysis;

  return (
    <div className="quality-report">
      <header className="quality-header">
        <div>
          <h3>Quality report</h3>
          <p className="meta">
            Rows: {report.rowCount} · Columns: {report.columnCount} · Anomalies:{" "}
            {report.anomalySummary.total}
          </p>
        </div>
        <span className={`status-pill ${gradeTone[report.grade]}`}>
          {gradeLabels[report.grade]}
        </span>
      </header>

      <p className="overall-score">
        Overall score: <strong>{report.overallPercent.toFixed(1)}%</strong>
      </p>

      <table className="score-table">
        <thead>
          <tr>
            <th>Dimension</th>
            <th>Score</th>
            <th>Weight</th>
          </tr>
        </thead>
        <tbody>
          {dimensions.map((dimension) => (
            <tr key={dimension}>
              <td>{dimensionLabels[dimension]}</td>
              <td>{(report.scores[dimension] * 100).toFixed(1)}%</td>
              <td>{Math.round(report.weights[dimension] * 100)}%</td>
            </tr>
          ))}
        </tbody>
      </table>

      <div className="quality-body">
        <h4>Anomalies</h4>
        {report.anomalySummary.total === 0 ? (
          <p className="meta">No anomalies detected.</p>
        ) : (
          anomalyMethods
            .filter((method) => report.anomalySummary.byMethod[method] > 0)
            .map((method) => {
              const found = report.anomalies.filter((anomaly) => anomaly.method === method);
              return (
                <section key={method} className="anomaly-group">
                  <h5>
                    {methodTitles[method]} ({found.length})
                  </h5>
                  <ul className="anomaly-list">
                    {found.slice(0, maxExamplesPerMethod).map((anomaly) => (
                      <li key={`${anomaly.rowIndex}-${anomaly.column}`}>
                        Row {anomaly.rowIndex}, {anomaly.column}: {formatAnomalyValue(anomaly)}{" "}
                        <span className="meta">({anomaly.reason})</span>
                      </li>
                    ))}
                  </ul>
                  {found.length > maxExamplesPerMethod && (
                    <p className="meta">... and {found.length - maxExamplesPerMethod} more</p>
                  )}
                </section>
              );
            })
        )}

        <h4>Recommendations</h4>
        <ol className="recommendations">
          {buildRecommendations(report).map((item) => (
            <li key={item}>{item}</li>
          ))}
        </ol>
      </div>
    </div>
  );
};
