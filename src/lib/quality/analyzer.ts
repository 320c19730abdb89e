import { detectAnomalies } from "../anomalies/detectAnomalies";
import {
  resolveAnalyzerConfig,
  type AnalyzerConfig,
  type AnalyzerConfigOverrides
} from "../config";
import type { Dataset } from "../import/types";
import { profileDataset, type DatasetProfile } from "../profiling/profileDataset";
import { scoreQuality, type QualityReport } from "./scoreQuality";

export type QualityAnalysis = {
  profile: DatasetProfile;
  report: QualityReport;
};

export type QualityAnalyzer = {
  config: AnalyzerConfig;
  analyze: (dataset: Dataset) => QualityAnalysis;
};

export const createQualityAnalyzer = (overrides: AnalyzerConfigOverrides = {}): QualityAnalyzer => {
  const config = resolveAnalyzerConfig(overrides);

  const analyze = (dataset: Dataset): QualityAnalysis => {
    const profile = profileDataset(dataset, config);
    const anomalies = detectAnomalies(dataset, config);
    const report = scoreQuality(dataset, config, anomalies);

    if (report.empty) {
      console.warn("[quality] dataset has no rows to score", { dataset: dataset.name });
    } else {
      console.info("[quality] analyzed", {
        dataset: dataset.name,
        rows: report.rowCount,
        columns: report.columnCount,
        anomalies: report.anomalySummary.total,
        overallPercent: report.overallPercent
      });
    }

    return { profile, report };
  };

  return { config, analyze };
};
