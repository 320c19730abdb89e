import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError, resolveAnalyzerConfig } from "../lib/config";
import type { Cell } from "../lib/import/types";
import { createQualityAnalyzer } from "../lib/quality/analyzer";
import {
  findDuplicateRows,
  gradeFor,
  scoreQuality,
  weightedOverallScore
} from "../lib/quality/scoreQuality";
import { captureError, datasetOf } from "./helpers";

const phRows = (): Cell[][] =>
  Array.from({ length: 1000 }, (_, index) => {
    if (index < 50) {
      return [`S${index}`, null];
    }
    if (index < 62) {
      return [`S${index}`, 15];
    }
    return [`S${index}`, 7 + (index % 10) / 10];
  });

describe("analyzer configuration", () => {
  it("defaults to weights that sum to one", () => {
    const { weights } = resolveAnalyzerConfig();

    expect(weights).toEqual({ completeness: 0.4, accuracy: 0.3, consistency: 0.2, uniqueness: 0.1 });
    expect(weights.completeness + weights.accuracy + weights.consistency + weights.uniqueness).toBeCloseTo(1, 10);
  });

  it("merges partial weight overrides", () => {
    expect(resolveAnalyzerConfig({ weights: { uniqueness: 0 } }).weights.uniqueness).toBe(0);
  });

  it("accepts relative weights above one", () => {
    const config = resolveAnalyzerConfig({
      weights: { completeness: 2, accuracy: 0, consistency: 0, uniqueness: 2 }
    });

    expect(config.weights).toEqual({ completeness: 2, accuracy: 0, consistency: 0, uniqueness: 2 });
  });

  it("rejects negative weights", () => {
    const error = captureError(() => resolveAnalyzerConfig({ weights: { completeness: -0.5 } }));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.issues[0]).toMatch(/^weights\.completeness: /);
  });

  it("rejects all-zero weights", () => {
    const error = captureError(() =>
      resolveAnalyzerConfig({
        weights: { completeness: 0, accuracy: 0, consistency: 0, uniqueness: 0 }
      })
    );

    expect(error instanceof ConfigError && error.issues).toEqual([
      "weights: At least one quality weight must be positive"
    ]);
  });
});

describe("scoreQuality", () => {
  it("scores the pH scenario", () => {
    const report = scoreQuality(datasetOf(["sample_id", "ph"], phRows()));

    expect(report.scores.completeness).toBeCloseTo(0.975, 10);
    expect(report.scores.accuracy).toBeCloseTo(938 / 950, 10);
    expect(report.scores.consistency).toBe(1);
    expect(report.scores.uniqueness).toBe(1);
    expect(report.overallPercent).toBe(98.6);
    expect(report.grade).toBe("excellent");
    expect(report.columns[1]).toMatchObject({
      column: "ph",
      domainField: "ph",
      presentValues: 950,
      checkedValues: 950,
      validValues: 938,
      completeness: 0.95
    });

    const domainAnomalies = report.anomalies.filter((anomaly) => anomaly.method === "domain");
    expect(domainAnomalies.map((anomaly) => anomaly.rowIndex)).toEqual(
      Array.from({ length: 12 }, (_, offset) => 50 + offset)
    );
    domainAnomalies.forEach((anomaly) => {
      expect(anomaly).toMatchObject({ column: "ph", value: 15, reason: "pH out of range" });
    });
    expect(report.anomalySummary.byMethod.domain).toBe(12);
  });

  it("keeps every score in the unit interval", () => {
    const report = scoreQuality(
      datasetOf(
        ["ph", "notes"],
        [
          [20, "x"],
          ["bad", null],
          [20, "x"]
        ]
      )
    );

    [...Object.values(report.scores), report.overallScore].forEach((score) => {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    });
  });

  it("is idempotent", () => {
    const dataset = datasetOf(["sample_id", "ph"], phRows());

    expect(scoreQuality(dataset)).toEqual(scoreQuality(dataset));
  });

  it("reports an empty dataset without dividing by zero", () => {
    const report = scoreQuality(datasetOf(["ph"], []));

    expect(report).toMatchObject({
      empty: true,
      rowCount: 0,
      overallScore: 0,
      overallPercent: 0,
      grade: "no-data",
      scores: { completeness: 0, accuracy: 0, consistency: 0, uniqueness: 0 }
    });
  });

  it("counts repeated rows against uniqueness", () => {
    const dataset = datasetOf(
      ["sample", "reading"],
      [
        ["A", 1],
        ["A", 1],
        ["B", 2],
        ["A", 1]
      ]
    );

    expect(findDuplicateRows(dataset)).toEqual([1, 3]);
    expect(scoreQuality(dataset).scores.uniqueness).toBe(0.5);
  });

  it("measures consistency against the column type", () => {
    const dataset = datasetOf(["batch"], [[1], [2], ["x"]]);

    expect(scoreQuality(dataset).scores.consistency).toBeCloseTo(2 / 3, 10);
  });

  it("applies custom weights", () => {
    const config = resolveAnalyzerConfig({
      weights: { completeness: 1, accuracy: 0, consistency: 0, uniqueness: 0 }
    });
    const report = scoreQuality(datasetOf(["a", "b"], [[1, null], [2, null]]), config);

    expect(report.overallScore).toBe(0.5);
    expect(report.grade).toBe("poor");
  });

  it("normalises weights by their sum", () => {
    const scores = { completeness: 1, accuracy: 0.5, consistency: 1, uniqueness: 1 };

    expect(weightedOverallScore(scores, { completeness: 0, accuracy: 2, consistency: 0, uniqueness: 2 }))
      .toBe(0.75);
  });

  it("grades by percentage band", () => {
    expect(gradeFor(90)).toBe("excellent");
    expect(gradeFor(89.9)).toBe("good");
    expect(gradeFor(75)).toBe("good");
    expect(gradeFor(60)).toBe("fair");
    expect(gradeFor(59.9)).toBe("poor");
    expect(gradeFor(100, true)).toBe("no-data");
  });
});

describe("createQualityAnalyzer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("profiles and scores with one configuration", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const analyzer = createQualityAnalyzer({ zScoreThreshold: 1.5 });
    const { profile, report } = analyzer.analyze(
      datasetOf(["reading"], [[10], [12], [11], [13], [1000]], "spike.csv")
    );

    expect(profile.overview.rows).toBe(5);
    expect(report.anomalySummary.byMethod).toEqual({ "z-score": 1, iqr: 1, domain: 0 });
    expect(info).toHaveBeenCalledWith(
      "[quality] analyzed",
      expect.objectContaining({ dataset: "spike.csv", rows: 5, anomalies: 2 })
    );
  });

  it("warns when there is nothing to score", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(createQualityAnalyzer().analyze(datasetOf(["ph"], [], "empty.csv")).report.empty).toBe(true);
    expect(warn).toHaveBeenCalledWith("[quality] dataset has no rows to score", { dataset: "empty.csv" });
  });
});
