import { render, screen, within } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ColumnProfileTable } from "../components/quality/ColumnProfileTable";
import { QualityReportPanel } from "../components/quality/QualityReportPanel";
import { createQualityAnalyzer } from "../lib/quality/analyzer";
import { datasetOf } from "./helpers";

const analyze = () =>
  createQualityAnalyzer({ columnTypes: { sample_id: "text" } }).analyze(
    datasetOf(
      ["sample_id", "ph"],
      [
        ["S1", 7],
        ["S2", 15],
        ["S3", null],
        ["S3", null]
      ],
      "runs.csv"
    )
  );

describe("QualityReportPanel", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("shows the overall score, grade and anomalies", () => {
    render(<QualityReportPanel analysis={analyze()} />);

    expect(screen.getByText("72.5%")).toBeInTheDocument();
    expect(screen.getByText("FAIR")).toBeInTheDocument();
    expect(screen.getByText("Domain Rule Violations (1)")).toBeInTheDocument();
    expect(screen.getByText("Row 1, ph: 15")).toBeInTheDocument();
    expect(screen.getByText("(pH out of range)")).toBeInTheDocument();
  });

  it("lists recommendations", () => {
    render(<QualityReportPanel analysis={analyze()} />);

    expect(screen.getByText("Remove 1 duplicate records")).toBeInTheDocument();
    expect(
      screen.getByText("Overall data quality: FAIR - Significant improvements needed")
    ).toBeInTheDocument();
  });
});

describe("ColumnProfileTable", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("renders one row per column", () => {
    render(<ColumnProfileTable columns={analyze().profile.columns} />);

    const rows = screen.getAllByRole("row");
    expect(rows).toHaveLength(3);
    expect(within(rows[1]).getByText("declared")).toBeInTheDocument();
    expect(within(rows[2]).getByText("50.0%")).toBeInTheDocument();
    expect(within(rows[2]).getByText("11")).toBeInTheDocument();
  });

  it("handles a dataset without columns", () => {
    render(<ColumnProfileTable columns={[]} />);

    expect(screen.getByText("No columns to profile.")).toBeInTheDocument();
  });
});
