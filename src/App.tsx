import { useMemo, useState } from "react";
import "./App.css";
import { JsonOutputBox } from "./components/common/JsonOutputBox";
import { ColumnProfileTable } from "./components/quality/ColumnProfileTable";
import { QualityReportPanel } from "./components/quality/QualityReportPanel";
import { SummaryPanel } from "./components/summarize/SummaryPanel";
import { runEtlPipeline, type EtlSummary } from "./lib/etl/pipeline";
import { createInMemoryDatasetStore } from "./lib/etl/store";
import { buildDataset } from "./lib/import/buildDataset";
import { parseFile, type TableSource } from "./lib/import/parseFile";
import type { Dataset, RawTable } from "./lib/import/types";
import { createQualityAnalyzer, type QualityAnalysis } from "./lib/quality/analyzer";
import { renderTextReport } from "./lib/report/textReport";

type AnalyzedTable = {
  dataset: Dataset;
  analysis: QualityAnalysis;
  generatedAt: Date;
};

const tableLabel = (fileName: string, table: RawTable): string =>
  table.sheetName ? `${fileName} (${table.sheetName})` : fileName;

function App() {
  const analyzer = useMemo(() => createQualityAnalyzer(), []);
  const store = useMemo(() => createInMemoryDatasetStore(), []);
  const [fileName, setFileName] = useState<string | null>(null);
  const [rawTables, setRawTables] = useState<RawTable[]>([]);
  const [activeSheet, setActiveSheet] = useState<string | null>(null);
  const [analyzed, setAnalyzed] = useState<AnalyzedTable | null>(null);
  const [importError, setImportError] = useState<string | null>(null);
  const [etlSummary, setEtlSummary] = useState<EtlSummary | null>(null);
  const [etlError, setEtlError] = useState<string | null>(null);

  const analyzeTable = (name: string, table: RawTable) => {
    const dataset = buildDataset(table, tableLabel(name, table));
    setActiveSheet(table.sheetName ?? null);
    setAnalyzed({ dataset, analysis: analyzer.analyze(dataset), generatedAt: new Date() });
    setEtlSummary(null);
    setEtlError(null);
  };

  const handleFileUpload = async (file: TableSource) => {
    setImportError(null);
    setFileName(file.name);
    setRawTables([]);
    setAnalyzed(null);
    setEtlSummary(null);

    try {
      const result = await parseFile(file);
      setRawTables(result.rawTables);
      analyzeTable(file.name, result.activeTable);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown parse error.";
      console.error("[quality] import failed", { fileName: file.name, message });
      setImportError(message);
    }
  };

  const handleSheetChange = (sheetName: string) => {
    const table = rawTables.find((candidate) => candidate.sheetName === sheetName);
    if (!table || !fileName) {
      return;
    }
    setImportError(null);

    try {
      analyzeTable(fileName, table);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown parse error.";
      console.error("[quality] sheet import failed", { fileName, sheetName, message });
      setActiveSheet(sheetName);
      setAnalyzed(null);
      setEtlSummary(null);
      setImportError(message);
    }
  };

  const handleEtlRun = async () => {
    if (!analyzed) {
      return;
    }
    setEtlError(null);
    try {
      setEtlSummary(
        await runEtlPipeline({
          dataset: analyzed.dataset,
          store,
          config: analyzer.config
        })
      );
    } catch (error) {
      setEtlError(error instanceof Error ? error.message : "Validation run failed.");
    }
  };

  const textReport = analyzed
    ? renderTextReport(analyzed.analysis, {
        generatedAt: analyzed.generatedAt,
        maxExamplesPerMethod: analyzer.config.maxExamplesPerMethod
      })
    : "";

  return (
    <div className="app-shell">
      <header className="app-header">
        <h1>Lab Data Quality</h1>
        <p className="muted">
          Profile laboratory measurements, flag anomalies and score data quality.
        </p>
      </header>

      <main className="content-stack">
        <section className="panel upload-panel">
          <header className="panel-header">
            <div>
              <h2>Import</h2>
              <p className="muted">Upload a CSV or XLSX file with a header row.</p>
            </div>
            {fileName && <span className="pill info-pill">{fileName}</span>}
          </header>
          <label className="primary file-picker">
            Choose file
            <input
              type="file"
              accept=".csv,.xlsx"
              aria-label="Upload data file"
              onChange={(event) => {
                const file = event.target.files?.[0];
                if (file) {
                  void handleFileUpload(file);
                }
                event.target.value = "";
              }}
            />
          </label>
          {rawTables.length > 1 && (
            <label className="field">
              Sheet
              <select
                aria-label="Sheet"
                value={activeSheet ?? ""}
                onChange={(event) => handleSheetChange(event.target.value)}
              >
                {rawTables.map((table, index) => (
                  <option key={table.sheetName ?? index} value={table.sheetName ?? ""}>
                    {table.sheetName ?? `Sheet ${index + 1}`}
                  </option>
                ))}
              </select>
            </label>
          )}
          {importError && <div className="callout error-callout">{importError}</div>}
          {!analyzed && !importError && (
            <p className="meta">Upload a file to analyze its quality.</p>
          )}
        </section>

        {analyzed && (
          <>
            <section className="panel">
              <QualityReportPanel
                analysis={analyzed.analysis}
                maxExamplesPerMethod={analyzer.config.maxExamplesPerMethod}
              />
            </section>
            <section className="panel">
              <h2>Column profile</h2>
              <ColumnProfileTable columns={analyzed.analysis.profile.columns} />
            </section>
            <section className="panel">
              <header className="panel-header">
                <h2>Validation run</h2>
                <button
                  type="button"
                  className="primary"
                  onClick={() => {
                    void handleEtlRun();
                  }}
                >
                  Validate &amp; load
                </button>
              </header>
              {etlError && <div className="callout error-callout">{etlError}</div>}
              {etlSummary && (
                <div className="etl-summary">
                  <p>
                    Passed {etlSummary.validRecords} of {etlSummary.totalRecords} records (
                    {(etlSummary.passRate * 100).toFixed(1)}%).
                  </p>
                  {etlSummary.errors.length > 0 && (
                    <ul className="validation-findings">
                      {etlSummary.errors.map((message) => (
                        <li key={message}>{message}</li>
                      ))}
                    </ul>
                  )}
                </div>
              )}
            </section>
            <section className="panel">
              <JsonOutputBox title="Text report" value={textReport} />
              <JsonOutputBox title="Quality report (JSON)" value={analyzed.analysis.report} />
            </section>
          </>
        )}

        <SummaryPanel />
      </main>
    </div>
  );
}

export default App;
