import { useState } from "react";
import { requestSummary } from "../../lib/summarize/api";
import {
  isSummaryMode,
  summaryModeLabels,
  summaryModes,
  type SummarizeRequest,
  type SummarizeResult,
  type SummaryMode
} from "../../lib/summarize/types";

type SummaryPanelProps = {
  request?: (payload: SummarizeRequest) => Promise<SummarizeResult>;
};

export const SummaryPanel = ({ request = requestSummary }: SummaryPanelProps) => {
  const [text, setText] = useState("");
  const [mode, setMode] = useState<SummaryMode>("concise");
  const [result, setResult] = useState<SummarizeResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  const handleSubmit = async () => {
    setLoading(true);
    setError(null);
    setResult(null);
    try {
      setResult(await request({ text, mode }));
    } catch (requestError) {
      const message =
        requestError instanceof Error ? requestError.message : "Summary request failed.";
      console.error("[summarize] request failed", { mode, message });
      setError(message);
    } finally {
      setLoading(false);
    }
  };

  return (
    <section className="panel summary-panel">
      <header className="panel-header">
        <div>
          <h2>Research summary</h2>
          <p className="muted">Paste a paper excerpt and choose how it should be summarized.</p>
        </div>
      </header>
      <label className="field">
        Paper text
        <textarea
          value={text}
          rows={8}
          onChange={(event) => setText(event.target.value)}
        />
      </label>
      <label className="field">
        Mode
        <select
          value={mode}
          onChange={(event) => {
            if (isSummaryMode(event.target.value)) {
              setMode(event.target.value);
            }
          }}
        >
          {summaryModes.map((option) => (
            <option key={option} value={option}>
              {summaryModeLabels[option]}
            </option>
          ))}
        </select>
      </label>
      <button
        type="button"
        className="primary"
        disabled={loading || text.trim().length === 0}
        onClick={() => {
          void handleSubmit();
        }}
      >
        {loading ? "Summarizing..." : "Summarize"}
      </button>
      {error && <div className="callout error-callout">{error}</div>}
      {result && (
        <div className="summary-result">
          {result.truncated && (
            <p className="meta">Only the first part of the text was sent for summarization.</p>
          )}
          <pre className="summary-text">{result.summary}</pre>
        </div>
      )}
    </section>
  );
};
