export const summaryModes = ["concise", "detailed", "teaching", "key_findings"] as const;

export type SummaryMode = (typeof summaryModes)[number];

export const isSummaryMode = (value: unknown): value is SummaryMode =>
  typeof value === "string" && summaryModes.some((mode) => mode === value);

export const summaryModeLabels: Record<SummaryMode, string> = {
  concise: "Concise technical summary",
  detailed: "Detailed section-by-section summary",
  teaching: "Student-friendly explanation",
  key_findings: "Key findings"
};

export type SummarizeRequest = {
  text: string;
  mode: SummaryMode;
};

export type SummarizeResult = {
  mode: SummaryMode;
  summary: string;
  inputChars: number;
  truncated: boolean;
  attempts: number;
};
