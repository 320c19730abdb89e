import { isSummaryMode, type SummarizeRequest, type SummarizeResult } from "./types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const parseResult = (value: unknown): SummarizeResult | null => {
  if (!isRecord(value) || !isSummaryMode(value.mode) || typeof value.summary !== "string") {
    return null;
  }
  return {
    mode: value.mode,
    summary: value.summary,
    inputChars: typeof value.inputChars === "number" ? value.inputChars : 0,
    truncated: value.truncated === true,
    attempts: typeof value.attempts === "number" ? value.attempts : 1
  };
};

const errorMessage = (payload: unknown, fallback: string): string => {
  if (isRecord(payload) && typeof payload.error === "string") {
    return typeof payload.details === "string" && payload.details
      ? `${payload.error}: ${payload.details}`
      : payload.error;
  }
  return fallback || "Request failed";
};

const handleResponse = async (response: Response): Promise<SummarizeResult> => {
  const text = await response.text();
  let payload: unknown = null;
  try {
    payload = text ? JSON.parse(text) : null;
  } catch (error) {
    console.warn("[summarize] non-JSON response", {
      status: response.status,
      message: error instanceof Error ? error.message : String(error)
    });
    throw new Error(text || "Request failed");
  }

  const result = isRecord(payload) && payload.ok === true ? parseResult(payload.result) : null;
  if (!response.ok || !result) {
    throw new Error(errorMessage(payload, text));
  }
  return result;
};

export const requestSummary = async (payload: SummarizeRequest): Promise<SummarizeResult> => {
  const response = await fetch("/api/summarize-paper", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload)
  });
  return handleResponse(response);
};
