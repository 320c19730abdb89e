import OpenAI, { type ClientOptions } from "openai";
import { isTransientStatus } from "../src/lib/summarize/retry";
import type { SummaryModel } from "./summarize/summarizer";

export class OpenAIError extends Error {
  status?: number;
  details?: string;
  retryable: boolean;

  constructor(message: string, status?: number, details?: string, network = false) {
    super(message);
    this.name = "OpenAIError";
    this.status = status;
    this.details = details;
    this.retryable = status === undefined ? network : isTransientStatus(status);
  }
}

export const toOpenAIError = (error: unknown): OpenAIError => {
  if (error instanceof OpenAIError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new OpenAIError("OpenAI request aborted", undefined, error.message);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new OpenAIError("OpenAI connection failed", undefined, error.message, true);
  }
  if (error instanceof OpenAI.APIError) {
    return new OpenAIError(`OpenAI ${error.status ?? "error"}`, error.status, error.message);
  }
  return new OpenAIError(
    "OpenAI call failed",
    undefined,
    error instanceof Error ? error.message : String(error)
  );
};

export type OpenAISummaryModelOptions = {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  maxCompletionTokens?: number;
  temperature?: number;
  /** Replaces the SDK transport; tests pass an in-process stand-in. */
  fetch?: ClientOptions["fetch"];
};

export const createOpenAISummaryModel = ({
  apiKey,
  model,
  timeoutMs = 25_000,
  maxCompletionTokens = 700,
  temperature = 0.3,
  fetch
}: OpenAISummaryModelOptions): SummaryModel => {
  // Retries are owned by the summarizer's policy.
  const client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0, fetch });

  return async (prompt, signal) => {
    let content: string;
    try {
      const completion = await client.chat.completions.create(
        {
          model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user }
          ],
          temperature,
          max_completion_tokens: maxCompletionTokens
        },
        { signal }
      );
      content = completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw toOpenAIError(error);
    }

    const summary = content.trim();
    if (!summary) {
      throw new OpenAIError("OpenAI returned an empty summary");
    }
    return summary;
  };
};
