import { RetryError, withRetry, type RetryPolicy } from "../../src/lib/summarize/retry";
import type { SummarizeResult, SummaryMode } from "../../src/lib/summarize/types";
import { buildSummaryPrompt, type SummaryPrompt } from "./prompts";
import type { DocumentTextExtractor, SourceDocument } from "./textExtraction";

export type SummaryModel = (prompt: SummaryPrompt, signal?: AbortSignal) => Promise<string>;

export type ResearchSummarizerOptions = {
  model: SummaryModel;
  maxInputChars?: number;
  retry?: Partial<RetryPolicy>;
  extractor?: DocumentTextExtractor;
};

export class SummarizationError extends Error {
  mode: SummaryMode;
  attempts: number;
  retryable: boolean;

  constructor(
    message: string,
    { mode, attempts, retryable, cause }: {
      mode: SummaryMode;
      attempts: number;
      retryable: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause });
    this.name = "SummarizationError";
    this.mode = mode;
    this.attempts = attempts;
    this.retryable = retryable;
  }
}

/** Either text that is already extracted or raw bytes for the configured extractor. */
export type BatchDocument = { name: string; text: string } | SourceDocument;

export type BatchOutcome =
  | { name: string; ok: true; result: SummarizeResult }
  | { name: string; ok: false; error: string; attempts: number };

export type ResearchSummarizer = {
  summarize: (text: string, mode: SummaryMode, signal?: AbortSignal) => Promise<SummarizeResult>;
  summarizeDocument: (document: SourceDocument, mode: SummaryMode) => Promise<SummarizeResult>;
  summarizeBatch: (documents: BatchDocument[], mode: SummaryMode) => Promise<BatchOutcome[]>;
};

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createResearchSummarizer = ({
  model,
  maxInputChars = 3_000,
  retry = {},
  extractor
}: ResearchSummarizerOptions): ResearchSummarizer => {
  const summarize = async (
    text: string,
    mode: SummaryMode,
    signal?: AbortSignal
  ): Promise<SummarizeResult> => {
    if (!text.trim()) {
      throw new SummarizationError("There is no text to summarize.", {
        mode,
        attempts: 0,
        retryable: false
      });
    }

    const prompt = buildSummaryPrompt(text, mode, maxInputChars);
    try {
      const { value, attempts } = await withRetry(() => model(prompt, signal), retry);
      console.info("[summarize] summary complete", {
        mode,
        attempts,
        inputChars: prompt.inputChars,
        summaryChars: value.length
      });
      return {
        mode,
        summary: value,
        inputChars: prompt.inputChars,
        truncated: prompt.truncated,
        attempts
      };
    } catch (error) {
      if (error instanceof RetryError) {
        throw new SummarizationError(`Summarization failed: ${messageOf(error.cause)}`, {
          mode,
          attempts: error.attempts,
          retryable: error.retryable,
          cause: error.cause
        });
      }
      throw error;
    }
  };

  const extractText = async (document: SourceDocument, mode: SummaryMode): Promise<string> => {
    if (!extractor) {
      throw new SummarizationError("No document extractor is configured.", {
        mode,
        attempts: 0,
        retryable: false
      });
    }
    return extractor(document);
  };

  const summarizeDocument = async (
    document: SourceDocument,
    mode: SummaryMode
  ): Promise<SummarizeResult> => summarize(await extractText(document, mode), mode);

  const summarizeBatch = async (
    documents: BatchDocument[],
    mode: SummaryMode
  ): Promise<BatchOutcome[]> => {
    const outcomes: BatchOutcome[] = [];
    for (const document of documents) {
      try {
        const text = "bytes" in document ? await extractText(document, mode) : document.text;
        outcomes.push({ name: document.name, ok: true, result: await summarize(text, mode) });
      } catch (error) {
        console.error("[summarize] document failed", {
          document: document.name,
          mode,
          message: messageOf(error)
        });
        outcomes.push({
          name: document.name,
          ok: false,
          error: messageOf(error),
          attempts: error instanceof SummarizationError ? error.attempts : 0
        });
      }
    }

    const succeeded = outcomes.filter((outcome) => outcome.ok).length;
    console.info("[summarize] batch complete", {
      total: outcomes.length,
      succeeded,
      failed: outcomes.length - succeeded
    });
    return outcomes;
  };

  return { summarize, summarizeDocument, summarizeBatch };
};
