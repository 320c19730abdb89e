import { z } from "zod";
import { backoffDelay, defaultRetryPolicy, type RetryPolicy } from "../src/lib/summarize/retry";
import { summaryModes } from "../src/lib/summarize/types";
import { loadServerConfig, type ServerConfig } from "./config";
import { createOpenAISummaryModel, OpenAIError } from "./openai-client";
import {
  createResearchSummarizer,
  SummarizationError,
  type SummaryModel
} from "./summarize/summarizer";
import {
  createRequestId,
  logError,
  parseBody,
  sendJson,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";

export const config = {
  runtime: "nodejs"
};

const MAX_TEXT_LENGTH = 200_000;

const requestSchema = z.object({
  text: z.string().trim().min(1).max(MAX_TEXT_LENGTH),
  mode: z.enum(summaryModes).default("concise")
});

export type SummarizePaperDependencies = {
  loadConfig?: () => ServerConfig;
  createModel?: (apiKey: string, config: ServerConfig) => SummaryModel;
  sleep?: (ms: number) => Promise<void>;
};

const openAIModel = (apiKey: string, serverConfig: ServerConfig): SummaryModel =>
  createOpenAISummaryModel({
    apiKey,
    model: serverConfig.openaiModel,
    timeoutMs: serverConfig.summaryTimeoutMs
  });

/** Room for every attempt to hit its own timeout plus the backoff between them. */
export const requestDeadlineMs = (timeoutMs: number, policy: RetryPolicy): number => {
  let total = timeoutMs * policy.maxAttempts;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt += 1) {
    total += backoffDelay(policy, attempt);
  }
  return total;
};

const failureDetails = (error: SummarizationError): string => {
  const cause = error.cause;
  if (cause instanceof OpenAIError) {
    return `${cause.status ?? ""} ${cause.details ?? cause.message}`.trim();
  }
  return error.message;
};

export const createSummarizePaperHandler = ({
  loadConfig = () => loadServerConfig(),
  createModel = openAIModel,
  sleep
}: SummarizePaperDependencies = {}) =>
  async function handler(req: ApiRequest, res: ApiResponse) {
    const requestId = createRequestId();

    try {
      if (req.method !== "POST") {
        logError("summarize-paper", requestId, null, "Method Not Allowed");
        return sendJson(res, 405, { ok: false, error: "Method Not Allowed", requestId });
      }

      const parsedBody = await parseBody(req);
      if (!parsedBody.ok) {
        logError("summarize-paper", requestId, parsedBody.error, "Invalid request");
        return sendJson(res, 400, { ok: false, error: "Invalid request", requestId });
      }

      const validated = requestSchema.safeParse(parsedBody.body);
      if (!validated.success) {
        const details = validated.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; ");
        logError("summarize-paper", requestId, null, details);
        return sendJson(res, 400, { ok: false, error: "Invalid request", requestId, details });
      }

      const serverConfig = loadConfig();
      const { text, mode } = validated.data;
      console.info("[summarize-paper] start", { requestId, mode, textLength: text.length });

      if (!serverConfig.openaiApiKey) {
        logError("summarize-paper", requestId, null, "Missing OPENAI_API_KEY");
        return sendJson(res, 500, { ok: false, error: "Missing OPENAI_API_KEY", requestId });
      }

      const retry: RetryPolicy = {
        ...defaultRetryPolicy,
        maxAttempts: serverConfig.summaryMaxAttempts,
        ...(sleep ? { sleep } : {})
      };
      const summarizer = createResearchSummarizer({
        model: createModel(serverConfig.openaiApiKey, serverConfig),
        maxInputChars: serverConfig.summaryMaxInputChars,
        retry
      });

      // summaryTimeoutMs bounds each attempt inside the model; this bounds the whole request.
      const controller = new AbortController();
      const timeout = setTimeout(
        () => controller.abort(),
        requestDeadlineMs(serverConfig.summaryTimeoutMs, retry)
      );

      try {
        const result = await summarizer.summarize(text, mode, controller.signal);
        console.info("[summarize-paper] success", {
          requestId,
          mode,
          attempts: result.attempts,
          summaryLength: result.summary.length
        });
        return sendJson(res, 200, { ok: true, requestId, result });
      } catch (error) {
        if (error instanceof SummarizationError) {
          logError("summarize-paper", requestId, error, "OpenAI call failed");
          return sendJson(res, 502, {
            ok: false,
            error: "OpenAI call failed",
            requestId,
            details: failureDetails(error)
          });
        }
        throw error;
      } finally {
        clearTimeout(timeout);
      }
    } catch (error) {
      logError("summarize-paper", requestId, error, "Internal Server Error");
      return sendJson(res, 500, { ok: false, error: "Internal Server Error", requestId });
    }
  };

export default createSummarizePaperHandler();
