// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadServerConfig, ServerConfigError, type ServerConfig } from "../../api/config";
import { OpenAIError } from "../../api/openai-client";
import { createSummarizePaperHandler, requestDeadlineMs } from "../../api/summarize-paper";
import type { SummaryModel } from "../../api/summarize/summarizer";
import type { ApiRequest } from "../../api/utils/http";
import { defaultRetryPolicy } from "../lib/summarize/retry";
import { captureError } from "./helpers";

const serverConfig: ServerConfig = {
  openaiApiKey: "test-key",
  openaiModel: "gpt-4o-mini",
  summaryMaxAttempts: 2,
  summaryTimeoutMs: 1000,
  summaryMaxInputChars: 3000
};

const makeRequest = (method: string, body?: unknown, chunks: string[] = []): ApiRequest => ({
  method,
  body,
  async *[Symbol.asyncIterator]() {
    for (const chunk of chunks) {
      yield chunk;
    }
  }
});

type ResponsePayload = {
  ok: boolean;
  requestId: string;
  error?: string;
  details?: string;
  result?: { mode: string; summary: string };
};

class FakeResponse {
  statusCode = 0;
  headers = new Map<string, string>();
  body = "";

  setHeader(name: string, value: string) {
    this.headers.set(name, value);
  }

  end(body: string) {
    this.body = body;
  }

  json(): ResponsePayload {
    return JSON.parse(this.body);
  }
}

const makeResponse = () => new FakeResponse();

const handlerWith = (model: SummaryModel, config: ServerConfig = serverConfig) =>
  createSummarizePaperHandler({
    loadConfig: () => config,
    createModel: () => model,
    sleep: async () => {}
  });

describe("summarize-paper handler", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the summary", async () => {
    const model = vi.fn<SummaryModel>(async () => "A friendly summary");
    const res = makeResponse();

    await handlerWith(model)(makeRequest("POST", { text: "Paper body", mode: "teaching" }), res);

    expect(res.statusCode).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("application/json");
    expect(res.json()).toMatchObject({
      ok: true,
      result: {
        mode: "teaching",
        summary: "A friendly summary",
        inputChars: 10,
        truncated: false,
        attempts: 1
      }
    });
    expect(typeof res.json().requestId).toBe("string");
  });

  it("defaults to the concise mode and reads streamed bodies", async () => {
    const model = vi.fn<SummaryModel>(async (prompt) => prompt.mode);
    const res = makeResponse();

    await handlerWith(model)(makeRequest("POST", undefined, ['{"text":', '"Paper body"}']), res);

    expect(res.statusCode).toBe(200);
    expect(res.json().result?.summary).toBe("concise");
  });

  it("rejects other methods", async () => {
    const res = makeResponse();

    await handlerWith(async () => "unused")(makeRequest("GET"), res);

    expect(res.statusCode).toBe(405);
    expect(res.json()).toMatchObject({ ok: false, error: "Method Not Allowed" });
  });

  it("rejects invalid bodies", async () => {
    const empty = makeResponse();
    const badMode = makeResponse();
    const badJson = makeResponse();
    const handler = handlerWith(async () => "unused");

    await handler(makeRequest("POST", { text: "  ", mode: "concise" }), empty);
    await handler(makeRequest("POST", { text: "Paper body", mode: "poem" }), badMode);
    await handler(makeRequest("POST", "{"), badJson);

    expect(empty.statusCode).toBe(400);
    expect(empty.json().details).toMatch(/^text: /);
    expect(badMode.statusCode).toBe(400);
    expect(badMode.json().details).toMatch(/^mode: /);
    expect(badJson.statusCode).toBe(400);
    expect(badJson.json()).toMatchObject({ ok: false, error: "Invalid request" });
  });

  it("fails without an API key", async () => {
    const model = vi.fn<SummaryModel>(async () => "unused");
    const res = makeResponse();

    await handlerWith(model, { ...serverConfig, openaiApiKey: undefined })(
      makeRequest("POST", { text: "Paper body" }),
      res
    );

    expect(res.statusCode).toBe(500);
    expect(res.json()).toMatchObject({ ok: false, error: "Missing OPENAI_API_KEY" });
    expect(model).not.toHaveBeenCalled();
  });

  it("retries an attempt that hit its own timeout", async () => {
    const timeoutMs = 40;
    const model = vi
      .fn<SummaryModel>()
      .mockImplementationOnce(
        (_prompt, signal) =>
          new Promise<string>((_resolve, reject) => {
            const timer = setTimeout(
              () => reject(new OpenAIError("OpenAI connection failed", undefined, "Request timed out.", true)),
              timeoutMs
            );
            signal?.addEventListener("abort", () => {
              clearTimeout(timer);
              reject(new OpenAIError("OpenAI request aborted"));
            });
          })
      )
      .mockResolvedValue("recovered");
    const res = makeResponse();

    await handlerWith(model, { ...serverConfig, summaryMaxAttempts: 3, summaryTimeoutMs: timeoutMs })(
      makeRequest("POST", { text: "Paper body" }),
      res
    );

    expect(res.statusCode).toBe(200);
    expect(res.json().result).toMatchObject({ summary: "recovered", attempts: 2 });
    expect(model).toHaveBeenCalledTimes(2);
  });

  it("reports model failures as a bad gateway", async () => {
    const model = vi
      .fn<SummaryModel>()
      .mockRejectedValue(new OpenAIError("OpenAI 401", 401, "Incorrect API key"));
    const res = makeResponse();

    await handlerWith(model)(makeRequest("POST", JSON.stringify({ text: "Paper body" })), res);

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({
      ok: false,
      error: "OpenAI call failed",
      details: "401 Incorrect API key"
    });
  });
});

describe("requestDeadlineMs", () => {
  it("covers every attempt and the backoff between them", () => {
    expect(requestDeadlineMs(25_000, { ...defaultRetryPolicy, maxAttempts: 3 })).toBe(76_500);
    expect(requestDeadlineMs(1_000, { ...defaultRetryPolicy, maxAttempts: 1 })).toBe(1_000);
  });
});

describe("loadServerConfig", () => {
  it("applies defaults", () => {
    expect(loadServerConfig({})).toEqual({
      openaiApiKey: undefined,
      openaiModel: "gpt-4o-mini",
      summaryMaxAttempts: 3,
      summaryTimeoutMs: 25000,
      summaryMaxInputChars: 3000
    });
  });

  it("reads and coerces environment values", () => {
    expect(
      loadServerConfig({
        OPENAI_API_KEY: " test-key ",
        OPENAI_MODEL: "gpt-4o",
        SUMMARY_MAX_ATTEMPTS: "5",
        SUMMARY_TIMEOUT_MS: "1000",
        SUMMARY_MAX_INPUT_CHARS: ""
      })
    ).toEqual({
      openaiApiKey: "test-key",
      openaiModel: "gpt-4o",
      summaryMaxAttempts: 5,
      summaryTimeoutMs: 1000,
      summaryMaxInputChars: 3000
    });
  });

  it("rejects invalid numbers", () => {
    const error = captureError(() => loadServerConfig({ SUMMARY_MAX_ATTEMPTS: "zero" }));

    expect(error).toBeInstanceOf(ServerConfigError);
    expect(error instanceof ServerConfigError && error.issues[0]).toMatch(/^SUMMARY_MAX_ATTEMPTS: /);
  });
});
