import { z } from "zod";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default("gpt-4o-mini")),
  SUMMARY_MAX_ATTEMPTS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(10).default(3)
  ),
  SUMMARY_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(25_000)
  ),
  SUMMARY_MAX_INPUT_CHARS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(3_000)
  )
});

export type ServerConfig = {
  openaiApiKey?: string;
  openaiModel: string;
  summaryMaxAttempts: number;
  summaryTimeoutMs: number;
  summaryMaxInputChars: number;
};

export class ServerConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join("; ")}`);
    this.name = "ServerConfigError";
    this.issues = issues;
  }
}

export const loadServerConfig = (
  env: Record<string, string | undefined> = process.env
): ServerConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ServerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    openaiModel: parsed.data.OPENAI_MODEL,
    summaryMaxAttempts: parsed.data.SUMMARY_MAX_ATTEMPTS,
    summaryTimeoutMs: parsed.data.SUMMARY_TIMEOUT_MS,
    summaryMaxInputChars: parsed.data.SUMMARY_MAX_INPUT_CHARS
  };
};
