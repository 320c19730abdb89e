import { z } from "zod";

export const domainFields = ["ph", "temperature", "concentration"] as const;

export type DomainField = (typeof domainFields)[number];

// Relative weights; the scorer divides by their sum.
const weightSchema = z.number().finite().min(0);

export const qualityWeightsSchema = z
  .object({
    completeness: weightSchema,
    accuracy: weightSchema,
    consistency: weightSchema,
    uniqueness: weightSchema
  })
  .strict()
  .refine(
    (weights) =>
      weights.completeness + weights.accuracy + weights.consistency + weights.uniqueness > 0,
    { message: "At least one quality weight must be positive" }
  );

export type QualityWeights = z.infer<typeof qualityWeightsSchema>;

export const analyzerConfigSchema = z
  .object({
    weights: qualityWeightsSchema,
    zScoreThreshold: z.number().positive(),
    iqrMultiplier: z.number().positive(),
    minValuesForZScore: z.number().int().min(2),
    minValuesForIqr: z.number().int().min(2),
    maxTemperatureCelsius: z.number().finite().optional(),
    temperatureUnitColumn: z.string().min(1),
    fieldAliases: z.record(z.enum(domainFields)),
    columnTypes: z.record(z.enum(["numeric", "text"])),
    maxExamplesPerMethod: z.number().int().positive()
  })
  .strict();

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;

export type AnalyzerConfigOverrides = Partial<Omit<AnalyzerConfig, "weights">> & {
  weights?: Partial<QualityWeights>;
};

export const defaultQualityWeights: QualityWeights = {
  completeness: 0.4,
  accuracy: 0.3,
  consistency: 0.2,
  uniqueness: 0.1
};

export const defaultAnalyzerConfig: AnalyzerConfig = {
  weights: defaultQualityWeights,
  zScoreThreshold: 3,
  iqrMultiplier: 1.5,
  minValuesForZScore: 3,
  minValuesForIqr: 4,
  temperatureUnitColumn: "temp_unit",
  fieldAliases: {},
  columnTypes: {},
  maxExamplesPerMethod: 5
};

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid analyzer configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const resolveAnalyzerConfig = (
  overrides: AnalyzerConfigOverrides = {}
): AnalyzerConfig => {
  const merged = {
    ...defaultAnalyzerConfig,
    ...overrides,
    weights: { ...defaultAnalyzerConfig.weights, ...overrides.weights }
  };
  const parsed = analyzerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
};
