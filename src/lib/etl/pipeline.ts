import { defaultAnalyzerConfig, type AnalyzerConfig } from "../config";
import type { Dataset, LabRecord } from "../import/types";
import { validateRecord } from "../validation/domain";
import type { DatasetStore } from "./store";

export type EtlSummary = {
  tableName: string;
  totalRecords: number;
  validRecords: number;
  failedRecords: number;
  /** Fraction of records that passed validation, 0 for an empty input. */
  passRate: number;
  errors: string[];
};

export type TransformOptions = {
  config?: AnalyzerConfig;
  requiredFields?: string[];
  now?: () => Date;
};

export type EtlOptions = TransformOptions & {
  dataset: Dataset;
  store: DatasetStore;
  tableName?: string;
};

const auditColumns = ["validated_at", "validation_status"];

export const transformRecords = (
  dataset: Dataset,
  { config = defaultAnalyzerConfig, requiredFields = [], now = () => new Date() }: TransformOptions = {}
): { cleaned: Dataset; errors: string[] } => {
  const errors: string[] = [];
  const records: LabRecord[] = [];

  dataset.records.forEach((record, rowIndex) => {
    const validation = validateRecord(record, dataset.columns, { config, requiredFields });
    if (!validation.valid) {
      errors.push(`Row ${rowIndex}: ${validation.errors.join("; ")}`);
      return;
    }
    records.push({
      ...record,
      validated_at: now().toISOString(),
      validation_status: "PASS"
    });
  });

  const columns = [
    ...dataset.columns,
    ...auditColumns.filter((column) => !dataset.columns.includes(column))
  ];

  return {
    cleaned: { name: dataset.name, columns, records },
    errors
  };
};

export const runEtlPipeline = async ({
  dataset,
  store,
  tableName = "experiments",
  ...transformOptions
}: EtlOptions): Promise<EtlSummary> => {
  const totalRecords = dataset.records.length;
  console.info("[etl] extracted", { dataset: dataset.name, records: totalRecords });

  const { cleaned, errors } = transformRecords(dataset, transformOptions);
  const validRecords = cleaned.records.length;
  console.info("[etl] transformed", { valid: validRecords, total: totalRecords });

  if (validRecords === 0) {
    console.warn("[etl] no valid records to load", { dataset: dataset.name, tableName });
  } else {
    try {
      await store.save(tableName, cleaned);
    } catch (error) {
      console.error("[etl] load failed", {
        tableName,
        message: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
    console.info("[etl] loaded", { tableName, records: validRecords });
  }

  return {
    tableName,
    totalRecords,
    validRecords,
    failedRecords: totalRecords - validRecords,
    passRate: totalRecords === 0 ? 0 : validRecords / totalRecords,
    errors
  };
};
