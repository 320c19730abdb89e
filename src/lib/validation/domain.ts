import type { AnalyzerConfig, DomainField } from "../config";
import { isMissingCell, parseNumericCell } from "../import/cells";
import type { Cell, LabRecord } from "../import/types";

export type ValidationResult = { ok: true } | { ok: false; reason: string };

export type TemperatureUnit = "celsius" | "fahrenheit" | "kelvin";

export type FieldValidation = {
  column: string;
  field: DomainField;
  value: Cell;
  result: ValidationResult;
};

export type RecordValidation = {
  valid: boolean;
  errors: string[];
  fields: FieldValidation[];
};

export const PH_RANGE = { min: 0, max: 14 } as const;

export const ABSOLUTE_ZERO: Record<TemperatureUnit, number> = {
  celsius: -273.15,
  fahrenheit: -459.67,
  kelvin: 0
};

const unitAliases: Record<string, TemperatureUnit> = {
  c: "celsius",
  "°c": "celsius",
  celsius: "celsius",
  f: "fahrenheit",
  "°f": "fahrenheit",
  fahrenheit: "fahrenheit",
  k: "kelvin",
  kelvin: "kelvin"
};

const pass: ValidationResult = { ok: true };

const fail = (reason: string): ValidationResult => ({ ok: false, reason });

/** Missing unit cells default to Celsius; unrecognised labels resolve to null. */
export const resolveTemperatureUnit = (raw: Cell | undefined): TemperatureUnit | null => {
  if (isMissingCell(raw)) {
    return "celsius";
  }
  const key = String(raw).trim().toLowerCase();
  return Object.hasOwn(unitAliases, key) ? unitAliases[key] : null;
};

export const toCelsius = (value: number, unit: TemperatureUnit): number => {
  if (unit === "fahrenheit") {
    return ((value - 32) * 5) / 9;
  }
  if (unit === "kelvin") {
    return value - 273.15;
  }
  return value;
};

export const validatePh = (value: Cell): ValidationResult => {
  const numeric = parseNumericCell(value);
  if (numeric === null) {
    return fail("pH must be numeric");
  }
  if (numeric < PH_RANGE.min || numeric > PH_RANGE.max) {
    return fail("pH out of range");
  }
  return pass;
};

export const validateTemperature = (
  value: Cell,
  unit: Cell = "celsius",
  options: { maxCelsius?: number } = {}
): ValidationResult => {
  const resolvedUnit = resolveTemperatureUnit(unit);
  if (!resolvedUnit) {
    return fail(`Unknown temperature unit: ${String(unit).trim()}`);
  }
  const numeric = parseNumericCell(value);
  if (numeric === null) {
    return fail("Temperature must be numeric");
  }
  if (numeric < ABSOLUTE_ZERO[resolvedUnit]) {
    return fail("Temperature below absolute zero");
  }
  if (options.maxCelsius !== undefined && toCelsius(numeric, resolvedUnit) > options.maxCelsius) {
    return fail("Temperature above configured maximum");
  }
  return pass;
};

export const validateConcentration = (value: Cell): ValidationResult => {
  const numeric = parseNumericCell(value);
  if (numeric === null) {
    return fail("Concentration must be numeric");
  }
  if (numeric <= 0) {
    return fail("Concentration must be positive");
  }
  return pass;
};

export const resolveDomainField = (
  column: string,
  config: Pick<AnalyzerConfig, "fieldAliases" | "temperatureUnitColumn">
): DomainField | null => {
  if (Object.hasOwn(config.fieldAliases, column)) {
    return config.fieldAliases[column];
  }
  if (column === config.temperatureUnitColumn) {
    return null;
  }
  const normalized = column.trim().toLowerCase();
  if (/[\s_(-]units?\)?$/.test(normalized)) {
    return null;
  }
  if (normalized === "ph" || /^ph[\s_(-]/.test(normalized) || /[\s_]ph$/.test(normalized)) {
    return "ph";
  }
  if (/(^|[\s_(-])temp/.test(normalized)) {
    return "temperature";
  }
  if (/(^|[\s_(-])conc/.test(normalized)) {
    return "concentration";
  }
  return null;
};

export const validateField = (
  column: string,
  value: Cell,
  record: LabRecord,
  config: AnalyzerConfig
): FieldValidation | null => {
  const field = resolveDomainField(column, config);
  if (!field) {
    return null;
  }

  let result: ValidationResult;
  if (field === "ph") {
    result = validatePh(value);
  } else if (field === "temperature") {
    result = validateTemperature(value, record[config.temperatureUnitColumn] ?? null, {
      maxCelsius: config.maxTemperatureCelsius
    });
  } else {
    result = validateConcentration(value);
  }

  return { column, field, value, result };
};

export const formatCell = (value: Cell): string => (value === null ? "(missing)" : String(value));

export const validateRecord = (
  record: LabRecord,
  columns: string[],
  options: { config: AnalyzerConfig; requiredFields?: string[] }
): RecordValidation => {
  const errors: string[] = [];
  (options.requiredFields ?? []).forEach((field) => {
    if (!columns.includes(field) || isMissingCell(record[field])) {
      errors.push(`Missing required field: ${field}`);
    }
  });

  const fields = columns.flatMap((column) => {
    const value = record[column] ?? null;
    if (isMissingCell(value)) {
      return [];
    }
    const validation = validateField(column, value, record, options.config);
    return validation ? [validation] : [];
  });

  fields.forEach((validation) => {
    if (!validation.result.ok) {
      errors.push(`${validation.result.reason} (${validation.column}=${formatCell(validation.value)})`);
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    fields
  };
};
