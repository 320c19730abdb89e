import { InputError, type Cell, type RawTable } from "./types";

const numericPattern = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  const tabCount = (headerLine.match(/\t/g) ?? []).length;
  if (tabCount > commaCount && tabCount > semicolonCount) {
    return "\t";
  }
  return semicolonCount > commaCount ? ";" : ",";
};

const parseDelimitedLine = (line: string, delimiter: string): string[] => {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      const nextChar = line[index + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      result.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  result.push(current);
  return result;
};

const missingMarkers = new Set(["na", "n/a", "nan", "null", "none", "-"]);

export const coerceCell = (value: string): Cell => {
  const trimmed = value.trim();
  if (!trimmed || missingMarkers.has(trimmed.toLowerCase())) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return trimmed;
};

const buildHeaders = (rawHeaders: string[]): string[] =>
  rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });

export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const lines = sanitized.split("\n").filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new InputError("EMPTY_FILE", "CSV appears to be empty.");
  }

  const delimiter = detectDelimiter(lines[0]);
  const headers = buildHeaders(parseDelimitedLine(lines[0], delimiter));
  const rows = lines.slice(1).map((line) => {
    const rawValues = parseDelimitedLine(line, delimiter);
    return headers.map((_, index) => coerceCell(rawValues[index] ?? ""));
  });

  return {
    headers,
    rows
  };
};
