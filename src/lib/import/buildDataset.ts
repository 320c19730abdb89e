import { InputError, type Dataset, type LabRecord, type RawTable } from "./types";

const dedupeHeaders = (headers: string[]): string[] => {
  const used = new Set<string>();
  return headers.map((header) => {
    let candidate = header;
    for (let suffix = 1; used.has(candidate); suffix += 1) {
      candidate = `${header}.${suffix}`;
    }
    used.add(candidate);
    return candidate;
  });
};

export const buildDataset = (table: RawTable, name: string): Dataset => {
  if (table.headers.length === 0) {
    throw new InputError("MISSING_HEADER", "The table has no header row.");
  }

  const columns = dedupeHeaders(table.headers);
  const records = table.rows.map((row) =>
    columns.reduce<LabRecord>((record, column, index) => {
      record[column] = row[index] ?? null;
      return record;
    }, {})
  );

  return {
    name,
    columns,
    records
  };
};

export const columnCells = (dataset: Dataset, column: string) =>
  dataset.records.map((record) => record[column] ?? null);
