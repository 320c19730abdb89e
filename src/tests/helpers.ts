import { buildDataset } from "../lib/import/buildDataset";
import type { Cell, Dataset } from "../lib/import/types";

export const datasetOf = (headers: string[], rows: Cell[][], name = "test.csv"): Dataset =>
  buildDataset({ headers, rows }, name);

export const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
};
