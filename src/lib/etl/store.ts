import type { Dataset } from "../import/types";

/** Persistence contract for cleaned datasets; `save` replaces any table with the same id. */
export type DatasetStore = {
  save: (id: string, dataset: Dataset) => Promise<void>;
  load: (id: string) => Promise<Dataset | null>;
  list: () => Promise<string[]>;
};

const copyDataset = (dataset: Dataset): Dataset => ({
  name: dataset.name,
  columns: [...dataset.columns],
  records: dataset.records.map((record) => ({ ...record }))
});

export const createInMemoryDatasetStore = (): DatasetStore => {
  const tables = new Map<string, Dataset>();

  return {
    save: async (id, dataset) => {
      tables.set(id, copyDataset(dataset));
    },
    load: async (id) => {
      const stored = tables.get(id);
      return stored ? copyDataset(stored) : null;
    },
    list: async () => Array.from(tables.keys()).sort()
  };
};
