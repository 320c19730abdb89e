import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseFile, type ParseFileResult } from "../../src/lib/import/parseFile";
import { InputError } from "../../src/lib/import/types";

/** Node counterpart of the browser upload: reads a .csv or .xlsx file from disk. */
export const readTableFile = async (path: string): Promise<ParseFileResult> => {
  let contents: Buffer;
  try {
    contents = await readFile(path);
  } catch (error) {
    throw new InputError(
      "UNREADABLE",
      `Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseFile({
    name: basename(path),
    text: async () => contents.toString("utf8"),
    arrayBuffer: async () => {
      const copy = new ArrayBuffer(contents.byteLength);
      new Uint8Array(copy).set(contents);
      return copy;
    }
  });
};
