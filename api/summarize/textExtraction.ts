export type SourceDocument = {
  name: string;
  bytes: Uint8Array;
};

export type DocumentTextExtractor = (document: SourceDocument) => Promise<string>;

/** Turns PDF bytes into raw page text, one page after another. */
export type PdfTextExtractor = (bytes: Uint8Array) => Promise<string>;

export class DocumentExtractionError extends Error {
  documentName: string;

  constructor(documentName: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DocumentExtractionError";
    this.documentName = documentName;
  }
}

const extensionOf = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot).toLowerCase();
};

export const cleanExtractedText = (text: string): string =>
  text
    .replace(/\n[ \t]*\d+[ \t]*(?=\n)/g, "")
    .replace(/ﬁ/g, "fi")
    .replace(/ﬂ/g, "fl")
    .replace(/[–—]/g, "-")
    .replace(/\s+/g, " ")
    .trim();

const decodeUtf8 = (document: SourceDocument): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(document.bytes);
  } catch (error) {
    throw new DocumentExtractionError(
      document.name,
      `${document.name} is not valid UTF-8 text.`,
      error
    );
  }
};

export const createDocumentTextExtractor = ({
  pdf
}: { pdf?: PdfTextExtractor } = {}): DocumentTextExtractor => async (document) => {
  const extension = extensionOf(document.name);

  if (extension === ".txt" || extension === ".md") {
    return cleanExtractedText(decodeUtf8(document));
  }

  if (extension === ".pdf") {
    if (!pdf) {
      throw new DocumentExtractionError(
        document.name,
        "PDF extraction is not configured."
      );
    }
    let raw: string;
    try {
      raw = await pdf(document.bytes);
    } catch (error) {
      throw new DocumentExtractionError(
        document.name,
        `Could not extract text from ${document.name}.`,
        error
      );
    }
    console.info("[summarize] extracted pdf text", {
      document: document.name,
      chars: raw.length
    });
    return cleanExtractedText(raw);
  }

  throw new DocumentExtractionError(
    document.name,
    `Unsupported document type: ${extension || "(none)"}`
  );
};
