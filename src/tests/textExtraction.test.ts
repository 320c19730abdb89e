// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  cleanExtractedText,
  createDocumentTextExtractor,
  DocumentExtractionError
} from "../../api/summarize/textExtraction";

const encode = (text: string) => new TextEncoder().encode(text);

describe("cleanExtractedText", () => {
  it("drops page numbers and normalises ligatures, dashes and whitespace", () => {
    expect(cleanExtractedText("ﬁrst line\n12\nsecond — ﬂow\t end ")).toBe(
      "first line second - flow end"
    );
  });
});

describe("createDocumentTextExtractor", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("decodes text and markdown files", async () => {
    const extract = createDocumentTextExtractor();

    await expect(extract({ name: "notes.MD", bytes: encode("# Title\n\nBody") })).resolves.toBe(
      "# Title Body"
    );
  });

  it("rejects bytes that are not UTF-8", async () => {
    const extract = createDocumentTextExtractor();

    const error = await extract({ name: "bad.txt", bytes: new Uint8Array([0xff, 0xfe, 0xfd]) }).catch(
      (failure: unknown) => failure
    );

    expect(error).toBeInstanceOf(DocumentExtractionError);
    expect(error).toMatchObject({
      message: "bad.txt is not valid UTF-8 text.",
      documentName: "bad.txt"
    });
  });

  it("delegates PDFs to the configured extractor", async () => {
    const pdf = vi.fn(async () => "Page one\n1\nPage two");
    const extract = createDocumentTextExtractor({ pdf });

    await expect(extract({ name: "paper.pdf", bytes: new Uint8Array([1]) })).resolves.toBe(
      "Page one Page two"
    );
    expect(pdf).toHaveBeenCalledTimes(1);
  });

  it("fails PDFs without an extractor or when it throws", async () => {
    await expect(
      createDocumentTextExtractor()({ name: "paper.pdf", bytes: new Uint8Array([1]) })
    ).rejects.toThrow("PDF extraction is not configured.");

    const broken = createDocumentTextExtractor({
      pdf: async () => {
        throw new Error("encrypted");
      }
    });
    await expect(broken({ name: "locked.pdf", bytes: new Uint8Array([1]) })).rejects.toThrow(
      "Could not extract text from locked.pdf."
    );
  });

  it("rejects other document types", async () => {
    await expect(
      createDocumentTextExtractor()({ name: "paper.docx", bytes: new Uint8Array() })
    ).rejects.toThrow("Unsupported document type: .docx");
  });
});
