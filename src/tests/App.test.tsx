import { fireEvent, render, screen } from "@testing-library/react";
import * as XLSX from "xlsx";
import { afterEach, describe, expect, it, vi } from "vitest";
import App from "../App";
import type { TableSource } from "../lib/import/parseFile";

const workbookSource = (name: string): TableSource => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet([
      ["sample_id", "ph"],
      ["S1", 7.1],
      ["S2", 6.9]
    ]),
    "Data"
  );
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), "Notes");
  const buffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" }) as ArrayBuffer;
  return {
    name,
    text: async () => "",
    arrayBuffer: async () => buffer
  };
};

describe("App", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("renders the header and empty state", () => {
    render(<App />);

    expect(screen.getByRole("heading", { name: "Lab Data Quality" })).toBeInTheDocument();
    expect(screen.getByText("Upload a file to analyze its quality.")).toBeInTheDocument();
    expect(screen.getByLabelText("Upload data file")).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "Research summary" })).toBeInTheDocument();
  });

  it("reports an empty worksheet instead of throwing", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    render(<App />);

    fireEvent.change(screen.getByLabelText("Upload data file"), {
      target: { files: [workbookSource("plate.xlsx")] }
    });
    const sheetSelect = await screen.findByRole("combobox", { name: "Sheet" });
    expect(screen.getByRole("heading", { name: "Quality report" })).toBeInTheDocument();

    fireEvent.change(sheetSelect, { target: { value: "Notes" } });

    expect(await screen.findByText("The table has no header row.")).toBeInTheDocument();
    expect(screen.queryByRole("heading", { name: "Quality report" })).not.toBeInTheDocument();
    expect(sheetSelect).toHaveValue("Notes");
    expect(error).toHaveBeenCalledWith("[quality] sheet import failed", {
      fileName: "plate.xlsx",
      sheetName: "Notes",
      message: "The table has no header row."
    });
  });
});
