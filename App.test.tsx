import { describe, it, expect, vi, afterEach } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import App from "./App";

const upload = (file: File) => {
  fireEvent.change(screen.getByLabelText("Choose a CSV or Excel file"), { target: { files: [file] } });
};

const peopleCsv = () => new File(["age,city\n25,NY\n,NY\n31,LA\n"], "people.csv", { type: "text/csv" });

describe("App", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("waits for a file", () => {
    render(<App />);

    expect(screen.getByText("Awaiting file upload.")).toBeInTheDocument();
    expect(screen.getByText("Upload your CSV or Excel file to begin exploring your data.")).toBeInTheDocument();
  });

  it("explores an uploaded csv", async () => {
    render(<App />);
    upload(peopleCsv());

    expect(await screen.findByText("File uploaded successfully!")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Show Raw Data Preview (First 5 Rows)" })).toBeInTheDocument();
    expect(screen.getByText("Histogram of age")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Download Summary Report" })).toBeInTheDocument();
  });

  it("warns about the heatmap once the only numeric column is dropped", async () => {
    render(<App />);
    upload(peopleCsv());
    await screen.findByText("File uploaded successfully!");

    fireEvent.click(screen.getByRole("checkbox", { name: "age" }));
    fireEvent.change(screen.getByLabelText("Select a type of plot"), { target: { value: "heatmap" } });

    expect(screen.getByText("Dropped columns: age")).toBeInTheDocument();
    expect(screen.getByText("Data shape after dropping columns: (3, 1)")).toBeInTheDocument();
    expect(screen.getByRole("alert")).toHaveTextContent("No numerical columns available to create a heatmap.");
  });

  it("rejects unsupported files", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    render(<App />);
    upload(new File(["hello"], "notes.txt", { type: "text/plain" }));

    expect(await screen.findByRole("alert")).toHaveTextContent(
      "Error loading data: Unsupported file type: notes.txt. Please upload a CSV or XLSX file."
    );
    expect(screen.getByText("Upload your CSV or Excel file to begin exploring your data.")).toBeInTheDocument();
  });
});
