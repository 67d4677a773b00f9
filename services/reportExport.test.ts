import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { downloadReport } from "./reportExport";

describe("downloadReport", () => {
  const createObjectURL = vi.fn((_blob: Blob) => "blob:report");
  const revokeObjectURL = vi.fn((_url: string) => {});

  beforeEach(() => {
    // jsdom has no object URLs
    URL.createObjectURL = createObjectURL;
    URL.revokeObjectURL = revokeObjectURL;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    createObjectURL.mockClear();
    revokeObjectURL.mockClear();
  });

  it("saves the content through a temporary link", () => {
    const downloads: string[] = [];
    vi.spyOn(HTMLElement.prototype, "click").mockImplementation(function (this: HTMLElement) {
      if (this instanceof HTMLAnchorElement) downloads.push(`${this.download} ${this.href}`);
    });

    downloadReport({ fileName: "data_summary.txt", mimeType: "text/plain", content: "Summary" });

    expect(createObjectURL).toHaveBeenCalledTimes(1);
    const blob = createObjectURL.mock.calls[0][0];
    expect(blob.type).toBe("text/plain");
    expect(blob.size).toBe(7);
    expect(downloads).toEqual(["data_summary.txt blob:report"]);
    expect(revokeObjectURL).toHaveBeenCalledWith("blob:report");
  });
});
