export class DataLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataLoadError';
  }
}

// Raised before any parsing happens
export class UnsupportedFileError extends DataLoadError {
  constructor(fileName: string) {
    super(`Unsupported file type: ${fileName}. Please upload a CSV or XLSX file.`);
    this.name = 'UnsupportedFileError';
  }
}

export class CleaningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CleaningError';
  }
}

export const errorMessage = (error: unknown, fallback = "An unexpected error occurred"): string =>
  error instanceof Error ? error.message : fallback;
