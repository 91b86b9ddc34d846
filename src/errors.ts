export class StorageError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.filePath = filePath;
  }
}

/** The history file exists but does not hold a valid array of readings. */
export class HistoryCorruptError extends StorageError {
  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`History file ${filePath} is corrupt: ${reason}`, filePath, options);
    this.name = "HistoryCorruptError";
  }
}

export function describeError(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}
