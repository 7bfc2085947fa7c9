export type ValidationField =
  | "bounds"
  | "coordinates"
  | "maxLevel"
  | "cultureCode"
  | "outputFormat";

/** Bad caller input; raised before any tile request is made. */
export class RetrievalValidationError extends Error {
  readonly field: ValidationField;

  constructor(message: string, field: ValidationField) {
    super(message);
    this.name = "RetrievalValidationError";
    this.field = field;
  }
}

export class TileRequestError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(message: string, status: number, url: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TileRequestError";
    this.status = status;
    this.url = url;
  }
}

/** The missing-tile placeholder could not be fetched, so no tile can be judged. */
export class SentinelFetchError extends Error {
  readonly labeled: boolean;
  readonly cultureCode: string;

  constructor(labeled: boolean, cultureCode: string, cause: unknown) {
    super(
      `Failed to fetch the missing-tile placeholder (${labeled ? "labeled" : "unlabeled"}, ${cultureCode}).`,
      { cause }
    );
    this.name = "SentinelFetchError";
    this.labeled = labeled;
    this.cultureCode = cultureCode;
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  );
}

export function createAbortError(): DOMException {
  return new DOMException("Aborted", "AbortError");
}
