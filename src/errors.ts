export type I18nErrorCode = "LOAD_ERROR" | "EMPTY_CATALOG";

export class I18nError extends Error {
  readonly code: I18nErrorCode;

  constructor(message: string, code: I18nErrorCode, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A language source could not be read, is not JSON, or is not a flat
 * string-to-string object. No partial catalog is ever returned alongside it.
 */
export class LoadError extends I18nError {
  readonly source: string;

  constructor(source: string, cause: unknown, reason = describeError(cause)) {
    super(`Failed to load language source "${source}": ${reason}`, "LOAD_ERROR", cause);
    this.source = source;
  }
}

export class EmptyCatalogError extends I18nError {
  constructor(location?: string) {
    super(location ? `No language files found in "${location}"` : "No language files found", "EMPTY_CATALOG");
  }
}

export function describeError(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return String(reason);
}
