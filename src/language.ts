import type { LanguageId, RequestSignals } from "./types";

/**
 * Finds a `lang=<id>` token in a semicolon-separated client string such as
 * `Mozilla/5.0 (X11); lang=zh-CN; build=42`. The key is matched
 * case-insensitively and both sides of the first `=` are trimmed.
 */
export function parseUserAgentLanguage(userAgent: string): LanguageId | undefined {
  for (const segment of userAgent.split(";")) {
    const separator = segment.indexOf("=");
    if (separator < 0) {
      continue;
    }
    const key = segment.slice(0, separator).trim().toLowerCase();
    const value = segment.slice(separator + 1).trim();
    if (key === "lang" && value) {
      return value;
    }
  }
  return undefined;
}

// The explicit header is used as-is; it is not checked against the catalog.
export function selectLanguage(signals: RequestSignals, defaultLanguage: LanguageId): LanguageId {
  if (signals.lang) {
    return signals.lang;
  }
  if (signals.userAgent) {
    const fromAgent = parseUserAgentLanguage(signals.userAgent);
    if (fromAgent) {
      return fromAgent;
    }
  }
  return defaultLanguage;
}
