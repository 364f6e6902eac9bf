import type { IncomingHttpHeaders } from "node:http";

import type { RequestSignals } from "./types";

export const LANG_HEADER = "lang";
export const DEBUG_HEADER = "debug";
export const DEFAULT_TRACE_ID_HEADER = "x-trace-id";

export type RequestSignalOptions = {
  traceIdHeader?: string;
};

export function getHeader(headers: IncomingHttpHeaders, key: string): string | undefined {
  const raw = headers[key.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value ? value : undefined;
}

export function readRequestSignals(
  headers: IncomingHttpHeaders,
  options: RequestSignalOptions = {},
): RequestSignals {
  const lang = getHeader(headers, LANG_HEADER);
  const userAgent = getHeader(headers, "user-agent");
  const debug = getHeader(headers, DEBUG_HEADER);
  const traceId = getHeader(headers, options.traceIdHeader ?? DEFAULT_TRACE_ID_HEADER);

  return {
    ...(lang ? { lang } : {}),
    ...(userAgent ? { userAgent } : {}),
    ...(debug ? { debug } : {}),
    ...(traceId ? { traceId } : {}),
  };
}
