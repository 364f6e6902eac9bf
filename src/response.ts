import type http from "node:http";

import { XMLBuilder } from "fast-xml-parser";
import { stringify as stringifyYaml } from "yaml";

import type { I18n } from "./i18n";
import type { AppLogger } from "./logger";
import { readRequestSignals } from "./request";
import type { Envelope, ResponsePayload } from "./types";

export type ResponseFormat = "json" | "pureJson" | "asciiJson" | "jsonp" | "xml" | "yaml";

export type RenderedBody = {
  contentType: string;
  body: string;
};

export type RenderOptions = {
  callback?: string;
};

export const RESPONSE_CODE_HEADER = "x-response-code";
export const XML_ROOT = "result";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';
const JSON_CONTENT_TYPE = "application/json; charset=utf-8";
const CALLBACK_PATTERN = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

// Data keys are written as element names without checks: keys that are not
// valid XML names (`1x`, `@_a`) produce malformed markup. The text node name
// is moved off `#text` so such a key stays an element instead of merging into
// its parent's text.
const xmlBuilder = new XMLBuilder({ suppressEmptyNode: false, textNodeName: "\u0000text" });

function toUnicodeEscape(ch: string): string {
  return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

export function escapeHtmlJson(json: string): string {
  return json.replace(/[<>&\u2028\u2029]/g, toUnicodeEscape);
}

export function escapeNonAsciiJson(json: string): string {
  return json.replace(/[^\x00-\x7f]/g, toUnicodeEscape);
}

export function isValidCallback(callback: string): boolean {
  return CALLBACK_PATTERN.test(callback);
}

export function renderEnvelope(
  format: ResponseFormat,
  envelope: Envelope,
  options: RenderOptions = {},
): RenderedBody {
  // Every format keeps the `data` key; serializers drop undefined values.
  const complete: Envelope = { ...envelope, data: envelope.data === undefined ? null : envelope.data };
  switch (format) {
    case "json":
      return { contentType: JSON_CONTENT_TYPE, body: escapeHtmlJson(JSON.stringify(complete)) };
    case "pureJson":
      return { contentType: JSON_CONTENT_TYPE, body: JSON.stringify(complete) };
    case "asciiJson":
      return { contentType: "application/json", body: escapeNonAsciiJson(JSON.stringify(complete)) };
    case "jsonp": {
      const json = escapeHtmlJson(JSON.stringify(complete));
      if (!options.callback || !isValidCallback(options.callback)) {
        return { contentType: JSON_CONTENT_TYPE, body: json };
      }
      return { contentType: "application/javascript; charset=utf-8", body: `${options.callback}(${json});` };
    }
    case "xml":
      return {
        contentType: "application/xml; charset=utf-8",
        body: `${XML_DECLARATION}${xmlBuilder.build({
          [XML_ROOT]: { ...complete, data: complete.data === null ? "" : complete.data },
        })}`,
      };
    case "yaml":
      return { contentType: "application/yaml; charset=utf-8", body: stringifyYaml(complete) };
  }
}

export type ResponderOptions = {
  traceIdHeader?: string;
  logger?: AppLogger;
};

/**
 * Writes localized envelopes to `node:http` responses. The HTTP status is
 * always 200; the envelope code carries the application outcome.
 */
export class Responder {
  private readonly i18n: I18n;
  private readonly traceIdHeader: string | undefined;
  private readonly logger: AppLogger | undefined;

  constructor(i18n: I18n, options: ResponderOptions = {}) {
    this.i18n = i18n;
    this.traceIdHeader = options.traceIdHeader;
    this.logger = options.logger;
  }

  envelope<T>(req: http.IncomingMessage, code: number, payload: ResponsePayload<T>, err?: unknown): Envelope<T> {
    const signals = readRequestSignals(
      req.headers,
      this.traceIdHeader ? { traceIdHeader: this.traceIdHeader } : {},
    );
    return this.i18n.buildEnvelope(code, payload, err, signals);
  }

  json<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("json", req, res, code, payload, err);
  }

  pureJson<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("pureJson", req, res, code, payload, err);
  }

  asciiJson<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("asciiJson", req, res, code, payload, err);
  }

  // The callback name comes from the `callback` query parameter.
  jsonp<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("jsonp", req, res, code, payload, err);
  }

  xml<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("xml", req, res, code, payload, err);
  }

  yaml<T>(req: http.IncomingMessage, res: http.ServerResponse, code: number, payload: ResponsePayload<T>, err?: unknown): void {
    this.write("yaml", req, res, code, payload, err);
  }

  private write<T>(
    format: ResponseFormat,
    req: http.IncomingMessage,
    res: http.ServerResponse,
    code: number,
    payload: ResponsePayload<T>,
    err: unknown,
  ): void {
    if (res.headersSent || res.writableEnded) {
      this.logger?.warn("response_already_sent", { format, code, url: req.url });
      return;
    }

    const envelope = this.envelope(req, code, payload, err);
    const callback = new URL(req.url ?? "/", "http://localhost").searchParams.get("callback");
    const rendered = renderEnvelope(format, envelope, callback ? { callback } : {});
    res.writeHead(200, {
      "content-type": rendered.contentType,
      [RESPONSE_CODE_HEADER]: String(code),
    });
    res.end(rendered.body);
  }
}
