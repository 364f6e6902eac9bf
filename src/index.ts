export { Catalog, languageIdFromName, loadCatalog, loadCatalogSources } from "./catalog";
export type { CatalogSource, MessageMap } from "./catalog";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { EmptyCatalogError, I18nError, LoadError, describeError } from "./errors";
export type { I18nErrorCode } from "./errors";
export { sprintf } from "./format";
export {
  DEFAULT_ENV_KEY,
  DEFAULT_LANG_DIR,
  DEFAULT_LANGUAGE,
  I18n,
  PRODUCTION_RUN_ENV,
  createI18n,
} from "./i18n";
export type { CreateI18nOptions, I18nConfig } from "./i18n";
export { parseUserAgentLanguage, selectLanguage } from "./language";
export { AppLogger } from "./logger";
export type { LoggerConfig } from "./logger";
export { plain, unpackPayload, withParams } from "./payload";
export { DEFAULT_TRACE_ID_HEADER, getHeader, readRequestSignals } from "./request";
export type { RequestSignalOptions } from "./request";
export {
  RESPONSE_CODE_HEADER,
  Responder,
  escapeHtmlJson,
  escapeNonAsciiJson,
  isValidCallback,
  renderEnvelope,
} from "./response";
export type { RenderOptions, RenderedBody, ResponderOptions, ResponseFormat } from "./response";
export { createDemoServer } from "./server";
export type {
  Envelope,
  EnvelopeTrace,
  LanguageId,
  MessageCode,
  RequestSignals,
  ResponsePayload,
} from "./types";
