import { Catalog, loadCatalog } from "./catalog";
import { describeError } from "./errors";
import { sprintf } from "./format";
import { selectLanguage as selectFromSignals } from "./language";
import type { AppLogger } from "./logger";
import { unpackPayload } from "./payload";
import type { Envelope, LanguageId, MessageCode, RequestSignals, ResponsePayload } from "./types";

export const DEFAULT_LANG_DIR = "./lang";
export const DEFAULT_LANGUAGE = "en-US";
export const DEFAULT_ENV_KEY = "RUN_MODE";
export const PRODUCTION_RUN_ENV = "prod";

const EMPTY_MESSAGES: ReadonlyMap<MessageCode, string> = new Map();

export type I18nConfig = {
  defaultLanguage: LanguageId;
  debugMode: boolean;
  runEnv: string;
};

/**
 * Resolves response codes to localized messages and assembles envelopes.
 *
 * Every lookup is a synchronous read of the immutable catalog. The default
 * language is the only mutable state: `setLanguage` applies to every call
 * made after it, with no further ordering promised.
 */
export class I18n {
  readonly runEnv: string;
  private readonly catalog: Catalog;
  private readonly debugMode: boolean;
  private fallbackLanguage: LanguageId;

  constructor(catalog: Catalog, config: Partial<I18nConfig> = {}) {
    this.catalog = catalog;
    this.fallbackLanguage = config.defaultLanguage || DEFAULT_LANGUAGE;
    this.debugMode = config.debugMode ?? false;
    this.runEnv = config.runEnv ?? "";
  }

  get defaultLanguage(): LanguageId {
    return this.fallbackLanguage;
  }

  setLanguage(language: LanguageId): void {
    if (language) {
      this.fallbackLanguage = language;
    }
  }

  /**
   * Unknown languages fall back to the default language and unknown codes
   * come back unchanged, so a message is always produced.
   */
  trans(language: LanguageId, code: MessageCode, ...params: string[]): string {
    const messages =
      this.catalog.get(language) ?? this.catalog.get(this.fallbackLanguage) ?? EMPTY_MESSAGES;
    const template = messages.get(code);
    if (template === undefined) {
      return code;
    }
    return params.length > 0 ? sprintf(template, params) : template;
  }

  selectLanguage(signals: RequestSignals): LanguageId {
    return selectFromSignals(signals, this.fallbackLanguage);
  }

  isDebugAllowed(signals: RequestSignals): boolean {
    if (this.runEnv === PRODUCTION_RUN_ENV) {
      return false;
    }
    if (this.debugMode) {
      return true;
    }
    return Boolean(signals.debug);
  }

  buildEnvelope<T>(
    code: number,
    payload: ResponsePayload<T>,
    err: unknown,
    signals: RequestSignals,
  ): Envelope<T> {
    const { data, params } = unpackPayload(payload);
    const showError = err !== undefined && err !== null && this.isDebugAllowed(signals);
    return {
      code,
      msg: this.trans(this.selectLanguage(signals), String(code), ...params),
      trace: {
        id: signals.traceId ?? "",
        desc: showError ? describeError(err) : "",
      },
      data,
    };
  }

  count(): number {
    return this.catalog.size;
  }

  languages(): LanguageId[] {
    return this.catalog.languages();
  }

  hasLanguage(language: LanguageId): boolean {
    return this.catalog.has(language);
  }
}

export type CreateI18nOptions = {
  langDir?: string;
  defaultLanguage?: LanguageId;
  envKey?: string;
  debugMode?: boolean;
  logger?: AppLogger;
};

export function createI18n(options: CreateI18nOptions = {}, env: NodeJS.ProcessEnv = process.env): I18n {
  const langDir = options.langDir ?? DEFAULT_LANG_DIR;
  const catalog = loadCatalog(langDir);
  const runEnv = env[options.envKey ?? DEFAULT_ENV_KEY] ?? "";
  const i18n = new I18n(catalog, {
    defaultLanguage: options.defaultLanguage ?? DEFAULT_LANGUAGE,
    debugMode: options.debugMode ?? false,
    runEnv,
  });
  options.logger?.info("i18n_catalog_loaded", {
    langDir,
    languages: i18n.languages(),
    defaultLanguage: i18n.defaultLanguage,
    runEnv,
  });
  return i18n;
}
