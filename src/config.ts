import { z } from "zod";

import { DEFAULT_ENV_KEY, DEFAULT_LANG_DIR, DEFAULT_LANGUAGE } from "./i18n";
import { DEFAULT_TRACE_ID_HEADER } from "./request";

const EnvSchema = z.object({
  I18N_LANG_DIR: z.string().optional().default(DEFAULT_LANG_DIR),
  I18N_DEFAULT_LANG: z.string().optional().default(DEFAULT_LANGUAGE),
  I18N_ENV_KEY: z.string().optional().default(DEFAULT_ENV_KEY),
  I18N_DEBUG: z
    .enum(["true", "false", "1", "0", ""], {
      errorMap: () => ({ message: "I18N_DEBUG must be true, false, 1 or 0" }),
    })
    .optional()
    .default("false"),
  TRACE_ID_HEADER: z.string().optional().default(DEFAULT_TRACE_ID_HEADER),
  LOG_PATH: z.string().optional().default("data/i18n.log"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8888),
});

export type AppConfig = {
  langDir: string;
  defaultLanguage: string;
  envKey: string;
  debugMode: boolean;
  traceIdHeader: string;
  logPath: string;
  port: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`,
    );
  }

  return {
    langDir: parsed.data.I18N_LANG_DIR.trim() || DEFAULT_LANG_DIR,
    defaultLanguage: parsed.data.I18N_DEFAULT_LANG.trim() || DEFAULT_LANGUAGE,
    envKey: parsed.data.I18N_ENV_KEY.trim() || DEFAULT_ENV_KEY,
    debugMode: parsed.data.I18N_DEBUG === "true" || parsed.data.I18N_DEBUG === "1",
    traceIdHeader: parsed.data.TRACE_ID_HEADER.trim().toLowerCase() || DEFAULT_TRACE_ID_HEADER,
    logPath: parsed.data.LOG_PATH,
    port: parsed.data.PORT,
  };
}
