import "dotenv/config";

import { loadConfig, type AppConfig } from "./config";
import { describeError } from "./errors";
import { createI18n, type I18n } from "./i18n";
import { AppLogger } from "./logger";
import { Responder } from "./response";
import { createDemoServer } from "./server";

function normalizeError(reason: unknown): { message: string; stack?: string } {
  if (reason instanceof Error) {
    return { message: reason.message, ...(reason.stack ? { stack: reason.stack } : {}) };
  }
  return { message: describeError(reason) };
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error("config_load_failed", normalizeError(error));
    process.exit(1);
  }
}

function createI18nOrExit(config: AppConfig, logger: AppLogger): I18n {
  try {
    return createI18n({
      langDir: config.langDir,
      defaultLanguage: config.defaultLanguage,
      envKey: config.envKey,
      debugMode: config.debugMode,
      logger,
    });
  } catch (error) {
    // A missing or invalid catalog has no degraded mode.
    logger.error("i18n_init_failed", normalizeError(error));
    process.exit(1);
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = new AppLogger({ logPath: config.logPath });
  const i18n = createI18nOrExit(config, logger);
  const responder = new Responder(i18n, { traceIdHeader: config.traceIdHeader, logger });
  const server = createDemoServer(responder);
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_started", { reason, exitCode });

    const forceExit = setTimeout(() => {
      logger.error("shutdown_forced_exit", { reason });
      process.exit(exitCode);
    }, 5000);
    forceExit.unref();

    server.close(() => {
      clearTimeout(forceExit);
      logger.info("shutdown_completed", { reason, exitCode });
      process.exit(exitCode);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (error) => {
    logger.error("uncaught_exception", normalizeError(error));
    shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled_rejection", normalizeError(reason));
    shutdown("unhandledRejection", 1);
  });

  server.listen(config.port, () => {
    logger.info("demo_server_started", {
      port: config.port,
      languages: i18n.languages(),
      defaultLanguage: i18n.defaultLanguage,
    });
  });
}

main();
