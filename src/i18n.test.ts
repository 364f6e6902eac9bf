import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";

import { Catalog } from "./catalog";
import { EmptyCatalogError } from "./errors";
import { createI18n, I18n } from "./i18n";
import { AppLogger } from "./logger";
import { plain, withParams } from "./payload";

function mkI18n(overrides: ConstructorParameters<typeof I18n>[1] = {}): I18n {
  const catalog = Catalog.fromRecords({
    "en-US": { "-1": "System busy", "0": "ok", "1000": "Hello,%s! Your id is:%s" },
    "zh-CN": { "-1": "系统繁忙", "0": "ok", "1000": "你好,%s!你的账号是:%s" },
  });
  return new I18n(catalog, overrides);
}

describe("I18n.trans", () => {
  it("returns the stored template when there are no params", () => {
    const i18n = mkI18n();
    assert.strictEqual(i18n.trans("en-US", "0"), "ok");
    assert.strictEqual(i18n.trans("zh-CN", "-1"), "系统繁忙");
  });

  it("substitutes params into the template", () => {
    const i18n = mkI18n();
    assert.strictEqual(
      i18n.trans("en-US", "1000", "Seakee", "18888888888"),
      "Hello,Seakee! Your id is:18888888888",
    );
    assert.strictEqual(
      i18n.trans("zh-CN", "1000", "Seakee", "18888888888"),
      "你好,Seakee!你的账号是:18888888888",
    );
  });

  it("leaves percent signs alone when no params are given", () => {
    const i18n = mkI18n();
    assert.strictEqual(i18n.trans("en-US", "1000"), "Hello,%s! Your id is:%s");
  });

  it("falls back to the default language for unknown languages", () => {
    const i18n = new I18n(Catalog.fromRecords({ "en-US": { "0": "ok" } }), { defaultLanguage: "en-US" });
    assert.strictEqual(i18n.trans("fr-FR", "0"), "ok");
    assert.strictEqual(i18n.trans("fr-FR", "0"), i18n.trans("en-US", "0"));
  });

  it("echoes the code when no template exists", () => {
    const i18n = new I18n(Catalog.fromRecords({ "en-US": {} }));
    assert.strictEqual(i18n.trans("en-US", "404"), "404");
  });

  it("echoes the code when the default language is not in the catalog", () => {
    const i18n = mkI18n({ defaultLanguage: "ja-JP" });
    assert.strictEqual(i18n.trans("fr-FR", "0"), "0");
  });

  it("is stable across repeated calls", () => {
    const i18n = mkI18n();
    const first = i18n.trans("zh-CN", "1000", "a", "b");
    assert.strictEqual(i18n.trans("zh-CN", "1000", "a", "b"), first);
  });
});

describe("I18n.setLanguage", () => {
  it("changes the fallback for later lookups", () => {
    const i18n = mkI18n();
    assert.strictEqual(i18n.trans("fr-FR", "-1"), "System busy");
    i18n.setLanguage("zh-CN");
    assert.strictEqual(i18n.defaultLanguage, "zh-CN");
    assert.strictEqual(i18n.trans("fr-FR", "-1"), "系统繁忙");
    assert.strictEqual(i18n.selectLanguage({}), "zh-CN");
  });

  it("ignores an empty language", () => {
    const i18n = mkI18n({ defaultLanguage: "zh-CN" });
    i18n.setLanguage("");
    assert.strictEqual(i18n.defaultLanguage, "zh-CN");
  });
});

describe("I18n.isDebugAllowed", () => {
  it("never allows debug output in prod", () => {
    const i18n = mkI18n({ runEnv: "prod", debugMode: true });
    assert.strictEqual(i18n.isDebugAllowed({ debug: "1" }), false);
  });

  it("allows debug output when configured", () => {
    assert.strictEqual(mkI18n({ runEnv: "dev", debugMode: true }).isDebugAllowed({}), true);
  });

  it("allows debug output per request", () => {
    const i18n = mkI18n();
    assert.strictEqual(i18n.isDebugAllowed({ debug: "yes" }), true);
    assert.strictEqual(i18n.isDebugAllowed({}), false);
  });
});

describe("I18n.buildEnvelope", () => {
  it("builds a plain envelope", () => {
    const envelope = mkI18n().buildEnvelope(0, plain({ id: 7 }), undefined, {});
    assert.deepStrictEqual(envelope, {
      code: 0,
      msg: "ok",
      trace: { id: "", desc: "" },
      data: { id: 7 },
    });
  });

  it("uses params for the message and keeps only the data", () => {
    const envelope = mkI18n().buildEnvelope(
      1000,
      withParams(["Seakee", "18888888888"], "test"),
      null,
      { lang: "zh-CN", traceId: "trace-1" },
    );
    assert.deepStrictEqual(envelope, {
      code: 1000,
      msg: "你好,Seakee!你的账号是:18888888888",
      trace: { id: "trace-1", desc: "" },
      data: "test",
    });
  });

  it("describes the error only when debug output is allowed", () => {
    const error = new Error("busy... ");
    assert.strictEqual(mkI18n({ debugMode: true }).buildEnvelope(-1, plain("busy"), error, {}).trace.desc, "busy... ");
    assert.strictEqual(mkI18n().buildEnvelope(-1, plain("busy"), error, {}).trace.desc, "");
    assert.strictEqual(mkI18n().buildEnvelope(-1, plain("busy"), "raw reason", { debug: "1" }).trace.desc, "raw reason");
    assert.strictEqual(
      mkI18n({ runEnv: "prod", debugMode: true }).buildEnvelope(-1, plain("busy"), error, { debug: "1" }).trace.desc,
      "",
    );
  });

  it("picks the language from the user agent", () => {
    const envelope = mkI18n().buildEnvelope(-1, plain(null), undefined, { userAgent: "app/2.0; lang=zh-CN" });
    assert.strictEqual(envelope.msg, "系统繁忙");
  });

  it("echoes unknown codes", () => {
    assert.strictEqual(mkI18n().buildEnvelope(418, plain(null), undefined, {}).msg, "418");
  });
});

describe("I18n catalog queries", () => {
  it("reports the loaded languages", () => {
    const i18n = mkI18n();
    assert.strictEqual(i18n.count(), 2);
    assert.deepStrictEqual(i18n.languages(), ["en-US", "zh-CN"]);
    assert.strictEqual(i18n.hasLanguage("zh-CN"), true);
    assert.strictEqual(i18n.hasLanguage("fr-FR"), false);
  });
});

describe("createI18n", () => {
  it("loads the catalog directory and the run environment", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "response-i18n-create-"));
    fs.writeFileSync(path.join(dir, "en-US.json"), '{"0":"ok"}');
    const logPath = path.join(dir, "logs", "i18n.log");
    const logger = new AppLogger({ logPath, console: false });

    const i18n = createI18n({ langDir: dir, envKey: "APP_ENV", debugMode: true, logger }, { APP_ENV: "prod" });
    assert.strictEqual(i18n.runEnv, "prod");
    assert.strictEqual(i18n.defaultLanguage, "en-US");
    assert.strictEqual(i18n.isDebugAllowed({ debug: "1" }), false);
    assert.strictEqual(i18n.trans("zh-CN", "0"), "ok");

    const [line] = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const entry: { level?: string; event?: string; payload?: { languages?: string[]; runEnv?: string } } =
      JSON.parse(line ?? "{}");
    assert.strictEqual(entry.level, "info");
    assert.strictEqual(entry.event, "i18n_catalog_loaded");
    assert.deepStrictEqual(entry.payload?.languages, ["en-US"]);
    assert.strictEqual(entry.payload?.runEnv, "prod");
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fails when no language files exist", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "response-i18n-empty-"));
    assert.throws(() => createI18n({ langDir: dir }, {}), EmptyCatalogError);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
