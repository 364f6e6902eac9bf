import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { EmptyCatalogError, LoadError } from "./errors";

const MessageMapSchema = z.record(z.string(), z.string());

export type CatalogSource = {
  name: string;
  body: string;
};

export type MessageMap = ReadonlyMap<string, string>;

// Everything from the last dot of the final path element is the extension,
// so a bare ".json" yields an empty id.
export function languageIdFromName(name: string): string {
  const base = path.basename(name);
  const dot = base.lastIndexOf(".");
  return dot < 0 ? name : name.slice(0, name.length - (base.length - dot));
}

function formatIssues(issues: { path: PropertyKey[]; message: string }[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.map((part) => String(part)).join(".") : "body";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

function parseSource(source: CatalogSource): MessageMap {
  let raw: unknown;
  try {
    raw = JSON.parse(source.body);
  } catch (error) {
    throw new LoadError(source.name, error);
  }

  const parsed = MessageMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoadError(
      source.name,
      parsed.error,
      `expected a flat object of string messages (${formatIssues(parsed.error.issues)})`,
    );
  }
  return new Map(Object.entries(parsed.data));
}

/**
 * Per-language message templates keyed by message code.
 *
 * Built once and never mutated afterwards, so a single instance can be shared
 * by every request handler.
 */
export class Catalog {
  private readonly byLanguage: ReadonlyMap<string, MessageMap>;

  private constructor(byLanguage: ReadonlyMap<string, MessageMap>) {
    this.byLanguage = byLanguage;
  }

  /**
   * The language id of each source is its name without extension. A later
   * source with the same language id replaces an earlier one.
   */
  static build(sources: readonly CatalogSource[]): Catalog {
    if (sources.length === 0) {
      throw new EmptyCatalogError();
    }
    const byLanguage = new Map<string, MessageMap>();
    for (const source of sources) {
      byLanguage.set(languageIdFromName(source.name), parseSource(source));
    }
    return new Catalog(byLanguage);
  }

  static fromRecords(records: Readonly<Record<string, Readonly<Record<string, string>>>>): Catalog {
    const entries = Object.entries(records);
    if (entries.length === 0) {
      throw new EmptyCatalogError();
    }
    return new Catalog(new Map(entries.map(([language, messages]) => [language, new Map(Object.entries(messages))])));
  }

  get size(): number {
    return this.byLanguage.size;
  }

  get(language: string): MessageMap | undefined {
    return this.byLanguage.get(language);
  }

  has(language: string): boolean {
    return this.byLanguage.has(language);
  }

  languages(): string[] {
    return [...this.byLanguage.keys()].filter(Boolean);
  }
}

function collectSources(dir: string, into: CatalogSource[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new LoadError(dir, error);
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      collectSources(fullPath, into);
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    try {
      into.push({ name: entry.name, body: fs.readFileSync(fullPath, "utf8") });
    } catch (error) {
      throw new LoadError(fullPath, error);
    }
  }
}

// Nested directories are flattened: only the file name decides the language.
export function loadCatalogSources(langDir: string): CatalogSource[] {
  const sources: CatalogSource[] = [];
  collectSources(langDir, sources);
  return sources;
}

export function loadCatalog(langDir: string): Catalog {
  const sources = loadCatalogSources(langDir);
  if (sources.length === 0) {
    throw new EmptyCatalogError(langDir);
  }
  return Catalog.build(sources);
}
