/**
 * Source Configuration Grammar
 *
 * Per-area source blocks and retriever overrides are written as compact
 * strings, one entry per `;` or newline:
 *
 * ```text
 * pharmacy:confluence(space_key=PHARM)
 * pharmacy:codeql(enabled=true,repos=org/refills|org/claims)
 * supply_chain:gitlab
 * pharmacy:gitlab=code|graph            (override)
 * ```
 *
 * A value containing `|` becomes a list. Blank entries and `#` comments are
 * skipped. Entry order is preserved per area.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type SourceConfigValue = string | string[];
export type SourceConfig = Record<string, SourceConfigValue>;

/** area -> ordered source name -> config */
export type SourcesConfigMap = Map<string, Map<string, SourceConfig>>;

/** area -> source name -> retriever names */
export type RetrieverOverridesMap = Map<string, Map<string, string[]>>;

const IDENT = "[A-Za-z0-9_.-]+";
const SOURCE_ENTRY = new RegExp(`^(${IDENT})\\s*:\\s*(${IDENT})\\s*(?:\\((.*)\\))?$`);
const OVERRIDE_ENTRY = new RegExp(`^(${IDENT})\\s*:\\s*(${IDENT})\\s*=\\s*(.+)$`);
const RETRIEVER_NAME = new RegExp(`^${IDENT}$`);

// =============================================================================
// Parsing
// =============================================================================

function splitEntries(text: string): string[] {
  return text
    .split(/[;\n]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && !entry.startsWith("#"));
}

function parseValue(raw: string): SourceConfigValue {
  const value = raw.trim();
  if (!value.includes("|")) return value;
  return value
    .split("|")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function parseParams(body: string, entry: string): SourceConfig {
  const config: SourceConfig = {};
  const trimmed = body.trim();
  if (trimmed.length === 0) return config;

  for (const pair of trimmed.split(",")) {
    const eq = pair.indexOf("=");
    const key = eq >= 0 ? pair.slice(0, eq).trim() : "";
    if (eq < 0 || key.length === 0) {
      throw new ConfigurationError(
        `Malformed source option '${pair.trim()}' in entry '${entry}'`,
        ErrorCode.CONFIG_GRAMMAR_INVALID,
        { entry }
      );
    }
    config[key] = parseValue(pair.slice(eq + 1));
  }
  return config;
}

/**
 * Parse `area:source(key=value,...)` entries.
 * A later entry for the same (area, source) replaces the earlier one.
 */
export function parseSourcesConfig(text: string | undefined): SourcesConfigMap {
  const result: SourcesConfigMap = new Map();
  if (!text) return result;

  for (const entry of splitEntries(text)) {
    const match = SOURCE_ENTRY.exec(entry);
    if (!match) {
      throw new ConfigurationError(
        `Malformed source entry '${entry}' (expected area:source(key=value,...))`,
        ErrorCode.CONFIG_GRAMMAR_INVALID,
        { entry }
      );
    }
    const [, area = "", source = "", body = ""] = match;
    let sources = result.get(area);
    if (!sources) {
      sources = new Map();
      result.set(area, sources);
    }
    sources.set(source, parseParams(body, entry));
  }
  return result;
}

/**
 * Parse `area:source=retriever1|retriever2` entries.
 */
export function parseRetrieverOverrides(text: string | undefined): RetrieverOverridesMap {
  const result: RetrieverOverridesMap = new Map();
  if (!text) return result;

  for (const entry of splitEntries(text)) {
    const match = OVERRIDE_ENTRY.exec(entry);
    const names = (match?.[3] ?? "")
      .split("|")
      .map((name) => name.trim())
      .filter((name) => name.length > 0);

    if (!match || names.length === 0 || !names.every((name) => RETRIEVER_NAME.test(name))) {
      throw new ConfigurationError(
        `Malformed retriever override '${entry}' (expected area:source=retriever1|retriever2)`,
        ErrorCode.CONFIG_GRAMMAR_INVALID,
        { entry }
      );
    }
    const [, area = "", source = ""] = match;
    let overrides = result.get(area);
    if (!overrides) {
      overrides = new Map();
      result.set(area, overrides);
    }
    overrides.set(source, names);
  }
  return result;
}

// =============================================================================
// Value helpers
// =============================================================================

export function configString(config: SourceConfig | undefined, key: string): string | undefined {
  const value = config?.[key];
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join("|") : value;
}

export function configList(config: SourceConfig | undefined, key: string): string[] {
  const value = config?.[key];
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  return value.length > 0 ? [value] : [];
}

/**
 * Interpret a config flag. Missing keys take `defaultValue`.
 */
export function configFlag(config: SourceConfig | undefined, key: string, defaultValue: boolean): boolean {
  const value = configString(config, key);
  if (value === undefined) return defaultValue;
  return ["true", "1", "yes", "on"].includes(value.toLowerCase());
}

// =============================================================================
// Resolver
// =============================================================================

export interface SourceConfigResolverOptions {
  businessAreas: readonly string[];
  sources?: SourcesConfigMap;
  overrides?: RetrieverOverridesMap;
}

/**
 * Resolved view of per-area sources and retriever overrides
 */
export class SourceConfigResolver {
  readonly businessAreas: readonly string[];
  private readonly sources: SourcesConfigMap;
  private readonly overrides: RetrieverOverridesMap;

  constructor(options: SourceConfigResolverOptions) {
    this.businessAreas = [...options.businessAreas];
    this.sources = options.sources ?? new Map();
    this.overrides = options.overrides ?? new Map();
  }

  static fromStrings(
    businessAreas: readonly string[],
    sourcesConfig?: string,
    retrieverOverrides?: string
  ): SourceConfigResolver {
    return new SourceConfigResolver({
      businessAreas,
      sources: parseSourcesConfig(sourcesConfig),
      overrides: parseRetrieverOverrides(retrieverOverrides),
    });
  }

  isKnownArea(area: string): boolean {
    return this.businessAreas.includes(area);
  }

  /**
   * Configured sources for an area in declaration order. When `subset` is
   * given, the result follows the subset's order and drops unknown names.
   */
  getSources(area: string, subset?: readonly string[]): Array<[string, SourceConfig]> {
    const configured = this.sources.get(area);
    if (!configured) return [];
    if (!subset) return [...configured.entries()];

    const selected: Array<[string, SourceConfig]> = [];
    for (const name of new Set(subset)) {
      const config = configured.get(name);
      if (config) selected.push([name, config]);
    }
    return selected;
  }

  getSourceConfig(area: string, source: string): SourceConfig | undefined {
    return this.sources.get(area)?.get(source);
  }

  getOverride(area: string, source: string): string[] | undefined {
    return this.overrides.get(area)?.get(source);
  }

  getOverrides(area: string): Map<string, string[]> {
    return new Map(this.overrides.get(area) ?? []);
  }

  /**
   * Areas that declare a block for the given source name
   */
  areasWithSource(source: string): string[] {
    return this.businessAreas.filter((area) => this.sources.get(area)?.has(source) ?? false);
  }
}
