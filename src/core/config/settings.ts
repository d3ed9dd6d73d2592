/**
 * Settings
 *
 * Values come from an optional JSON file (`.knowledge-router/config.json`)
 * overlaid by environment variables, then validated with zod.
 *
 * @module
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { DEFAULT_RETRIEVAL_LIMIT } from "../retrieval/types.js";
import {
  getCodeDatabaseDir,
  getConfigPath,
  getIngestionMetadataPath,
  getRegistryPath,
  readJsonFile,
} from "../../utils/index.js";

// =============================================================================
// Schema
// =============================================================================

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((v) => ["true", "false", "1", "0", "yes", "no"].includes(v), {
      message: "Expected a boolean",
    })
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

const stringList = z.union([
  z.array(z.string()),
  z.string().transform((v) => v.split(/[,|]/)),
]);

const positiveInt = z.coerce.number().int().positive();

export const SettingsSchema = z.object({
  businessAreas: stringList
    .transform((areas) => areas.map((a) => a.trim()).filter((a) => a.length > 0))
    .pipe(z.array(z.string()).min(1, "At least one business area is required"))
    .default(["pharmacy", "supply_chain"]),
  sourcesConfig: z.string().default(""),
  retrieverOverrides: z.string().default(""),

  codeGraph: z
    .object({
      enabled: booleanish.default(false),
      codeqlPath: z.string().optional(),
      databasePath: z.string().default(getCodeDatabaseDir()),
      registryPath: z.string().default(getRegistryPath()),
      defaultLanguages: stringList
        .transform((langs) => langs.map((l) => l.trim()).filter((l) => l.length > 0))
        .pipe(z.array(z.string()).min(1))
        .default(["python", "java"]),
      queriesDir: z.string().optional(),
      buildTimeoutMs: positiveInt.default(3_600_000),
      queryTimeoutMs: positiveInt.default(300_000),
      versionTimeoutMs: positiveInt.default(10_000),
    })
    .default({}),

  search: z
    .object({
      /** Plan limit used when a retrieval request names none */
      topK: z.coerce.number().int().min(1).max(50).default(DEFAULT_RETRIEVAL_LIMIT),
    })
    .default({}),

  ingestion: z
    .object({
      metadataPath: z.string().default(getIngestionMetadataPath()),
      chunkSize: positiveInt.default(1000),
      chunkOverlap: z.coerce.number().int().nonnegative().default(200),
      batchSize: positiveInt.default(100),
    })
    .default({}),

  qdrant: z
    .object({
      url: z.string().url().default("http://localhost:6333"),
      apiKey: z.string().optional(),
    })
    .default({}),

  embeddings: z
    .object({
      apiKey: z.string().optional(),
      model: z.string().default("text-embedding-004"),
      dimension: positiveInt.default(768),
    })
    .default({}),

  graphStore: z
    .object({
      engine: z.enum(["arangodb", "mem"]).default("arangodb"),
      url: z.string().default("http://localhost:8529"),
      database: z.string().default("knowledge_graph"),
      username: z.string().default("root"),
      password: z.string().optional(),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

// =============================================================================
// Environment mapping
// =============================================================================

type EnvSource = Record<string, string | undefined>;

/** env var -> [section, key] (section null = top level) */
const ENV_KEYS: ReadonlyArray<[string, string | null, string]> = [
  ["BUSINESS_AREAS", null, "businessAreas"],
  ["SOURCES_CONFIG", null, "sourcesConfig"],
  ["RETRIEVER_OVERRIDES", null, "retrieverOverrides"],
  ["CODE_GRAPH_ENABLED", "codeGraph", "enabled"],
  ["CODEQL_PATH", "codeGraph", "codeqlPath"],
  ["CODEQL_DATABASE_PATH", "codeGraph", "databasePath"],
  ["CODE_SOURCE_REGISTRY_PATH", "codeGraph", "registryPath"],
  ["CODE_GRAPH_DEFAULT_LANGUAGES", "codeGraph", "defaultLanguages"],
  ["CODEQL_QUERIES_DIR", "codeGraph", "queriesDir"],
  ["CODEQL_BUILD_TIMEOUT_MS", "codeGraph", "buildTimeoutMs"],
  ["CODEQL_QUERY_TIMEOUT_MS", "codeGraph", "queryTimeoutMs"],
  ["CODEQL_VERSION_TIMEOUT_MS", "codeGraph", "versionTimeoutMs"],
  ["TOP_K_RETRIEVAL", "search", "topK"],
  ["INGESTION_METADATA_PATH", "ingestion", "metadataPath"],
  ["CHUNK_SIZE", "ingestion", "chunkSize"],
  ["CHUNK_OVERLAP", "ingestion", "chunkOverlap"],
  ["INGESTION_BATCH_SIZE", "ingestion", "batchSize"],
  ["QDRANT_URL", "qdrant", "url"],
  ["QDRANT_API_KEY", "qdrant", "apiKey"],
  ["GOOGLE_API_KEY", "embeddings", "apiKey"],
  ["EMBEDDING_MODEL", "embeddings", "model"],
  ["EMBEDDING_DIMENSION", "embeddings", "dimension"],
  ["GRAPH_STORE", "graphStore", "engine"],
  ["ARANGODB_URL", "graphStore", "url"],
  ["ARANGODB_DATABASE", "graphStore", "database"],
  ["ARANGODB_USERNAME", "graphStore", "username"],
  ["ARANGODB_PASSWORD", "graphStore", "password"],
];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function settingsFromEnv(env: EnvSource): PlainObject {
  const result: PlainObject = {};
  for (const [envName, section, key] of ENV_KEYS) {
    const value = env[envName];
    if (value === undefined || value === "") continue;
    if (section === null) {
      result[key] = value;
      continue;
    }
    const existing = result[section];
    const target: PlainObject = isPlainObject(existing) ? existing : {};
    target[key] = value;
    result[section] = target;
  }
  return result;
}

function deepMerge(base: PlainObject, overlay: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

// =============================================================================
// Loading
// =============================================================================

export interface LoadSettingsOptions {
  env?: EnvSource;
  /** JSON config file; defaults to `.knowledge-router/config.json` under cwd */
  configPath?: string;
  /** Values applied on top of file and environment */
  overrides?: PlainObject;
}

/**
 * Validate a raw settings object
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseSettings(raw: unknown): Settings {
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join("; ")}`,
      ErrorCode.CONFIG_VALUE_INVALID,
      { issues }
    );
  }
  return parsed.data;
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const configPath = path.resolve(options.configPath ?? getConfigPath());

  let fileConfig: unknown;
  try {
    fileConfig = await readJsonFile(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIGURATION_ERROR,
      { configPath }
    );
  }
  const base: PlainObject = isPlainObject(fileConfig) ? fileConfig : {};
  if (fileConfig !== null && !isPlainObject(fileConfig)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, ErrorCode.CONFIG_VALUE_INVALID, {
      configPath,
    });
  }

  const merged = deepMerge(
    deepMerge(base, settingsFromEnv(options.env ?? process.env)),
    options.overrides ?? {}
  );
  return parseSettings(merged);
}
