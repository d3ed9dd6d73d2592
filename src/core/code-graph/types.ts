/**
 * Code graph types
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Code Source
// =============================================================================

export const CODE_SOURCE_TYPES = ["gitlab", "filesystem"] as const;

export type CodeSourceType = (typeof CODE_SOURCE_TYPES)[number];

export function isCodeSourceType(value: string): value is CodeSourceType {
  return CODE_SOURCE_TYPES.some((type) => type === value);
}

/** Registry entry for one analyzable code location */
export interface CodeSource {
  sourceId: string;
  businessArea: string;
  sourceType: CodeSourceType;
  /** Repository path (`org/repo`) or filesystem path */
  path: string;
  languages: string[];
  name: string;
  enabled: boolean;
  lastAnalyzedCommit: string | null;
  lastAnalyzedTime: Date | null;
  metadata: Record<string, unknown>;
}

/** On-disk shape of a registry entry */
export const CodeSourceRecordSchema = z.object({
  source_id: z.string().min(1),
  business_area: z.string().min(1),
  source_type: z.enum(CODE_SOURCE_TYPES),
  path: z.string().min(1),
  languages: z.array(z.string()),
  name: z.string().nullable().optional(),
  enabled: z.boolean().default(true),
  last_analyzed_commit: z.string().nullable().optional(),
  last_analyzed_time: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
});

export type CodeSourceRecord = z.infer<typeof CodeSourceRecordSchema>;

export const RegistryFileSchema = z.record(CodeSourceRecordSchema);

export function toCodeSource(record: CodeSourceRecord): CodeSource {
  const time = record.last_analyzed_time ? new Date(record.last_analyzed_time) : null;
  return {
    sourceId: record.source_id,
    businessArea: record.business_area,
    sourceType: record.source_type,
    path: record.path,
    languages: [...record.languages],
    name: record.name ?? record.path,
    enabled: record.enabled,
    lastAnalyzedCommit: record.last_analyzed_commit ?? null,
    lastAnalyzedTime: time && !Number.isNaN(time.getTime()) ? time : null,
    metadata: { ...(record.metadata ?? {}) },
  };
}

export function toCodeSourceRecord(source: CodeSource): CodeSourceRecord {
  return {
    source_id: source.sourceId,
    business_area: source.businessArea,
    source_type: source.sourceType,
    path: source.path,
    languages: [...source.languages],
    name: source.name,
    enabled: source.enabled,
    last_analyzed_commit: source.lastAnalyzedCommit,
    last_analyzed_time: source.lastAnalyzedTime?.toISOString() ?? null,
    metadata: { ...source.metadata },
  };
}

// =============================================================================
// Build / Query / Emit
// =============================================================================

export interface BuildOutcome {
  status: "cached" | "built";
  databasePath: string;
  /** Revision the database reflects; null outside a git checkout */
  revision: string | null;
}

/**
 * One decoded result row. Columns are keyed `#1`, `#2`, ... in select order;
 * entity columns decode to objects (`label`, `url`, ...), primitives stay as-is.
 */
export type QueryRow = Record<string, unknown>;

/** analysis name -> rows */
export type QueryResults = Map<string, QueryRow[]>;

export interface EmitStats {
  nodes: number;
  edges: number;
}

// =============================================================================
// Analysis results
// =============================================================================

export type LanguageOutcome =
  | {
      status: "success";
      build: BuildOutcome["status"];
      databasePath: string;
      revision: string | null;
      /** analysis -> row count */
      queries: Record<string, number>;
    }
  | { status: "failed"; error: string };

export type SourceAnalysisResult =
  | {
      status: "success";
      sourceId: string;
      businessArea: string;
      repoPath: string;
      languages: Record<string, LanguageOutcome>;
      /** null when no language produced results or emission failed */
      graph: EmitStats | null;
      graphError?: string;
    }
  | { status: "skipped"; reason: "source_disabled" | "codeql_not_enabled_for_business_area" }
  | { status: "cancelled"; sourceId: string; reason: string }
  | { status: "error"; error: string };

export type AreaAnalysisResult =
  | { status: "success"; businessArea: string; sources: Record<string, SourceAnalysisResult> }
  | { status: "skipped"; businessArea: string; reason: "codeql_not_enabled_for_business_area" | "no_sources_registered" };
