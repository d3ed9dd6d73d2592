/**
 * In-process stand-ins for the code graph pipeline tests
 */

import { vi } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { DatabaseCreateOptions, IAnalysisCli } from "../analysis-cli.js";
import type { QueryRow } from "../types.js";
import { CommandFailedError } from "../../errors.js";

/**
 * Fake CLI. `databaseCreate` writes a marker directory; `queryRun` serves
 * rows keyed `{language}/{analysis}` from the query file's path.
 */
export class FakeAnalysisCli implements IAnalysisCli {
  revision: string | null = "rev-1";
  readonly rows = new Map<string, QueryRow[]>();
  readonly failingLanguages = new Set<string>();
  onCreate?: () => void;

  version = vi.fn(async () => "2.19.0");

  databaseCreate = vi.fn(
    async (databasePath: string, _sourceRoot: string, language: string, _options?: DatabaseCreateOptions) => {
      if (this.failingLanguages.has(language)) {
        throw new CommandFailedError(`codeql database create --language=${language}`, 2, "extractor crashed");
      }
      await fs.mkdir(databasePath, { recursive: true });
      await fs.writeFile(path.join(databasePath, "codeql-database.yml"), `primaryLanguage: ${language}\n`);
      this.onCreate?.();
    }
  );

  queryRun = vi.fn(async (_databasePath: string, queryFile: string): Promise<QueryRow[]> => {
    const language = path.basename(path.dirname(queryFile));
    return this.rows.get(`${language}/${path.basename(queryFile, ".ql")}`) ?? [];
  });

  currentRevision = vi.fn(async (_sourceRoot: string) => this.revision);
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** A decoded function entity as `bqrs decode` emits it */
export function fnEntity(name: string, file: string, startLine: number, endLine: number): QueryRow {
  return {
    label: name,
    url: { uri: `file:///repo/${file}`, startLine, startColumn: 1, endLine, endColumn: 1 },
  };
}
