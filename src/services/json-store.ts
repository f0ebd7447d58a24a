import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { logger } from "../core/logger";
import { DecodeError, errorMessage } from "../core/errors";
import { compactDate, isRecord } from "../core/normalize";
import { decodeWorkItem } from "../domain/work-item";
import { RankingEntrySchema, RawUserDetailSchema, type RankingEntry, type RawUserDetail, type WorkItem } from "../domain/models";
import type { StorageLayout } from "./storage-layout";

export interface CanonicalJsonOptions {
  pretty?: boolean;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/** JSON with keys sorted at every depth; compact unless pretty. */
export function canonicalJson(value: unknown, options: CanonicalJsonOptions = {}): string {
  return JSON.stringify(sortKeys(value), null, options.pretty ? 4 : undefined);
}

/** Accepts items the page walker lets through. */
export interface CacheSink {
  saveIllust(item: WorkItem): Promise<void>;
}

/** Undefined for a missing or unparseable file, so callers fall back to the upstream. */
async function readJson(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      logger.warn({ file, error: error.message }, "Ignoring unparseable cache file");
      return undefined;
    }
    throw error;
  }
}

/** One JSON document per record, named by id (or date for rankings). */
export class JsonStore implements CacheSink {
  constructor(
    private readonly layout: StorageLayout,
    private readonly options: CanonicalJsonOptions = {}
  ) {}

  illustPath(id: number): string {
    return path.join(this.layout.json.illust, `${id}.json`);
  }

  userPath(id: number): string {
    return path.join(this.layout.json.user, `${id}.json`);
  }

  rankingPath(date: string): string {
    return path.join(this.layout.json.ranking, `${compactDate(date)}.json`);
  }

  async saveIllust(item: WorkItem): Promise<void> {
    await this.write(this.illustPath(item.id), item.raw);
  }

  async loadIllust(id: number): Promise<WorkItem | undefined> {
    const raw = await readJson(this.illustPath(id));
    if (raw === undefined) {
      return undefined;
    }
    try {
      return decodeWorkItem(raw);
    } catch (error) {
      if (error instanceof DecodeError) {
        logger.warn({ id, error: error.message }, "Ignoring unreadable cached illust");
        return undefined;
      }
      throw error;
    }
  }

  async saveUser(id: number, detail: RawUserDetail): Promise<void> {
    await this.write(this.userPath(id), detail);
  }

  async loadUser(id: number): Promise<RawUserDetail | undefined> {
    const raw = await readJson(this.userPath(id));
    if (raw === undefined) {
      return undefined;
    }
    const parsed = RawUserDetailSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  async saveRanking(date: string, entries: RankingEntry[]): Promise<void> {
    await this.write(this.rankingPath(date), entries);
  }

  async loadRanking(date: string): Promise<RankingEntry[] | undefined> {
    const raw = await readJson(this.rankingPath(date));
    if (!Array.isArray(raw)) {
      return undefined;
    }
    const entries: RankingEntry[] = [];
    for (const value of raw) {
      const parsed = RankingEntrySchema.safeParse(value);
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return entries;
  }

  private async write(file: string, data: unknown): Promise<void> {
    try {
      await writeFile(file, canonicalJson(data, this.options), "utf8");
    } catch (error) {
      logger.error({ file, error: errorMessage(error) }, "Failed to write JSON file");
      throw error;
    }
  }
}
