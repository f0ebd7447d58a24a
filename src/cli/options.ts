import type { Command } from "commander";
import { z } from "zod";
import { env } from "../core/config";
import { eachDay, parseIsoDate } from "../core/normalize";
import { RESOLUTIONS, type ResolutionSelection } from "../domain/models";
import type { SelectionOptions } from "../orchestration/crawl-coordinator";

const RESOLUTION_LETTERS: Record<string, (typeof RESOLUTIONS)[number]> = {
  s: "square",
  m: "medium",
  l: "large",
  o: "origin",
};

const idList = z.array(z.coerce.number().int().positive()).default([]);

export const CommonOptionsSchema = z.object({
  minBookmarks: z.coerce.number().int().nonnegative(),
  maxPageCount: z.coerce.number().int().positive(),
  minQuality: z.coerce.number().nonnegative().optional(),
  sexLevel: z.coerce.number().int(),
  limit: z.coerce.number().int().nonnegative(),
  keepJson: z.boolean().default(false),
  resolution: z.string().optional(),
  path: z.string(),
  show: z.string().optional(),
  skipArtists: idList,
  skipIllusts: idList,
  log: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
});
export type CommonOptions = z.infer<typeof CommonOptionsSchema>;

export function withCommonOptions(command: Command): Command {
  return command
    .option("-b, --min-bookmarks <n>", "Min bookmarks of an illust", "3000")
    .option("-c, --max-page-count <n>", "Max page count of an illust", "10")
    .option("-q, --min-quality <n>", "Min quality, i.e. bookmarks per 100 views")
    .option("-l, --sex-level <n>", "Max sex level of an illust: 1, 2 or 3", "2")
    .option("-n, --limit <n>", "Number of illusts to keep per target", "300")
    .option("-k, --keep-json", "Keep the JSON of fetched illusts")
    .option("-r, --resolution <letters>", "Resolutions to download: s / m / l / o (square / medium / large / origin), combinable")
    .option("-p, --path <dir>", "Storage directory", env.STORAGE_DIR)
    .option("--show <fields>", "Print these fields of each illust, comma separated, or ALL")
    .option("--skip-artists <ids...>", "Artist ids whose illusts are skipped")
    .option("--skip-illusts <ids...>", "Illust ids to skip")
    .option("--log <level>", "Log level");
}

/** "sl" -> square and large. Undefined when no known letter is given. */
export function parseResolutions(letters?: string): ResolutionSelection | undefined {
  if (!letters) {
    return undefined;
  }
  const selection: ResolutionSelection = { square: false, medium: false, large: false, origin: false };
  let any = false;
  for (const letter of letters.toLowerCase()) {
    const resolution = RESOLUTION_LETTERS[letter];
    if (resolution) {
      selection[resolution] = true;
      any = true;
    }
  }
  return any ? selection : undefined;
}

export function parseShowFields(show?: string): string[] {
  return show ? show.split(",").map((f) => f.trim()).filter((f) => f.length > 0) : [];
}

/** Positive integer ids; anything else is reported through onInvalid and dropped. */
export function parseIds(values: readonly string[], onInvalid: (value: string) => void): number[] {
  const ids: number[] = [];
  for (const value of values) {
    const id = Number(value);
    if (Number.isInteger(id) && id > 0) {
      ids.push(id);
    } else {
      onInvalid(value);
    }
  }
  return ids;
}

/** Expands "YYYY-MM-DD" and "start,end" arguments into days; unparseable ones are skipped. */
export function expandDates(values: readonly string[]): string[] {
  const days: string[] = [];
  for (const value of values) {
    if (value.includes(",")) {
      const [start = "", end = ""] = value.split(",");
      days.push(...eachDay(start.trim(), end.trim()));
    } else if (parseIsoDate(value)) {
      days.push(value.trim());
    }
  }
  return days;
}

/** A day's ranking keeps every qualifying entry unless only the best `limit` are asked for. */
export function rankingSelection(best: boolean, limit: number): SelectionOptions {
  return best ? { selection: "top", limit } : { selection: "append" };
}
