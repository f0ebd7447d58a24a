import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import { compactDate } from "../core/normalize";
import { RankingEntrySchema, type RankingEntry } from "../domain/models";

const RankingPageSchema = z.object({
  contents: z.array(z.unknown()).default([]),
  next: z.union([z.number().int(), z.literal(false), z.null()]).optional(),
});

/** Source of a day's ranking listing. */
export interface RankingFeed {
  fetchDaily(date: string): Promise<RankingEntry[]>;
}

export interface RankingClientOptions {
  url: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class RankingClient implements RankingFeed {
  private readonly options: RankingClientOptions;

  constructor(options: Partial<RankingClientOptions> = {}) {
    this.options = { url: env.RANKING_URL, timeoutMs: env.UPSTREAM_TIMEOUT_MS, ...options };
  }

  /**
   * Collects every page of the daily illust ranking for an ISO date. A failed
   * page ends the listing with the entries gathered so far.
   */
  async fetchDaily(date: string): Promise<RankingEntry[]> {
    const entries: RankingEntry[] = [];
    let page: number | undefined = 1;

    while (page) {
      const url = new URL(this.options.url);
      url.searchParams.set("mode", "daily");
      url.searchParams.set("content", "illust");
      url.searchParams.set("date", compactDate(date));
      url.searchParams.set("p", String(page));
      url.searchParams.set("format", "json");

      let statusCode: number;
      let text: string;
      try {
        const response = await request(url, {
          method: "GET",
          headers: { referer: this.options.url },
          headersTimeout: this.options.timeoutMs,
          bodyTimeout: this.options.timeoutMs,
          dispatcher: this.options.dispatcher,
        });
        statusCode = response.statusCode;
        text = await response.body.text();
      } catch (error) {
        logger.error({ date, page, error: errorMessage(error) }, "Ranking page request failed");
        break;
      }

      if (statusCode !== 200) {
        logger.error({ date, page, status: statusCode, body: text.slice(0, 200) }, "Ranking page request failed");
        break;
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        logger.error({ date, page }, "Ranking page is not JSON");
        break;
      }

      const parsed = RankingPageSchema.safeParse(body);
      if (!parsed.success) {
        logger.error({ date, page, error: parsed.error.message }, "Unexpected ranking page shape");
        break;
      }

      for (const content of parsed.data.contents) {
        const entry = RankingEntrySchema.safeParse(content);
        if (entry.success) {
          entries.push(entry.data);
        } else {
          logger.warn({ date, page }, "Skipping malformed ranking entry");
        }
      }

      const next = parsed.data.next;
      page = typeof next === "number" && next > page ? next : undefined;
    }

    logger.debug({ date, count: entries.length }, "Fetched daily ranking");
    return entries;
  }
}
