import { logger } from "../core/logger";
import { pageJitter } from "../core/cooldown";
import { errorMessage } from "../core/errors";
import { isQualified } from "../domain/item-filter";
import type { FilterCriteria, RankingEntry, RawUserDetail, WorkItem } from "../domain/models";
import type { UpstreamGateway } from "../api/gateway";
import type { RankingFeed } from "../api/ranking-client";
import type { ListingEndpoint, QueryParams } from "../api/endpoints";
import type { CacheSink, JsonStore } from "../services/json-store";
import { PageWalker } from "../pipeline/page-walker";
import { walkDateWindows } from "../pipeline/date-window-walker";

/** Everything a listing source needs for one run, passed explicitly. */
export interface CrawlContext {
  gateway: UpstreamGateway;
  store: JsonStore;
  rankingFeed: RankingFeed;
  criteria: FilterCriteria;
  /** Pause between upstream requests; defaults to the configured jitter. */
  delay?: () => Promise<void>;
}

export interface TagSearchOptions {
  start: string;
  end: string;
  /** Trust the upstream popularity order instead of walking date windows. */
  popular?: boolean;
}

export interface RankingOptions {
  onlyNew?: boolean;
}

const SEARCH_DEFAULTS: QueryParams = {
  search_target: "partial_match_for_tags",
  filter: "for_ios",
};

function walk(
  ctx: CrawlContext,
  endpoint: ListingEndpoint,
  initialParams: QueryParams,
  cacheSink?: CacheSink
): PageWalker {
  return new PageWalker({
    fetchPage: ctx.gateway.listing(endpoint),
    initialParams,
    criteria: ctx.criteria,
    cacheSink,
    delay: ctx.delay,
    label: endpoint,
  });
}

export function artistWorks(ctx: CrawlContext, artistId: number, cacheSink?: CacheSink): AsyncIterable<WorkItem> {
  return walk(ctx, "userIllusts", { user_id: artistId, type: "illust", filter: "for_ios" }, cacheSink);
}

export function tagSearch(
  ctx: CrawlContext,
  word: string,
  options: TagSearchOptions,
  cacheSink?: CacheSink
): AsyncIterable<WorkItem> {
  if (options.popular) {
    return walk(ctx, "searchIllust", { ...SEARCH_DEFAULTS, word, sort: "popular_desc" }, cacheSink);
  }

  return walkDateWindows({
    start: options.start,
    end: options.end,
    openWindow: (window) =>
      walk(
        ctx,
        "searchIllust",
        { ...SEARCH_DEFAULTS, word, sort: "date_desc", start_date: window.start, end_date: window.end },
        cacheSink
      ),
  });
}

export function recommended(ctx: CrawlContext, cacheSink?: CacheSink): AsyncIterable<WorkItem> {
  return walk(
    ctx,
    "illustRecommended",
    { content_type: "illust", include_ranking_label: true, filter: "for_ios" },
    cacheSink
  );
}

export function related(ctx: CrawlContext, illustId: number, cacheSink?: CacheSink): AsyncIterable<WorkItem> {
  return walk(ctx, "illustRelated", { illust_id: illustId, filter: "for_ios" }, cacheSink);
}

/** Loads an illust from the JSON cache, falling back to the upstream. */
export async function fetchIllust(
  ctx: CrawlContext,
  illustId: number
): Promise<{ item: WorkItem; cached: boolean } | undefined> {
  const cached = await ctx.store.loadIllust(illustId);
  if (cached) {
    return { item: cached, cached: true };
  }
  const item = await ctx.gateway.illustDetail(illustId);
  return item ? { item, cached: false } : undefined;
}

export async function fetchArtist(
  ctx: CrawlContext,
  artistId: number,
  keepJson: boolean
): Promise<RawUserDetail | undefined> {
  const cached = await ctx.store.loadUser(artistId);
  if (cached) {
    return cached;
  }
  const detail = await ctx.gateway.userDetail(artistId);
  if (!detail) {
    logger.error({ artistId }, "Artist detail unavailable");
    return undefined;
  }
  if (keepJson) {
    await ctx.store.saveUser(artistId, detail);
  }
  return detail;
}

/** The day's ranking entries, cached by date once fetched. */
export async function rankingEntries(ctx: CrawlContext, date: string, keepJson: boolean): Promise<RankingEntry[]> {
  const cached = await ctx.store.loadRanking(date);
  if (cached) {
    return cached;
  }
  const entries = await ctx.rankingFeed.fetchDaily(date);
  if (keepJson) {
    await ctx.store.saveRanking(date, entries);
  }
  return entries;
}

export interface RankingListing {
  date: string;
  entries: number;
  error?: string;
}

/** Fetches and caches each day's ranking listing on its own; one failing day leaves the others alone. */
export async function storeRankingListings(
  ctx: CrawlContext,
  dates: readonly string[],
  keepJson: boolean
): Promise<RankingListing[]> {
  const listings: RankingListing[] = [];
  for (const date of dates) {
    try {
      const entries = await rankingEntries(ctx, date, keepJson);
      listings.push({ date, entries: entries.length });
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ date, error: message }, "Ranking listing failed");
      listings.push({ date, entries: 0, error: message });
    }
  }
  return listings;
}

export async function* dailyRanking(
  ctx: CrawlContext,
  date: string,
  options: RankingOptions & { keepJson: boolean },
  cacheSink?: CacheSink
): AsyncGenerator<WorkItem, void, undefined> {
  const delay = ctx.delay ?? pageJitter;
  const entries = await rankingEntries(ctx, date, options.keepJson);

  for (const entry of entries) {
    if (options.onlyNew && entry.yes_rank !== 0) {
      continue;
    }

    const fetched = await fetchIllust(ctx, entry.illust_id);
    if (fetched && isQualified(fetched.item, ctx.criteria)) {
      if (cacheSink && !fetched.cached) {
        await cacheSink.saveIllust(fetched.item);
      }
      yield fetched.item;
    }
    if (!fetched?.cached) {
      await delay();
    }
  }
}

/**
 * Illusts picked by id. The quality filter does not apply here; only
 * invisible or missing illusts are skipped.
 */
export async function* illustsById(
  ctx: CrawlContext,
  illustIds: readonly number[],
  cacheSink?: CacheSink
): AsyncGenerator<WorkItem, void, undefined> {
  for (const illustId of illustIds) {
    const fetched = await fetchIllust(ctx, illustId);
    if (!fetched || !fetched.item.visible) {
      logger.warn({ illustId }, `Not found: id=${illustId}`);
      continue;
    }
    if (cacheSink && !fetched.cached) {
      await cacheSink.saveIllust(fetched.item);
    }
    yield fetched.item;
  }
}
