import { logger } from "../core/logger";
import { pageJitter } from "../core/cooldown";
import { DecodeError } from "../core/errors";
import { formatParams } from "../core/retry";
import { isQualified } from "../domain/item-filter";
import { createdOn, decodeWorkItem } from "../domain/work-item";
import type { FilterCriteria, WorkItem } from "../domain/models";
import type { ApiPage } from "../api/client";
import { cursorToParams, type PageCursor, type QueryParams } from "../api/endpoints";
import type { CacheSink } from "../services/json-store";

export interface PageWalkerOptions {
  /** Fetches one page; undefined means the call was abandoned and ends the walk. */
  fetchPage: (params: QueryParams) => Promise<ApiPage | undefined>;
  initialParams: QueryParams;
  criteria: FilterCriteria;
  cacheSink?: CacheSink;
  delay?: () => Promise<void>;
  cursorToParams?: (cursor: PageCursor) => QueryParams;
  label?: string;
}

export interface PageWalkStats {
  pagesFetched: number;
  itemsSeen: number;
  itemsYielded: number;
  /** Last decoded item in upstream order, qualified or not. */
  lastSeen?: WorkItem;
  /** Decoded item with the earliest parseable creation date. */
  oldestSeen?: WorkItem;
}

/**
 * Lazily walks a paginated listing, yielding the items that pass the filter
 * in upstream order. The next page is only requested once the consumer asks
 * for an item beyond the current page. Single pass.
 */
export class PageWalker implements AsyncIterable<WorkItem> {
  readonly stats: PageWalkStats = { pagesFetched: 0, itemsSeen: 0, itemsYielded: 0 };
  private started = false;

  constructor(private readonly options: PageWalkerOptions) {}

  [Symbol.asyncIterator](): AsyncGenerator<WorkItem, void, undefined> {
    return this.stream();
  }

  async *stream(): AsyncGenerator<WorkItem, void, undefined> {
    if (this.started) {
      throw new Error("PageWalker can only be consumed once");
    }
    this.started = true;

    const { fetchPage, criteria, cacheSink } = this.options;
    const delay = this.options.delay ?? pageJitter;
    const nextParams = this.options.cursorToParams ?? cursorToParams;
    const label = this.options.label ?? "listing";
    let params = this.options.initialParams;

    while (true) {
      const page = await fetchPage(params);
      if (!page || page.items.length === 0) {
        if (this.stats.itemsSeen === 0) {
          logger.warn({ label, params }, `No illust found: ${label}(${formatParams(params)})`);
        }
        return;
      }
      this.stats.pagesFetched++;

      for (const raw of page.items) {
        const item = this.decode(raw, label);
        if (!item) {
          continue;
        }
        this.track(item);

        if (isQualified(item, criteria)) {
          logger.debug(
            { id: item.id, created: createdOn(item), bookmarks: item.totalBookmarks },
            `Fetched illust ${item.id}`
          );
          if (cacheSink) {
            await cacheSink.saveIllust(item);
          }
          this.stats.itemsYielded++;
          yield item;
        }
      }

      if (!page.nextCursor) {
        return;
      }
      params = nextParams(page.nextCursor);
      await delay();
      logger.debug({ label }, `Request next page: ${label}(${formatParams(params)})`);
    }
  }

  private decode(raw: unknown, label: string): WorkItem | undefined {
    try {
      return decodeWorkItem(raw);
    } catch (error) {
      if (error instanceof DecodeError) {
        logger.error({ label, issues: error.issues }, error.message);
        return undefined;
      }
      throw error;
    }
  }

  private track(item: WorkItem): void {
    this.stats.itemsSeen++;
    this.stats.lastSeen = item;

    const date = createdOn(item);
    if (!date) {
      return;
    }
    const oldest = this.stats.oldestSeen ? createdOn(this.stats.oldestSeen) : undefined;
    if (!oldest || date < oldest) {
      this.stats.oldestSeen = item;
    }
  }
}

export function streamPages(
  fetchPage: PageWalkerOptions["fetchPage"],
  initialParams: QueryParams,
  criteria: FilterCriteria,
  cacheSink?: CacheSink
): PageWalker {
  return new PageWalker({ fetchPage, initialParams, criteria, cacheSink });
}
