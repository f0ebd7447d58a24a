import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import type { ListingSource, ResolutionSelection, SelectionMode, WorkItem } from "../domain/models";
import type { CacheSink } from "../services/json-store";
import { createAccumulator } from "../pipeline/top-k";
import { hasAnyResolution, type DownloadDriver, type DownloadSummary } from "../pipeline/download-driver";

export interface CrawlTarget {
  label: string;
  /** Opens the target's item stream; the sink is given when items should be persisted as they arrive. */
  open: (cacheSink?: CacheSink) => AsyncIterable<WorkItem>;
  /** Runs after the target's items are collected and downloaded. */
  after?: () => Promise<void>;
}

/** Append keeps items in arrival order, all of them when no limit is given. Top keeps the best `limit`. */
export type SelectionOptions =
  | { selection: Extract<SelectionMode, "append">; limit?: number }
  | {
      selection: Extract<SelectionMode, "top">;
      limit: number;
      /** The source already delivers best-first, so top selection is a cut at `limit`. */
      presorted?: boolean;
    };

export type CrawlOptions = SelectionOptions & {
  source: ListingSource;
  targets: CrawlTarget[];
  keepJson: boolean;
  resolutions?: ResolutionSelection;
};

export interface TargetResult {
  label: string;
  collected: number;
  download?: DownloadSummary;
  error?: string;
}

export interface CrawlResult {
  source: ListingSource;
  targets: TargetResult[];
  totalCollected: number;
  errors: Array<{ label: string; error: string }>;
}

interface Collected {
  items: WorkItem[];
  error?: string;
}

export interface ProgressReporter {
  targetStarted(source: ListingSource, label: string): void;
  itemAccepted(item: WorkItem, total: number): void;
  sourceFinished(source: ListingSource): void;
}

export class CrawlCoordinator {
  constructor(
    private readonly store: CacheSink,
    private readonly downloads: DownloadDriver,
    private readonly reporter: ProgressReporter
  ) {}

  async run(options: CrawlOptions): Promise<CrawlResult> {
    logger.info({ source: options.source, targets: options.targets.length }, "Starting crawl");

    const result: CrawlResult = {
      source: options.source,
      targets: [],
      totalCollected: 0,
      errors: [],
    };

    for (const target of options.targets) {
      const targetResult: TargetResult = { label: target.label, collected: 0 };
      result.targets.push(targetResult);
      this.reporter.targetStarted(options.source, target.label);

      try {
        const { items, error } = await this.collect(target, options);
        targetResult.collected = items.length;
        result.totalCollected += items.length;
        if (error) {
          targetResult.error = error;
          result.errors.push({ label: target.label, error });
        }

        if (options.selection === "top" && options.keepJson) {
          for (const item of items) {
            await this.store.saveIllust(item);
          }
        }

        if (options.resolutions && hasAnyResolution(options.resolutions)) {
          targetResult.download = await this.downloads.downloadAll(items, options.resolutions);
        }

        if (target.after) {
          await target.after();
        }
      } catch (error) {
        const message = errorMessage(error);
        logger.error({ source: options.source, target: target.label, error: message }, "Crawl target failed");
        targetResult.error = message;
        result.errors.push({ label: target.label, error: message });
      }
    }

    this.reporter.sourceFinished(options.source);
    logger.info(
      { source: options.source, totalCollected: result.totalCollected, failed: result.errors.length },
      "Crawl completed"
    );
    return result;
  }

  /**
   * A failure while streaming ends the target's data; whatever was collected
   * before it is still returned for persistence and download.
   */
  private async collect(target: CrawlTarget, options: CrawlOptions): Promise<Collected> {
    if (options.selection === "append") {
      const items: WorkItem[] = [];
      const limit = options.limit ?? Number.POSITIVE_INFINITY;
      const sink = options.keepJson ? this.store : undefined;
      if (limit <= 0) {
        return { items };
      }
      try {
        for await (const item of target.open(sink)) {
          items.push(item);
          this.reporter.itemAccepted(item, items.length);
          if (items.length >= limit) {
            break;
          }
        }
      } catch (error) {
        return { items, error: this.streamFailed(target, options.source, items.length, error) };
      }
      return { items };
    }

    const accumulator = createAccumulator(options.limit, { presorted: options.presorted });
    let seen = 0;
    try {
      for await (const item of target.open()) {
        seen++;
        accumulator.offer(item);
        this.reporter.itemAccepted(item, seen);
        if (options.presorted && accumulator.full) {
          break;
        }
      }
    } catch (error) {
      const message = this.streamFailed(target, options.source, seen, error);
      return { items: accumulator.drain(), error: message };
    }
    return { items: accumulator.drain() };
  }

  private streamFailed(target: CrawlTarget, source: ListingSource, collected: number, error: unknown): string {
    const message = errorMessage(error);
    logger.error({ source, target: target.label, collected, error: message }, "Listing stopped early");
    return message;
  }
}
