import { logger } from "../core/logger";
import { addDays, parseIsoDate } from "../core/normalize";
import { createdOn } from "../domain/work-item";
import type { WorkItem } from "../domain/models";
import type { PageWalker } from "./page-walker";

/** Inclusive range of ISO calendar dates. */
export interface DateWindow {
  start: string;
  end: string;
}

export interface WindowRound {
  window: DateWindow;
  itemsSeen: number;
  itemsYielded: number;
  oldest?: WorkItem;
  /** End bound of the following round; absent on the final round. */
  nextEnd?: string;
}

export interface DateWindowWalkerOptions {
  start: string;
  end: string;
  /** Opens a date-descending walk restricted to the window. */
  openWindow: (window: DateWindow) => PageWalker;
  onRound?: (round: WindowRound) => void;
}

/**
 * Walks [start, end] in rounds, each a fresh listing over [start, windowEnd].
 * After a round the end bound moves to the day before the oldest item seen,
 * which gets past the upstream's offset ceiling on deep listings.
 */
export async function* walkDateWindows(options: DateWindowWalkerOptions): AsyncGenerator<WorkItem, void, undefined> {
  const { start, end } = options;
  if (!parseIsoDate(start) || !parseIsoDate(end)) {
    logger.warn({ start, end }, "Unparseable date range, nothing to walk");
    return;
  }

  let windowEnd = end;
  while (windowEnd >= start) {
    const window: DateWindow = { start, end: windowEnd };
    const walker = options.openWindow(window);
    for await (const item of walker) {
      yield item;
    }

    const { itemsSeen, itemsYielded, oldestSeen } = walker.stats;
    const round: WindowRound = { window, itemsSeen, itemsYielded, oldest: oldestSeen };
    if (itemsSeen === 0) {
      options.onRound?.(round);
      return;
    }

    const oldestDate = oldestSeen ? createdOn(oldestSeen) : undefined;
    const dayBefore = oldestDate ? addDays(oldestDate, -1) : undefined;
    if (!dayBefore) {
      logger.warn({ window }, "No parseable creation date in round, stopping");
      options.onRound?.(round);
      return;
    }

    // never let the bound stand still or grow, even if upstream strays outside the window
    const ceiling = addDays(windowEnd, -1);
    const nextEnd = ceiling !== undefined && ceiling < dayBefore ? ceiling : dayBefore;
    options.onRound?.({ ...round, nextEnd });
    logger.info({ window }, `The illusts created after ${nextEnd} have been checked`);
    windowEnd = nextEnd;
  }
}
