import { logger } from "../core/logger";
import {
  FilterCriteriaInputSchema,
  type FilterCriteria,
  type FilterCriteriaInput,
  type FilterVerdict,
  type RejectReason,
  type SexLevel,
  type WorkItem,
} from "./models";

export function normalizeSexLevel(level: number): SexLevel {
  return level === 1 || level === 2 || level === 3 ? level : 2;
}

export function buildFilterCriteria(input: FilterCriteriaInput = {}): FilterCriteria {
  const parsed = FilterCriteriaInputSchema.parse(input);
  return Object.freeze({
    maxPageCount: parsed.maxPageCount,
    minBookmarks: parsed.minBookmarks,
    minQuality: parsed.minQuality,
    sexLevel: normalizeSexLevel(parsed.sexLevel),
    excludedOwnerIds: new Set(parsed.excludedOwnerIds),
    excludedItemIds: new Set(parsed.excludedItemIds),
  });
}

function reject(reason: RejectReason, detail: string): FilterVerdict {
  return { qualified: false, reason, detail };
}

export function evaluateItem(item: WorkItem, criteria: FilterCriteria): FilterVerdict {
  if (!item.visible) {
    return reject("invisible", `visible is ${item.visible}`);
  }
  if (item.kind !== "illust") {
    return reject("kind", `type is ${item.kind}`);
  }
  if (item.pageCount > criteria.maxPageCount) {
    return reject("page_count", `page count is ${item.pageCount}`);
  }
  if (item.totalBookmarks < criteria.minBookmarks) {
    return reject("bookmarks", `bookmarks is ${item.totalBookmarks}`);
  }
  if (criteria.minQuality !== undefined && (item.quality ?? Number.NEGATIVE_INFINITY) < criteria.minQuality) {
    return reject("quality", `quality is ${item.quality ?? "n/a"}`);
  }

  // criteria may come from a caller that skipped buildFilterCriteria
  const sexLevel = normalizeSexLevel(criteria.sexLevel);
  if (sexLevel < 3 && item.xRestrict > 0) {
    return reject("x_restrict", `x_restrict=${item.xRestrict}`);
  }
  if (sexLevel === 2 && item.sanityLevel > 4) {
    return reject("sanity_level", `sanity_level=${item.sanityLevel}`);
  }
  if (sexLevel === 1 && item.sanityLevel > 2) {
    return reject("sanity_level", `sanity_level=${item.sanityLevel}`);
  }

  if (criteria.excludedOwnerIds.has(item.ownerId) || criteria.excludedItemIds.has(item.id)) {
    return reject("excluded", "excluded owner or item id");
  }

  return { qualified: true };
}

export function isQualified(item: WorkItem, criteria: FilterCriteria): boolean {
  const verdict = evaluateItem(item, criteria);
  if (!verdict.qualified) {
    logger.debug({ id: item.id, reason: verdict.reason }, `Skip illust ${item.id}: ${verdict.detail}`);
    return false;
  }
  return true;
}
