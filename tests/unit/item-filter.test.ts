import { describe, it, expect } from "vitest";
import { buildFilterCriteria, evaluateItem, isQualified, normalizeSexLevel } from "../../src/domain/item-filter";
import { workItem } from "../helpers/fixtures";

describe("buildFilterCriteria", () => {
  it("fills in the defaults", () => {
    const criteria = buildFilterCriteria();
    expect(criteria.maxPageCount).toBe(10);
    expect(criteria.minBookmarks).toBe(3000);
    expect(criteria.minQuality).toBeUndefined();
    expect(criteria.sexLevel).toBe(2);
    expect(criteria.excludedOwnerIds.size).toBe(0);
  });

  it("treats an unknown sex level as 2", () => {
    expect(buildFilterCriteria({ sexLevel: 7 }).sexLevel).toBe(2);
    expect(normalizeSexLevel(0)).toBe(2);
    expect(normalizeSexLevel(3)).toBe(3);
  });
});

describe("evaluateItem", () => {
  const criteria = buildFilterCriteria({ minBookmarks: 1000, minQuality: 5 });

  it("accepts an item passing every rule", () => {
    expect(evaluateItem(workItem(1, { total_bookmarks: 1000, total_view: 10000 }), criteria)).toEqual({ qualified: true });
  });

  it("rejects invisible items before anything else", () => {
    const verdict = evaluateItem(workItem(1, { visible: false, type: "manga", total_bookmarks: 0 }), criteria);
    expect(verdict).toEqual({ qualified: false, reason: "invisible", detail: "visible is false" });
  });

  it("rejects other kinds", () => {
    expect(evaluateItem(workItem(1, { type: "manga" }), criteria)).toMatchObject({ reason: "kind" });
  });

  it("rejects too many pages", () => {
    expect(evaluateItem(workItem(1, { page_count: 11 }), criteria)).toMatchObject({ reason: "page_count" });
  });

  it("rejects too few bookmarks", () => {
    expect(evaluateItem(workItem(1, { total_bookmarks: 999 }), criteria)).toMatchObject({
      reason: "bookmarks",
      detail: "bookmarks is 999",
    });
  });

  it("rejects low quality, including not-applicable quality", () => {
    expect(evaluateItem(workItem(1, { total_bookmarks: 1000, total_view: 100000 }), criteria)).toMatchObject({
      reason: "quality",
      detail: "quality is 1",
    });
    expect(evaluateItem(workItem(1, { total_bookmarks: 1000, total_view: 0 }), criteria)).toMatchObject({
      reason: "quality",
      detail: "quality is n/a",
    });
  });

  it("skips the quality rule when no minimum is set", () => {
    const noQuality = buildFilterCriteria({ minBookmarks: 0 });
    expect(evaluateItem(workItem(1, { total_view: 0 }), noQuality)).toEqual({ qualified: true });
  });

  it("applies the sex level to x_restrict and sanity_level", () => {
    const level1 = buildFilterCriteria({ minBookmarks: 0, sexLevel: 1 });
    const level2 = buildFilterCriteria({ minBookmarks: 0, sexLevel: 2 });
    const level3 = buildFilterCriteria({ minBookmarks: 0, sexLevel: 3 });

    expect(evaluateItem(workItem(1, { x_restrict: 1 }), level2)).toMatchObject({ reason: "x_restrict" });
    expect(evaluateItem(workItem(1, { x_restrict: 1, sanity_level: 6 }), level3)).toEqual({ qualified: true });
    expect(evaluateItem(workItem(1, { sanity_level: 4 }), level2)).toEqual({ qualified: true });
    expect(evaluateItem(workItem(1, { sanity_level: 5 }), level2)).toMatchObject({ reason: "sanity_level" });
    expect(evaluateItem(workItem(1, { sanity_level: 3 }), level1)).toMatchObject({ reason: "sanity_level" });
  });

  it("rejects excluded owners and ids", () => {
    const excluding = buildFilterCriteria({ minBookmarks: 0, excludedOwnerIds: [100], excludedItemIds: [9] });
    expect(evaluateItem(workItem(1, { user_id: 100 }), excluding)).toMatchObject({ reason: "excluded" });
    expect(evaluateItem(workItem(9, { user_id: 5 }), excluding)).toMatchObject({ reason: "excluded" });
    expect(evaluateItem(workItem(2, { user_id: 5 }), excluding)).toEqual({ qualified: true });
  });
});

describe("isQualified", () => {
  it("mirrors the verdict", () => {
    const criteria = buildFilterCriteria({ minBookmarks: 1000 });
    expect(isQualified(workItem(1, { total_bookmarks: 1000 }), criteria)).toBe(true);
    expect(isQualified(workItem(2, { total_bookmarks: 10 }), criteria)).toBe(false);
  });
});
