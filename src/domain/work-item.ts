import { DecodeError } from "../core/errors";
import { isRecord, parseIsoDate } from "../core/normalize";
import { RawIllustSchema, type ImageRefs, type ImageSet, type RawIllust, type WorkItem } from "./models";

type RawImageUrls = NonNullable<RawIllust["image_urls"]>;

export function computeQuality(totalBookmarks: number, totalViews: number, visible: boolean): number | null {
  if (!visible || totalViews <= 0) {
    return null;
  }
  return Math.round((totalBookmarks / totalViews) * 100 * 100) / 100;
}

function pageRefs(urls: RawImageUrls | null | undefined, original?: string): ImageRefs {
  const refs: ImageRefs = {};
  if (urls?.square_medium) refs.square = urls.square_medium;
  if (urls?.medium) refs.medium = urls.medium;
  if (urls?.large) refs.large = urls.large;
  const origin = original ?? urls?.original;
  if (origin) refs.origin = origin;
  return refs;
}

function buildImageSet(raw: RawIllust): ImageSet {
  const metaPages = raw.meta_pages ?? [];
  if (raw.page_count > 1 && metaPages.length > 0) {
    return { kind: "multi", pages: metaPages.map((page) => pageRefs(page.image_urls)) };
  }
  return {
    kind: "single",
    refs: pageRefs(raw.image_urls, raw.meta_single_page?.original_image_url),
  };
}

/**
 * Validates an upstream illust record and builds the typed item.
 * Throws DecodeError listing every missing or invalid field.
 */
export function decodeWorkItem(input: unknown): WorkItem {
  if (!isRecord(input)) {
    throw new DecodeError("Illust record is not an object", "NOT_AN_OBJECT");
  }

  const parsed = RawIllustSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    const id = typeof input.id === "number" ? input.id : "unknown";
    throw new DecodeError(`Invalid illust record ${id}: ${issues.join("; ")}`, "INVALID_ILLUST", issues);
  }

  const raw = parsed.data;
  return Object.freeze({
    id: raw.id,
    kind: raw.type,
    title: raw.title ?? "",
    pageCount: raw.page_count,
    totalBookmarks: raw.total_bookmarks,
    totalViews: raw.total_view,
    sanityLevel: raw.sanity_level,
    xRestrict: raw.x_restrict,
    createDate: raw.create_date,
    ownerId: raw.user.id,
    visible: raw.visible,
    quality: computeQuality(raw.total_bookmarks, raw.total_view, raw.visible),
    images: buildImageSet(raw),
    raw: Object.freeze({ ...input }),
  });
}

function qualityRank(quality: number | null): number {
  return quality ?? Number.NEGATIVE_INFINITY;
}

/** Ranking order: bookmarks, then quality, then id. Negative when `a` ranks below `b`. */
export function compareWorkItems(a: WorkItem, b: WorkItem): number {
  if (a.totalBookmarks !== b.totalBookmarks) {
    return a.totalBookmarks - b.totalBookmarks;
  }
  const qa = qualityRank(a.quality);
  const qb = qualityRank(b.quality);
  if (qa !== qb) {
    return qa < qb ? -1 : 1;
  }
  return a.id - b.id;
}

/** Calendar date part (YYYY-MM-DD) of the upstream creation timestamp, or undefined when malformed. */
export function createdOn(item: WorkItem): string | undefined {
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(item.createDate);
  if (!match?.[1]) {
    return undefined;
  }
  return parseIsoDate(match[1]) ? match[1] : undefined;
}
