import { z } from "zod";

export const ListingSourceSchema = z.enum(["illust", "artist", "tag", "recommend", "related", "ranking"]);
export type ListingSource = z.infer<typeof ListingSourceSchema>;

export const RESOLUTIONS = ["square", "medium", "large", "origin"] as const;
export const ResolutionSchema = z.enum(RESOLUTIONS);
export type Resolution = z.infer<typeof ResolutionSchema>;
export type ResolutionSelection = Record<Resolution, boolean>;

export const SelectionModeSchema = z.enum(["append", "top"]);
export type SelectionMode = z.infer<typeof SelectionModeSchema>;

const ImageUrlsSchema = z
  .object({
    square_medium: z.string().optional(),
    medium: z.string().optional(),
    large: z.string().optional(),
    original: z.string().optional(),
  })
  .passthrough();

export const RawIllustSchema = z
  .object({
    id: z.number().int(),
    type: z.string(),
    title: z.string().optional(),
    page_count: z.number().int().min(1),
    total_bookmarks: z.number().int().nonnegative(),
    total_view: z.number().int().nonnegative(),
    sanity_level: z.number().int(),
    x_restrict: z.number().int(),
    create_date: z.string(),
    visible: z.boolean(),
    user: z.object({ id: z.number().int() }).passthrough(),
    image_urls: ImageUrlsSchema.nullish(),
    meta_single_page: z.object({ original_image_url: z.string().optional() }).passthrough().nullish(),
    meta_pages: z.array(z.object({ image_urls: ImageUrlsSchema }).passthrough()).nullish(),
  })
  .passthrough();
export type RawIllust = z.infer<typeof RawIllustSchema>;

export const RawUserDetailSchema = z
  .object({
    user: z
      .object({
        id: z.number().int(),
        name: z.string().optional(),
        profile_image_urls: z.object({ medium: z.string().optional() }).passthrough().nullish(),
      })
      .passthrough(),
  })
  .passthrough();
export type RawUserDetail = z.infer<typeof RawUserDetailSchema>;

export const RankingEntrySchema = z
  .object({
    illust_id: z.coerce.number().int(),
    rank: z.coerce.number().int(),
    yes_rank: z.coerce.number().int().default(0),
    title: z.string().optional(),
    user_id: z.coerce.number().int().optional(),
  })
  .passthrough();
export type RankingEntry = z.infer<typeof RankingEntrySchema>;

export type ImageRefs = Partial<Record<Resolution, string>>;

export type ImageSet =
  | { kind: "single"; refs: ImageRefs }
  | { kind: "multi"; pages: ImageRefs[] };

/** One illustration record as the pipeline sees it. Immutable once decoded. */
export interface WorkItem {
  readonly id: number;
  readonly kind: string;
  readonly title: string;
  readonly pageCount: number;
  readonly totalBookmarks: number;
  readonly totalViews: number;
  readonly sanityLevel: number;
  readonly xRestrict: number;
  /** ISO timestamp as delivered upstream, e.g. 2020-09-22T10:13:06+09:00 */
  readonly createDate: string;
  readonly ownerId: number;
  readonly visible: boolean;
  /** Bookmarks per 100 views, or null when not applicable. */
  readonly quality: number | null;
  readonly images: ImageSet;
  readonly raw: Readonly<Record<string, unknown>>;
}

export type SexLevel = 1 | 2 | 3;

export const FilterCriteriaInputSchema = z.object({
  maxPageCount: z.number().int().positive().default(10),
  minBookmarks: z.number().int().nonnegative().default(3000),
  minQuality: z.number().nonnegative().optional(),
  sexLevel: z.number().int().default(2),
  excludedOwnerIds: z.array(z.number().int()).default([]),
  excludedItemIds: z.array(z.number().int()).default([]),
});
export type FilterCriteriaInput = z.input<typeof FilterCriteriaInputSchema>;

export interface FilterCriteria {
  readonly maxPageCount: number;
  readonly minBookmarks: number;
  readonly minQuality?: number;
  readonly sexLevel: SexLevel;
  readonly excludedOwnerIds: ReadonlySet<number>;
  readonly excludedItemIds: ReadonlySet<number>;
}

export type RejectReason =
  | "invisible"
  | "kind"
  | "page_count"
  | "bookmarks"
  | "quality"
  | "x_restrict"
  | "sanity_level"
  | "excluded";

export type FilterVerdict =
  | { qualified: true }
  | { qualified: false; reason: RejectReason; detail: string };
