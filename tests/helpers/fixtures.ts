import type { ApiPage } from "../../src/api/client";
import type { QueryParams } from "../../src/api/endpoints";
import { decodeWorkItem } from "../../src/domain/work-item";
import type { WorkItem } from "../../src/domain/models";

export interface RawIllustOverrides {
  type?: string;
  page_count?: number;
  total_bookmarks?: number;
  total_view?: number;
  sanity_level?: number;
  x_restrict?: number;
  create_date?: string;
  visible?: boolean;
  user_id?: number;
}

export function rawIllust(id: number, overrides: RawIllustOverrides = {}): Record<string, unknown> {
  return {
    id,
    type: overrides.type ?? "illust",
    title: `illust ${id}`,
    page_count: overrides.page_count ?? 1,
    total_bookmarks: overrides.total_bookmarks ?? 5000,
    total_view: overrides.total_view ?? 50000,
    sanity_level: overrides.sanity_level ?? 2,
    x_restrict: overrides.x_restrict ?? 0,
    create_date: overrides.create_date ?? "2020-06-01T12:00:00+09:00",
    visible: overrides.visible ?? true,
    user: { id: overrides.user_id ?? 100 },
    image_urls: {
      square_medium: `https://img.example.test/sq/${id}_p0.jpg`,
      medium: `https://img.example.test/md/${id}_p0.jpg`,
      large: `https://img.example.test/lg/${id}_p0.jpg`,
    },
    meta_single_page: { original_image_url: `https://img.example.test/orig/${id}_p0.png` },
    meta_pages: [],
  };
}

export function workItem(id: number, overrides: RawIllustOverrides = {}): WorkItem {
  return decodeWorkItem(rawIllust(id, overrides));
}

/** Serves scripted pages in order and records the params of each request. */
export class ScriptedPages {
  readonly requests: QueryParams[] = [];
  private index = 0;

  constructor(private readonly pages: Array<ApiPage | undefined>) {}

  readonly fetchPage = async (params: QueryParams): Promise<ApiPage | undefined> => {
    this.requests.push(params);
    const page = this.pages[this.index];
    this.index++;
    return page;
  };
}

export const noDelay = async (): Promise<void> => {};
