export const ENDPOINTS = {
  userIllusts: { path: "/v1/user/illusts", itemsKey: "illusts" },
  searchIllust: { path: "/v1/search/illust", itemsKey: "illusts" },
  illustRecommended: { path: "/v1/illust/recommended", itemsKey: "illusts" },
  illustRelated: { path: "/v2/illust/related", itemsKey: "illusts" },
  illustRanking: { path: "/v1/illust/ranking", itemsKey: "illusts" },
  illustDetail: { path: "/v1/illust/detail", itemsKey: null },
  userDetail: { path: "/v1/user/detail", itemsKey: null },
} as const;

export type EndpointName = keyof typeof ENDPOINTS;

/** Endpoints that answer with a page of items and a next-page cursor. */
export type ListingEndpoint = {
  [K in EndpointName]: (typeof ENDPOINTS)[K]["itemsKey"] extends string ? K : never;
}[EndpointName];

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

/** Opaque next-page token; passed back without interpretation except through cursorToParams. */
export type PageCursor = string;

export function cursorToParams(cursor: PageCursor): QueryParams {
  const params: QueryParams = {};
  const url = new URL(cursor, "http://cursor.invalid");
  for (const [key, value] of url.searchParams) {
    params[key] = value;
  }
  return params;
}

export function buildUrl(baseUrl: string, path: string, params: QueryParams): URL {
  const url = new URL(path, baseUrl);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
}
