import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { UpstreamGateway } from "../../src/api/gateway";
import { ApiError } from "../../src/core/errors";
import type { ApiResponse } from "../../src/api/client";
import type { EndpointName, QueryParams } from "../../src/api/endpoints";
import type { RankingFeed } from "../../src/api/ranking-client";
import { buildFilterCriteria } from "../../src/domain/item-filter";
import type { ListingSource, RankingEntry, WorkItem } from "../../src/domain/models";
import { createStorageLayout, type StorageLayout } from "../../src/services/storage-layout";
import { JsonStore } from "../../src/services/json-store";
import { DownloadDriver } from "../../src/pipeline/download-driver";
import { CrawlCoordinator, type ProgressReporter } from "../../src/orchestration/crawl-coordinator";
import {
  artistWorks,
  dailyRanking,
  illustsById,
  recommended,
  related,
  storeRankingListings,
  tagSearch,
  type CrawlContext,
} from "../../src/orchestration/listing-sources";
import { FakeUpstream, okResponse } from "../helpers/fake-upstream";
import { noDelay, rawIllust, workItem } from "../helpers/fixtures";

class RecordingReporter implements ProgressReporter {
  readonly started: string[] = [];
  readonly accepted: number[] = [];
  readonly finished: ListingSource[] = [];

  targetStarted(_source: ListingSource, label: string): void {
    this.started.push(label);
  }

  itemAccepted(item: WorkItem): void {
    this.accepted.push(item.id);
  }

  sourceFinished(source: ListingSource): void {
    this.finished.push(source);
  }
}

class StaticRankingFeed implements RankingFeed {
  constructor(
    private readonly entries: RankingEntry[],
    private readonly failingDates: ReadonlySet<string> = new Set<string>()
  ) {}

  async fetchDaily(date: string): Promise<RankingEntry[]> {
    if (this.failingDates.has(date)) {
      throw new Error(`ranking ${date} unavailable`);
    }
    return this.entries;
  }
}

const NEXT = "https://api.example.test/v1/user/illusts?user_id=5&type=illust&filter=for_ios";

function artistPages(endpoint: EndpointName, params: QueryParams): ApiResponse {
  if (endpoint !== "userIllusts") {
    return okResponse({});
  }
  switch (params.offset) {
    case undefined:
      return okResponse({
        illusts: [rawIllust(1, { total_bookmarks: 4000 }), rawIllust(2, { total_bookmarks: 200 })],
        next_url: `${NEXT}&offset=30`,
      });
    case "30":
      return okResponse({
        illusts: [rawIllust(3, { total_bookmarks: 100 }), rawIllust(4, { total_bookmarks: 1500 })],
        next_url: `${NEXT}&offset=60`,
      });
    default:
      return okResponse({
        illusts: [rawIllust(5, { total_bookmarks: 999 }), rawIllust(6, { total_bookmarks: 1000 })],
        next_url: null,
      });
  }
}

describe("crawl pipeline", () => {
  let dir: string;
  let layout: StorageLayout;
  let store: JsonStore;
  let reporter: RecordingReporter;

  async function harness(
    handler: (endpoint: EndpointName, params: QueryParams) => ApiResponse,
    entries: RankingEntry[] = [],
    failingDates?: ReadonlySet<string>
  ) {
    const upstream = new FakeUpstream(handler);
    const gateway = new UpstreamGateway(upstream, { refreshToken: "test-refresh-token" }, { sleep: noDelay });
    await gateway.login();
    const ctx: CrawlContext = {
      gateway,
      store,
      rankingFeed: new StaticRankingFeed(entries, failingDates),
      criteria: buildFilterCriteria({ minBookmarks: 1000 }),
      delay: noDelay,
    };
    const coordinator = new CrawlCoordinator(store, new DownloadDriver(gateway, layout), reporter);
    return { upstream, ctx, coordinator };
  }

  async function savedIllustIds(): Promise<string[]> {
    return (await readdir(layout.json.illust)).sort();
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "crawl-"));
    layout = await createStorageLayout(dir);
    store = new JsonStore(layout);
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("collects the qualifying items of every page in upstream order", async () => {
    const { upstream, ctx, coordinator } = await harness(artistPages);

    const result = await coordinator.run({
      source: "artist",
      targets: [{ label: "5", open: (sink) => artistWorks(ctx, 5, sink) }],
      limit: 300,
      selection: "append",
      keepJson: true,
      resolutions: { square: false, medium: false, large: true, origin: false },
    });

    expect(result.totalCollected).toBe(3);
    expect(result.errors).toEqual([]);
    expect(reporter.accepted).toEqual([1, 4, 6]);
    expect(reporter.finished).toEqual(["artist"]);
    expect(upstream.calls.map((call) => call.params.offset)).toEqual([undefined, "30", "60"]);
    expect(await savedIllustIds()).toEqual(["1.json", "4.json", "6.json"]);
    expect(upstream.downloads).toEqual([
      { url: "https://img.example.test/lg/1_p0.jpg", destDir: layout.img.large },
      { url: "https://img.example.test/lg/4_p0.jpg", destDir: layout.img.large },
      { url: "https://img.example.test/lg/6_p0.jpg", destDir: layout.img.large },
    ]);
    expect(result.targets[0]?.download).toEqual({ total: 3, succeeded: 3, failedIds: [] });
  });

  it("stops requesting pages once the limit is reached", async () => {
    const { upstream, ctx, coordinator } = await harness(artistPages);

    const result = await coordinator.run({
      source: "artist",
      targets: [{ label: "5", open: (sink) => artistWorks(ctx, 5, sink) }],
      limit: 2,
      selection: "append",
      keepJson: false,
    });

    expect(result.totalCollected).toBe(2);
    expect(upstream.calls).toHaveLength(2);
    expect(await savedIllustIds()).toEqual([]);
  });

  it("keeps the best items of a tag across date windows", async () => {
    const { upstream, ctx, coordinator } = await harness((endpoint, params) => {
      if (endpoint !== "searchIllust") {
        return okResponse({});
      }
      if (params.end_date === "2020-06-30") {
        return okResponse({
          illusts: [
            rawIllust(11, { total_bookmarks: 2000, create_date: "2020-06-10T00:00:00+09:00" }),
            rawIllust(12, { total_bookmarks: 9000, create_date: "2020-05-20T00:00:00+09:00" }),
          ],
        });
      }
      if (params.end_date === "2020-05-19") {
        return okResponse({
          illusts: [
            rawIllust(13, { total_bookmarks: 5000, create_date: "2020-05-01T00:00:00+09:00" }),
            rawIllust(14, { total_bookmarks: 100, create_date: "2020-04-01T00:00:00+09:00" }),
          ],
        });
      }
      return okResponse({ illusts: [] });
    });

    const result = await coordinator.run({
      source: "tag",
      targets: [
        { label: "cat", open: () => tagSearch(ctx, "cat", { start: "2020-01-01", end: "2020-06-30" }) },
      ],
      limit: 2,
      selection: "top",
      keepJson: true,
    });

    expect(result.totalCollected).toBe(2);
    expect(upstream.calls.map((call) => call.params.end_date)).toEqual(["2020-06-30", "2020-05-19", "2020-03-31"]);
    expect(upstream.calls[0]?.params).toMatchObject({ word: "cat", sort: "date_desc", start_date: "2020-01-01" });
    expect(reporter.accepted).toEqual([11, 12, 13]);
    expect(await savedIllustIds()).toEqual(["12.json", "13.json"]);
  });

  it("walks a day's ranking, skipping entries that are not new", async () => {
    const entries: RankingEntry[] = [
      { illust_id: 21, rank: 1, yes_rank: 0 },
      { illust_id: 22, rank: 2, yes_rank: 4 },
      { illust_id: 23, rank: 3, yes_rank: 0 },
      { illust_id: 24, rank: 4, yes_rank: 0 },
    ];
    const { upstream, ctx, coordinator } = await harness((endpoint, params) => {
      const id = Number(params.illust_id);
      return okResponse({ illust: rawIllust(id, { total_bookmarks: id === 24 ? 10 : 3000 }) });
    }, entries);
    const finished: string[] = [];

    const result = await coordinator.run({
      source: "ranking",
      targets: [
        {
          label: "2021-03-04",
          open: (sink) => dailyRanking(ctx, "2021-03-04", { onlyNew: true, keepJson: true }, sink),
          after: async () => void finished.push("2021-03-04"),
        },
      ],
      limit: 300,
      selection: "append",
      keepJson: true,
    });

    expect(result.totalCollected).toBe(2);
    expect(reporter.accepted).toEqual([21, 23]);
    expect(upstream.calls.map((call) => call.params.illust_id)).toEqual([21, 23, 24]);
    expect(await store.loadRanking("2021-03-04")).toEqual(entries);
    expect(finished).toEqual(["2021-03-04"]);
  });

  it("serves illusts by id from the cache first and skips missing ones", async () => {
    await store.saveIllust(workItem(31));
    const { upstream, ctx, coordinator } = await harness((_endpoint, params) =>
      params.illust_id === 33 ? okResponse({ illust: rawIllust(33, { total_bookmarks: 1 }) }) : okResponse({})
    );

    const result = await coordinator.run({
      source: "illust",
      targets: [{ label: "31,32,33", open: (sink) => illustsById(ctx, [31, 32, 33], sink) }],
      limit: 3,
      selection: "append",
      keepJson: true,
    });

    expect(reporter.accepted).toEqual([31, 33]);
    expect(result.totalCollected).toBe(2);
    expect(upstream.calls.map((call) => call.params.illust_id)).toEqual([32, 33]);
    expect(await savedIllustIds()).toEqual(["31.json", "33.json"]);
  });

  it("records a failing target and moves on to the next", async () => {
    const { ctx, coordinator } = await harness((endpoint, params) => {
      if (params.user_id === 666) {
        throw new Error("upstream exploded");
      }
      return artistPages(endpoint, params);
    });

    const result = await coordinator.run({
      source: "artist",
      targets: [
        { label: "666", open: (sink) => artistWorks(ctx, 666, sink) },
        { label: "5", open: (sink) => artistWorks(ctx, 5, sink) },
      ],
      limit: 300,
      selection: "append",
      keepJson: false,
    });

    expect(result.errors).toEqual([{ label: "666", error: "upstream exploded" }]);
    expect(result.targets.map((target) => target.collected)).toEqual([0, 3]);
    expect(reporter.started).toEqual(["666", "5"]);
  });

  it("queries the recommended and related listings", async () => {
    const { upstream, ctx, coordinator } = await harness(() => okResponse({ illusts: [rawIllust(41)] }));

    await coordinator.run({
      source: "recommend",
      targets: [
        { label: "recommended", open: (sink) => recommended(ctx, sink) },
        { label: "8", open: (sink) => related(ctx, 8, sink) },
      ],
      limit: 10,
      selection: "append",
      keepJson: false,
    });

    expect(upstream.calls.map((call) => [call.endpoint, call.params])).toEqual([
      ["illustRecommended", { content_type: "illust", include_ranking_label: true, filter: "for_ios" }],
      ["illustRelated", { illust_id: 8, filter: "for_ios" }],
    ]);
    expect(reporter.accepted).toEqual([41, 41]);
  });

  it("downloads what a listing yielded before it failed", async () => {
    const { ctx, coordinator, upstream } = await harness((_endpoint, params) => {
      if (params.offset === "30") {
        throw new ApiError("Upstream returned a non-JSON body (status 200)", "INVALID_BODY");
      }
      return okResponse({
        illusts: [rawIllust(1, { total_bookmarks: 4000 }), rawIllust(2, { total_bookmarks: 2000 })],
        next_url: `${NEXT}&offset=30`,
      });
    });

    const result = await coordinator.run({
      source: "artist",
      targets: [{ label: "5", open: (sink) => artistWorks(ctx, 5, sink) }],
      selection: "append",
      keepJson: true,
      resolutions: { square: false, medium: false, large: true, origin: false },
    });

    expect(result.targets).toEqual([
      {
        label: "5",
        collected: 2,
        error: "Upstream returned a non-JSON body (status 200)",
        download: { total: 2, succeeded: 2, failedIds: [] },
      },
    ]);
    expect(result.errors).toEqual([{ label: "5", error: "Upstream returned a non-JSON body (status 200)" }]);
    expect(upstream.downloads.map((download) => download.url)).toEqual([
      "https://img.example.test/lg/1_p0.jpg",
      "https://img.example.test/lg/2_p0.jpg",
    ]);
    expect(await savedIllustIds()).toEqual(["1.json", "2.json"]);
  });

  it("keeps the best items gathered before a date window failed", async () => {
    const { ctx, coordinator } = await harness((_endpoint, params) => {
      if (params.end_date === "2020-06-30") {
        return okResponse({
          illusts: [
            rawIllust(11, { total_bookmarks: 2000, create_date: "2020-06-10T00:00:00+09:00" }),
            rawIllust(12, { total_bookmarks: 9000, create_date: "2020-05-20T00:00:00+09:00" }),
          ],
        });
      }
      throw new ApiError("Upstream returned a non-JSON body (status 200)", "INVALID_BODY");
    });

    const result = await coordinator.run({
      source: "tag",
      targets: [{ label: "cat", open: () => tagSearch(ctx, "cat", { start: "2020-01-01", end: "2020-06-30" }) }],
      limit: 1,
      selection: "top",
      keepJson: true,
    });

    expect(result.targets[0]).toMatchObject({ label: "cat", collected: 1 });
    expect(result.errors).toHaveLength(1);
    expect(await savedIllustIds()).toEqual(["12.json"]);
  });

  it("keeps every qualifying entry when append has no limit", async () => {
    const { ctx, coordinator } = await harness(artistPages);

    const result = await coordinator.run({
      source: "artist",
      targets: [{ label: "5", open: (sink) => artistWorks(ctx, 5, sink) }],
      selection: "append",
      keepJson: false,
    });

    expect(result.totalCollected).toBe(3);
  });

  it("fetches the remaining ids when a cached file is truncated", async () => {
    await writeFile(path.join(layout.json.illust, "31.json"), "{trunc", "utf8");
    const { upstream, ctx, coordinator } = await harness((_endpoint, params) =>
      okResponse({ illust: rawIllust(Number(params.illust_id)) })
    );

    const result = await coordinator.run({
      source: "illust",
      targets: [{ label: "31,32", open: (sink) => illustsById(ctx, [31, 32], sink) }],
      limit: 2,
      selection: "append",
      keepJson: true,
    });

    expect(result.errors).toEqual([]);
    expect(reporter.accepted).toEqual([31, 32]);
    expect(upstream.calls.map((call) => call.params.illust_id)).toEqual([31, 32]);
  });

  it("stores each day's ranking listing independently", async () => {
    const entries: RankingEntry[] = [{ illust_id: 21, rank: 1, yes_rank: 0 }];
    const { ctx } = await harness(() => okResponse({}), entries, new Set(["2021-03-05"]));

    const listings = await storeRankingListings(ctx, ["2021-03-04", "2021-03-05", "2021-03-06"], true);

    expect(listings).toEqual([
      { date: "2021-03-04", entries: 1 },
      { date: "2021-03-05", entries: 0, error: "ranking 2021-03-05 unavailable" },
      { date: "2021-03-06", entries: 1 },
    ]);
    expect(await store.loadRanking("2021-03-06")).toEqual(entries);
    expect(await store.loadRanking("2021-03-05")).toBeUndefined();
  });
});
