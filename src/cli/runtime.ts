import { stat } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { ConfigError } from "../core/errors";
import { AppApiClient } from "../api/app-api-client";
import { UpstreamGateway } from "../api/gateway";
import { RankingClient } from "../api/ranking-client";
import { buildFilterCriteria } from "../domain/item-filter";
import { createStorageLayout, type StorageLayout } from "../services/storage-layout";
import { JsonStore } from "../services/json-store";
import { DownloadDriver } from "../pipeline/download-driver";
import { CrawlCoordinator } from "../orchestration/crawl-coordinator";
import type { CrawlContext } from "../orchestration/listing-sources";
import { ConsoleReporter } from "./reporter";
import { parseShowFields, type CommonOptions } from "./options";

export interface Runtime {
  ctx: CrawlContext;
  coordinator: CrawlCoordinator;
  layout: StorageLayout;
}

async function promptRefreshToken(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("Please enter the refresh_token: ")).trim();
  } finally {
    rl.close();
  }
}

async function assertDirectory(dir: string): Promise<void> {
  const info = await stat(dir).catch(() => undefined);
  if (!info?.isDirectory()) {
    throw new ConfigError(`\`${dir}\` is not a directory.`);
  }
}

/** Builds the collaborators of one CLI run and logs in. */
export async function createRuntime(options: CommonOptions): Promise<Runtime> {
  if (options.log) {
    logger.level = options.log;
  }

  await assertDirectory(options.path);
  const refreshToken = env.UPSTREAM_REFRESH_TOKEN || (await promptRefreshToken());
  if (!refreshToken) {
    throw new ConfigError("A refresh token is required");
  }

  const layout = await createStorageLayout(options.path);
  const gateway = new UpstreamGateway(new AppApiClient(), { refreshToken });
  await gateway.login();
  console.log("Login OK!\n");

  const store = new JsonStore(layout);
  const criteria = buildFilterCriteria({
    maxPageCount: options.maxPageCount,
    minBookmarks: options.minBookmarks,
    minQuality: options.minQuality,
    sexLevel: options.sexLevel,
    excludedOwnerIds: options.skipArtists,
    excludedItemIds: options.skipIllusts,
  });

  const ctx: CrawlContext = { gateway, store, rankingFeed: new RankingClient(), criteria };
  const coordinator = new CrawlCoordinator(
    store,
    new DownloadDriver(gateway, layout),
    new ConsoleReporter(parseShowFields(options.show))
  );
  return { ctx, coordinator, layout };
}
