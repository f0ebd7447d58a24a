import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { errorMessage } from "../../core/errors";
import { todayIso } from "../../core/normalize";
import {
  artistWorks,
  dailyRanking,
  fetchArtist,
  illustsById,
  recommended,
  related,
  storeRankingListings,
  tagSearch,
} from "../../orchestration/listing-sources";
import type { CrawlResult, CrawlTarget } from "../../orchestration/crawl-coordinator";
import { createRuntime, type Runtime } from "../runtime";
import {
  CommonOptionsSchema,
  expandDates,
  parseIds,
  parseResolutions,
  rankingSelection,
  withCommonOptions,
  type CommonOptions,
} from "../options";

const TagOptionsSchema = z.object({
  start: z.string(),
  end: z.string(),
  popular: z.boolean().default(false),
});

const RankingOptionsSchema = z.object({
  onlyNew: z.boolean().default(false),
  withoutIllust: z.boolean().default(false),
  best: z.boolean().default(false),
});

const ArtistOptionsSchema = z.object({
  avatar: z.boolean().default(false),
});

async function runCommand(
  rawOptions: Record<string, unknown>,
  body: (runtime: Runtime, options: CommonOptions) => Promise<CrawlResult | void>
): Promise<void> {
  try {
    const options = CommonOptionsSchema.parse(rawOptions);
    const runtime = await createRuntime(options);
    const result = await body(runtime, options);
    if (result && result.errors.length > 0) {
      logger.warn({ errors: result.errors }, "Errors occurred during crawl");
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Crawl aborted");
    process.exitCode = 1;
  }
}

function idsOrWarn(values: readonly string[], kind: string): number[] {
  return parseIds(values, (value) => console.log(`wrong ${kind} id: ${value}`));
}

async function downloadAvatar(runtime: Runtime, artistId: number, keepJson: boolean): Promise<void> {
  const artist = await fetchArtist(runtime.ctx, artistId, keepJson);
  const url = artist?.user.profile_image_urls?.medium;
  if (!url) {
    logger.warn({ artistId }, "Artist has no avatar URL");
    return;
  }
  await runtime.ctx.gateway.download(url, runtime.layout.img.avatar);
}

export const commands = (program: Command) => {
  withCommonOptions(program.command("crawl:illust").argument("<ids...>", "Illust ids"))
    .description("Fetch illusts by id; only visibility is checked")
    .action(async (values: string[], rawOptions: Record<string, unknown>) => {
      await runCommand(rawOptions, async (runtime, options) => {
        const ids = idsOrWarn(values, "illust");
        return runtime.coordinator.run({
          source: "illust",
          targets: [{ label: ids.join(","), open: (sink) => illustsById(runtime.ctx, ids, sink) }],
          limit: ids.length,
          selection: "append",
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        });
      });
    });

  withCommonOptions(program.command("crawl:artist").argument("<ids...>", "Artist ids"))
    .description("Fetch the works of artists")
    .option("--avatar", "Also download each artist's avatar")
    .action(async (values: string[], rawOptions: Record<string, unknown>) => {
      const { avatar } = ArtistOptionsSchema.parse(rawOptions);
      await runCommand(rawOptions, async (runtime, options) => {
        const targets: CrawlTarget[] = idsOrWarn(values, "artist").map((artistId) => ({
          label: String(artistId),
          open: (sink) => artistWorks(runtime.ctx, artistId, sink),
          after: avatar ? () => downloadAvatar(runtime, artistId, options.keepJson) : undefined,
        }));
        return runtime.coordinator.run({
          source: "artist",
          targets,
          limit: options.limit,
          selection: "append",
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        });
      });
    });

  withCommonOptions(program.command("crawl:tag").argument("<words...>", "Tag names"))
    .description("Search tags and keep the best illusts")
    .option("-s, --start <date>", "Earliest creation date searched", "2016-01-01")
    .option("-e, --end <date>", "Latest creation date searched (default: today)", todayIso())
    .option("--popular", "Use the upstream popularity order instead of walking date windows")
    .action(async (words: string[], rawOptions: Record<string, unknown>) => {
      const tagOptions = TagOptionsSchema.parse(rawOptions);
      await runCommand(rawOptions, async (runtime, options) =>
        runtime.coordinator.run({
          source: "tag",
          targets: words.map((word) => ({
            label: word,
            open: (sink) => tagSearch(runtime.ctx, word, tagOptions, sink),
          })),
          limit: options.limit,
          selection: "top",
          presorted: tagOptions.popular,
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        })
      );
    });

  withCommonOptions(program.command("crawl:recommend"))
    .description("Fetch recommended illusts")
    .action(async (rawOptions: Record<string, unknown>) => {
      await runCommand(rawOptions, async (runtime, options) =>
        runtime.coordinator.run({
          source: "recommend",
          targets: [{ label: "recommended", open: (sink) => recommended(runtime.ctx, sink) }],
          limit: options.limit,
          selection: "append",
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        })
      );
    });

  withCommonOptions(program.command("crawl:related").argument("<ids...>", "Illust ids"))
    .description("Fetch illusts related to the given ones")
    .action(async (values: string[], rawOptions: Record<string, unknown>) => {
      await runCommand(rawOptions, async (runtime, options) =>
        runtime.coordinator.run({
          source: "related",
          targets: idsOrWarn(values, "illust").map((illustId) => ({
            label: String(illustId),
            open: (sink) => related(runtime.ctx, illustId, sink),
          })),
          limit: options.limit,
          selection: "append",
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        })
      );
    });

  withCommonOptions(program.command("crawl:ranking").argument("<dates...>", "Dates as YYYY-MM-DD or start,end"))
    .description("Fetch the daily ranking of each date")
    .option("--only-new", "Only illusts new to the ranking that day")
    .option("--without-illust", "Only store the ranking listing")
    .option("--best", "Keep the best illusts instead of the first ones")
    .action(async (values: string[], rawOptions: Record<string, unknown>) => {
      const rankingOptions = RankingOptionsSchema.parse(rawOptions);
      await runCommand(rawOptions, async (runtime, options) => {
        const dates = expandDates(values);

        if (rankingOptions.withoutIllust) {
          for (const listing of await storeRankingListings(runtime.ctx, dates, options.keepJson)) {
            if (listing.error) {
              process.exitCode = 1;
            } else {
              console.log(`Ranking ${listing.date} finished (${listing.entries} entries)`);
            }
          }
          return;
        }

        return runtime.coordinator.run({
          source: "ranking",
          targets: dates.map((date) => ({
            label: date,
            open: (sink) =>
              dailyRanking(runtime.ctx, date, { onlyNew: rankingOptions.onlyNew, keepJson: options.keepJson }, sink),
            after: async () => console.log(`Ranking ${date} finished`),
          })),
          ...rankingSelection(rankingOptions.best, options.limit),
          keepJson: options.keepJson,
          resolutions: parseResolutions(options.resolution),
        });
      });
    });
};
