import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import { RESOLUTIONS, type ImageRefs, type Resolution, type ResolutionSelection, type WorkItem } from "../domain/models";
import type { StorageLayout } from "../services/storage-layout";

export interface AssetDownloader {
  download(url: string, destDir: string): Promise<void>;
}

export interface DownloadSummary {
  total: number;
  succeeded: number;
  failedIds: number[];
}

export function hasAnyResolution(selection: ResolutionSelection): boolean {
  return RESOLUTIONS.some((resolution) => selection[resolution]);
}

/** URLs of one resolution, one per page. */
export function resolveImageUrls(item: WorkItem, resolution: Resolution): string[] {
  const groups: ImageRefs[] = item.images.kind === "single" ? [item.images.refs] : item.images.pages;
  const urls: string[] = [];
  for (const refs of groups) {
    const url = refs[resolution];
    if (url) {
      urls.push(url);
    }
  }
  return urls;
}

/** Best-effort batch download; one item failing never stops the others. */
export class DownloadDriver {
  constructor(
    private readonly downloader: AssetDownloader,
    private readonly layout: Pick<StorageLayout, "img">
  ) {}

  async downloadAll(items: readonly WorkItem[], selection: ResolutionSelection): Promise<DownloadSummary> {
    const summary: DownloadSummary = { total: items.length, succeeded: 0, failedIds: [] };
    let num = 0;

    for (const item of items) {
      num++;
      if (await this.downloadItem(item, selection)) {
        summary.succeeded++;
      } else {
        summary.failedIds.push(item.id);
      }
      logger.info({ id: item.id }, `Downloading progress: ${num} / ${items.length}`);
    }

    if (summary.failedIds.length > 0) {
      logger.warn({ failedIds: summary.failedIds }, "Some illusts could not be downloaded");
    }
    return summary;
  }

  async downloadItem(item: WorkItem, selection: ResolutionSelection): Promise<boolean> {
    let ok = true;
    for (const resolution of RESOLUTIONS) {
      if (!selection[resolution]) {
        continue;
      }
      const urls = resolveImageUrls(item, resolution);
      if (urls.length === 0) {
        logger.warn({ id: item.id, resolution }, "No image URL for resolution");
        ok = false;
        continue;
      }
      for (const url of urls) {
        try {
          await this.downloader.download(url, this.layout.img[resolution]);
        } catch (error) {
          logger.error({ id: item.id, url, error: errorMessage(error) }, "Download failed");
          ok = false;
        }
      }
    }
    return ok;
  }
}
