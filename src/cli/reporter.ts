import { canonicalJson } from "../services/json-store";
import type { ListingSource, WorkItem } from "../domain/models";
import type { ProgressReporter } from "../orchestration/crawl-coordinator";

const BANNERS: Record<ListingSource, string> = {
  illust: "illusts fetched",
  artist: "artist works fetched",
  tag: "tag fetched",
  recommend: "recommend fetched",
  related: "related fetched",
  ranking: "ranking fetched",
};

export function progressLine(item: WorkItem, total: number): string {
  const bookmarks = (item.totalBookmarks / 1000).toFixed(1);
  return `iid=${item.id}  bookmark=${bookmarks}k  q=${item.quality ?? "n/a"}  total=${total}`;
}

/** Lines printed for --show; "ALL" prints the whole record. */
export function showLines(item: WorkItem, fields: readonly string[]): string[] {
  if (fields.includes("ALL")) {
    return [canonicalJson(item.raw, { pretty: true })];
  }
  return fields.map((field) => {
    const value = item.raw[field];
    const text = typeof value === "object" && value !== null ? canonicalJson(value, { pretty: true }) : String(value);
    return `${field} = ${text}`;
  });
}

export class ConsoleReporter implements ProgressReporter {
  constructor(private readonly showFields: readonly string[] = []) {}

  targetStarted(source: ListingSource, label: string): void {
    console.log(`scraping ${source}: ${label}`);
  }

  itemAccepted(item: WorkItem, total: number): void {
    console.log(progressLine(item, total));
    if (this.showFields.length > 0) {
      for (const line of showLines(item, this.showFields)) {
        console.log(line);
      }
      console.log(`${"-".repeat(50)}\n`);
    }
  }

  sourceFinished(source: ListingSource): void {
    console.log(`============== ${BANNERS[source]} ==============\n\n`);
  }
}
