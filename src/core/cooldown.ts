import { env } from "./config";
import { sleep } from "./retry";

/** Random pause between page fetches. Not a rate limiter, only spreads requests out. */
export async function pageJitter(): Promise<void> {
  const min = env.PAGE_DELAY_MIN_MS;
  const max = env.PAGE_DELAY_MAX_MS;
  const delay = min + Math.random() * (max - min);

  await sleep(delay);
}
