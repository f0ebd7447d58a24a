import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenvConfig();

const secondsList = z
  .string()
  .default("5,30,60,120,300")
  .transform((v, ctx) => {
    const seconds = v.split(",").map((s) => Number(s.trim()));
    if (seconds.length === 0 || seconds.some((n) => !Number.isFinite(n) || n < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid retry schedule: ${v}` });
      return z.NEVER;
    }
    return seconds;
  });

const envSchema = z.object({
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  UPSTREAM_API_URL: z.string().url().default("https://app-api.pixiv.net"),
  UPSTREAM_AUTH_URL: z.string().url().default("https://oauth.secure.pixiv.net/auth/token"),
  UPSTREAM_CLIENT_ID: z.string().optional(),
  UPSTREAM_CLIENT_SECRET: z.string().optional(),
  UPSTREAM_REFRESH_TOKEN: z.string().optional(),
  UPSTREAM_ACCEPT_LANGUAGE: z.string().default("zh-cn"),
  UPSTREAM_USER_AGENT: z.string().default("PixivIOSApp/7.13.3 (iOS 14.6; iPhone13,2)"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DOWNLOAD_REFERER: z.string().default("https://app-api.pixiv.net/"),
  RANKING_URL: z.string().url().default("https://www.pixiv.net/ranking.php"),
  PAGE_DELAY_MIN_MS: z.coerce.number().nonnegative().default(1000),
  PAGE_DELAY_MAX_MS: z.coerce.number().nonnegative().default(4000),
  RETRY_SCHEDULE_SECONDS: secondsList,
  STORAGE_DIR: z.string().default("./"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${parsed.error.message}`);
  }
  if (parsed.data.PAGE_DELAY_MAX_MS < parsed.data.PAGE_DELAY_MIN_MS) {
    throw new ConfigError("PAGE_DELAY_MAX_MS must not be lower than PAGE_DELAY_MIN_MS");
  }
  return parsed.data;
}

export const env = loadEnv();
