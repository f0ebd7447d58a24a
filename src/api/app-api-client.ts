import { createWriteStream } from "node:fs";
import { access, mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { ApiError, AuthError, ConfigError, DownloadError, NetworkError, errorMessage } from "../core/errors";
import { isRecord } from "../core/normalize";
import { extractApiError, type ApiResponse, type Credentials, type Session, type UpstreamClient } from "./client";
import { ENDPOINTS, buildUrl, type EndpointName, type QueryParams } from "./endpoints";

const AuthResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  user: z
    .object({
      id: z.coerce.number().int(),
      name: z.string().default(""),
      account: z.string().default(""),
      is_premium: z.boolean().default(false),
    })
    .passthrough(),
});

export interface AppApiClientOptions {
  baseUrl: string;
  authUrl: string;
  clientId?: string;
  clientSecret?: string;
  acceptLanguage: string;
  userAgent: string;
  referer: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

function defaultOptions(): AppApiClientOptions {
  return {
    baseUrl: env.UPSTREAM_API_URL,
    authUrl: env.UPSTREAM_AUTH_URL,
    clientId: env.UPSTREAM_CLIENT_ID,
    clientSecret: env.UPSTREAM_CLIENT_SECRET,
    acceptLanguage: env.UPSTREAM_ACCEPT_LANGUAGE,
    userAgent: env.UPSTREAM_USER_AGENT,
    referer: env.DOWNLOAD_REFERER,
    timeoutMs: env.UPSTREAM_TIMEOUT_MS,
  };
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

export function filenameFromUrl(url: string): string {
  const name = path.posix.basename(new URL(url).pathname);
  if (!name) {
    throw new DownloadError(`Cannot derive a file name from ${url}`, "NO_FILENAME", url);
  }
  return name;
}

export class AppApiClient implements UpstreamClient {
  private readonly options: AppApiClientOptions;

  constructor(options: Partial<AppApiClientOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
  }

  async authenticate(credentials: Credentials): Promise<Session> {
    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new ConfigError("UPSTREAM_CLIENT_ID and UPSTREAM_CLIENT_SECRET are required to log in");
    }

    const form = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      grant_type: "refresh_token",
      refresh_token: credentials.refreshToken,
      include_policy: "true",
      get_secure_url: "1",
    });

    const { status, payload } = await this.send(this.options.authUrl, {
      method: "POST",
      headers: {
        "content-type": "application/x-www-form-urlencoded",
        "user-agent": this.options.userAgent,
        "accept-language": this.options.acceptLanguage,
      },
      body: form.toString(),
    });

    const tokenBody = isRecord(payload) && isRecord(payload.response) ? payload.response : payload;
    const parsed = AuthResponseSchema.safeParse(tokenBody);
    if (!parsed.success) {
      logger.error({ status }, "Authentication response did not contain a token");
      throw new AuthError(`Authentication failed with status ${status}`, "AUTH_FAILED");
    }

    logger.info({ userId: parsed.data.user.id }, "Logged in by refresh token");
    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      user: {
        id: parsed.data.user.id,
        name: parsed.data.user.name,
        account: parsed.data.user.account,
        isPremium: parsed.data.user.is_premium,
      },
    };
  }

  async call(session: Session, endpoint: EndpointName, params: QueryParams): Promise<ApiResponse> {
    const url = buildUrl(this.options.baseUrl, ENDPOINTS[endpoint].path, params);
    const { status, payload } = await this.send(url, {
      method: "GET",
      headers: {
        authorization: `Bearer ${session.accessToken}`,
        "user-agent": this.options.userAgent,
        "accept-language": this.options.acceptLanguage,
        "app-os": "ios",
      },
    });

    if (!isRecord(payload)) {
      throw new ApiError(`Unexpected response body from ${endpoint} (status ${status})`, "INVALID_BODY");
    }
    return { status, body: payload, error: extractApiError(payload) };
  }

  async downloadBinary(url: string, destDir: string): Promise<void> {
    const dest = path.join(destDir, filenameFromUrl(url));
    if (await fileExists(dest)) {
      logger.debug({ dest }, "Asset already on disk");
      return;
    }

    await mkdir(destDir, { recursive: true });
    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: "GET",
        headers: { referer: this.options.referer, "user-agent": this.options.userAgent },
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
    } catch (error) {
      throw new DownloadError(`Download failed: ${errorMessage(error)}`, "REQUEST_FAILED", url);
    }

    if (response.statusCode !== 200) {
      await response.body.dump();
      throw new DownloadError(`Download returned status ${response.statusCode}`, "BAD_STATUS", url);
    }

    const partial = `${dest}.part`;
    try {
      await pipeline(response.body, createWriteStream(partial));
      await rename(partial, dest);
    } catch (error) {
      await rm(partial, { force: true });
      throw new DownloadError(`Writing ${dest} failed: ${errorMessage(error)}`, "WRITE_FAILED", url);
    }
    logger.debug({ url, dest }, "Downloaded asset");
  }

  /**
   * Returns the decoded JSON body whatever the status; the upstream reports
   * most failures as an `error` object. Transport failures and 5xx responses
   * without a JSON body become NetworkError.
   */
  private async send(
    url: string | URL,
    init: { method: "GET" | "POST"; headers: Record<string, string>; body?: string }
  ): Promise<{ status: number; payload: unknown }> {
    let response: Dispatcher.ResponseData;
    let text: string;
    try {
      response = await request(url, {
        ...init,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
      text = await response.body.text();
    } catch (error) {
      throw new NetworkError(`Request to ${String(url)} failed: ${errorMessage(error)}`, "REQUEST_FAILED");
    }

    try {
      return { status: response.statusCode, payload: JSON.parse(text) };
    } catch {
      if (response.statusCode >= 500 || response.statusCode === 429) {
        throw new NetworkError(`Upstream returned ${response.statusCode}`, "UPSTREAM_UNAVAILABLE", response.statusCode);
      }
      throw new ApiError(`Upstream returned a non-JSON body (status ${response.statusCode})`, "INVALID_BODY");
    }
  }
}
