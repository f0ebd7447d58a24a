import { logger } from "../core/logger";
import { AuthError, CredentialExpiredError, DecodeError, RateLimitError } from "../core/errors";
import { RetryGovernor, executeWithRetry, type RetryGovernorOptions } from "../core/retry";
import { isRecord } from "../core/normalize";
import { decodeWorkItem } from "../domain/work-item";
import { RawUserDetailSchema, type RawUserDetail, type WorkItem } from "../domain/models";
import { toPage, type ApiErrorPayload, type ApiPage, type ApiResponse, type Credentials, type Session, type UpstreamClient } from "./client";
import { ENDPOINTS, type EndpointName, type ListingEndpoint, type QueryParams } from "./endpoints";

export type ApiErrorKind = "rate_limited" | "credential_expired" | "offset_exceeded" | "unknown";

export function classifyApiError(error: ApiErrorPayload): ApiErrorKind {
  const message = error.message || error.userMessage || "";
  if (message.includes("Rate Limit")) {
    return "rate_limited";
  }
  if (message.includes("Please check your Access Token") || message.includes("invalid_grant")) {
    return "credential_expired";
  }
  if (message.includes("Offset must be no more than")) {
    return "offset_exceeded";
  }
  return "unknown";
}

export type GatewayRetryOptions = Pick<RetryGovernorOptions<unknown>, "scheduleSeconds" | "sleep">;

/**
 * Retry-governed access to the upstream for one run. Owns the session and
 * re-authenticates in place when the upstream reports an expired token.
 */
export class UpstreamGateway {
  private currentSession?: Session;
  private readonly governor: RetryGovernor<ApiResponse>;

  constructor(
    private readonly client: UpstreamClient,
    private readonly credentials: Credentials,
    private readonly retry: GatewayRetryOptions = {}
  ) {
    this.governor = new RetryGovernor<ApiResponse>({ ...retry, inspect: (response) => this.inspect(response) });
  }

  get session(): Session {
    if (!this.currentSession) {
      throw new AuthError("Not logged in", "NOT_LOGGED_IN");
    }
    return this.currentSession;
  }

  async login(): Promise<Session> {
    const fresh = await executeWithRetry(() => this.client.authenticate(this.credentials), {
      ...this.retry,
      call: { name: "authenticate" },
    });
    if (!fresh) {
      throw new AuthError("Login failed after retries", "LOGIN_FAILED");
    }

    if (this.currentSession) {
      Object.assign(this.currentSession, fresh);
    } else {
      this.currentSession = fresh;
    }
    return this.currentSession;
  }

  async listPage(endpoint: ListingEndpoint, params: QueryParams): Promise<ApiPage | undefined> {
    const response = await this.send(endpoint, params);
    return response ? toPage(response, ENDPOINTS[endpoint].itemsKey) : undefined;
  }

  /** A listing endpoint bound as the single-argument call the page walker drives. */
  listing(endpoint: ListingEndpoint): (params: QueryParams) => Promise<ApiPage | undefined> {
    return (params) => this.listPage(endpoint, params);
  }

  async illustDetail(illustId: number): Promise<WorkItem | undefined> {
    const response = await this.send("illustDetail", { illust_id: illustId });
    const illust = response?.body.illust;
    if (!isRecord(illust)) {
      return undefined;
    }
    try {
      return decodeWorkItem(illust);
    } catch (error) {
      if (error instanceof DecodeError) {
        logger.error({ illustId, issues: error.issues }, error.message);
        return undefined;
      }
      throw error;
    }
  }

  async userDetail(userId: number): Promise<RawUserDetail | undefined> {
    const response = await this.send("userDetail", { user_id: userId, filter: "for_ios" });
    if (!response) {
      return undefined;
    }
    const parsed = RawUserDetailSchema.safeParse(response.body);
    return parsed.success ? parsed.data : undefined;
  }

  download(url: string, destDir: string): Promise<void> {
    return this.client.downloadBinary(url, destDir);
  }

  private send(endpoint: EndpointName, params: QueryParams): Promise<ApiResponse | undefined> {
    return this.governor.execute(() => this.client.call(this.session, endpoint, params), { name: endpoint, params });
  }

  private async inspect(response: ApiResponse): Promise<void> {
    if (!response.error) {
      return;
    }

    const kind = classifyApiError(response.error);
    switch (kind) {
      case "rate_limited":
        throw new RateLimitError("request rate limit");
      case "credential_expired":
        logger.info("Access token expired, logging in again");
        await this.login();
        throw new CredentialExpiredError("access token expired, relogin");
      case "offset_exceeded":
        logger.warn({ error: response.error }, response.error.message);
        return;
      case "unknown":
        logger.error(
          { error: response.error, status: response.status },
          response.error.message || response.error.userMessage || "Upstream API error"
        );
        return;
    }
  }
}
