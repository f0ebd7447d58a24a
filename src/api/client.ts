import { isRecord } from "../core/normalize";
import type { EndpointName, PageCursor, QueryParams } from "./endpoints";

export interface Credentials {
  refreshToken: string;
}

export interface SessionUser {
  id: number;
  name: string;
  account: string;
  isPremium: boolean;
}

/**
 * Authenticated state shared by every call of one run. Re-authentication
 * replaces its fields in place, so holders of the object see the new token.
 */
export interface Session {
  accessToken: string;
  refreshToken: string;
  user: SessionUser;
}

export interface ApiErrorPayload {
  message: string;
  userMessage?: string;
  reason?: string;
}

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
  /** Error object embedded in an otherwise parseable body. */
  error?: ApiErrorPayload;
}

export interface ApiPage {
  items: unknown[];
  nextCursor?: PageCursor;
  error?: ApiErrorPayload;
}

export interface UpstreamClient {
  authenticate(credentials: Credentials): Promise<Session>;
  call(session: Session, endpoint: EndpointName, params: QueryParams): Promise<ApiResponse>;
  /** Saves the asset under destDir, naming the file after the URL. */
  downloadBinary(url: string, destDir: string): Promise<void>;
}

export function extractApiError(body: Record<string, unknown>): ApiErrorPayload | undefined {
  const error = body.error;
  if (!isRecord(error)) {
    return undefined;
  }
  const text = (key: string): string | undefined => {
    const value = error[key];
    return typeof value === "string" && value.length > 0 ? value : undefined;
  };
  return {
    message: text("message") ?? "",
    userMessage: text("user_message"),
    reason: text("reason"),
  };
}

export function toPage(response: ApiResponse, itemsKey: string): ApiPage {
  const items = response.body[itemsKey];
  const next = response.body.next_url;
  return {
    items: Array.isArray(items) ? items : [],
    nextCursor: typeof next === "string" && next.length > 0 ? next : undefined,
    error: response.error,
  };
}
