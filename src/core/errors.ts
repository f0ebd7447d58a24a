export class AuthError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "AuthError";
  }
}

export class RateLimitError extends Error {
  constructor(message: string, public code: string = "RATE_LIMITED") {
    super(message);
    this.name = "RateLimitError";
  }
}

export class CredentialExpiredError extends Error {
  constructor(message: string, public code: string = "CREDENTIAL_EXPIRED") {
    super(message);
    this.name = "CredentialExpiredError";
  }
}

export class ApiError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "ApiError";
  }
}

export class NetworkError extends Error {
  constructor(message: string, public code: string, public status?: number) {
    super(message);
    this.name = "NetworkError";
  }
}

export class DecodeError extends Error {
  constructor(message: string, public code: string, public issues: string[] = []) {
    super(message);
    this.name = "DecodeError";
  }
}

export class DownloadError extends Error {
  constructor(message: string, public code: string, public url: string) {
    super(message);
    this.name = "DownloadError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
