import { logger } from "./logger";
import { env } from "./config";
import { CredentialExpiredError, NetworkError, RateLimitError, errorMessage } from "./errors";

export type ErrorClass = new (...args: never[]) => Error;

export const DEFAULT_RETRYABLE_ERRORS: readonly ErrorClass[] = [
  RateLimitError,
  CredentialExpiredError,
  NetworkError,
];

/** Identifies a governed call in retry and exhaustion logs. */
export interface CallIdentity {
  name: string;
  params?: Record<string, unknown>;
}

export interface RetryGovernorOptions<T> {
  /** Delay in seconds after each failed attempt; its length is the number of attempts. */
  scheduleSeconds?: readonly number[];
  /**
   * Examines a successful result for embedded errors. Throwing one of the
   * retryable errors schedules another attempt.
   */
  inspect?: (result: T) => void | Promise<void>;
  retryOn?: readonly ErrorClass[];
  sleep?: (ms: number) => Promise<void>;
  call?: CallIdentity;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatParams(params: Record<string, unknown> = {}): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${key}=${String(params[key])}`)
    .join(", ");
}

export function isRetryable(error: unknown, retryOn: readonly ErrorClass[]): boolean {
  return retryOn.some((cls) => error instanceof cls);
}

/**
 * Runs `operation` on a fixed escalating schedule. Resolves to `undefined`
 * once the schedule is exhausted; callers treat that as the end of data.
 * Errors outside `retryOn` propagate from the first attempt that raises them.
 */
export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryGovernorOptions<T> = {}
): Promise<T | undefined> {
  const schedule = options.scheduleSeconds ?? env.RETRY_SCHEDULE_SECONDS;
  const retryOn = options.retryOn ?? DEFAULT_RETRYABLE_ERRORS;
  const wait = options.sleep ?? sleep;
  const call = options.call ?? { name: operation.name || "anonymous" };

  for (let attempt = 1; attempt <= schedule.length; attempt++) {
    try {
      const result = await operation();
      if (options.inspect) {
        await options.inspect(result);
      }
      return result;
    } catch (error) {
      if (!isRetryable(error, retryOn)) {
        throw error;
      }
      if (attempt === schedule.length) {
        logger.error({ attempt, call: call.name, error: errorMessage(error) }, "Last attempt failed");
        break;
      }

      const delaySeconds = schedule[attempt - 1] ?? 0;
      logger.error(
        { attempt, call: call.name, delaySeconds, error: errorMessage(error) },
        `Retry after ${delaySeconds} sec`
      );
      await wait(delaySeconds * 1000);
    }
  }

  logger.error(
    { call: call.name, params: call.params },
    `Retry failed: ${call.name}(${formatParams(call.params)})`
  );
  return undefined;
}

/** Binds a schedule, inspector and retry set once for repeated use. */
export class RetryGovernor<T> {
  constructor(private readonly options: RetryGovernorOptions<T> = {}) {}

  execute(operation: () => Promise<T>, call?: CallIdentity): Promise<T | undefined> {
    return executeWithRetry(operation, { ...this.options, call: call ?? this.options.call });
  }
}
