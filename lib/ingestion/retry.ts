import { isThrottlingError } from "../errors";
import type { Logger } from "../logger";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** 最初の呼び出しを含む試行回数の上限 */
  maxAttempts: number;
  initialDelayMs: number;
  sleep: Sleep;
  logger?: Logger;
}

/**
 * スロットリング系のエラーのみ指数バックオフで再試行する
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!isThrottlingError(error) || attempt + 1 >= maxAttempts) {
        throw error;
      }
      const delayMs = options.initialDelayMs * 2 ** attempt;
      options.logger?.warn(
        { attempt: attempt + 1, maxAttempts, delayMs },
        "Backend throttled the request, retrying",
      );
      await options.sleep(delayMs);
    }
  }
}
