/**
 * 重试机制工具模块
 *
 * 为浏览器自动化中的定位、填表等局部操作提供有界重试：
 * - 指数退避，单次延迟受 maxDelay 限制
 * - shouldRetry 判定不可重试的错误（如会话已失效）立即抛出
 * - 支持 AbortSignal，取消时在下一个挂起点抛出
 */

import { createLoggerFacade } from "../logging/logger.js";

const logger = createLoggerFacade("retry");

export interface FailedAttemptInfo {
  readonly error: Error;
  readonly attemptNumber: number;
  readonly retriesLeft: number;
}

export interface RetryOptions {
  /**
   * 最大重试次数（不含首次尝试），默认3次
   */
  retries?: number;

  /**
   * 基础延迟(ms)，第 n 次失败后等待 baseDelay * 2^(n-1)
   */
  baseDelay?: number;

  /**
   * 单次等待上限(ms)，默认 10s
   */
  maxDelay?: number;

  signal?: AbortSignal;

  onFailedAttempt?: (info: FailedAttemptInfo) => void;

  /**
   * 返回 false 表示立即失败，不再重试
   */
  shouldRetry?: (info: FailedAttemptInfo) => boolean;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("操作已取消");
}

export function calculateBackoff(attemptNumber: number, baseDelay: number, maxDelay: number): number {
  return Math.min(maxDelay, baseDelay * Math.pow(2, attemptNumber - 1));
}

/**
 * 使用指数退避策略重试异步操作
 *
 * @example
 * ```ts
 * const located = await retryWithBackoff(
 *   () => session.searchService("AWS Lambda"),
 *   { retries: 2, baseDelay: 500, shouldRetry: ({ error }) => !(error instanceof SessionFatalError) }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  fn: (attemptNumber: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    retries = 3,
    baseDelay = 100,
    maxDelay = 10_000,
    signal,
    onFailedAttempt,
    shouldRetry = () => true
  } = options;

  for (let attemptNumber = 1; ; attemptNumber++) {
    signal?.throwIfAborted();
    try {
      return await fn(attemptNumber);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const retriesLeft = retries + 1 - attemptNumber;

      if (retriesLeft <= 0 || signal?.aborted) {
        throw err;
      }

      const info: FailedAttemptInfo = { error: err, attemptNumber, retriesLeft };
      if (!shouldRetry(info)) {
        throw err;
      }

      if (onFailedAttempt) {
        onFailedAttempt(info);
      } else {
        logger.warn("操作失败，准备重试", {
          attemptNumber,
          retriesLeft,
          error: err.message
        });
      }

      await delay(calculateBackoff(attemptNumber, baseDelay, maxDelay), signal);
    }
  }
}
