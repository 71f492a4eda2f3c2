/**
 * Bounded retry with exponential backoff for LLM calls
 *
 * Only transient ProviderErrors are retried. Anything else, and the last
 * transient failure once attempts run out, is rethrown.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { getLogger } from '@taskpilot/logging';
import { toProviderError, type GenerateOptions, type LLMClient } from './gemini-client.js';

const log = getLogger('Retry');

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles each time (default: 1000) */
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  /** Injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Label for log lines */
  label?: string;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/** Backoff before attempt n+1: base * 2^(n-1), capped */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 8000;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const providerError = toProviderError(error);
      const exhausted = attempt >= maxAttempts;

      if (!providerError.transient || exhausted || options.signal?.aborted) {
        if (providerError.transient && exhausted) {
          log.warn(
            { label: options.label, attempts: attempt, err: providerError },
            'Retries exhausted'
          );
        }
        throw providerError;
      }

      const wait = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      log.info(
        { label: options.label, attempt, maxAttempts, delayMs: wait, reason: providerError.message },
        'Retrying after transient provider error'
      );
      await sleep(wait, options.signal);
    }
  }
}

/**
 * One completion with retry
 */
export function generateWithRetry(
  client: LLMClient,
  prompt: string,
  options: GenerateOptions & RetryOptions = {}
): Promise<string> {
  const { json, systemInstruction, signal } = options;
  return withRetry(() => client.generate(prompt, { json, systemInstruction, signal }), options);
}

