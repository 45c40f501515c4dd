/**
 * Retry and timeout decorators for port calls.
 *
 * The pipeline itself never retries; wrap the ports with withResilience
 * before handing them over.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type {
  AudioClip,
  PipelinePorts,
  PortCallOptions,
  RecognitionPort,
} from '../interfaces/ports.js';
import type { LanguageCode } from '../types/common.js';
import { PortError, toPortError, type PortErrorKind } from '../types/errors.js';

export interface RetryPolicy {
  /** Total calls, first attempt included */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ResiliencePolicy {
  retry: RetryPolicy;
  /** Per-attempt limit; 0 disables */
  timeoutMs: number;
}

/**
 * One port invocation with its arguments bound; only the call options vary
 */
export type PortCall<R> = (options: PortCallOptions) => Promise<R>;

const RETRYABLE_KINDS: readonly PortErrorKind[] = ['TIMEOUT', 'RATE_LIMITED', 'UNAVAILABLE'];

export function isRetryable(error: PortError): boolean {
  return RETRYABLE_KINDS.includes(error.kind);
}

/**
 * Attempts to make for a policy; anything unusable means a single attempt
 */
export function attemptLimit(policy: RetryPolicy): number {
  return Number.isFinite(policy.attempts) ? Math.max(1, Math.floor(policy.attempts)) : 1;
}

export function retryDelay(retry: number, policy: RetryPolicy): number {
  const delay = Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
  return Number.isFinite(delay) && delay > 0 ? delay : 0;
}

/**
 * Give each call its own AbortController. When the limit passes, the call
 * is aborted and the caller gets a TIMEOUT PortError. An abort on the
 * caller's signal is forwarded.
 */
export function withTimeout<R>(call: PortCall<R>, timeoutMs: number, label: string): PortCall<R> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return call;
  }

  return (options) =>
    new Promise<R>((resolve, reject) => {
      const controller = new AbortController();
      const parent = options.signal;
      const forwardAbort = () => controller.abort(parent?.reason);

      if (parent?.aborted) {
        forwardAbort();
      } else {
        parent?.addEventListener('abort', forwardAbort, { once: true });
      }

      const timer = setTimeout(() => {
        const error = new PortError('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
        controller.abort(error);
        reject(error);
      }, timeoutMs);

      const settle = () => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', forwardAbort);
      };

      void Promise.resolve()
        .then(() => call({ ...options, signal: controller.signal }))
        .then(
          (value) => {
            settle();
            resolve(value);
          },
          (error: unknown) => {
            settle();
            reject(error);
          }
        );
    });
}

export function withRetry<R>(call: PortCall<R>, policy: RetryPolicy, label: string): PortCall<R> {
  const attempts = attemptLimit(policy);

  return async (options) => {
    for (let attempt = 1; ; attempt++) {
      try {
        return await call(options);
      } catch (error) {
        const portError = toPortError(error);
        if (attempt >= attempts || !isRetryable(portError) || options.signal?.aborted) {
          throw portError;
        }

        const delay = retryDelay(attempt, policy);
        console.warn(
          `[Retry] ${label} failed (${portError.kind}), attempt ${attempt}/${attempts}; retrying in ${delay}ms`
        );
        await sleep(delay);

        if (options.signal?.aborted) {
          throw portError;
        }
      }
    }
  };
}

function guard<R>(call: PortCall<R>, policy: ResiliencePolicy, label: string): PortCall<R> {
  return withRetry(withTimeout(call, policy.timeoutMs, label), policy.retry, label);
}

/**
 * Wrap every port with per-attempt timeout and retry
 */
export function withResilience(ports: PipelinePorts, policy: ResiliencePolicy): PipelinePorts {
  return {
    moderation: {
      evaluate: (text: string, options: PortCallOptions = {}) =>
        guard((call) => ports.moderation.evaluate(text, call), policy, 'Moderation')(options),
    },
    translation: {
      translate: (text: string, targetLanguage: LanguageCode, options: PortCallOptions = {}) =>
        guard(
          (call) => ports.translation.translate(text, targetLanguage, call),
          policy,
          'Translation'
        )(options),
    },
    speech: {
      synthesize: (text: string, targetLanguage: LanguageCode, options: PortCallOptions = {}) =>
        guard((call) => ports.speech.synthesize(text, targetLanguage, call), policy, 'Speech')(options),
    },
  };
}

export function withResilientRecognition(
  port: RecognitionPort,
  policy: ResiliencePolicy
): RecognitionPort {
  return {
    transcribe: (clip: AudioClip, language: LanguageCode, options: PortCallOptions = {}) =>
      guard((call) => port.transcribe(clip, language, call), policy, 'Recognition')(options),
  };
}
