import { linkedTimeout, sleep } from "../utils/concurrency";
import { SchemaError, ScoringFailedError, TransportError, describeError } from "../utils/errors";
import { parseBiasResponse } from "./biasSchema";
import type { ScoredResponse } from "./biasSchema";
import { withStrictJsonInstruction } from "./promptBuilder";
import type { PromptText } from "./promptBuilder";
import type { ReasoningService } from "./reasoning/types";

export interface BiasAnalyzerOptions {
  // Total calls allowed for transport failures, first call included
  maxAttempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ScoreOptions {
  signal?: AbortSignal;
}

/**
 * Scoring client. The only component allowed to call the reasoning service;
 * owns timeout, retry and response validation.
 */
export class BiasAnalyzer {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly service: ReasoningService, options: BiasAnalyzerOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  get modelVersion(): string {
    return this.service.modelVersion;
  }

  async score(prompt: PromptText, options: ScoreOptions = {}): Promise<ScoredResponse> {
    const { signal } = options;
    let currentPrompt = prompt;
    let transportFailures = 0;
    let schemaRetried = false;

    for (;;) {
      if (signal?.aborted) {
        throw new ScoringFailedError('scoring aborted', 'aborted', { cause: signal.reason });
      }

      const startTime = Date.now();
      let text: string;
      try {
        text = await this.callOnce(currentPrompt, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new ScoringFailedError('scoring aborted', 'aborted', { cause: error });
        }
        const transport = error instanceof TransportError
          ? error
          : new TransportError(describeError(error), { retryable: true, cause: error });
        transportFailures++;
        if (!transport.retryable || transportFailures >= this.maxAttempts) {
          throw new ScoringFailedError(
            `${transport.message} (after ${transportFailures} attempt${transportFailures === 1 ? '' : 's'})`,
            'transport',
            { cause: transport }
          );
        }
        const wait = this.baseDelayMs * 2 ** (transportFailures - 1);
        console.warn(`[Scoring] ${transport.message}; retry ${transportFailures}/${this.maxAttempts - 1} in ${wait}ms`);
        try {
          await this.sleep(wait, signal);
        } catch (abortError) {
          throw new ScoringFailedError('scoring aborted', 'aborted', { cause: abortError });
        }
        continue;
      }

      const elapsed = Date.now() - startTime;
      const parsed = parseBiasResponse(text);
      if (parsed.success) {
        console.log(`[Scoring] ✅ ${this.service.modelVersion} responded in ${elapsed}ms`);
        return {
          ...parsed.data,
          computedAt: this.now().toISOString(),
          modelVersion: this.service.modelVersion
        };
      }

      const schemaError = new SchemaError(parsed.issues);
      if (schemaRetried) {
        throw new ScoringFailedError(schemaError.message, 'schema', { cause: schemaError });
      }
      schemaRetried = true;
      console.warn(`[Scoring] ⚠️ ${schemaError.message}; re-prompting for strict JSON`);
      currentPrompt = withStrictJsonInstruction(prompt);
    }
  }

  private async callOnce(prompt: PromptText, parent?: AbortSignal): Promise<string> {
    const guard = linkedTimeout(this.timeoutMs, parent);
    try {
      return await Promise.race([
        this.service.complete(prompt, { signal: guard.signal }),
        rejectOnAbort(guard.signal)
      ]);
    } catch (error) {
      if (guard.timedOut()) {
        throw new TransportError(`Reasoning call timed out after ${this.timeoutMs}ms`, { retryable: true, cause: error });
      }
      throw error;
    } finally {
      guard.dispose();
    }
  }
}

// Settles the race even when a service ignores its abort signal
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
