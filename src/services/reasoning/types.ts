export interface CompletionOptions {
  signal: AbortSignal;
}

/**
 * External reasoning service: text prompt in, free-form text out. Adapters
 * report failures as TransportError so the scoring client can decide on
 * retries.
 */
export interface ReasoningService {
  readonly modelVersion: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

// HTTP statuses worth another attempt
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
