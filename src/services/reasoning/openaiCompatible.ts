import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { TransportError } from "../../utils/errors";
import { isRetryableStatus } from "./types";
import type { CompletionOptions, ReasoningService } from "./types";

const ChatCompletionResponse = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() })
  })).min(1)
});

export interface OpenAICompatibleOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  http?: AxiosInstance;
}

/**
 * Reasoning service speaking the chat-completions wire format
 * (OpenAI and compatible gateways).
 */
export class OpenAICompatibleReasoningService implements ReasoningService {
  readonly modelVersion: string;
  private readonly http: AxiosInstance;
  private readonly apiKey: string;

  constructor(options: OpenAICompatibleOptions) {
    this.modelVersion = options.model;
    this.apiKey = options.apiKey;
    this.http = options.http ?? axios.create({ baseURL: options.baseUrl.replace(/\/+$/, '') });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post('/chat/completions', {
        model: this.modelVersion,
        messages: [
          { role: 'system', content: 'You are an expert media bias analyst. Return only valid JSON.' },
          { role: 'user', content: prompt }
        ],
        temperature: 0.1,
        max_tokens: 2000
      }, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        signal: options.signal
      });
      data = response.data;
    } catch (error) {
      throw toTransportError(error);
    }

    const parsed = ChatCompletionResponse.safeParse(data);
    if (!parsed.success) {
      // A malformed envelope is the gateway's fault, not the model's
      throw new TransportError('Unexpected chat completion response format', { retryable: true });
    }
    return (parsed.data.choices[0].message.content ?? '').trim();
  }
}

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new TransportError('Invalid reasoning service API key', { retryable: false, status, cause: error });
    }
    if (status === 429) {
      return new TransportError('Reasoning service rate limit exceeded', { retryable: true, status, cause: error });
    }
    if (status !== undefined) {
      return new TransportError(`Reasoning service returned ${status}`, {
        retryable: isRetryableStatus(status),
        status,
        cause: error
      });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ERR_CANCELED') {
      return new TransportError('Reasoning service request timeout', { retryable: true, cause: error });
    }
    return new TransportError(`Reasoning service unreachable: ${error.message}`, { retryable: true, cause: error });
  }
  return new TransportError(
    `Reasoning service request failed: ${error instanceof Error ? error.message : String(error)}`,
    { retryable: true, cause: error }
  );
}
