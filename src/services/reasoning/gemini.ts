import { GoogleGenAI, Type } from "@google/genai";
import type { GenerateContentParameters, Schema } from "@google/genai";
import { BIAS_DIMENSIONS } from "../../utils/dataStore";
import { TransportError } from "../../utils/errors";
import { isRetryableStatus } from "./types";
import type { CompletionOptions, ReasoningService } from "./types";

const scoreField: Schema = { type: Type.INTEGER };
const textField: Schema = { type: Type.STRING };
const dimensionKeys: string[] = [...BIAS_DIMENSIONS];

function perDimension(field: Schema): Schema {
  return {
    type: Type.OBJECT,
    properties: Object.fromEntries(dimensionKeys.map(key => [key, field])),
    required: dimensionKeys,
    propertyOrdering: dimensionKeys
  };
}

// Structured output schema mirroring the rubric's JSON shape
const biasResponseSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    scores: perDimension(scoreField),
    justifications: perDimension(textField),
    bias_phrases: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: { text: textField, dimension: { type: Type.STRING, enum: dimensionKeys } },
        required: ["text", "dimension"]
      }
    },
    notable_claims: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: { span: textField, claim: textField },
        required: ["span", "claim"]
      }
    }
  },
  required: ["scores", "justifications", "bias_phrases", "notable_claims"],
  propertyOrdering: ["scores", "justifications", "bias_phrases", "notable_claims"]
};

/** The slice of `GoogleGenAI.models` this adapter calls. */
export interface GenerateContentModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface GeminiReasoningOptions {
  model: string;
  apiKey?: string;
  models?: GenerateContentModels;
}

export class GeminiReasoningService implements ReasoningService {
  readonly modelVersion: string;
  private readonly apiKey?: string;
  private models: GenerateContentModels | null;

  constructor(options: GeminiReasoningOptions) {
    this.modelVersion = options.model;
    this.apiKey = options.apiKey;
    this.models = options.models ?? null;
  }

  private getModels(): GenerateContentModels {
    if (!this.models) {
      if (!this.apiKey) {
        throw new TransportError("GOOGLE_AI_KEY is required for the Gemini reasoning service", { retryable: false });
      }
      this.models = new GoogleGenAI({ apiKey: this.apiKey }).models;
    }
    return this.models;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const models = this.getModels();
    try {
      const response = await models.generateContent({
        model: this.modelVersion,
        contents: prompt,
        config: {
          responseMimeType: "application/json",
          responseSchema: biasResponseSchema,
          temperature: 0.1,
          abortSignal: options.signal
        }
      });
      return response.text ?? "";
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    const status = error.status;
    const message = status === 429 ? "Gemini rate limit exceeded" : `Gemini API returned ${status}`;
    return new TransportError(message, { retryable: isRetryableStatus(status), status, cause: error });
  }
  // Network failures, aborts and anything else without a status
  return new TransportError(
    `Gemini request failed: ${error instanceof Error ? error.message : String(error)}`,
    { retryable: true, cause: error }
  );
}
