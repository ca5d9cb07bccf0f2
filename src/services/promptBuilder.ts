import { BIAS_DIMENSIONS, DIMENSION_RUBRIC } from "../utils/dataStore";
import type { Article } from "../utils/dataStore";
import { InputError } from "../utils/errors";

export type PromptText = string;

export interface PromptBuilderOptions {
  minContentLength?: number;
  maxContentChars?: number;
}

const RESPONSE_SHAPE = `{
  "scores": {"framing": 1-5, "omission": 1-5, "tone": 1-5, "source_selection": 1-5, "word_choice": 1-5},
  "justifications": {"framing": "...", "omission": "...", "tone": "...", "source_selection": "...", "word_choice": "..."},
  "bias_phrases": [{"text": "exact phrase copied from the content", "dimension": "one of the five dimensions"}],
  "notable_claims": [{"span": "exact text from the content", "claim": "short description"}]
}`;

const STRICT_JSON_INSTRUCTION =
  'Your previous reply could not be used. Reply with ONE JSON object exactly matching the shape above: ' +
  'no markdown, no code fences, no commentary, all five dimensions present, every score an integer from 1 to 5.';

export class PromptBuilder {
  private readonly minContentLength: number;
  private readonly maxContentChars: number;

  constructor(options: PromptBuilderOptions = {}) {
    this.minContentLength = options.minContentLength ?? 240;
    this.maxContentChars = options.maxContentChars ?? 16000;
  }

  build(article: Pick<Article, 'title' | 'content'>): PromptText {
    const content = article.content.trim();
    if (!content) {
      throw new InputError('Article content is empty');
    }
    if (content.length < this.minContentLength) {
      throw new InputError(
        `Article content has ${content.length} characters, at least ${this.minContentLength} are required`
      );
    }

    const rubric = BIAS_DIMENSIONS
      .map((dimension, i) => `${i + 1}. ${dimension}: ${DIMENSION_RUBRIC[dimension]}`)
      .join('\n');

    return [
      'You are an expert media bias analyst. Analyze the article for bias across 5 dimensions:',
      '',
      rubric,
      '',
      'Score each dimension 1-5 (1 = minimal bias, 5 = extreme bias). Quote bias phrases verbatim from the content (max 3 per dimension).',
      '',
      'Return ONLY valid JSON:',
      RESPONSE_SHAPE,
      '',
      `Title: ${article.title.trim()}`,
      'FULL_CONTENT_START',
      this.truncate(content),
      'FULL_CONTENT_END'
    ].join('\n');
  }

  /** Cuts at the last sentence end past 80% of the limit, else hard-cuts. */
  truncate(text: string): string {
    if (text.length <= this.maxContentChars) return text;
    const head = text.substring(0, this.maxContentChars);
    const boundary = Math.max(head.lastIndexOf('.'), head.lastIndexOf('!'), head.lastIndexOf('?'));
    if (boundary > this.maxContentChars * 0.8) {
      return head.substring(0, boundary + 1);
    }
    return head + '...';
  }
}

export function withStrictJsonInstruction(prompt: PromptText): PromptText {
  return `${prompt}\n\n${STRICT_JSON_INSTRUCTION}`;
}
