import { GoogleGenAI } from "@google/genai";
import type { EmbedContentParameters } from "@google/genai";
import stopwordList from "../data/stopwords.json";
import type { Article, ArticleRepresentation } from "../utils/dataStore";
import { fnv1a } from "../utils/fingerprint";

const STOPWORDS = new Set<string>(stopwordList);

export interface RepresentationBuilder {
  readonly method: string;
  readonly methodVersion: string;
  represent(article: Article): Promise<ArticleRepresentation>;
}

/** `method@version`, the tag clustering compares for compatibility. */
export function representationTag(rep: Pick<ArticleRepresentation, 'method' | 'methodVersion'>): string {
  return `${rep.method}@${rep.methodVersion}`;
}

// Title plus the opening of the body; the lede carries the event
export function representationText(article: Pick<Article, 'title' | 'content'>, previewChars = 1000): string {
  return `${article.title}. ${article.content.substring(0, previewChars)}`;
}

export function stemToken(token: string): string {
  let stem = token;
  if (stem.endsWith("ies") && stem.length > 4) {
    stem = `${stem.slice(0, -3)}y`;
  } else if (stem.endsWith("es") && stem.length > 4) {
    stem = stem.slice(0, -2);
  } else if (stem.endsWith("s") && !stem.endsWith("ss") && stem.length > 3) {
    stem = stem.slice(0, -1);
  }
  if (stem.endsWith("ing") && stem.length > 5) {
    stem = stem.slice(0, -3);
  } else if (stem.endsWith("ed") && stem.length > 4) {
    stem = stem.slice(0, -2);
  }
  return stem;
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const words = text
    .replace(/<[^>]+>/g, " ")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u);
  for (const word of words) {
    if (word.length < 3 || STOPWORDS.has(word)) continue;
    const stem = stemToken(word);
    if (stem.length >= 3 && !STOPWORDS.has(stem)) tokens.push(stem);
  }
  return tokens;
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0));
  return norm === 0 ? vector : vector.map(v => v / norm);
}

export interface LexicalRepresentationOptions {
  dimensions?: number;
  titleWeight?: number;
  now?: () => Date;
}

/**
 * Feature-hashed bag of stemmed terms. Needs no external service and is
 * fully deterministic for a given text.
 */
export class LexicalRepresentationBuilder implements RepresentationBuilder {
  readonly method = "lexical-hash";
  readonly methodVersion: string;
  private readonly dimensions: number;
  private readonly titleWeight: number;
  private readonly now: () => Date;

  constructor(options: LexicalRepresentationOptions = {}) {
    this.dimensions = options.dimensions ?? 512;
    this.titleWeight = options.titleWeight ?? 2;
    this.now = options.now ?? (() => new Date());
    this.methodVersion = `v1-d${this.dimensions}`;
  }

  vectorize(article: Pick<Article, 'title' | 'content'>): number[] {
    const counts = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(article.title)) {
      counts[fnv1a(token) % this.dimensions] += this.titleWeight;
    }
    for (const token of tokenize(article.content.substring(0, 1000))) {
      counts[fnv1a(token) % this.dimensions] += 1;
    }
    return l2Normalize(counts.map(tf => (tf > 0 ? 1 + Math.log(tf) : 0)));
  }

  async represent(article: Article): Promise<ArticleRepresentation> {
    return {
      articleId: article.id,
      vector: this.vectorize(article),
      method: this.method,
      methodVersion: this.methodVersion,
      builtAt: this.now().toISOString()
    };
  }
}

/** The slice of `GoogleGenAI.models` used for embeddings. */
export interface EmbeddingModels {
  embedContent(params: EmbedContentParameters): Promise<{ embeddings?: Array<{ values?: number[] }> }>;
}

export interface EmbeddingRepresentationOptions {
  model?: string;
  apiKey?: string;
  models?: EmbeddingModels;
  now?: () => Date;
}

export class EmbeddingRepresentationBuilder implements RepresentationBuilder {
  readonly method = "genai-embedding";
  readonly methodVersion: string;
  private readonly apiKey?: string;
  private models: EmbeddingModels | null;
  private readonly now: () => Date;

  constructor(options: EmbeddingRepresentationOptions = {}) {
    this.methodVersion = options.model ?? "text-embedding-004";
    this.apiKey = options.apiKey;
    this.models = options.models ?? null;
    this.now = options.now ?? (() => new Date());
  }

  private getModels(): EmbeddingModels {
    if (!this.models) {
      if (!this.apiKey) {
        throw new Error("GOOGLE_AI_KEY environment variable is required for embeddings");
      }
      this.models = new GoogleGenAI({ apiKey: this.apiKey }).models;
    }
    return this.models;
  }

  async represent(article: Article): Promise<ArticleRepresentation> {
    const response = await this.getModels().embedContent({
      model: this.methodVersion,
      contents: representationText(article)
    });
    const values = response.embeddings?.[0]?.values;
    if (!values || values.length === 0) {
      throw new Error(`Embedding model returned no vector for article ${article.id}`);
    }
    return {
      articleId: article.id,
      vector: l2Normalize(values),
      method: this.method,
      methodVersion: this.methodVersion,
      builtAt: this.now().toISOString()
    };
  }
}
