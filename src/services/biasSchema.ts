import { z } from "zod";
import { BIAS_DIMENSIONS, isBiasDimension } from "../utils/dataStore";
import type { BiasAnalysis, BiasAssessment, BiasPhrase, NotableClaim } from "../utils/dataStore";

const Score = z.number().int().min(1).max(5);
const Justification = z.string();

// Wire shape returned by the reasoning service (snake_case, per the rubric)
export const BiasResponseSchema = z.object({
  scores: z.object({
    framing: Score,
    omission: Score,
    tone: Score,
    source_selection: Score,
    word_choice: Score
  }),
  justifications: z.object({
    framing: Justification,
    omission: Justification,
    tone: Justification,
    source_selection: Justification,
    word_choice: Justification
  }),
  bias_phrases: z.array(z.object({ text: z.string(), dimension: z.string() })).default([]),
  notable_claims: z.array(z.object({ span: z.string(), claim: z.string() })).default([])
});

export type BiasResponse = z.infer<typeof BiasResponseSchema>;

/** Phrases as returned by the model, before they are located in the content. */
export interface CandidatePhrase {
  text: string;
  dimension: string;
}

export interface ParsedBiasResponse {
  scores: BiasAnalysis['scores'];
  justifications: BiasAnalysis['justifications'];
  candidatePhrases: CandidatePhrase[];
  notableClaims: NotableClaim[];
}

export type ParseResult =
  | { success: true; data: ParsedBiasResponse }
  | { success: false; issues: string[] };

export function stripCodeFences(text: string): string {
  let body = text.trim();
  const fenced = body.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) body = fenced[1];
  return body.trim();
}

export function parseBiasResponse(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFences(text));
  } catch (error) {
    return { success: false, issues: [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const parsed = BiasResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    };
  }

  return {
    success: true,
    data: {
      scores: parsed.data.scores,
      justifications: parsed.data.justifications,
      candidatePhrases: parsed.data.bias_phrases,
      notableClaims: parsed.data.notable_claims
    }
  };
}

/**
 * Keeps only phrases that occur verbatim in `content` under a known
 * dimension, recording where they were found. Scores are untouched.
 */
export function locatePhrases(candidates: CandidatePhrase[], content: string): { kept: BiasPhrase[]; dropped: number } {
  const kept: BiasPhrase[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const text = candidate.text.trim();
    if (!text || !isBiasDimension(candidate.dimension)) continue;
    const key = `${candidate.dimension}\u0000${text}`;
    if (seen.has(key)) continue;
    const start = content.indexOf(text);
    if (start < 0) continue;
    seen.add(key);
    kept.push({ text, dimension: candidate.dimension, start, end: start + text.length });
  }
  return { kept, dropped: candidates.length - kept.length };
}

// Stored form of an assessment (sqlite JSON column, cache files)
const StoredPhrase = z.object({
  text: z.string(),
  dimension: z.enum(BIAS_DIMENSIONS),
  start: z.number().int(),
  end: z.number().int()
});

export const BiasAnalysisSchema = z.object({
  scores: BiasResponseSchema.shape.scores,
  justifications: BiasResponseSchema.shape.justifications,
  biasPhrases: z.array(StoredPhrase),
  notableClaims: z.array(z.object({ span: z.string(), claim: z.string() })),
  computedAt: z.string(),
  modelVersion: z.string()
});

export const BiasAssessmentSchema = BiasAnalysisSchema.extend({
  articleId: z.string()
});

export function parseStoredAssessment(value: unknown): BiasAssessment {
  return BiasAssessmentSchema.parse(value);
}

export type ScoredResponse = ParsedBiasResponse & Pick<BiasAnalysis, 'computedAt' | 'modelVersion'>;

// Cache form. Phrases stay unlocated: copies sharing a fingerprint can differ in whitespace
export const ScoredResponseSchema = z.object({
  scores: BiasResponseSchema.shape.scores,
  justifications: BiasResponseSchema.shape.justifications,
  candidatePhrases: z.array(z.object({ text: z.string(), dimension: z.string() })),
  notableClaims: z.array(z.object({ span: z.string(), claim: z.string() })),
  computedAt: z.string(),
  modelVersion: z.string()
});
