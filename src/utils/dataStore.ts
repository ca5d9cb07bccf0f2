export const BIAS_DIMENSIONS = [
  'framing',
  'omission',
  'tone',
  'source_selection',
  'word_choice'
] as const;

export type BiasDimension = typeof BIAS_DIMENSIONS[number];

// Rubric wording shown to the model for each dimension
export const DIMENSION_RUBRIC: Record<BiasDimension, string> = {
  framing: 'How the story is presented: angle, causal attributions, villains and heroes',
  omission: 'Missing key facts, perspectives or context',
  tone: 'Emotive vs neutral language, sensationalism',
  source_selection: 'Which voices are quoted or relied on, diversity of perspectives',
  word_choice: 'Loaded terms, euphemisms or biased language'
};

export function isBiasDimension(value: string): value is BiasDimension {
  return (BIAS_DIMENSIONS as readonly string[]).includes(value);
}

export type DimensionScores = Record<BiasDimension, number>;
export type DimensionJustifications = Record<BiasDimension, string>;

export interface BiasPhrase {
  text: string;
  dimension: BiasDimension;
  // Offsets into the article content, set once the phrase has been located
  start: number;
  end: number;
}

export interface NotableClaim {
  span: string;
  claim: string;
}

/**
 * Model output for one piece of article text. Shared by every article with
 * the same fingerprint, so it carries no article id.
 */
export interface BiasAnalysis {
  scores: DimensionScores;
  justifications: DimensionJustifications;
  biasPhrases: BiasPhrase[];
  notableClaims: NotableClaim[];
  computedAt: string;
  modelVersion: string;
}

export interface BiasAssessment extends BiasAnalysis {
  articleId: string;
}

export interface Article {
  id: string;
  sourceOutlet: string;
  title: string;
  content: string;
  url: string;
  publishedAt: string;
  fetchedAt: string;
  contentFingerprint: string;
  assessment: BiasAssessment | null;
  clusterId: string | null;
}

export interface ArticleRepresentation {
  articleId: string;
  vector: number[];
  method: string;
  methodVersion: string;
  builtAt: string;
}

export interface NarrativeCluster {
  clusterId: string;
  memberArticleIds: string[];
  centroid: number[];
  exemplarArticleId: string;
  label: string;
  createdAt: string;
}

/**
 * Persistence boundary for articles and their derived fields.
 * Implemented by the sqlite3 and MongoDB stores.
 */
export interface ArticleStore {
  listUnscored(maxCount: number): Promise<Article[]>;
  saveAssessment(articleId: string, assessment: BiasAssessment): Promise<void>;
  /** Replaces the whole partition and each article's cluster assignment. */
  saveClusters(clusters: NarrativeCluster[]): Promise<void>;
  saveArticles(articles: Article[]): Promise<void>;
  listArticles(limit?: number): Promise<Article[]>;
  getArticleById(id: string): Promise<Article | null>;
  loadClusters(): Promise<NarrativeCluster[]>;
  close(): Promise<void>;
}
