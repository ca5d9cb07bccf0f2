import type { ArticleRepresentation, NarrativeCluster } from "../utils/dataStore";
import { IncompatibleRepresentationError } from "../utils/errors";
import { representationTag } from "./representation";

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// Code-unit order, independent of locale
function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  /** The smaller index always becomes the root. */
  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

export function clusterIdFor(anchorArticleId: string): string {
  return `cluster-${anchorArticleId}`;
}

export function assertCompatible(representations: ArticleRepresentation[]): void {
  if (representations.length === 0) return;
  const first = representations[0];
  const expected = `${representationTag(first)}/${first.vector.length}`;
  for (const rep of representations) {
    const found = `${representationTag(rep)}/${rep.vector.length}`;
    if (found !== expected) {
      throw new IncompatibleRepresentationError(expected, found, rep.articleId);
    }
  }
}

export interface ClusterEngineOptions {
  now?: () => Date;
}

/**
 * Threshold-linked narrative clustering: connected components of the graph
 * whose edges join article pairs at or above the similarity threshold.
 */
export class ClusterEngine {
  private readonly now: () => Date;

  constructor(options: ClusterEngineOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  cluster(representations: ArticleRepresentation[], similarityThreshold: number): NarrativeCluster[] {
    if (representations.length === 0) return [];
    assertCompatible(representations);

    // Private sorted snapshot; callers' arrays and vectors are never touched
    const snapshot = representations
      .map(rep => ({ articleId: rep.articleId, vector: [...rep.vector] }))
      .sort((a, b) => compareIds(a.articleId, b.articleId))
      .filter((rep, i, all) => i === 0 || all[i - 1].articleId !== rep.articleId);

    const uf = new UnionFind(snapshot.length);
    for (let i = 0; i < snapshot.length; i++) {
      for (let j = i + 1; j < snapshot.length; j++) {
        if (cosineSimilarity(snapshot[i].vector, snapshot[j].vector) >= similarityThreshold) {
          uf.union(i, j);
        }
      }
    }

    // Roots are the smallest index of each component, so groups come out in anchor order
    const groups = new Map<number, number[]>();
    snapshot.forEach((_, i) => {
      const root = uf.find(i);
      const members = groups.get(root);
      if (members) members.push(i);
      else groups.set(root, [i]);
    });

    const createdAt = this.now().toISOString();
    const clusters: NarrativeCluster[] = [];
    for (const memberIdx of groups.values()) {
      const vectors = memberIdx.map(i => snapshot[i].vector);
      const centroid = meanVector(vectors);
      const memberArticleIds = memberIdx.map(i => snapshot[i].articleId);
      clusters.push({
        clusterId: clusterIdFor(memberArticleIds[0]),
        memberArticleIds,
        centroid,
        exemplarArticleId: pickExemplar(memberIdx.map(i => snapshot[i]), centroid),
        label: '',
        createdAt
      });
    }

    clusters.sort((a, b) => compareIds(a.clusterId, b.clusterId));
    console.log(`[Cluster] ${snapshot.length} article(s) → ${clusters.length} cluster(s) at threshold ${similarityThreshold}`);
    return clusters;
  }
}

export function meanVector(vectors: number[][]): number[] {
  const sum = new Array<number>(vectors[0].length).fill(0);
  for (const vector of vectors) {
    vector.forEach((v, i) => { sum[i] += v; });
  }
  return sum.map(v => v / vectors.length);
}

// Members arrive in id order, so strict `>` keeps the smaller id on ties
function pickExemplar(members: { articleId: string; vector: number[] }[], centroid: number[]): string {
  let best = members[0].articleId;
  let bestScore = -Infinity;
  for (const member of members) {
    const score = cosineSimilarity(member.vector, centroid);
    if (score > bestScore) {
      bestScore = score;
      best = member.articleId;
    }
  }
  return best;
}

/** Article id → cluster id for a partition. */
export function membershipIndex(clusters: NarrativeCluster[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const cluster of clusters) {
    for (const articleId of cluster.memberArticleIds) index.set(articleId, cluster.clusterId);
  }
  return index;
}
