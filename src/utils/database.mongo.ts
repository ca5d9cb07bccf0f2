import { MongoClient } from 'mongodb';
import type { AnyBulkWriteOperation, Collection, WithId } from 'mongodb';
import type { Article, ArticleStore, BiasAssessment, NarrativeCluster } from './dataStore';

export interface MongoStoreOptions {
  uri: string;
  dbName?: string;
}

function stripMongoId<T extends object>(doc: WithId<T>): T {
  const { _id, ...rest } = doc;
  return rest as T;
}

export class MongoArticleStore implements ArticleStore {
  private client!: MongoClient;
  private articles!: Collection<Article>;
  private clusters!: Collection<NarrativeCluster>;
  private ready: Promise<void>;

  constructor(options: MongoStoreOptions) {
    this.ready = this.init(options.uri, options.dbName || 'coverage_compass');
    this.ready.catch(err => console.error('MongoDB connection failed:', err));
  }

  private async init(uri: string, dbName: string) {
    this.client = new MongoClient(uri, { ignoreUndefined: true });
    await this.client.connect();
    const db = this.client.db(dbName);
    this.articles = db.collection<Article>('articles');
    this.clusters = db.collection<NarrativeCluster>('clusters');
    await this.articles.createIndexes([
      { key: { id: 1 }, unique: true },
      { key: { sourceOutlet: 1 } },
      { key: { publishedAt: -1 } },
      { key: { contentFingerprint: 1 } }
    ]);
    await this.clusters.createIndex({ clusterId: 1 }, { unique: true });
  }

  async saveArticles(articles: Article[]): Promise<void> {
    await this.ready;
    if (!articles.length) return;
    const ops: AnyBulkWriteOperation<Article>[] = articles.map(a => ({
      replaceOne: {
        filter: { id: a.id },
        replacement: { ...a },
        upsert: true
      }
    }));
    await this.articles.bulkWrite(ops, { ordered: false });
  }

  async listUnscored(maxCount: number): Promise<Article[]> {
    await this.ready;
    const docs = await this.articles
      .find({ assessment: null }, { sort: { publishedAt: -1, id: 1 }, limit: maxCount })
      .toArray();
    return docs.map(doc => stripMongoId<Article>(doc));
  }

  async saveAssessment(articleId: string, assessment: BiasAssessment): Promise<void> {
    await this.ready;
    await this.articles.updateOne({ id: articleId }, { $set: { assessment } });
  }

  async saveClusters(clusters: NarrativeCluster[]): Promise<void> {
    await this.ready;
    await this.clusters.deleteMany({});
    await this.articles.updateMany({}, { $set: { clusterId: null } });
    if (!clusters.length) return;
    await this.clusters.insertMany(clusters.map(c => ({ ...c })));
    const ops: AnyBulkWriteOperation<Article>[] = clusters.map(c => ({
      updateMany: {
        filter: { id: { $in: c.memberArticleIds } },
        update: { $set: { clusterId: c.clusterId } }
      }
    }));
    await this.articles.bulkWrite(ops, { ordered: false });
  }

  async listArticles(limit?: number): Promise<Article[]> {
    await this.ready;
    const cursor = this.articles.find({}, { sort: { publishedAt: -1, id: 1 } });
    if (limit !== undefined) cursor.limit(limit);
    const docs = await cursor.toArray();
    return docs.map(doc => stripMongoId<Article>(doc));
  }

  async getArticleById(id: string): Promise<Article | null> {
    await this.ready;
    const doc = await this.articles.findOne({ id });
    return doc ? stripMongoId<Article>(doc) : null;
  }

  async loadClusters(): Promise<NarrativeCluster[]> {
    await this.ready;
    const docs = await this.clusters.find({}, { sort: { clusterId: 1 } }).toArray();
    return docs.map(doc => stripMongoId<NarrativeCluster>(doc));
  }

  async close(): Promise<void> {
    if (this.client) await this.client.close();
  }
}
