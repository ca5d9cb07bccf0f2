import sqlite3 from "sqlite3";
import { z } from "zod";
import fs from 'fs';
import path from 'path';
import type { Article, ArticleStore, BiasAssessment, NarrativeCluster } from "./dataStore";
import { parseStoredAssessment } from "../services/biasSchema";

interface ArticleRow {
  id: string;
  sourceOutlet: string;
  title: string;
  content: string;
  url: string | null;
  publishedAt: string;
  fetchedAt: string;
  contentFingerprint: string;
  assessment: string | null;
  clusterId: string | null;
}

interface ClusterRow {
  clusterId: string;
  label: string;
  memberArticleIds: string;
  centroid: string;
  exemplarArticleId: string;
  createdAt: string;
}

const StringList = z.array(z.string());
const NumberList = z.array(z.number());

export class SqliteArticleStore implements ArticleStore {
  private db: sqlite3.Database;
  private ready: Promise<void>;
  private txQueue: Promise<void> = Promise.resolve();

  /** `:memory:` keeps everything in process. */
  constructor(dbPath: string = './data/coverage_compass.db') {
    this.db = this.open(dbPath);
    this.ready = this.initDatabase();
    this.ready.catch(err => console.error('SQLite schema initialisation failed:', err));
  }

  private open(dbPath: string): sqlite3.Database {
    if (dbPath === ':memory:') return new sqlite3.Database(':memory:');

    const resolvedPath = path.isAbsolute(dbPath) ? dbPath : path.join(process.cwd(), dbPath);
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    return new sqlite3.Database(resolvedPath, (err) => {
      if (err) {
        console.error(`Error opening SQLite at ${resolvedPath}:`, err.message);
      }
    });
  }

  private async initDatabase(): Promise<void> {
    await this.exec(`
      CREATE TABLE IF NOT EXISTS articles (
        id TEXT PRIMARY KEY,
        sourceOutlet TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        url TEXT,
        publishedAt TEXT NOT NULL,
        fetchedAt TEXT NOT NULL,
        contentFingerprint TEXT NOT NULL,
        assessment TEXT,
        clusterId TEXT
      );
      CREATE TABLE IF NOT EXISTS clusters (
        clusterId TEXT PRIMARY KEY,
        label TEXT NOT NULL,
        memberArticleIds TEXT NOT NULL,
        centroid TEXT NOT NULL,
        exemplarArticleId TEXT NOT NULL,
        createdAt TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_articles_outlet ON articles(sourceOutlet);
      CREATE INDEX IF NOT EXISTS idx_articles_publishedAt ON articles(publishedAt);
      CREATE INDEX IF NOT EXISTS idx_articles_fingerprint ON articles(contentFingerprint);
    `);
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => err ? reject(err) : resolve());
    });
  }

  private run(sql: string, params: unknown[] = []): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, (err: Error | null) => err ? reject(err) : resolve());
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => err ? reject(err) : resolve(rows));
    });
  }

  // One connection: anything issued while a transaction is open would join it
  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const next = this.txQueue.then(work);
    this.txQueue = next.then(() => undefined, () => undefined);
    return next;
  }

  private transaction(work: () => Promise<void>): Promise<void> {
    return this.enqueue(async () => {
      await this.run('BEGIN');
      try {
        await work();
        await this.run('COMMIT');
      } catch (error) {
        await this.run('ROLLBACK');
        throw error;
      }
    });
  }

  async saveArticles(articles: Article[]): Promise<void> {
    await this.ready;
    if (!articles.length) return;
    await this.transaction(async () => {
      for (const a of articles) {
        await this.run(
          `INSERT OR REPLACE INTO articles
            (id, sourceOutlet, title, content, url, publishedAt, fetchedAt, contentFingerprint, assessment, clusterId)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            a.id,
            a.sourceOutlet,
            a.title,
            a.content,
            a.url,
            a.publishedAt,
            a.fetchedAt,
            a.contentFingerprint,
            a.assessment ? JSON.stringify(a.assessment) : null,
            a.clusterId
          ]
        );
      }
    });
  }

  async listUnscored(maxCount: number): Promise<Article[]> {
    await this.ready;
    const rows = await this.all<ArticleRow>(
      `SELECT * FROM articles WHERE assessment IS NULL ORDER BY publishedAt DESC, id ASC LIMIT ?`,
      [maxCount]
    );
    return rows.map(rowToArticle);
  }

  async saveAssessment(articleId: string, assessment: BiasAssessment): Promise<void> {
    await this.ready;
    await this.enqueue(() =>
      this.run(`UPDATE articles SET assessment = ? WHERE id = ?`, [JSON.stringify(assessment), articleId])
    );
  }

  async saveClusters(clusters: NarrativeCluster[]): Promise<void> {
    await this.ready;
    await this.transaction(async () => {
      await this.run(`DELETE FROM clusters`);
      await this.run(`UPDATE articles SET clusterId = NULL`);
      for (const c of clusters) {
        await this.run(
          `INSERT INTO clusters (clusterId, label, memberArticleIds, centroid, exemplarArticleId, createdAt)
            VALUES (?, ?, ?, ?, ?, ?)`,
          [c.clusterId, c.label, JSON.stringify(c.memberArticleIds), JSON.stringify(c.centroid), c.exemplarArticleId, c.createdAt]
        );
        for (const articleId of c.memberArticleIds) {
          await this.run(`UPDATE articles SET clusterId = ? WHERE id = ?`, [c.clusterId, articleId]);
        }
      }
    });
  }

  async listArticles(limit?: number): Promise<Article[]> {
    await this.ready;
    const rows = limit === undefined
      ? await this.all<ArticleRow>(`SELECT * FROM articles ORDER BY publishedAt DESC, id ASC`)
      : await this.all<ArticleRow>(`SELECT * FROM articles ORDER BY publishedAt DESC, id ASC LIMIT ?`, [limit]);
    return rows.map(rowToArticle);
  }

  async getArticleById(id: string): Promise<Article | null> {
    await this.ready;
    const rows = await this.all<ArticleRow>(`SELECT * FROM articles WHERE id = ?`, [id]);
    return rows.length ? rowToArticle(rows[0]) : null;
  }

  async loadClusters(): Promise<NarrativeCluster[]> {
    await this.ready;
    const rows = await this.all<ClusterRow>(`SELECT * FROM clusters ORDER BY clusterId ASC`);
    return rows.map(row => ({
      clusterId: row.clusterId,
      label: row.label,
      memberArticleIds: StringList.parse(JSON.parse(row.memberArticleIds)),
      centroid: NumberList.parse(JSON.parse(row.centroid)),
      exemplarArticleId: row.exemplarArticleId,
      createdAt: row.createdAt
    }));
  }

  async close(): Promise<void> {
    await this.ready;
    return new Promise((resolve, reject) => {
      this.db.close(err => err ? reject(err) : resolve());
    });
  }
}

function rowToArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    sourceOutlet: row.sourceOutlet,
    title: row.title,
    content: row.content,
    url: row.url ?? '',
    publishedAt: row.publishedAt,
    fetchedAt: row.fetchedAt,
    contentFingerprint: row.contentFingerprint,
    assessment: row.assessment ? parseStoredAssessment(JSON.parse(row.assessment)) : null,
    clusterId: row.clusterId
  };
}
