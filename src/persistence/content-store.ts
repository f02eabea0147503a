/**
 * Repository for generated content, researched keywords and product
 * optimizations. Uses prepared statements for all reads and writes.
 */

import type Database from 'better-sqlite3';
import type { ContentType, GeneratedContent } from '../content/types.js';
import type { Keyword } from '../seo/types.js';
import type { OptimizationResult } from '../optimizer/types.js';

export type ContentStatus = 'draft' | 'published' | 'archived';

/** Stored content row as returned by the API. */
export interface ContentRecord {
  id: number;
  contentType: ContentType;
  title: string;
  body: string;
  metaDescription: string;
  keywords: string[];
  wordCount: number;
  status: ContentStatus;
  filePath: string | null;
  createdAt: number;
}

export interface KeywordRecord extends Keyword {
  id: number;
  updatedAt: number;
}

interface ContentRow {
  id: number;
  contentType: ContentType;
  title: string;
  body: string;
  metaDescription: string;
  keywords: string;
  wordCount: number;
  status: ContentStatus;
  filePath: string | null;
  createdAt: number;
}

interface KeywordRow {
  id: number;
  term: string;
  searchVolume: number;
  difficulty: number;
  cpc: number | null;
  intent: Keyword['intent'];
  relevanceScore: number;
  updatedAt: number;
}

const CONTENT_COLUMNS = `
  id,
  content_type as contentType,
  title,
  body,
  meta_description as metaDescription,
  keywords,
  word_count as wordCount,
  status,
  file_path as filePath,
  created_at as createdAt
`;

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function toContentRecord(row: ContentRow): ContentRecord {
  return { ...row, keywords: parseStringArray(row.keywords) };
}

function toKeywordRecord(row: KeywordRow): KeywordRecord {
  return {
    id: row.id,
    term: row.term,
    searchVolume: row.searchVolume,
    difficulty: row.difficulty,
    cpc: row.cpc,
    intent: row.intent,
    relevanceScore: row.relevanceScore,
    updatedAt: row.updatedAt,
  };
}

export class ContentStore {
  private insertContentStmt: Database.Statement<[string, string, string, string, string, number, string | null, number]>;
  private getContentStmt: Database.Statement<[number], ContentRow>;
  private listContentStmt: Database.Statement<[number], ContentRow>;
  private listContentByTypeStmt: Database.Statement<[string, number], ContentRow>;
  private updateStatusStmt: Database.Statement<[string, number]>;
  private upsertKeywordStmt: Database.Statement<[string, number, number, number | null, string, number, number]>;
  private topKeywordsStmt: Database.Statement<[number], KeywordRow>;
  private insertOptimizationStmt: Database.Statement<
    [string, string, string, string, string, number, number, number]
  >;

  constructor(db: Database.Database) {
    this.insertContentStmt = db.prepare<[string, string, string, string, string, number, string | null, number]>(`
      INSERT INTO content (
        content_type, title, body, meta_description, keywords, word_count, file_path, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.getContentStmt = db.prepare<[number], ContentRow>(`SELECT ${CONTENT_COLUMNS} FROM content WHERE id = ?`);

    this.listContentStmt = db.prepare<[number], ContentRow>(`
      SELECT ${CONTENT_COLUMNS} FROM content
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `);

    this.listContentByTypeStmt = db.prepare<[string, number], ContentRow>(`
      SELECT ${CONTENT_COLUMNS} FROM content
      WHERE content_type = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `);

    this.updateStatusStmt = db.prepare<[string, number]>('UPDATE content SET status = ? WHERE id = ?');

    this.upsertKeywordStmt = db.prepare<[string, number, number, number | null, string, number, number]>(`
      INSERT INTO keywords (term, search_volume, difficulty, cpc, intent, relevance_score, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(term) DO UPDATE SET
        search_volume = excluded.search_volume,
        difficulty = excluded.difficulty,
        cpc = excluded.cpc,
        intent = excluded.intent,
        relevance_score = excluded.relevance_score,
        updated_at = excluded.updated_at
    `);

    this.topKeywordsStmt = db.prepare<[number], KeywordRow>(`
      SELECT
        id,
        term,
        search_volume as searchVolume,
        difficulty,
        cpc,
        intent,
        relevance_score as relevanceScore,
        updated_at as updatedAt
      FROM keywords
      ORDER BY relevance_score * search_volume DESC, term ASC
      LIMIT ?
    `);

    this.insertOptimizationStmt = db.prepare<[string, string, string, string, string, number, number, number]>(`
      INSERT INTO product_optimizations (
        handle, original_title, optimized_title, meta_description,
        suggested_tags, score_before, score_after, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  /**
   * Store a generated piece.
   * @param filePath - Where the JSON copy was written, if anywhere.
   * @returns New row id.
   */
  saveContent(content: GeneratedContent, filePath: string | null = null): number {
    const result = this.insertContentStmt.run(
      content.contentType,
      content.title,
      content.content,
      content.metaDescription,
      JSON.stringify(content.keywords),
      content.wordCount,
      filePath,
      content.createdAt.getTime(),
    );
    return Number(result.lastInsertRowid);
  }

  getContent(id: number): ContentRecord | null {
    const row = this.getContentStmt.get(id);
    return row === undefined ? null : toContentRecord(row);
  }

  /** Newest first, optionally restricted to one content type. */
  listRecentContent(limit: number = 10, contentType?: ContentType): ContentRecord[] {
    const rows =
      contentType === undefined
        ? this.listContentStmt.all(limit)
        : this.listContentByTypeStmt.all(contentType, limit);
    return rows.map(toContentRecord);
  }

  /** @returns Whether a row was updated. */
  updateContentStatus(id: number, status: ContentStatus): boolean {
    return this.updateStatusStmt.run(status, id).changes > 0;
  }

  /** Insert or refresh a keyword by term. */
  saveKeyword(keyword: Keyword, now: number = Date.now()): void {
    this.upsertKeywordStmt.run(
      keyword.term,
      keyword.searchVolume,
      keyword.difficulty,
      keyword.cpc,
      keyword.intent,
      keyword.relevanceScore,
      now,
    );
  }

  /** Highest relevance-weighted volume first. */
  getTopKeywords(limit: number = 50): KeywordRecord[] {
    return this.topKeywordsStmt.all(limit).map(toKeywordRecord);
  }

  saveOptimization(result: OptimizationResult, now: number = Date.now()): number {
    const info = this.insertOptimizationStmt.run(
      result.handle,
      result.originalTitle,
      result.optimizedTitle,
      result.metaDescription,
      JSON.stringify(result.suggestedTags),
      result.scoreBefore,
      result.scoreAfter,
      now,
    );
    return Number(info.lastInsertRowid);
  }
}
