/**
 * @module learning/keyword-similarity-index
 * In-process similarity index over token sets.
 *
 * Text is normalised (UUIDs, timestamps, IPs and long numbers replaced) and
 * split into lowercase tokens; similarity is the Ochiai coefficient
 * |A ∩ B| / sqrt(|A|·|B|). Optionally mirrored to a JSON file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { SimilarityDocument, SimilarityHit, SimilarityIndex } from '../collaborators.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

const NORMALIZATION_RULES: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, replacement: ' ' },
  { pattern: /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}[\d.]*Z?/g, replacement: ' ' },
  { pattern: /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/g, replacement: ' ' },
  { pattern: /\b\d{4,}\b/g, replacement: ' ' },
];

const STOP_WORDS = new Set(['the', 'and', 'for', 'with', 'was', 'are', 'from', 'this', 'that', 'into', 'not']);

export function tokenize(text: string): Set<string> {
  let normalized = text;
  for (const rule of NORMALIZATION_RULES) {
    normalized = normalized.replace(rule.pattern, rule.replacement);
  }
  const tokens = new Set<string>();
  for (const token of normalized.toLowerCase().split(/[^a-z0-9_]+/)) {
    if (token.length >= 3 && !STOP_WORDS.has(token)) tokens.add(token);
  }
  return tokens;
}

function ochiai(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const token of a) if (b.has(token)) shared++;
  return shared / Math.sqrt(a.size * b.size);
}

const IndexFileSchema = z.object({
  documents: z.array(z.object({
    id: z.string(),
    text: z.string(),
    metadata: z.record(z.string()).default({}),
  })),
});

interface IndexedDocument {
  doc: SimilarityDocument;
  tokens: Set<string>;
}

export interface KeywordSimilarityIndexOptions {
  /** JSON file mirroring the index; loaded on construction. */
  filePath?: string;
  logger?: Logger;
}

export class KeywordSimilarityIndex implements SimilarityIndex {
  private readonly docs = new Map<string, IndexedDocument>();
  private readonly filePath?: string;
  private readonly logger: Logger;

  constructor(options: KeywordSimilarityIndexOptions = {}) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? silentLogger;
    this.load();
  }

  async add(doc: SimilarityDocument): Promise<void> {
    this.docs.set(doc.id, { doc: { ...doc, metadata: { ...doc.metadata } }, tokens: tokenize(doc.text) });
    this.flush();
  }

  /** Documents sharing at least one token with the query, most similar first. */
  async search(query: string, topK: number): Promise<SimilarityHit[]> {
    const queryTokens = tokenize(query);
    const hits: SimilarityHit[] = [];
    for (const { doc, tokens } of this.docs.values()) {
      const score = ochiai(queryTokens, tokens);
      if (score > 0) hits.push({ ...doc, score: Math.round(score * 1000) / 1000 });
    }
    return hits.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
  }

  get size(): number {
    return this.docs.size;
  }

  private load(): void {
    if (!this.filePath || !fs.existsSync(this.filePath)) return;
    try {
      const parsed = IndexFileSchema.parse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));
      for (const doc of parsed.documents) {
        this.docs.set(doc.id, { doc, tokens: tokenize(doc.text) });
      }
    } catch (err) {
      // Corrupted file - start fresh
      this.logger.warn(`Similarity index ${this.filePath} unreadable, starting empty: ${errorMessage(err)}`);
    }
  }

  private flush(): void {
    if (!this.filePath) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const documents = [...this.docs.values()].map((d) => d.doc);
      fs.writeFileSync(this.filePath, JSON.stringify({ documents }, null, 2), 'utf-8');
    } catch (err) {
      this.logger.error(`Similarity index write failed: ${errorMessage(err)}`);
    }
  }
}
