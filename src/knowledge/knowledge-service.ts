import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { KnowledgeDocument, KnowledgeEntry, KnowledgeLookup } from './types';
import { logger } from '../observability/logger';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const KNOWLEDGE_DIR = path.resolve(PROJECT_ROOT, 'knowledge');

const MIN_SCORE = 0.2;

const validateEntries = new Ajv({ allErrors: true }).compile<KnowledgeEntry[]>({
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string' },
      title: { type: 'string' },
      content: { type: 'string' },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['id', 'title', 'content', 'tags'],
  },
});

/**
 * Stop words that dilute search relevance.
 * These common words match almost every entry and are dropped before scoring.
 */
const STOP_WORDS = new Set([
  'i', 'me', 'my', 'we', 'our', 'you', 'your', 'it', 'they', 'them',
  'a', 'an', 'the', 'is', 'am', 'are', 'was', 'were', 'be', 'been',
  'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would', 'should',
  'can', 'could', 'may', 'might', 'must',
  'to', 'of', 'in', 'for', 'on', 'with', 'at', 'by', 'from', 'as', 'into', 'about',
  'and', 'but', 'or', 'not', 'so', 'if', 'then', 'than',
  'what', 'which', 'who', 'this', 'that', 'these', 'those',
  'how', 'when', 'where', 'why',
  'all', 'some', 'any', 'no', 'just', 'also', 'very', 'too', 'only',
  'want', 'need', 'know', 'please', 'help', 'get', 'hi', 'hello', 'thanks',
]);

/**
 * Keyword search over YAML knowledge partitions (`knowledge/<partition>.yaml`).
 * Partitions are read once, on first use.
 */
export class KnowledgeService implements KnowledgeLookup {
  private readonly partitions = new Map<string, KnowledgeEntry[]>();
  private readonly log = logger.child({ component: 'knowledge' });

  constructor(
    private readonly directory: string = KNOWLEDGE_DIR,
    preloaded?: Record<string, KnowledgeEntry[]>,
  ) {
    for (const [partition, entries] of Object.entries(preloaded ?? {})) {
      this.partitions.set(partition, entries);
    }
  }

  async search(partition: string, query: string, limit = 3): Promise<KnowledgeDocument[]> {
    const entries = this.entries(partition);
    const terms = tokenize(query);
    if (terms.length === 0) return [];

    const results: KnowledgeDocument[] = [];
    for (const entry of entries) {
      const text = `${entry.title} ${entry.content} ${entry.tags.join(' ')}`.toLowerCase();
      const score = scoreText(text, terms, entry.tags.join(' ').toLowerCase());
      if (score >= MIN_SCORE) {
        results.push({ id: entry.id, partition, title: entry.title, content: entry.content, tags: entry.tags, score });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  private entries(partition: string): KnowledgeEntry[] {
    const cached = this.partitions.get(partition);
    if (cached) return cached;

    const loaded = this.loadPartition(partition);
    this.partitions.set(partition, loaded);
    return loaded;
  }

  private loadPartition(partition: string): KnowledgeEntry[] {
    if (!/^[a-z0-9-]+$/.test(partition)) {
      this.log.warn({ partition }, 'Rejected knowledge partition name');
      return [];
    }
    const filepath = path.join(this.directory, `${partition}.yaml`);
    if (!fs.existsSync(filepath)) {
      this.log.warn({ filepath }, 'Knowledge partition not found');
      return [];
    }
    const document: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
    if (!validateEntries(document)) {
      this.log.error({ filepath, errors: validateEntries.errors }, 'Invalid knowledge partition');
      return [];
    }
    this.log.info({ partition, entries: document.length }, 'Knowledge partition loaded');
    return document;
  }
}

/** Lowercase terms without stop words; falls back to all terms when every word is a stop word */
export function tokenize(query: string): string[] {
  const raw = query.toLowerCase().split(/[^\p{L}\p{N}']+/u).filter(Boolean);
  const meaningful = raw.filter((t) => !STOP_WORDS.has(t) && t.length > 1);
  return meaningful.length > 0 ? meaningful : raw;
}

/**
 * Share of query terms found in the text. A term that also appears in the
 * curated tags earns a half-point bonus; the result is capped at 1.
 */
export function scoreText(text: string, terms: string[], tagText?: string): number {
  if (terms.length === 0) return 0;
  let score = 0;
  for (const term of terms) {
    if (text.includes(term)) {
      score += 1;
      if (tagText && tagText.includes(term)) score += 0.5;
    }
  }
  return Math.min(1, score / terms.length);
}
