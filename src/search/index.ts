/**
 * Tag Search
 *
 * Ranked search merging three strategies:
 * 1. exact slug or text match (score 100)
 * 2. slug prefix match (score 80)
 * 3. full-text phrase match ranked by bm25, normalised into (0, 60]
 *
 * A node found by several strategies keeps its best score.
 */

import { TagNode, TagGraphConfig, SearchResult, SearchStrategy, DEFAULT_CONFIG } from '../types';
import { QueryBuilder, SEARCH_TABLE } from '../db/queries';
import { slugify, normalizeText, compareText } from '../slug';
import { logDebug } from '../errors';

export const EXACT_SCORE = 100;
export const PREFIX_SCORE = 80;
export const FTS_MAX_SCORE = 60;

/** Full-text candidates fetched per requested result */
const FTS_CANDIDATE_FACTOR = 4;

interface Hit {
  node: TagNode;
  score: number;
  strategy: SearchStrategy;
}

/**
 * Quote a query as a single FTS5 phrase
 */
export function toPhraseQuery(query: string): string {
  return `"${query.toLowerCase().replace(/"/g, '""')}"`;
}

/**
 * Keep the best hit per node; on equal scores the earlier hit stays.
 * Sorted by score descending, then text.
 */
export function mergeHits<T extends Hit>(hits: T[]): T[] {
  const byId = new Map<number, T>();
  for (const hit of hits) {
    const previous = byId.get(hit.node.id);
    if (!previous || hit.score > previous.score) {
      byId.set(hit.node.id, hit);
    }
  }

  return [...byId.values()].sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    return compareText(a.node.text, b.node.text) || a.node.id - b.node.id;
  });
}

export class TagSearcher {
  private queries: QueryBuilder;
  private config: TagGraphConfig;

  constructor(queries: QueryBuilder, config: TagGraphConfig = DEFAULT_CONFIG) {
    this.queries = queries;
    this.config = config;
  }

  /**
   * Nodes whose slug starts with the typed prefix, by text
   */
  typeahead(prefix: string, limit: number = this.config.typeaheadLimit): TagNode[] {
    const normalized = normalizeText(prefix);
    if (!normalized || limit <= 0) return [];
    return this.queries.findBySlugPrefix(normalized, limit);
  }

  search(query: string, limit: number = this.config.searchLimit): SearchResult[] {
    const text = normalizeText(query);
    if (!text || limit <= 0) return [];

    const slug = slugify(query);
    const hits: Hit[] = [];

    if (slug) {
      for (const node of this.queries.findExact(slug, text, limit)) {
        hits.push({ node, score: EXACT_SCORE, strategy: 'exact' });
      }
      for (const node of this.queries.findBySlugPrefix(slug, limit)) {
        hits.push({ node, score: PREFIX_SCORE, strategy: 'prefix' });
      }
    }

    hits.push(...this.searchFullText(text, limit * FTS_CANDIDATE_FACTOR));

    return mergeHits(hits)
      .slice(0, limit)
      .map((hit) => ({ ...hit, bestPath: this.queries.getBestPath(hit.node.id) }));
  }

  hasFullTextIndex(): boolean {
    return this.queries.hasTable(SEARCH_TABLE);
  }

  /**
   * Regenerate the full-text index from nodes, aliases and cached paths.
   * Returns the number of rows indexed.
   */
  rebuildIndex(): number {
    const rows = this.queries.rebuildSearchTable();
    logDebug('Search index rebuilt', { rows });
    return rows;
  }

  private searchFullText(text: string, candidates: number): Hit[] {
    if (!this.hasFullTextIndex()) return [];

    let ranked: Array<{ node: TagNode; rank: number }>;
    try {
      ranked = this.queries.searchFullText(toPhraseQuery(text), this.config.ftsWeights, candidates);
    } catch (error) {
      logDebug('Full-text query failed', {
        query: text,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const best = ranked[0]?.rank;
    if (best === undefined) return [];

    // bm25 is negative, lower is better; the best hit scores FTS_MAX_SCORE
    return ranked.map(({ node, rank }) => ({
      node,
      score: best < 0 ? FTS_MAX_SCORE * (rank / best) : FTS_MAX_SCORE,
      strategy: 'fts' as const,
    }));
  }
}
