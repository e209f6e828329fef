/**
 * Lookup Paths
 *
 * Resolves label paths declared by consumers (e.g. `['body', 'hair']`) to a
 * node, and lists the tags directly under it.
 */

import { TagNode, LookupPathEntry, LookupIssue, LookupValidationReport } from '../types';
import { QueryBuilder } from '../db/queries';
import { TagSearcher } from '../search';

/** Search hits considered when matching the first label */
const ROOT_CANDIDATES = 100;

/**
 * Case-insensitive label comparison where spaces and underscores are
 * interchangeable
 */
export function labelsMatch(nodeText: string, label: string): boolean {
  const canonical = (value: string): string => value.trim().toLowerCase().replace(/ /g, '_');
  return canonical(nodeText) === canonical(label);
}

export class LookupResolver {
  private queries: QueryBuilder;
  private searcher: TagSearcher;

  constructor(queries: QueryBuilder, searcher: TagSearcher) {
    this.queries = queries;
    this.searcher = searcher;
  }

  /**
   * Walk a label path from the top. Where several nodes carry the same
   * label, one with children is preferred.
   */
  resolve(labels: string[]): TagNode | null {
    let current: TagNode | null = null;

    for (const label of labels) {
      const candidates: TagNode[] = current
        ? this.queries.getChildren(current.id).filter((child) => labelsMatch(child.text, label))
        : this.searcher
            .search(label, ROOT_CANDIDATES)
            .map((result) => result.node)
            .filter((node) => labelsMatch(node.text, label));

      current = this.pickCandidate(candidates);
      if (!current) {
        return null;
      }
    }

    return current;
  }

  /**
   * Tags directly under the node a path resolves to
   */
  lookupTags(labels: string[]): TagNode[] {
    const node = labels.length > 0 ? this.resolve(labels) : null;
    if (!node) return [];
    return this.queries.getChildren(node.id).filter((child) => child.isTag);
  }

  /**
   * Check every entry and report all problems together
   */
  validate(entries: LookupPathEntry[]): LookupValidationReport {
    const issues: LookupIssue[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      if (seen.has(entry.key)) {
        issues.push({ key: entry.key, severity: 'error', message: `Duplicate key: ${entry.key}` });
      }
      seen.add(entry.key);

      if (entry.path.length === 0) {
        issues.push({ key: entry.key, severity: 'error', message: `Empty path for ${entry.key}` });
        continue;
      }

      const joined = entry.path.join('/');
      try {
        if (this.lookupTags(entry.path).length === 0) {
          issues.push({
            key: entry.key,
            severity: 'warning',
            message: `Path returned zero results: ${joined}`,
          });
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        issues.push({
          key: entry.key,
          severity: 'error',
          message: `Lookup failed for ${joined}: ${reason}`,
        });
      }
    }

    return {
      valid: !issues.some((issue) => issue.severity === 'error'),
      checked: entries.length,
      issues,
    };
  }

  private pickCandidate(candidates: TagNode[]): TagNode | null {
    if (candidates.length <= 1) {
      return candidates[0] ?? null;
    }
    const withChildren = candidates.find((node) => this.queries.countChildren(node.id) > 0);
    return withChildren ?? candidates[0] ?? null;
  }
}
