/**
 * Graph Traversal
 *
 * Navigation over the tag DAG. One-hop lookups are single queries; the
 * breadcrumb ascent and subtree descent walk the graph here, bounded by
 * depth and guarded by visited sets so any graph shape terminates.
 */

import { TagNode, TagGraphConfig, DEFAULT_CONFIG } from '../types';
import { QueryBuilder } from '../db/queries';

/**
 * Graph traverser for the tag graph
 */
export class GraphTraverser {
  private queries: QueryBuilder;
  private config: TagGraphConfig;

  constructor(queries: QueryBuilder, config: TagGraphConfig = DEFAULT_CONFIG) {
    this.queries = queries;
    this.config = config;
  }

  /**
   * Nodes without parents, by text
   */
  getRoots(limit: number = this.config.rootsLimit): TagNode[] {
    if (limit <= 0) return [];
    return this.queries.getRoots(limit);
  }

  getChildren(id: number): TagNode[] {
    return this.queries.getChildren(id);
  }

  getParents(id: number): TagNode[] {
    return this.queries.getParents(id);
  }

  /**
   * Other children of any of this node's parents
   */
  getSiblings(id: number): TagNode[] {
    return this.queries.getSiblings(id);
  }

  /**
   * One ascent chain from a root down to `id`, root first.
   *
   * At every step the first parent by text that is not already on the chain
   * is taken. Stops at a root, when every parent is already on the chain, or
   * after `maxBreadcrumbDepth` ascents. Unknown ids give `[]`.
   */
  getBreadcrumb(id: number): TagNode[] {
    const start = this.queries.getNodeById(id);
    if (!start) return [];

    const chain: TagNode[] = [start];
    const visited = new Set<number>([start.id]);
    let current = start.id;

    for (let ascents = 0; ascents < this.config.maxBreadcrumbDepth; ascents++) {
      const nextId = this.queries.getParentIds(current).find((parentId) => !visited.has(parentId));
      if (nextId === undefined) break;

      const parent = this.queries.getNodeById(nextId);
      if (!parent) break;

      chain.push(parent);
      visited.add(parent.id);
      current = parent.id;
    }

    return chain.reverse();
  }

  /**
   * All descendants within `maxDepth` hops, without `id` itself, by text
   */
  getSubtree(id: number, maxDepth: number = this.config.defaultSubtreeDepth): TagNode[] {
    if (maxDepth <= 0) return [];

    const visited = new Set<number>([id]);
    const found: number[] = [];
    let frontier: number[] = [id];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: number[] = [];
      for (const nodeId of frontier) {
        for (const childId of this.queries.getChildIds(nodeId)) {
          if (visited.has(childId)) continue;
          visited.add(childId);
          found.push(childId);
          next.push(childId);
        }
      }
      frontier = next;
    }

    return this.queries.getNodesByIds(found);
  }

  /**
   * Siblings and cousins, by text
   */
  getRelatedSimple(id: number, limit: number = this.config.relatedLimit): TagNode[] {
    if (limit <= 0) return [];
    return this.queries.getRelated(id, limit);
  }

  /**
   * Random sample of selectable tags
   */
  getRandomTags(count: number = this.config.randomTagCount): TagNode[] {
    if (count <= 0) return [];
    return this.queries.getRandomTags(count);
  }
}
