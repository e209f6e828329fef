/**
 * Path Index
 *
 * Cached root-to-node label paths for display. The cache is only written by
 * `rebuild()`, so it may lag behind interactive edge edits.
 */

import { TagGraphConfig, PathIndexStats, DEFAULT_CONFIG } from '../types';
import { QueryBuilder } from '../db/queries';
import { logDebug } from '../errors';

export class PathIndex {
  private queries: QueryBuilder;
  private config: TagGraphConfig;

  constructor(queries: QueryBuilder, config: TagGraphConfig = DEFAULT_CONFIG) {
    this.queries = queries;
    this.config = config;
  }

  /**
   * Shortest cached path (by length, ties by text), or null
   */
  getBestPath(id: number): string | null {
    return this.queries.getBestPath(id);
  }

  /**
   * Every cached path of a node, shortest first
   */
  getAllPaths(id: number): string[] {
    return this.queries.getAllPaths(id);
  }

  /**
   * Recompute every path from the live edges and replace the cache.
   *
   * Nodes are visited in topological order so each node's parents are
   * finished first. A node keeps at most `maxPathsPerNode` paths, each at
   * most `maxBreadcrumbDepth + 1` labels long (the tail is kept).
   */
  rebuild(): PathIndexStats {
    const nodes = this.queries.getAllNodes();
    const edges = this.queries.getAllEdges();
    const { maxPathsPerNode, maxBreadcrumbDepth, pathSeparator } = this.config;
    const maxSegments = maxBreadcrumbDepth + 1;

    const labels = new Map<number, string>();
    const order = new Map<number, number>();
    nodes.forEach((node, index) => {
      labels.set(node.id, node.text);
      order.set(node.id, index);
    });
    const textOrder = (id: number): number => order.get(id) ?? Number.MAX_SAFE_INTEGER;

    const parentsOf = new Map<number, number[]>();
    const childrenOf = new Map<number, number[]>();
    const inDegree = new Map<number, number>();
    for (const node of nodes) {
      parentsOf.set(node.id, []);
      childrenOf.set(node.id, []);
      inDegree.set(node.id, 0);
    }
    for (const edge of edges) {
      parentsOf.get(edge.childId)?.push(edge.parentId);
      childrenOf.get(edge.parentId)?.push(edge.childId);
      inDegree.set(edge.childId, (inDegree.get(edge.childId) ?? 0) + 1);
    }
    for (const parents of parentsOf.values()) {
      parents.sort((a, b) => textOrder(a) - textOrder(b));
    }

    // Kahn's algorithm, seeded with the roots in text order
    const queue: number[] = nodes.filter((node) => inDegree.get(node.id) === 0).map((n) => n.id);
    const segmentsOf = new Map<number, string[][]>();

    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      if (id === undefined) break;
      const label = labels.get(id) ?? '';

      const parents = parentsOf.get(id) ?? [];
      let chains: string[][];
      if (parents.length === 0) {
        chains = [[label]];
      } else {
        chains = [];
        for (const parentId of parents) {
          for (const parentChain of segmentsOf.get(parentId) ?? []) {
            if (chains.length >= maxPathsPerNode) break;
            chains.push([...parentChain, label].slice(-maxSegments));
          }
          if (chains.length >= maxPathsPerNode) break;
        }
      }
      segmentsOf.set(id, chains.slice(0, maxPathsPerNode));

      for (const childId of childrenOf.get(id) ?? []) {
        const remaining = (inDegree.get(childId) ?? 0) - 1;
        inDegree.set(childId, remaining);
        if (remaining === 0) {
          queue.push(childId);
        }
      }
    }

    if (queue.length < nodes.length) {
      // Nodes on or below a cycle never reach in-degree zero
      logDebug('Path index skipped nodes on a cycle', { skipped: nodes.length - queue.length });
    }

    const paths = new Map<number, string[]>();
    for (const [id, chains] of segmentsOf) {
      paths.set(id, chains.map((chain) => chain.join(pathSeparator)));
    }

    const pathsWritten = this.queries.replaceAllPaths(paths);
    return { nodesIndexed: segmentsOf.size, pathsWritten };
  }
}
