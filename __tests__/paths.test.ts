/**
 * Path Index Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { TagGraph, TagNode, TagGraphConfigOverrides } from '../src';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'taggraph-paths-'));
}

function cleanupTempDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe('Path Index', () => {
  let tempDir: string;
  let graph: TagGraph;
  let nodes: Record<'a' | 'b' | 'c' | 'd', TagNode>;

  function openDiamond(config?: TagGraphConfigOverrides): void {
    graph = TagGraph.open(path.join(tempDir, 'tags.db'), { config });
    const a = graph.upsertNode('a', false);
    const b = graph.upsertNode('b', false);
    const c = graph.upsertNode('c', false);
    const d = graph.upsertNode('d', true);
    graph.addEdge(a.id, b.id);
    graph.addEdge(a.id, c.id);
    graph.addEdge(b.id, d.id);
    graph.addEdge(c.id, d.id);
    nodes = { a, b, c, d };
  }

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    graph.close();
    cleanupTempDir(tempDir);
  });

  it('should hold no paths before the first rebuild', () => {
    openDiamond();

    expect(graph.getBestPath(nodes.d.id)).toBeNull();
    expect(graph.getAllPaths(nodes.d.id)).toEqual([]);
  });

  it('should compute one path per ascent chain', () => {
    openDiamond();

    expect(graph.rebuildPathIndex()).toEqual({ nodesIndexed: 4, pathsWritten: 5 });
    expect(graph.getAllPaths(nodes.a.id)).toEqual(['a']);
    expect(graph.getAllPaths(nodes.c.id)).toEqual(['a/c']);
    expect(graph.getAllPaths(nodes.d.id)).toEqual(['a/b/d', 'a/c/d']);
  });

  it('should pick the shortest path, ties by text', () => {
    openDiamond();
    const e = graph.upsertNode('e', true);
    graph.addEdge(nodes.a.id, e.id);
    graph.addEdge(nodes.d.id, e.id);
    graph.rebuildPathIndex();

    expect(graph.getBestPath(nodes.d.id)).toBe('a/b/d');
    expect(graph.getBestPath(e.id)).toBe('a/e');
    expect(graph.getAllPaths(e.id)).toEqual(['a/e', 'a/b/d/e', 'a/c/d/e']);
  });

  it('should cap the number of paths per node', () => {
    openDiamond({ maxPathsPerNode: 1 });

    expect(graph.rebuildPathIndex().pathsWritten).toBe(4);
    expect(graph.getAllPaths(nodes.d.id)).toEqual(['a/b/d']);
  });

  it('should keep the tail of paths longer than the breadcrumb depth', () => {
    openDiamond({ maxBreadcrumbDepth: 1 });
    graph.rebuildPathIndex();

    expect(graph.getAllPaths(nodes.b.id)).toEqual(['a/b']);
    expect(graph.getAllPaths(nodes.d.id)).toEqual(['b/d', 'c/d']);
  });

  it('should join labels with the configured separator', () => {
    openDiamond({ pathSeparator: ' > ' });
    graph.rebuildPathIndex();

    expect(graph.getBestPath(nodes.d.id)).toBe('a > b > d');
  });

  it('should stay stale until rebuilt', () => {
    openDiamond();
    graph.rebuildPathIndex();
    graph.removeEdge(nodes.c.id, nodes.d.id);

    expect(graph.getAllPaths(nodes.d.id)).toEqual(['a/b/d', 'a/c/d']);

    graph.rebuildPathIndex();
    expect(graph.getAllPaths(nodes.d.id)).toEqual(['a/b/d']);
  });
});
