/**
 * Graph Store Tests
 *
 * Node upserts, the guarded edge insert, aliases and deletion.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { TagGraph } from '../src';
import { QueryBuilder } from '../src/db/queries';
import {
  ValidationError,
  Logger,
  LogContext,
  setLogger,
  silentLogger,
  defaultLogger,
} from '../src/errors';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'taggraph-graph-'));
}

function cleanupTempDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

interface LogEntry {
  level: keyof Logger;
  message: string;
  context?: LogContext;
}

function createRecordingLogger(entries: LogEntry[]): Logger {
  const record =
    (level: keyof Logger) =>
    (message: string, context?: LogContext): void => {
      entries.push({ level, message, context });
    };
  return {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

describe('Graph Store', () => {
  let tempDir: string;
  let graph: TagGraph;

  beforeEach(() => {
    tempDir = createTempDir();
    setLogger(silentLogger);
    graph = TagGraph.open(path.join(tempDir, 'tags.db'));
  });

  afterEach(() => {
    graph.close();
    setLogger(defaultLogger);
    vi.restoreAllMocks();
    cleanupTempDir(tempDir);
  });

  describe('upsertNode', () => {
    it('should derive the slug and store lowercase text', () => {
      const node = graph.upsertNode('  Long Hair ', false);

      expect(node.slug).toBe('long_hair');
      expect(node.text).toBe('long hair');
      expect(node.isTag).toBe(false);
      expect(graph.getNodeById(node.id)).toEqual(node);
      expect(graph.getNodeBySlug('long_hair')).toEqual(node);
    });

    it('should be idempotent on slug and update the text', () => {
      const first = graph.upsertNode('long hair', false);
      const second = graph.upsertNode('LONG-HAIR', false);

      expect(second.id).toBe(first.id);
      expect(second.text).toBe('long-hair');
      expect(graph.getStats().nodeCount).toBe(1);
    });

    it('should promote isTag but never demote it', () => {
      const created = graph.upsertNode('katana', false);
      const promoted = graph.upsertNode('katana', true);
      const kept = graph.upsertNode('katana', false);

      expect(created.isTag).toBe(false);
      expect(promoted.isTag).toBe(true);
      expect(kept.isTag).toBe(true);
      expect(graph.getNodeById(created.id)?.isTag).toBe(true);
    });

    it('should reject text without a slug', () => {
      expect(() => graph.upsertNode('***', true)).toThrow(ValidationError);
      expect(graph.getStats().nodeCount).toBe(0);
    });

    it('should return null for unknown ids and slugs', () => {
      expect(graph.getNodeById(999)).toBeNull();
      expect(graph.getNodeBySlug('nothing_here')).toBeNull();
    });
  });

  describe('addEdge', () => {
    it('should add an edge once and report duplicates', () => {
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', true);

      expect(graph.addEdge(a.id, b.id)).toEqual({ status: 'added', parentId: a.id, childId: b.id });
      expect(graph.addEdge(a.id, b.id).status).toBe('duplicate');
      expect(graph.getStats().edgeCount).toBe(1);
    });

    it('should reject self-loops without writing', () => {
      const a = graph.upsertNode('a', false);

      expect(graph.addEdge(a.id, a.id).status).toBe('self_loop');
      expect(graph.getStats().edgeCount).toBe(0);
    });

    it('should reject edges to unknown nodes', () => {
      const a = graph.upsertNode('a', false);

      expect(graph.addEdge(a.id, 999).status).toBe('missing_node');
      expect(graph.addEdge(999, a.id).status).toBe('missing_node');
      expect(graph.getStats().edgeCount).toBe(0);
    });

    it('should reject edges that would close a cycle', () => {
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', false);
      const c = graph.upsertNode('c', false);
      graph.addEdge(a.id, b.id);
      graph.addEdge(b.id, c.id);

      expect(graph.addEdge(b.id, a.id).status).toBe('cycle');
      expect(graph.addEdge(c.id, a.id).status).toBe('cycle');
      expect(graph.getStats().edgeCount).toBe(2);
      expect(graph.getParents(a.id)).toEqual([]);
    });

    it('should allow a second parent in a diamond', () => {
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', false);
      const c = graph.upsertNode('c', false);
      const d = graph.upsertNode('d', true);
      graph.addEdge(a.id, b.id);
      graph.addEdge(a.id, c.id);
      graph.addEdge(b.id, d.id);

      expect(graph.addEdge(c.id, d.id).status).toBe('added');
      expect(graph.getParents(d.id).map((n) => n.text)).toEqual(['b', 'c']);
    });

    it('should fail closed when the ancestor walk throws', () => {
      const entries: LogEntry[] = [];
      setLogger(createRecordingLogger(entries));
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', false);
      vi.spyOn(graph.getQueries(), 'isAncestor').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      expect(graph.addEdge(a.id, b.id).status).toBe('cycle');
      expect(graph.getStats().edgeCount).toBe(0);
      expect(entries).toEqual([
        {
          level: 'warn',
          message: 'Cycle guard failed, rejecting edge',
          context: { parentId: a.id, childId: b.id, error: 'disk I/O error' },
        },
      ]);
    });

    it('should bound the ancestor walk by depth', () => {
      const ids = ['n0', 'n1', 'n2', 'n3'].map((text) => graph.upsertNode(text, false).id);
      for (let i = 0; i < ids.length - 1; i++) {
        graph.addEdge(ids[i] ?? 0, ids[i + 1] ?? 0);
      }
      const queries = new QueryBuilder(graph.getDatabase().getDb(), 2);
      const [first, , , last] = ids;

      expect(queries.isAncestor(first ?? 0, last ?? 0)).toBe(false);
      expect(queries.isAncestor(first ?? 0, last ?? 0, 3)).toBe(true);
    });

    it('should remove edges', () => {
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', true);
      graph.addEdge(a.id, b.id);

      expect(graph.removeEdge(a.id, b.id)).toBe(true);
      expect(graph.removeEdge(a.id, b.id)).toBe(false);
      expect(graph.getChildren(a.id)).toEqual([]);
    });

    it('should join an outer transaction', () => {
      const a = graph.upsertNode('a', false);
      const b = graph.upsertNode('b', false);

      expect(() =>
        graph.getDatabase().transaction(() => {
          graph.addEdge(a.id, b.id);
          throw new Error('rollback');
        })
      ).toThrow('rollback');
      expect(graph.getStats().edgeCount).toBe(0);
    });
  });

  describe('aliases', () => {
    it('should bind an alias once', () => {
      const katana = graph.upsertNode('katana', true);

      expect(graph.addAlias(katana.id, 'Nihon To')).toBe(true);
      expect(graph.addAlias(katana.id, 'nihon-to')).toBe(true);
      expect(graph.getAliases(katana.id)).toEqual([
        { nodeId: katana.id, aliasSlug: 'nihon_to', aliasText: 'nihon to' },
      ]);
    });

    it('should refuse aliases owned by another node, unknown nodes and empty slugs', () => {
      const katana = graph.upsertNode('katana', true);
      const sword = graph.upsertNode('sword', true);
      graph.addAlias(katana.id, 'blade');

      expect(graph.addAlias(sword.id, 'blade')).toBe(false);
      expect(graph.addAlias(999, 'steel')).toBe(false);
      expect(graph.addAlias(katana.id, '?!')).toBe(false);
      expect(graph.getStats().aliasCount).toBe(1);
    });
  });

  describe('extra metadata', () => {
    it('should set and clear extra', () => {
      const node = graph.upsertNode('katana', true);

      expect(graph.setNodeExtra(node.id, { sprite: 'katana.png', weight: 2 })).toBe(true);
      expect(graph.getNodeById(node.id)?.extra).toEqual({ sprite: 'katana.png', weight: 2 });

      expect(graph.setNodeExtra(node.id, null)).toBe(true);
      expect(graph.getNodeById(node.id)?.extra).toBeUndefined();
    });

    it('should report unknown nodes', () => {
      expect(graph.setNodeExtra(999, { a: 1 })).toBe(false);
    });
  });

  describe('deleteNode', () => {
    it('should cascade to edges, aliases, paths and the search index', () => {
      const a = graph.upsertNode('weapons', false);
      const b = graph.upsertNode('katana', true);
      graph.addEdge(a.id, b.id);
      graph.addAlias(b.id, 'nihonto');
      graph.rebuildPathIndex();
      graph.rebuildSearchIndex();

      expect(graph.deleteNode(b.id)).toBe(true);

      const db = graph.getDatabase().getDb();
      const searchRows = db.prepare('SELECT COUNT(*) as count FROM node_search').get() as {
        count: number;
      };
      expect(graph.getNodeById(b.id)).toBeNull();
      expect(graph.getChildren(a.id)).toEqual([]);
      expect(graph.getAliases(b.id)).toEqual([]);
      expect(graph.getAllPaths(b.id)).toEqual([]);
      expect(searchRows.count).toBe(1);
      expect(graph.search('nihonto')).toEqual([]);
      expect(graph.deleteNode(b.id)).toBe(false);
    });
  });

  describe('shared database file', () => {
    it('should read nodes rewritten by another connection', () => {
      const dbPath = path.join(tempDir, 'tags.db');
      const csvPath = path.join(tempDir, 'tags.csv');
      fs.writeFileSync(csvPath, 'weapons,swords,katana\n');
      graph.importIfNeeded(csvPath);
      const weapons = graph.getNodeBySlug('weapons');
      expect(graph.getNodeById(weapons?.id ?? 0)?.slug).toBe('weapons');

      fs.writeFileSync(csvPath, 'armor,helmet,kabuto\n');
      TagGraph.forceReimport(dbPath, csvPath);

      const fresh = TagGraph.open(dbPath);
      expect(graph.getNodeById(weapons?.id ?? 0)).toEqual(fresh.getNodeById(weapons?.id ?? 0));
      const kabuto = graph.getNodeBySlug('kabuto');
      expect(graph.getBreadcrumb(kabuto?.id ?? 0).map((n) => n.text)).toEqual([
        'armor',
        'helmet',
        'kabuto',
      ]);
      fresh.close();
    });

    it('should see promotions made by another connection', () => {
      const other = TagGraph.open(path.join(tempDir, 'tags.db'));
      const hair = graph.upsertNode('hair', false);
      expect(graph.getNodeById(hair.id)?.isTag).toBe(false);

      other.upsertNode('hair', true);

      expect(graph.getNodeById(hair.id)?.isTag).toBe(true);
      other.close();
    });

    it('should hand out a fresh object on every read', () => {
      const katana = graph.upsertNode('katana', true);
      const first = graph.getNodeById(katana.id);
      if (first) {
        first.isTag = false;
      }

      expect(graph.getNodeById(katana.id)?.isTag).toBe(true);
    });
  });

  describe('getStats', () => {
    it('should count records', () => {
      const a = graph.upsertNode('weapons', false);
      const b = graph.upsertNode('katana', true);
      graph.addEdge(a.id, b.id);
      graph.addAlias(b.id, 'nihonto');
      graph.rebuildPathIndex();

      expect(graph.getStats()).toEqual({
        nodeCount: 2,
        edgeCount: 1,
        tagCount: 1,
        aliasCount: 1,
        pathCount: 2,
        searchIndexed: false,
        importProvenance: { imported: false, importedAt: undefined, source: undefined },
      });
    });
  });
});
