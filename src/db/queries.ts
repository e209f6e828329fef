/**
 * Database Queries
 *
 * Prepared statements for the tag graph: nodes, guarded edges, aliases,
 * cached paths, the import marker and the full-text table.
 */

import Database from 'better-sqlite3';
import {
  TagNode,
  TagEdge,
  TagAlias,
  AddEdgeResult,
  AddEdgeStatus,
  GraphStats,
  DEFAULT_CONFIG,
} from '../types';
import { slugify, normalizeText } from '../slug';
import { ValidationError, logWarn } from '../errors';

/**
 * Database row types (snake_case from SQLite)
 */
interface NodeRow {
  id: number;
  slug: string;
  text: string;
  is_tag: number;
  extra: string | null;
}

interface EdgeRow {
  parent_id: number;
  child_id: number;
}

interface AliasRow {
  node_id: number;
  alias_slug: string;
  alias_text: string;
}

interface MetaRow {
  key: string;
  value: string;
  updated_at: number;
}

/**
 * Name of the full-text table. Created by the search index rebuild, so its
 * absence is a normal state.
 */
export const SEARCH_TABLE = 'node_search';

function parseExtra(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) return undefined;
  const value: unknown = JSON.parse(raw);
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return undefined;
}

function rowToNode(row: NodeRow): TagNode {
  const node: TagNode = {
    id: row.id,
    slug: row.slug,
    text: row.text,
    isTag: row.is_tag === 1,
  };
  const extra = parseExtra(row.extra);
  if (extra) {
    node.extra = extra;
  }
  return node;
}

function rowToEdge(row: EdgeRow): TagEdge {
  return { parentId: row.parent_id, childId: row.child_id };
}

function rowToAlias(row: AliasRow): TagAlias {
  return { nodeId: row.node_id, aliasSlug: row.alias_slug, aliasText: row.alias_text };
}

/**
 * Escape LIKE wildcards so user input matches literally (used with ESCAPE '\')
 */
export function escapeLike(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/**
 * Query builder for the tag graph database
 */
export class QueryBuilder {
  private db: Database.Database;
  private cycleGuardDepth: number;

  // Prepared statements (lazily initialized)
  private stmts: {
    upsertNode?: Database.Statement;
    upsertNodeWithSlug?: Database.Statement;
    getNodeById?: Database.Statement;
    getNodeBySlug?: Database.Statement;
    getNodesByIds?: Database.Statement;
    nodeExists?: Database.Statement;
    setNodeExtra?: Database.Statement;
    deleteNode?: Database.Statement;
    insertEdge?: Database.Statement;
    deleteEdge?: Database.Statement;
    isAncestor?: Database.Statement;
    getChildren?: Database.Statement;
    getParents?: Database.Statement;
    getParentIds?: Database.Statement;
    getChildIds?: Database.Statement;
    getSiblings?: Database.Statement;
    getRelated?: Database.Statement;
    getRoots?: Database.Statement;
    getRandomTags?: Database.Statement;
    countChildren?: Database.Statement;
    insertAlias?: Database.Statement;
    getAliasBySlug?: Database.Statement;
    getAliases?: Database.Statement;
    getBestPath?: Database.Statement;
    getAllPaths?: Database.Statement;
    insertPath?: Database.Statement;
    findBySlugPrefix?: Database.Statement;
    findExact?: Database.Statement;
    upsertMeta?: Database.Statement;
    getMeta?: Database.Statement;
    hasTable?: Database.Statement;
  } = {};

  constructor(db: Database.Database, cycleGuardDepth: number = DEFAULT_CONFIG.cycleGuardDepth) {
    this.db = db;
    this.cycleGuardDepth = cycleGuardDepth;
  }

  // ===========================================================================
  // Node Operations
  // ===========================================================================

  /**
   * Insert or update a node keyed by the slug of its text.
   *
   * Updates the display text; `isTag` is only ever promoted.
   */
  upsertNode(text: string, isTag: boolean): TagNode {
    const slug = slugify(text);
    if (!slug) {
      throw new ValidationError(`Cannot derive a slug from "${text}"`);
    }

    if (!this.stmts.upsertNode) {
      this.stmts.upsertNode = this.db.prepare(`
        INSERT INTO node (slug, text, is_tag)
        VALUES (@slug, @text, @isTag)
        ON CONFLICT(slug) DO UPDATE SET
          text = excluded.text,
          is_tag = MAX(node.is_tag, excluded.is_tag)
        RETURNING *
      `);
    }

    const row = this.stmts.upsertNode.get({
      slug,
      text: normalizeText(text),
      isTag: isTag ? 1 : 0,
    }) as NodeRow;
    return rowToNode(row);
  }

  /**
   * Insert or update a node under an explicit slug. The first stored text
   * wins; `isTag` is only ever promoted.
   */
  upsertNodeWithSlug(slug: string, text: string, isTag: boolean): TagNode {
    if (!slug) {
      throw new ValidationError(`Empty slug for "${text}"`);
    }

    if (!this.stmts.upsertNodeWithSlug) {
      this.stmts.upsertNodeWithSlug = this.db.prepare(`
        INSERT INTO node (slug, text, is_tag)
        VALUES (@slug, @text, @isTag)
        ON CONFLICT(slug) DO UPDATE SET
          is_tag = MAX(node.is_tag, excluded.is_tag)
        RETURNING *
      `);
    }

    const row = this.stmts.upsertNodeWithSlug.get({
      slug,
      text: normalizeText(text),
      isTag: isTag ? 1 : 0,
    }) as NodeRow;
    return rowToNode(row);
  }

  /**
   * Get a node by ID
   */
  getNodeById(id: number): TagNode | null {
    if (!this.stmts.getNodeById) {
      this.stmts.getNodeById = this.db.prepare('SELECT * FROM node WHERE id = ?');
    }
    const row = this.stmts.getNodeById.get(id) as NodeRow | undefined;
    return row ? rowToNode(row) : null;
  }

  /**
   * Get a node by slug
   */
  getNodeBySlug(slug: string): TagNode | null {
    if (!this.stmts.getNodeBySlug) {
      this.stmts.getNodeBySlug = this.db.prepare('SELECT * FROM node WHERE slug = ?');
    }
    const row = this.stmts.getNodeBySlug.get(slug) as NodeRow | undefined;
    return row ? rowToNode(row) : null;
  }

  /**
   * Fetch many nodes at once, by text then id. The ids travel as one JSON
   * parameter, so the set size is not bound by SQLite's variable limit.
   */
  getNodesByIds(ids: number[]): TagNode[] {
    if (ids.length === 0) return [];
    if (!this.stmts.getNodesByIds) {
      this.stmts.getNodesByIds = this.db.prepare(`
        SELECT * FROM node
        WHERE id IN (SELECT value FROM json_each(?))
        ORDER BY text, id
      `);
    }
    return (this.stmts.getNodesByIds.all(JSON.stringify(ids)) as NodeRow[]).map(rowToNode);
  }

  nodeExists(id: number): boolean {
    if (!this.stmts.nodeExists) {
      this.stmts.nodeExists = this.db.prepare('SELECT 1 AS found FROM node WHERE id = ?');
    }
    return this.stmts.nodeExists.get(id) !== undefined;
  }

  getAllNodes(): TagNode[] {
    const rows = this.db.prepare('SELECT * FROM node ORDER BY text, id').all() as NodeRow[];
    return rows.map(rowToNode);
  }

  /**
   * Replace the free-form metadata of a node; `null` clears it
   */
  setNodeExtra(id: number, extra: Record<string, unknown> | null): boolean {
    if (!this.stmts.setNodeExtra) {
      this.stmts.setNodeExtra = this.db.prepare('UPDATE node SET extra = ? WHERE id = ?');
    }
    const info = this.stmts.setNodeExtra.run(extra ? JSON.stringify(extra) : null, id);
    return info.changes > 0;
  }

  /**
   * Delete a node. Edges, aliases and paths go with it through foreign keys;
   * the full-text row is removed here.
   */
  deleteNode(id: number): boolean {
    if (!this.stmts.deleteNode) {
      this.stmts.deleteNode = this.db.prepare('DELETE FROM node WHERE id = ?');
    }
    const deleteStmt = this.stmts.deleteNode;

    const changes = this.db.transaction(() => {
      if (this.hasTable(SEARCH_TABLE)) {
        this.db.prepare(`DELETE FROM ${SEARCH_TABLE} WHERE rowid = ?`).run(id);
      }
      return deleteStmt.run(id).changes;
    })();

    return changes > 0;
  }

  // ===========================================================================
  // Edge Operations
  // ===========================================================================

  /**
   * True when `candidateId` is reachable from `ofId` by walking parent
   * edges upward at most `maxDepth` levels.
   */
  isAncestor(candidateId: number, ofId: number, maxDepth: number = this.cycleGuardDepth): boolean {
    if (!this.stmts.isAncestor) {
      this.stmts.isAncestor = this.db.prepare(`
        WITH RECURSIVE ancestors(id, depth) AS (
          SELECT parent_id, 1 FROM edge WHERE child_id = @ofId
          UNION
          SELECT e.parent_id, a.depth + 1
          FROM edge e
          JOIN ancestors a ON e.child_id = a.id
          WHERE a.depth < @maxDepth
        )
        SELECT 1 AS found FROM ancestors WHERE id = @candidateId LIMIT 1
      `);
    }
    const row = this.stmts.isAncestor.get({ candidateId, ofId, maxDepth }) as
      | { found: number }
      | undefined;
    return row !== undefined;
  }

  /**
   * Add a parent → child edge unless it would break acyclicity.
   *
   * The guard and the insert share one write-locked transaction. A failing
   * guard query rejects the edge as a cycle.
   */
  addEdge(parentId: number, childId: number): AddEdgeResult {
    const result = (status: AddEdgeStatus): AddEdgeResult => ({ status, parentId, childId });

    if (parentId === childId) {
      return result('self_loop');
    }

    if (!this.stmts.insertEdge) {
      this.stmts.insertEdge = this.db.prepare(
        'INSERT OR IGNORE INTO edge (parent_id, child_id) VALUES (?, ?)'
      );
    }
    const insertEdge = this.stmts.insertEdge;

    return this.db.transaction((): AddEdgeResult => {
      if (!this.nodeExists(parentId) || !this.nodeExists(childId)) {
        return result('missing_node');
      }

      let closesCycle: boolean;
      try {
        closesCycle = this.isAncestor(childId, parentId, this.cycleGuardDepth);
      } catch (error) {
        logWarn('Cycle guard failed, rejecting edge', {
          parentId,
          childId,
          error: error instanceof Error ? error.message : String(error),
        });
        closesCycle = true;
      }
      if (closesCycle) {
        return result('cycle');
      }

      const info = insertEdge.run(parentId, childId);
      return result(info.changes > 0 ? 'added' : 'duplicate');
    }).immediate();
  }

  /**
   * Remove an edge. Returns false when it did not exist.
   */
  removeEdge(parentId: number, childId: number): boolean {
    if (!this.stmts.deleteEdge) {
      this.stmts.deleteEdge = this.db.prepare(
        'DELETE FROM edge WHERE parent_id = ? AND child_id = ?'
      );
    }
    return this.stmts.deleteEdge.run(parentId, childId).changes > 0;
  }

  getAllEdges(): TagEdge[] {
    const rows = this.db
      .prepare('SELECT parent_id, child_id FROM edge ORDER BY parent_id, child_id')
      .all() as EdgeRow[];
    return rows.map(rowToEdge);
  }

  // ===========================================================================
  // Neighbourhood Queries
  // ===========================================================================

  getChildren(id: number): TagNode[] {
    if (!this.stmts.getChildren) {
      this.stmts.getChildren = this.db.prepare(`
        SELECT n.* FROM edge e
        JOIN node n ON n.id = e.child_id
        WHERE e.parent_id = ?
        ORDER BY n.text, n.id
      `);
    }
    return (this.stmts.getChildren.all(id) as NodeRow[]).map(rowToNode);
  }

  getParents(id: number): TagNode[] {
    if (!this.stmts.getParents) {
      this.stmts.getParents = this.db.prepare(`
        SELECT n.* FROM edge e
        JOIN node n ON n.id = e.parent_id
        WHERE e.child_id = ?
        ORDER BY n.text, n.id
      `);
    }
    return (this.stmts.getParents.all(id) as NodeRow[]).map(rowToNode);
  }

  /**
   * Parent ids, ordered by parent text
   */
  getParentIds(id: number): number[] {
    if (!this.stmts.getParentIds) {
      this.stmts.getParentIds = this.db.prepare(`
        SELECT e.parent_id AS id FROM edge e
        JOIN node n ON n.id = e.parent_id
        WHERE e.child_id = ?
        ORDER BY n.text, n.id
      `);
    }
    return (this.stmts.getParentIds.all(id) as Array<{ id: number }>).map((row) => row.id);
  }

  getChildIds(id: number): number[] {
    if (!this.stmts.getChildIds) {
      this.stmts.getChildIds = this.db.prepare('SELECT child_id AS id FROM edge WHERE parent_id = ?');
    }
    return (this.stmts.getChildIds.all(id) as Array<{ id: number }>).map((row) => row.id);
  }

  /**
   * Children of every parent of `id`, without `id` itself
   */
  getSiblings(id: number): TagNode[] {
    if (!this.stmts.getSiblings) {
      this.stmts.getSiblings = this.db.prepare(`
        SELECT n.* FROM node n
        WHERE n.id IN (
          SELECT s.child_id FROM edge p
          JOIN edge s ON s.parent_id = p.parent_id
          WHERE p.child_id = @id
        )
        AND n.id != @id
        ORDER BY n.text, n.id
      `);
    }
    return (this.stmts.getSiblings.all({ id }) as NodeRow[]).map(rowToNode);
  }

  /**
   * Siblings plus cousins (children of grandparents), without `id` itself
   */
  getRelated(id: number, limit: number): TagNode[] {
    if (!this.stmts.getRelated) {
      this.stmts.getRelated = this.db.prepare(`
        SELECT n.* FROM node n
        WHERE n.id IN (
          SELECT s.child_id FROM edge p
          JOIN edge s ON s.parent_id = p.parent_id
          WHERE p.child_id = @id
          UNION
          SELECT c.child_id FROM edge p
          JOIN edge g ON g.child_id = p.parent_id
          JOIN edge c ON c.parent_id = g.parent_id
          WHERE p.child_id = @id
        )
        AND n.id != @id
        ORDER BY n.text, n.id
        LIMIT @limit
      `);
    }
    return (this.stmts.getRelated.all({ id, limit }) as NodeRow[]).map(rowToNode);
  }

  /**
   * Nodes without any parent
   */
  getRoots(limit: number): TagNode[] {
    if (!this.stmts.getRoots) {
      this.stmts.getRoots = this.db.prepare(`
        SELECT n.* FROM node n
        WHERE NOT EXISTS (SELECT 1 FROM edge e WHERE e.child_id = n.id)
        ORDER BY n.text, n.id
        LIMIT ?
      `);
    }
    return (this.stmts.getRoots.all(limit) as NodeRow[]).map(rowToNode);
  }

  getRandomTags(count: number): TagNode[] {
    if (!this.stmts.getRandomTags) {
      this.stmts.getRandomTags = this.db.prepare(
        'SELECT * FROM node WHERE is_tag = 1 ORDER BY random() LIMIT ?'
      );
    }
    return (this.stmts.getRandomTags.all(count) as NodeRow[]).map(rowToNode);
  }

  countChildren(id: number): number {
    if (!this.stmts.countChildren) {
      this.stmts.countChildren = this.db.prepare(
        'SELECT COUNT(*) as count FROM edge WHERE parent_id = ?'
      );
    }
    return (this.stmts.countChildren.get(id) as { count: number }).count;
  }

  // ===========================================================================
  // Alias Operations
  // ===========================================================================

  /**
   * Bind an alternate spelling to a node.
   *
   * Returns true when the alias is bound to this node afterwards; false for
   * an unknown node, an empty alias slug, or a slug owned by another node.
   */
  addAlias(nodeId: number, aliasText: string): boolean {
    const aliasSlug = slugify(aliasText);
    if (!aliasSlug || !this.nodeExists(nodeId)) {
      return false;
    }

    if (!this.stmts.insertAlias) {
      this.stmts.insertAlias = this.db.prepare(
        'INSERT OR IGNORE INTO alias (node_id, alias_slug, alias_text) VALUES (?, ?, ?)'
      );
    }
    if (!this.stmts.getAliasBySlug) {
      this.stmts.getAliasBySlug = this.db.prepare('SELECT * FROM alias WHERE alias_slug = ?');
    }

    this.stmts.insertAlias.run(nodeId, aliasSlug, normalizeText(aliasText));
    const row = this.stmts.getAliasBySlug.get(aliasSlug) as AliasRow | undefined;
    return row?.node_id === nodeId;
  }

  getAliases(nodeId: number): TagAlias[] {
    if (!this.stmts.getAliases) {
      this.stmts.getAliases = this.db.prepare(
        'SELECT * FROM alias WHERE node_id = ? ORDER BY alias_text'
      );
    }
    return (this.stmts.getAliases.all(nodeId) as AliasRow[]).map(rowToAlias);
  }

  // ===========================================================================
  // Path Cache
  // ===========================================================================

  getBestPath(nodeId: number): string | null {
    if (!this.stmts.getBestPath) {
      this.stmts.getBestPath = this.db.prepare(`
        SELECT path_text FROM path
        WHERE node_id = ?
        ORDER BY length(path_text), path_text
        LIMIT 1
      `);
    }
    const row = this.stmts.getBestPath.get(nodeId) as { path_text: string } | undefined;
    return row?.path_text ?? null;
  }

  getAllPaths(nodeId: number): string[] {
    if (!this.stmts.getAllPaths) {
      this.stmts.getAllPaths = this.db.prepare(`
        SELECT path_text FROM path
        WHERE node_id = ?
        ORDER BY length(path_text), path_text
      `);
    }
    return (this.stmts.getAllPaths.all(nodeId) as Array<{ path_text: string }>).map(
      (row) => row.path_text
    );
  }

  /**
   * Replace every cached path. Returns the number of rows written.
   */
  replaceAllPaths(paths: Map<number, string[]>): number {
    if (!this.stmts.insertPath) {
      this.stmts.insertPath = this.db.prepare(
        'INSERT OR IGNORE INTO path (node_id, path_text) VALUES (?, ?)'
      );
    }
    const insertPath = this.stmts.insertPath;

    return this.db.transaction(() => {
      this.db.exec('DELETE FROM path');
      let written = 0;
      for (const [nodeId, texts] of paths) {
        for (const text of texts) {
          written += insertPath.run(nodeId, text).changes;
        }
      }
      return written;
    })();
  }

  // ===========================================================================
  // Search Queries
  // ===========================================================================

  /**
   * Nodes whose slug equals `slug` or whose text equals `text`
   */
  findExact(slug: string, text: string, limit: number): TagNode[] {
    if (!this.stmts.findExact) {
      this.stmts.findExact = this.db.prepare(`
        SELECT * FROM node
        WHERE slug = @slug OR text = @text
        ORDER BY text, id
        LIMIT @limit
      `);
    }
    return (this.stmts.findExact.all({ slug, text, limit }) as NodeRow[]).map(rowToNode);
  }

  /**
   * Nodes whose slug starts with `prefix` (matched literally), by text
   */
  findBySlugPrefix(prefix: string, limit: number): TagNode[] {
    if (!prefix) return [];
    if (!this.stmts.findBySlugPrefix) {
      this.stmts.findBySlugPrefix = this.db.prepare(`
        SELECT * FROM node
        WHERE slug LIKE ? ESCAPE '\\'
        ORDER BY text, id
        LIMIT ?
      `);
    }
    return (this.stmts.findBySlugPrefix.all(`${escapeLike(prefix)}%`, limit) as NodeRow[]).map(
      rowToNode
    );
  }

  /**
   * Full-text match ranked by weighted bm25 (lower is better).
   * Throws on malformed MATCH expressions; callers decide what that means.
   */
  searchFullText(
    matchExpression: string,
    weights: { text: number; aliases: number; pathTokens: number },
    limit: number
  ): Array<{ node: TagNode; rank: number }> {
    const rows = this.db
      .prepare(`
        SELECT n.*, bm25(${SEARCH_TABLE}, ?, ?, ?) AS bm25_score
        FROM ${SEARCH_TABLE}
        JOIN node n ON n.id = ${SEARCH_TABLE}.rowid
        WHERE ${SEARCH_TABLE} MATCH ?
        ORDER BY bm25_score, n.text
        LIMIT ?
      `)
      .all(weights.text, weights.aliases, weights.pathTokens, matchExpression, limit) as Array<
      NodeRow & { bm25_score: number }
    >;
    return rows.map((row) => ({ node: rowToNode(row), rank: row.bm25_score }));
  }

  /**
   * Create the full-text table when missing and refill it from nodes,
   * aliases and cached paths. Returns the number of rows indexed.
   */
  rebuildSearchTable(): number {
    return this.db.transaction(() => {
      this.db.exec(
        `CREATE VIRTUAL TABLE IF NOT EXISTS ${SEARCH_TABLE} USING fts5(text, aliases, path_tokens)`
      );
      this.db.exec(`DELETE FROM ${SEARCH_TABLE}`);
      this.db
        .prepare(`
          INSERT INTO ${SEARCH_TABLE} (rowid, text, aliases, path_tokens)
          SELECT
            n.id,
            n.text,
            COALESCE((SELECT GROUP_CONCAT(a.alias_text, ' ') FROM alias a WHERE a.node_id = n.id), ''),
            COALESCE((SELECT GROUP_CONCAT(p.path_text, ' ') FROM path p WHERE p.node_id = n.id), '')
          FROM node n
        `)
        .run();
      return (
        this.db.prepare(`SELECT COUNT(*) as count FROM ${SEARCH_TABLE}`).get() as { count: number }
      ).count;
    })();
  }

  // ===========================================================================
  // Meta
  // ===========================================================================

  setMeta(key: string, value: string): void {
    if (!this.stmts.upsertMeta) {
      this.stmts.upsertMeta = this.db.prepare(`
        INSERT INTO meta (key, value, updated_at)
        VALUES (@key, @value, @updatedAt)
        ON CONFLICT(key) DO UPDATE SET
          value = excluded.value,
          updated_at = excluded.updated_at
      `);
    }
    this.stmts.upsertMeta.run({ key, value, updatedAt: Date.now() });
  }

  getMeta(key: string): string | undefined {
    if (!this.stmts.getMeta) {
      this.stmts.getMeta = this.db.prepare('SELECT key, value, updated_at FROM meta WHERE key = ?');
    }
    const row = this.stmts.getMeta.get(key) as MetaRow | undefined;
    return row?.value;
  }

  deleteMeta(keys: string[]): void {
    const remove = this.db.prepare('DELETE FROM meta WHERE key = ?');
    for (const key of keys) {
      remove.run(key);
    }
  }

  // ===========================================================================
  // Statistics
  // ===========================================================================

  /**
   * Table-existence probe
   */
  hasTable(name: string): boolean {
    if (!this.stmts.hasTable) {
      this.stmts.hasTable = this.db.prepare(
        "SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?"
      );
    }
    return this.stmts.hasTable.get(name) !== undefined;
  }

  countNodes(): number {
    return (this.db.prepare('SELECT COUNT(*) as count FROM node').get() as { count: number }).count;
  }

  getStats(): GraphStats {
    const count = (table: string, where = ''): number =>
      (this.db.prepare(`SELECT COUNT(*) as count FROM ${table} ${where}`).get() as { count: number })
        .count;

    const importedAtRaw = this.getMeta('tags_imported_at');
    const source = this.getMeta('tags_import_source');

    return {
      nodeCount: count('node'),
      edgeCount: count('edge'),
      tagCount: count('node', 'WHERE is_tag = 1'),
      aliasCount: count('alias'),
      pathCount: count('path'),
      searchIndexed: this.hasTable(SEARCH_TABLE),
      importProvenance: {
        imported: this.getMeta('tags_imported') === 'true',
        importedAt: importedAtRaw ? Number(importedAtRaw) : undefined,
        source: source || undefined,
      },
    };
  }

  /**
   * Delete every node, edge, alias, path and full-text row.
   * Meta entries are left to the caller.
   */
  clear(): void {
    this.db.transaction(() => {
      if (this.hasTable(SEARCH_TABLE)) {
        this.db.exec(`DELETE FROM ${SEARCH_TABLE}`);
      }
      this.db.exec('DELETE FROM path');
      this.db.exec('DELETE FROM alias');
      this.db.exec('DELETE FROM edge');
      this.db.exec('DELETE FROM node');
    })();
  }
}
