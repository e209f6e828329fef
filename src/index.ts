/**
 * TagGraph
 *
 * A local engine for a directed acyclic graph of categories and tags:
 * hierarchical navigation, ranked search and bulk CSV import.
 */

import * as path from 'path';
import {
  TagGraphConfig,
  TagGraphConfigOverrides,
  TagNode,
  TagAlias,
  AddEdgeResult,
  SearchResult,
  GraphStats,
  PathIndexStats,
  ImportOptions,
  ImportResult,
  LookupPathEntry,
  LookupValidationReport,
} from './types';
import { DatabaseConnection } from './db';
import { QueryBuilder } from './db/queries';
import { loadConfig, resolveConfig, getConfigPath } from './config';
import { GraphTraverser } from './graph';
import { PathIndex } from './paths';
import { TagSearcher } from './search';
import { TagImporter } from './import';
import { LookupResolver } from './lookup';

// Re-export types for consumers
export * from './types';
export { DATABASE_FILENAME } from './db';
export { getConfigPath, loadConfig, saveConfig, resolveConfig, validateConfig, CONFIG_FILENAME } from './config';
export { slugify, normalizeText } from './slug';
export { parseCsv, parseCsvLine } from './import';
export {
  TagGraphError,
  DatabaseError,
  ImportError,
  ConfigError,
  ValidationError,
  setLogger,
  getLogger,
  silentLogger,
  defaultLogger,
} from './errors';
export type { Logger, LogContext } from './errors';

/**
 * Options for opening a tag graph database
 */
export interface OpenOptions {
  /** Programmatic overrides, applied over the configuration file */
  config?: TagGraphConfigOverrides;

  /** Configuration file to read instead of taggraph.json beside the database */
  configPath?: string;
}

/**
 * Main TagGraph class
 *
 * Every operation is synchronous and runs on one persistent connection.
 */
export class TagGraph {
  private db: DatabaseConnection;
  private queries: QueryBuilder;
  private config: TagGraphConfig;
  private traverser: GraphTraverser;
  private pathIndex: PathIndex;
  private searcher: TagSearcher;
  private importer: TagImporter;
  private lookup: LookupResolver;

  private constructor(db: DatabaseConnection, config: TagGraphConfig) {
    this.db = db;
    this.config = config;
    this.queries = new QueryBuilder(db.getDb(), config.cycleGuardDepth);
    this.traverser = new GraphTraverser(this.queries, config);
    this.pathIndex = new PathIndex(this.queries, config);
    this.searcher = new TagSearcher(this.queries, config);
    this.importer = new TagImporter(db, this.queries, config);
    this.lookup = new LookupResolver(this.queries, this.searcher);
  }

  // ===========================================================================
  // Lifecycle Methods
  // ===========================================================================

  /**
   * Open the database at `dbPath`, creating it when missing
   */
  static open(dbPath: string, options: OpenOptions = {}): TagGraph {
    const resolvedPath = path.resolve(dbPath);
    const fileConfig = loadConfig(options.configPath ?? getConfigPath(resolvedPath));
    const config = resolveConfig(options.config, fileConfig);
    return new TagGraph(DatabaseConnection.openOrCreate(resolvedPath), config);
  }

  /**
   * Host startup hook: import the CSV once, then close
   */
  static importIfNeeded(
    dbPath: string,
    sourcePath: string,
    options: OpenOptions & ImportOptions = {}
  ): ImportResult {
    const graph = TagGraph.open(dbPath, options);
    try {
      return graph.importIfNeeded(sourcePath, options);
    } finally {
      graph.close();
    }
  }

  /**
   * Wipe the graph and import the CSV again, then close
   */
  static forceReimport(
    dbPath: string,
    sourcePath: string,
    options: OpenOptions & ImportOptions = {}
  ): ImportResult {
    const graph = TagGraph.open(dbPath, options);
    try {
      return graph.forceReimport(sourcePath, options);
    } finally {
      graph.close();
    }
  }

  close(): void {
    this.db.close();
  }

  getConfig(): TagGraphConfig {
    return { ...this.config, ftsWeights: { ...this.config.ftsWeights } };
  }

  getDatabase(): DatabaseConnection {
    return this.db;
  }

  getQueries(): QueryBuilder {
    return this.queries;
  }

  // ===========================================================================
  // Nodes, Edges and Aliases
  // ===========================================================================

  getNodeById(id: number): TagNode | null {
    return this.queries.getNodeById(id);
  }

  getNodeBySlug(slug: string): TagNode | null {
    return this.queries.getNodeBySlug(slug);
  }

  upsertNode(text: string, isTag: boolean): TagNode {
    return this.queries.upsertNode(text, isTag);
  }

  setNodeExtra(id: number, extra: Record<string, unknown> | null): boolean {
    return this.queries.setNodeExtra(id, extra);
  }

  /**
   * Administrative delete; edges, aliases, paths and the search row go too
   */
  deleteNode(id: number): boolean {
    return this.queries.deleteNode(id);
  }

  addEdge(parentId: number, childId: number): AddEdgeResult {
    return this.queries.addEdge(parentId, childId);
  }

  removeEdge(parentId: number, childId: number): boolean {
    return this.queries.removeEdge(parentId, childId);
  }

  addAlias(nodeId: number, aliasText: string): boolean {
    return this.queries.addAlias(nodeId, aliasText);
  }

  getAliases(nodeId: number): TagAlias[] {
    return this.queries.getAliases(nodeId);
  }

  // ===========================================================================
  // Traversal
  // ===========================================================================

  getRoots(limit?: number): TagNode[] {
    return this.traverser.getRoots(limit);
  }

  getChildren(id: number): TagNode[] {
    return this.traverser.getChildren(id);
  }

  getParents(id: number): TagNode[] {
    return this.traverser.getParents(id);
  }

  getSiblings(id: number): TagNode[] {
    return this.traverser.getSiblings(id);
  }

  getBreadcrumb(id: number): TagNode[] {
    return this.traverser.getBreadcrumb(id);
  }

  getSubtree(id: number, maxDepth?: number): TagNode[] {
    return this.traverser.getSubtree(id, maxDepth);
  }

  getRelatedSimple(id: number, limit?: number): TagNode[] {
    return this.traverser.getRelatedSimple(id, limit);
  }

  getRandomTags(count?: number): TagNode[] {
    return this.traverser.getRandomTags(count);
  }

  // ===========================================================================
  // Paths and Search
  // ===========================================================================

  getBestPath(id: number): string | null {
    return this.pathIndex.getBestPath(id);
  }

  getAllPaths(id: number): string[] {
    return this.pathIndex.getAllPaths(id);
  }

  rebuildPathIndex(): PathIndexStats {
    return this.pathIndex.rebuild();
  }

  typeahead(prefix: string, limit?: number): TagNode[] {
    return this.searcher.typeahead(prefix, limit);
  }

  search(query: string, limit?: number): SearchResult[] {
    return this.searcher.search(query, limit);
  }

  rebuildSearchIndex(): number {
    return this.searcher.rebuildIndex();
  }

  // ===========================================================================
  // Import
  // ===========================================================================

  importIfNeeded(sourcePath: string, options?: ImportOptions): ImportResult {
    return this.importer.importIfNeeded(sourcePath, options);
  }

  /**
   * Destructive: all nodes, edges, aliases, paths and the search index are
   * deleted before the import runs.
   */
  forceReimport(sourcePath: string, options?: ImportOptions): ImportResult {
    return this.importer.forceReimport(sourcePath, options);
  }

  importRows(rows: string[][], options?: ImportOptions): ImportResult {
    return this.importer.importRows(rows, options);
  }

  // ===========================================================================
  // Lookup Paths
  // ===========================================================================

  resolveLookupPath(labels: string[]): TagNode | null {
    return this.lookup.resolve(labels);
  }

  lookupTags(labels: string[]): TagNode[] {
    return this.lookup.lookupTags(labels);
  }

  validateLookupPaths(entries: LookupPathEntry[]): LookupValidationReport {
    return this.lookup.validate(entries);
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  getStats(): GraphStats {
    return this.queries.getStats();
  }

  hasTable(name: string): boolean {
    return this.queries.hasTable(name);
  }

  optimize(): void {
    this.db.optimize();
  }
}

export default TagGraph;
