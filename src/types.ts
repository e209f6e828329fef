/**
 * Core type definitions for the tag graph
 */

// =============================================================================
// Graph Records
// =============================================================================

/**
 * A category or tag in the graph.
 *
 * A node can be both: `isTag` marks it as selectable, while edges to
 * children make it a category.
 */
export interface TagNode {
  /** Assigned on creation, never changes */
  id: number;

  /** Canonical lowercase token, unique across the graph */
  slug: string;

  /** Display label (lowercase) */
  text: string;

  /** Whether the node may be used as a final, selectable tag */
  isTag: boolean;

  /** Free-form metadata attached by collaborators */
  extra?: Record<string, unknown>;
}

/**
 * Directed parent → child relation
 */
export interface TagEdge {
  parentId: number;
  childId: number;
}

/**
 * Alternate spelling bound to one node
 */
export interface TagAlias {
  nodeId: number;
  aliasSlug: string;
  aliasText: string;
}

/**
 * Cached root-to-node path string
 */
export interface PathRecord {
  nodeId: number;
  pathText: string;
}

/**
 * Outcome of a guarded edge insertion.
 *
 * Anything other than `added` and `duplicate` means the graph was left
 * untouched.
 */
export type AddEdgeStatus = 'added' | 'duplicate' | 'self_loop' | 'cycle' | 'missing_node';

export interface AddEdgeResult {
  status: AddEdgeStatus;
  parentId: number;
  childId: number;
}

// =============================================================================
// Search
// =============================================================================

/**
 * Retrieval strategy that produced a search hit
 */
export type SearchStrategy = 'exact' | 'prefix' | 'fts';

/**
 * A ranked search hit
 */
export interface SearchResult {
  node: TagNode;
  score: number;
  strategy: SearchStrategy;
  /** Shortest cached path for display, if the path index has one */
  bestPath: string | null;
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Graph statistics
 */
export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  tagCount: number;
  aliasCount: number;
  pathCount: number;
  searchIndexed: boolean;
  importProvenance: {
    imported: boolean;
    importedAt?: number;
    source?: string;
  };
}

export interface PathIndexStats {
  nodesIndexed: number;
  pathsWritten: number;
}

// =============================================================================
// Import
// =============================================================================

export type ImportPhase =
  | 'reading'
  | 'collecting'
  | 'ingesting'
  | 'indexing-paths'
  | 'indexing-search'
  | 'done';

export interface ImportProgress {
  phase: ImportPhase;
  current: number;
  total: number;
  detail?: string;
}

export interface ImportOptions {
  onProgress?: (progress: ImportProgress) => void;
}

export interface ImportResult {
  /** True when the import marker was already set and nothing was written */
  skipped: boolean;
  sourcePath?: string;
  rowsRead: number;
  nodesCreated: number;
  edgesAdded: number;
  selfLoopsSkipped: number;
  cyclesRejected: number;
  /** Category slugs rewritten with a parent-path prefix */
  disambiguatedSlugs: number;
  pathsWritten: number;
  searchRowsIndexed: number;
}

// =============================================================================
// Lookup Paths
// =============================================================================

/**
 * A label path declared by an external consumer, e.g. a UI panel that
 * lists the tags found under `body / hair`.
 */
export interface LookupPathEntry {
  key: string;
  path: string[];
}

export type LookupIssueSeverity = 'error' | 'warning';

export interface LookupIssue {
  key: string;
  severity: LookupIssueSeverity;
  message: string;
}

export interface LookupValidationReport {
  valid: boolean;
  checked: number;
  issues: LookupIssue[];
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Engine configuration
 */
export interface TagGraphConfig {
  /** Ancestor levels walked by the cycle guard before an edge insert */
  cycleGuardDepth: number;

  /** Maximum ascents for breadcrumbs and cached paths */
  maxBreadcrumbDepth: number;

  /** Descent bound for subtrees when the caller gives none */
  defaultSubtreeDepth: number;

  /** Cached paths kept per node by the path index rebuild */
  maxPathsPerNode: number;

  /** Separator between labels in cached paths */
  pathSeparator: string;

  rootsLimit: number;
  typeaheadLimit: number;
  searchLimit: number;
  relatedLimit: number;
  randomTagCount: number;

  /** BM25 column weights for the full-text strategy */
  ftsWeights: {
    text: number;
    aliases: number;
    pathTokens: number;
  };
}

/**
 * Programmatic overrides; nested weights may be given partially
 */
export type TagGraphConfigOverrides = Partial<Omit<TagGraphConfig, 'ftsWeights'>> & {
  ftsWeights?: Partial<TagGraphConfig['ftsWeights']>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: TagGraphConfig = {
  cycleGuardDepth: 20,
  maxBreadcrumbDepth: 50,
  defaultSubtreeDepth: 50,
  maxPathsPerNode: 8,
  pathSeparator: '/',
  rootsLimit: 200,
  typeaheadLimit: 20,
  searchLimit: 50,
  relatedLimit: 40,
  randomTagCount: 10,
  ftsWeights: {
    text: 10,
    aliases: 5,
    pathTokens: 1,
  },
};

/**
 * Schema version record
 */
export interface SchemaVersion {
  version: number;
  appliedAt: number;
  description?: string;
}
