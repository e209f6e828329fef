/**
 * Bulk Importer
 *
 * Two-pass ingestion of hierarchical rows (category, ..., category, tag).
 *
 * Pass 1 collects every tag slug and, per category slug, the distinct
 * category paths it appears under. Pass 2 replays the rows: a category
 * whose slug is also a tag, or that appears under more than one path, is
 * stored under a slug prefixed with the slugs of its ancestors in the row.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ImportOptions, ImportProgress, ImportResult, TagGraphConfig, DEFAULT_CONFIG } from '../types';
import { DatabaseConnection } from '../db';
import { QueryBuilder } from '../db/queries';
import { PathIndex } from '../paths';
import { TagSearcher } from '../search';
import { slugify } from '../slug';
import { ImportError, logInfo, logWarn } from '../errors';
import { parseCsv } from './csv';

export { parseCsv, parseCsvLine } from './csv';

/**
 * Meta keys written by the importer
 */
export const IMPORT_MARKER_KEY = 'tags_imported';
export const IMPORTED_AT_KEY = 'tags_imported_at';
export const IMPORT_SOURCE_KEY = 'tags_import_source';

const PROGRESS_INTERVAL = 500;

interface CollectedRows {
  tagSlugs: Set<string>;
  categoryPaths: Map<string, Set<string>>;
}

interface IngestCounts {
  edgesAdded: number;
  selfLoopsSkipped: number;
  cyclesRejected: number;
  disambiguatedSlugs: number;
}

/**
 * Drop segments that produce no slug, then rows left empty
 */
function cleanRows(rows: string[][]): string[][] {
  const cleaned: string[][] = [];
  for (const row of rows) {
    const segments = row
      .map((segment) => segment.trim().toLowerCase())
      .filter((segment) => slugify(segment).length > 0);
    if (segments.length > 0) {
      cleaned.push(segments);
    }
  }
  return cleaned;
}

/**
 * Pass 1
 */
export function collectRows(rows: string[][]): CollectedRows {
  const tagSlugs = new Set<string>();
  const categoryPaths = new Map<string, Set<string>>();

  for (const row of rows) {
    const last = row[row.length - 1];
    if (last !== undefined) {
      tagSlugs.add(slugify(last));
    }

    for (let i = 0; i < row.length - 1; i++) {
      const segment = row[i];
      if (segment === undefined) continue;
      const slug = slugify(segment);
      const fullPath = row.slice(0, i + 1).join('/');
      const paths = categoryPaths.get(slug) ?? new Set<string>();
      paths.add(fullPath);
      categoryPaths.set(slug, paths);
    }
  }

  return { tagSlugs, categoryPaths };
}

/**
 * Slug under which segment `index` of `row` is stored
 */
export function effectiveSlug(row: string[], index: number, collected: CollectedRows): string {
  const segment = row[index] ?? '';
  const baseSlug = slugify(segment);
  if (index === row.length - 1) {
    return baseSlug;
  }

  const conflictsWithTag = collected.tagSlugs.has(baseSlug);
  const conflictsWithCategory = (collected.categoryPaths.get(baseSlug)?.size ?? 0) > 1;
  if (!conflictsWithTag && !conflictsWithCategory) {
    return baseSlug;
  }

  const parentPath = row.slice(0, index).map(slugify).join('_');
  return parentPath ? `${parentPath}_${baseSlug}` : baseSlug;
}

function emptyResult(sourcePath?: string): ImportResult {
  return {
    skipped: false,
    sourcePath,
    rowsRead: 0,
    nodesCreated: 0,
    edgesAdded: 0,
    selfLoopsSkipped: 0,
    cyclesRejected: 0,
    disambiguatedSlugs: 0,
    pathsWritten: 0,
    searchRowsIndexed: 0,
  };
}

export class TagImporter {
  private connection: DatabaseConnection;
  private queries: QueryBuilder;
  private pathIndex: PathIndex;
  private searcher: TagSearcher;

  constructor(
    connection: DatabaseConnection,
    queries: QueryBuilder,
    config: TagGraphConfig = DEFAULT_CONFIG
  ) {
    this.connection = connection;
    this.queries = queries;
    this.pathIndex = new PathIndex(queries, config);
    this.searcher = new TagSearcher(queries, config);
  }

  isImported(): boolean {
    return this.queries.getMeta(IMPORT_MARKER_KEY) === 'true';
  }

  /**
   * Import the CSV file unless the import marker is already set
   */
  importIfNeeded(sourcePath: string, options: ImportOptions = {}): ImportResult {
    const { onProgress } = options;
    const resolvedPath = path.resolve(sourcePath);

    if (this.isImported()) {
      logInfo('Tags already imported, skipping', { sourcePath: resolvedPath });
      return { ...emptyResult(resolvedPath), skipped: true };
    }

    const rows = this.readSource(resolvedPath, onProgress);
    const collected = this.collect(rows, onProgress);
    const nodesBefore = this.queries.countNodes();

    // The marker is checked again under the write lock so two processes
    // importing at once cannot both ingest.
    const counts = this.connection.immediateTransaction((): IngestCounts | null => {
      if (this.isImported()) {
        return null;
      }
      const ingested = this.ingest(rows, collected, onProgress);
      this.queries.setMeta(IMPORT_MARKER_KEY, 'true');
      this.queries.setMeta(IMPORTED_AT_KEY, String(Date.now()));
      this.queries.setMeta(IMPORT_SOURCE_KEY, resolvedPath);
      return ingested;
    });

    if (!counts) {
      logInfo('Tags imported by another writer, skipping', { sourcePath: resolvedPath });
      return { ...emptyResult(resolvedPath), skipped: true };
    }

    const result = this.finish(rows.length, nodesBefore, counts, onProgress);
    logInfo('Tag import complete', {
      sourcePath: resolvedPath,
      nodesCreated: result.nodesCreated,
      edgesAdded: result.edgesAdded,
    });
    return { ...result, sourcePath: resolvedPath };
  }

  /**
   * Wipe all graph data and the import marker, then import again.
   * The wipe is committed on its own and is not undone if the import fails.
   */
  forceReimport(sourcePath: string, options: ImportOptions = {}): ImportResult {
    const resolvedPath = path.resolve(sourcePath);
    if (!fs.existsSync(resolvedPath)) {
      throw new ImportError(`Import source not found: ${resolvedPath}`, resolvedPath);
    }

    this.connection.immediateTransaction(() => {
      this.queries.clear();
      this.queries.deleteMeta([IMPORT_MARKER_KEY, IMPORTED_AT_KEY, IMPORT_SOURCE_KEY]);
    });
    logInfo('Tag graph cleared for reimport', { sourcePath: resolvedPath });

    return this.importIfNeeded(resolvedPath, options);
  }

  /**
   * Run the two-pass ingestion on in-memory rows. The import marker is
   * neither checked nor set.
   */
  importRows(rows: string[][], options: ImportOptions = {}): ImportResult {
    const { onProgress } = options;
    const cleaned = cleanRows(rows);
    const collected = this.collect(cleaned, onProgress);
    const nodesBefore = this.queries.countNodes();

    const counts = this.connection.immediateTransaction(() =>
      this.ingest(cleaned, collected, onProgress)
    );

    return this.finish(cleaned.length, nodesBefore, counts, onProgress);
  }

  private readSource(sourcePath: string, onProgress?: (progress: ImportProgress) => void): string[][] {
    onProgress?.({ phase: 'reading', current: 0, total: 1, detail: sourcePath });
    if (!fs.existsSync(sourcePath)) {
      throw new ImportError(`Import source not found: ${sourcePath}`, sourcePath);
    }

    let content: string;
    try {
      content = fs.readFileSync(sourcePath, 'utf-8');
    } catch (error) {
      throw new ImportError(`Cannot read import source: ${sourcePath}`, sourcePath, error);
    }

    const rows = cleanRows(parseCsv(content));
    onProgress?.({ phase: 'reading', current: 1, total: 1, detail: `Read ${rows.length} rows` });
    return rows;
  }

  private collect(rows: string[][], onProgress?: (progress: ImportProgress) => void): CollectedRows {
    onProgress?.({ phase: 'collecting', current: 0, total: rows.length });
    const collected = collectRows(rows);
    onProgress?.({ phase: 'collecting', current: rows.length, total: rows.length });
    return collected;
  }

  /**
   * Pass 2. Runs inside the caller's transaction.
   */
  private ingest(
    rows: string[][],
    collected: CollectedRows,
    onProgress?: (progress: ImportProgress) => void
  ): IngestCounts {
    const counts: IngestCounts = {
      edgesAdded: 0,
      selfLoopsSkipped: 0,
      cyclesRejected: 0,
      disambiguatedSlugs: 0,
    };
    const disambiguated = new Set<string>();

    rows.forEach((row, rowIndex) => {
      let previousId: number | null = null;

      row.forEach((segment, i) => {
        const isTag = i === row.length - 1;
        const slug = effectiveSlug(row, i, collected);
        if (slug !== slugify(segment)) {
          disambiguated.add(slug);
        }

        const node = this.queries.upsertNodeWithSlug(slug, segment, isTag);

        if (previousId !== null) {
          if (previousId === node.id) {
            counts.selfLoopsSkipped++;
            logWarn('Skipped self-loop during import', { slug, row: rowIndex + 1 });
          } else {
            const { status } = this.queries.addEdge(previousId, node.id);
            if (status === 'added') {
              counts.edgesAdded++;
            } else if (status === 'cycle') {
              counts.cyclesRejected++;
              logWarn('Rejected edge that would close a cycle', {
                parentId: previousId,
                childId: node.id,
                row: rowIndex + 1,
              });
            }
          }
        }

        previousId = node.id;
      });

      if ((rowIndex + 1) % PROGRESS_INTERVAL === 0 || rowIndex + 1 === rows.length) {
        onProgress?.({ phase: 'ingesting', current: rowIndex + 1, total: rows.length });
      }
    });

    counts.disambiguatedSlugs = disambiguated.size;
    return counts;
  }

  /**
   * Rebuild the derived caches: paths first, since the search index reads them
   */
  private finish(
    rowsRead: number,
    nodesBefore: number,
    counts: IngestCounts,
    onProgress?: (progress: ImportProgress) => void
  ): ImportResult {
    onProgress?.({ phase: 'indexing-paths', current: 0, total: 1 });
    const { pathsWritten } = this.pathIndex.rebuild();
    onProgress?.({ phase: 'indexing-paths', current: 1, total: 1, detail: `${pathsWritten} paths` });

    onProgress?.({ phase: 'indexing-search', current: 0, total: 1 });
    const searchRowsIndexed = this.searcher.rebuildIndex();
    onProgress?.({ phase: 'indexing-search', current: 1, total: 1, detail: `${searchRowsIndexed} rows` });

    onProgress?.({ phase: 'done', current: 1, total: 1 });

    return {
      ...emptyResult(),
      ...counts,
      rowsRead,
      nodesCreated: this.queries.countNodes() - nodesBefore,
      pathsWritten,
      searchRowsIndexed,
    };
  }
}
