/**
 * Lookup Path Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { TagGraph } from '../src';
import { labelsMatch } from '../src/lookup';
import { setLogger, silentLogger, defaultLogger } from '../src/errors';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'taggraph-lookup-'));
}

function cleanupTempDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe('labelsMatch', () => {
  it('should ignore case, padding and space/underscore differences', () => {
    expect(labelsMatch('body type', 'Body_Type')).toBe(true);
    expect(labelsMatch('hair', '  HAIR ')).toBe(true);
    expect(labelsMatch('body type', 'body-type')).toBe(false);
  });
});

describe('Lookup Paths', () => {
  let tempDir: string;
  let graph: TagGraph;

  beforeEach(() => {
    tempDir = createTempDir();
    setLogger(silentLogger);
    graph = TagGraph.open(path.join(tempDir, 'tags.db'));
    graph.importRows([
      ['body', 'hair', 'long_hair'],
      ['body', 'hair', 'short_hair'],
      ['hair'],
      ['body', 'body type', 'slim'],
    ]);
  });

  afterEach(() => {
    graph.close();
    setLogger(defaultLogger);
    vi.restoreAllMocks();
    cleanupTempDir(tempDir);
  });

  describe('resolveLookupPath', () => {
    it('should walk children below the first label', () => {
      expect(graph.resolveLookupPath(['body', 'hair'])?.slug).toBe('body_hair');
    });

    it('should prefer the candidate with children', () => {
      expect(graph.resolveLookupPath(['hair'])?.slug).toBe('body_hair');
    });

    it('should match labels loosely', () => {
      expect(graph.resolveLookupPath(['Body', 'Body_Type'])?.slug).toBe('body_type');
    });

    it('should return null for unknown labels', () => {
      expect(graph.resolveLookupPath(['body', 'eyes'])).toBeNull();
      expect(graph.resolveLookupPath(['nothing'])).toBeNull();
    });
  });

  describe('lookupTags', () => {
    it('should list the tags under the resolved node', () => {
      expect(graph.lookupTags(['body', 'hair']).map((n) => n.slug)).toEqual([
        'long_hair',
        'short_hair',
      ]);
      expect(graph.lookupTags(['Body', 'Body_Type']).map((n) => n.slug)).toEqual(['slim']);
    });

    it('should skip category children', () => {
      expect(graph.lookupTags(['body'])).toEqual([]);
    });

    it('should return nothing for empty or unresolved paths', () => {
      expect(graph.lookupTags([])).toEqual([]);
      expect(graph.lookupTags(['nothing'])).toEqual([]);
    });
  });

  describe('validateLookupPaths', () => {
    it('should report every problem at once', () => {
      const report = graph.validateLookupPaths([
        { key: 'hair', path: ['body', 'hair'] },
        { key: 'hair', path: ['hair'] },
        { key: 'empty', path: [] },
        { key: 'ghost', path: ['nothing'] },
      ]);

      expect(report).toEqual({
        valid: false,
        checked: 4,
        issues: [
          { key: 'hair', severity: 'error', message: 'Duplicate key: hair' },
          { key: 'empty', severity: 'error', message: 'Empty path for empty' },
          { key: 'ghost', severity: 'warning', message: 'Path returned zero results: nothing' },
        ],
      });
    });

    it('should stay valid with warnings only', () => {
      const report = graph.validateLookupPaths([
        { key: 'hair', path: ['body', 'hair'] },
        { key: 'ghost', path: ['body', 'eyes'] },
      ]);

      expect(report.valid).toBe(true);
      expect(report.issues.map((issue) => issue.severity)).toEqual(['warning']);
    });

    it('should report lookups that throw', () => {
      vi.spyOn(graph.getQueries(), 'getChildren').mockImplementation(() => {
        throw new Error('boom');
      });

      const report = graph.validateLookupPaths([{ key: 'hair', path: ['body', 'hair'] }]);

      expect(report.valid).toBe(false);
      expect(report.issues).toEqual([
        { key: 'hair', severity: 'error', message: 'Lookup failed for body/hair: boom' },
      ]);
    });
  });
});
