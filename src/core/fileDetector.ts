/**
 * @fileOverview: Detects file references in query text and resolves them against the indexed file catalog
 * @module: FileDetector
 * @keyFunctions:
 *   - FileCatalog: Case-insensitive path and basename lookup over one index generation
 *   - detectFileReferences(): Token scan, line-number capture and confidence assignment
 * @context: Confidence strictly decreases with specificity: exact path > unique filename > ambiguous > partial > unresolved
 */

import * as path from 'path';
import { REFERENCE_CONFIDENCE } from '../shared/constants';
import type { FileReference, ReferenceMatch } from '../shared/types';
import { isKnownExtension } from '../local/languages';

const TOKEN_PATTERN = /[A-Za-z0-9_./\\-]+(?::\d+)?/g;
const FILE_TOKEN = /^(?:[\w.-]+\/)*[\w-][\w.-]*\.[A-Za-z][A-Za-z0-9]{0,9}$/;
const LINE_AFTER = /^["'`]?\s*,?\s*(?:on\s+|at\s+)?line\s+(\d+)/i;
const LINE_BEFORE = /\bline\s+(\d+)\s+(?:of|in)\s+["'`]?$/i;
const MAX_PARTIAL_MATCHES = 5;

/**
 * Immutable lookup over the indexed paths of one index generation
 */
export class FileCatalog {
  private readonly byPath = new Map<string, string>();
  private readonly byBasename = new Map<string, string[]>();
  readonly paths: readonly string[];

  constructor(paths: Iterable<string>) {
    const sorted = Array.from(new Set(paths)).sort();
    this.paths = sorted;
    for (const filePath of sorted) {
      const lower = filePath.toLowerCase();
      this.byPath.set(lower, filePath);
      const base = path.posix.basename(lower);
      const bucket = this.byBasename.get(base);
      if (bucket) {
        bucket.push(filePath);
      } else {
        this.byBasename.set(base, [filePath]);
      }
    }
  }

  static empty(): FileCatalog {
    return new FileCatalog([]);
  }

  get size(): number {
    return this.paths.length;
  }

  exact(token: string): string | undefined {
    return this.byPath.get(token.toLowerCase());
  }

  withBasename(basename: string): readonly string[] {
    return this.byBasename.get(basename.toLowerCase()) ?? [];
  }

  withSuffix(suffix: string): string[] {
    const needle = '/' + suffix.toLowerCase();
    return this.paths.filter(p => p.toLowerCase().endsWith(needle));
  }

  containing(fragment: string): string[] {
    const needle = fragment.toLowerCase();
    return this.paths.filter(p => path.posix.basename(p.toLowerCase()).includes(needle));
  }
}

interface RawToken {
  text: string;
  lineNumber?: number;
}

function cleanToken(raw: string): RawToken | null {
  let text = raw;
  let lineNumber: number | undefined;

  const lineMatch = /^(.*):(\d+)$/.exec(text);
  if (lineMatch) {
    text = lineMatch[1];
    lineNumber = Number(lineMatch[2]);
  }

  text = text.replace(/\\/g, '/').replace(/^\.\//, '').replace(/[.,;:!?]+$/, '');
  if (!FILE_TOKEN.test(text)) {
    return null;
  }
  return { text, lineNumber };
}

function referencesFor(
  token: string,
  catalog: FileCatalog
): Array<{ path?: string; match: ReferenceMatch }> {
  if (token.includes('/')) {
    const exact = catalog.exact(token);
    if (exact) {
      return [{ path: exact, match: 'exact_path' }];
    }
    const suffixed = catalog.withSuffix(token);
    if (suffixed.length === 1) {
      return [{ path: suffixed[0], match: 'unique_filename' }];
    }
    if (suffixed.length > 1) {
      return suffixed.map(p => ({ path: p, match: 'ambiguous_filename' }));
    }
    const byBase = catalog.withBasename(path.posix.basename(token));
    if (byBase.length > 0) {
      return byBase.slice(0, MAX_PARTIAL_MATCHES).map(p => ({ path: p, match: 'partial' }));
    }
    return [{ match: 'unresolved' }];
  }

  const byBase = catalog.withBasename(token);
  if (byBase.length === 1) {
    return [{ path: byBase[0], match: 'unique_filename' }];
  }
  if (byBase.length > 1) {
    return byBase.map(p => ({ path: p, match: 'ambiguous_filename' }));
  }

  const partial = catalog.containing(token);
  if (partial.length > 0) {
    return partial.slice(0, MAX_PARTIAL_MATCHES).map(p => ({ path: p, match: 'partial' }));
  }
  return [{ match: 'unresolved' }];
}

function referenceKey(ref: FileReference): string {
  return ref.path ?? `unresolved:${ref.filename.toLowerCase()}`;
}

export function compareReferences(a: FileReference, b: FileReference): number {
  if (b.confidence !== a.confidence) {
    return b.confidence - a.confidence;
  }
  const ka = a.path ?? a.filename;
  const kb = b.path ?? b.filename;
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Scan query text for file-like tokens and resolve each against the catalog.
 * Ambiguous tokens yield one reference per matching file.
 */
export function detectFileReferences(
  text: string,
  catalog: FileCatalog,
  ignoredTokens: ReadonlySet<string> = new Set()
): FileReference[] {
  const found = new Map<string, FileReference>();

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const token = cleanToken(match[0]);
    if (!token || ignoredTokens.has(token.text.toLowerCase())) {
      continue;
    }

    const resolutions = referencesFor(token.text, catalog);
    const resolved = resolutions.some(r => r.path !== undefined);
    // Unresolved tokens only count when they carry a source-file extension
    if (!resolved && !isKnownExtension(path.posix.extname(token.text))) {
      continue;
    }

    let lineNumber = token.lineNumber;
    if (lineNumber === undefined) {
      const after = LINE_AFTER.exec(text.slice(end));
      const before = LINE_BEFORE.exec(text.slice(0, start));
      const captured = after?.[1] ?? before?.[1];
      lineNumber = captured !== undefined ? Number(captured) : undefined;
    }

    for (const resolution of resolutions) {
      const ref: FileReference = {
        filename: token.text,
        ...(resolution.path !== undefined && { path: resolution.path }),
        ...(lineNumber !== undefined && { lineNumber }),
        confidence: REFERENCE_CONFIDENCE[resolution.match],
        match: resolution.match,
      };
      const key = referenceKey(ref);
      const existing = found.get(key);
      if (!existing || ref.confidence > existing.confidence) {
        const keepLine = ref.lineNumber === undefined && existing?.lineNumber !== undefined;
        found.set(key, keepLine ? { ...ref, lineNumber: existing?.lineNumber } : ref);
      }
    }
  }

  return Array.from(found.values()).sort(compareReferences);
}
