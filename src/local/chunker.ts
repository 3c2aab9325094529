/**
 * @fileOverview: Line-based chunking with a character budget and trailing-line overlap
 * @module: Chunker
 * @context: Overlap is measured in characters but rounded to whole lines, so a definition split at a boundary appears intact in at least one chunk when it fits the overlap
 */

export interface ChunkingOptions {
  maxChunkChars: number;
  overlapChars: number;
}

export interface ChunkSpan {
  /** 1-based, inclusive */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
  content: string;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChunkChars: 1600,
  overlapChars: 200,
};

export function splitLines(content: string): string[] {
  const lines = content.replace(/\r\n/g, '\n').split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function chunkText(content: string, options: ChunkingOptions = DEFAULT_CHUNKING): ChunkSpan[] {
  if (options.maxChunkChars <= 0) {
    throw new RangeError('maxChunkChars must be positive');
  }
  if (options.overlapChars < 0 || options.overlapChars >= options.maxChunkChars) {
    throw new RangeError('overlapChars must be in [0, maxChunkChars)');
  }
  if (content.trim().length === 0) {
    return [];
  }

  const lines = splitLines(content);
  const spans: ChunkSpan[] = [];
  let start = 0;

  while (start < lines.length) {
    // Always take at least one line so an oversized line still lands in a chunk
    let end = start;
    let size = lines[start].length + 1;
    while (end + 1 < lines.length && size + lines[end + 1].length + 1 <= options.maxChunkChars) {
      end++;
      size += lines[end].length + 1;
    }

    spans.push({
      startLine: start + 1,
      endLine: end + 1,
      content: lines.slice(start, end + 1).join('\n'),
    });

    if (end >= lines.length - 1) {
      break;
    }

    let next = end + 1;
    let carried = 0;
    while (next - 1 > start && carried + lines[next - 1].length + 1 <= options.overlapChars) {
      next--;
      carried += lines[next].length + 1;
    }
    start = next;
  }

  return spans;
}
