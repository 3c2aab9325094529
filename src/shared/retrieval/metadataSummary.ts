/**
 * @fileOverview: Repository statistics rendered straight from the index, without vector search or generation
 * @module: MetadataSummary
 * @keyFunctions:
 *   - summarizeRepository(): Metadata block for metadata and multi-intent contexts
 *   - answerStatistics(): Direct answer for a pure statistics query
 */

import type { RepositoryStats, StatisticsKind } from '../types';
import type { RepositoryIndex } from './types';

export const SAMPLE_FILE_LIMIT = 20;

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatLanguages(stats: RepositoryStats): string {
  const entries = Object.entries(stats.languages).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) return 'none detected';
  return entries.map(([language, count]) => `${language} (${count})`).join(', ');
}

export function summarizeRepository(index: RepositoryIndex, sampleLimit: number = SAMPLE_FILE_LIMIT): string {
  const stats = index.stats();
  const files = index.listFiles();
  const sample = files.slice(0, sampleLimit).map(file => file.path);

  const lines = [
    'Repository Metadata:',
    `- Total Files: ${stats.totalFiles}`,
    `- Total Lines: ${stats.totalLines}`,
    `- Total Size: ${formatMegabytes(stats.totalBytes)}`,
    `- Languages: ${formatLanguages(stats)}`,
    `- Sample Files: ${sample.length > 0 ? sample.join(', ') : '(none)'}`,
  ];
  if (files.length > sampleLimit) {
    lines.push(`  ... and ${files.length - sampleLimit} more files`);
  }
  return lines.join('\n');
}

export function answerStatistics(kind: StatisticsKind, index: RepositoryIndex): string {
  const stats = index.stats();
  switch (kind) {
    case 'file_count':
      return `The repository contains ${stats.totalFiles} indexed files.`;
    case 'line_count':
      return `The repository contains ${stats.totalLines} lines across ${stats.totalFiles} files.`;
    case 'languages':
      return `Languages in the repository: ${formatLanguages(stats)}.`;
    case 'size':
      return `The indexed files total ${formatMegabytes(stats.totalBytes)} (${stats.totalBytes} bytes) across ${stats.totalFiles} files.`;
    case 'file_list': {
      const files = index.listFiles();
      const shown = files.slice(0, SAMPLE_FILE_LIMIT).map(file => `- ${file.path}`);
      const more = files.length > SAMPLE_FILE_LIMIT ? [`... and ${files.length - SAMPLE_FILE_LIMIT} more files`] : [];
      return [`The repository contains ${stats.totalFiles} files:`, ...shown, ...more].join('\n');
    }
    case 'overview':
      return summarizeRepository(index);
  }
}
