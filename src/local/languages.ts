/**
 * @fileOverview: Extension-to-language lookup and default ignore list for repository indexing
 * @module: Languages
 */

import * as path from 'path';
import { z } from 'zod';
import rawLanguages from './languages.json';

const LanguageTableSchema = z.object({
  extensions: z.record(z.string()),
  ignoreDirs: z.array(z.string()),
});

const table = LanguageTableSchema.parse(rawLanguages);

export const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = table.extensions;

export const DEFAULT_IGNORE_DIRS: readonly string[] = table.ignoreDirs;

export const CODE_EXTENSIONS: readonly string[] = Object.keys(table.extensions);

export function languageForPath(filePath: string): string | null {
  const ext = path.extname(filePath).toLowerCase();
  return LANGUAGE_BY_EXTENSION[ext] ?? null;
}

export function isKnownExtension(ext: string): boolean {
  const normalized = ext.startsWith('.') ? ext.toLowerCase() : `.${ext.toLowerCase()}`;
  return normalized in LANGUAGE_BY_EXTENSION;
}
