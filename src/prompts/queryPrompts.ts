/**
 * @fileOverview: Answer prompt generators and retrieval-context rendering
 * @module: QueryPrompts
 * @keyFunctions:
 *   - createAnswerSystemPrompt: Intent-specific system prompt for single-shot answers
 *   - createAnswerUserPrompt: Task plus formatted retrieval context
 *   - formatRetrievalContext: Metadata block and/or file-grouped chunks, per the context's required parts
 *   - createContextSummaryAnswer: Answer built from the context alone when generation is unavailable
 * @context: Every prompt asks for the same JSON shape so one parser serves /query and the coder role
 */

import type { AnswerPayload, Intent, QueryAnalysis } from '../shared/types';
import type { RetrievalContext } from '../shared/retrieval/types';

export const ANSWER_SCHEMA_HINT =
  'Return STRICT JSON with keys: analysis (string), plan (array of strings), changes (array of {path, rationale, diff}).\n' +
  'Each diff MUST be a unified diff against the exact repository path. Do not wrap the JSON in markdown.';

const INTENT_FOCUS: Record<Intent, string> = {
  ANALYSIS: 'Focus on explaining code functionality, purpose, and structure.',
  DEBUG: 'Focus on identifying the root cause of the problem and proposing a fix.',
  CHANGES: 'Focus on proposing minimal, focused code changes that follow the existing style.',
  REVIEW: 'Focus on code quality, correctness risks, and concrete improvements.',
  SEARCH: 'Focus on locating the relevant code and pointing at exact files and lines.',
  GENERAL: 'Provide helpful, accurate information about the codebase.',
};

export function createAnswerSystemPrompt(intent: Intent): string {
  return (
    'You are a senior software engineer answering questions about a private repository.\n' +
    `${INTENT_FOCUS[intent]}\n` +
    'Base every claim on the provided context; say so when the context is insufficient.\n' +
    ANSWER_SCHEMA_HINT
  );
}

export function formatChunks(context: RetrievalContext, maxChunks?: number, maxChars?: number): string {
  const chunks = maxChunks === undefined ? context.chunks : context.chunks.slice(0, maxChunks);
  const lines: string[] = [];
  let currentFile: string | null = null;

  for (const chunk of chunks) {
    if (chunk.filePath !== currentFile) {
      currentFile = chunk.filePath;
      lines.push('', `📁 ${chunk.filePath}`, '─'.repeat(60));
    }
    const content =
      maxChars !== undefined && chunk.content.length > maxChars
        ? chunk.content.substring(0, maxChars) + '...'
        : chunk.content;
    lines.push(`📍 Lines ${chunk.startLine}-${chunk.endLine}`, content);
  }
  return lines.join('\n').trim();
}

export function formatRetrievalContext(context: RetrievalContext): string {
  const sections: string[] = [];

  if (context.requiredParts.includes('metadata') && context.metadataSummary) {
    sections.push(context.metadataSummary);
  }
  if (context.requiredParts.includes('content')) {
    sections.push(
      context.chunks.length > 0
        ? `Relevant code (${context.totalChunks} chunks from ${context.filesInvolved} files):\n${formatChunks(context)}`
        : 'Relevant code: (no matching chunks)'
    );
  }
  return sections.join('\n\n');
}

export function createAnswerUserPrompt(analysis: QueryAnalysis, context: RetrievalContext): string {
  const parts = [`Task: ${analysis.originalQuery}`, '', formatRetrievalContext(context)];

  const mentioned = analysis.fileReferences.map(ref => ref.path ?? ref.filename);
  if (mentioned.length > 0) {
    parts.push('', `Files mentioned: ${[...new Set(mentioned)].join(', ')}`);
  }
  if (analysis.subIntents.length > 0) {
    parts.push('', 'The task has several parts; answer each of them:');
    analysis.subIntents.forEach((sub, i) => parts.push(`${i + 1}. ${sub.text}`));
  }

  parts.push('', 'Now produce the JSON response.');
  return parts.join('\n');
}

export function createContextSummaryAnswer(analysis: QueryAnalysis, context: RetrievalContext): AnswerPayload {
  const files = context.fileTree?.map(file => file.path) ?? [];
  let text = `Found ${context.totalChunks} relevant code chunks for query: ${analysis.originalQuery}`;
  if (files.length > 0 && context.requiredParts.includes('content')) {
    text += `\n\nFiles involved: ${files.join(', ')}`;
  }
  if (context.metadataSummary) {
    text += `\n\n${context.metadataSummary}`;
  }
  return {
    analysis: text,
    plan: [`Strategy used: ${context.strategy}`],
    changes: [],
  };
}
