/**
 * @fileOverview: Core data model shared by the analyzer, retriever, selector and refinement loop
 * @module: SharedTypes
 * @context: Index-derived values (FileNode, CodeChunk) are immutable per index generation; a QueryAnalysis is created once per query and never mutated
 */

export type Intent = 'ANALYSIS' | 'DEBUG' | 'CHANGES' | 'REVIEW' | 'SEARCH' | 'GENERAL';

export type ComplexityTier = 'simple' | 'medium' | 'complex';

export type ReferenceMatch =
  | 'exact_path'
  | 'unique_filename'
  | 'ambiguous_filename'
  | 'partial'
  | 'unresolved';

export type StatisticsKind =
  | 'file_count'
  | 'line_count'
  | 'languages'
  | 'size'
  | 'file_list'
  | 'overview';

export type SubIntentKind = 'metadata' | 'content';

export interface FileNode {
  readonly path: string;
  readonly name: string;
  readonly extension: string;
  readonly language: string | null;
  readonly size: number;
  readonly contentHash: string;
  readonly lineCount: number;
}

export interface CodeChunk {
  readonly id: string;
  readonly filePath: string;
  /** 1-based, inclusive */
  readonly startLine: number;
  /** 1-based, inclusive */
  readonly endLine: number;
  readonly content: string;
  readonly language: string | null;
  readonly contentHash: string;
}

export interface FileReference {
  /** Token as written in the query */
  readonly filename: string;
  /** Resolved repository-relative path; absent when unresolved */
  readonly path?: string;
  readonly lineNumber?: number;
  readonly confidence: number;
  readonly match: ReferenceMatch;
}

export interface SubIntent {
  readonly kind: SubIntentKind;
  readonly text: string;
  readonly intent: Intent;
  readonly statistics: StatisticsKind | null;
}

export interface QueryAnalysis {
  readonly originalQuery: string;
  readonly normalizedQuery: string;
  readonly intent: Intent;
  readonly complexity: ComplexityTier;
  readonly complexityScore: number;
  readonly fileReferences: readonly FileReference[];
  readonly entities: readonly string[];
  readonly confidence: number;
  /** Empty unless the query mixes a metadata clause with a content clause */
  readonly subIntents: readonly SubIntent[];
  readonly statistics: StatisticsKind | null;
  readonly exploratory: boolean;
}

export interface RepositoryStats {
  totalFiles: number;
  totalLines: number;
  totalBytes: number;
  totalChunks: number;
  /** Language tag -> file count */
  languages: Record<string, number>;
}

// ===== Generation =====

export type GenerationRole = 'answer' | 'planner' | 'coder' | 'judge';

export interface GenerationParams {
  model?: string;
  maxNewTokens?: number;
  temperature?: number;
}

export interface GenerationRequest {
  role: GenerationRole;
  system: string;
  user: string;
  params: GenerationParams;
}

export interface GenerationInterface {
  /** Resolves with raw model text; rejects on failure or timeout */
  generate(request: GenerationRequest): Promise<string>;
}

export interface ModelDescriptor {
  readonly name: string;
  readonly capabilities: readonly string[];
  readonly maxContextLength: number;
  readonly defaults: {
    readonly maxNewTokens: number;
    readonly temperature: number;
  };
}

// ===== Answers and refinement =====

export interface ProposedChange {
  path: string;
  rationale: string;
  diff: string;
}

export interface AnswerPayload {
  analysis: string;
  plan: string[];
  changes: ProposedChange[];
}

export interface TaskSpec {
  goal: string;
  targetSignals: string[];
  constraints: string[];
  acceptance: string[];
  hintPaths: string[];
  /** True when planning failed and the raw query stands in as the goal */
  degraded: boolean;
}

export interface Candidate {
  readonly loop: number;
  readonly sample: number;
  readonly payload: AnswerPayload;
  readonly raw: string;
  readonly diff?: string;
}

export interface Verdict {
  readonly score: number;
  readonly pass: boolean;
  readonly reasons: readonly string[];
  readonly risks: readonly string[];
}

export interface JudgedCandidate {
  readonly candidate: Candidate;
  readonly verdict: Verdict;
}

export interface LoopRecord {
  loop: number;
  strategy: string;
  retrieved: number;
  signals: string[];
  samplesRequested: number;
  generated: number;
  parsed: number;
  judged: number;
  roundBest: { sample: number; score: number } | null;
  bestScore: number | null;
  failures: string[];
  tookMs: number;
}

export interface RefinementState {
  readonly loop: number;
  readonly best: JudgedCandidate | null;
  readonly signals: readonly string[];
  readonly trail: readonly LoopRecord[];
  /** First raw coder output seen, kept for the degraded fallback */
  readonly firstRaw: string | null;
}

// ===== Patch application =====

export interface PatchResult {
  changedFiles: string[];
  output: string;
}

export interface PatchApplier {
  apply(diffText: string): Promise<PatchResult>;
}
