/**
 * @fileOverview: Named scoring constants for reference detection, retrieval, model selection and refinement
 * @module: Constants
 */

/** Similarity multiplier for chunks from user-referenced files under hybrid retrieval */
export const HYBRID_FILE_BOOST = 3;

/** Judge score at which the refinement loop stops early */
export const EARLY_STOP_SCORE = 85;

export const REFERENCE_CONFIDENCE = {
  exact_path: 0.95,
  unique_filename: 0.9,
  ambiguous_filename: 0.6,
  partial: 0.4,
  unresolved: 0.3,
} as const;

/** References at or above this confidence (and resolved) qualify for file-specific retrieval */
export const HIGH_CONFIDENCE_REFERENCE = 0.85;

export const COMPLEXITY_WEIGHTS = {
  perWord: 0.1,
  perEntity: 0.5,
  perFileReference: 1.0,
  complexKeyword: 2.0,
} as const;

export const DEFAULT_COMPLEXITY_THRESHOLDS = {
  medium: 1.5,
  complex: 3.5,
} as const;

export const CONFIDENCE_WEIGHTS = {
  intent: 0.5,
  reference: 0.35,
  entities: 0.15,
} as const;

export const MAX_ENTITIES = 10;

export const MODEL_SCORES = {
  capabilityMatch: 10,
  codeReferenceBonus: 2,
  /** Multiplied by log2(maxContextLength / 1024) */
  tierWeight: { simple: 0, medium: 0.5, complex: 1 },
} as const;

export const DEFAULT_TOP_K = 16;
export const DEFAULT_NUM_SAMPLES = 2;
export const DEFAULT_MAX_LOOPS = 2;

/** Indexed paths added to the refined query from planner hint globs */
export const MAX_HINT_PATHS = 5;

/** Reported answer confidence by how the answer was produced */
export const ANSWER_CONFIDENCE = {
  metadata: 1,
  structured: 0.8,
  plainText: 0.5,
  degraded: 0.2,
} as const;
