/**
 * Configuration types for mxhr-buffer
 */

/**
 * MxhrBuffer constructor options
 */
export interface MxhrBufferOptions {
  /** Encoding of text parts in the output (default: 'utf-8') */
  encoding?: string;
  /** Produces a fresh boundary token for each session (default: generateBoundary) */
  boundaryGenerator?: () => string;
}

/**
 * Options after defaults have been applied
 */
export interface ResolvedBufferOptions {
  encoding: string;
  boundaryGenerator: () => string;
}
