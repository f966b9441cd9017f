/**
 * Streaming Limits Configuration
 *
 * Centralized bounds for per-line memory and for the output pipeline.
 * Both can be overridden through the search configuration.
 */

/**
 * Configuration for streaming limits.
 * All limits are optional - undefined values use defaults.
 */
export interface StreamLimits {
  /** Maximum bytes retained for one line before it is truncated (default: 131072) */
  maxLineBytes?: number;

  /** Maximum formatted records buffered between matching and writing (default: 256) */
  queueCapacity?: number;
}

/**
 * Default streaming limits.
 */
export const DEFAULT_LIMITS: Required<StreamLimits> = {
  maxLineBytes: 128 * 1024,
  queueCapacity: 256,
};
