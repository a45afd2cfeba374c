/**
 * @module src/models/numeric
 * @description Numerical Methods
 *
 * Contains:
 * - Linear algebra: dot product, norms, 2D rotation, matrix-vector product
 */

import * as math from './math/linear-algebra';

// Re-export as namespace
export { math };

// Direct exports for common functions
export * from './math/linear-algebra';
