/**
 * @fileoverview Bounds for upward directory traversal.
 *
 * @module config/traversal-limits
 */

/**
 * Maximum number of `dirname` steps a single ascent may take.
 * Real paths are far shallower; hitting this means dirname stopped shrinking.
 */
export const MAX_PARENT_ASCENTS = 100;
