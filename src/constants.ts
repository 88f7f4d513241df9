/**
 * @file constants.ts
 * @description Shared limits for the recursive term operations, the simplifier
 * and the resolution tactics.
 */

export const MAX_STACK_DEPTH = 20000;

/** Rewrite steps one `rewriteConv` call may take before it gives up. */
export const MAX_REWRITE_STEPS = 10000;

/** Nesting depth for recursive premise proving in `resolveTac`. */
export const MAX_RESOLUTION_DEPTH = 12;

/** Fact-name suffixes written by the extraction commands. */
export const DEFS_SUFFIX = 'defs';
export const CODE_SUFFIX = 'code';
export const DEF_SUFFIX = 'def';
export const REFINE_SUFFIX = 'refine';

/** Tag read by the downstream code-equation consumer. */
export const CODE_TAG = 'code';
