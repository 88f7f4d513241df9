/**
 * @file index.ts
 * @description Public entry point.
 */

export * from './src/types';
export * from './src/errors';
export * from './src/constants';
export * from './src/state';
export * from './src/structural';
export * from './src/unification';
export * from './src/pattern';
export * from './src/reduction';
export * from './src/utils';
export * from './src/elaboration';
export * from './src/parser';
export * from './src/kernel';
export * from './src/globals';
export * from './src/simplifier';
export * from './src/proof';
export * from './src/stdlib';
export * from './src/closure';
export * from './src/extraction_rules';
export * from './src/traversal';
export * from './src/extraction';
export * from './src/patterns';
export * from './src/rule_sets';
export * from './src/concrete_definition';
export * from './src/commands';
