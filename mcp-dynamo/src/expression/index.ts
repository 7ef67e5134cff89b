export * from './ast.js';
export { tokenize } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseCondition, parseUpdate } from './parser.js';
export type { ExpressionContext } from './parser.js';
export {
  CompiledCondition,
  CompiledUpdate,
  compileCondition,
  compileUpdate,
  conditionAttributes,
  evaluateCondition,
} from './evaluator.js';
export { compileKeyCondition, inspectKeyCondition, matchesSortCondition } from './key-condition.js';
export type { KeyCondition, KeyConditionShape } from './key-condition.js';
