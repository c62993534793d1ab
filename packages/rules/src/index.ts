export { tokenize, type Token, type Punctuator, type SyntaxFailure } from "./lexer.js";
export {
  FUNCTION_ARITY,
  identifiersOf,
  parseExpression,
  type ArithmeticOp,
  type ComparisonOp,
  type Expr,
  type FunctionName,
  type ParseResult,
} from "./parser.js";
export { evaluate, type EvalErrorCode, type EvalFailure, type EvalResult, type Scope } from "./evaluate.js";
export { aggregateScope, entityScope, RecordingScope } from "./scope.js";
export { evaluateRule, evaluateRules, selectEntities, type CompiledRule, type Selection } from "./engine.js";
export {
  categoryOf,
  compileRule,
  compileRuleDocuments,
  loadRuleDocuments,
  RuleDocumentSchema,
  RuleSchema,
  type LoadedRuleSet,
  type LoadOptions,
  type RuleDocument,
  type RuleSource,
} from "./loader.js";
export { BASELINE_RULESET, bundledRuleSetPath, bundledRuleSetPaths, STATE_OVERLAYS } from "./bundled.js";
