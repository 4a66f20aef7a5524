/**
 * @fileoverview Engine module public exports.
 *
 * @module math-reasoning-agent/engine
 * @version 0.1.0
 */

export {
  OPERATOR_KEYWORDS,
  extractNumbers,
  detectOperator,
  formatExpression,
  parseExpression,
} from './expression-parser.js';

export { evaluateExpression } from './local-evaluator.js';

export {
  ResponseInterpreter,
  PatternMatcher,
  TrailingNumberMatcher,
  LastNumberMatcher,
  DEFAULT_RESULT_MATCHERS,
  type ResultMatcher,
  type ResultMatch,
} from './response-interpreter.js';

export {
  scoreConfidence,
  DEFAULT_TOLERANCE,
  CONFIDENCE_TIERS,
  type ConfidenceScore,
} from './confidence.js';
