/**
 * Admission Control - Rules Module
 */

export {
  RuleIndex,
  compileRuleIndex,
  createEmptyRuleIndex,
  parsePattern,
} from './rule-index.js';
