export {
  RULE_COMPARISONS,
  evaluateCondition,
  rulePasses,
  findMatchingRule,
  applyRules,
  type RuleComparison,
  type RuleAttribute,
  type RuleValue,
  type RuleCondition,
  type TransactionRule,
  type RuleApplicationResult,
} from './rules.js';

export {
  RuleConditionSchema,
  TransactionRuleSchema,
  RuleFileSchema,
  parseRules,
  loadRules,
} from './rule-loader.js';
