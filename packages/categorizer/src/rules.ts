/**
 * User rule engine. Rules assign a description and a category to
 * transactions by comparing fields of their export record with fixed values.
 *
 * A rule passes when every AND condition passes and, if it has OR
 * conditions, at least one of them does. A rule without conditions never
 * passes. The first passing rule wins.
 */

import type { LedgerRecord, Transaction } from '@ledgerline/types';
import { toLedgerRecord } from '@ledgerline/output';

export const RULE_COMPARISONS = ['less', 'greater', 'equal', 'not equal', 'is in', 'not in'] as const;
export type RuleComparison = (typeof RULE_COMPARISONS)[number];

/** Export field a condition reads; `type` is the kind name */
export type RuleAttribute = keyof LedgerRecord;

export type RuleValue = string | number | boolean;

export interface RuleCondition {
  attribute: RuleAttribute;
  comparison: RuleComparison;
  value: RuleValue;
}

export interface TransactionRule {
  conditionsAnd: RuleCondition[];
  conditionsOr: RuleCondition[];
  /** Appended to the transaction's user description */
  description: string;
  /** Appended to the transaction's user category */
  category: string;
}

type FieldValue = LedgerRecord[RuleAttribute];

function compareOrdered(actual: FieldValue, expected: RuleValue): number | null {
  if (typeof actual === 'number' && typeof expected === 'number') {
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return null;
}

function containsIgnoringCase(actual: FieldValue, expected: RuleValue): boolean {
  if (typeof expected !== 'string') {
    return false;
  }
  const text = actual === null || actual === undefined ? '' : String(actual);
  return text.toLowerCase().includes(expected.toLowerCase());
}

export function evaluateCondition(condition: RuleCondition, record: LedgerRecord): boolean {
  // Kind-specific fields are absent on other kinds; such a condition fails
  if (!(condition.attribute in record)) {
    return false;
  }
  const actual = record[condition.attribute];

  switch (condition.comparison) {
    case 'less': {
      const order = compareOrdered(actual, condition.value);
      return order !== null && order < 0;
    }
    case 'greater': {
      const order = compareOrdered(actual, condition.value);
      return order !== null && order > 0;
    }
    case 'equal':
      return actual === condition.value;
    case 'not equal':
      return actual !== condition.value;
    case 'is in':
      return containsIgnoringCase(actual, condition.value);
    case 'not in':
      return !containsIgnoringCase(actual, condition.value);
  }
}

export function rulePasses(rule: TransactionRule, record: LedgerRecord): boolean {
  if (rule.conditionsAnd.length === 0 && rule.conditionsOr.length === 0) {
    return false;
  }
  if (!rule.conditionsAnd.every((condition) => evaluateCondition(condition, record))) {
    return false;
  }
  if (rule.conditionsOr.length > 0) {
    return rule.conditionsOr.some((condition) => evaluateCondition(condition, record));
  }
  return true;
}

/**
 * First rule the transaction passes, or null.
 */
export function findMatchingRule(transaction: Transaction, rules: readonly TransactionRule[]): TransactionRule | null {
  const record = toLedgerRecord(transaction);
  return rules.find((rule) => rulePasses(rule, record)) ?? null;
}

export interface RuleApplicationResult {
  matched: number;
  unmatched: number;
}

/**
 * Append the description and category of each transaction's first passing
 * rule to its user fields.
 */
export function applyRules(
  transactions: readonly Transaction[],
  rules: readonly TransactionRule[]
): RuleApplicationResult {
  let matched = 0;
  for (const transaction of transactions) {
    const rule = findMatchingRule(transaction, rules);
    if (rule === null) continue;
    transaction.userDescription += rule.description;
    transaction.userCategory += rule.category;
    matched++;
  }
  return { matched, unmatched: transactions.length - matched };
}
