import { readFile } from 'fs/promises';
import { z } from 'zod';
import { LedgerRecordSchema } from '@ledgerline/types';
import { RULE_COMPARISONS, type TransactionRule } from './rules.js';

export const RuleConditionSchema = z.object({
  attribute: LedgerRecordSchema.keyof(),
  comparison: z.enum(RULE_COMPARISONS),
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export const TransactionRuleSchema = z.object({
  conditionsAnd: z.array(RuleConditionSchema).default([]),
  conditionsOr: z.array(RuleConditionSchema).default([]),
  description: z.string().default(''),
  category: z.string().default(''),
});

export const RuleFileSchema = z.array(TransactionRuleSchema);

/**
 * Parse the JSON text of a rule file.
 */
export function parseRules(content: string): TransactionRule[] {
  const result = RuleFileSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    const details = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Invalid rule file:\n${details}`);
  }
  return result.data;
}

export async function loadRules(filePath: string): Promise<TransactionRule[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseRules(content);
}
