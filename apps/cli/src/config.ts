import { readFile } from 'fs/promises';
import { CardOwnersSchema } from '@ledgerline/types';
import { createCardOwnerLookup, unknownCardOwners, type CardOwnerLookup } from '@ledgerline/statement-parser';
import { loadRules, type TransactionRule } from '@ledgerline/categorizer';

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

/**
 * Card owner table from a JSON file mapping last four card digits to a name.
 * Without a file every card is unknown.
 */
export async function loadCardOwners(filePath: string | undefined): Promise<CardOwnerLookup> {
  if (filePath === undefined || filePath === '') {
    return unknownCardOwners;
  }
  const content = await readFile(filePath, 'utf-8');
  const result = CardOwnersSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    const details = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Invalid card owner file ${filePath}:\n${details}`);
  }
  return createCardOwnerLookup(result.data);
}

export async function loadRulesFile(filePath: string | undefined): Promise<TransactionRule[]> {
  if (filePath === undefined || filePath === '') {
    return [];
  }
  return loadRules(filePath);
}
