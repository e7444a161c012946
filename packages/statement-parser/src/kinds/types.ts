import type { BankId, TransactionInit, TransactionKind } from '@ledgerline/types';

/**
 * Resolves the owner label of a card from its last four digits.
 */
export type CardOwnerLookup = (cardIdentifier: string | null) => string;

/**
 * Everything an extraction rule may read: the page lines, the index of the
 * marker line and the statement the transaction belongs to.
 */
export interface ExtractionContext {
  bank: BankId;
  year: string | null;
  statementAccount: string;
  parentStatement: string | null;
  lines: readonly string[];
  /** Index of the line that carried the kind's marker */
  lineIndex: number;
  cardOwners: CardOwnerLookup;
}

export type TransactionInitOf<K extends TransactionKind> = Extract<TransactionInit, { kind: K }>;

export type ExtractionRule<K extends TransactionKind> = (ctx: ExtractionContext) => TransactionInitOf<K>;

export interface BankRule<K extends TransactionKind> {
  /** Substrings that start a transaction of this kind on a statement line */
  markers: readonly string[];
  extract: ExtractionRule<K>;
}

export interface KindDefinition<K extends TransactionKind = TransactionKind> {
  kind: K;
  banks: Partial<Record<BankId, BankRule<K>>>;
}
