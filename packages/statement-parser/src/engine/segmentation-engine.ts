/**
 * Line-oriented transaction segmentation for PDF statements.
 *
 * Every line is classified in order:
 *   1. it carries a marker of one of the bank's kinds: the kind's rule builds
 *      a transaction from the surrounding lines and it becomes the open one;
 *   2. it is a section-end line (balance footer, page header or continuation):
 *      the open transaction is closed;
 *   3. a transaction is open and the line is not empty: the trimmed line is
 *      appended to its text.
 * The open transaction survives page breaks until a section-end line closes it.
 */

import {
  SECTION_END_LINES,
  withTransactionId,
  type BankId,
  type Transaction,
} from '@ledgerline/types';
import { matchKind } from '../kinds/index.js';
import { unknownCardOwners } from '../kinds/fields.js';
import type { CardOwnerLookup } from '../kinds/types.js';

export interface SegmentationOptions {
  bank: BankId;
  year: string | null;
  statementAccount: string;
  parentStatement: string | null;
  /** Id source for new transactions; the ledger's allocator in a batch run */
  nextId: () => number;
  cardOwners?: CardOwnerLookup;
}

export type SegmentationState = { mode: 'idle' } | { mode: 'accumulating'; transaction: Transaction };

const SECTION_END = new Set(SECTION_END_LINES);

export class SegmentationEngine {
  private state: SegmentationState = { mode: 'idle' };
  private readonly transactions: Transaction[] = [];
  private readonly cardOwners: CardOwnerLookup;

  constructor(private readonly options: SegmentationOptions) {
    this.cardOwners = options.cardOwners ?? unknownCardOwners;
  }

  get currentState(): SegmentationState {
    return this.state;
  }

  get results(): readonly Transaction[] {
    return this.transactions;
  }

  /**
   * Feed one page. Errors from extraction rules propagate and leave the
   * engine unusable for the rest of the statement.
   */
  processPage(lines: readonly string[]): void {
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (line === undefined) continue;
      this.processLine(lines, i, line);
    }
  }

  private processLine(lines: readonly string[], lineIndex: number, line: string): void {
    const match = matchKind(line, this.options.bank);
    if (match !== null) {
      const init = match.rule.extract({
        bank: this.options.bank,
        year: this.options.year,
        statementAccount: this.options.statementAccount,
        parentStatement: this.options.parentStatement,
        lines,
        lineIndex,
        cardOwners: this.cardOwners,
      });
      const transaction = withTransactionId(init, this.options.nextId());
      this.transactions.push(transaction);
      this.state = { mode: 'accumulating', transaction };
      return;
    }

    if (SECTION_END.has(line)) {
      this.state = { mode: 'idle' };
      return;
    }

    if (this.state.mode === 'accumulating' && line.length > 0) {
      this.state.transaction.allTransactionLinesText += `${line.trim()}\n`;
    }
  }
}

/**
 * Segment all pages of one statement into transactions, in statement order.
 */
export function segmentPages(pages: ReadonlyArray<readonly string[]>, options: SegmentationOptions): Transaction[] {
  const engine = new SegmentationEngine(options);
  for (const page of pages) {
    engine.processPage(page);
  }
  return [...engine.results];
}
