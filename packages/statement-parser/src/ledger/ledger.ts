import {
  bookingDateSortKey,
  withTransactionId,
  type StatementAccount,
  type Transaction,
  type TransactionInit,
} from '@ledgerline/types';
import { SequentialIdAllocator } from './id-allocator.js';

/**
 * Registry of every transaction and statement of one run.
 *
 * Statements are parsed against {@link nextId} and handed to {@link commit}
 * only once they parsed completely, so a file that fails half way leaves no
 * transactions behind. The ids it consumed are not reused.
 */
export class StatementLedger {
  private readonly allocator = new SequentialIdAllocator();
  private readonly transactionList: Transaction[] = [];
  private readonly statementList: StatementAccount[] = [];

  /** Bound id source to pass to the statement parser */
  readonly nextId = (): number => this.allocator.next();

  get transactions(): readonly Transaction[] {
    return this.transactionList;
  }

  get statements(): readonly StatementAccount[] {
    return this.statementList;
  }

  commit(statement: StatementAccount): void {
    this.statementList.push(statement);
    this.transactionList.push(...statement.transactions);
  }

  /**
   * Add a transaction that does not come from a statement parsed in this run,
   * such as one read back from an earlier export. It gets a fresh id.
   */
  restore(init: TransactionInit): Transaction {
    const transaction = withTransactionId(init, this.allocator.next());
    this.transactionList.push(transaction);
    return transaction;
  }

  /**
   * Oldest booking date first; same-day transactions keep creation order.
   */
  sortChronologically(): void {
    const keyed = this.transactionList.map((transaction) => ({
      transaction,
      key: bookingDateSortKey(transaction.dateBooked),
    }));
    keyed.sort((a, b) => a.key - b.key || a.transaction.transactionId - b.transaction.transactionId);
    keyed.forEach((entry, index) => {
      this.transactionList[index] = entry.transaction;
    });
  }

  /**
   * Reassign ids 1..N in the current order.
   */
  renumberAfterSort(): void {
    this.transactionList.forEach((transaction, index) => {
      transaction.transactionId = index + 1;
    });
  }

  /**
   * Sort and renumber; the order and ids the exports are written with.
   */
  finalize(): readonly Transaction[] {
    this.sortChronologically();
    this.renumberAfterSort();
    return this.transactionList;
  }

  reset(): void {
    this.transactionList.length = 0;
    this.statementList.length = 0;
    this.allocator.reset();
  }
}
