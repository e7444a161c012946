/**
 * Balance reconciliation for parsed statements.
 * Verifies that: closing_balance - opening_balance = sum of transaction amounts
 */

import type { MissingMarkerWarning, ReconciliationWarning } from '../types/statement.js';
import { formatDecimalComma, roundToTwoDecimals, sumAmounts } from '../utils/money.js';

export interface ReconciliationResult {
  /** Whether the rounded balance delta equals the rounded transaction sum */
  passed: boolean;
  /** closing - opening, rounded to cents */
  expectedDelta: number;
  /** Sum of extracted transaction amounts, rounded to cents */
  transactionSum: number;
  /** expectedDelta - transactionSum, rounded to cents */
  missingAmount: number;
}

/**
 * Compare the balance movement of a statement with its extracted transactions.
 *
 * @param openingBalance - Balance at the start of the statement period
 * @param closingBalance - Balance at the end of the statement period
 * @param amounts - Signed amounts of every transaction found in the statement
 */
export function validateReconciliation(
  openingBalance: number,
  closingBalance: number,
  amounts: number[]
): ReconciliationResult {
  const expectedDelta = roundToTwoDecimals(closingBalance - openingBalance);
  const transactionSum = sumAmounts(amounts);
  const missingAmount = roundToTwoDecimals(expectedDelta - transactionSum);

  return {
    passed: expectedDelta === transactionSum,
    expectedDelta,
    transactionSum,
    missingAmount,
  };
}

/**
 * Reconcile a statement and turn the outcome into diagnostics. Missing
 * balances are reported instead of compared.
 */
export function reconcileStatement(statement: {
  openingBalance: number | null;
  closingBalance: number | null;
  transactions: ReadonlyArray<{ amount: number }>;
}): Array<ReconciliationWarning | MissingMarkerWarning> {
  const { openingBalance, closingBalance } = statement;

  if (openingBalance === null || closingBalance === null) {
    const missing = [
      openingBalance === null ? 'opening balance' : null,
      closingBalance === null ? 'closing balance' : null,
    ].filter((label): label is string => label !== null);
    return missing.map((marker): MissingMarkerWarning => ({
      type: 'missing-marker',
      marker,
      message: `Statement has no ${marker}; reconciliation skipped`,
    }));
  }

  const result = validateReconciliation(
    openingBalance,
    closingBalance,
    statement.transactions.map((t) => t.amount)
  );
  if (result.passed) {
    return [];
  }

  return [
    {
      type: 'reconciliation',
      message: formatReconciliationResult(result),
      expectedDelta: result.expectedDelta,
      transactionSum: result.transactionSum,
      missingAmount: result.missingAmount,
    },
  ];
}

export function formatReconciliationResult(result: ReconciliationResult): string {
  if (result.passed) {
    return `Balance reconciliation passed (${formatDecimalComma(result.expectedDelta)})`;
  }
  return (
    `Some transactions were not extracted: balance moved by ${formatDecimalComma(result.expectedDelta)}, ` +
    `transactions sum to ${formatDecimalComma(result.transactionSum)}, ` +
    `missing ${formatDecimalComma(result.missingAmount)}`
  );
}
