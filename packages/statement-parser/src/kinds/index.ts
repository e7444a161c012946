import type { BankId, TransactionKind } from '@ledgerline/types';
import { bankPayedService } from './bank-payed-service.js';
import { cardAtmCashOut } from './card-atm-cash-out.js';
import { cardAtmDeposit } from './card-atm-deposit.js';
import { cardPaymentDebit } from './card-payment-debit.js';
import { cardPaymentIncoming } from './card-payment-incoming.js';
import { directDebit } from './direct-debit.js';
import { electronicBankingTransfer } from './electronic-banking-transfer.js';
import { incomingPayment } from './incoming-payment.js';
import { interestPositive } from './interest-positive.js';
import { outgoingPayment } from './outgoing-payment.js';
import { outgoingPaymentPeriodic } from './outgoing-payment-periodic.js';
import { taxInterest } from './tax-interest.js';
import type { BankRule, KindDefinition } from './types.js';

/**
 * Kinds in the order their markers are tried against a line. A marker that
 * is a substring of another kind's marker must come after it
 * (csob "Příchozí úhrada" inside "Příchozí úhrada kartou").
 */
export const KIND_PRECEDENCE: readonly KindDefinition[] = [
  cardPaymentIncoming,
  incomingPayment,
  outgoingPayment,
  cardPaymentDebit,
  cardAtmCashOut,
  bankPayedService,
  outgoingPaymentPeriodic,
  interestPositive,
  taxInterest,
  electronicBankingTransfer,
  directDebit,
  cardAtmDeposit,
];

export interface KindMatch {
  kind: TransactionKind;
  marker: string;
  rule: BankRule<TransactionKind>;
}

/**
 * First kind, in precedence order, with a marker contained in `line`.
 */
export function matchKind(line: string, bank: BankId): KindMatch | null {
  for (const definition of KIND_PRECEDENCE) {
    const rule = definition.banks[bank];
    if (rule === undefined) continue;

    const marker = rule.markers.find((candidate) => line.includes(candidate));
    if (marker !== undefined) {
      return { kind: definition.kind, marker, rule };
    }
  }
  return null;
}

export function markersFor(bank: BankId): Array<{ kind: TransactionKind; marker: string }> {
  return KIND_PRECEDENCE.flatMap((definition) =>
    (definition.banks[bank]?.markers ?? []).map((marker) => ({ kind: definition.kind, marker }))
  );
}

export interface MarkerOverlap {
  /** Kind whose marker is contained in the other */
  inner: { kind: TransactionKind; marker: string };
  outer: { kind: TransactionKind; marker: string };
  /** True when the outer marker's kind is tried first, so lines with it keep their kind */
  resolvedByPrecedence: boolean;
}

/**
 * Marker pairs of different kinds where one marker contains the other.
 */
export function findMarkerOverlaps(bank: BankId): MarkerOverlap[] {
  const markers = markersFor(bank);
  const order = (kind: TransactionKind) => KIND_PRECEDENCE.findIndex((d) => d.kind === kind);
  const overlaps: MarkerOverlap[] = [];

  for (const inner of markers) {
    for (const outer of markers) {
      if (inner.kind === outer.kind || inner.marker === outer.marker) continue;
      if (!outer.marker.includes(inner.marker)) continue;
      overlaps.push({ inner, outer, resolvedByPrecedence: order(outer.kind) < order(inner.kind) });
    }
  }
  return overlaps;
}

export { createCardOwnerLookup, unknownCardOwners } from './fields.js';
export { resolveServiceType } from './bank-payed-service.js';
export {
  TRANSFER_LAYOUTS,
  CS_CARD_LAYOUTS,
  CSOB_CARD_LAYOUTS,
  CS_DEPOSIT_LAYOUT,
  CS_SERVICE_TYPES,
  CSOB_SERVICE_TYPES,
} from './layouts.js';
export type { CardOwnerLookup, ExtractionContext, KindDefinition, BankRule } from './types.js';
