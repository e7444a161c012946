/**
 * Statement-level metadata read from PDF text: issuing bank, account number,
 * opening and closing balance, statement year.
 */

import {
  BANK_NAME_MARKERS,
  parseAmount,
  parseDotDecimalAmount,
  type BankId,
  type StatementPages,
} from '@ledgerline/types';

const CS_ACCOUNT_LABEL = 'Číslo účtu/kód banky:';
const CSOB_ACCOUNT_LABEL = 'Účet:';
const REVOLUT_IBAN_PATTERN = /^LT\d*$/;
const REVOLUT_BIC = 'REVOLT21';

const OPENING_LABEL = 'Počáteční zůstatek:';
const CLOSING_LABEL = 'Konečný zůstatek:';
const REVOLUT_SUMMARY_LABEL = 'Souhrn zůstatku';
const REVOLUT_TOTAL_LABEL = 'Celkem';
const REVOLUT_OPENING_OFFSET = 1;
const REVOLUT_CLOSING_OFFSET = 4;

const PERIOD_LABEL = 'Období:';
const REVOLUT_PERIOD_LABEL = 'Transakce účtu od';

export interface StatementInfo {
  bank: BankId | null;
  accountNumber: string;
  year: string | null;
  openingBalance: number | null;
  closingBalance: number | null;
}

export function detectBank(pages: StatementPages): BankId | null {
  for (const lines of pages) {
    for (const line of lines) {
      const match = BANK_NAME_MARKERS.find((marker) => line.includes(marker.text));
      if (match !== undefined) {
        return match.bank;
      }
    }
  }
  return null;
}

export function findAccountNumber(pages: StatementPages): string {
  for (const lines of pages) {
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      const next = lines[i + 1];
      if (line.includes(CS_ACCOUNT_LABEL)) {
        return line.replace(CS_ACCOUNT_LABEL, '').trim();
      }
      if (line.trim() === CSOB_ACCOUNT_LABEL && next !== undefined) {
        return next.trim();
      }
      if (REVOLUT_IBAN_PATTERN.test(line.trim()) && next !== undefined && next.includes(REVOLUT_BIC)) {
        return line.trim();
      }
    }
  }
  return '';
}

function lineAfterLabel(pages: StatementPages, label: string): string | null {
  for (const lines of pages) {
    const index = lines.findIndex((line) => line.includes(label));
    if (index !== -1) {
      return lines[index + 1] ?? null;
    }
  }
  return null;
}

/**
 * Revolut prints one balance summary per product section. The "Celkem" row
 * after the first summary opens the statement, the one after the last
 * summary closes it.
 */
function revolutSummaryAmount(pages: StatementPages, which: 'first' | 'last', offset: number): number | null {
  const summaries: Array<{ page: number; line: number }> = [];
  pages.forEach((lines, page) => {
    lines.forEach((line, index) => {
      if (line.includes(REVOLUT_SUMMARY_LABEL)) {
        summaries.push({ page, line: index });
      }
    });
  });

  const summary = which === 'first' ? summaries[0] : summaries[summaries.length - 1];
  if (summary === undefined) {
    return null;
  }

  const lines = pages[summary.page] ?? [];
  for (let i = summary.line; i < lines.length; i++) {
    if ((lines[i] ?? '').trim() === REVOLUT_TOTAL_LABEL) {
      const amountLine = lines[i + offset];
      return amountLine !== undefined ? parseDotDecimalAmount(amountLine) : null;
    }
  }
  return null;
}

export function findOpeningBalance(pages: StatementPages, bank: BankId | null): number | null {
  if (bank === 'revolut') {
    return revolutSummaryAmount(pages, 'first', REVOLUT_OPENING_OFFSET);
  }
  if (bank === 'cs' || bank === 'csob') {
    const line = lineAfterLabel(pages, OPENING_LABEL);
    return line !== null ? parseAmount(line) : null;
  }
  return null;
}

export function findClosingBalance(pages: StatementPages, bank: BankId | null): number | null {
  if (bank === 'revolut') {
    return revolutSummaryAmount(pages, 'last', REVOLUT_CLOSING_OFFSET);
  }
  if (bank === 'cs' || bank === 'csob') {
    const line = lineAfterLabel(pages, CLOSING_LABEL);
    return line !== null ? parseAmount(line) : null;
  }
  return null;
}

/**
 * Year of the statement period. ČSOB prints the period on the line after a
 * bare "Období:" label, ČS on the label line itself.
 */
export function findStatementYear(pages: StatementPages): string | null {
  for (const lines of pages) {
    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? '').trim();
      if (line === PERIOD_LABEL) {
        const next = lines[i + 1];
        return next !== undefined ? next.trim().slice(-4) : null;
      }
      if (line.includes(PERIOD_LABEL) || line.includes(REVOLUT_PERIOD_LABEL)) {
        return line.slice(-4);
      }
    }
  }
  return null;
}

export function readStatementInfo(pages: StatementPages): StatementInfo {
  const bank = detectBank(pages);
  return {
    bank,
    accountNumber: findAccountNumber(pages),
    year: findStatementYear(pages),
    openingBalance: findOpeningBalance(pages, bank),
    closingBalance: findClosingBalance(pages, bank),
  };
}
