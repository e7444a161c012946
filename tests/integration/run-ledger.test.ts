import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { readCsvRows, unknownCardOwners, type StatementReaders } from '@ledgerline/statement-parser';
import { CSV_EXPORT_FILE, JSON_EXPORT_FILE, exportJson, readLedgerJson } from '@ledgerline/output';
import type { TransactionRule } from '@ledgerline/categorizer';
import type { StatementPages } from '@ledgerline/types';
import { runLedger, runReexport, type RunOptions } from '../../apps/cli/src/run.js';
import { sampleTransactions } from '../fixtures/transactions.js';

const CS_PAGES: StatementPages = [
  [
    'Česká spořitelna, a.s.,',
    'Číslo účtu/kód banky: 123456789/0800',
    'Období: 01.05.2023 - 31.05.2023',
    'Počáteční zůstatek:',
    '1 000,00',
    '03.05.2023',
    'Příchozí úhrada',
    '987654321/0100',
    '+250,00',
    'Konečný zůstatek:',
    '1 250,00',
  ],
];

const REVOLUT_CSV = [
  'Type,Product,Started Date,Completed Date,Description,Amount,Fee,Currency,State,Balance',
  'TOPUP,Current,2023-05-01 08:00:00,2023-05-01 08:00:05,Top-up,1000.00,0.00,CZK,COMPLETED,1000.00',
].join('\n');

const TOP_UP_RULE: TransactionRule = {
  conditionsAnd: [
    { attribute: 'type', comparison: 'equal', value: 'IncomingPayment' },
    { attribute: 'amount', comparison: 'greater', value: 500 },
  ],
  conditionsOr: [],
  description: 'Top-up',
  category: 'Transfers',
};

// PDF text comes from a stand-in; CSV files go through the real reader
const readers: StatementReaders = {
  readPdfPages: async (filePath) => {
    if (filePath.endsWith('broken.pdf')) {
      throw new Error('Unreadable PDF');
    }
    return CS_PAGES;
  },
  readCsvRows,
};

describe('runLedger', () => {
  let testDir: string;
  let statementsDir: string;
  let outDir: string;

  function options(overrides: Partial<RunOptions> = {}): RunOptions {
    return {
      outDir,
      verbose: false,
      failFast: false,
      cardOwners: unknownCardOwners,
      rules: [TOP_UP_RULE],
      revolutAccount: 'CZ000REVOLUT',
      revolutCard: null,
      readers,
      ...overrides,
    };
  }

  async function readExport() {
    return readLedgerJson(await readFile(join(outDir, JSON_EXPORT_FILE), 'utf-8')).transactions;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    testDir = join(tmpdir(), `ledger-run-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    statementsDir = join(testDir, 'statements');
    outDir = join(testDir, 'out');
    await mkdir(join(statementsDir, '2023'), { recursive: true });
    await writeFile(join(statementsDir, '2023', 'cs.pdf'), '%PDF-stand-in');
    await writeFile(join(statementsDir, 'broken.pdf'), '%PDF-stand-in');
    await writeFile(join(statementsDir, 'revolut-czk.csv'), REVOLUT_CSV);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should parse, categorize and export every statement, reporting the one that fails', async () => {
    const result = await runLedger(statementsDir, options());

    expect(result.exitCode).toBe(0);
    expect(result.totalTransactions).toBe(2);
    expect(result.parseErrors.map((e) => [e.filename, e.error])).toEqual([['broken.pdf', 'Unreadable PDF']]);

    const exported = await readExport();
    expect(exported.map((t) => [t.kind, t.dateBooked, t.amount, t.statementAccount, t.userCategory])).toEqual([
      ['IncomingPayment', '01.05.2023', 1000, 'CZ000REVOLUTCZK', 'Transfers'],
      ['IncomingPayment', '03.05.2023', 250, '123456789/0800', ''],
    ]);

    const csv = await readFile(join(outDir, CSV_EXPORT_FILE), 'utf-8');
    expect(csv.split('\r\n')[1]).toBe('1;CZ000REVOLUTCZK;2023-05-01;IncomingPayment;;CZ000REVOLUTCZK;1000,00;CZK;Transfers;Top-up;Top-up');
  });

  it('should stop at the first failing statement with fail-fast', async () => {
    await expect(runLedger(statementsDir, options({ failFast: true }))).rejects.toThrow('Unreadable PDF');
  });

  it('should fail for a directory that does not exist', async () => {
    const result = await runLedger(join(testDir, 'missing'), options());

    expect(result).toEqual({ exitCode: 1, exports: null, parseErrors: [], totalTransactions: 0 });
    expect(console.error).toHaveBeenCalledWith(`[ERROR] Directory does not exist: ${join(testDir, 'missing')}`);
  });

  it('should merge an earlier export without categorizing it again', async () => {
    const historyPath = join(testDir, 'history.json');
    await writeFile(historyPath, exportJson(sampleTransactions()));

    const feeRule: TransactionRule = {
      conditionsAnd: [{ attribute: 'type', comparison: 'equal', value: 'BankPayedService' }],
      conditionsOr: [],
      description: '',
      category: 'Fees',
    };

    const result = await runLedger(statementsDir, options({ history: historyPath, rules: [TOP_UP_RULE, feeRule] }));

    expect(result.totalTransactions).toBe(7);
    const json = await readFile(join(outDir, JSON_EXPORT_FILE), 'utf-8');
    const ids = [...json.matchAll(/"transaction_id": (\d+)/g)].map((match) => Number(match[1]));
    expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7]);
    const exported = await readExport();
    expect(exported.filter((t) => t.userCategory === 'Transfers').map((t) => t.amount)).toEqual([1000, 30000]);
    expect(exported.find((t) => t.kind === 'BankPayedService')?.userCategory).toBe('Poplatky');
  });

  it('should not parse statements again that the history already holds', async () => {
    await runLedger(statementsDir, options());
    const historyPath = join(testDir, 'history.json');
    await writeFile(historyPath, await readFile(join(outDir, JSON_EXPORT_FILE), 'utf-8'));

    const result = await runLedger(statementsDir, options({ history: historyPath }));

    expect(result.totalTransactions).toBe(2);
    expect(result.parseErrors.map((e) => e.filename)).toEqual(['broken.pdf']);
    expect(console.error).toHaveBeenCalledWith(`[WARN] Skipped cs.pdf: already in ${historyPath}`);
    expect((await readExport()).map((t) => [t.amount, t.userCategory])).toEqual([
      [1000, 'Transfers'],
      [250, ''],
    ]);
  });
});

describe('runReexport', () => {
  let testDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    testDir = join(tmpdir(), `ledger-reexport-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should rewrite both exports and categorize what was left uncategorized', async () => {
    const jsonPath = join(testDir, 'transactions.json');
    await writeFile(jsonPath, exportJson(sampleTransactions()));
    const outDir = join(testDir, 'again');

    const result = await runReexport(jsonPath, { outDir, verbose: false, rules: [TOP_UP_RULE] });

    expect(result.totalTransactions).toBe(5);
    const exported = readLedgerJson(await readFile(join(outDir, JSON_EXPORT_FILE), 'utf-8')).transactions;
    expect(exported.map((t) => t.userCategory)).toEqual(['Transfers', '', '', '', 'Poplatky']);
  });

  it('should fail when the export does not exist', async () => {
    await expect(
      runReexport(join(testDir, 'missing.json'), { outDir: testDir, verbose: false, rules: [] })
    ).rejects.toThrow();
  });
});
