/* eslint-disable no-console */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import {
  StatementLedger,
  processStatements,
  scanDirectoryForStatements,
  validateDirectory,
  type CardOwnerLookup,
  type ParseError,
  type StatementReaders,
} from '@ledgerline/statement-parser';
import { applyRules, type TransactionRule } from '@ledgerline/categorizer';
import { loadLedgerHistory, readLedgerJson, writeLedgerExports, type WrittenExports } from '@ledgerline/output';
import {
  PARSER_VERSION,
  type StatementAccount,
  type StatementDiagnostic,
  type Transaction,
} from '@ledgerline/types';

export interface RunOptions {
  outDir: string;
  verbose: boolean;
  failFast: boolean;
  cardOwners: CardOwnerLookup;
  rules: TransactionRule[];
  revolutAccount: string;
  revolutCard: string | null;
  /** Earlier JSON export to merge into this run */
  history?: string;
  readers?: StatementReaders;
}

export interface RunResult {
  exitCode: number;
  exports: WrittenExports | null;
  parseErrors: ParseError[];
  totalTransactions: number;
}

// Rules append to the user fields, so transactions restored with a category keep it as is
function uncategorized(transactions: readonly Transaction[]): Transaction[] {
  return transactions.filter((t) => t.userCategory === '' && t.userDescription === '');
}

export function describeDiagnostic(diagnostic: StatementDiagnostic, statement: StatementAccount): string {
  return `${statement.filePath}: ${diagnostic.message}`;
}

/**
 * Parse every statement under `rootDir`, categorize, sort and write the
 * exports. Returns instead of exiting so callers decide the exit code.
 */
export async function runLedger(rootDir: string, options: RunOptions): Promise<RunResult> {
  const dirPath = resolve(rootDir);

  if (options.verbose) {
    console.error(`[INFO] Directory: ${dirPath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Output directory: ${resolve(options.outDir)}`);
  }

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    console.error(`[ERROR] ${validation.error ?? `Cannot use directory: ${dirPath}`}`);
    return { exitCode: 1, exports: null, parseErrors: [], totalTransactions: 0 };
  }

  const scanResult = await scanDirectoryForStatements(dirPath);
  for (const skip of scanResult.skipped) {
    console.error(`[WARN] Skipped ${skip.fileName}: ${skip.reason}`);
  }
  if (options.verbose) {
    console.error(`[INFO] Found ${scanResult.files.length} statement file(s)`);
  }

  const ledger = new StatementLedger();
  let files = scanResult.files;

  if (options.history !== undefined) {
    const history = await loadLedgerHistory(options.history, ledger);
    for (const skipped of history.skipped) {
      console.error(`[WARN] ${options.history} record ${skipped.index}: ${skipped.reason}`);
    }
    if (options.verbose) {
      console.error(`[INFO] Restored ${history.restored.length} transaction(s) from ${options.history}`);
    }

    // Statements already in the history are not parsed again
    const known = new Set(history.restored.map((t) => t.parentStatement));
    files = files.filter((file) => {
      if (!known.has(file.filePath)) return true;
      console.error(`[WARN] Skipped ${file.fileName}: already in ${options.history}`);
      return false;
    });
  }

  const result = await processStatements(files, ledger, {
    failFast: options.failFast,
    cardOwners: options.cardOwners,
    revolutAccountPrefix: options.revolutAccount,
    revolutCardIdentifier: options.revolutCard,
    readers: options.readers,
    onProgress: (current, total, filename) => {
      if (options.verbose) {
        console.error(`[INFO] Parsing ${current}/${total}: ${filename}`);
      }
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to parse ${error.filename}: ${error.error}`);
    },
    onDiagnostic: (diagnostic, statement) => {
      console.error(`[WARN] ${describeDiagnostic(diagnostic, statement)}`);
    },
  });

  const categorized = applyRules(uncategorized(ledger.transactions), options.rules);
  const transactions = ledger.finalize();
  const exports = await writeLedgerExports(options.outDir, transactions);

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Files found:            ${result.summary.totalFilesFound}`);
  console.error(`Files succeeded:        ${result.summary.filesSucceeded}`);
  console.error(`Files failed:           ${result.summary.filesFailed}`);
  console.error(`Warnings:               ${result.summary.diagnostics}`);
  console.error(`Transactions:           ${transactions.length}`);
  console.error(`Categorized:            ${categorized.matched}`);
  console.error('================================');

  if (options.verbose) {
    console.error(`[INFO] JSON written to: ${exports.jsonPath}`);
    console.error(`[INFO] CSV written to: ${exports.csvPath}`);
  }

  return {
    exitCode: 0,
    exports,
    parseErrors: result.parseErrors,
    totalTransactions: transactions.length,
  };
}

/**
 * Rewrite the exports from an earlier JSON export alone, with the rules
 * applied again to uncategorized transactions.
 */
export async function runReexport(
  jsonFile: string,
  options: Pick<RunOptions, 'outDir' | 'verbose' | 'rules'>
): Promise<RunResult> {
  const ledger = new StatementLedger();
  const { transactions: records, skipped } = readLedgerJson(await readFile(resolve(jsonFile), 'utf-8'));
  for (const entry of skipped) {
    console.error(`[WARN] ${jsonFile} record ${entry.index}: ${entry.reason}`);
  }

  const restored = records.map((init) => ledger.restore(init));
  applyRules(uncategorized(restored), options.rules);

  const transactions = ledger.finalize();
  const exports = await writeLedgerExports(options.outDir, transactions);

  if (options.verbose) {
    console.error(`[INFO] Re-exported ${transactions.length} transaction(s)`);
    console.error(`[INFO] JSON written to: ${exports.jsonPath}`);
    console.error(`[INFO] CSV written to: ${exports.csvPath}`);
  }

  return { exitCode: 0, exports, parseErrors: [], totalTransactions: transactions.length };
}
