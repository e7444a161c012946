import type { StatementAccount, StatementDiagnostic } from '@ledgerline/types';
import type { StatementFileInfo } from './directory-scanner.js';
import type { CardOwnerLookup } from './kinds/types.js';
import type { StatementLedger } from './ledger/ledger.js';
import { loadStatement, type StatementReaders } from './statement/statement-account.js';

export interface ParseError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchProcessResult {
  statements: StatementAccount[];
  totalStatements: number;
  totalTransactions: number;
  parseErrors: ParseError[];
  summary: {
    totalFilesFound: number;
    filesSucceeded: number;
    filesFailed: number;
    diagnostics: number;
  };
}

export interface BatchProcessOptions {
  /** Stop at the first file that fails instead of recording it */
  failFast?: boolean;
  cardOwners?: CardOwnerLookup;
  revolutAccountPrefix?: string;
  revolutCardIdentifier?: string | null;
  readers?: StatementReaders;
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
  onDiagnostic?: (diagnostic: StatementDiagnostic, statement: StatementAccount) => void;
}

/**
 * Parses statement files into the ledger.
 *
 * Processing is sequential so ids are handed out in file order. A statement
 * joins the ledger only after it parsed completely; a file that throws is
 * recorded as a {@link ParseError} and the batch moves on.
 */
export async function processStatements(
  files: StatementFileInfo[],
  ledger: StatementLedger,
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const statements: StatementAccount[] = [];
  const parseErrors: ParseError[] = [];
  let diagnostics = 0;

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    let statement: StatementAccount;
    try {
      statement = await loadStatement(file.filePath, {
        nextId: ledger.nextId,
        cardOwners: options.cardOwners,
        revolutAccountPrefix: options.revolutAccountPrefix,
        revolutCardIdentifier: options.revolutCardIdentifier,
        readers: options.readers,
      });
    } catch (error) {
      if (options.failFast === true) {
        throw error;
      }
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);
      options.onError?.(parseError);
      continue;
    }

    ledger.commit(statement);
    statements.push(statement);
    diagnostics += statement.diagnostics.length;
    for (const diagnostic of statement.diagnostics) {
      options.onDiagnostic?.(diagnostic, statement);
    }
  }

  return {
    statements,
    totalStatements: statements.length,
    totalTransactions: statements.reduce((sum, s) => sum + s.transactions.length, 0),
    parseErrors,
    summary: {
      totalFilesFound: files.length,
      filesSucceeded: statements.length,
      filesFailed: parseErrors.length,
      diagnostics,
    },
  };
}

/**
 * Creates a structured parse error from an exception.
 */
function createParseError(file: StatementFileInfo, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
