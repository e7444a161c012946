/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { PARSER_VERSION } from '@ledgerline/types';
import { envBool, loadCardOwners, loadRulesFile } from './config.js';
import { runLedger, runReexport, type RunResult } from './run.js';

const program = new Command();

function reportFailure(error: unknown, verbose: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}

function finish(result: RunResult): void {
  if (result.exitCode !== 0) {
    process.exitCode = result.exitCode;
  }
}

program
  .name('ledgerline')
  .description('Extract transactions from ČSOB and Česká spořitelna PDF statements and Revolut CSV exports')
  .version(PARSER_VERSION)
  .argument('<root-dir>', 'Directory searched recursively for .pdf and .csv statements')
  .option('-o, --out-dir <directory>', 'Directory the transactions.json and transactions.csv exports are written to', process.env['LEDGER_OUT_DIR'] ?? '.')
  .option('-r, --rules <file>', 'JSON file with categorization rules', process.env['LEDGER_RULES_FILE'])
  .option('--card-owners <file>', 'JSON file mapping last four card digits to the card owner', process.env['LEDGER_CARD_OWNERS_FILE'])
  .option('--revolut-account <account>', 'Revolut account number the CSV currency is appended to', process.env['LEDGER_REVOLUT_ACCOUNT'] ?? '')
  .option('--revolut-card <digits>', 'Last four digits of the Revolut card', process.env['LEDGER_REVOLUT_CARD'])
  .option('--history <file>', 'Earlier JSON export to merge into this run', process.env['LEDGER_HISTORY_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGER_VERBOSE', false))
  .option('--fail-fast', 'Stop at the first statement that fails to parse', envBool('LEDGER_FAIL_FAST', false))
  .action(async (rootDir: string, options: {
    outDir: string;
    rules?: string;
    cardOwners?: string;
    revolutAccount: string;
    revolutCard?: string;
    history?: string;
    verbose: boolean;
    failFast: boolean;
  }) => {
    try {
      const result = await runLedger(rootDir, {
        outDir: options.outDir,
        verbose: options.verbose,
        failFast: options.failFast,
        cardOwners: await loadCardOwners(options.cardOwners),
        rules: await loadRulesFile(options.rules),
        revolutAccount: options.revolutAccount,
        revolutCard: options.revolutCard ?? null,
        history: options.history,
      });
      finish(result);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

// Reexport subcommand
program
  .command('reexport')
  .description('Rewrite the JSON and CSV exports from an earlier JSON export')
  .argument('<json-file>', 'Earlier transactions.json export')
  .option('-o, --out-dir <directory>', 'Output directory', process.env['LEDGER_OUT_DIR'] ?? '.')
  .option('-r, --rules <file>', 'JSON file with categorization rules', process.env['LEDGER_RULES_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGER_VERBOSE', false))
  .action(async (jsonFile: string, options: { outDir: string; rules?: string; verbose: boolean }) => {
    try {
      const result = await runReexport(jsonFile, {
        outDir: options.outDir,
        verbose: options.verbose,
        rules: await loadRulesFile(options.rules),
      });
      finish(result);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

await program.parseAsync();
