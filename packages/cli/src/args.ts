/**
 * Command-line arguments
 */

import type { LedgerOptions } from '@txledger/ledger';
import type { AppConfig, OutputMode } from '@txledger/shared';

export const USAGE = `Usage: txledger [options] <transactions.csv>

Replays deposits, withdrawals, disputes, resolves and chargebacks and
prints account summaries as CSV on stdout.

Options:
  --stream              one summary line per applied transaction (default)
  --summary             one line per account after the whole file
  --reject-duplicates   fail deposits/withdrawals that reuse a txid
  --enforce-ownership   only the owning client may dispute a transaction
  --freeze-locked       refuse new activity on locked accounts
  -h, --help            show this help
`;

export interface CliArgs {
  inputPath: string;
  mode: OutputMode;
  ledgerOptions: Required<LedgerOptions>;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliArgs);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse argv (without node and script path). Flags override `config`.
 */
export function parseCliArgs(argv: string[], config: AppConfig): ParsedArgs {
  let mode = config.outputMode;
  const ledgerOptions: Required<LedgerOptions> = {
    duplicateTxPolicy: config.duplicateTxPolicy,
    enforceOwnership: config.enforceOwnership,
    freezeLockedAccounts: config.freezeLockedAccounts,
  };
  const positional: string[] = [];

  for (const arg of argv) {
    switch (arg) {
      case '-h':
      case '--help':
        return { help: true };
      case '--stream':
        mode = 'stream';
        break;
      case '--summary':
        mode = 'summary';
        break;
      case '--reject-duplicates':
        ledgerOptions.duplicateTxPolicy = 'reject';
        break;
      case '--enforce-ownership':
        ledgerOptions.enforceOwnership = true;
        break;
      case '--freeze-locked':
        ledgerOptions.freezeLockedAccounts = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw new UsageError('No input file provided');
  }
  if (positional.length > 1) {
    throw new UsageError(`Expected one input file, got ${positional.length}`);
  }

  return { help: false, inputPath: positional[0], mode, ledgerOptions };
}
