/**
 * Replay
 *
 * Feeds transaction rows to a Ledger in order and writes summaries in the
 * selected output mode. Ledger failures and bad rows are logged, never fatal.
 */

import {
  ContractViolationError,
  describeLedgerError,
  formatMoney,
  type AccountSummary,
  type Ledger,
} from '@txledger/ledger';
import type { Logger, OutputMode } from '@txledger/shared';
import type { RowOutcome } from './csv/csv-reader.js';
import type { SummaryWriter } from './csv/csv-writer.js';

export interface ReplayReport {
  /** Data rows read (excluding header and blank lines) */
  rows: number;
  applied: number;
  rejected: number;
  skipped: number;
  /** Rows that broke a ledger contract and were left unapplied */
  violations: number;
  /** Summary lines written */
  written: number;
}

export interface ReplayOptions {
  mode: OutputMode;
  logger: Logger;
}

/**
 * Replay every row into the ledger
 */
export async function replay(
  rows: AsyncIterable<RowOutcome>,
  ledger: Ledger,
  writer: SummaryWriter,
  options: ReplayOptions
): Promise<ReplayReport> {
  const { mode, logger } = options;
  const report: ReplayReport = { rows: 0, applied: 0, rejected: 0, skipped: 0, violations: 0, written: 0 };

  const onLocked = (summary: AccountSummary) => {
    logger.info('Account locked', { client: summary.client, total: formatMoney(summary.total) });
  };
  ledger.on('account:locked', onLocked);

  try {
    await writer.writeHeader();

    for await (const row of rows) {
      report.rows++;

      if (row.kind === 'skipped') {
        report.skipped++;
        logger.warn('Skipping invalid row', { line: row.line, reason: row.reason });
        continue;
      }

      const { transaction } = row;
      try {
        const result = ledger.apply(transaction);

        if (!result.ok) {
          report.rejected++;
          logger.debug('Transaction rejected', {
            line: row.line,
            type: transaction.type,
            txid: transaction.txid,
            client: transaction.client,
            code: result.error.code,
            reason: describeLedgerError(result.error),
          });
          continue;
        }

        report.applied++;
        if (mode === 'stream') {
          await writer.write(result.value);
        }
      } catch (error) {
        if (!(error instanceof ContractViolationError)) {
          throw error;
        }
        // The ledger checks before it mutates, so the row simply did not apply
        report.violations++;
        logger.error('Ledger contract violated', {
          line: row.line,
          type: transaction.type,
          txid: transaction.txid,
          client: transaction.client,
          error: error.message,
        });
      }
    }

    if (mode === 'summary') {
      await writer.writeAll(ledger.listAccounts());
    }
  } finally {
    ledger.off('account:locked', onLocked);
  }

  report.written = writer.count;
  return report;
}
