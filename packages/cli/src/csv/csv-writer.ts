/**
 * CSV Summary Writer
 */

import { once } from 'events';
import { formatMoney, type AccountSummary } from '@txledger/ledger';

export const SUMMARY_HEADER = 'client,available,held,total,locked';

/**
 * Format one account summary as a CSV line (no newline)
 */
export function formatSummaryLine(summary: AccountSummary): string {
  return [
    summary.client,
    formatMoney(summary.available),
    formatMoney(summary.held),
    formatMoney(summary.total),
    summary.locked,
  ].join(',');
}

/**
 * Writes summaries to a stream, header first, waiting on backpressure
 */
export class SummaryWriter {
  private headerWritten = false;
  private linesWritten = 0;

  constructor(private readonly out: NodeJS.WritableStream) {}

  get count(): number {
    return this.linesWritten;
  }

  async writeHeader(): Promise<void> {
    if (this.headerWritten) return;
    this.headerWritten = true;
    await this.writeLine(SUMMARY_HEADER);
  }

  async write(summary: AccountSummary): Promise<void> {
    await this.writeHeader();
    await this.writeLine(formatSummaryLine(summary));
    this.linesWritten++;
  }

  async writeAll(summaries: Iterable<AccountSummary>): Promise<void> {
    await this.writeHeader();
    for (const summary of summaries) {
      await this.write(summary);
    }
  }

  private async writeLine(line: string): Promise<void> {
    if (!this.out.write(`${line}\n`)) {
      await once(this.out, 'drain');
    }
  }
}
