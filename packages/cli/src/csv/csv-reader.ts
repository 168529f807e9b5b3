/**
 * CSV Transaction Reader
 *
 * Turns CSV lines into ledger transactions, one row at a time and in file
 * order. Columns are matched by header name; rows that fail validation are
 * yielded as skipped so the caller decides what to report.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import type { Readable } from 'stream';
import { TransactionRowSchema, type TransactionRow, type TransactionRowInput } from '@txledger/shared';
import { toMoney, type LedgerTransaction } from '@txledger/ledger';

/**
 * Canonical column names and the header spellings accepted for each
 */
const COLUMN_ALIASES = {
  type: ['type', 'tx_type'],
  client: ['client'],
  tx: ['tx', 'txid'],
  amount: ['amount'],
} as const;

type ColumnName = keyof typeof COLUMN_ALIASES;

const REQUIRED_COLUMNS: readonly ColumnName[] = ['type', 'client', 'tx'];

export interface ColumnIndices {
  type: number;
  client: number;
  tx: number;
  /** -1 when the file has no amount column */
  amount: number;
}

export type RowOutcome =
  | { kind: 'transaction'; line: number; transaction: LedgerTransaction }
  | { kind: 'skipped'; line: number; reason: string };

/**
 * Raised when the input cannot be read as transaction CSV at all
 */
export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvFormatError';
  }
}

/**
 * Parse a CSV line handling quoted values ("" inside quotes is a literal quote)
 */
export function parseCSVLine(line: string, delimiter = ','): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Locate each column in the header row
 */
export function resolveColumns(headers: string[]): ColumnIndices {
  const lower = headers.map((h) => h.trim().toLowerCase());
  const find = (column: ColumnName): number => {
    const aliases: readonly string[] = COLUMN_ALIASES[column];
    return lower.findIndex((h) => aliases.includes(h));
  };

  const indices: ColumnIndices = {
    type: find('type'),
    client: find('client'),
    tx: find('tx'),
    amount: find('amount'),
  };

  const missing = REQUIRED_COLUMNS.filter((column) => indices[column] === -1);
  if (missing.length > 0) {
    throw new CsvFormatError(
      `Missing column(s) ${missing.join(', ')} in header: ${headers.join(', ')}`
    );
  }

  return indices;
}

function toLedgerTransaction(row: TransactionRow): LedgerTransaction {
  switch (row.type) {
    case 'deposit':
    case 'withdrawal':
      return { type: row.type, txid: row.tx, client: row.client, amount: toMoney(row.amount) };
    default:
      return { type: row.type, txid: row.tx, client: row.client };
  }
}

/**
 * Validate one data row against the resolved columns
 */
export function parseRow(values: string[], columns: ColumnIndices, line: number): RowOutcome {
  const input: TransactionRowInput = {
    type: values[columns.type] ?? '',
    client: values[columns.client] ?? '',
    tx: values[columns.tx] ?? '',
    amount: columns.amount === -1 ? undefined : values[columns.amount],
  };

  const parsed = TransactionRowSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return { kind: 'skipped', line, reason };
  }

  return { kind: 'transaction', line, transaction: toLedgerTransaction(parsed.data) };
}

/**
 * Read transactions from CSV lines. The first non-blank line is the header.
 */
export async function* readTransactions(
  lines: AsyncIterable<string> | Iterable<string>
): AsyncGenerator<RowOutcome> {
  let columns: ColumnIndices | null = null;
  let lineNumber = 0;

  for await (const raw of lines) {
    lineNumber++;
    const line = lineNumber === 1 ? raw.replace(/^\uFEFF/, '') : raw;

    if (line.trim().length === 0) {
      continue;
    }

    const values = parseCSVLine(line);

    if (!columns) {
      columns = resolveColumns(values);
      continue;
    }

    yield parseRow(values, columns, lineNumber);
  }

  if (!columns) {
    throw new CsvFormatError('CSV input is empty');
  }
}

/**
 * Lines of a CSV input together with the stream they are read from
 */
export interface CsvSource {
  lines: readline.Interface;
  input: Readable;
  /** Stop reading. Inputs opened here are destroyed; stdin is left open. */
  close(): void;
}

function createSource(input: Readable, ownsInput: boolean): CsvSource {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  return {
    lines,
    input,
    close() {
      lines.close();
      if (ownsInput) {
        input.destroy();
      }
    },
  };
}

/**
 * Open a CSV file as a stream of lines
 */
export function openCsvSource(filePath: string): CsvSource {
  const absolutePath = path.isAbsolute(filePath)
    ? filePath
    : path.join(process.cwd(), filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new CsvFormatError(`CSV file not found: ${absolutePath}`);
  }

  return createSource(fs.createReadStream(absolutePath, { encoding: 'utf-8' }), true);
}

/**
 * Read CSV lines from process stdin
 */
export function openStdinSource(): CsvSource {
  return createSource(process.stdin, false);
}
