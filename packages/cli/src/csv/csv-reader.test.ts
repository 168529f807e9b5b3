import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatMoney } from '@txledger/ledger';
import {
  CsvFormatError,
  openCsvSource,
  parseCSVLine,
  readTransactions,
  resolveColumns,
  type RowOutcome,
} from './csv-reader.js';

async function collect(rows: AsyncIterable<RowOutcome>): Promise<RowOutcome[]> {
  const result: RowOutcome[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

/** Plain view of an outcome for equality checks */
function describeOutcome(outcome: RowOutcome) {
  if (outcome.kind === 'skipped') {
    return outcome;
  }
  const { transaction } = outcome;
  return {
    line: outcome.line,
    type: transaction.type,
    client: transaction.client,
    txid: transaction.txid,
    amount: 'amount' in transaction ? formatMoney(transaction.amount) : undefined,
  };
}

describe('parseCSVLine', () => {
  it('should split and trim fields', () => {
    expect(parseCSVLine('deposit, 1, 1, 1.0')).toEqual(['deposit', '1', '1', '1.0']);
  });

  it('should keep delimiters and escaped quotes inside quoted fields', () => {
    expect(parseCSVLine('"a,b",c,"x""y"')).toEqual(['a,b', 'c', 'x"y']);
  });

  it('should keep trailing empty fields', () => {
    expect(parseCSVLine('dispute,1,1,')).toEqual(['dispute', '1', '1', '']);
  });
});

describe('resolveColumns', () => {
  it('should locate canonical column names', () => {
    expect(resolveColumns(['type', 'client', 'tx', 'amount'])).toEqual({
      type: 0,
      client: 1,
      tx: 2,
      amount: 3,
    });
  });

  it('should accept aliases in any order and case', () => {
    expect(resolveColumns(['Amount', 'TXID', 'client', 'tx_type'])).toEqual({
      type: 3,
      client: 2,
      tx: 1,
      amount: 0,
    });
  });

  it('should allow the amount column to be missing', () => {
    expect(resolveColumns(['type', 'client', 'tx']).amount).toBe(-1);
  });

  it('should reject headers without a required column', () => {
    expect(() => resolveColumns(['type', 'client', 'amount'])).toThrow(
      new CsvFormatError('Missing column(s) tx in header: type, client, amount')
    );
  });
});

describe('readTransactions', () => {
  it('should yield transactions and skipped rows in file order', async () => {
    const rows = await collect(
      readTransactions([
        'type, client, tx, amount',
        'deposit, 1, 1, 1.0',
        '',
        'withdraw,2,5,0.5',
        'dispute,1,1,',
        'deposit,1,3,',
        'chargeback,1,1,99',
      ])
    );

    expect(rows.map(describeOutcome)).toEqual([
      { line: 2, type: 'deposit', client: 1, txid: 1, amount: '1' },
      { line: 4, type: 'withdrawal', client: 2, txid: 5, amount: '0.5' },
      { line: 5, type: 'dispute', client: 1, txid: 1, amount: undefined },
      { kind: 'skipped', line: 6, reason: 'amount: amount is required for deposit' },
      { line: 7, type: 'chargeback', client: 1, txid: 1, amount: undefined },
    ]);
  });

  it('should skip unknown transaction types', async () => {
    const [row] = await collect(readTransactions(['type,client,tx,amount', 'transfer,1,1,5']));

    expect(row?.kind).toBe('skipped');
    if (row?.kind === 'skipped') {
      expect(row.reason).toMatch(/^type: /);
    }
  });

  it('should skip out-of-range ids and negative amounts', async () => {
    const rows = await collect(
      readTransactions([
        'type,client,tx,amount',
        'deposit,65536,1,1',
        'deposit,1,4294967296,1',
        'deposit,1,2,-1',
        'deposit,65535,4294967295,1',
      ])
    );

    expect(rows.map((r) => (r.kind === 'skipped' ? r.reason.split(':')[0] : r.kind))).toEqual([
      'client',
      'tx',
      'amount',
      'transaction',
    ]);
  });

  it('should skip amounts too precise to hold exactly', async () => {
    const amount = '0.' + '0'.repeat(100) + '1';
    const rows = await collect(
      readTransactions(['type,client,tx,amount', 'deposit,1,1,1', `deposit,1,2,${amount}`])
    );

    expect(rows.map(describeOutcome)).toEqual([
      { line: 2, type: 'deposit', client: 1, txid: 1, amount: '1' },
      { kind: 'skipped', line: 3, reason: 'amount: amount exceeds 28 digits of precision' },
    ]);
  });

  it('should read files without an amount column', async () => {
    const rows = await collect(readTransactions(['type,client,tx', 'resolve,1,2']));

    expect(rows.map(describeOutcome)).toEqual([
      { line: 2, type: 'resolve', client: 1, txid: 2, amount: undefined },
    ]);
  });

  it('should ignore a byte order mark before the header', async () => {
    const rows = await collect(readTransactions(['\uFEFFtype,client,tx,amount', 'deposit,1,1,2']));

    expect(rows).toHaveLength(1);
    expect(rows[0]?.kind).toBe('transaction');
  });

  it('should fail on empty input', async () => {
    await expect(collect(readTransactions(['', '  ']))).rejects.toThrow('CSV input is empty');
  });
});

describe('openCsvSource', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'txledger-reader-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should stream lines from a file with CRLF endings', async () => {
    const file = path.join(dir, 'input.csv');
    fs.writeFileSync(file, 'type,client,tx,amount\r\ndeposit,1,1,1.5\r\n');

    const source = openCsvSource(file);
    const rows = await collect(readTransactions(source.lines));
    source.close();

    expect(rows.map(describeOutcome)).toEqual([
      { line: 2, type: 'deposit', client: 1, txid: 1, amount: '1.5' },
    ]);
    expect(source.input.destroyed).toBe(true);
  });

  it('should release the file when reading stops at a bad header', async () => {
    const file = path.join(dir, 'bad-header.csv');
    fs.writeFileSync(file, 'type,client,amount\ndeposit,1,1.5\n');

    const source = openCsvSource(file);
    try {
      await expect(collect(readTransactions(source.lines))).rejects.toThrow(CsvFormatError);
    } finally {
      source.close();
    }

    expect(source.input.destroyed).toBe(true);
  });

  it('should throw for a missing file', () => {
    const file = path.join(dir, 'missing.csv');

    expect(() => openCsvSource(file)).toThrow(`CSV file not found: ${file}`);
  });
});
