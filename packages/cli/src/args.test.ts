import { describe, it, expect } from 'vitest';
import { loadConfig } from '@txledger/shared';
import { parseCliArgs, UsageError } from './args.js';

const config = loadConfig({});

describe('parseCliArgs', () => {
  it('should take defaults from config', () => {
    expect(parseCliArgs(['transactions.csv'], config)).toEqual({
      help: false,
      inputPath: 'transactions.csv',
      mode: 'stream',
      ledgerOptions: {
        duplicateTxPolicy: 'overwrite',
        enforceOwnership: false,
        freezeLockedAccounts: false,
      },
    });
  });

  it('should let flags override config', () => {
    const parsed = parseCliArgs(
      ['--summary', '--reject-duplicates', '--enforce-ownership', '--freeze-locked', 'in.csv'],
      config
    );

    expect(parsed).toEqual({
      help: false,
      inputPath: 'in.csv',
      mode: 'summary',
      ledgerOptions: {
        duplicateTxPolicy: 'reject',
        enforceOwnership: true,
        freezeLockedAccounts: true,
      },
    });
  });

  it('should switch back to stream mode', () => {
    const summaryConfig = loadConfig({ LEDGER_OUTPUT_MODE: 'summary' });

    expect(parseCliArgs(['--stream', 'in.csv'], summaryConfig)).toMatchObject({ mode: 'stream' });
  });

  it('should accept - for stdin', () => {
    expect(parseCliArgs(['-'], config)).toMatchObject({ inputPath: '-' });
  });

  it('should return help', () => {
    expect(parseCliArgs(['in.csv', '--help'], config)).toEqual({ help: true });
  });

  it('should reject missing, extra and unknown arguments', () => {
    expect(() => parseCliArgs([], config)).toThrow(new UsageError('No input file provided'));
    expect(() => parseCliArgs(['a.csv', 'b.csv'], config)).toThrow('Expected one input file, got 2');
    expect(() => parseCliArgs(['--verbose', 'a.csv'], config)).toThrow('Unknown option: --verbose');
  });
});
