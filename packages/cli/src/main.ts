/**
 * txledger - replay a transactions CSV and print account summaries
 *
 * Run with `npm start -- <input.csv>` (tsx loads the workspace sources).
 *
 * stdout carries the CSV output; logs go to stderr (and optionally files).
 */

import { pathToFileURL } from 'url';
import { Ledger } from '@txledger/ledger';
import { createLogger, loadConfig, loadEnvFromRoot, type Logger } from '@txledger/shared';
import { parseCliArgs, UsageError, USAGE, type CliArgs, type ParsedArgs } from './args.js';
import { openCsvSource, openStdinSource, readTransactions } from './csv/csv-reader.js';
import { SummaryWriter } from './csv/csv-writer.js';
import { replay, type ReplayReport } from './replay.js';

/**
 * Run one replay of `args.inputPath` ("-" reads stdin)
 */
export async function run(
  args: CliArgs,
  logger: Logger,
  out: NodeJS.WritableStream = process.stdout
): Promise<ReplayReport> {
  const source = args.inputPath === '-' ? openStdinSource() : openCsvSource(args.inputPath);

  const ledger = new Ledger(args.ledgerOptions);
  const writer = new SummaryWriter(out);

  try {
    return await replay(readTransactions(source.lines), ledger, writer, { mode: args.mode, logger });
  } finally {
    source.close();
  }
}

/**
 * Main entry point; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  loadEnvFromRoot();
  const config = loadConfig();

  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv, config);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const logger = createLogger({
    service: 'txledger',
    level: config.logLevel,
    file: config.logFile,
    logDir: config.logDir,
  });

  try {
    const report = await run(parsed, logger.child({ input: parsed.inputPath }));
    logger.info('Replay finished', { ...report });
    return 0;
  } catch (error) {
    logger.error('Replay failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  } finally {
    await logger.close();
  }
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
