/**
 * @txledger/cli - CSV adapter and command-line entry point
 */

export { main, run } from './main.js';
export { replay, type ReplayReport, type ReplayOptions } from './replay.js';
export { parseCliArgs, UsageError, USAGE, type CliArgs, type ParsedArgs } from './args.js';
export {
  readTransactions,
  openCsvSource,
  openStdinSource,
  parseCSVLine,
  parseRow,
  resolveColumns,
  CsvFormatError,
  type ColumnIndices,
  type CsvSource,
  type RowOutcome,
} from './csv/csv-reader.js';
export { SummaryWriter, formatSummaryLine, SUMMARY_HEADER } from './csv/csv-writer.js';
