export { parseCount, PerftReportBuilder, createPerftReport } from './report';
export { parseScriptOutput, splitOutputLines } from './scriptOutput';
export {
  isBlankLine,
  parseUciMoveLine,
  parseUciTotalLine,
  parseUciPerftResponse,
  UciPerftResponseParser,
} from './uciOutput';
export {
  mergePerftReports,
  isRowMismatch,
  isTotalMismatch,
  mismatchedRows,
  hasMismatch,
} from './diff';
