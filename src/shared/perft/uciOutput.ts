import { EngineProtocolError } from '../errors';
import type { MoveToken, PerftReport } from '../types/perft';
import { parseCount, PerftReportBuilder } from './report';
import { splitOutputLines } from './scriptOutput';

const FIELD_SEPARATOR = ': ';

export function isBlankLine(line: string): boolean {
  return line.trim() === '';
}

/**
 * Parse one `<move>: <count>` row of a `go perft` response.
 */
export function parseUciMoveLine(line: string, engine: string): [MoveToken, bigint] {
  const [move, count] = line.trim().split(FIELD_SEPARATOR);
  if (!move || count === undefined) {
    throw new EngineProtocolError(
      engine,
      `expected "<move>: <count>", got ${JSON.stringify(line.trim())}`
    );
  }
  return [move, parseCount(count, engine, `count for move ${move}`)];
}

/**
 * Parse the summary line that follows the move rows, e.g. `Nodes searched: 39`.
 * The count is the last `": "`-separated field; the line must carry a label.
 */
export function parseUciTotalLine(line: string, engine: string): bigint {
  const fields = line.trim().split(FIELD_SEPARATOR);
  if (fields.length < 2) {
    throw new EngineProtocolError(
      engine,
      `expected "<label>: <total>", got ${JSON.stringify(line.trim())}`
    );
  }
  return parseCount(fields[fields.length - 1], engine, 'total count');
}

type ParserPhase = 'children' | 'total' | 'trailer' | 'done';

/**
 * Incremental parser for one `go perft` response. Lines are fed one at a time
 * as they arrive from the engine; `feed` returns the report once the trailing
 * separator line has been consumed, leaving the stream aligned for the next
 * request.
 */
export class UciPerftResponseParser {
  private phase: ParserPhase = 'children';
  private readonly builder: PerftReportBuilder;
  private total: bigint | undefined;

  constructor(private readonly engine: string) {
    this.builder = new PerftReportBuilder(engine);
  }

  get isComplete(): boolean {
    return this.phase === 'done';
  }

  feed(line: string): PerftReport | undefined {
    switch (this.phase) {
      case 'children':
        if (isBlankLine(line)) {
          this.phase = 'total';
        } else {
          const [move, count] = parseUciMoveLine(line, this.engine);
          this.builder.addChild(move, count);
        }
        return undefined;
      case 'total':
        this.total = parseUciTotalLine(line, this.engine);
        this.phase = 'trailer';
        return undefined;
      case 'trailer':
        this.phase = 'done';
        return this.builder.build(this.total ?? 0n);
      case 'done':
        throw new EngineProtocolError(this.engine, 'response already complete');
    }
  }
}

/**
 * Parse a complete, already-buffered `go perft` response.
 */
export function parseUciPerftResponse(text: string, engine: string = 'engine'): PerftReport {
  const parser = new UciPerftResponseParser(engine);
  for (const line of splitOutputLines(text)) {
    const report = parser.feed(line);
    if (report) {
      return report;
    }
  }
  throw new EngineProtocolError(engine, 'truncated perft response');
}
