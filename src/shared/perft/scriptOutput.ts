import { EngineProtocolError } from '../errors';
import type { PerftReport } from '../types/perft';
import { parseCount, PerftReportBuilder } from './report';

/**
 * Split process output into lines the way a line reader sees them: `\n` or
 * `\r\n` terminated, with no phantom empty line after a final terminator.
 */
export function splitOutputLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

/**
 * Parse the standard output of a perft script:
 *
 *   <move> <count>     one row per legal move
 *   <blank line>
 *   <total-count>
 *
 * Anything after the total line is ignored.
 */
export function parseScriptOutput(stdout: string, engine: string = 'script'): PerftReport {
  const lines = splitOutputLines(stdout);
  const builder = new PerftReportBuilder(engine);

  let index = 0;
  for (;;) {
    if (index >= lines.length) {
      throw new EngineProtocolError(engine, 'unexpected end of output while reading move counts', {
        linesRead: index,
      });
    }
    const line = lines[index].trim();
    index += 1;
    if (line === '') {
      break;
    }

    const [move, count] = line.split(/\s+/);
    if (count === undefined) {
      throw new EngineProtocolError(
        engine,
        `expected move and count separated by spaces, got ${JSON.stringify(line)}`,
        { line: index }
      );
    }
    builder.addChild(move, parseCount(count, engine, `count for move ${move}`));
  }

  if (index >= lines.length) {
    throw new EngineProtocolError(engine, 'unexpected end of output while reading total count', {
      linesRead: index,
    });
  }

  return builder.build(parseCount(lines[index], engine, 'total count'));
}
