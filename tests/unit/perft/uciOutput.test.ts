import {
  UciPerftResponseParser,
  isBlankLine,
  parseUciMoveLine,
  parseUciPerftResponse,
  parseUciTotalLine,
} from '../../../src/shared/perft/uciOutput';

describe('UCI perft response parsing', () => {
  describe('isBlankLine', () => {
    it('treats whitespace-only lines as blank', () => {
      expect(isBlankLine('')).toBe(true);
      expect(isBlankLine('  \t')).toBe(true);
      expect(isBlankLine('a2a3: 1')).toBe(false);
    });
  });

  describe('parseUciMoveLine', () => {
    it('splits on the first colon-space', () => {
      expect(parseUciMoveLine('a2a3: 380', 'stockfish')).toEqual(['a2a3', 380n]);
      expect(parseUciMoveLine('  e7e8q: 12  ', 'stockfish')).toEqual(['e7e8q', 12n]);
    });

    it('rejects rows without a separator', () => {
      expect(() => parseUciMoveLine('a2a3 380', 'stockfish')).toThrow(
        'stockfish: expected "<move>: <count>", got "a2a3 380"'
      );
    });

    it('rejects non-numeric counts', () => {
      expect(() => parseUciMoveLine('a2a3: lots', 'stockfish')).toThrow(
        'stockfish: invalid count for move a2a3 "lots"'
      );
    });
  });

  describe('parseUciTotalLine', () => {
    it('takes the last field after the label', () => {
      expect(parseUciTotalLine('Nodes searched: 39', 'stockfish')).toBe(39n);
    });

    it('requires a label', () => {
      expect(() => parseUciTotalLine('39', 'stockfish')).toThrow(
        'stockfish: expected "<label>: <total>", got "39"'
      );
    });

    it('rejects a non-numeric total', () => {
      expect(() => parseUciTotalLine('Nodes searched: many', 'stockfish')).toThrow(
        'stockfish: invalid total count "many"'
      );
    });
  });

  describe('UciPerftResponseParser', () => {
    it('returns the report only once the trailing line is consumed', () => {
      const parser = new UciPerftResponseParser('stockfish');

      expect(parser.feed('a2a3: 20')).toBeUndefined();
      expect(parser.feed('b2b3: 19')).toBeUndefined();
      expect(parser.feed('')).toBeUndefined();
      expect(parser.feed('Nodes searched: 39')).toBeUndefined();
      expect(parser.isComplete).toBe(false);

      const report = parser.feed('');
      expect(parser.isComplete).toBe(true);
      expect(report?.total).toBe(39n);
      expect(report?.children.get('a2a3')).toBe(20n);
      expect(report?.children.get('b2b3')).toBe(19n);
    });

    it('rejects lines after completion', () => {
      const parser = new UciPerftResponseParser('stockfish');
      for (const line of ['', 'Nodes searched: 0']) {
        parser.feed(line);
      }
      parser.feed('');

      expect(() => parser.feed('a2a3: 1')).toThrow('stockfish: response already complete');
    });

    it('rejects duplicate rows', () => {
      const parser = new UciPerftResponseParser('stockfish');
      parser.feed('a2a3: 1');

      expect(() => parser.feed('a2a3: 1')).toThrow('stockfish: duplicate move "a2a3"');
    });
  });

  describe('parseUciPerftResponse', () => {
    it('reads the total from the summary line', () => {
      const report = parseUciPerftResponse('e2e4: 20\ne2e3: 19\n\nNodes searched: 39\n\n');

      expect(report.total).toBe(39n);
      expect([...report.children.entries()]).toEqual([
        ['e2e4', 20n],
        ['e2e3', 19n],
      ]);
    });

    it('parses a buffered response', () => {
      const report = parseUciPerftResponse('a2a3: 1\nb2b3: 1\n\nNodes searched: 2\n\n');

      expect(report.total).toBe(2n);
      expect(report.children.size).toBe(2);
    });

    it('rejects a truncated response', () => {
      expect(() => parseUciPerftResponse('a2a3: 1\n\nNodes searched: 1\n', 'stockfish')).toThrow(
        'stockfish: truncated perft response'
      );
    });
  });
});
