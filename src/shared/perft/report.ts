import { EngineProtocolError } from '../errors';
import type { MoveToken, PerftReport } from '../types/perft';

const COUNT_PATTERN = /^\d+$/;

/**
 * Parse a decimal node count. Anything other than a plain run of digits is a
 * protocol violation attributed to `engine`.
 */
export function parseCount(raw: string | undefined, engine: string, what: string): bigint {
  const text = raw?.trim();
  if (!text) {
    throw new EngineProtocolError(engine, `missing ${what}`);
  }
  if (!COUNT_PATTERN.test(text)) {
    throw new EngineProtocolError(engine, `invalid ${what} ${JSON.stringify(text)}`, {
      value: text,
    });
  }
  return BigInt(text);
}

/**
 * Accumulates child rows while a backend response is being read and seals them
 * into an immutable {@link PerftReport}.
 */
export class PerftReportBuilder {
  private readonly children = new Map<MoveToken, bigint>();

  constructor(private readonly engine: string) {}

  get size(): number {
    return this.children.size;
  }

  addChild(move: MoveToken, count: bigint): this {
    if (this.children.has(move)) {
      throw new EngineProtocolError(this.engine, `duplicate move ${JSON.stringify(move)}`, {
        move,
      });
    }
    this.children.set(move, count);
    return this;
  }

  build(total: bigint): PerftReport {
    return createPerftReport(total, this.children);
  }
}

export function createPerftReport(
  total: bigint,
  children: Iterable<readonly [MoveToken, bigint]>
): PerftReport {
  return Object.freeze({
    total,
    children: new Map(children),
  });
}
