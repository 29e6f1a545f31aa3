import { UsageError } from '../shared/errors';

export const USAGE = 'Usage: perftree <script>';

export interface ParsedCliArgs {
  script: string;
  engine?: string;
  timeoutMs?: number;
  chess960?: boolean;
}

const VALUE_OPTIONS = new Set(['engine', 'timeout-ms']);
const FLAG_OPTIONS = new Set(['chess960']);

/**
 * Parse `perftree <script> [--engine <cmd>] [--timeout-ms <n>] [--chess960]`.
 *
 * Options take their value either inline (`--engine=stockfish`) or as the next
 * argument.
 *
 * @param argv - full process.argv; the first two entries are skipped
 * @throws UsageError
 */
export function parseArgs(argv: readonly string[]): ParsedCliArgs {
  const options = new Map<string, string | true>();
  const positionals: string[] = [];

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (raw === undefined) continue;
    if (!raw.startsWith('--')) {
      positionals.push(raw);
      continue;
    }

    const eqIndex = raw.indexOf('=');
    const key = eqIndex === -1 ? raw.slice(2) : raw.slice(2, eqIndex);

    if (FLAG_OPTIONS.has(key)) {
      if (eqIndex !== -1) {
        throw new UsageError(`option --${key} takes no value`);
      }
      options.set(key, true);
    } else if (VALUE_OPTIONS.has(key)) {
      let value: string | undefined;
      if (eqIndex !== -1) {
        value = raw.slice(eqIndex + 1);
      } else {
        value = argv[i + 1];
        i += 1;
      }
      if (value === undefined || value.length === 0) {
        throw new UsageError(`missing value for --${key}`);
      }
      options.set(key, value);
    } else {
      throw new UsageError(`unknown option --${key}`);
    }
  }

  const [script, ...extra] = positionals;
  if (script === undefined) {
    throw new UsageError(USAGE);
  }
  if (extra.length > 0) {
    throw new UsageError(`unexpected argument "${extra[0]}"`);
  }

  const result: ParsedCliArgs = { script };

  const engine = options.get('engine');
  if (typeof engine === 'string') {
    result.engine = engine;
  }

  const timeout = options.get('timeout-ms');
  if (typeof timeout === 'string') {
    if (!/^\d+$/.test(timeout)) {
      throw new UsageError(`invalid --timeout-ms value "${timeout}"`);
    }
    result.timeoutMs = Number(timeout);
  }

  if (options.get('chess960') === true) {
    result.chess960 = true;
  }

  return result;
}
