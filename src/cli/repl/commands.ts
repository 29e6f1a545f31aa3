import { wrapError } from '../../shared/errors';
import type { PerftDiff } from '../../shared/types/perft';
import type { CancellationToken } from '../../shared/utils/cancellation';
import { renderDiff } from '../render/diffTable';
import type { PerftSession } from '../session/PerftSession';
import { logger } from '../utils/logger';

/** Anything text can be written to; a Writable stream qualifies. */
export interface TextSink {
  write(chunk: string): unknown;
}

export type CommandOutcome = 'continue' | 'exit';

export interface CommandInterpreterOptions {
  stdout: TextSink;
  stderr: TextSink;
  render?: (diff: PerftDiff) => string;
}

export interface ExecuteOptions {
  /** Cancels a running `diff`. */
  token?: CancellationToken | undefined;
}

type CommandHandler = (args: string[], options: ExecuteOptions) => Promise<void> | void;

/** Split a command line into words on runs of whitespace. */
export function tokenizeCommand(line: string): string[] {
  return line.split(/\s+/).filter((word) => word.length > 0);
}

/** Parse a non-negative decimal depth; anything else yields null. */
export function parseDepthArgument(raw: string): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const depth = Number(raw);
  return Number.isSafeInteger(depth) ? depth : null;
}

/**
 * Reads front-end commands one line at a time and applies them to a session.
 *
 * Command output goes to stdout and every error to stderr; no command error
 * ends the session, only `exit`, `quit` or the end of input do.
 */
export class CommandInterpreter {
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;
  private readonly render: (diff: PerftDiff) => string;
  private readonly handlers: ReadonlyMap<string, CommandHandler>;

  constructor(
    private readonly session: PerftSession,
    options: CommandInterpreterOptions
  ) {
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.render = options.render ?? ((diff) => renderDiff(diff));

    const toParent: CommandHandler = () => this.session.gotoParent();
    const toChild: CommandHandler = (args) => this.child(args);

    this.handlers = new Map<string, CommandHandler>([
      ['fen', (args) => this.fen(args)],
      ['moves', (args) => this.moves(args)],
      ['depth', (args) => this.depth(args)],
      ['root', () => this.session.gotoRoot()],
      ['parent', toParent],
      ['unmove', toParent],
      ['child', toChild],
      ['move', toChild],
      ['diff', (_args, options) => this.diff(options)],
      ['chess960', () => this.session.setChess960(true)],
      ['nochess960', () => this.session.setChess960(false)],
    ]);
  }

  async execute(line: string, options: ExecuteOptions = {}): Promise<CommandOutcome> {
    const [command, ...args] = tokenizeCommand(line);
    if (command === undefined) {
      return 'continue';
    }
    if (command === 'exit' || command === 'quit') {
      return 'exit';
    }

    const handler = this.handlers.get(command);
    if (!handler) {
      this.error(`unknown command "${command}"`);
      return 'continue';
    }

    try {
      await handler(args, options);
    } catch (error) {
      const wrapped = wrapError(error, { command });
      logger.debug('Command failed', { command, error: wrapped.toJSON() });
      this.error(wrapped.message);
    }
    return 'continue';
  }

  private fen(args: string[]): void {
    if (args.length === 0) {
      this.print(this.session.fen);
    } else {
      this.session.setPosition(args.join(' '));
    }
  }

  private moves(args: string[]): void {
    if (args.length === 0) {
      this.print(this.session.moves.join(' '));
    } else {
      this.session.setMoves(args);
    }
  }

  private depth(args: string[]): void {
    const [raw] = args;
    if (raw === undefined) {
      this.print(String(this.session.depth));
      return;
    }
    const depth = parseDepthArgument(raw);
    if (depth === null) {
      this.error(`cannot parse given depth: ${raw}`);
      return;
    }
    this.session.setDepth(depth);
  }

  private child(args: string[]): void {
    const [move] = args;
    if (move === undefined) {
      this.error('missing argument, expected a child move');
      return;
    }
    this.session.gotoChild(move);
  }

  private async diff(options: ExecuteOptions): Promise<void> {
    let diff: PerftDiff;
    try {
      diff = await this.session.diff({ token: options.token });
    } catch (error) {
      const wrapped = wrapError(error, { command: 'diff' });
      logger.debug('Diff failed', { error: wrapped.toJSON() });
      this.error(`cannot compute diff: ${wrapped.message}`);
      return;
    }
    this.stdout.write(this.render(diff));
  }

  private print(text: string): void {
    this.stdout.write(`${text}\n`);
  }

  private error(text: string): void {
    this.stderr.write(`${text}\n`);
  }
}
