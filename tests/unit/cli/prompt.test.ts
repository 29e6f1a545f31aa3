import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { PerftEngine } from '../../../src/cli/engines';
import { CommandInterpreter } from '../../../src/cli/repl/commands';
import { PROMPT, runRepl } from '../../../src/cli/repl/prompt';
import { PerftSession } from '../../../src/cli/session/PerftSession';
import { QueryCanceledError } from '../../../src/shared/errors';
import type { PerftReport } from '../../../src/shared/types/perft';
import { FakePerftEngine } from '../../helpers/fakePerftEngine';

jest.mock('../../../src/cli/utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function setup(lhs: PerftEngine = new FakePerftEngine('script')) {
  const session = new PerftSession({ lhs, rhs: new FakePerftEngine('stockfish') });
  const out: string[] = [];
  const err: string[] = [];
  const stdout = { write: (chunk: string) => out.push(chunk) };
  const stderr = { write: (chunk: string) => err.push(chunk) };
  const interpreter = new CommandInterpreter(session, { stdout, stderr });
  const input = new PassThrough();
  const interrupts = new EventEmitter();
  return {
    session,
    interpreter,
    input,
    interrupts,
    stdout,
    stdoutText: () => out.join(''),
    stderrText: () => err.join(''),
  };
}

describe('runRepl', () => {
  it('executes commands until the end of input', async () => {
    const { interpreter, input, interrupts, stdoutText, session } = setup();
    input.end('depth 3\ndepth\n');

    await runRepl(interpreter, { input, interrupts });

    expect(session.depth).toBe(3);
    expect(stdoutText()).toBe('3\n');
  });

  it('stops at exit without reading further commands', async () => {
    const { interpreter, input, interrupts, session } = setup();
    input.end('exit\ndepth 5\n');

    await runRepl(interpreter, { input, interrupts });

    expect(session.depth).toBe(1);
  });

  it('prints the prompt before each command when interactive', async () => {
    const { interpreter, input, interrupts, stdout, stdoutText } = setup();
    input.end('depth\n');

    await runRepl(interpreter, { input, promptSink: stdout, interrupts });

    expect(stdoutText()).toBe(`${PROMPT}1\n${PROMPT}`);
  });

  it('ends the session on an interrupt at an idle prompt', async () => {
    const { interpreter, input, interrupts, stdout, stdoutText } = setup();

    const done = runRepl(interpreter, { input, promptSink: stdout, interrupts });
    interrupts.emit('SIGINT');
    await done;

    expect(stdoutText()).toBe(`${PROMPT}\n`);
    expect(interrupts.listenerCount('SIGINT')).toBe(0);
  });

  it('cancels a running diff on interrupt and keeps the session alive', async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const lhs: PerftEngine = {
      name: 'script',
      perft: (_query, options) =>
        new Promise<PerftReport>((_resolve, reject) => {
          markStarted();
          options?.token?.onCancel((reason) => reject(new QueryCanceledError('script', reason)));
        }),
      dispose: async () => undefined,
    };
    const { interpreter, input, interrupts, stdoutText, stderrText } = setup(lhs);

    const done = runRepl(interpreter, { input, interrupts });
    input.write('diff\n');
    await started;
    interrupts.emit('SIGINT');
    input.end('depth\n');
    await done;

    expect(stderrText()).toBe('cannot compute diff: script: query canceled (interrupted)\n');
    expect(stdoutText()).toBe('1\n');
  });
});
