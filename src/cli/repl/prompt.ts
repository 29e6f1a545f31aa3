import type { Readable } from 'stream';
import { createCancellationSource, type CancellationSource } from '../../shared/utils/cancellation';
import { LineReader } from '../utils/lineReader';
import { logger } from '../utils/logger';
import type { CommandInterpreter, TextSink } from './commands';

export const PROMPT = '> ';

/** Where interrupt notifications come from; `process` in production. */
export interface InterruptSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

export interface ReplOptions {
  input: Readable;
  /** Where {@link PROMPT} is printed before each command; omitted means no prompt. */
  promptSink?: TextSink | undefined;
  interrupts?: InterruptSource;
}

/**
 * Feed input lines to the interpreter until `exit`, `quit`, end of input or
 * an interrupt at an idle prompt. An interrupt while a command is running
 * cancels that command instead.
 */
export async function runRepl(interpreter: CommandInterpreter, options: ReplOptions): Promise<void> {
  const reader = new LineReader(options.input);
  const interrupts: InterruptSource = options.interrupts ?? process;
  let running: CancellationSource | null = null;

  const onInterrupt = (): void => {
    if (running) {
      logger.info('Interrupt received, canceling running command');
      running.cancel('interrupted');
    } else {
      logger.info('Interrupt received at idle prompt, ending session');
      options.promptSink?.write('\n');
      reader.close();
    }
  };
  interrupts.on('SIGINT', onInterrupt);

  try {
    for (;;) {
      options.promptSink?.write(PROMPT);
      const line = await reader.next();
      if (line === null) {
        break;
      }

      const source = createCancellationSource();
      running = source;
      try {
        if ((await interpreter.execute(line, { token: source.token })) === 'exit') {
          break;
        }
      } finally {
        running = null;
      }
    }
  } finally {
    interrupts.removeListener('SIGINT', onInterrupt);
    reader.close();
  }
}
