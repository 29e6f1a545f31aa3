#!/usr/bin/env node
import type { Readable } from 'stream';
import { isPerftError, wrapError, PerftErrorCode } from '../shared/errors';
import { USAGE, parseArgs, type ParsedCliArgs } from './args';
import { config, resolveSessionConfig, type AppConfig } from './config';
import { createEnginePair, type EngineFactoryDeps } from './engines';
import { CommandInterpreter, type TextSink } from './repl/commands';
import { runRepl, type InterruptSource } from './repl/prompt';
import { PerftSession, withPerftSession } from './session/PerftSession';
import { logger } from './utils/logger';

export interface CliIO {
  stdin: Readable & { isTTY?: boolean };
  stdout: TextSink & { isTTY?: boolean };
  stderr: TextSink & { isTTY?: boolean };
}

export interface CliDeps extends EngineFactoryDeps {
  config?: AppConfig;
  interrupts?: InterruptSource;
}

/**
 * The prompt needs an interactive stdin. It goes to stdout when that is a
 * terminal, else to stderr when that is one, else nowhere.
 */
export function selectPromptSink(io: CliIO): TextSink | undefined {
  if (io.stdin.isTTY !== true) {
    return undefined;
  }
  if (io.stdout.isTTY === true) {
    return io.stdout;
  }
  if (io.stderr.isTTY === true) {
    return io.stderr;
  }
  return undefined;
}

/**
 * Run one comparison session and resolve to the process exit status.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO,
  deps: CliDeps = {}
): Promise<number> {
  let args: ParsedCliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    const wrapped = wrapError(error);
    io.stderr.write(`${wrapped.message}\n`);
    if (wrapped.code === PerftErrorCode.USAGE_ERROR && wrapped.message !== USAGE) {
      io.stderr.write(`${USAGE}\n`);
    }
    return wrapped.exitCode;
  }

  const sessionConfig = resolveSessionConfig(
    {
      scriptCommand: args.script,
      referenceCommand: args.engine,
      queryTimeoutMs: args.timeoutMs,
      chess960: args.chess960,
    },
    deps.config ?? config
  );
  logger.debug('Session configuration resolved', { ...sessionConfig });

  try {
    const engines = await createEnginePair(sessionConfig, deps);
    const session = new PerftSession(engines, {
      queryTimeoutMs: sessionConfig.queryTimeoutMs,
      initialState: { depth: sessionConfig.defaultDepth },
    });
    const interpreter = new CommandInterpreter(session, {
      stdout: io.stdout,
      stderr: io.stderr,
    });

    await withPerftSession(session, () =>
      runRepl(interpreter, {
        input: io.stdin,
        promptSink: selectPromptSink(io),
        ...(deps.interrupts && { interrupts: deps.interrupts }),
      })
    );
    return 0;
  } catch (error) {
    const wrapped = wrapError(error);
    if (!isPerftError(error)) {
      logger.error('Unexpected failure', { error: wrapped.toJSON() });
    }
    io.stderr.write(`${wrapped.message}\n`);
    return wrapped.exitCode;
  }
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv, {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
