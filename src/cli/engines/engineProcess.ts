import { spawn } from 'child_process';
import type { Readable, Writable } from 'stream';
import { logger } from '../utils/logger';

export interface EngineExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned or its pipes failed. */
  error?: Error | undefined;
}

/**
 * The slice of a child process the persistent engine relies on. Kept narrow so
 * tests can substitute an in-process fake.
 */
export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly pid: number | undefined;
  /** Settles once the process is gone and its stdout has closed. Never rejects. */
  readonly exited: Promise<EngineExit>;
  /** Forcibly terminate the process. Synchronous so it can run in exit hooks. */
  kill(): void;
}

export type EngineSpawner = (command: string) => EngineProcess;

/**
 * Spawn `command` with piped stdin/stdout; stderr is inherited so engine
 * diagnostics reach the terminal unchanged. The engine gets its own process
 * group so a Ctrl-C at the terminal reaches only perftree.
 */
export const spawnEngineProcess: EngineSpawner = (command) => {
  const child = spawn(command, [], { stdio: ['pipe', 'pipe', 'inherit'], detached: true });

  const exited = new Promise<EngineExit>((resolve) => {
    let spawnError: Error | undefined;
    child.once('error', (error) => {
      spawnError = error;
      // A failed spawn may never emit 'close'.
      if (child.pid === undefined) {
        resolve({ code: null, signal: null, error });
      }
    });
    child.once('close', (code, signal) => {
      resolve({ code, signal, error: spawnError });
    });
  });

  child.stdin.on('error', (error) => {
    logger.debug('Engine stdin error', { command, error });
  });

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    get pid() {
      return child.pid;
    },
    exited,
    kill() {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
    },
  };
};
