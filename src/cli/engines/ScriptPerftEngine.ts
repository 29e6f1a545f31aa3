import { execFile } from 'child_process';
import type { Writable } from 'stream';
import { parseScriptOutput } from '../../shared/perft/scriptOutput';
import type { PerftQuery, PerftReport } from '../../shared/types/perft';
import {
  EngineTimeoutError,
  EngineTransportError,
  QueryCanceledError,
} from '../../shared/errors';
import { runWithTimeout } from '../../shared/utils/timeout';
import { logger } from '../utils/logger';
import type { PerftEngine, PerftQueryOptions } from './PerftEngine';

export interface ScriptRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a program to completion and captures its output. Rejects only when the
 * program could not be run at all (or was aborted through `signal`).
 */
export type ScriptRunner = (
  command: string,
  args: readonly string[],
  options: { signal: AbortSignal }
) => Promise<ScriptRunResult>;

export interface ScriptPerftEngineOptions {
  /** Where the script's stderr is echoed. Defaults to process.stderr. */
  stderr?: Writable;
  runner?: ScriptRunner;
}

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Default runner built on execFile. A non-zero exit status is not an error
 * here: the caller decides what to do with the captured output.
 */
export const execFileRunner: ScriptRunner = (command, args, { signal }) =>
  new Promise<ScriptRunResult>((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES, killSignal: 'SIGKILL', signal },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, signal: null, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, signal: null, stdout, stderr });
          return;
        }
        if (error.signal && !signal.aborted) {
          resolve({ exitCode: null, signal: error.signal, stdout, stderr });
          return;
        }
        reject(error);
      }
    );
  });

/**
 * Build the positional arguments for one query: depth, position, and the
 * move path as a single space-joined argument when it is non-empty.
 */
export function buildScriptArgs(query: PerftQuery): string[] {
  const args = [String(query.depth), query.fen];
  if (query.moves.length > 0) {
    args.push(query.moves.join(' '));
  }
  return args;
}

/**
 * Backend that runs the user's perft script once per query.
 *
 * Each call spawns a fresh process, so there is no state shared between
 * queries.
 */
export class ScriptPerftEngine implements PerftEngine {
  readonly name = 'script';

  private readonly stderr: Writable;
  private readonly runner: ScriptRunner;
  private readonly inFlight = new Set<AbortController>();

  constructor(
    private readonly command: string,
    options: ScriptPerftEngineOptions = {}
  ) {
    this.stderr = options.stderr ?? process.stderr;
    this.runner = options.runner ?? execFileRunner;
  }

  async perft(query: PerftQuery, options: PerftQueryOptions = {}): Promise<PerftReport> {
    const args = buildScriptArgs(query);
    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? 0;

    logger.debug('Running perft script', { command: this.command, args });
    this.inFlight.add(controller);

    try {
      const outcome = await runWithTimeout(() => this.run(args, controller.signal), {
        timeoutMs,
        token: options.token,
      });

      switch (outcome.kind) {
        case 'timeout':
          controller.abort();
          logger.warn('Perft script timed out', { command: this.command, timeoutMs });
          throw new EngineTimeoutError(this.name, timeoutMs, { command: this.command });
        case 'canceled':
          controller.abort();
          throw new QueryCanceledError(this.name, outcome.cancellationReason);
        case 'ok':
          // The script shares perftree's terminal, so a Ctrl-C can kill it
          // before the token is canceled.
          if (outcome.value.signal === 'SIGINT' && options.token) {
            logger.info('Perft script interrupted', { command: this.command });
            throw new QueryCanceledError(this.name, options.token.reason ?? 'interrupted');
          }
          return this.toReport(outcome.value, outcome.durationMs);
      }
    } finally {
      this.inFlight.delete(controller);
    }
  }

  async dispose(): Promise<void> {
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async run(args: string[], signal: AbortSignal): Promise<ScriptRunResult> {
    try {
      return await this.runner(this.command, args, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new QueryCanceledError(this.name, 'engine disposed');
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Perft script could not be run', { command: this.command, reason });
      throw new EngineTransportError(this.name, `cannot run ${this.command}: ${reason}`, {
        command: this.command,
      });
    }
  }

  private toReport(result: ScriptRunResult, durationMs: number): PerftReport {
    if (result.stderr.length > 0) {
      this.stderr.write(result.stderr);
    }

    if (result.exitCode !== 0) {
      logger.warn('Perft script exited abnormally', {
        command: this.command,
        exitCode: result.exitCode,
        signal: result.signal,
      });
    }

    const report = parseScriptOutput(result.stdout, this.name);
    logger.debug('Perft script finished', {
      command: this.command,
      durationMs,
      moves: report.children.size,
      total: report.total,
    });
    return report;
  }
}
