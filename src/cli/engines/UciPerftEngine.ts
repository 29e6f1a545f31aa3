import path from 'path';
import { UciPerftResponseParser } from '../../shared/perft/uciOutput';
import type { PerftQuery, PerftReport } from '../../shared/types/perft';
import {
  EngineBusyError,
  EngineStartupError,
  EngineTimeoutError,
  EngineTransportError,
  QueryCanceledError,
  isQueryFailure,
} from '../../shared/errors';
import { runWithTimeout } from '../../shared/utils/timeout';
import { LineReader } from '../utils/lineReader';
import { logger } from '../utils/logger';
import { spawnEngineProcess, type EngineProcess, type EngineSpawner } from './engineProcess';
import type { PerftEngine, PerftQueryOptions } from './PerftEngine';

export interface UciPerftEngineOptions {
  /** Alternate castling rules; resent before every query. */
  chess960?: boolean;
  /** Bound for spawning the engine and reading its banner; 0 means unbounded. */
  startupTimeoutMs?: number;
  spawner?: EngineSpawner;
}

interface EngineConnection {
  process: EngineProcess;
  reader: LineReader;
}

/**
 * Render the directives for one query, newline-terminated, in the order the
 * engine expects them.
 */
export function buildPerftDirectives(query: PerftQuery, chess960: boolean): string {
  let position = `position fen ${query.fen}`;
  if (query.moves.length > 0) {
    position += ` moves ${query.moves.join(' ')}`;
  }
  return [
    `setoption name UCI_Chess960 value ${chess960}`,
    position,
    `go perft ${query.depth}`,
  ]
    .map((line) => `${line}\n`)
    .join('');
}

/**
 * Backend that keeps one UCI engine process alive for the whole session and
 * asks it for `go perft` counts over stdin/stdout.
 *
 * The pipe is a strictly ordered conversation, so only one query may be in
 * flight; a concurrent call is rejected with EngineBusyError. After a timeout,
 * a cancellation or any failed exchange the stream position is unknown, so the
 * process is killed and a fresh one is spawned before the next query.
 */
export class UciPerftEngine implements PerftEngine {
  readonly name: string;

  private connection: EngineConnection | null = null;
  private busy = false;
  private disposed = false;
  private chess960: boolean;
  private readonly spawner: EngineSpawner;
  private readonly startupTimeoutMs: number;
  private readonly exitHook = () => this.killNow();

  constructor(
    private readonly command: string,
    options: UciPerftEngineOptions = {}
  ) {
    this.name = path.basename(command);
    this.chess960 = options.chess960 ?? false;
    this.spawner = options.spawner ?? spawnEngineProcess;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 0;
  }

  /**
   * Spawn the engine and consume its banner.
   *
   * @throws EngineStartupError when the executable cannot be run or exits
   * before identifying itself.
   */
  static async start(command: string, options: UciPerftEngineOptions = {}): Promise<UciPerftEngine> {
    const engine = new UciPerftEngine(command, options);
    try {
      await engine.connect(engine.startupTimeoutMs);
    } catch (error) {
      await engine.dispose();
      const reason = error instanceof Error ? error.message : String(error);
      throw new EngineStartupError(engine.name, reason, { command });
    }
    return engine;
  }

  get isChess960(): boolean {
    return this.chess960;
  }

  setChess960(enabled: boolean): void {
    this.chess960 = enabled;
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  async perft(query: PerftQuery, options: PerftQueryOptions = {}): Promise<PerftReport> {
    if (this.disposed) {
      throw new EngineTransportError(this.name, 'engine has been shut down');
    }
    if (this.busy) {
      throw new EngineBusyError(this.name);
    }
    this.busy = true;

    const timeoutMs = options.timeoutMs ?? 0;
    try {
      const outcome = await runWithTimeout(() => this.exchange(query, timeoutMs), {
        timeoutMs,
        token: options.token,
      });

      switch (outcome.kind) {
        case 'timeout':
          logger.warn('Reference engine unresponsive, discarding process', {
            engine: this.name,
            timeoutMs,
          });
          await this.discardConnection();
          throw new EngineTimeoutError(this.name, timeoutMs);
        case 'canceled':
          logger.info('Reference engine query canceled, discarding process', {
            engine: this.name,
          });
          await this.discardConnection();
          throw new QueryCanceledError(this.name, outcome.cancellationReason);
        case 'ok':
          logger.debug('Reference engine perft finished', {
            engine: this.name,
            durationMs: outcome.durationMs,
            moves: outcome.value.children.size,
            total: outcome.value.total,
          });
          return outcome.value;
      }
    } catch (error) {
      if (!isQueryFailure(error)) {
        await this.discardConnection();
        const reason = error instanceof Error ? error.message : String(error);
        throw new EngineTransportError(this.name, reason);
      }
      throw error;
    } finally {
      this.busy = false;
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    await this.discardConnection();
  }

  private async exchange(query: PerftQuery, timeoutMs: number): Promise<PerftReport> {
    const connection = this.connection ?? (await this.reconnect(timeoutMs));

    try {
      await this.write(connection, buildPerftDirectives(query, this.chess960));

      const parser = new UciPerftResponseParser(this.name);
      for (;;) {
        const line = await connection.reader.next();
        if (line === null) {
          const exit = await connection.process.exited;
          throw new EngineTransportError(this.name, 'engine closed its output', {
            exitCode: exit.code,
            signal: exit.signal,
          });
        }
        const report = parser.feed(line);
        if (report) {
          return report;
        }
      }
    } catch (error) {
      // A connection that is no longer current was discarded by a timeout, a
      // cancellation or its own exit; its failure is already reported.
      if (this.connection === connection) {
        logger.warn('Reference engine query failed, discarding process', {
          engine: this.name,
          reason: error instanceof Error ? error.message : String(error),
        });
        await this.discardConnection(connection);
      }
      throw error;
    }
  }

  private async reconnect(timeoutMs: number): Promise<EngineConnection> {
    logger.info('Respawning reference engine', { engine: this.name, command: this.command });
    try {
      return await this.connect(timeoutMs);
    } catch (error) {
      if (isQueryFailure(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new EngineTransportError(this.name, `cannot restart engine: ${reason}`, {
        command: this.command,
      });
    }
  }

  private async connect(timeoutMs: number): Promise<EngineConnection> {
    const child = this.spawner(this.command);
    const connection: EngineConnection = { process: child, reader: new LineReader(child.stdout) };
    this.connection = connection;
    process.once('exit', this.exitHook);

    void child.exited.then((exit) => {
      connection.reader.close();
      if (this.connection === connection) {
        // Died on its own; the next query spawns a replacement.
        this.connection = null;
        process.removeListener('exit', this.exitHook);
        logger.warn('Reference engine exited unexpectedly', {
          engine: this.name,
          code: exit.code,
          signal: exit.signal,
        });
      }
    });

    const outcome = await runWithTimeout(() => connection.reader.next(), { timeoutMs });
    if (outcome.kind !== 'ok' || outcome.value === null) {
      const exit = outcome.kind === 'ok' ? await child.exited : undefined;
      await this.discardConnection(connection);
      if (exit?.error) {
        throw exit.error;
      }
      throw new Error(
        outcome.kind === 'ok'
          ? `engine exited before its banner (code ${exit?.code ?? 'none'})`
          : 'no banner from engine'
      );
    }

    logger.info('Reference engine started', {
      engine: this.name,
      pid: child.pid,
      banner: outcome.value,
    });
    return connection;
  }

  private write(connection: EngineConnection, text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      connection.process.stdin.write(text, (error) => {
        if (error) {
          reject(new EngineTransportError(this.name, `cannot write to engine: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Kill the current process (or `only` that one, if it is still current) and
   * wait for it to go away.
   */
  private async discardConnection(only?: EngineConnection): Promise<void> {
    const connection = this.connection;
    if (!connection || (only && only !== connection)) {
      return;
    }
    this.connection = null;
    process.removeListener('exit', this.exitHook);

    connection.process.kill();
    connection.reader.close();
    const exit = await connection.process.exited;
    logger.debug('Reference engine process exited', {
      engine: this.name,
      code: exit.code,
      signal: exit.signal,
    });
  }

  private killNow(): void {
    this.connection?.process.kill();
  }
}
