import type { Writable } from 'stream';
import type { SessionConfig } from '../config';
import type { EngineSpawner } from './engineProcess';
import type { PerftEngine } from './PerftEngine';
import { ScriptPerftEngine, type ScriptRunner } from './ScriptPerftEngine';
import { UciPerftEngine } from './UciPerftEngine';

export type { PerftEngine, PerftQueryOptions, Chess960Capable } from './PerftEngine';
export { supportsChess960 } from './PerftEngine';
export { ScriptPerftEngine, buildScriptArgs, execFileRunner } from './ScriptPerftEngine';
export type { ScriptRunner, ScriptRunResult } from './ScriptPerftEngine';
export { UciPerftEngine, buildPerftDirectives } from './UciPerftEngine';
export { spawnEngineProcess } from './engineProcess';
export type { EngineProcess, EngineSpawner, EngineExit } from './engineProcess';

/**
 * The two sides of a comparison. `lhs` is the engine under test, `rhs` the
 * trusted reference.
 */
export interface EnginePair {
  lhs: PerftEngine;
  rhs: PerftEngine;
}

export interface EngineFactoryDeps {
  stderr?: Writable;
  runner?: ScriptRunner;
  spawner?: EngineSpawner;
}

/**
 * Build both backends for a session. The reference engine is started eagerly
 * so a missing executable is reported before the prompt appears.
 *
 * @throws EngineStartupError
 */
export async function createEnginePair(
  sessionConfig: SessionConfig,
  deps: EngineFactoryDeps = {}
): Promise<EnginePair> {
  const lhs = new ScriptPerftEngine(sessionConfig.scriptCommand, {
    ...(deps.stderr && { stderr: deps.stderr }),
    ...(deps.runner && { runner: deps.runner }),
  });
  const rhs = await UciPerftEngine.start(sessionConfig.referenceCommand, {
    chess960: sessionConfig.chess960,
    startupTimeoutMs: sessionConfig.queryTimeoutMs,
    ...(deps.spawner && { spawner: deps.spawner }),
  });
  return { lhs, rhs };
}
