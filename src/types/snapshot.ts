// types/snapshot.ts — One frame of the simulated world

import type { Position, Tick } from './core.js';
import type { Action } from './action.js';
import type { LevelDescriptor } from './level.js';
import type { Grid } from '../engine/grid.js';

export type LossReason = 'crushed_by_rock' | 'drowned';

export type Verdict =
  | { state: 'running' }
  | { state: 'win' }
  | { state: 'loss'; reason: LossReason }
  | { state: 'abort' }
  | { state: 'restart' }
  | { state: 'skip' };

export const RUNNING: Verdict = { state: 'running' };

export function isTerminal(verdict: Verdict): boolean {
  return verdict.state !== 'running';
}

export interface WorldSnapshot {
  readonly level: LevelDescriptor;
  readonly grid: Grid;
  readonly robot: Position;
  readonly lift: Position;
  readonly tick: Tick;
  /** Ticks the robot can still spend under water. */
  readonly airLeft: number;
  /** Highest flooded row; 0 means dry. */
  readonly water: number;
  /** Target id → position of the target cell. */
  readonly targets: ReadonlyMap<string, Position>;
  /** Target id → positions of every trampoline leading to it. */
  readonly targetSources: ReadonlyMap<string, readonly Position[]>;
  readonly progress: Verdict;
  readonly lambdasCollected: number;
  readonly razors: number;
  readonly moves: number;
  /** Every requested action, in order. Replay only; the engine never reads it. */
  readonly history: readonly Action[];
}
