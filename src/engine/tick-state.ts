// engine/tick-state.ts — Mutable working state for a single tick

import type {
  Position,
  Tick,
  Verdict,
  WorldSnapshot,
  LevelDescriptor,
  RejectedAction,
  TickEvent,
  Action,
} from '../types/index.js';
import { isTerminal } from '../types/index.js';
import type { Grid } from './grid.js';

/**
 * Scratch copy of a snapshot that the pipeline stages write into. Every stage
 * reads `grid` as it stood when the stage began and commits a replacement grid
 * when it ends; the previous snapshot is never touched.
 */
export class TickState {
  readonly level: LevelDescriptor;
  readonly tick: Tick;

  grid: Grid;
  robot: Position;
  lift: Position;
  water: number;
  airLeft: number;
  lambdasCollected: number;
  razors: number;
  targets: Map<string, Position>;
  targetSources: Map<string, Position[]>;

  verdict: Verdict;
  enteredLift = false;
  rejected: RejectedAction | null = null;
  events: TickEvent[] = [];

  constructor(snapshot: WorldSnapshot, tick: Tick) {
    this.level = snapshot.level;
    this.tick = tick;
    this.grid = snapshot.grid.clone();
    this.robot = { ...snapshot.robot };
    this.lift = snapshot.lift;
    this.water = snapshot.water;
    this.airLeft = snapshot.airLeft;
    this.lambdasCollected = snapshot.lambdasCollected;
    this.razors = snapshot.razors;
    this.targets = new Map(snapshot.targets);
    this.targetSources = new Map(
      [...snapshot.targetSources].map(([id, sources]) => [id, [...sources]]),
    );
    this.verdict = snapshot.progress;
  }

  get settled(): boolean {
    return isTerminal(this.verdict);
  }

  /** Sets a terminal verdict unless an earlier stage already did. */
  conclude(verdict: Verdict): void {
    if (this.settled) return;
    this.verdict = verdict;
  }

  toSnapshot(previous: WorldSnapshot, action: Action): WorldSnapshot {
    return {
      level: this.level,
      grid: this.grid,
      robot: this.robot,
      lift: this.lift,
      tick: this.tick,
      airLeft: this.airLeft,
      water: this.water,
      targets: this.targets,
      targetSources: this.targetSources,
      progress: this.verdict,
      lambdasCollected: this.lambdasCollected,
      razors: this.razors,
      moves: previous.moves + 1,
      history: [...previous.history, action],
    };
  }
}
