// types/index.ts — Barrel export

export type { Tick, Position, Direction } from './core.js';
export {
  DIRECTION_DELTAS,
  offset,
  step,
  neighbors4,
  samePosition,
  positionKey,
} from './core.js';

export type { Cell, CellKind, RockKind, LiftState } from './cell.js';

export type { Action, MetaAction, RejectedAction } from './action.js';
export { ACTIONS, isMetaAction, isDirection } from './action.js';

export type { LevelDescriptor, LevelError } from './level.js';

export type { LossReason, Verdict, WorldSnapshot } from './snapshot.js';
export { RUNNING, isTerminal } from './snapshot.js';

export type { TickEvent, TickResult } from './tick.js';
