// types/tick.ts — Tick output types

import type { Position, Tick } from './core.js';
import type { RejectedAction } from './action.js';
import type { LossReason, Verdict, WorldSnapshot } from './snapshot.js';

export type TickEvent =
  | { type: 'moved'; from: Position; to: Position }
  | { type: 'lambda_collected'; position: Position; total: number }
  | { type: 'razor_picked'; position: Position; total: number }
  | { type: 'rock_pushed'; from: Position; to: Position }
  | { type: 'teleported'; from: Position; to: Position; targetId: string; cleared: Position[] }
  | { type: 'lift_opened'; position: Position }
  | { type: 'beard_cut'; positions: Position[] }
  | { type: 'beard_grown'; positions: Position[] }
  | { type: 'rock_moved'; from: Position; to: Position }
  | { type: 'lambda_crushed'; position: Position }
  | { type: 'water_rose'; level: number }
  | { type: 'loss'; reason: LossReason; position: Position }
  | { type: 'won'; position: Position };

export interface TickResult {
  tick: Tick;
  snapshot: WorldSnapshot;
  verdict: Verdict;
  rejected: RejectedAction | null;
  events: TickEvent[];
}
