// types/level.ts — Static level description produced by the loader

import type { Grid } from '../engine/grid.js';

export interface LevelDescriptor {
  readonly name: string;
  readonly grid: Grid;
  /** Trampoline id → target id. Several trampolines may share one target. */
  readonly trampolines: ReadonlyMap<string, string>;
  readonly growthRate: number;
  readonly razors: number;
  /** Lambdas that must be collected before the lift opens. */
  readonly lambdas: number;
  readonly water: number;
  readonly flooding: number;
  readonly waterproof: number;
}

export type LevelError =
  | { kind: 'invalid_character'; level: string; character: string; line: number }
  | { kind: 'invalid_metadata'; level: string; line: string }
  | { kind: 'empty_map'; level: string }
  | { kind: 'missing_robot'; level: string }
  | { kind: 'multiple_robots'; level: string; count: number }
  | { kind: 'missing_lift'; level: string }
  | { kind: 'multiple_lifts'; level: string; count: number }
  | { kind: 'unmapped_trampoline'; level: string; id: string }
  | { kind: 'missing_target'; level: string; id: string }
  | { kind: 'duplicate_target'; level: string; id: string };
