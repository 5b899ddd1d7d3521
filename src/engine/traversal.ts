// engine/traversal.ts — Fixed scan order for rule application

import type { Position } from '../types/index.js';

/** Bottom row first, left to right within a row. */
export function scanOrder(positions: readonly Position[]): Position[] {
  return [...positions].sort((a, b) => a.y - b.y || a.x - b.x);
}

/** Display order: top row first, left to right. */
export function topDownOrder(positions: readonly Position[]): Position[] {
  return [...positions].sort((a, b) => b.y - a.y || a.x - b.x);
}
