// pipeline/beard-processor.ts — Periodic beard growth

import type { Position, Tick } from '../types/index.js';
import { neighbors4, positionKey } from '../types/index.js';
import { beard, isBeard, isEarth, isEmpty } from '../types/cell.js';
import type { TickState } from '../engine/tick-state.js';

export class BeardProcessor {
  tick(state: TickState, tick: Tick): void {
    const rate = state.level.growthRate;
    if (rate <= 0) return;

    const before = state.grid;
    const beards = before.findAll(isBeard);
    if (beards.length === 0) return;

    // Every beard, old or new, waits for the same next growth tick.
    const timer = rate - (tick % rate);
    const next = before.clone();
    for (const pos of beards) next.set(pos, beard(timer));

    const grown: Position[] = [];
    if (tick % rate === 0) {
      // One synchronous pass: decide from the pre-growth grid, write to the copy.
      const seen = new Set<string>();
      for (const pos of beards) {
        for (const neighbor of neighbors4(pos)) {
          const cell = before.get(neighbor);
          if (!isEmpty(cell) && !isEarth(cell)) continue;
          const key = positionKey(neighbor);
          if (seen.has(key)) continue;
          seen.add(key);
          next.set(neighbor, beard(timer));
          grown.push(neighbor);
        }
      }
    }

    state.grid = next;
    if (grown.length > 0) state.events.push({ type: 'beard_grown', positions: grown });
  }
}
