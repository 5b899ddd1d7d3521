// pipeline/rock-processor.ts — Gravity and sliding

import type { Position } from '../types/index.js';
import { offset, positionKey, samePosition } from '../types/index.js';
import type { Cell } from '../types/cell.js';
import { EMPTY, isEmpty, isLambda, isRobot, isRock, isWall } from '../types/cell.js';
import type { Grid } from '../engine/grid.js';
import type { TickState } from '../engine/tick-state.js';

type RockCell = Extract<Cell, { kind: 'rock' }>;

/** A rock may land on empty space or on the robot (which crushes it). */
function isVacant(cell: Cell): boolean {
  return isEmpty(cell) || isRobot(cell);
}

export class RockProcessor {
  /**
   * Moves every rock at most once. Decisions read the grid as it was when the
   * stage started; moves are written to a copy, and a destination already
   * claimed by a rock earlier in scan order keeps the later rock where it is.
   */
  tick(state: TickState): void {
    const before = state.grid;
    const next = before.clone();
    const claimed = new Set<string>();

    for (const from of before.findAll(isRock)) {
      const rock = before.get(from);
      if (!isRock(rock)) continue;

      const to = this.destination(before, from, rock);
      if (!to) continue;

      const key = positionKey(to);
      if (claimed.has(key)) continue;
      claimed.add(key);

      if (isLambda(before.get(to))) {
        state.events.push({ type: 'lambda_crushed', position: to });
      }
      next.set(from, EMPTY);
      next.set(to, rock);
      state.events.push({ type: 'rock_moved', from, to });

      if (samePosition(to, state.robot) && !state.settled) {
        state.conclude({ state: 'loss', reason: 'crushed_by_rock' });
        state.events.push({ type: 'loss', reason: 'crushed_by_rock', position: to });
      }
    }

    state.grid = next;
  }

  private destination(grid: Grid, from: Position, rock: RockCell): Position | null {
    const below = offset(from, 0, -1);
    const underneath = grid.get(below);

    if (isVacant(underneath)) return below;
    if (rock.rock === 'higher_order' && isLambda(underneath)) return below;

    if (isRock(underneath) || isWall(underneath)) {
      return this.slide(grid, from, 1) ?? this.slide(grid, from, -1);
    }

    return null;
  }

  private slide(grid: Grid, from: Position, dx: number): Position | null {
    const side = offset(from, dx, 0);
    const landing = offset(from, dx, -1);
    if (isEmpty(grid.get(side)) && isVacant(grid.get(landing))) return landing;
    return null;
  }
}
