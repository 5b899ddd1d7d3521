// tests/grid.test.ts — Tests for Grid and the traversal order

import { describe, it, expect } from 'vitest';
import { Grid } from '../src/engine/grid.js';
import { scanOrder, topDownOrder } from '../src/engine/traversal.js';
import { EMPTY, WALL, ROBOT, SIMPLE_ROCK, isRock } from '../src/types/cell.js';

describe('scanOrder', () => {
  it('sorts bottom row first, left to right', () => {
    const sorted = scanOrder([
      { x: 2, y: 3 },
      { x: 1, y: 1 },
      { x: 3, y: 1 },
      { x: 1, y: 3 },
      { x: 2, y: 2 },
    ]);
    expect(sorted).toEqual([
      { x: 1, y: 1 },
      { x: 3, y: 1 },
      { x: 2, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 3 },
    ]);
  });

  it('does not reorder its input', () => {
    const input = [{ x: 2, y: 2 }, { x: 1, y: 1 }];
    scanOrder(input);
    expect(input).toEqual([{ x: 2, y: 2 }, { x: 1, y: 1 }]);
  });
});

describe('topDownOrder', () => {
  it('sorts top row first, left to right', () => {
    expect(topDownOrder([{ x: 1, y: 1 }, { x: 2, y: 2 }, { x: 1, y: 2 }])).toEqual([
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 1, y: 1 },
    ]);
  });
});

describe('Grid', () => {
  it('pads short rows and reads walls outside the rectangle', () => {
    const grid = Grid.fromRows([[WALL, WALL, WALL], [ROBOT]], EMPTY);
    expect(grid.width).toBe(3);
    expect(grid.height).toBe(2);
    expect(grid.get({ x: 1, y: 2 })).toEqual(ROBOT);
    expect(grid.get({ x: 3, y: 2 })).toEqual(EMPTY);
    expect(grid.get({ x: 0, y: 1 })).toEqual(WALL);
    expect(grid.get({ x: 2, y: 3 })).toEqual(WALL);
  });

  it('finds cells in scan order', () => {
    const grid = Grid.fromRows(
      [
        [EMPTY, SIMPLE_ROCK, EMPTY],
        [SIMPLE_ROCK, EMPTY, SIMPLE_ROCK],
      ],
      EMPTY,
    );
    expect(grid.findAll(isRock)).toEqual([
      { x: 2, y: 1 },
      { x: 1, y: 2 },
      { x: 3, y: 2 },
    ]);
    expect(grid.find(isRock)).toEqual({ x: 2, y: 1 });
    expect(grid.count(isRock)).toBe(3);
  });

  it('clones independently', () => {
    const grid = Grid.fromRows([[EMPTY, EMPTY]], EMPTY);
    const copy = grid.clone();
    copy.set({ x: 1, y: 1 }, SIMPLE_ROCK);
    expect(grid.get({ x: 1, y: 1 })).toEqual(EMPTY);
    expect(copy.get({ x: 1, y: 1 })).toEqual(SIMPLE_ROCK);
  });

  it('refuses writes outside the rectangle', () => {
    const grid = Grid.fromRows([[EMPTY]], EMPTY);
    expect(() => grid.set({ x: 2, y: 1 }, WALL)).toThrow('outside the 1x1 grid');
  });
});
