// tests/rock-processor.test.ts — Tests for falling and sliding rocks

import { describe, it, expect } from 'vitest';
import { step } from '../src/engine/tick-engine.js';
import { isEmpty, isRock } from '../src/types/cell.js';
import type { WorldSnapshot } from '../src/types/index.js';
import { startLevel, play, last, rows, at } from './helpers.js';

function waits(n: number): 'wait'[] {
  return Array.from({ length: n }, () => 'wait' as const);
}

function unsupportedRocks(snapshot: WorldSnapshot): number {
  const grid = snapshot.grid;
  return grid.findAll(isRock).filter((pos) => isEmpty(grid.get({ x: pos.x, y: pos.y - 1 }))).length;
}

describe('RockProcessor', () => {
  it('drops a rock one row per tick until it lands', () => {
    const start = startLevel(['#####', '# * #', '#   #', '#R L#', '#####']);
    const [first, second, third] = play(start, waits(3));

    expect(first?.events).toContainEqual({ type: 'rock_moved', from: at(3, 4), to: at(3, 3) });
    expect(rows(second!.snapshot)).toEqual(['#####', '#   #', '#   #', '#R*O#', '#####']);
    expect(third?.events.filter((e) => e.type === 'rock_moved')).toEqual([]);
  });

  it('slides right off a rock', () => {
    const start = startLevel(['######', '# *  #', '# *  #', '#R   #', '##L###']);
    const result = step(start, 'wait');

    expect(result.events.filter((e) => e.type === 'rock_moved')).toEqual([
      { type: 'rock_moved', from: at(3, 3), to: at(3, 2) },
      { type: 'rock_moved', from: at(3, 4), to: at(4, 3) },
    ]);
    expect(rows(result.snapshot)).toEqual(['######', '#    #', '#  * #', '#R*  #', '##O###']);
  });

  it('slides left when the right is blocked', () => {
    const start = startLevel(['#####', '#  *#', '#  *#', '#R  #', '#L###']);
    const result = step(start, 'wait');
    expect(rows(result.snapshot)).toEqual(['#####', '#   #', '# * #', '#R *#', '#O###']);
  });

  it('gives a contested cell to the rock scanned first', () => {
    const start = startLevel(['#####O', '#* *##', '#* *R#', '######']);
    const result = step(start, 'wait');

    expect(result.events.filter((e) => e.type === 'rock_moved')).toEqual([
      { type: 'rock_moved', from: at(2, 3), to: at(3, 2) },
    ]);
    expect(rows(result.snapshot)).toEqual(['#####O', '#  *##', '#***R#', '######']);
  });

  it('moves each rock at most once per tick', () => {
    const start = startLevel(['##O', '#*#', '# #', '# #', '# #', '#R#', '###']);
    const result = step(start, 'wait');
    expect(result.events.filter((e) => e.type === 'rock_moved')).toEqual([
      { type: 'rock_moved', from: at(2, 6), to: at(2, 5) },
    ]);
  });

  it('settles any heap within the height of the map', () => {
    const map = [
      '########O',
      '#* * *#R#',
      '# **  # #',
      '#     ###',
      '#   *   #',
      '#########',
    ];
    const results = play(startLevel(map), waits(map.length));
    const final = last(results);

    expect(final.verdict).toEqual({ state: 'running' });
    expect(unsupportedRocks(final.snapshot)).toBe(0);
    expect(rows(final.snapshot)).toEqual([
      '########O',
      '#     #R#',
      '#     # #',
      '#   * ###',
      '#*****  #',
      '#########',
    ]);
    expect(results[3]?.events.filter((e) => e.type === 'rock_moved')).toEqual([]);
  });

  describe('crushing', () => {
    const MAP = ['#####', '# * #', '#   #', '# R #', '#L###'];

    it('kills the robot on the tick the rock lands on it, not before', () => {
      const [first, second] = play(startLevel(MAP), ['wait', 'wait']);

      expect(first?.verdict).toEqual({ state: 'running' });
      expect(second?.verdict).toEqual({ state: 'loss', reason: 'crushed_by_rock' });
      expect(second?.events).toContainEqual({ type: 'loss', reason: 'crushed_by_rock', position: at(3, 2) });
      expect(second?.snapshot.tick).toBe(2);
    });

    it('kills a robot that steps under a falling rock', () => {
      const start = startLevel(['#####', '# * #', '#R  #', '#L###']);
      const result = step(start, 'right');
      expect(result.verdict).toEqual({ state: 'loss', reason: 'crushed_by_rock' });
    });

    it('kills the robot with a sliding rock', () => {
      const under = startLevel(['####O', '#*  #', '#*R #', '#####']);
      expect(step(under, 'wait').verdict).toEqual({ state: 'loss', reason: 'crushed_by_rock' });

      const walkingIn = startLevel(['####O', '#*  #', '#* R#', '#####']);
      expect(step(walkingIn, 'left').verdict).toEqual({ state: 'loss', reason: 'crushed_by_rock' });
    });

    it('is safe beside a rock that cannot slide', () => {
      const start = startLevel(['####O', '#*  #', '#*#R#', '#####']);
      const result = step(start, 'wait');
      expect(result.verdict).toEqual({ state: 'running' });
      expect(result.events).toEqual([]);
    });
  });

  describe('higher-order rocks', () => {
    it('fall onto a lambda and destroy it in the same tick', () => {
      const start = startLevel(['####L', '# @ #', '# \\ #', '#R  #', '#####']);
      const [first, second] = play(start, ['wait', 'wait']);

      expect(first?.events).toEqual([
        { type: 'lambda_crushed', position: at(3, 3) },
        { type: 'rock_moved', from: at(3, 4), to: at(3, 3) },
      ]);
      expect(rows(first!.snapshot)).toEqual(['####L', '#   #', '# @ #', '#R  #', '#####']);
      expect(rows(second!.snapshot)).toEqual(['####L', '#   #', '#   #', '#R@ #', '#####']);
    });

    it('leave plain rocks resting on lambdas alone', () => {
      const start = startLevel(['####L', '# * #', '# \\ #', '#R  #', '#####']);
      const result = step(start, 'wait');
      expect(result.events).toEqual([]);
      expect(rows(result.snapshot)).toEqual(['####L', '# * #', '# \\ #', '#R  #', '#####']);
    });
  });
});
