// tests/cell.test.ts — Tests for the cell model

import { describe, it, expect } from 'vitest';
import {
  charToCell,
  cellToChar,
  cellsEqual,
  compareCells,
  trampoline,
  target,
  beard,
  isHigherOrderRock,
  isSimpleRock,
  isLiftClosed,
  isLiftOpen,
  isRazor,
  EMPTY,
  WALL,
  ROBOT,
  SIMPLE_ROCK,
  HIGHER_ORDER_ROCK,
  CLOSED_LIFT,
  RAZOR,
} from '../src/types/cell.js';

describe('charToCell', () => {
  it('maps every map character', () => {
    expect(charToCell('R', 24)).toEqual({ kind: 'robot' });
    expect(charToCell('#', 24)).toEqual({ kind: 'wall' });
    expect(charToCell('*', 24)).toEqual({ kind: 'rock', rock: 'simple' });
    expect(charToCell('@', 24)).toEqual({ kind: 'rock', rock: 'higher_order' });
    expect(charToCell('\\', 24)).toEqual({ kind: 'lambda' });
    expect(charToCell('L', 24)).toEqual({ kind: 'lift', state: 'closed' });
    expect(charToCell('O', 24)).toEqual({ kind: 'lift', state: 'open' });
    expect(charToCell('.', 24)).toEqual({ kind: 'earth' });
    expect(charToCell(' ', 24)).toEqual({ kind: 'empty' });
    expect(charToCell('C', 24)).toEqual({ kind: 'trampoline', id: 'C' });
    expect(charToCell('7', 24)).toEqual({ kind: 'target', id: '7' });
    expect(charToCell('W', 24)).toEqual({ kind: 'beard', ticksUntilGrowth: 24 });
    expect(charToCell('!', 24)).toEqual({ kind: 'razor' });
  });

  it('returns null outside the alphabet', () => {
    expect(charToCell('J', 24)).toBeNull();
    expect(charToCell('x', 24)).toBeNull();
    expect(charToCell('?', 24)).toBeNull();
  });
});

describe('cellToChar', () => {
  it('writes the map character back', () => {
    const line = '#R*@\\LO. B3W!';
    const cells = [...line].map((ch) => charToCell(ch, 9));
    expect(cells.map((c) => (c ? cellToChar(c) : '?')).join('')).toBe(line);
  });
});

describe('cellsEqual', () => {
  it('compares variant and payload', () => {
    expect(cellsEqual(trampoline('A'), trampoline('A'))).toBe(true);
    expect(cellsEqual(trampoline('A'), trampoline('B'))).toBe(false);
    expect(cellsEqual(trampoline('A'), target('1'))).toBe(false);
    expect(cellsEqual(beard(3), beard(4))).toBe(false);
    expect(cellsEqual(SIMPLE_ROCK, HIGHER_ORDER_ROCK)).toBe(false);
    expect(cellsEqual(EMPTY, { kind: 'empty' })).toBe(true);
  });
});

describe('compareCells', () => {
  it('orders by variant first, then payload', () => {
    expect(compareCells(ROBOT, WALL)).toBeLessThan(0);
    expect(compareCells(EMPTY, WALL)).toBeGreaterThan(0);
    expect(compareCells(trampoline('B'), trampoline('A'))).toBeGreaterThan(0);
    expect(compareCells(target('2'), target('2'))).toBe(0);
    expect(compareCells(SIMPLE_ROCK, HIGHER_ORDER_ROCK)).toBeLessThan(0);
  });
});

describe('predicates', () => {
  it('tell rock and lift variants apart', () => {
    expect(isSimpleRock(SIMPLE_ROCK)).toBe(true);
    expect(isSimpleRock(HIGHER_ORDER_ROCK)).toBe(false);
    expect(isHigherOrderRock(HIGHER_ORDER_ROCK)).toBe(true);
    expect(isLiftClosed(CLOSED_LIFT)).toBe(true);
    expect(isLiftOpen(CLOSED_LIFT)).toBe(false);
  });

  it('recognise razors only', () => {
    expect(isRazor(RAZOR)).toBe(true);
    expect(isRazor(charToCell('!', 0) ?? EMPTY)).toBe(true);
    expect(isRazor(beard(3))).toBe(false);
    expect(isRazor(EMPTY)).toBe(false);
  });
});
