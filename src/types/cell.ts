// types/cell.ts — The closed set of things a map cell can hold

export type RockKind = 'simple' | 'higher_order';
export type LiftState = 'open' | 'closed';

/** Trampoline ids are `A`–`I`, target ids `1`–`9` (and `0`). */
export type Cell =
  | { kind: 'empty' }
  | { kind: 'wall' }
  | { kind: 'earth' }
  | { kind: 'robot' }
  | { kind: 'rock'; rock: RockKind }
  | { kind: 'lambda' }
  | { kind: 'lift'; state: LiftState }
  | { kind: 'trampoline'; id: string }
  | { kind: 'target'; id: string }
  | { kind: 'beard'; ticksUntilGrowth: number }
  | { kind: 'razor' };

export type CellKind = Cell['kind'];

export const EMPTY: Cell = { kind: 'empty' };
export const WALL: Cell = { kind: 'wall' };
export const EARTH: Cell = { kind: 'earth' };
export const ROBOT: Cell = { kind: 'robot' };
export const LAMBDA: Cell = { kind: 'lambda' };
export const RAZOR: Cell = { kind: 'razor' };
export const SIMPLE_ROCK: Cell = { kind: 'rock', rock: 'simple' };
export const HIGHER_ORDER_ROCK: Cell = { kind: 'rock', rock: 'higher_order' };
export const OPEN_LIFT: Cell = { kind: 'lift', state: 'open' };
export const CLOSED_LIFT: Cell = { kind: 'lift', state: 'closed' };

export function beard(ticksUntilGrowth: number): Cell {
  return { kind: 'beard', ticksUntilGrowth };
}

export function trampoline(id: string): Cell {
  return { kind: 'trampoline', id };
}

export function target(id: string): Cell {
  return { kind: 'target', id };
}

// --- Predicates ---

export function isEmpty(cell: Cell): boolean {
  return cell.kind === 'empty';
}

export function isWall(cell: Cell): boolean {
  return cell.kind === 'wall';
}

export function isEarth(cell: Cell): boolean {
  return cell.kind === 'earth';
}

export function isRobot(cell: Cell): boolean {
  return cell.kind === 'robot';
}

export function isRock(cell: Cell): cell is Extract<Cell, { kind: 'rock' }> {
  return cell.kind === 'rock';
}

export function isSimpleRock(cell: Cell): boolean {
  return cell.kind === 'rock' && cell.rock === 'simple';
}

export function isHigherOrderRock(cell: Cell): boolean {
  return cell.kind === 'rock' && cell.rock === 'higher_order';
}

export function isLambda(cell: Cell): boolean {
  return cell.kind === 'lambda';
}

export function isLiftOpen(cell: Cell): boolean {
  return cell.kind === 'lift' && cell.state === 'open';
}

export function isLiftClosed(cell: Cell): boolean {
  return cell.kind === 'lift' && cell.state === 'closed';
}

export function isLift(cell: Cell): boolean {
  return cell.kind === 'lift';
}

export function isTrampoline(cell: Cell): cell is Extract<Cell, { kind: 'trampoline' }> {
  return cell.kind === 'trampoline';
}

export function isTarget(cell: Cell): cell is Extract<Cell, { kind: 'target' }> {
  return cell.kind === 'target';
}

export function isBeard(cell: Cell): cell is Extract<Cell, { kind: 'beard' }> {
  return cell.kind === 'beard';
}

export function isRazor(cell: Cell): boolean {
  return cell.kind === 'razor';
}

// --- Equality & ordering ---

const KIND_ORDER: readonly CellKind[] = [
  'robot', 'wall', 'rock', 'lambda', 'lift', 'earth',
  'trampoline', 'target', 'beard', 'razor', 'empty',
];

function payloadOf(cell: Cell): string | number {
  switch (cell.kind) {
    case 'rock':
      return cell.rock === 'simple' ? 0 : 1;
    case 'lift':
      return cell.state === 'open' ? 0 : 1;
    case 'trampoline':
    case 'target':
      return cell.id;
    case 'beard':
      return cell.ticksUntilGrowth;
    case 'empty':
    case 'wall':
    case 'earth':
    case 'robot':
    case 'lambda':
    case 'razor':
      return 0;
  }
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.kind === b.kind && payloadOf(a) === payloadOf(b);
}

export function compareCells(a: Cell, b: Cell): number {
  const byKind = KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind);
  if (byKind !== 0) return byKind;
  const pa = payloadOf(a);
  const pb = payloadOf(b);
  if (pa === pb) return 0;
  return pa < pb ? -1 : 1;
}

// --- Map alphabet ---

export const TRAMPOLINE_IDS = 'ABCDEFGHI';
export const TARGET_IDS = '0123456789';

/** Returns null for characters outside the map alphabet. */
export function charToCell(ch: string, beardTimer: number): Cell | null {
  switch (ch) {
    case 'R': return ROBOT;
    case '#': return WALL;
    case '*': return SIMPLE_ROCK;
    case '@': return HIGHER_ORDER_ROCK;
    case '\\': return LAMBDA;
    case 'L': return CLOSED_LIFT;
    case 'O': return OPEN_LIFT;
    case '.': return EARTH;
    case ' ': return EMPTY;
    case 'W': return beard(beardTimer);
    case '!': return RAZOR;
  }
  if (ch.length === 1 && TRAMPOLINE_IDS.includes(ch)) return trampoline(ch);
  if (ch.length === 1 && TARGET_IDS.includes(ch)) return target(ch);
  return null;
}

export function cellToChar(cell: Cell): string {
  switch (cell.kind) {
    case 'robot': return 'R';
    case 'wall': return '#';
    case 'rock': return cell.rock === 'simple' ? '*' : '@';
    case 'lambda': return '\\';
    case 'lift': return cell.state === 'open' ? 'O' : 'L';
    case 'earth': return '.';
    case 'trampoline': return cell.id;
    case 'target': return cell.id;
    case 'beard': return 'W';
    case 'razor': return '!';
    case 'empty': return ' ';
  }
}
