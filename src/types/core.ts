// types/core.ts — Fundamental types

export type Tick = number;

/** Column `x`, row `y`. Row 1 is the bottom line of the authored map. */
export interface Position {
  x: number;
  y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_DELTAS: Readonly<Record<Direction, Position>> = {
  up: { x: 0, y: 1 },
  down: { x: 0, y: -1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function offset(pos: Position, dx: number, dy: number): Position {
  return { x: pos.x + dx, y: pos.y + dy };
}

export function step(pos: Position, direction: Direction): Position {
  const delta = DIRECTION_DELTAS[direction];
  return offset(pos, delta.x, delta.y);
}

export function neighbors4(pos: Position): Position[] {
  return [step(pos, 'up'), step(pos, 'down'), step(pos, 'left'), step(pos, 'right')];
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function positionKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}
