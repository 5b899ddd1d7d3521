// engine/grid.ts — Dense cell storage over the level's bounding rectangle

import type { Position } from '../types/index.js';
import type { Cell } from '../types/cell.js';
import { WALL } from '../types/cell.js';
import { scanOrder } from './traversal.js';

/**
 * 1-based grid, row 1 at the bottom. Reads outside the rectangle return a wall,
 * so rules never step off the map.
 *
 * Snapshots hand out grids as read-only values; only the tick engine writes,
 * and only into a copy obtained from `clone()`.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];

  constructor(width: number, height: number, cells: Cell[]) {
    if (cells.length !== width * height) {
      throw new Error(`Grid expects ${width * height} cells, got ${cells.length}`);
    }
    this.width = width;
    this.height = height;
    this.cells = cells;
  }

  /** Builds a grid from rows listed bottom-up, padding short rows with `fill`. */
  static fromRows(rows: Cell[][], fill: Cell): Grid {
    const height = rows.length;
    const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
    const cells: Cell[] = [];
    for (const row of rows) {
      for (let x = 0; x < width; x++) {
        cells.push(row[x] ?? fill);
      }
    }
    return new Grid(width, height, cells);
  }

  contains(pos: Position): boolean {
    return pos.x >= 1 && pos.x <= this.width && pos.y >= 1 && pos.y <= this.height;
  }

  get(pos: Position): Cell {
    if (!this.contains(pos)) return WALL;
    return this.cells[this.indexOf(pos)] ?? WALL;
  }

  set(pos: Position, cell: Cell): void {
    if (!this.contains(pos)) {
      throw new Error(`Position (${pos.x}, ${pos.y}) is outside the ${this.width}x${this.height} grid`);
    }
    this.cells[this.indexOf(pos)] = cell;
  }

  clone(): Grid {
    return new Grid(this.width, this.height, [...this.cells]);
  }

  /** Every position, in scan order. */
  positions(): Position[] {
    const all: Position[] = [];
    for (let y = 1; y <= this.height; y++) {
      for (let x = 1; x <= this.width; x++) {
        all.push({ x, y });
      }
    }
    return all;
  }

  findAll(predicate: (cell: Cell) => boolean): Position[] {
    return scanOrder(this.positions().filter((pos) => predicate(this.get(pos))));
  }

  find(predicate: (cell: Cell) => boolean): Position | null {
    return this.findAll(predicate)[0] ?? null;
  }

  count(predicate: (cell: Cell) => boolean): number {
    return this.cells.filter(predicate).length;
  }

  private indexOf(pos: Position): number {
    return (pos.y - 1) * this.width + (pos.x - 1);
  }
}
