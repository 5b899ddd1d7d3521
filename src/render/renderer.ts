// render/renderer.ts — Text frames for the terminal

import type { Position, Verdict, WorldSnapshot } from '../types/index.js';
import type { Cell } from '../types/cell.js';
import { cellToChar, compareCells, isTrampoline, trampoline } from '../types/cell.js';
import { topDownOrder } from '../engine/traversal.js';
import { SGR } from '../shared/constants.js';

export interface LegendEntry {
  trampoline: string;
  target: string;
}

/** Everything a display needs for one frame; no formatting applied. */
export interface RenderView {
  /** Map rows, top row first, one character per cell. */
  rows: string[];
  water: number;
  airLeft: number;
  razors: number;
  legend: LegendEntry[];
}

export interface RenderOptions {
  color: boolean;
}

export function renderView(snapshot: WorldSnapshot): RenderView {
  const byRow = groupRows(snapshot);
  return {
    rows: byRow.map((row) => row.map(({ cell }) => cellToChar(cell)).join('')),
    water: snapshot.water,
    airLeft: snapshot.airLeft,
    razors: snapshot.razors,
    legend: legendOf(snapshot),
  };
}

export function renderSnapshot(snapshot: WorldSnapshot, options: RenderOptions): string {
  const out: string[] = [];
  const legend = legendOf(snapshot);

  if (legend.length > 0) {
    out.push('Trampolines:');
    for (const entry of legend) out.push(`${entry.trampoline} -> ${entry.target}`);
  }

  if (snapshot.robot.y <= snapshot.water) {
    out.push(`Air: ${snapshot.airLeft}`);
  }

  out.push(
    `Lambdas: ${snapshot.lambdasCollected}/${snapshot.level.lambdas}  ` +
    `Moves: ${snapshot.moves}  Razors: ${snapshot.razors}`,
  );

  for (const row of groupRows(snapshot)) {
    out.push(options.color ? colorRow(row, snapshot.water) : row.map(({ cell }) => cellToChar(cell)).join(''));
  }

  return out.join('\n');
}

export function formatVerdict(verdict: Verdict): string {
  switch (verdict.state) {
    case 'running':
      return 'Running';
    case 'win':
      return 'You reached the lift!';
    case 'loss':
      return verdict.reason === 'crushed_by_rock'
        ? 'Crushed by a falling rock'
        : 'Drowned';
    case 'abort':
      return 'Aborted';
    case 'restart':
      return 'Restarting level';
    case 'skip':
      return 'Skipped level';
  }
}

interface PlacedCell {
  pos: Position;
  cell: Cell;
}

function groupRows(snapshot: WorldSnapshot): PlacedCell[][] {
  const rows: PlacedCell[][] = [];
  let currentY: number | null = null;
  for (const pos of topDownOrder(snapshot.grid.positions())) {
    if (pos.y !== currentY) {
      rows.push([]);
      currentY = pos.y;
    }
    rows[rows.length - 1]?.push({ pos, cell: snapshot.grid.get(pos) });
  }
  return rows;
}

function legendOf(snapshot: WorldSnapshot): LegendEntry[] {
  const present = new Set<string>();
  for (const pos of snapshot.grid.findAll(isTrampoline)) {
    const cell = snapshot.grid.get(pos);
    if (isTrampoline(cell)) present.add(cell.id);
  }

  return [...snapshot.level.trampolines]
    .filter(([id]) => present.has(id))
    .sort(([a], [b]) => compareCells(trampoline(a), trampoline(b)))
    .map(([id, targetId]) => ({ trampoline: id, target: targetId }));
}

function colorOf(cell: Cell): string | null {
  switch (cell.kind) {
    case 'robot': return SGR.blue;
    case 'rock': return SGR.brightRed;
    case 'lambda': return SGR.cyan;
    case 'lift': return cell.state === 'open' ? SGR.brightGreen : SGR.green;
    case 'trampoline': return SGR.brightMagenta;
    case 'target': return SGR.magenta;
    case 'wall':
    case 'earth':
    case 'beard':
    case 'razor':
    case 'empty':
      return null;
  }
}

function colorRow(row: PlacedCell[], water: number): string {
  let line = '';
  for (const { pos, cell } of row) {
    const color = pos.y <= water ? SGR.brightBlue : colorOf(cell);
    line += color ? `${color}${cellToChar(cell)}${SGR.reset}` : cellToChar(cell);
  }
  return line;
}
