// level/loader.ts — Level text → LevelDescriptor
//
// Format: map lines, one blank line, then metadata lines such as
//   Growth 15
//   Trampoline A targets 1

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { LevelDescriptor, LevelError } from '../types/index.js';
import type { Cell } from '../types/cell.js';
import {
  EMPTY,
  charToCell,
  isLambda,
  isLift,
  isRobot,
  isTarget,
  isTrampoline,
} from '../types/cell.js';
import { Grid } from '../engine/grid.js';
import type { Result } from '../shared/result.js';
import { ok, err } from '../shared/result.js';
import {
  DEFAULT_GROWTH_RATE,
  DEFAULT_RAZORS,
  DEFAULT_WATER,
  DEFAULT_FLOODING,
  DEFAULT_WATERPROOF,
} from '../shared/constants.js';

interface LevelMetadata {
  growthRate: number;
  razors: number;
  water: number;
  flooding: number;
  waterproof: number;
  trampolines: Map<string, string>;
}

type NumericKey = 'growthRate' | 'razors' | 'water' | 'flooding' | 'waterproof';

const NUMERIC_KEYS: ReadonlyMap<string, NumericKey> = new Map<string, NumericKey>([
  ['Growth', 'growthRate'],
  ['Razors', 'razors'],
  ['Water', 'water'],
  ['Flooding', 'flooding'],
  ['Waterproof', 'waterproof'],
]);

const NUMERIC_LINE = /^(\S+)\s+(\d+)$/;
const TRAMPOLINE_LINE = /^Trampoline\s+([A-I])\s+targets\s+([0-9])$/;

export async function readLevelFile(path: string): Promise<Result<LevelDescriptor, LevelError>> {
  const text = await readFile(path, 'utf8');
  return parseLevel(text, basename(path));
}

export function parseLevel(text: string, name: string): Result<LevelDescriptor, LevelError> {
  const lines = text.split(/\r?\n/);
  const separator = lines.indexOf('');
  const mapLines = separator === -1 ? lines : lines.slice(0, separator);
  const metadataLines = separator === -1
    ? []
    : lines.slice(separator + 1).map((l) => l.trim()).filter((l) => l !== '');

  if (mapLines.length === 0) return err({ kind: 'empty_map', level: name });

  const metadata = parseMetadata(metadataLines, name);
  if (!metadata.ok) return metadata;
  const meta = metadata.value;

  // Nothing has grown yet at tick 0: the first growth is a full period away.
  const grid = parseMap(mapLines, name, meta.growthRate);
  if (!grid.ok) return grid;

  const checked = validateGrid(grid.value, meta, name);
  if (!checked.ok) return checked;

  return ok({
    name,
    grid: grid.value,
    trampolines: meta.trampolines,
    growthRate: meta.growthRate,
    razors: meta.razors,
    lambdas: grid.value.count(isLambda),
    water: meta.water,
    flooding: meta.flooding,
    waterproof: meta.waterproof,
  });
}

export function formatLevelError(error: LevelError): string {
  switch (error.kind) {
    case 'invalid_character':
      return `${error.level}: unknown map character "${error.character}" on line ${error.line}`;
    case 'invalid_metadata':
      return `${error.level}: cannot parse metadata line "${error.line}"`;
    case 'empty_map':
      return `${error.level}: level has no map`;
    case 'missing_robot':
      return `${error.level}: map has no robot`;
    case 'multiple_robots':
      return `${error.level}: map has ${error.count} robots`;
    case 'missing_lift':
      return `${error.level}: map has no lift`;
    case 'multiple_lifts':
      return `${error.level}: map has ${error.count} lifts`;
    case 'unmapped_trampoline':
      return `${error.level}: trampoline ${error.id} has no "Trampoline ${error.id} targets <n>" line`;
    case 'missing_target':
      return `${error.level}: target ${error.id} is referenced but not on the map`;
    case 'duplicate_target':
      return `${error.level}: target ${error.id} appears more than once`;
  }
}

function parseMetadata(lines: string[], name: string): Result<LevelMetadata, LevelError> {
  const meta: LevelMetadata = {
    growthRate: DEFAULT_GROWTH_RATE,
    razors: DEFAULT_RAZORS,
    water: DEFAULT_WATER,
    flooding: DEFAULT_FLOODING,
    waterproof: DEFAULT_WATERPROOF,
    trampolines: new Map(),
  };

  for (const line of lines) {
    const keyword = line.split(/\s+/, 1)[0] ?? '';

    if (keyword === 'Trampoline') {
      const match = TRAMPOLINE_LINE.exec(line);
      if (!match?.[1] || !match[2]) return err({ kind: 'invalid_metadata', level: name, line });
      meta.trampolines.set(match[1], match[2]);
      continue;
    }

    const key = NUMERIC_KEYS.get(keyword);
    if (key === undefined) continue; // unknown keys are ignored

    const match = NUMERIC_LINE.exec(line);
    if (!match?.[2]) return err({ kind: 'invalid_metadata', level: name, line });
    meta[key] = Number.parseInt(match[2], 10);
  }

  return ok(meta);
}

function parseMap(lines: string[], name: string, beardTimer: number): Result<Grid, LevelError> {
  const rows: Cell[][] = [];

  // Authored top line last: row 1 is the bottom of the map.
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? '';
    const row: Cell[] = [];
    for (const ch of line) {
      const cell = charToCell(ch, beardTimer);
      if (!cell) {
        return err({ kind: 'invalid_character', level: name, character: ch, line: i + 1 });
      }
      row.push(cell);
    }
    rows.push(row);
  }

  return ok(Grid.fromRows(rows, EMPTY));
}

function validateGrid(grid: Grid, meta: LevelMetadata, name: string): Result<Grid, LevelError> {
  const robots = grid.count(isRobot);
  if (robots === 0) return err({ kind: 'missing_robot', level: name });
  if (robots > 1) return err({ kind: 'multiple_robots', level: name, count: robots });

  const lifts = grid.count(isLift);
  if (lifts === 0) return err({ kind: 'missing_lift', level: name });
  if (lifts > 1) return err({ kind: 'multiple_lifts', level: name, count: lifts });

  const targetIds = new Set<string>();
  for (const pos of grid.findAll(isTarget)) {
    const cell = grid.get(pos);
    if (!isTarget(cell)) continue;
    if (targetIds.has(cell.id)) return err({ kind: 'duplicate_target', level: name, id: cell.id });
    targetIds.add(cell.id);
  }

  for (const pos of grid.findAll(isTrampoline)) {
    const cell = grid.get(pos);
    if (!isTrampoline(cell)) continue;
    const targetId = meta.trampolines.get(cell.id);
    if (targetId === undefined) return err({ kind: 'unmapped_trampoline', level: name, id: cell.id });
    if (!targetIds.has(targetId)) return err({ kind: 'missing_target', level: name, id: targetId });
  }

  return ok(grid);
}
