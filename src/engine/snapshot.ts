// engine/snapshot.ts — Building the first snapshot of a level

import type { LevelDescriptor, Position, WorldSnapshot } from '../types/index.js';
import { RUNNING } from '../types/index.js';
import { isLift, isRobot, isTarget, isTrampoline } from '../types/cell.js';
import { EngineInvariantError } from '../shared/errors.js';

export function initialize(level: LevelDescriptor): WorldSnapshot {
  const grid = level.grid;

  const robot = grid.find(isRobot);
  if (!robot) throw new EngineInvariantError(`Level "${level.name}" has no robot`);
  const lift = grid.find(isLift);
  if (!lift) throw new EngineInvariantError(`Level "${level.name}" has no lift`);

  const targets = new Map<string, Position>();
  for (const pos of grid.findAll(isTarget)) {
    const cell = grid.get(pos);
    if (isTarget(cell)) targets.set(cell.id, pos);
  }

  const targetSources = new Map<string, Position[]>();
  for (const pos of grid.findAll(isTrampoline)) {
    const cell = grid.get(pos);
    if (!isTrampoline(cell)) continue;
    const targetId = level.trampolines.get(cell.id);
    if (targetId === undefined) {
      throw new EngineInvariantError(`Trampoline ${cell.id} in "${level.name}" has no target`);
    }
    const sources = targetSources.get(targetId) ?? [];
    sources.push(pos);
    targetSources.set(targetId, sources);
  }

  return {
    level,
    grid: grid.clone(),
    robot,
    lift,
    tick: 0,
    airLeft: level.waterproof,
    water: level.water,
    targets,
    targetSources,
    progress: RUNNING,
    lambdasCollected: 0,
    razors: level.razors,
    moves: 0,
    history: [],
  };
}
