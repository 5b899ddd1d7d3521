// tests/helpers.ts — Level builders shared by the engine tests

import type { Action, LevelDescriptor, Position, TickResult, WorldSnapshot } from '../src/types/index.js';
import { parseLevel, formatLevelError } from '../src/level/loader.js';
import { initialize, step } from '../src/engine/tick-engine.js';
import { renderView } from '../src/render/renderer.js';

/** Joins map lines and optional metadata lines into level text. */
export function levelText(map: string[], metadata: string[] = []): string {
  return metadata.length > 0 ? `${map.join('\n')}\n\n${metadata.join('\n')}\n` : `${map.join('\n')}\n`;
}

export function loadLevel(map: string[], metadata: string[] = [], name = 'test-level'): LevelDescriptor {
  const result = parseLevel(levelText(map, metadata), name);
  if (!result.ok) throw new Error(formatLevelError(result.error));
  return result.value;
}

export function startLevel(map: string[], metadata: string[] = []): WorldSnapshot {
  return initialize(loadLevel(map, metadata));
}

/** Applies actions in order; returns every tick's result. */
export function play(snapshot: WorldSnapshot, actions: Action[]): TickResult[] {
  const results: TickResult[] = [];
  let current = snapshot;
  for (const action of actions) {
    const result = step(current, action);
    results.push(result);
    current = result.snapshot;
  }
  return results;
}

export function last(results: TickResult[]): TickResult {
  const result = results[results.length - 1];
  if (!result) throw new Error('No ticks were played');
  return result;
}

export function rows(snapshot: WorldSnapshot): string[] {
  return renderView(snapshot).rows;
}

export function at(x: number, y: number): Position {
  return { x, y };
}
