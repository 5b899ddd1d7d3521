// engine/tick-engine.ts — One snapshot in, the next snapshot out

import type { Action, LevelDescriptor, TickResult, Verdict, WorldSnapshot } from '../types/index.js';
import { isMetaAction, isTerminal } from '../types/index.js';
import { ActionResolver } from '../pipeline/action-resolver.js';
import { BeardProcessor } from '../pipeline/beard-processor.js';
import { RockProcessor } from '../pipeline/rock-processor.js';
import { WaterProcessor } from '../pipeline/water-processor.js';
import { ProgressEvaluator } from '../pipeline/progress-evaluator.js';
import { EngineInvariantError } from '../shared/errors.js';
import { TickState } from './tick-state.js';
import { initialize } from './snapshot.js';

export class TickEngine {
  private readonly resolver: ActionResolver;
  private readonly beards: BeardProcessor;
  private readonly rocks: RockProcessor;
  private readonly water: WaterProcessor;
  private readonly evaluator: ProgressEvaluator;

  constructor(
    resolver: ActionResolver = new ActionResolver(),
    beards: BeardProcessor = new BeardProcessor(),
    rocks: RockProcessor = new RockProcessor(),
    water: WaterProcessor = new WaterProcessor(),
    evaluator: ProgressEvaluator = new ProgressEvaluator(),
  ) {
    this.resolver = resolver;
    this.beards = beards;
    this.rocks = rocks;
    this.water = water;
    this.evaluator = evaluator;
  }

  initialize(level: LevelDescriptor): WorldSnapshot {
    return initialize(level);
  }

  step(snapshot: WorldSnapshot, action: Action): TickResult {
    if (isTerminal(snapshot.progress)) {
      throw new EngineInvariantError(
        `Cannot step "${snapshot.level.name}": game already ended (${snapshot.progress.state})`,
      );
    }

    // 1. Meta actions end the game without running physics
    if (isMetaAction(action)) {
      const verdict: Verdict = { state: action };
      const next: WorldSnapshot = {
        ...snapshot,
        grid: snapshot.grid.clone(),
        progress: verdict,
        history: [...snapshot.history, action],
      };
      return { tick: snapshot.tick, snapshot: next, verdict, rejected: null, events: [] };
    }

    const tick = snapshot.tick + 1;
    const state = new TickState(snapshot, tick);

    // 2. Robot action
    this.resolver.resolve(state, action);

    // 3. Beard growth
    this.beards.tick(state, tick);

    // 4. Falling and sliding rocks
    this.rocks.tick(state);

    // 5. Flooding and air (a crushed robot no longer breathes)
    if (!state.settled) {
      this.water.tick(state, tick);
    }

    // 6-7. Verdict
    state.verdict = this.evaluator.evaluate(state);

    const next = state.toSnapshot(snapshot, action);
    return {
      tick,
      snapshot: next,
      verdict: next.progress,
      rejected: state.rejected,
      events: state.events,
    };
  }
}

const defaultEngine = new TickEngine();

export function step(snapshot: WorldSnapshot, action: Action): TickResult {
  return defaultEngine.step(snapshot, action);
}

export { initialize };
