// pipeline/progress-evaluator.ts — Turning a tick's outcome into a verdict

import type { Verdict } from '../types/index.js';
import { RUNNING } from '../types/index.js';
import type { TickState } from '../engine/tick-state.js';

export class ProgressEvaluator {
  /** Terminal verdicts set by earlier stages stand; otherwise the lift decides. */
  evaluate(state: TickState): Verdict {
    if (state.settled) return state.verdict;

    if (state.enteredLift && state.lambdasCollected >= state.level.lambdas) {
      state.events.push({ type: 'won', position: state.robot });
      return { state: 'win' };
    }

    return RUNNING;
  }
}
