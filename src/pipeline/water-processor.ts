// pipeline/water-processor.ts — Flooding and the robot's air supply

import type { Tick } from '../types/index.js';
import type { TickState } from '../engine/tick-state.js';

export class WaterProcessor {
  tick(state: TickState, tick: Tick): void {
    const flooding = state.level.flooding;
    if (flooding > 0 && tick % flooding === 0) {
      state.water++;
      state.events.push({ type: 'water_rose', level: state.water });
    }

    if (state.robot.y <= state.water) {
      state.airLeft--;
    } else {
      state.airLeft = state.level.waterproof;
    }

    if (state.airLeft < 0) {
      state.conclude({ state: 'loss', reason: 'drowned' });
      state.events.push({ type: 'loss', reason: 'drowned', position: state.robot });
    }
  }
}
