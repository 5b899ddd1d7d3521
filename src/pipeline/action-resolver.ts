// pipeline/action-resolver.ts — The robot's one action per tick

import type { Action, Direction, Position } from '../types/index.js';
import { isDirection, neighbors4, samePosition, step } from '../types/index.js';
import {
  EMPTY,
  OPEN_LIFT,
  ROBOT,
  isBeard,
  isEmpty,
  isLiftClosed,
} from '../types/cell.js';
import type { TickState } from '../engine/tick-state.js';
import { EngineInvariantError } from '../shared/errors.js';

export class ActionResolver {
  resolve(state: TickState, action: Action): void {
    this.openLiftIfQuotaMet(state);

    if (isDirection(action)) {
      this.resolveMove(state, action);
      return;
    }

    switch (action) {
      case 'wait':
        return;
      case 'use_razor':
        this.resolveRazor(state);
        return;
      case 'abort':
      case 'restart':
      case 'skip':
        throw new EngineInvariantError(`Meta action "${action}" reached the action resolver`);
    }
  }

  private openLiftIfQuotaMet(state: TickState): void {
    const lift = state.lift;
    if (!isLiftClosed(state.grid.get(lift))) return;
    if (state.lambdasCollected < state.level.lambdas) return;

    state.grid.set(lift, OPEN_LIFT);
    state.events.push({ type: 'lift_opened', position: lift });
  }

  private resolveMove(state: TickState, direction: Direction): void {
    const from = state.robot;
    const to = step(from, direction);
    const cell = state.grid.get(to);

    switch (cell.kind) {
      case 'empty':
      case 'earth':
        this.moveRobot(state, to);
        return;

      case 'lambda':
        this.moveRobot(state, to);
        state.lambdasCollected++;
        state.events.push({ type: 'lambda_collected', position: to, total: state.lambdasCollected });
        return;

      case 'razor':
        this.moveRobot(state, to);
        state.razors++;
        state.events.push({ type: 'razor_picked', position: to, total: state.razors });
        return;

      case 'rock': {
        if (direction !== 'left' && direction !== 'right') {
          this.reject(state, direction, 'Rocks can only be pushed sideways');
          return;
        }
        if (cell.rock !== 'simple') {
          this.reject(state, direction, 'Higher-order rocks cannot be pushed');
          return;
        }
        const beyond = step(to, direction);
        if (!isEmpty(state.grid.get(beyond))) {
          this.reject(state, direction, 'Nothing to push the rock into');
          return;
        }
        state.grid.set(beyond, cell);
        state.events.push({ type: 'rock_pushed', from: to, to: beyond });
        this.moveRobot(state, to);
        return;
      }

      case 'lift':
        if (cell.state === 'closed') {
          this.reject(state, direction, 'Lift is closed');
          return;
        }
        this.moveRobot(state, to);
        state.enteredLift = true;
        return;

      case 'trampoline':
        this.teleport(state, cell.id);
        return;

      case 'wall':
        this.reject(state, direction, 'Wall');
        return;
      case 'target':
        this.reject(state, direction, 'Targets cannot be entered');
        return;
      case 'beard':
        this.reject(state, direction, 'Beard blocks the way');
        return;
      case 'robot':
        throw new EngineInvariantError(`Second robot found at (${to.x}, ${to.y})`);
    }
  }

  private resolveRazor(state: TickState): void {
    if (state.razors === 0) {
      this.reject(state, 'use_razor', 'No razors held');
      return;
    }
    state.razors--;

    const cut: Position[] = [];
    for (const pos of neighbors4(state.robot)) {
      if (isBeard(state.grid.get(pos))) {
        state.grid.set(pos, EMPTY);
        cut.push(pos);
      }
    }
    state.events.push({ type: 'beard_cut', positions: cut });
  }

  /** Jumps to the trampoline's target and clears the whole group. */
  private teleport(state: TickState, trampolineId: string): void {
    const targetId = state.level.trampolines.get(trampolineId);
    const destination = targetId === undefined ? undefined : state.targets.get(targetId);
    if (targetId === undefined || destination === undefined) {
      throw new EngineInvariantError(
        `Trampoline ${trampolineId} in "${state.level.name}" leads nowhere`,
      );
    }

    const sources = state.targetSources.get(targetId) ?? [];
    for (const pos of sources) {
      state.grid.set(pos, EMPTY);
    }
    state.targets.delete(targetId);
    state.targetSources.delete(targetId);

    const from = state.robot;
    this.vacate(state, from);
    state.grid.set(destination, ROBOT);
    state.robot = destination;
    state.events.push({
      type: 'teleported',
      from,
      to: destination,
      targetId,
      cleared: [...sources],
    });
  }

  private moveRobot(state: TickState, to: Position): void {
    const from = state.robot;
    this.vacate(state, from);
    state.grid.set(to, ROBOT);
    state.robot = to;
    state.events.push({ type: 'moved', from, to });
  }

  /** The robot only ever stands on an open lift, so leaving one restores it. */
  private vacate(state: TickState, pos: Position): void {
    const onLift = samePosition(pos, state.lift);
    state.grid.set(pos, onLift ? OPEN_LIFT : EMPTY);
  }

  private reject(state: TickState, action: Action, reason: string): void {
    state.rejected = { action, reason };
  }
}
