// types/action.ts — Player actions and rejections

import type { Direction } from './core.js';

export type MetaAction = 'abort' | 'restart' | 'skip';

export type Action = Direction | 'wait' | 'use_razor' | MetaAction;

export const ACTIONS: readonly Action[] = [
  'up', 'down', 'left', 'right', 'wait', 'use_razor', 'abort', 'restart', 'skip',
];

export function isMetaAction(action: Action): action is MetaAction {
  return action === 'abort' || action === 'restart' || action === 'skip';
}

export function isDirection(action: Action): action is Direction {
  return action === 'up' || action === 'down' || action === 'left' || action === 'right';
}

export interface RejectedAction {
  action: Action;
  reason: string;
}
