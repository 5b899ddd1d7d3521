// input/actions.ts — Action symbols, move strings and key bindings

import type { Action } from '../types/index.js';
import { ACTIONS } from '../types/index.js';
import type { Result } from '../shared/result.js';
import { ok, err } from '../shared/result.js';

const ACTION_SYMBOLS: Readonly<Record<Action, string>> = {
  up: 'U',
  down: 'D',
  left: 'L',
  right: 'R',
  wait: 'W',
  use_razor: 'S',
  abort: 'A',
  restart: 'X',
  skip: 'N',
};

const SYMBOL_ACTIONS: ReadonlyMap<string, Action> = new Map(
  ACTIONS.map((action): [string, Action] => [ACTION_SYMBOLS[action], action]),
);

export function actionToSymbol(action: Action): string {
  return ACTION_SYMBOLS[action];
}

export function symbolToAction(symbol: string): Action | null {
  return SYMBOL_ACTIONS.get(symbol.toUpperCase()) ?? null;
}

/** Parses a move string such as `RRDLA`. Whitespace is ignored. */
export function parseMoves(text: string): Result<Action[], { symbol: string; index: number }> {
  const actions: Action[] = [];
  let index = 0;
  for (const symbol of text) {
    index++;
    if (/\s/.test(symbol)) continue;
    const action = symbolToAction(symbol);
    if (!action) return err({ symbol, index });
    actions.push(action);
  }
  return ok(actions);
}

export function formatMoves(history: readonly Action[]): string {
  return history.map(actionToSymbol).join('');
}

/** Subset of node:readline's keypress payload. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

const KEY_BINDINGS: ReadonlyMap<string, Action> = new Map<string, Action>([
  ['up', 'up'],
  ['k', 'up'],
  ['down', 'down'],
  ['j', 'down'],
  ['left', 'left'],
  ['h', 'left'],
  ['right', 'right'],
  ['l', 'right'],
  ['space', 'wait'],
  ['.', 'wait'],
  ['s', 'use_razor'],
  ['q', 'abort'],
  ['escape', 'abort'],
  ['r', 'restart'],
  ['n', 'skip'],
]);

export function keyToAction(key: KeyPress): Action | null {
  if (key.ctrl && key.name === 'c') return 'abort';
  const name = key.name ?? key.sequence;
  if (name === undefined) return null;
  return KEY_BINDINGS.get(name) ?? null;
}
