// cli/terminal.ts — Raw keypress input and frame output

import { emitKeypressEvents } from 'node:readline';
import type { Action } from '../src/types/index.js';
import { keyToAction, type KeyPress } from '../src/input/actions.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Reads single keypresses from stdin and reports the bound action.
 * Returns a function that restores the terminal and stops listening.
 */
export function startKeyReader(onAction: (action: Action) => void): () => void {
  const stdin = process.stdin;
  emitKeypressEvents(stdin);
  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.resume();

  const listener = (str: string | undefined, key: KeyPress | undefined): void => {
    const action = keyToAction(key ?? { sequence: str });
    if (action) onAction(action);
  };
  stdin.on('keypress', listener);

  return () => {
    stdin.off('keypress', listener);
    if (stdin.isTTY) stdin.setRawMode(false);
    stdin.pause();
  };
}

export function writeFrame(frame: string, log: string[]): void {
  process.stdout.write(CLEAR_SCREEN + frame + '\n');
  for (const line of log) process.stdout.write(line + '\n');
}
