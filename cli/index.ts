#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command } from 'commander';
import type { Action, WorldSnapshot } from '../src/types/index.js';
import { isTerminal } from '../src/types/index.js';
import { step, initialize } from '../src/engine/tick-engine.js';
import { readLevelFile, formatLevelError } from '../src/level/loader.js';
import { listLevels } from '../src/level/catalog.js';
import { GameSession, fileLevelSource } from '../src/session/game-session.js';
import { parseMoves, formatMoves } from '../src/input/actions.js';
import { renderSnapshot, formatVerdict } from '../src/render/renderer.js';
import { LOG_PREFIX } from '../src/shared/constants.js';
import { loadConfig } from './config.js';
import { describeSessionEvents } from './report.js';
import { startKeyReader, writeFrame } from './terminal.js';

interface DisplayOptions {
  color: boolean;
  levelsDir?: string;
}

function fail(message: string): never {
  process.stderr.write(`${message}\n`);
  process.exit(1);
}

async function loadOrExit(path: string): Promise<WorldSnapshot> {
  const loaded = await readLevelFile(path);
  if (!loaded.ok) fail(formatLevelError(loaded.error));
  return initialize(loaded.value);
}

const program = new Command();

program
  .name('mine-sim')
  .description('Dig for lambdas, dodge rocks and reach the lift')
  .version('0.1.0');

program
  .command('play')
  .description('Play levels interactively (all levels in the levels directory by default)')
  .argument('[levels...]', 'Level files, played in order')
  .option('--no-color', 'Disable ANSI colors')
  .option('--levels-dir <dir>', 'Directory to read levels from')
  .action(async (levels: string[], opts: DisplayOptions) => {
    const config = loadConfig({
      levelsDir: opts.levelsDir,
      color: opts.color === false ? false : undefined,
    });
    const paths = levels.length > 0 ? levels : await listLevels(config.levelsDir);
    if (paths.length === 0) fail(`No levels found in ${config.levelsDir}`);

    const session = new GameSession(paths.map(fileLevelSource));
    const show = (log: string[]): void => {
      if (session.finished) {
        for (const line of log) process.stdout.write(line + '\n');
        return;
      }
      writeFrame(renderSnapshot(session.snapshot, { color: config.color }), log);
    };

    show(describeSessionEvents(await session.start()));

    await new Promise<void>((resolve, reject) => {
      let pending: Promise<void> = Promise.resolve();
      const stop = startKeyReader((action: Action) => {
        pending = pending
          .then(async () => {
            if (session.finished) return;
            show(describeSessionEvents(await session.apply(action)));
            if (session.finished) {
              stop();
              resolve();
            }
          })
          .catch((error: unknown) => {
            stop();
            reject(error);
          });
      });
    });
  });

program
  .command('replay')
  .description('Apply a move string (U D L R W S A) to a level and print the result')
  .argument('<level>', 'Level file')
  .argument('<moves>', 'Move string, e.g. RRDDLA')
  .option('--no-color', 'Disable ANSI colors')
  .option('--trace', 'Print every frame, not just the last')
  .action(async (level: string, moves: string, opts: DisplayOptions & { trace?: boolean }) => {
    const config = loadConfig({ color: opts.color === false ? false : undefined });
    const parsed = parseMoves(moves);
    if (!parsed.ok) fail(`Unknown move "${parsed.error.symbol}" at position ${parsed.error.index}`);

    let snapshot = await loadOrExit(level);
    for (const action of parsed.value) {
      if (isTerminal(snapshot.progress)) break;
      const result = step(snapshot, action);
      snapshot = result.snapshot;
      if (opts.trace) {
        process.stdout.write(`${LOG_PREFIX} tick ${result.tick}: ${action}\n`);
        process.stdout.write(renderSnapshot(snapshot, { color: config.color }) + '\n');
      }
    }

    if (!opts.trace) process.stdout.write(renderSnapshot(snapshot, { color: config.color }) + '\n');
    process.stdout.write(
      `${LOG_PREFIX} ${formatVerdict(snapshot.progress)} after ${snapshot.moves} moves, ` +
      `${snapshot.lambdasCollected}/${snapshot.level.lambdas} lambdas (${formatMoves(snapshot.history)})\n`,
    );
  });

program
  .command('show')
  .description('Print the starting frame of a level')
  .argument('<level>', 'Level file')
  .option('--no-color', 'Disable ANSI colors')
  .action(async (level: string, opts: DisplayOptions) => {
    const config = loadConfig({ color: opts.color === false ? false : undefined });
    const snapshot = await loadOrExit(level);
    process.stdout.write(renderSnapshot(snapshot, { color: config.color }) + '\n');
  });

program.parseAsync().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${msg}\n`);
  process.exit(1);
});
