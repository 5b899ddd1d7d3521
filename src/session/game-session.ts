// session/game-session.ts — Drives a run through a list of levels
//
// Restart reloads the level from its source, win and skip move on to the next
// level, abort (or running out of levels) ends the session.

import type {
  Action,
  LevelDescriptor,
  LevelError,
  TickResult,
  Verdict,
  WorldSnapshot,
} from '../types/index.js';
import { isMetaAction } from '../types/index.js';
import { TickEngine } from '../engine/tick-engine.js';
import { readLevelFile, parseLevel, formatLevelError } from '../level/loader.js';
import { formatMoves } from '../input/actions.js';
import type { Result } from '../shared/result.js';
import { basename } from 'node:path';

export interface LevelSource {
  name: string;
  load(): Promise<Result<LevelDescriptor, LevelError>>;
}

export function fileLevelSource(path: string): LevelSource {
  return { name: basename(path), load: () => readLevelFile(path) };
}

export function textLevelSource(name: string, text: string): LevelSource {
  return { name, load: async () => parseLevel(text, name) };
}

export interface LevelSummary {
  name: string;
  verdict: Verdict;
  lambdasCollected: number;
  moves: number;
  route: string;
}

export type SessionEvent =
  | { type: 'level_started'; name: string; snapshot: WorldSnapshot }
  | { type: 'tick'; result: TickResult }
  | { type: 'ignored'; action: Action; reason: string }
  | { type: 'finished'; summaries: LevelSummary[] };

export class LevelLoadError extends Error {
  readonly detail: LevelError;

  constructor(detail: LevelError) {
    super(formatLevelError(detail));
    this.name = 'LevelLoadError';
    this.detail = detail;
  }
}

export class GameSession {
  private readonly sources: LevelSource[];
  private readonly engine: TickEngine;
  private index = 0;
  private current: WorldSnapshot | null = null;
  private done = false;
  readonly summaries: LevelSummary[] = [];

  constructor(sources: LevelSource[], engine: TickEngine = new TickEngine()) {
    if (sources.length === 0) throw new Error('GameSession needs at least one level');
    this.sources = sources;
    this.engine = engine;
  }

  get snapshot(): WorldSnapshot {
    if (!this.current) throw new Error('Session has not started');
    return this.current;
  }

  get finished(): boolean {
    return this.done;
  }

  get levelIndex(): number {
    return this.index;
  }

  async start(): Promise<SessionEvent[]> {
    return [await this.loadCurrent()];
  }

  async apply(action: Action): Promise<SessionEvent[]> {
    if (this.done) throw new Error('Session already finished');
    const snapshot = this.snapshot;

    // A lost level only listens to restart, skip and abort.
    if (snapshot.progress.state !== 'running') {
      if (!isMetaAction(action)) {
        return [{ type: 'ignored', action, reason: 'Level is over: restart, skip or abort' }];
      }
      if (action === 'restart') return [await this.loadCurrent()];
      this.record(snapshot, snapshot.progress);
      return action === 'skip' ? this.advance() : [this.finish()];
    }

    const result = this.engine.step(snapshot, action);
    this.current = result.snapshot;
    const events: SessionEvent[] = [{ type: 'tick', result }];
    events.push(...await this.afterVerdict(result.snapshot, result.verdict));
    return events;
  }

  private async afterVerdict(snapshot: WorldSnapshot, verdict: Verdict): Promise<SessionEvent[]> {
    switch (verdict.state) {
      case 'running':
      case 'loss':
        return [];
      case 'restart':
        return [await this.loadCurrent()];
      case 'win':
      case 'skip':
        this.record(snapshot, verdict);
        return this.advance();
      case 'abort':
        this.record(snapshot, verdict);
        return [this.finish()];
    }
  }

  private async advance(): Promise<SessionEvent[]> {
    this.index++;
    if (this.index >= this.sources.length) return [this.finish()];
    return [await this.loadCurrent()];
  }

  private async loadCurrent(): Promise<SessionEvent> {
    const source = this.sources[this.index];
    if (!source) throw new Error(`No level at index ${this.index}`);
    const loaded = await source.load();
    if (!loaded.ok) throw new LevelLoadError(loaded.error);
    this.current = this.engine.initialize(loaded.value);
    return { type: 'level_started', name: source.name, snapshot: this.current };
  }

  private record(snapshot: WorldSnapshot, verdict: Verdict): void {
    this.summaries.push({
      name: snapshot.level.name,
      verdict,
      lambdasCollected: snapshot.lambdasCollected,
      moves: snapshot.moves,
      route: formatMoves(snapshot.history),
    });
  }

  private finish(): SessionEvent {
    this.done = true;
    return { type: 'finished', summaries: [...this.summaries] };
  }
}
