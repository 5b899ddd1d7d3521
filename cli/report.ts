// cli/report.ts — Human-readable lines for session events

import type { TickEvent } from '../src/types/index.js';
import type { LevelSummary, SessionEvent } from '../src/session/game-session.js';
import { formatVerdict } from '../src/render/renderer.js';
import { LOG_PREFIX } from '../src/shared/constants.js';

export function describeTickEvent(event: TickEvent): string | null {
  switch (event.type) {
    case 'lambda_collected':
      return `Collected a lambda (${event.total} so far)`;
    case 'razor_picked':
      return `Picked up a razor (${event.total} held)`;
    case 'teleported':
      return `Jumped to target ${event.targetId}`;
    case 'lift_opened':
      return 'The lift is open';
    case 'beard_cut':
      return `Shaved ${event.positions.length} beard${event.positions.length === 1 ? '' : 's'}`;
    case 'lambda_crushed':
      return `A lambda was crushed at (${event.position.x}, ${event.position.y})`;
    case 'water_rose':
      return `Water rose to row ${event.level}`;
    case 'moved':
    case 'rock_pushed':
    case 'beard_grown':
    case 'rock_moved':
    case 'loss':
    case 'won':
      return null;
  }
}

export function formatSummary(summary: LevelSummary): string {
  return `${summary.name}: ${formatVerdict(summary.verdict)} ` +
    `(lambdas ${summary.lambdasCollected}, moves ${summary.moves}) ${summary.route}`;
}

/** Log lines for a batch of session events, prefixed like the rest of the CLI output. */
export function describeSessionEvents(events: SessionEvent[]): string[] {
  const lines: string[] = [];
  for (const event of events) {
    switch (event.type) {
      case 'level_started':
        lines.push(`${LOG_PREFIX} Level ${event.name}: collect ${event.snapshot.level.lambdas} lambdas`);
        break;
      case 'tick': {
        const { result } = event;
        if (result.rejected) {
          lines.push(`${LOG_PREFIX} ${result.rejected.action} rejected: ${result.rejected.reason}`);
        }
        for (const tickEvent of result.events) {
          const line = describeTickEvent(tickEvent);
          if (line) lines.push(`${LOG_PREFIX} ${line}`);
        }
        if (result.verdict.state !== 'running') {
          lines.push(`${LOG_PREFIX} ${formatVerdict(result.verdict)}`);
        }
        break;
      }
      case 'ignored':
        lines.push(`${LOG_PREFIX} ${event.reason}`);
        break;
      case 'finished':
        lines.push(`${LOG_PREFIX} Session over`);
        for (const summary of event.summaries) lines.push(`${LOG_PREFIX}   ${formatSummary(summary)}`);
        break;
    }
  }
  return lines;
}
