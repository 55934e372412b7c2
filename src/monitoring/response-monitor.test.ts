/**
 * Tests for ResponseMonitor.
 */

import { describe, expect, it } from 'vitest';
import { Logger } from '../utils/logger.js';
import { GLOBAL_WINDOW_SIZE, ResponseMonitor } from './response-monitor.js';

function createClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

describe('ResponseMonitor', () => {
  it('should measure the time between question and reply', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 2000, now: clock.now });

    monitor.startQuestion('s1');
    clock.advance(1500);

    expect(monitor.recordResponse('s1')).toBe(1500);
  });

  it('should return 0 and log a warning for a reply without a question', () => {
    const lines: string[] = [];
    const monitor = new ResponseMonitor({
      targetResponseMs: 2000,
      logger: new Logger({ component: 'ResponseMonitor', sink: (line) => lines.push(line) }),
    });

    expect(monitor.recordResponse('s1')).toBe(0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'warn',
      event: 'response_without_question',
      data: { sessionId: 's1' },
    });
  });

  it('should report per-session statistics', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 2000, now: clock.now });

    monitor.startQuestion('s1');
    clock.advance(1000);
    monitor.recordResponse('s1');
    monitor.startQuestion('s1');
    clock.advance(3000);
    monitor.recordResponse('s1');
    monitor.startQuestion('s1');
    monitor.recordFailure('s1');

    expect(monitor.getSessionStats('s1')).toEqual({
      responses: 2,
      failures: 1,
      averageResponseMs: 2000,
      minResponseMs: 1000,
      maxResponseMs: 3000,
      failureRate: 1 / 3,
    });
    expect(monitor.getSessionStats('unknown')).toBeUndefined();
  });

  it('should average only the most recent responses globally', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 2000, now: clock.now });

    monitor.startQuestion('old');
    clock.advance(100_000);
    monitor.recordResponse('old');
    for (let i = 0; i < GLOBAL_WINDOW_SIZE; i++) {
      monitor.startQuestion('new');
      clock.advance(1000);
      monitor.recordResponse('new');
    }

    const stats = monitor.getGlobalStats();
    expect(stats.averageResponseMs).toBe(1000);
    expect(stats.totalResponses).toBe(GLOBAL_WINDOW_SIZE + 1);
    expect(stats.responseRate).toBe(1);
  });

  it('should report optimal performance when all thresholds hold', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 2000, now: clock.now });
    monitor.startQuestion('s1');
    clock.advance(500);
    monitor.recordResponse('s1');

    expect(monitor.getOptimizationSuggestions()).toEqual(['Response times are within target.']);
  });

  it('should suggest changes for slow replies, failures and unanswered questions', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 1000, now: clock.now });
    monitor.startQuestion('s1');
    clock.advance(5000);
    monitor.recordResponse('s1');
    monitor.startQuestion('s1');
    monitor.recordFailure('s1');

    expect(monitor.getOptimizationSuggestions()).toEqual([
      'Average response time (5.0s) is more than twice the target; ask shorter questions.',
      'Many questions failed; check the generation backend and its timeout.',
      'Fewer than 80% of questions were answered; make questions easier to reply to.',
    ]);
  });

  it('should format a report', () => {
    const clock = createClock();
    const monitor = new ResponseMonitor({ targetResponseMs: 2000, now: clock.now });
    monitor.startQuestion('s1');
    clock.advance(1250);
    monitor.recordResponse('s1');

    const report = monitor.formatReport().split('\n');
    expect(report).toContain('  Average response time: 1.25s');
    expect(report).toContain('  Response rate: 100.0%');
  });
});
