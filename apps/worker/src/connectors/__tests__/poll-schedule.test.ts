import { describe, it, expect } from 'vitest';
import { PollSchedule } from '../protocol/poll-schedule.js';
import { FakeClock } from '../../test/fake-time.js';

describe('PollSchedule', () => {
  it('waits one interval before the first poll', () => {
    const clock = new FakeClock(1_000);
    const schedule = new PollSchedule(15_000, 3, clock.now);

    expect(schedule.delayUntilNextPoll()).toBe(15_000);
    clock.advance(10_000);
    expect(schedule.delayUntilNextPoll()).toBe(5_000);
    clock.advance(20_000);
    expect(schedule.delayUntilNextPoll()).toBe(0);
  });

  it('schedules each poll one interval after the previous attempt', () => {
    const clock = new FakeClock(0);
    const schedule = new PollSchedule(500, 3, clock.now);

    clock.advance(700);
    expect(schedule.recordAttempt()).toBe(1);
    expect(schedule.delayUntilNextPoll()).toBe(500);
    clock.advance(200);
    expect(schedule.delayUntilNextPoll()).toBe(300);
  });

  it('is exhausted after maxAttempts', () => {
    const schedule = new PollSchedule(10, 2, () => 0);

    expect(schedule.exhausted).toBe(false);
    schedule.recordAttempt();
    expect(schedule.exhausted).toBe(false);
    schedule.recordAttempt();
    expect(schedule.exhausted).toBe(true);
    expect(schedule.attempts).toBe(2);
  });
});
