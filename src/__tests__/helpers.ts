import type { Session } from '../core/@types';
import { createSession, type CreateSessionInput } from '../core/session/session';
import type { Clock, RandomSource } from '../core/shared/runtime';

export class ManualClock implements Clock {
  public constructor(private current = 1_700_000_000_000) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): void {
    this.current += ms;
  }
}

export const fixedRandom = (value = 0): RandomSource => ({
  next: () => value,
});

export const noSleep = (): Promise<void> => Promise.resolve();

export const makeSession = (overrides: Partial<CreateSessionInput> = {}, clock: Clock = new ManualClock()): Session =>
  createSession(
    {
      userId: 'user-1',
      userRole: 'finance',
      scenarioType: 'phishing',
      patternId: 'phishing-vendor-payment',
      difficultyLevel: 1,
      focusCategory: 'urgency',
      totalBeats: 2,
      ...overrides,
    },
    clock,
  );
