import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import type { SessionRecord } from '../core/@types';
import { InMemoryProfileStore } from '../core/memory/inMemoryProfileStore';
import { SessionMemory } from '../core/memory/sessionMemory';
import { AppError } from '../core/shared/errors/app-error';
import { createDefaultProfile } from '../core/tools/difficulty';
import { makeSession, ManualClock } from './helpers';

const NOW = '2026-04-02T09:30:00.000Z';

const record = (sessionId: string, completedAt: string): SessionRecord => ({
  sessionId,
  userId: 'user-1',
  scenarioType: 'vishing',
  patternId: 'vishing-tech-support',
  difficultyLevel: 2,
  overallScore: 72.5,
  riskLevel: 'moderate',
  decisionCount: 2,
  correctDecisions: 1,
  hintsUsed: 0,
  durationSeconds: 95,
  categoryBreakdown: [{ category: 'fear', decisionCount: 2, averageScore: 72.5, failures: 1, trend: [100, 45] }],
  completedAt,
});

describe('InMemoryProfileStore', () => {
  it('round-trips profiles without sharing references', async () => {
    const store = new InMemoryProfileStore();
    const profile = createDefaultProfile('user-1', 'hr', NOW);

    await store.saveProfile(profile);
    const loaded = await store.loadProfile('user-1');
    profile.recentPatternIds.push('mutated-after-save');

    expect(loaded).toEqual(createDefaultProfile('user-1', 'hr', NOW));
  });

  it('hands out a default profile for a new user that saves back unchanged', async () => {
    const store = new InMemoryProfileStore(new ManualClock());
    const fresh = await store.loadProfile('new-user');

    expect(fresh).toEqual(createDefaultProfile('new-user', 'general', '2023-11-14T22:13:20.000Z'));

    await store.saveProfile(fresh);

    expect(await store.loadProfile('new-user')).toEqual(fresh);
  });

  it('applies concurrent updates one at a time', async () => {
    const store = new InMemoryProfileStore();

    await Promise.all(
      Array.from({ length: 5 }, () =>
        store.updateProfile('user-1', (current) => ({ ...current, totalSessions: current.totalSessions + 1 })),
      ),
    );

    expect((await store.loadProfile('user-1')).totalSessions).toBe(5);
  });

  it('refuses an update that changes the user id', async () => {
    const store = new InMemoryProfileStore(new ManualClock());

    await expect(store.updateProfile('user-1', () => createDefaultProfile('user-2', 'general', NOW))).rejects.toThrow(
      'Profile updater changed userId user-1 to user-2.',
    );
    expect((await store.loadProfile('user-1')).totalSessions).toBe(0);
    expect((await store.loadProfile('user-1')).createdAt).toBe('2023-11-14T22:13:20.000Z');
  });

  it('rejects invalid profiles', async () => {
    const store = new InMemoryProfileStore();
    const profile = { ...createDefaultProfile('user-1', 'general', NOW), totalSessions: -1 };

    await expect(store.saveProfile(profile)).rejects.toBeInstanceOf(ZodError);
  });

  it('lists session records newest first without duplicates', async () => {
    const store = new InMemoryProfileStore();

    await store.appendSessionRecord(record('s-1', '2026-04-01T10:00:00.000Z'));
    await store.appendSessionRecord(record('s-2', '2026-04-02T10:00:00.000Z'));
    await store.appendSessionRecord(record('s-1', '2026-04-01T10:00:00.000Z'));

    const records = await store.listSessionRecords('user-1');

    expect(records.map((item) => item.sessionId)).toEqual(['s-2', 's-1']);
    expect(await store.listSessionRecords('user-1', 1)).toEqual([record('s-2', '2026-04-02T10:00:00.000Z')]);
    expect(await store.listSessionRecords('user-2')).toEqual([]);
  });
});

describe('SessionMemory', () => {
  it('looks sessions up by id and user', () => {
    const memory = new SessionMemory();
    const session = memory.save(makeSession({ userId: 'user-7' }));

    expect(memory.getSession(session.id)).toBe(session);
    expect(memory.listByUser('user-7')).toEqual([session]);
    expect(() => memory.mustGetSession('missing')).toThrow(AppError);
  });

  it('evicts scored sessions first when full', () => {
    const memory = new SessionMemory({ maxSessions: 2 });
    const older = memory.save(makeSession());
    const finished = memory.save(makeSession());
    finished.scored = true;
    const live = memory.save(makeSession());

    expect(memory.getSession(finished.id)).toBeUndefined();
    expect(memory.getSession(older.id)).toBe(older);
    expect(memory.getSession(live.id)).toBe(live);
  });

  it('drops the oldest unfinished session when nothing is scored', () => {
    const evicted: string[] = [];
    const memory = new SessionMemory({ maxSessions: 1 });
    memory.onEvict((session) => evicted.push(session.id));
    const abandoned = memory.save(makeSession());
    const live = memory.save(makeSession());

    expect(evicted).toEqual([abandoned.id]);
    expect(memory.getSession(live.id)).toBe(live);
  });

  it('drops sessions that have been idle past the time limit', () => {
    const clock = new ManualClock();
    const evicted: string[] = [];
    const memory = new SessionMemory({ idleTtlMs: 60_000, clock });
    memory.onEvict((session) => evicted.push(session.id));
    const idle = memory.save(makeSession({}, clock));

    clock.advance(60_001);
    const fresh = memory.save(makeSession({}, clock));

    expect(evicted).toEqual([idle.id]);
    expect(memory.getSession(idle.id)).toBeUndefined();
    expect(memory.getSession(fresh.id)).toBe(fresh);
  });
});
