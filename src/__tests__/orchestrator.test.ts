import { afterEach, describe, expect, it, vi } from 'vitest';

import { InMemoryProfileStore } from '../core/memory/inMemoryProfileStore';
import type { SessionMemoryOptions } from '../core/memory/sessionMemory';
import type { OrchestratorConfig } from '../core/orchestrator';
import { createSimulation, type Simulation } from '../core/simulation';
import { AppError } from '../core/shared/errors/app-error';
import { InvalidStateError, PrematureCompletionError } from '../core/shared/errors/training-errors';
import type { Clock } from '../core/shared/runtime';
import {
  createDeterministicMockLlmTool,
  type GenerateChatCompletionInput,
  type GenerateChatCompletionOutput,
  type LlmTool,
} from '../core/tools/llm';
import { fixedRandom, ManualClock, noSleep } from './helpers';

const OPENING =
  'A new email lands in your inbox from accounts@vendor-billing-portal.net with the subject ' +
  '"OVERDUE: final notice before service suspension".';
const FIRST_BEAT =
  'The email says the invoice is 30 days overdue and your finance account will be suspended at 5pm today ' +
  'unless you pay through the secure portal link below.';
const SECOND_BEAT =
  'A follow-up arrives claiming to be from your CFO: "Please get this vendor paid now, I already approved it." ' +
  'It comes from a personal webmail address.';
const FIRST_HINT = 'Before acting, notice how much time pressure this phishing message is putting on you.';
const PAUSED = 'Session paused. Your progress is saved.';
const RESUMED = 'Session resumed. Pick up where you left off.';

/** Echoes the template like the mock tool, after a per-call delay in real milliseconds. */
class DelayedLlm implements LlmTool {
  private readonly echo = createDeterministicMockLlmTool();
  private calls = 0;

  public constructor(private readonly delayFor: (call: number) => number) {}

  public async generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput> {
    this.calls += 1;
    const delay = this.delayFor(this.calls);

    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    return this.echo.generateChatCompletion(input);
  }
}

interface Harness {
  simulation: Simulation;
  profiles: InMemoryProfileStore;
}

const running: Simulation[] = [];

interface HarnessOptions {
  agentsOnline: boolean;
  clock?: Clock;
  llm?: LlmTool;
  config?: Partial<OrchestratorConfig>;
  sessionMemory?: Omit<SessionMemoryOptions, 'clock'>;
}

const createHarness = (options: HarnessOptions): Harness => {
  const profiles = new InMemoryProfileStore(options.clock);
  const simulation = createSimulation({
    llm: options.llm ?? createDeterministicMockLlmTool(),
    profiles,
    random: fixedRandom(0),
    sleep: noSleep,
    workerOptions: { pollTimeoutMs: 50 },
    config: {
      protocolTimeoutMs: options.agentsOnline ? 1_000 : 20,
      retryPolicy: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
      ...options.config,
    },
    ...(options.clock ? { clock: options.clock } : {}),
    ...(options.sessionMemory ? { sessionMemory: options.sessionMemory } : {}),
  });

  if (options.agentsOnline) {
    simulation.start();
  }

  running.push(simulation);
  return { simulation, profiles };
};

afterEach(async () => {
  await Promise.all(running.splice(0).map((simulation) => simulation.stop()));
});

describe('Orchestrator with threat agents online', () => {
  it('runs a scenario from planning to a scored evaluation', async () => {
    const { simulation, profiles } = createHarness({ agentsOnline: true });
    const { orchestrator } = simulation;

    const session = await orchestrator.startScenario('user-1', 'phishing', 'finance');

    expect(session.patternId).toBe('phishing-vendor-payment');
    expect(session.state).toBe('intro');
    expect(session.activeThreatAgentId).toBe('threat_actor:phishing');
    expect(session.currentBeat?.source).toBe('generated');
    expect(session.turns.map((turn) => turn.content)).toEqual([OPENING]);

    const opening = await orchestrator.submitUserInput(session.id, 'Ready when you are');

    expect(opening.state).toBe('decision_pending');
    expect(opening.turns.map((turn) => turn.role)).toEqual(['trainee', 'threat_actor']);
    expect(opening.turns[1]?.content).toBe(FIRST_BEAT);
    expect(opening.turns[1]?.agentId).toBe('threat_actor:phishing');

    const verified = await orchestrator.submitUserInput(
      session.id,
      'I will call the vendor on the number we already have to verify it',
    );

    expect(verified.classifiedAction).toBe('verified_first');
    expect(verified.decision?.turnIndex).toBe(3);
    expect(verified.decision?.correctAction).toBe('verified_first');
    expect(verified.state).toBe('decision_pending');
    expect(verified.turns.map((turn) => turn.role)).toEqual(['trainee', 'threat_actor']);

    const phishingAgent = simulation.agents.find((agent) => agent.id === 'threat_actor:phishing');
    expect(phishingAgent?.trackedDecisions(session.id)).toHaveLength(1);

    const reported = await orchestrator.submitUserInput(
      session.id,
      "This is a scam, I'm reporting it to the security team",
    );

    expect(reported.classifiedAction).toBe('recognized_and_reported');
    expect(reported.state).toBe('resolved');
    expect(reported.turns.map((turn) => turn.content)).toEqual([
      "This is a scam, I'm reporting it to the security team",
      'The scenario has concluded. Complete the session to see your debrief.',
    ]);

    const evaluation = await orchestrator.completeSession(session.id);

    expect(evaluation.score.overallScore).toBe(90);
    expect(evaluation.score.riskLevel).toBe('low');
    expect(evaluation.score.correctDecisions).toBe(2);
    expect(evaluation.difficulty).toEqual({ previous: 1, next: 2, successRate: 1, reason: 'performing_well' });
    expect(evaluation.nextFocusCategory).toBe('urgency');
    expect(evaluation.debrief.performanceLevel).toBe('excellent');
    expect(evaluation.debrief.redFlags).toEqual([
      'external_email',
      'urgency_language',
      'financial_request',
      'executive_impersonation',
      'personal_email_address',
    ]);

    const closed = simulation.memory.mustGetSession(session.id);
    expect(closed.state).toBe('closed');
    expect(closed.scored).toBe(true);
    expect(closed.activeThreatAgentId).toBeNull();
    expect(closed.turns[closed.turns.length - 1]?.content).toBe(evaluation.debrief.content);

    const profile = await profiles.loadProfile('user-1');
    expect(profile.difficultyLevel).toBe(2);
    expect(profile.role).toBe('finance');
    expect(profile.totalSessions).toBe(1);
    expect(profile.recentPatternIds).toEqual(['phishing-vendor-payment']);

    const records = await profiles.listSessionRecords('user-1');
    expect(records.map((record) => [record.sessionId, record.overallScore])).toEqual([[session.id, 90]]);

    await expect(orchestrator.completeSession(session.id)).resolves.toBe(evaluation);
    expect((await profiles.loadProfile('user-1')).totalSessions).toBe(1);
  });

  it('plans the next scenario from the updated profile', async () => {
    const { simulation } = createHarness({ agentsOnline: true });
    const { orchestrator } = simulation;
    const first = await orchestrator.startScenario('user-1', 'phishing', 'finance');
    await orchestrator.submitUserInput(first.id, 'ready');
    await orchestrator.submitUserInput(first.id, 'I will verify it first');
    await orchestrator.submitUserInput(first.id, 'I will report it');
    await orchestrator.completeSession(first.id);

    const second = await orchestrator.startScenario('user-1', 'phishing');

    expect(second.patternId).toBe('phishing-it-security-alert');
    expect(second.difficultyLevel).toBe(2);
    expect(second.userRole).toBe('finance');
  });
});

describe('Orchestrator with slow or failing threat agents', () => {
  const singleAttempt = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

  it('generates content for two trainees of the same scenario type at once', async () => {
    const { simulation } = createHarness({
      agentsOnline: true,
      llm: new DelayedLlm(() => 150),
      config: { protocolTimeoutMs: 250, retryPolicy: singleAttempt },
    });
    const { orchestrator } = simulation;

    const [first, second] = await Promise.all([
      orchestrator.startScenario('user-a', 'phishing', 'finance'),
      orchestrator.startScenario('user-b', 'phishing', 'finance'),
    ]);

    expect([first.activeThreatAgentId, first.currentBeat?.source]).toEqual(['threat_actor:phishing', 'generated']);
    expect([second.activeThreatAgentId, second.currentBeat?.source]).toEqual(['threat_actor:phishing', 'generated']);
  });

  it('releases the agent context after falling back mid-scenario', async () => {
    const { simulation } = createHarness({
      agentsOnline: true,
      llm: new DelayedLlm((call) => (call === 1 ? 0 : 300)),
      config: { protocolTimeoutMs: 100, retryPolicy: singleAttempt },
    });
    const { orchestrator } = simulation;
    const phishingAgent = simulation.agents.find((agent) => agent.id === 'threat_actor:phishing');
    const session = await orchestrator.startScenario('user-9', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    const verified = await orchestrator.submitUserInput(session.id, 'I will verify it first');

    expect(verified.turns[1]?.content).toBe(SECOND_BEAT);
    expect(verified.turns[1]?.agentId).toBeUndefined();
    expect(session.activeThreatAgentId).toBeNull();
    expect(phishingAgent?.trackedDecisions(session.id)).toHaveLength(1);

    await orchestrator.submitUserInput(session.id, 'I will report it');
    await orchestrator.completeSession(session.id);

    await vi.waitFor(() => expect(phishingAgent?.trackedDecisions(session.id)).toHaveLength(0), { timeout: 2_000 });
    expect(session.contactedAgentIds).toEqual([]);
  });

  it('releases the agent context of a session abandoned past the idle limit', async () => {
    const clock = new ManualClock();
    const { simulation } = createHarness({ agentsOnline: true, clock, sessionMemory: { idleTtlMs: 60_000 } });
    const { orchestrator } = simulation;
    const phishingAgent = simulation.agents.find((agent) => agent.id === 'threat_actor:phishing');
    const abandoned = await orchestrator.startScenario('user-10', 'phishing', 'finance');
    await orchestrator.submitUserInput(abandoned.id, 'ready');
    await orchestrator.submitUserInput(abandoned.id, 'I will verify it first');

    expect(phishingAgent?.trackedDecisions(abandoned.id)).toHaveLength(1);

    clock.advance(120_000);
    await orchestrator.startScenario('user-11', 'phishing', 'finance');

    expect(() => orchestrator.getSessionSummary(abandoned.id)).toThrow(`Session ${abandoned.id} not found.`);
    await vi.waitFor(() => expect(phishingAgent?.trackedDecisions(abandoned.id)).toHaveLength(0), { timeout: 2_000 });
  });

  it('concludes the scenario when the next beat cannot be requested', async () => {
    const { simulation } = createHarness({ agentsOnline: true });
    const { orchestrator, bus } = simulation;
    const session = await orchestrator.startScenario('user-12', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');
    vi.spyOn(bus, 'request').mockRejectedValueOnce(new Error('transport failure'));

    const update = await orchestrator.submitUserInput(session.id, 'I will verify it first');

    expect(update.classifiedAction).toBe('verified_first');
    expect(update.state).toBe('resolved');
    expect(update.turns.map((turn) => turn.content)).toEqual([
      'I will verify it first',
      'The scenario has concluded. Complete the session to see your debrief.',
    ]);
    expect(session.currentBeat).toBeNull();
    expect(session.decisions).toHaveLength(1);
    await expect(orchestrator.completeSession(session.id)).resolves.toMatchObject({
      score: { decisionCount: 1 },
    });
  });
});

describe('Orchestrator with threat agents unreachable', () => {
  it('falls back to template beats and still completes', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator, bus } = simulation;

    const session = await orchestrator.startScenario('user-2', 'phishing', 'finance');

    expect(session.activeThreatAgentId).toBeNull();
    expect(session.currentBeat?.source).toBe('template');
    expect(bus.pendingCount('threat_actor:phishing')).toBe(2);

    const opening = await orchestrator.submitUserInput(session.id, 'ready');
    expect(opening.turns[1]?.content).toBe(FIRST_BEAT);
    expect(opening.turns[1]?.agentId).toBeUndefined();

    const verified = await orchestrator.submitUserInput(session.id, 'I will verify with the vendor first');
    expect(verified.turns[1]?.content).toBe(SECOND_BEAT);
    expect(bus.pendingCount('threat_actor:phishing')).toBe(2);

    const reported = await orchestrator.submitUserInput(session.id, 'I would report it as phishing');
    expect(reported.state).toBe('resolved');

    const evaluation = await orchestrator.completeSession(session.id);
    const closed = simulation.memory.mustGetSession(session.id);

    expect(evaluation.score.overallScore).toBe(90);
    expect(closed.state).toBe('closed');
    expect(closed.scored).toBe(true);
  });

  it('excludes paused time from response latency', async () => {
    const clock = new ManualClock(5_000_000);
    const { simulation } = createHarness({ agentsOnline: false, clock });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-3', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    const paused = await orchestrator.pauseSession(session.id);

    expect(paused.state).toBe('closed');
    expect(paused.pauseCount).toBe(1);
    expect(paused.lastTurns[paused.lastTurns.length - 1]?.content).toBe('Session paused. Your progress is saved.');
    await expect(orchestrator.submitUserInput(session.id, 'hello?')).rejects.toBeInstanceOf(InvalidStateError);
    await expect(orchestrator.completeSession(session.id)).rejects.toBeInstanceOf(PrematureCompletionError);

    clock.advance(60_000);
    const resumed = await orchestrator.resumeSession(session.id);
    expect(resumed.state).toBe('decision_pending');

    clock.advance(1_500);
    const update = await orchestrator.submitUserInput(session.id, 'I will verify it first');

    expect(update.decision?.responseLatencyMs).toBe(1_498);
  });

  it('asks for clarification and offers a hint when the trainee is confused', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-4', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    const update = await orchestrator.submitUserInput(session.id, "I'm confused, what should I do?");

    expect(update.decision).toBeNull();
    expect(update.classifiedAction).toBeNull();
    expect(update.state).toBe('decision_pending');
    expect(update.hint).toBe(FIRST_HINT);
    expect(update.turns.map((turn) => turn.role)).toEqual(['trainee', 'game_master', 'game_master']);
    expect(orchestrator.getSessionSummary(session.id).hintsUsed).toBe(1);
  });

  it('redacts secrets before they reach the transcript', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-5', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    const update = await orchestrator.submitUserInput(session.id, 'my password is test-secret');

    expect(update.redactions).toEqual(['secret_redacted']);
    expect(update.turns[0]?.content).toBe('my password is [redacted-secret]');
    expect(update.hint).toBeNull();
  });

  it('serves hints on request until the budget runs out', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-6', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    await expect(orchestrator.requestHint(session.id)).resolves.toEqual({
      sessionId: session.id,
      hint: FIRST_HINT,
      hintsUsed: 1,
    });
    await orchestrator.requestHint(session.id);
    await orchestrator.requestHint(session.id);

    await expect(orchestrator.requestHint(session.id)).resolves.toEqual({
      sessionId: session.id,
      hint: null,
      hintsUsed: 3,
    });
  });

  it('scores an early exit as insufficient data and holds difficulty', async () => {
    const { simulation, profiles } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-7', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    await expect(orchestrator.completeSession(session.id)).rejects.toBeInstanceOf(PrematureCompletionError);

    const ended = await orchestrator.submitUserInput(session.id, 'done');
    expect(ended.state).toBe('resolved');

    const evaluation = await orchestrator.completeSession(session.id);

    expect(evaluation.score.status).toBe('insufficient_data');
    expect(orchestrator.getRiskAssessment(session.id).riskLevel).toBe('insufficient_data');
    expect(evaluation.difficulty).toEqual({
      previous: 1,
      next: 1,
      successRate: null,
      reason: 'insufficient_history',
    });
    expect((await profiles.loadProfile('user-7')).history[0]?.overallScore).toBeNull();
  });

  it('rejects empty messages and unknown sessions', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-8', 'bec');

    await expect(orchestrator.submitUserInput(session.id, '   ')).rejects.toMatchObject({ code: 'EMPTY_MESSAGE' });
    await expect(orchestrator.submitUserInput('missing', 'hello')).rejects.toBeInstanceOf(AppError);
    expect(() => orchestrator.getSessionSummary('missing')).toThrow('Session missing not found.');
  });

  it('restores turns, decisions and hints exactly across repeated pauses', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-13', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');
    await orchestrator.submitUserInput(session.id, 'I will verify it first');
    await orchestrator.requestHint(session.id);

    const turnsBefore = [...session.turns];
    const decisionsBefore = [...session.decisions];
    const beatBefore = session.currentBeat;

    for (let cycle = 0; cycle < 3; cycle += 1) {
      await orchestrator.pauseSession(session.id);
      await orchestrator.resumeSession(session.id);
    }

    expect(session.state).toBe('decision_pending');
    expect(session.pauseCount).toBe(3);
    expect(session.hintsUsed).toBe(1);
    expect(session.decisions).toEqual(decisionsBefore);
    expect(session.currentBeat).toBe(beatBefore);
    expect(session.turns.slice(0, turnsBefore.length)).toEqual(turnsBefore);
    expect(session.turns.slice(turnsBefore.length).map((turn) => turn.content)).toEqual([
      PAUSED,
      RESUMED,
      PAUSED,
      RESUMED,
      PAUSED,
      RESUMED,
    ]);

    await orchestrator.submitUserInput(session.id, 'I will report it');
    const evaluation = await orchestrator.completeSession(session.id);

    expect(evaluation.score.decisionCount).toBe(2);
    expect(evaluation.hintsUsed).toBe(1);
  });

  it('handles overlapping inputs for one session one after another', async () => {
    const { simulation } = createHarness({ agentsOnline: false });
    const { orchestrator } = simulation;
    const session = await orchestrator.startScenario('user-14', 'phishing', 'finance');
    await orchestrator.submitUserInput(session.id, 'ready');

    const [verified, reported] = await Promise.all([
      orchestrator.submitUserInput(session.id, 'I will verify it first'),
      orchestrator.submitUserInput(session.id, 'I will report it'),
    ]);

    expect([verified.classifiedAction, verified.state]).toEqual(['verified_first', 'decision_pending']);
    expect([reported.classifiedAction, reported.state]).toEqual(['recognized_and_reported', 'resolved']);
    expect(session.decisions.map((decision) => decision.turnIndex)).toEqual([3, 5]);
    expect(reported.turns[0]?.content).toBe('I will report it');
  });
});
