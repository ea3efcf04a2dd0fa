import type {
  AgentMessageOf,
  DifficultyAdjustment,
  EvaluationResult,
  HintResponse,
  NarrativeUpdate,
  PerformanceHint,
  RiskAssessmentResponse,
  RiskLevel,
  ScenarioBeat,
  ScenarioCatalog,
  ScenarioPattern,
  ScenarioRequestMessage,
  ScenarioType,
  Session,
  SessionRecord,
  SessionSummaryResponse,
  UserAction,
  UserRole,
} from './@types';
import type { SessionMemoryStore } from './memory/sessionMemory';
import type { ProfileStore } from './memory/profileStore';
import type { AgentBus } from './protocol/agentBus';
import { DEFAULT_PROTOCOL_TIMEOUT_MS } from './protocol/agentBus';
import { createAgentMessage, GAME_MASTER_ID, threatActorId } from './protocol/messages';
import { isFailureAction } from './session/decisionPoint';
import {
  appendTurn,
  createSession,
  markScored,
  pauseSession as pauseSessionState,
  recordDecision,
  resumeSession as resumeSessionState,
  sessionDuration,
  transition,
} from './session/session';
import { AppError } from './shared/errors/app-error';
import {
  InvalidStateError,
  MailboxClosedError,
  PrematureCompletionError,
  ProtocolTimeoutError,
} from './shared/errors/training-errors';
import { KeyedSerialQueue } from './shared/keyed-queue';
import { logger, toErrorMessage } from './shared/logger';
import { DEFAULT_RETRY_POLICY, type RetryPolicy, type Sleep } from './shared/retry';
import { mathRandom, systemClock, toIso, type Clock, type RandomSource } from './shared/runtime';
import { generateDebrief } from './tools/debrief';
import {
  isCompletionSignal,
  signalsConfusion,
  type DecisionClassifier,
} from './tools/decisionClassifier';
import {
  applySessionOutcome,
  DEFAULT_ADAPTIVE_CONFIG,
  emptyCategoryCounts,
  selectFocusCategory,
  selectScenarioPattern,
  sumFailures,
  type AdaptiveConfig,
} from './tools/difficulty';
import { buildHint, DEFAULT_MAX_HINTS } from './tools/hints';
import { actionPoints, DEFAULT_SCORING_CONFIG, scoreDecisions, type ScoringConfig } from './tools/riskScoring';
import { applySafetyGuards } from './tools/safety';
import { fallbackPattern, mustFindPattern, renderTemplateBeat } from './tools/scenarioCatalog';

export interface OrchestratorConfig {
  protocolTimeoutMs: number;
  retryPolicy: RetryPolicy;
  adaptive: AdaptiveConfig;
  scoring: ScoringConfig;
  maxHints: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  protocolTimeoutMs: DEFAULT_PROTOCOL_TIMEOUT_MS,
  retryPolicy: DEFAULT_RETRY_POLICY,
  adaptive: DEFAULT_ADAPTIVE_CONFIG,
  scoring: DEFAULT_SCORING_CONFIG,
  maxHints: DEFAULT_MAX_HINTS,
};

export interface OrchestratorDependencies {
  memory: SessionMemoryStore;
  profiles: ProfileStore;
  bus: AgentBus;
  catalog: ScenarioCatalog;
  classifier: DecisionClassifier;
  config?: Partial<OrchestratorConfig>;
  clock?: Clock;
  random?: RandomSource;
  sleep?: Sleep;
}

const CLARIFICATION_MESSAGE =
  'Take a moment. What would you actually do here: go along with it, check it first, or report it?';
const SCENARIO_CONCLUDED_MESSAGE = 'The scenario has concluded. Complete the session to see your debrief.';
const SCENARIO_FINISHED_MESSAGE = 'This scenario is already finished. Complete the session to review your debrief.';
const TRAINEE_ENDED_MESSAGE = 'You have ended the scenario. Complete the session to see your debrief.';
const PAUSED_MESSAGE = 'Session paused. Your progress is saved.';
const RESUMED_MESSAGE = 'Session resumed. Pick up where you left off.';

const RECENT_DECISION_WINDOW = 3;

/**
 * The game master. Owns every session mutation; each per-session operation
 * runs through one keyed queue so turns, pauses and completion never overlap.
 */
export class Orchestrator {
  private readonly queue = new KeyedSerialQueue();
  private readonly evaluations = new Map<string, EvaluationResult>();
  private readonly config: OrchestratorConfig;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  public constructor(private readonly deps: OrchestratorDependencies) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? mathRandom;
    deps.memory.onEvict((session) => this.releaseSession(session));
  }

  public async startScenario(userId: string, requestedType?: ScenarioType, requestedRole?: UserRole): Promise<Session> {
    const trimmedUserId = userId.trim();

    if (!trimmedUserId) {
      throw new AppError(400, 'userId is required.', 'INVALID_USER');
    }

    const profile = await this.deps.profiles.loadProfile(trimmedUserId);
    const role = requestedRole ?? profile.role;
    const difficultyLevel = profile.difficultyLevel;
    const focusCategory = selectFocusCategory(sumFailures(profile.history), this.random);
    const pattern = selectScenarioPattern(
      this.deps.catalog,
      {
        ...(requestedType ? { scenarioType: requestedType } : {}),
        difficulty: difficultyLevel,
        focus: focusCategory,
        role,
        recentPatternIds: profile.recentPatternIds,
      },
      this.random,
    );

    const session = this.deps.memory.save(
      createSession(
        {
          userId: trimmedUserId,
          userRole: role,
          scenarioType: pattern.scenarioType,
          patternId: pattern.id,
          difficultyLevel,
          focusCategory,
          totalBeats: pattern.beats.length,
        },
        this.clock,
      ),
    );

    logger.info('scenario_planned', {
      sessionId: session.id,
      userId: trimmedUserId,
      scenarioType: pattern.scenarioType,
      patternId: pattern.id,
      difficultyLevel,
      focusCategory,
    });

    return this.queue.run(session.id, async () => {
      appendTurn(session, 'game_master', pattern.opening, { clock: this.clock });
      session.currentBeat = await this.activateThreatAgent(session, pattern);
      return session;
    });
  }

  public submitUserInput(sessionId: string, text: string): Promise<NarrativeUpdate> {
    return this.queue.run(sessionId, async () => {
      const session = this.deps.memory.mustGetSession(sessionId);
      const trimmed = text.trim();

      if (!trimmed) {
        throw new AppError(400, 'message cannot be empty.', 'EMPTY_MESSAGE');
      }

      if (session.state === 'closed') {
        throw new InvalidStateError(
          session.pausedFrom ? `Session ${session.id} is paused; resume it first.` : `Session ${session.id} is closed.`,
          session.state,
        );
      }

      const safety = applySafetyGuards(trimmed);
      if (safety.flags.length > 0) {
        logger.info('trainee_input_redacted', { sessionId, flags: safety.flags });
      }

      const traineeTurn = appendTurn(session, 'trainee', safety.cleanedText, { clock: this.clock });
      const update: NarrativeUpdate = {
        sessionId,
        state: session.state,
        turns: [],
        decision: null,
        classifiedAction: null,
        hint: null,
        redactions: safety.flags,
      };

      switch (session.state) {
        case 'intro':
          transition(session, 'engaged', this.clock);
          this.presentCurrentBeat(session);
          break;
        case 'engaged':
          if (isCompletionSignal(trimmed) || !session.currentBeat) {
            this.concludeScenario(session, TRAINEE_ENDED_MESSAGE);
          } else {
            this.presentCurrentBeat(session);
          }
          break;
        case 'decision_pending':
          await this.handleDecisionInput(session, traineeTurn.index, safety.cleanedText, trimmed, update);
          break;
        case 'resolved':
        case 'debrief':
          appendTurn(session, 'game_master', SCENARIO_FINISHED_MESSAGE, { clock: this.clock });
          break;
      }

      update.state = session.state;
      update.turns = session.turns.slice(traineeTurn.index);
      return update;
    });
  }

  public completeSession(sessionId: string): Promise<EvaluationResult> {
    return this.queue.run(sessionId, async () => {
      const session = this.deps.memory.mustGetSession(sessionId);
      const existing = this.evaluations.get(session.id);

      if (session.scored && existing) {
        return existing;
      }

      // A closed, unpaused session without a stored evaluation failed part-way through completion.
      const finishedNotEvaluated = session.state === 'closed' && session.pausedFrom === null;

      if (session.state !== 'resolved' && session.state !== 'debrief' && !finishedNotEvaluated) {
        throw new PrematureCompletionError(session.state);
      }

      const score = scoreDecisions(session.decisions, session.difficultyLevel, this.config.scoring);
      const debrief = generateDebrief(session, score);

      if (session.state === 'resolved') {
        transition(session, 'debrief', this.clock);
        appendTurn(session, 'game_master', debrief.content, { clock: this.clock });
      }

      if (session.state === 'debrief') {
        transition(session, 'closed', this.clock);
      }

      markScored(session);

      const completedAt = toIso(this.clock.now());
      const durationSeconds = sessionDuration(session, this.clock);
      const failuresByCategory = emptyCategoryCounts();
      for (const decision of session.decisions) {
        if (isFailureAction(decision.userAction)) {
          failuresByCategory[decision.category] += 1;
        }
      }

      const applied: { adjustment?: DifficultyAdjustment } = {};
      const profile = await this.deps.profiles.updateProfile(session.userId, (base) => {
        if (base.history.some((entry) => entry.sessionId === session.id)) {
          applied.adjustment = {
            previous: base.difficultyLevel,
            next: base.difficultyLevel,
            successRate: null,
            reason: 'on_target',
          };
          return base;
        }

        const result = applySessionOutcome(
          { ...base, role: session.userRole },
          {
            sessionId: session.id,
            scenarioType: session.scenarioType,
            patternId: session.patternId,
            difficultyLevel: session.difficultyLevel,
            score,
            failuresByCategory,
            durationSeconds,
            hintsUsed: session.hintsUsed,
            completedAt,
          },
          this.config.adaptive,
        );
        applied.adjustment = result.adjustment;
        return result.profile;
      });

      const record: SessionRecord = {
        sessionId: session.id,
        userId: session.userId,
        scenarioType: session.scenarioType,
        patternId: session.patternId,
        difficultyLevel: session.difficultyLevel,
        overallScore: score.overallScore,
        riskLevel: score.riskLevel,
        decisionCount: score.decisionCount,
        correctDecisions: score.correctDecisions,
        hintsUsed: session.hintsUsed,
        durationSeconds,
        categoryBreakdown: score.categoryBreakdown,
        completedAt,
      };
      await this.deps.profiles.appendSessionRecord(record);

      this.releaseAgents(session, score.overallScore, score.riskLevel);

      const evaluation: EvaluationResult = {
        sessionId: session.id,
        userId: session.userId,
        scenarioType: session.scenarioType,
        patternId: session.patternId,
        score,
        difficulty: applied.adjustment ?? {
          previous: session.difficultyLevel,
          next: profile.difficultyLevel,
          successRate: null,
          reason: 'insufficient_history',
        },
        nextFocusCategory: selectFocusCategory(sumFailures(profile.history), this.random),
        debrief,
        durationSeconds,
        hintsUsed: session.hintsUsed,
        evaluatedAt: completedAt,
      };

      this.evaluations.set(session.id, evaluation);
      logger.info('session_evaluated', {
        sessionId: session.id,
        userId: session.userId,
        overallScore: score.overallScore,
        riskLevel: score.riskLevel,
        nextDifficulty: evaluation.difficulty.next,
      });

      return evaluation;
    });
  }

  public pauseSession(sessionId: string): Promise<SessionSummaryResponse> {
    return this.queue.run(sessionId, () => {
      const session = this.deps.memory.mustGetSession(sessionId);

      if (session.state !== 'engaged' && session.state !== 'decision_pending') {
        throw new InvalidStateError(`Session ${session.id} cannot be paused from ${session.state}.`, session.state);
      }

      appendTurn(session, 'system', PAUSED_MESSAGE, { clock: this.clock });
      pauseSessionState(session, this.clock);
      logger.info('session_paused', { sessionId, pausedFrom: session.pausedFrom, pauseCount: session.pauseCount });
      return Promise.resolve(this.summarize(session));
    });
  }

  public resumeSession(sessionId: string): Promise<SessionSummaryResponse> {
    return this.queue.run(sessionId, () => {
      const session = this.deps.memory.mustGetSession(sessionId);
      const pausedAt = session.endedAt;
      const pausedFrom = resumeSessionState(session, this.clock);

      if (pausedFrom === 'decision_pending') {
        transition(session, 'decision_pending', this.clock);
      }

      if (session.stimulusAt !== null && pausedAt !== undefined) {
        session.stimulusAt += Math.max(0, this.clock.now() - pausedAt);
      }

      appendTurn(session, 'system', RESUMED_MESSAGE, { clock: this.clock });
      logger.info('session_resumed', { sessionId, state: session.state });
      return Promise.resolve(this.summarize(session));
    });
  }

  public requestHint(sessionId: string): Promise<HintResponse> {
    return this.queue.run(sessionId, () => {
      const session = this.deps.memory.mustGetSession(sessionId);

      if (session.state === 'closed') {
        throw new InvalidStateError(`Session ${session.id} is not active.`, session.state);
      }

      const hint = session.state === 'resolved' || session.state === 'debrief' ? null : this.consumeHint(session);
      return Promise.resolve({ sessionId, hint, hintsUsed: session.hintsUsed });
    });
  }

  public getRiskAssessment(sessionId: string): RiskAssessmentResponse {
    const session = this.deps.memory.mustGetSession(sessionId);
    const score = scoreDecisions(session.decisions, session.difficultyLevel, this.config.scoring);

    return {
      sessionId,
      state: session.state,
      riskLevel: score.riskLevel,
      score,
    };
  }

  public getSessionSummary(sessionId: string): SessionSummaryResponse {
    return this.summarize(this.deps.memory.mustGetSession(sessionId));
  }

  private summarize(session: Session): SessionSummaryResponse {
    return {
      sessionId: session.id,
      userId: session.userId,
      scenarioType: session.scenarioType,
      patternId: session.patternId,
      difficultyLevel: session.difficultyLevel,
      focusCategory: session.focusCategory,
      state: session.state,
      activeThreatAgentId: session.activeThreatAgentId,
      lastTurns: session.turns.slice(-12),
      decisions: [...session.decisions],
      hintsUsed: session.hintsUsed,
      pauseCount: session.pauseCount,
      scored: session.scored,
      durationSeconds: sessionDuration(session, this.clock),
      startedAt: toIso(session.startedAt),
      ...(session.endedAt !== undefined ? { endedAt: toIso(session.endedAt) } : {}),
    };
  }

  private async handleDecisionInput(
    session: Session,
    turnIndex: number,
    cleanedText: string,
    rawText: string,
    update: NarrativeUpdate,
  ): Promise<void> {
    const beat = session.currentBeat;

    if (!beat || isCompletionSignal(rawText)) {
      transition(session, 'engaged', this.clock);
      this.concludeScenario(session, TRAINEE_ENDED_MESSAGE);
      return;
    }

    const action = await this.deps.classifier.classify(cleanedText, { session, beat });

    if (!action) {
      appendTurn(session, 'game_master', CLARIFICATION_MESSAGE, { clock: this.clock });

      if (signalsConfusion(rawText) || this.isStruggling(session)) {
        update.hint = this.consumeHint(session);
      }
      return;
    }

    const turn = session.turns[turnIndex];
    const decidedAt = turn?.timestamp ?? this.clock.now();
    const decision = recordDecision(
      session,
      {
        turnIndex,
        category: beat.category,
        userInput: cleanedText,
        userAction: action,
        correctAction: beat.correctAction,
        difficultyLevel: session.difficultyLevel,
        timestamp: decidedAt,
        responseLatencyMs: decidedAt - (session.stimulusAt ?? decidedAt),
      },
      this.config.scoring,
    );

    transition(session, 'engaged', this.clock);
    session.stimulusAt = null;
    update.decision = decision;
    update.classifiedAction = action;

    logger.debug('decision_recorded', {
      sessionId: session.id,
      turnIndex,
      category: decision.category,
      userAction: decision.userAction,
      responseLatencyMs: decision.responseLatencyMs,
    });

    if (session.activeThreatAgentId) {
      this.deps.bus.send(
        createAgentMessage(
          'track_scenario',
          {
            senderId: GAME_MASTER_ID,
            recipientId: session.activeThreatAgentId,
            sessionId: session.id,
            payload: {
              turnIndex,
              category: decision.category,
              userAction: decision.userAction,
              correctAction: decision.correctAction,
              responseLatencyMs: decision.responseLatencyMs,
            },
          },
          this.clock,
        ),
      );
    }

    const nextIndex = beat.index + 1;

    if (nextIndex >= session.totalBeats) {
      this.concludeScenario(session, SCENARIO_CONCLUDED_MESSAGE);
      return;
    }

    session.currentBeat = null;

    try {
      session.currentBeat = await this.requestNextBeat(session, nextIndex, action, cleanedText);
    } catch (error: unknown) {
      logger.error('next_beat_unavailable', { sessionId: session.id, beatIndex: nextIndex, error: toErrorMessage(error) });
      session.activeThreatAgentId = null;
      this.concludeScenario(session, SCENARIO_CONCLUDED_MESSAGE);
      return;
    }

    this.presentCurrentBeat(session);
  }

  private async activateThreatAgent(session: Session, pattern: ScenarioPattern): Promise<ScenarioBeat> {
    const agentId = threatActorId(session.scenarioType);
    const message = createAgentMessage(
      'activate_scenario',
      {
        senderId: GAME_MASTER_ID,
        recipientId: agentId,
        sessionId: session.id,
        payload: {
          scenarioType: session.scenarioType,
          pattern,
          difficultyLevel: session.difficultyLevel,
          focusCategory: session.focusCategory,
          userRole: session.userRole,
        },
      },
      this.clock,
    );

    if (!session.contactedAgentIds.includes(agentId)) {
      session.contactedAgentIds.push(agentId);
    }

    const reply = await this.requestScenario(message);

    if (reply?.payload.status === 'ready') {
      session.activeThreatAgentId = agentId;
      logger.info('threat_agent_activated', { sessionId: session.id, agentId, source: reply.payload.beat.source });
      return reply.payload.beat;
    }

    logger.warn('threat_agent_activation_fallback', {
      sessionId: session.id,
      agentId,
      reason: reply?.payload.status === 'failed' ? reply.payload.reason : 'timeout',
    });
    session.activeThreatAgentId = null;
    return this.templateBeat(session, 0);
  }

  private async requestNextBeat(
    session: Session,
    beatIndex: number,
    lastAction: UserAction,
    userInput: string,
  ): Promise<ScenarioBeat> {
    const agentId = session.activeThreatAgentId;

    if (!agentId) {
      return this.templateBeat(session, beatIndex);
    }

    const reply = await this.requestScenario(
      createAgentMessage(
        'adapt_scenario',
        {
          senderId: GAME_MASTER_ID,
          recipientId: agentId,
          sessionId: session.id,
          payload: {
            pattern: mustFindPattern(this.deps.catalog, session.patternId),
            beatIndex,
            difficultyLevel: session.difficultyLevel,
            lastAction,
            userInput,
            performanceHint: this.performanceHint(session),
          },
        },
        this.clock,
      ),
    );

    if (reply?.payload.status === 'ready') {
      return reply.payload.beat;
    }

    logger.warn('threat_agent_adapt_fallback', {
      sessionId: session.id,
      agentId,
      beatIndex,
      reason: reply?.payload.status === 'failed' ? reply.payload.reason : 'timeout',
    });
    session.activeThreatAgentId = null;
    return this.templateBeat(session, beatIndex);
  }

  /** Resolves to undefined when the agent never answered. */
  private async requestScenario(
    message: ScenarioRequestMessage,
  ): Promise<AgentMessageOf<'scenario_ready'> | undefined> {
    try {
      return await this.deps.bus.request(message, {
        timeoutMs: this.config.protocolTimeoutMs,
        retry: this.config.retryPolicy,
        ...(this.deps.sleep ? { sleep: this.deps.sleep } : {}),
      });
    } catch (error: unknown) {
      if (error instanceof ProtocolTimeoutError || error instanceof MailboxClosedError) {
        logger.warn('threat_agent_unreachable', {
          sessionId: message.sessionId,
          type: message.type,
          recipientId: message.recipientId,
          error: toErrorMessage(error),
        });
        return undefined;
      }

      throw error;
    }
  }

  /** Tells every contacted agent the session is over, even ones it fell back from. */
  private releaseAgents(session: Session, overallScore: number | null, riskLevel: RiskLevel): void {
    for (const agentId of session.contactedAgentIds) {
      this.deps.bus.send(
        createAgentMessage(
          'session_complete',
          {
            senderId: GAME_MASTER_ID,
            recipientId: agentId,
            sessionId: session.id,
            payload: { overallScore, riskLevel },
          },
          this.clock,
        ),
      );
    }

    session.contactedAgentIds = [];
    session.activeThreatAgentId = null;
  }

  private releaseSession(session: Session): void {
    this.evaluations.delete(session.id);

    if (!session.scored) {
      const score = scoreDecisions(session.decisions, session.difficultyLevel, this.config.scoring);
      this.releaseAgents(session, score.overallScore, score.riskLevel);
    }
  }

  private templateBeat(session: Session, beatIndex: number): ScenarioBeat {
    const pattern = mustFindPattern(this.deps.catalog, session.patternId);
    const beat = renderTemplateBeat(pattern, beatIndex, session.userRole);

    if (beat) {
      return beat;
    }

    const fallback = renderTemplateBeat(fallbackPattern(this.deps.catalog, session.scenarioType), 0, session.userRole);

    if (!fallback) {
      throw new AppError(500, `No template content for ${session.scenarioType}.`, 'TEMPLATE_MISSING');
    }

    return { ...fallback, index: beatIndex };
  }

  private presentCurrentBeat(session: Session): void {
    const beat = session.currentBeat;

    if (!beat) {
      this.concludeScenario(session, SCENARIO_CONCLUDED_MESSAGE);
      return;
    }

    const turn = appendTurn(session, 'threat_actor', beat.content, {
      clock: this.clock,
      ...(session.activeThreatAgentId ? { agentId: session.activeThreatAgentId } : {}),
    });

    for (const flag of beat.redFlags) {
      if (!session.redFlagsSeen.includes(flag)) {
        session.redFlagsSeen.push(flag);
      }
    }

    session.stimulusAt = turn.timestamp;
    transition(session, 'decision_pending', this.clock);
  }

  private concludeScenario(session: Session, message: string): void {
    transition(session, 'resolved', this.clock);
    session.currentBeat = null;
    session.stimulusAt = null;
    appendTurn(session, 'game_master', message, { clock: this.clock });
    logger.info('scenario_resolved', { sessionId: session.id, decisions: session.decisions.length });
  }

  private consumeHint(session: Session): string | null {
    const hint = buildHint(session, this.config.maxHints);

    if (!hint) {
      return null;
    }

    session.hintsUsed += 1;
    appendTurn(session, 'game_master', hint, { clock: this.clock });
    return hint;
  }

  private isStruggling(session: Session): boolean {
    const recent = session.decisions.slice(-2);
    return recent.length === 2 && recent.every((decision) => isFailureAction(decision.userAction));
  }

  private performanceHint(session: Session): PerformanceHint {
    const recent = session.decisions.slice(-RECENT_DECISION_WINDOW);

    if (recent.length === 0) {
      return 'steady';
    }

    const average =
      recent.reduce((sum, decision) => sum + actionPoints(decision.userAction, this.config.scoring), 0) / recent.length;

    if (average < 50) {
      return 'struggling';
    }

    return average >= 90 ? 'excelling' : 'steady';
  }
}
