import { randomUUID } from 'node:crypto';

import type {
  DecisionPoint,
  DifficultyLevel,
  NarrativeState,
  ScenarioType,
  Session,
  Turn,
  TurnRole,
  UserRole,
  VulnerabilityCategory,
} from '../@types';
import {
  IllegalTransitionError,
  InvalidStateError,
  ReferentialError,
} from '../shared/errors/training-errors';
import { systemClock, type Clock } from '../shared/runtime';
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../tools/riskScoring';
import { createDecisionPoint, type NewDecisionInput } from './decisionPoint';

/**
 * Narrative state table. `closed -> engaged` is listed but additionally
 * requires a paused, unscored session (see `transition`).
 */
export const SESSION_TRANSITIONS: Readonly<Record<NarrativeState, readonly NarrativeState[]>> = {
  intro: ['engaged'],
  engaged: ['decision_pending', 'resolved', 'closed'],
  decision_pending: ['engaged', 'closed'],
  resolved: ['debrief'],
  debrief: ['closed'],
  closed: ['engaged'],
};

const PAUSABLE_STATES: readonly NarrativeState[] = ['engaged', 'decision_pending'];

export interface CreateSessionInput {
  id?: string;
  userId: string;
  userRole: UserRole;
  scenarioType: ScenarioType;
  patternId: string;
  difficultyLevel: DifficultyLevel;
  focusCategory: VulnerabilityCategory;
  totalBeats: number;
}

export const createSession = (input: CreateSessionInput, clock: Clock = systemClock): Session => {
  return {
    id: input.id ?? randomUUID(),
    userId: input.userId,
    userRole: input.userRole,
    scenarioType: input.scenarioType,
    patternId: input.patternId,
    difficultyLevel: input.difficultyLevel,
    focusCategory: input.focusCategory,
    turns: [],
    decisions: [],
    state: 'intro',
    activeThreatAgentId: null,
    contactedAgentIds: [],
    currentBeat: null,
    redFlagsSeen: [],
    totalBeats: input.totalBeats,
    stimulusAt: null,
    hintsUsed: 0,
    pauseCount: 0,
    pausedFrom: null,
    scored: false,
    startedAt: clock.now(),
  };
};

export const appendTurn = (
  session: Session,
  role: TurnRole,
  content: string,
  options: { agentId?: string; clock?: Clock } = {},
): Turn => {
  if (session.state === 'closed') {
    throw new InvalidStateError(`Session ${session.id} is closed; no further turns accepted.`, session.state);
  }

  const clock = options.clock ?? systemClock;
  const previous = session.turns[session.turns.length - 1];
  const now = clock.now();
  const turn: Turn = {
    index: session.turns.length,
    role,
    content,
    timestamp: previous && now <= previous.timestamp ? previous.timestamp + 1 : now,
    ...(options.agentId ? { agentId: options.agentId } : {}),
  };

  session.turns.push(turn);
  return turn;
};

/** Builds the decision point here so its risk impact always comes from the scoring rules. */
export const recordDecision = (
  session: Session,
  input: NewDecisionInput,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): DecisionPoint => {
  if (session.state === 'closed') {
    throw new InvalidStateError(`Session ${session.id} is closed; no further decisions accepted.`, session.state);
  }

  if (!Number.isInteger(input.turnIndex) || !session.turns[input.turnIndex]) {
    throw new ReferentialError(
      `Decision references turn ${input.turnIndex}, which does not exist in session ${session.id}.`,
      { turnIndex: input.turnIndex, turnCount: session.turns.length },
    );
  }

  const last = session.decisions[session.decisions.length - 1];
  if (last && input.turnIndex < last.turnIndex) {
    throw new ReferentialError(
      `Decision for turn ${input.turnIndex} arrived after a decision for turn ${last.turnIndex}.`,
      { turnIndex: input.turnIndex, lastTurnIndex: last.turnIndex },
    );
  }

  const decision = createDecisionPoint(input, config);
  session.decisions.push(decision);
  return decision;
};

export const canTransition = (session: Session, next: NarrativeState): boolean => {
  if (!SESSION_TRANSITIONS[session.state].includes(next)) {
    return false;
  }

  if (session.state === 'closed') {
    return session.pausedFrom !== null && !session.scored;
  }

  return true;
};

export const transition = (session: Session, next: NarrativeState, clock: Clock = systemClock): void => {
  const from = session.state;

  if (!SESSION_TRANSITIONS[from].includes(next)) {
    throw new IllegalTransitionError(from, next);
  }

  if (from === 'closed') {
    if (session.scored) {
      throw new IllegalTransitionError(from, next, 'session has already been scored');
    }

    if (session.pausedFrom === null) {
      throw new IllegalTransitionError(from, next, 'session was closed, not paused');
    }

    session.pausedFrom = null;
    delete session.endedAt;
  }

  if (next === 'closed') {
    if (PAUSABLE_STATES.includes(from)) {
      session.pausedFrom = from;
      session.pauseCount += 1;
    }

    session.endedAt = clock.now();
  }

  session.state = next;
};

export const pauseSession = (session: Session, clock: Clock = systemClock): void => {
  if (!PAUSABLE_STATES.includes(session.state)) {
    throw new IllegalTransitionError(session.state, 'closed', 'only engaged or decision_pending sessions can pause');
  }

  transition(session, 'closed', clock);
};

/** Re-enters `engaged` and returns the state the session was paused from. */
export const resumeSession = (session: Session, clock: Clock = systemClock): NarrativeState => {
  const pausedFrom = session.pausedFrom;
  transition(session, 'engaged', clock);
  return pausedFrom ?? 'engaged';
};

export const markScored = (session: Session): void => {
  if (session.state !== 'closed') {
    throw new InvalidStateError(`Session ${session.id} must be closed before it is scored.`, session.state);
  }

  if (session.pausedFrom !== null) {
    throw new InvalidStateError(`Session ${session.id} is paused, not finished.`, session.state);
  }

  session.scored = true;
};

export const sessionDuration = (session: Session, clock: Clock = systemClock): number => {
  const end = session.state === 'closed' && session.endedAt !== undefined ? session.endedAt : clock.now();
  return Math.max(0, (end - session.startedAt) / 1000);
};
