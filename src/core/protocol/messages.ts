import { randomUUID } from 'node:crypto';

import type {
  AgentMessageOf,
  AgentMessagePayloads,
  AgentMessageType,
  ScenarioType,
} from '../@types';
import { systemClock, type Clock } from '../shared/runtime';

export const GAME_MASTER_ID = 'game_master';

export const threatActorId = (scenarioType: ScenarioType): string => `threat_actor:${scenarioType}`;

export interface NewAgentMessage<TType extends AgentMessageType> {
  senderId: string;
  recipientId: string;
  sessionId: string;
  payload: AgentMessagePayloads[TType];
  correlationId?: string;
}

export const createAgentMessage = <TType extends AgentMessageType>(
  type: TType,
  input: NewAgentMessage<TType>,
  clock: Clock = systemClock,
): AgentMessageOf<TType> => {
  return {
    type,
    senderId: input.senderId,
    recipientId: input.recipientId,
    correlationId: input.correlationId ?? randomUUID(),
    sessionId: input.sessionId,
    sentAt: clock.now(),
    payload: input.payload,
  };
};

export const assertNever = (value: never, context: string): never => {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
};
