import type { NarrativeState } from '../../@types';
import { AppError } from './app-error';

/** Caller asked for a state change the session table does not allow. */
export class IllegalTransitionError extends AppError {
  public constructor(
    public readonly from: NarrativeState,
    public readonly to: NarrativeState,
    reason?: string,
  ) {
    super(
      409,
      `Illegal session transition ${from} -> ${to}${reason ? `: ${reason}` : ''}.`,
      'ILLEGAL_TRANSITION',
      { from, to },
    );
  }
}

export class ReferentialError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(422, message, 'REFERENTIAL_ERROR', details);
  }
}

export class InvalidStateError extends AppError {
  public constructor(message: string, public readonly state: NarrativeState) {
    super(409, message, 'INVALID_STATE', { state });
  }
}

export class PrematureCompletionError extends AppError {
  public constructor(public readonly state: NarrativeState) {
    super(
      409,
      `Session cannot be completed from state ${state}; keep playing until the scenario resolves.`,
      'PREMATURE_COMPLETION',
      { state },
    );
  }
}

export class ProtocolTimeoutError extends AppError {
  public constructor(
    public readonly agentId: string,
    public readonly timeoutMs: number,
    public readonly correlationId?: string,
  ) {
    super(
      504,
      `No message for ${agentId} within ${timeoutMs}ms.`,
      'PROTOCOL_TIMEOUT',
      { agentId, timeoutMs, correlationId },
    );
  }
}

export class MailboxClosedError extends AppError {
  public constructor(public readonly agentId: string) {
    super(503, `Mailbox for ${agentId} was closed while waiting.`, 'MAILBOX_CLOSED', { agentId });
  }
}

export class ContentBlockedError extends AppError {
  public constructor(message = 'Generated content was blocked by the provider safety filter.', details?: unknown) {
    super(422, message, 'CONTENT_BLOCKED', details);
  }
}

export class ProviderUnavailableError extends AppError {
  public constructor(message = 'Model provider is unavailable.', details?: unknown) {
    super(503, message, 'PROVIDER_UNAVAILABLE', details);
  }
}

export const sessionNotFound = (sessionId: string): AppError => {
  return new AppError(404, `Session ${sessionId} not found.`, 'SESSION_NOT_FOUND');
};
