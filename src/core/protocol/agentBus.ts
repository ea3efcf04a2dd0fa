import type {
  AgentMessage,
  AgentMessageOf,
  ScenarioReadyPayload,
  ScenarioRequestMessage,
} from '../@types';
import { MailboxClosedError, ProtocolTimeoutError } from '../shared/errors/training-errors';
import { logger } from '../shared/logger';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from '../shared/retry';
import { systemClock, type Clock } from '../shared/runtime';

export interface ReceiveOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RequestOptions {
  timeoutMs: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export const DEFAULT_PROTOCOL_TIMEOUT_MS = 3_000;

/** Transport contract shared by agents and the game master. */
export interface AgentBus {
  send(message: AgentMessage): string;
  receive(agentId: string, options: ReceiveOptions): Promise<AgentMessage>;
  respond(original: ScenarioRequestMessage, payload: ScenarioReadyPayload): AgentMessageOf<'scenario_ready'>;
  request(message: ScenarioRequestMessage, options: RequestOptions): Promise<AgentMessageOf<'scenario_ready'>>;
  close(agentId: string): void;
}

interface Waiter {
  resolve: (message: AgentMessage) => void;
  reject: (error: Error) => void;
}

const SETTLED_HISTORY_LIMIT = 1_000;

/**
 * Mailbox-per-agent transport. Delivery is at-least-once: `request` re-sends
 * on timeout with the same correlation id, and the first matching reply wins.
 */
export class InMemoryAgentBus implements AgentBus {
  private readonly mailboxes = new Map<string, AgentMessage[]>();
  private readonly waiters = new Map<string, Waiter[]>();
  private readonly pendingReplies = new Map<string, (reply: AgentMessageOf<'scenario_ready'>) => void>();
  private readonly settledCorrelations = new Set<string>();

  public constructor(private readonly clock: Clock = systemClock) {}

  public send(message: AgentMessage): string {
    if (message.type === 'scenario_ready') {
      const resolvePending = this.pendingReplies.get(message.correlationId);

      if (resolvePending) {
        this.pendingReplies.delete(message.correlationId);
        resolvePending(message);
        return message.correlationId;
      }

      if (this.settledCorrelations.has(message.correlationId)) {
        logger.debug('a2a_duplicate_reply_dropped', {
          sessionId: message.sessionId,
          correlationId: message.correlationId,
          senderId: message.senderId,
        });
        return message.correlationId;
      }
    }

    logger.debug('a2a_message_sent', {
      sessionId: message.sessionId,
      type: message.type,
      senderId: message.senderId,
      recipientId: message.recipientId,
      correlationId: message.correlationId,
    });

    this.deliver(message);
    return message.correlationId;
  }

  public receive(agentId: string, options: ReceiveOptions): Promise<AgentMessage> {
    const queued = this.mailboxes.get(agentId)?.shift();

    if (queued) {
      return Promise.resolve(queued);
    }

    if (options.signal?.aborted) {
      return Promise.reject(new MailboxClosedError(agentId));
    }

    return new Promise<AgentMessage>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        const remaining = (this.waiters.get(agentId) ?? []).filter((item) => item !== waiter);

        if (remaining.length > 0) {
          this.waiters.set(agentId, remaining);
        } else {
          this.waiters.delete(agentId);
        }
      };

      const waiter: Waiter = {
        resolve: (message) => {
          cleanup();
          resolve(message);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };

      const onAbort = (): void => waiter.reject(new MailboxClosedError(agentId));
      const timer = setTimeout(() => waiter.reject(new ProtocolTimeoutError(agentId, options.timeoutMs)), options.timeoutMs);

      options.signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.set(agentId, [...(this.waiters.get(agentId) ?? []), waiter]);
    });
  }

  public respond(original: ScenarioRequestMessage, payload: ScenarioReadyPayload): AgentMessageOf<'scenario_ready'> {
    const reply: AgentMessageOf<'scenario_ready'> = {
      type: 'scenario_ready',
      senderId: original.recipientId,
      recipientId: original.senderId,
      correlationId: original.correlationId,
      sessionId: original.sessionId,
      sentAt: this.clock.now(),
      payload,
    };

    this.send(reply);
    return reply;
  }

  public async request(
    message: ScenarioRequestMessage,
    options: RequestOptions,
  ): Promise<AgentMessageOf<'scenario_ready'>> {
    const { correlationId } = message;
    let received: AgentMessageOf<'scenario_ready'> | undefined;

    const reply = new Promise<AgentMessageOf<'scenario_ready'>>((resolve) => {
      this.pendingReplies.set(correlationId, (value) => {
        received = value;
        resolve(value);
      });
    });

    try {
      return await withRetry(
        async (attempt) => {
          if (received) {
            return received;
          }

          if (attempt > 1) {
            logger.warn('a2a_request_resent', {
              sessionId: message.sessionId,
              type: message.type,
              recipientId: message.recipientId,
              correlationId,
              attempt,
            });
          }

          this.send(message);
          return await this.awaitWithTimeout(reply, message.recipientId, options.timeoutMs, correlationId);
        },
        {
          policy: options.retry ?? DEFAULT_RETRY_POLICY,
          operation: `a2a_${message.type}`,
          isRetryable: (error) => error instanceof ProtocolTimeoutError,
          ...(options.sleep ? { sleep: options.sleep } : {}),
        },
      );
    } finally {
      this.pendingReplies.delete(correlationId);
      this.markSettled(correlationId);
    }
  }

  public close(agentId: string): void {
    const waiters = this.waiters.get(agentId) ?? [];
    this.waiters.delete(agentId);
    this.mailboxes.delete(agentId);

    for (const waiter of waiters) {
      waiter.reject(new MailboxClosedError(agentId));
    }
  }

  public pendingCount(agentId: string): number {
    return this.mailboxes.get(agentId)?.length ?? 0;
  }

  private deliver(message: AgentMessage): void {
    const waiter = this.waiters.get(message.recipientId)?.[0];

    if (waiter) {
      waiter.resolve(message);
      return;
    }

    const mailbox = this.mailboxes.get(message.recipientId) ?? [];
    mailbox.push(message);
    this.mailboxes.set(message.recipientId, mailbox);
  }

  private awaitWithTimeout<T>(
    promise: Promise<T>,
    agentId: string,
    timeoutMs: number,
    correlationId: string,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new ProtocolTimeoutError(agentId, timeoutMs, correlationId));
      }, timeoutMs);

      void promise.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }

  private markSettled(correlationId: string): void {
    this.settledCorrelations.add(correlationId);

    if (this.settledCorrelations.size > SETTLED_HISTORY_LIMIT) {
      const oldest = this.settledCorrelations.values().next().value;

      if (oldest !== undefined) {
        this.settledCorrelations.delete(oldest);
      }
    }
  }
}
