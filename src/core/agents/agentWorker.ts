import type { AgentMessage, ScenarioReadyPayload } from '../@types';
import type { AgentBus } from '../protocol/agentBus';
import { assertNever } from '../protocol/messages';
import { MailboxClosedError, ProtocolTimeoutError } from '../shared/errors/training-errors';
import { KeyedSerialQueue } from '../shared/keyed-queue';
import { logger, toErrorMessage } from '../shared/logger';
import type { Agent } from './Agent';

export interface AgentWorkerOptions {
  /** How long one `receive` waits before the loop checks for shutdown again. */
  pollTimeoutMs?: number;
  replyCacheSize?: number;
}

const DEFAULT_POLL_TIMEOUT_MS = 1_000;
const DEFAULT_REPLY_CACHE_SIZE = 500;

/**
 * Drains one agent's mailbox. Messages are handled in order per session and
 * concurrently across sessions, so one slow generation never holds up another
 * trainee. Replies are cached by correlation id: a re-sent request queues
 * behind the original and gets its answer instead of being handled twice.
 */
export class AgentWorker {
  private readonly replies = new Map<string, ScenarioReadyPayload>();
  private readonly sessionQueue = new KeyedSerialQueue();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly pollTimeoutMs: number;
  private readonly replyCacheSize: number;
  private controller: AbortController | undefined;
  private loop: Promise<void> | undefined;

  public constructor(
    private readonly agent: Agent,
    private readonly bus: AgentBus,
    options: AgentWorkerOptions = {},
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    this.replyCacheSize = options.replyCacheSize ?? DEFAULT_REPLY_CACHE_SIZE;
  }

  public get agentId(): string {
    return this.agent.id;
  }

  public get isRunning(): boolean {
    return this.loop !== undefined;
  }

  /** Messages received but not yet fully handled. */
  public get inFlightCount(): number {
    return this.inFlight.size;
  }

  public start(): void {
    if (this.loop) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      logger.error('agent_worker_crashed', { agentId: this.agent.id, error: toErrorMessage(error) });
    });
    logger.info('agent_worker_started', { agentId: this.agent.id });
  }

  public async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    await Promise.all([...this.inFlight]);
    this.controller = undefined;
    this.loop = undefined;
  }

  public async process(message: AgentMessage): Promise<void> {
    switch (message.type) {
      case 'activate_scenario':
      case 'adapt_scenario': {
        const cached = this.replies.get(message.correlationId);

        if (cached) {
          logger.info('a2a_duplicate_request_replayed', {
            agentId: this.agent.id,
            sessionId: message.sessionId,
            correlationId: message.correlationId,
          });
          this.bus.respond(message, cached);
          return;
        }

        let payload: ScenarioReadyPayload;

        try {
          payload = await this.agent.handleRequest(message);
        } catch (error: unknown) {
          logger.warn('agent_request_failed', {
            agentId: this.agent.id,
            sessionId: message.sessionId,
            type: message.type,
            error: toErrorMessage(error),
          });
          payload = { status: 'failed', reason: toErrorMessage(error) };
        }

        this.remember(message.correlationId, payload);
        this.bus.respond(message, payload);
        return;
      }
      case 'track_scenario':
      case 'session_complete':
        try {
          await this.agent.handleAnnouncement(message);
        } catch (error: unknown) {
          logger.warn('agent_announcement_failed', {
            agentId: this.agent.id,
            sessionId: message.sessionId,
            type: message.type,
            error: toErrorMessage(error),
          });
        }
        return;
      case 'scenario_ready':
        logger.warn('agent_unexpected_reply', {
          agentId: this.agent.id,
          sessionId: message.sessionId,
          correlationId: message.correlationId,
        });
        return;
      default:
        assertNever(message, 'agent message');
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: AgentMessage;

      try {
        message = await this.bus.receive(this.agent.id, { timeoutMs: this.pollTimeoutMs, signal });
      } catch (error: unknown) {
        if (error instanceof ProtocolTimeoutError) {
          continue;
        }

        if (error instanceof MailboxClosedError) {
          break;
        }

        throw error;
      }

      this.dispatch(message);
    }

    logger.info('agent_worker_stopped', { agentId: this.agent.id });
  }

  private dispatch(message: AgentMessage): void {
    const task = this.sessionQueue
      .run(message.sessionId, () => this.process(message))
      .catch((error: unknown) => {
        logger.error('agent_message_dropped', {
          agentId: this.agent.id,
          sessionId: message.sessionId,
          type: message.type,
          error: toErrorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  private remember(correlationId: string, payload: ScenarioReadyPayload): void {
    this.replies.set(correlationId, payload);

    if (this.replies.size > this.replyCacheSize) {
      const oldest = this.replies.keys().next().value;

      if (oldest !== undefined) {
        this.replies.delete(oldest);
      }
    }
  }
}
