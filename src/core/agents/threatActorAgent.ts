import type {
  DifficultyLevel,
  ScenarioPattern,
  ScenarioReadyPayload,
  ScenarioRequestMessage,
  ScenarioType,
  TrackScenarioPayload,
  UserRole,
} from '../@types';
import { assertNever, threatActorId } from '../protocol/messages';
import { ContentBlockedError, ProviderUnavailableError } from '../shared/errors/training-errors';
import { logger } from '../shared/logger';
import { buildBeatUserPrompt, buildThreatActorSystemPrompt, type BeatAdaptation } from '../shared/prompts';
import { humanize, limitToSentences } from '../shared/text';
import type { LlmTool } from '../tools/llm';
import { renderTemplateBeat } from '../tools/scenarioCatalog';
import type { Agent, AnnouncementMessage } from './Agent';

interface ThreatSessionContext {
  role: UserRole;
  difficultyLevel: DifficultyLevel;
  tracked: TrackScenarioPayload[];
}

const MAX_BEAT_SENTENCES = 4;

export class ThreatActorAgent implements Agent {
  public readonly id: string;
  public readonly kind = 'threat_actor' as const;
  public readonly name: string;
  private readonly sessions = new Map<string, ThreatSessionContext>();

  public constructor(
    public readonly scenarioType: ScenarioType,
    private readonly llm: LlmTool,
  ) {
    this.id = threatActorId(scenarioType);
    this.name = `${humanize(scenarioType)} threat actor`;
  }

  public async handleRequest(message: ScenarioRequestMessage): Promise<ScenarioReadyPayload> {
    switch (message.type) {
      case 'activate_scenario': {
        const { pattern, userRole, difficultyLevel } = message.payload;
        this.sessions.set(message.sessionId, { role: userRole, difficultyLevel, tracked: [] });
        return this.composeBeat(message.sessionId, pattern, 0, {});
      }
      case 'adapt_scenario': {
        const context = this.sessions.get(message.sessionId);

        if (context) {
          context.difficultyLevel = message.payload.difficultyLevel;
        }

        return this.composeBeat(message.sessionId, message.payload.pattern, message.payload.beatIndex, {
          lastAction: message.payload.lastAction,
          userInput: message.payload.userInput,
          performanceHint: message.payload.performanceHint,
        });
      }
      default:
        return assertNever(message, 'scenario request');
    }
  }

  public handleAnnouncement(message: AnnouncementMessage): Promise<void> {
    switch (message.type) {
      case 'track_scenario':
        this.sessions.get(message.sessionId)?.tracked.push(message.payload);
        break;
      case 'session_complete':
        logger.info('threat_actor_session_closed', {
          agentId: this.id,
          sessionId: message.sessionId,
          riskLevel: message.payload.riskLevel,
          tracked: this.sessions.get(message.sessionId)?.tracked.length ?? 0,
        });
        this.sessions.delete(message.sessionId);
        break;
      default:
        assertNever(message, 'announcement');
    }

    return Promise.resolve();
  }

  public trackedDecisions(sessionId: string): readonly TrackScenarioPayload[] {
    return this.sessions.get(sessionId)?.tracked ?? [];
  }

  private async composeBeat(
    sessionId: string,
    pattern: ScenarioPattern,
    beatIndex: number,
    adaptation: BeatAdaptation,
  ): Promise<ScenarioReadyPayload> {
    const context = this.sessions.get(sessionId);
    const role = context?.role ?? 'general';
    const difficultyLevel = context?.difficultyLevel ?? 1;
    const template = renderTemplateBeat(pattern, beatIndex, role);

    if (!template) {
      return { status: 'failed', reason: `Pattern ${pattern.id} has no beat ${beatIndex}.` };
    }

    try {
      const completion = await this.llm.generateChatCompletion({
        systemPrompt: buildThreatActorSystemPrompt(pattern, role, difficultyLevel),
        userPrompt: buildBeatUserPrompt(template, adaptation),
        referenceText: template.content,
        temperature: 0.7,
        maxTokens: 220,
      });
      const content = limitToSentences(completion.text, MAX_BEAT_SENTENCES);

      return {
        status: 'ready',
        beat: content ? { ...template, content, source: 'generated' } : template,
      };
    } catch (error: unknown) {
      if (error instanceof ContentBlockedError || error instanceof ProviderUnavailableError) {
        logger.warn('threat_actor_template_fallback', {
          agentId: this.id,
          sessionId,
          patternId: pattern.id,
          beatIndex,
          code: error.code,
        });
        return { status: 'ready', beat: template };
      }

      throw error;
    }
  }
}
