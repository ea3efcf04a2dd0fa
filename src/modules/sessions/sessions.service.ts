import type {
  EvaluationResult,
  HintResponse,
  NarrativeUpdate,
  PostTurnRequest,
  RiskAssessmentResponse,
  SessionSummaryResponse,
  StartScenarioRequest,
} from '../../core/@types';
import type { Orchestrator } from '../../core/orchestrator';

export class SessionsService {
  public constructor(private readonly orchestrator: Orchestrator) {}

  public async startScenario(payload: StartScenarioRequest): Promise<SessionSummaryResponse> {
    const session = await this.orchestrator.startScenario(payload.userId, payload.scenarioType, payload.role);
    return this.orchestrator.getSessionSummary(session.id);
  }

  public getSession(sessionId: string): SessionSummaryResponse {
    return this.orchestrator.getSessionSummary(sessionId);
  }

  public postTurn(sessionId: string, payload: PostTurnRequest): Promise<NarrativeUpdate> {
    return this.orchestrator.submitUserInput(sessionId, payload.message);
  }

  public requestHint(sessionId: string): Promise<HintResponse> {
    return this.orchestrator.requestHint(sessionId);
  }

  public pause(sessionId: string): Promise<SessionSummaryResponse> {
    return this.orchestrator.pauseSession(sessionId);
  }

  public resume(sessionId: string): Promise<SessionSummaryResponse> {
    return this.orchestrator.resumeSession(sessionId);
  }

  public complete(sessionId: string): Promise<EvaluationResult> {
    return this.orchestrator.completeSession(sessionId);
  }

  public getRiskAssessment(sessionId: string): RiskAssessmentResponse {
    return this.orchestrator.getRiskAssessment(sessionId);
  }
}
