import type { AgentMessage, ScenarioReadyPayload, ScenarioRequestMessage } from '../@types';

export type AgentKind = 'threat_actor';

export type AnnouncementMessage = Exclude<AgentMessage, ScenarioRequestMessage | { type: 'scenario_ready' }>;

export interface Agent {
  id: string;
  kind: AgentKind;
  name: string;
  /** Must settle with a payload; the worker turns a rejection into a `failed` reply. */
  handleRequest(message: ScenarioRequestMessage): Promise<ScenarioReadyPayload>;
  handleAnnouncement(message: AnnouncementMessage): Promise<void>;
}
