import { SCENARIO_TYPES, type AgentHealth, type ScenarioCatalog } from './@types';
import { AgentWorker, type AgentWorkerOptions } from './agents/agentWorker';
import { ThreatActorAgent } from './agents/threatActorAgent';
import { SessionMemory, type SessionMemoryOptions } from './memory/sessionMemory';
import type { ProfileStore } from './memory/profileStore';
import { Orchestrator, type OrchestratorConfig } from './orchestrator';
import { InMemoryAgentBus } from './protocol/agentBus';
import { logger } from './shared/logger';
import type { Sleep } from './shared/retry';
import { systemClock, type Clock, type RandomSource } from './shared/runtime';
import { KeywordDecisionClassifier, type DecisionClassifier } from './tools/decisionClassifier';
import type { LlmTool } from './tools/llm';
import { loadScenarioCatalog } from './tools/scenarioCatalog';

export interface SimulationOptions {
  llm: LlmTool;
  profiles: ProfileStore;
  catalog?: ScenarioCatalog;
  classifier?: DecisionClassifier;
  config?: Partial<OrchestratorConfig>;
  workerOptions?: AgentWorkerOptions;
  sessionMemory?: Omit<SessionMemoryOptions, 'clock'>;
  clock?: Clock;
  random?: RandomSource;
  sleep?: Sleep;
}

export interface Simulation {
  orchestrator: Orchestrator;
  bus: InMemoryAgentBus;
  memory: SessionMemory;
  agents: ThreatActorAgent[];
  agentStatus(): AgentHealth[];
  start(): void;
  stop(): Promise<void>;
}

/** Wires one threat actor per scenario type to the game master over a shared bus. */
export const createSimulation = (options: SimulationOptions): Simulation => {
  const clock = options.clock ?? systemClock;
  const bus = new InMemoryAgentBus(clock);
  const memory = new SessionMemory({ ...options.sessionMemory, clock });
  const agents = SCENARIO_TYPES.map((type) => new ThreatActorAgent(type, options.llm));
  const workers = agents.map((agent) => new AgentWorker(agent, bus, options.workerOptions));

  const orchestrator = new Orchestrator({
    memory,
    profiles: options.profiles,
    bus,
    catalog: options.catalog ?? loadScenarioCatalog(),
    classifier: options.classifier ?? new KeywordDecisionClassifier(),
    clock,
    ...(options.config ? { config: options.config } : {}),
    ...(options.random ? { random: options.random } : {}),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });

  return {
    orchestrator,
    bus,
    memory,
    agents,
    agentStatus: () =>
      workers.map((worker) => ({
        agentId: worker.agentId,
        running: worker.isRunning,
        inFlight: worker.inFlightCount,
      })),
    start: () => {
      for (const worker of workers) {
        worker.start();
      }
    },
    stop: async () => {
      await Promise.all(workers.map((worker) => worker.stop()));

      for (const agent of agents) {
        bus.close(agent.id);
      }

      logger.info('simulation_stopped', { agents: agents.length });
    },
  };
};
