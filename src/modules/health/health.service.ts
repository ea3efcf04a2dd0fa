import type { HealthResponse } from '../../core/@types';
import type { ProfileStore } from '../../core/memory/profileStore';
import type { Simulation } from '../../core/simulation';

export class HealthService {
  public constructor(
    private readonly simulation: Pick<Simulation, 'agentStatus'>,
    private readonly profiles: Pick<ProfileStore, 'driver' | 'isReady'>,
  ) {}

  /** Healthy only while the profile store answers and every threat agent is draining its mailbox. */
  public async getHealth(): Promise<HealthResponse> {
    const ready = await this.profiles.isReady();
    const agents = this.simulation.agentStatus();

    return {
      ok: ready && agents.every((agent) => agent.running),
      uptime: process.uptime(),
      persistence: { driver: this.profiles.driver, ready },
      agents,
    };
  }
}
