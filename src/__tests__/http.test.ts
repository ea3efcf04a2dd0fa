import type { AddressInfo } from 'node:net';
import type { Server } from 'node:http';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { createApp } from '../app';
import { InMemoryProfileStore } from '../core/memory/inMemoryProfileStore';
import { createSimulation } from '../core/simulation';
import { createDeterministicMockLlmTool } from '../core/tools/llm';
import { HealthService } from '../modules/health/health.service';
import { ProfilesService } from '../modules/profiles/profiles.service';
import { SessionsService } from '../modules/sessions/sessions.service';
import { fixedRandom } from './helpers';

const profiles = new InMemoryProfileStore();
const simulation = createSimulation({
  llm: createDeterministicMockLlmTool(),
  profiles,
  random: fixedRandom(0),
  workerOptions: { pollTimeoutMs: 50 },
});

let server: Server;
let baseUrl = '';

const call = async (method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> => {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'content-type': 'application/json', 'x-request-id': 'req-test' },
    ...(body === undefined ? {} : { body: JSON.stringify(body) }),
  });

  return { status: response.status, json: await response.json() };
};

beforeAll(async () => {
  simulation.start();
  const app = createApp({
    health: new HealthService(simulation, profiles),
    sessions: new SessionsService(simulation.orchestrator),
    profiles: new ProfilesService(profiles),
  });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  baseUrl = typeof address === 'object' && address ? `http://127.0.0.1:${address.port}/api` : '';
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await simulation.stop();
});

describe('HTTP API', () => {
  it('reports health', async () => {
    const { status, json } = await call('GET', '/health');

    expect(status).toBe(200);
    expect(json).toMatchObject({
      ok: true,
      persistence: { driver: 'memory', ready: true },
    });
    expect(z.object({ agents: z.array(z.object({ agentId: z.string(), running: z.boolean() })) }).parse(json)).toEqual({
      agents: [
        { agentId: 'threat_actor:phishing', running: true },
        { agentId: 'threat_actor:vishing', running: true },
        { agentId: 'threat_actor:bec', running: true },
        { agentId: 'threat_actor:physical', running: true },
        { agentId: 'threat_actor:insider', running: true },
      ],
    });
  });

  it('plays a session through the REST surface', async () => {
    const created = await call('POST', '/sessions', { userId: 'http-user', scenarioType: 'phishing', role: 'finance' });

    expect(created.status).toBe(201);
    expect(created.json).toMatchObject({ userId: 'http-user', patternId: 'phishing-vendor-payment', state: 'intro' });

    const { sessionId } = z.object({ sessionId: z.string().uuid() }).parse(created.json);

    await call('POST', `/sessions/${sessionId}/turn`, { message: 'ready' });
    const turn = await call('POST', `/sessions/${sessionId}/turn`, { message: 'I will report it to security team' });
    expect(turn.json).toMatchObject({ classifiedAction: 'recognized_and_reported', state: 'decision_pending' });

    const risk = await call('GET', `/sessions/${sessionId}/risk`);
    expect(risk.json).toMatchObject({ sessionId, riskLevel: 'low' });

    const early = await call('POST', `/sessions/${sessionId}/complete`);
    expect(early.status).toBe(409);
    expect(early.json).toMatchObject({ requestId: 'req-test', error: { code: 'PREMATURE_COMPLETION' } });

    await call('POST', `/sessions/${sessionId}/turn`, { message: 'I will verify it first' });
    const completed = await call('POST', `/sessions/${sessionId}/complete`);
    expect(completed.status).toBe(200);
    expect(completed.json).toMatchObject({ sessionId, score: { status: 'scored' } });

    const profile = await call('GET', '/profiles/http-user');
    expect(profile.json).toMatchObject({ userId: 'http-user', totalSessions: 1 });

    const history = await call('GET', '/profiles/http-user/sessions?limit=5');
    expect(history.json).toEqual([expect.objectContaining({ sessionId })]);
  });

  it('validates request bodies', async () => {
    const { status, json } = await call('POST', '/sessions', { userId: '', scenarioType: 'smishing' });

    expect(status).toBe(400);
    expect(json).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('serves the starting profile to a user who has not trained yet', async () => {
    const profile = await call('GET', '/profiles/nobody');

    expect(profile.status).toBe(200);
    expect(profile.json).toMatchObject({
      userId: 'nobody',
      role: 'general',
      difficultyLevel: 1,
      history: [],
      totalSessions: 0,
    });
  });

  it('returns 404 for unknown sessions and routes', async () => {
    const session = await call('GET', '/sessions/00000000-0000-4000-8000-000000000000');
    const route = await call('GET', '/nope');

    expect(session.status).toBe(404);
    expect(session.json).toMatchObject({ error: { code: 'SESSION_NOT_FOUND' } });
    expect(route.json).toMatchObject({
      requestId: 'req-test',
      error: { code: 'ROUTE_NOT_FOUND', message: 'Route GET /api/nope not found.' },
    });
  });

  it('echoes a well-formed request id and replaces one that is not', async () => {
    const kept = await fetch(`${baseUrl}/health`, { headers: { 'x-request-id': 'trace-42.a' } });
    const replaced = await fetch(`${baseUrl}/health`, { headers: { 'x-request-id': 'bad id {}' } });

    expect(kept.headers.get('x-request-id')).toBe('trace-42.a');
    expect(replaced.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('HealthService', () => {
  const agents = [{ agentId: 'threat_actor:phishing', running: true, inFlight: 0 }];

  it('is unhealthy while the profile store is unreachable', async () => {
    const service = new HealthService(
      { agentStatus: () => agents },
      { driver: 'postgres', isReady: () => Promise.resolve(false) },
    );

    const health = await service.getHealth();

    expect(health.ok).toBe(false);
    expect(health.persistence).toEqual({ driver: 'postgres', ready: false });
  });

  it('is unhealthy once a threat agent stops', async () => {
    const service = new HealthService(
      { agentStatus: () => [...agents, { agentId: 'threat_actor:bec', running: false, inFlight: 0 }] },
      { driver: 'memory', isReady: () => Promise.resolve(true) },
    );

    expect((await service.getHealth()).ok).toBe(false);
  });
});
