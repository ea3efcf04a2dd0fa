import 'reflect-metadata';

import type { Server } from 'node:http';

import { createApp } from './app';
import { env } from './config/env';
import type { ProfileStore } from './core/memory/profileStore';
import { InMemoryProfileStore } from './core/memory/inMemoryProfileStore';
import { createSimulation } from './core/simulation';
import { logger, toErrorMessage } from './core/shared/logger';
import { createLlmTool } from './core/tools/llm';
import { AppDataSource } from './database/data-source';
import { TypeOrmProfileStore } from './database/typeormProfileStore';
import { HealthService } from './modules/health/health.service';
import { ProfilesService } from './modules/profiles/profiles.service';
import { SessionsService } from './modules/sessions/sessions.service';

const createProfileStore = async (): Promise<ProfileStore> => {
  if (env.PERSISTENCE_DRIVER === 'memory') {
    logger.warn('profile_store_in_memory', { reason: 'PERSISTENCE_DRIVER=memory' });
    return new InMemoryProfileStore();
  }

  await AppDataSource.initialize();
  logger.info('database_connected', {
    host: env.DB_HOST,
    database: env.DB_NAME,
  });

  return new TypeOrmProfileStore(AppDataSource);
};

const bootstrap = async (): Promise<void> => {
  const retryPolicy = {
    maxAttempts: env.PROTOCOL_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_BASE_DELAY_MS * 10,
  };

  const llm = createLlmTool({
    azureApiKey: env.AZURE_OPENAI_API_KEY,
    azureEndpoint: env.AZURE_OPENAI_ENDPOINT,
    azureDeployment: env.AZURE_OPENAI_DEPLOYMENT,
    model: env.LLM_MODEL,
    retryPolicy,
  });
  const profiles = await createProfileStore();

  const simulation = createSimulation({
    llm,
    profiles,
    config: {
      protocolTimeoutMs: env.PROTOCOL_TIMEOUT_MS,
      retryPolicy,
      adaptive: {
        passThreshold: env.PASS_THRESHOLD,
        historyWindow: env.HISTORY_WINDOW,
        recencyWindow: env.RECENCY_WINDOW,
      },
      maxHints: env.MAX_HINTS,
    },
  });
  simulation.start();

  const app = createApp({
    health: new HealthService(simulation, profiles),
    sessions: new SessionsService(simulation.orchestrator),
    profiles: new ProfilesService(profiles),
  });

  const server: Server = app.listen(env.PORT, () => {
    logger.info('server_started', {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      persistence: env.PERSISTENCE_DRIVER,
      threatAgents: simulation.agents.map((agent) => agent.id),
    });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('shutdown_signal_received', { signal });

    server.close(async (error) => {
      if (error) {
        logger.error('shutdown_failed', {
          signal,
          error: error.message,
        });
        process.exit(1);
        return;
      }

      await simulation.stop();

      if (AppDataSource.isInitialized) {
        await AppDataSource.destroy();
      }

      logger.info('shutdown_complete', { signal });
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

void bootstrap().catch((error: unknown) => {
  logger.error('bootstrap_failed', {
    error: toErrorMessage(error),
  });
  process.exit(1);
});
