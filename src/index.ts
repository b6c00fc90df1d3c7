/**
 * Main entry point for the knowledge graph index service
 */
import { Server } from 'http';
import { startServer, stopServer } from './api/server';
import { createKnowledgeGraphService, KnowledgeGraphService } from './service';
import { logger } from './utils/logger';
import Config from './config';

async function main(): Promise<void> {
  // Log the startup
  logger.info(
    {
      name: Config.service.name,
      version: Config.service.version,
      environment: process.env.NODE_ENV || 'development',
      storage: Config.storage.path,
      http: Config.http,
    },
    'Starting knowledge graph index service'
  );

  const service: KnowledgeGraphService = createKnowledgeGraphService(Config);
  const server: Server = await startServer(service, Config.http.port, Config.http.host);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Shutting down');
    try {
      await stopServer(server);
      await service.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in knowledge graph index service');
  process.exit(1);
});
