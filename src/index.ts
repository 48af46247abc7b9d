import 'dotenv/config';
import path from 'path';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';
import { FileManager } from './utils/FileManager';
import { EnvironmentChecker } from './utils/EnvironmentChecker';
import { ProcessRegistry } from './process/ProcessRegistry';
import { ProcessRunner } from './process/ProcessRunner';
import { CredentialedSession } from './session/CredentialedSession';
import { TaskStore } from './queue/TaskStore';
import { TaskQueue } from './queue/TaskQueue';
import { TunnelLauncher } from './tunnel/TunnelLauncher';
import { Server } from './server';
import { AppConfig, AppContext } from './types';

function initializeSentry(): void {
  if (!process.env.SENTRY_DSN) {
    return;
  }
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: 1.0,
  });
}

async function initializeComponents(config: AppConfig): Promise<AppContext> {
  const registry = new ProcessRegistry(config.processGraceMs);
  const runner = new ProcessRunner(registry);

  const fileManager = new FileManager(config.session.workRoot);
  await fileManager.initialize();

  const environment = new EnvironmentChecker({
    tools: [
      { name: 'content client', config: config.client },
      { name: 'archiver', config: config.archiver },
    ],
    writableDirs: [
      config.session.workRoot,
      config.outputDir,
      config.queueDir,
      config.logsDir,
    ],
    spaceProbePath: process.cwd(),
    minFreeBytes: config.session.minFreeBytes,
    runner,
  });

  const session = new CredentialedSession({
    runner,
    fileManager,
    environment,
    clientPath: config.client.path,
    archiverPath: config.archiver.path,
    config: config.session,
  });

  const store = new TaskStore(config.queueDir);
  await store.initialize();
  const queue = new TaskQueue(session, store, registry);

  const tunnel = new TunnelLauncher(
    runner,
    config.tunnelBinary,
    config.tunnelAuthToken,
  );

  return {
    config,
    registry,
    runner,
    fileManager,
    environment,
    session,
    store,
    queue,
    tunnel,
  };
}

function setupShutdownHandlers(app: AppContext, server: Server): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`🛑 Received ${signal}, shutting down gracefully...`);
    try {
      app.queue.stop();
      await server.stop();
      await app.registry.terminateAll();
      await Sentry.close(2000);
      logger.info('✅ Stopped safely');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      Sentry.captureException(error);
      app.registry.killAllSync();
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  setupEmergencyHandlers(app.registry);
}

function setupEmergencyHandlers(registry: ProcessRegistry): void {
  process.on('exit', (code) => {
    registry.killAllSync();
    logger.info(`Process exiting with code ${code}`);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception - initiating emergency shutdown', {
      error: error.message,
      stack: error.stack,
    });
    Sentry.captureException(error);
    registry.killAllSync();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection - initiating emergency shutdown', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    Sentry.captureException(reason);
    registry.killAllSync();
    process.exit(1);
  });
}

async function main(): Promise<void> {
  try {
    initializeSentry();
    logger.info('🚀 Starting content archiver...');

    const config = loadConfig();
    logger.level = config.debug ? 'debug' : config.logLevel;
    logger.info('✅ Configuration loaded', {
      port: config.port,
      workRoot: config.session.workRoot,
      outputDir: config.outputDir,
      tunnel: config.tunnelAuthToken ? 'enabled' : 'disabled',
    });

    const app = await initializeComponents(config);
    logger.info('✅ All components initialized');

    const server = new Server(
      {
        session: app.session,
        queue: app.queue,
        environment: app.environment,
        fileManager: app.fileManager,
        tunnel: app.tunnel,
        defaultOutputPath: path.join(config.outputDir, 'game.7z'),
      },
      config.port,
    );
    setupShutdownHandlers(app, server);

    const report = await app.environment.check();
    logger.info(EnvironmentChecker.formatReport(report));

    await app.queue.restore();
    app.queue.start();
    await server.start();
    await app.tunnel.startHttp(config.port);

    logger.info('🎉 Content archiver is fully operational!');
  } catch (error: unknown) {
    logger.error('Fatal error during startup', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    Sentry.captureException(error);
    process.exit(1);
  }
}

void main();
