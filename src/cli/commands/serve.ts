import chalk from 'chalk';
import { loadPipeline } from '../../runtime.js';
import { ReportServer } from '../../server.js';
import { closeLogFiles, logger } from '../../utils/logger.js';
import { requireConfig } from './shared.js';

interface ServeOptions {
  config?: string;
  port?: string;
}

/**
 * Set up signal handlers for graceful shutdown
 */
function setupSignalHandlers(server: ReportServer): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit...');
      process.exit(1);
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    try {
      await server.stop();
      closeLogFiles();
      process.exit(0);
    } catch (err) {
      logger.error('Error during shutdown', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Serve command handler
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  const configDir = requireConfig(options.config, 'serve');
  const pipeline = await loadPipeline(configDir);
  const port = options.port ? parseInt(options.port, 10) : pipeline.config.serverPort;

  const recovered = await pipeline.orchestrator.recoverInFlight();
  if (recovered.length > 0) {
    console.log(chalk.yellow(`⚠️  ${recovered.length} interrupted publish attempt(s) marked uncertain`));
  }

  const server = new ReportServer(port, {
    reporter: pipeline.reporter,
    orchestrator: pipeline.orchestrator,
  });
  setupSignalHandlers(server);
  await server.start();

  console.log(chalk.green(`✓ Serving progress reports on http://localhost:${server.getPort()}`));
}
